import { SlugCollisionError } from "../errors.js";

/** `group/sub/repo` -> `group-sub-repo`; also the destination repository name. */
export function slugifyRepoPath(path: string): string {
  return path.replace(/\//g, "-");
}

/** Throws when two distinct paths map to the same slug (`a/b-c` and `a-b/c`). */
export function assertUniqueSlugs(paths: readonly string[]): void {
  const bySlug = new Map<string, Set<string>>();
  for (const path of paths) {
    const slug = slugifyRepoPath(path);
    const existing = bySlug.get(slug) ?? new Set<string>();
    existing.add(path);
    bySlug.set(slug, existing);
  }

  const collisions = [...bySlug.entries()]
    .filter(([, owners]) => owners.size > 1)
    .map(([slug, owners]) => ({ slug, paths: [...owners] }));

  if (collisions.length > 0) {
    throw new SlugCollisionError(collisions);
  }
}
