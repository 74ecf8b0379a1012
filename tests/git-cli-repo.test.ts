import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { simpleGit, SimpleGit } from "simple-git";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { applyGitEnvironment, GitCli } from "../src/git/git-cli.js";
import { hasLargeObjects } from "../src/migration/large-objects.js";

const AUTHOR = ["user.name=Test", "user.email=test@example.com", "commit.gpgsign=false"];

describe("applyGitEnvironment", () => {
  it("disables prompts and LFS downloads", () => {
    const env: NodeJS.ProcessEnv = { EDITOR: "vi" };
    applyGitEnvironment(env);
    expect(env).toEqual({ EDITOR: "vi", GIT_TERMINAL_PROMPT: "0", GIT_LFS_SKIP_SMUDGE: "1" });
  });
});

describe("GitCli against local repositories", () => {
  let root: string;
  let sourceDir: string;
  let source: SimpleGit;
  const cli = new GitCli();

  async function commit(file: string, content: string | Buffer, message: string): Promise<string> {
    await writeFile(join(sourceDir, file), content);
    await source.add(file);
    await source.commit(message);
    return (await source.revparse(["HEAD"])).trim();
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "git-cli-"));
    sourceDir = join(root, "source");
    await mkdir(sourceDir);
    source = simpleGit({ baseDir: sourceDir, config: AUTHOR });
    await source.init();
    await source.raw(["symbolic-ref", "HEAD", "refs/heads/main"]);

    await commit("README.md", "hello world\n", "Initial commit");
    await source.raw(["branch", "dev"]);
    await source.raw(["tag", "v1"]);
    await commit("asset.bin", Buffer.alloc(5000, 7), "Add asset");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(root, { recursive: true, force: true });
  });

  it("mirrors every ref of the source", async () => {
    const mirror = join(root, "app.git");
    await cli.mirrorClone(sourceDir, mirror);

    const refs = await cli.listRefs(mirror);
    expect([...refs.keys()].sort()).toEqual(["refs/heads/dev", "refs/heads/main", "refs/tags/v1"]);
    expect(refs).toEqual(await cli.listRefs(sourceDir));
  });

  it("finds blobs at or above the threshold", async () => {
    const mirror = join(root, "app.git");
    await cli.mirrorClone(sourceDir, mirror);

    expect(await hasLargeObjects(cli, mirror, 5000)).toBe(true);
    expect(await hasLargeObjects(cli, mirror, 5001)).toBe(false);
  });

  it("stops enumerating at the first match", async () => {
    const mirror = join(root, "app.git");
    await cli.mirrorClone(sourceDir, mirror);

    expect(await hasLargeObjects(cli, mirror, 1)).toBe(true);
  });

  it("lists every object type with its size", async () => {
    const blobs: number[] = [];
    const types = new Set<string>();
    for await (const object of cli.enumerateObjects(sourceDir)) {
      types.add(object.type);
      if (object.type === "blob") blobs.push(object.size);
    }

    expect([...types].sort()).toEqual(["blob", "commit", "tree"]);
    expect(blobs.sort((a, b) => a - b)).toEqual([12, 5000]);
  });

  it("fails enumeration outside a repository", async () => {
    const empty = join(root, "not-a-repo");
    await mkdir(empty);

    await expect(hasLargeObjects(cli, empty, 1)).rejects.toThrow(
      `git rev-list failed in ${empty}`
    );
  });

  it("keeps refs identical through a working copy round trip", async () => {
    const mirror = join(root, "app.git");
    const work = join(root, "app-work");
    await cli.mirrorClone(sourceDir, mirror);
    const before = await cli.listRefs(mirror);

    await cli.cloneWorkingCopy(mirror, work);
    expect(await cli.listRefs(work)).toEqual(before);

    await cli.pushMirror(work, mirror);
    expect(await cli.listRefs(mirror)).toEqual(before);
  });

  it("fetches new source commits into an existing mirror", async () => {
    const mirror = join(root, "app.git");
    await cli.mirrorClone(sourceDir, mirror);
    const head = await commit("CHANGELOG.md", "v2\n", "Add changelog");

    await cli.updateMirror(mirror, sourceDir);

    expect((await cli.listRefs(mirror)).get("refs/heads/main")).toBe(head);
  });

  it("runs with editor and askpass variables in the environment", async () => {
    vi.stubEnv("EDITOR", "vi");
    vi.stubEnv("GIT_ASKPASS", "/bin/true");
    const head = (await source.revparse(["HEAD"])).trim();

    const refs = await cli.listRemoteRefs(sourceDir);

    expect(refs.get("refs/heads/main")).toBe(head);
    expect(refs.get("refs/tags/v1")).toBe((await source.revparse(["v1"])).trim());
  });
});
