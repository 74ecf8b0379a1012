import { existsSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { errorMessage } from "../errors.js";
import { SourceControl } from "../git/source-control.js";
import { Logger } from "../util/logger.js";
import { slugifyRepoPath } from "./slug.js";

export interface SubmoduleRewrite {
  destinationGitUrl: string;
  org: string;
}

export interface LargeObjectMigrationOptions {
  thresholdBytes: number;
  /** Human-readable threshold for log lines, e.g. "100MB". */
  thresholdLabel: string;
  /** Rewrite absolute `.gitmodules` URLs to the destination organization. */
  submodules?: SubmoduleRewrite;
}

export interface LargeObjectMigrationResult {
  rewritten: boolean;
  submodulesRewritten: boolean;
  warnings: string[];
}

/**
 * True as soon as one reachable blob is at least `thresholdBytes`. Reads the
 * object stream once and stops at the first hit.
 */
export async function hasLargeObjects(
  git: SourceControl,
  repoDir: string,
  thresholdBytes: number
): Promise<boolean> {
  for await (const object of git.enumerateObjects(repoDir)) {
    if (object.type === "blob" && object.size >= thresholdBytes) {
      return true;
    }
  }
  return false;
}

/** Points every absolute submodule URL at `<destination>/<org>/<slug>.git`. */
export function rewriteSubmoduleUrls(content: string, target: SubmoduleRewrite): string {
  const base = target.destinationGitUrl.replace(/\/+$/, "");

  return content.replace(
    /^([ \t]*url[ \t]*=[ \t]*)(\S+)[ \t]*$/gm,
    (line: string, prefix: string, url: string) => {
      let path: string | null = null;
      const scpLike = /^[\w.-]+@[\w.-]+:(?!\/\/)(.+)$/.exec(url);
      if (scpLike) {
        path = scpLike[1];
      } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
        path = new URL(url).pathname;
      }
      if (path === null) return line; // relative URL, resolved against the superproject

      const repoPath = path.replace(/^\/+/, "").replace(/\/+$/, "").replace(/\.git$/, "");
      return `${prefix}${base}/${target.org}/${slugifyRepoPath(repoPath)}.git`;
    }
  );
}

async function rewriteSubmodules(
  git: SourceControl,
  workDir: string,
  target: SubmoduleRewrite,
  logger: Logger
): Promise<boolean> {
  const gitmodules = join(workDir, ".gitmodules");
  if (!existsSync(gitmodules)) return false;

  logger.info(`Rewriting submodule URLs to GitHub org '${target.org}'...`);
  const original = await readFile(gitmodules, "utf-8");
  const rewritten = rewriteSubmoduleUrls(original, target);
  if (rewritten === original) {
    logger.info("Submodule URLs already point at the destination");
    return false;
  }

  await writeFile(gitmodules, rewritten);
  return await git.commitFile(
    workDir,
    ".gitmodules",
    `Rewrite submodule URLs to ${target.org} (automated)`
  );
}

/**
 * Rewrites history of the working copy so blobs at or above the threshold
 * live in Git LFS, then uploads them to the working copy's origin.
 */
export async function migrateLargeObjects(
  git: SourceControl,
  workDir: string,
  options: LargeObjectMigrationOptions,
  logger: Logger
): Promise<LargeObjectMigrationResult> {
  const result: LargeObjectMigrationResult = {
    rewritten: false,
    submodulesRewritten: false,
    warnings: [],
  };

  if (!(await hasLargeObjects(git, workDir, options.thresholdBytes))) {
    logger.info(`No blobs >= ${options.thresholdLabel} found; skipping LFS migration.`);
    return result;
  }

  logger.info(`LFS migrate (>= ${options.thresholdLabel}) on all refs...`);
  await git.rewriteLargeObjects(workDir, options.thresholdBytes);
  result.rewritten = true;

  if (options.submodules) {
    try {
      result.submodulesRewritten = await rewriteSubmodules(
        git,
        workDir,
        options.submodules,
        logger
      );
    } catch (error) {
      const warning = `Submodule URL rewrite failed, commit skipped: ${errorMessage(error)}`;
      logger.warn(warning);
      result.warnings.push(warning);
    }
  }

  try {
    await git.pushLargeObjects(workDir, "origin");
  } catch (error) {
    const warning = `LFS push to origin failed after migration. Some large files may not have been uploaded: ${errorMessage(error)}`;
    logger.warn(warning);
    result.warnings.push(warning);
  }

  return result;
}
