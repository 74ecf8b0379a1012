import { existsSync } from "fs";
import { rm } from "fs/promises";
import { join } from "path";
import { RepositoryDescriptor } from "../api/gitlab-client.js";
import { DestinationClient } from "../api/github-client.js";
import { classifyError, errorMessage, ErrorType } from "../errors.js";
import { refMapsEqual, SourceControl } from "../git/source-control.js";
import { ProgressStore } from "../state/progress-store.js";
import { Logger } from "../util/logger.js";
import { RetryOptions, RetryPolicy, withRetry } from "../util/retry.js";
import { migrateLargeObjects } from "./large-objects.js";
import { slugifyRepoPath } from "./slug.js";
import { describeMismatch, verifyPush } from "./verifier.js";

export interface PipelineOptions {
  sourceDir: string;
  logsDir: string;
  lfsThreshold: { label: string; bytes: number };
  skipExistingNonEmpty: boolean;
  rewriteSubmodules: boolean;
  dryRun: boolean;
  /** Git base of the destination, used for rewritten submodule URLs. */
  destinationGitUrl: string;
  retry?: Partial<RetryPolicy>;
}

export interface MigrationContext {
  options: PipelineOptions;
  git: SourceControl;
  destination: DestinationClient;
  progress: ProgressStore;
  logger: Logger;
}

export type MigrationOutcome = "migrated" | "skipped" | "dry-run" | "failed";

export interface MigrationResult {
  slug: string;
  path: string;
  outcome: MigrationOutcome;
  warnings: string[];
  error?: string;
  errorType?: ErrorType;
}

/**
 * One repository, start to finish: destination pre-check, mirror sync,
 * large-object rewrite, destination provisioning, push and verification.
 * Stages already recorded in the progress store are resumed, not redone.
 */
export async function migrateRepo(
  repo: RepositoryDescriptor,
  context: MigrationContext
): Promise<MigrationResult> {
  const { options, git, destination, progress } = context;
  const slug = slugifyRepoPath(repo.path);
  const logger = context.logger.child(slug, join(options.logsDir, `${slug}.log`));

  const mirrorDir = join(options.sourceDir, `${slug}.git`);
  const workDir = join(options.sourceDir, `${slug}-work`);
  const destinationUrl = destination.gitUrl(slug);
  const target = `${destination.org}/${slug}`;

  const result: MigrationResult = {
    slug,
    path: repo.path,
    outcome: "failed",
    warnings: [],
  };

  const warn = (message: string): void => {
    logger.warn(message);
    result.warnings.push(message);
  };

  const retryOptions = (label: string): RetryOptions => ({
    ...options.retry,
    label,
    logger,
  });

  async function destinationHasRefs(): Promise<boolean> {
    const existing = await destination.getRepo(slug, logger);
    if (!existing) return false;

    try {
      const refs = await withRetry(
        () => git.listRemoteRefs(destinationUrl),
        retryOptions("ls-remote destination")
      );
      // An auto-initialized repository counts as non-empty too
      return refs.size > 0;
    } catch (error) {
      warn(`Could not list refs of ${target}, treating it as empty: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Resolves true when the mirror's refs changed (or the mirror is new). */
  async function syncMirror(): Promise<boolean> {
    if ((await progress.has(slug, "mirror-cloned")) && existsSync(mirrorDir)) {
      logger.info("Mirror exists; fetching updates...");
      const before = await git.listRefs(mirrorDir);
      await withRetry(
        () => git.updateMirror(mirrorDir, repo.cloneUrl),
        retryOptions("git fetch")
      );
      const after = await git.listRefs(mirrorDir);
      return !refMapsEqual(before, after);
    }

    logger.info(`Cloning mirror: ${repo.cloneUrl} -> ${mirrorDir}`);
    await withRetry(async () => {
      await rm(mirrorDir, { recursive: true, force: true });
      await git.mirrorClone(repo.cloneUrl, mirrorDir);
    }, retryOptions("git clone --mirror"));
    await progress.append(slug, "mirror-cloned");
    return true;
  }

  async function rewriteIntoMirror(): Promise<void> {
    await rm(workDir, { recursive: true, force: true });
    try {
      await git.cloneWorkingCopy(mirrorDir, workDir);

      const lfs = await migrateLargeObjects(
        git,
        workDir,
        {
          thresholdBytes: options.lfsThreshold.bytes,
          thresholdLabel: options.lfsThreshold.label,
          submodules: options.rewriteSubmodules
            ? { destinationGitUrl: options.destinationGitUrl, org: destination.org }
            : undefined,
        },
        logger
      );
      result.warnings.push(...lfs.warnings);

      logger.info("Syncing rewritten refs back to mirror...");
      await git.pushMirror(workDir, mirrorDir);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  async function applyDefaultBranch(afterPush: boolean): Promise<void> {
    if (!repo.defaultBranch) return;
    try {
      await destination.setDefaultBranch(slug, repo.defaultBranch, logger);
    } catch (error) {
      const message = `Could not set default branch '${repo.defaultBranch}' on ${target}: ${errorMessage(error)}`;
      if (afterPush) {
        warn(message);
      } else {
        // Refs do not exist yet on a fresh repository; applied again after the push
        logger.info(message);
      }
    }
  }

  try {
    await progress.recordAttempt(slug, repo.path);
    logger.info(`=== [${repo.path}] (${repo.name}) ===`);

    if (options.skipExistingNonEmpty && (await destinationHasRefs())) {
      logger.info(`GitHub repo non-empty; skipping migration. (${target})`);
      await progress.append(slug, "skipped-existing");
      result.outcome = "skipped";
      return result;
    }

    const refsChanged = await syncMirror();

    if (!refsChanged && (await progress.has(slug, "lfs-migrated"))) {
      logger.info("Mirror unchanged since the last LFS pass; keeping its refs.");
    } else {
      await rewriteIntoMirror();
      await progress.append(slug, "lfs-migrated");
    }

    if (options.dryRun) {
      logger.info(`DRY_RUN: would create/update GitHub repo ${target}`);
      logger.info(`DRY_RUN: would push --mirror and LFS to ${destinationUrl}`);
      logger.info("DRY_RUN: would verify the push and enforce the default branch");
      result.outcome = "dry-run";
      return result;
    }

    await destination.ensureRepo({ name: slug, description: repo.description }, logger);
    await applyDefaultBranch(false);

    logger.info(`Pushing mirror to ${destinationUrl}...`);
    await withRetry(
      () => git.pushMirror(mirrorDir, destinationUrl),
      retryOptions("git push --mirror")
    );
    await progress.append(slug, "pushed");

    try {
      await withRetry(
        () => git.pushLargeObjects(mirrorDir, destinationUrl),
        retryOptions("git lfs push")
      );
    } catch (error) {
      warn(
        `LFS push failed for ${destinationUrl}. Some large files may not have been uploaded: ${errorMessage(error)}`
      );
    }

    try {
      const report = await verifyPush(git, mirrorDir, destinationUrl, logger, options.retry);
      if (report.consistent) {
        logger.info("✅ Verified: refs and LFS present on GitHub.");
      } else {
        result.warnings.push(...report.mismatches.map(describeMismatch));
        if (report.pendingLargeObjects.length > 0) {
          result.warnings.push(
            `${report.pendingLargeObjects.length} LFS object(s) were pending on ${target}`
          );
        }
        warn("Verification found differences. Attempting final LFS push...");
        try {
          await git.pushLargeObjects(mirrorDir, destinationUrl);
        } catch (error) {
          warn(`Final LFS push failed: ${errorMessage(error)}`);
        }
      }
    } catch (error) {
      warn(`Verification could not run: ${errorMessage(error)}`);
    }

    await applyDefaultBranch(true);

    logger.info(`🎯 Migrated: ${repo.path} → ${target}`);
    result.outcome = "migrated";
    return result;
  } catch (error) {
    const message = errorMessage(error);
    result.error = message;
    result.errorType = classifyError(error);
    logger.error(`Migration failed for ${repo.path}: ${message}`);
    await progress.recordFailure(slug, message, result.errorType);
    return result;
  } finally {
    await logger.close();
  }
}
