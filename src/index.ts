#!/usr/bin/env node
// GitLab to GitHub Migration Tool
// Main entry point

export { GitLabClient, projectPathFromUrl } from "./api/gitlab-client.js";
export type { RepositoryDescriptor } from "./api/gitlab-client.js";
export { GitHubClient } from "./api/github-client.js";
export type { DestinationClient } from "./api/github-client.js";
export { GitCli } from "./git/git-cli.js";
export type { SourceControl } from "./git/source-control.js";
export { ProgressStore } from "./state/progress-store.js";
export { migrateRepo } from "./migration/repo-migrator.js";
export type { MigrationResult } from "./migration/repo-migrator.js";
export { hasLargeObjects, migrateLargeObjects } from "./migration/large-objects.js";
export { verifyPush, compareRefs } from "./migration/verifier.js";
export { runMigration } from "./orchestration/run-migration.js";
export { runWithConcurrency, Semaphore } from "./orchestration/scheduler.js";
export { withRetry } from "./util/retry.js";
export { parseByteSize } from "./util/byte-size.js";

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { loadConfigFromEnvironment } from "./config.js";
import { ConfigError, DiscoveryError, errorMessage, SlugCollisionError } from "./errors.js";
import { createDependencies, logSummary, runMigration } from "./orchestration/run-migration.js";
import { Logger } from "./util/logger.js";

const USAGE = "Usage: gitlab-to-github-migrator <GITLAB_GROUP_ID> [GITLAB_REPO_URL]";

async function main(argv: string[]): Promise<number> {
  const logger = new Logger();
  const [groupId, singleRepoUrl] = argv;

  if (!groupId) {
    logger.error(USAGE);
    return 1;
  }

  try {
    const config = loadConfigFromEnvironment();
    const deps = createDependencies(config, logger);

    const summary = await runMigration(config, { groupId, singleRepoUrl }, deps);
    logSummary(summary, logger);

    const threshold = config.lfsThreshold.label;
    logger.info(
      singleRepoUrl
        ? `🎉 Done. Mirrored single repo to GitHub org '${config.github.org}' with ≥${threshold} stored via Git LFS.`
        : `🎉 All done. Mirrored to GitHub org '${config.github.org}' with ≥${threshold} stored via Git LFS.`
    );
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("Missing or invalid environment variables:");
      for (const issue of error.issues) {
        logger.error(`  ${issue}`);
      }
    } else if (error instanceof DiscoveryError || error instanceof SlugCollisionError) {
      logger.error(error.message);
    } else {
      logger.error(`Fatal error: ${errorMessage(error)}`);
    }
    return 1;
  }
}

// Run if called directly
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
if (isMainModule) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("Fatal error:", error);
      process.exitCode = 1;
    }
  );
}
