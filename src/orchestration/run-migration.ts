import { mkdir } from "fs/promises";
import { GitLabClient } from "../api/gitlab-client.js";
import { DestinationClient, GitHubClient } from "../api/github-client.js";
import { AppConfig } from "../config.js";
import { errorMessage, classifyError } from "../errors.js";
import { applyGitEnvironment, GitCli } from "../git/git-cli.js";
import { SourceControl } from "../git/source-control.js";
import { migrateRepo, MigrationContext, MigrationResult } from "../migration/repo-migrator.js";
import { slugifyRepoPath } from "../migration/slug.js";
import { ProgressStore } from "../state/progress-store.js";
import { Logger } from "../util/logger.js";
import { discoverRepos } from "./discover.js";
import { runWithConcurrency } from "./scheduler.js";

export interface RunOptions {
  groupId: string;
  singleRepoUrl?: string;
}

export interface RunDependencies {
  gitlab: GitLabClient;
  destination: DestinationClient;
  git: SourceControl;
  progress: ProgressStore;
  logger: Logger;
}

export interface RunSummary {
  results: MigrationResult[];
  migrated: number;
  skipped: number;
  dryRun: number;
  failed: number;
}

export function createDependencies(config: AppConfig, logger: Logger): RunDependencies {
  applyGitEnvironment();
  const retry = { attempts: config.retryAttempts };
  return {
    gitlab: new GitLabClient({
      baseUrl: config.gitlab.baseUrl,
      token: config.gitlab.token,
      pageSize: config.gitlab.pageSize,
      retry,
      logger,
    }),
    destination: new GitHubClient({
      token: config.github.token,
      org: config.github.org,
      apiUrl: config.github.apiUrl,
      gitUrl: config.github.gitUrl,
      retry,
      logger,
    }),
    git: new GitCli({
      credentials: [
        { url: config.gitlab.baseUrl, token: config.gitlab.token },
        { url: config.github.gitUrl, token: config.github.token },
      ],
      lfsConcurrency: config.lfsConcurrency,
    }),
    progress: new ProgressStore(config.paths.stateDir, { logger }),
    logger,
  };
}

export function summarize(results: MigrationResult[]): RunSummary {
  return {
    results,
    migrated: results.filter((r) => r.outcome === "migrated").length,
    skipped: results.filter((r) => r.outcome === "skipped").length,
    dryRun: results.filter((r) => r.outcome === "dry-run").length,
    failed: results.filter((r) => r.outcome === "failed").length,
  };
}

export function logSummary(summary: RunSummary, logger: Logger): void {
  logger.info("=".repeat(60));
  logger.info("Migration Summary");
  logger.info("=".repeat(60));
  logger.info(`Total processed: ${summary.results.length}`);
  logger.info(`Migrated: ${summary.migrated}`);
  logger.info(`Skipped (destination non-empty): ${summary.skipped}`);
  if (summary.dryRun > 0) {
    logger.info(`Dry run: ${summary.dryRun}`);
  }
  logger.info(`Failed: ${summary.failed}`);

  const withWarnings = summary.results.filter(
    (r) => r.outcome !== "failed" && r.warnings.length > 0
  );
  if (withWarnings.length > 0) {
    logger.warn(`${withWarnings.length} repo(s) completed with warnings:`);
    for (const result of withWarnings) {
      logger.warn(`  - ${result.path}: ${result.warnings.length} warning(s)`);
    }
  }

  if (summary.failed > 0) {
    logger.warn("Failed repos:");
    for (const result of summary.results.filter((r) => r.outcome === "failed")) {
      logger.warn(`  - ${result.path} [${result.errorType}]: ${result.error}`);
    }
  }
}

/**
 * Discovers the repositories and migrates them with bounded concurrency.
 * Per-repository failures end up in the summary; discovery failures throw.
 */
export async function runMigration(
  config: AppConfig,
  run: RunOptions,
  deps: RunDependencies
): Promise<RunSummary> {
  const { logger } = deps;

  await mkdir(config.paths.sourceDir, { recursive: true });
  await mkdir(config.paths.stateDir, { recursive: true });
  await mkdir(config.paths.logsDir, { recursive: true });

  const repos = await discoverRepos(
    deps.gitlab,
    {
      groupId: run.groupId,
      includeArchived: config.includeArchived,
      singleRepoUrl: run.singleRepoUrl,
      includeRepos: config.includeRepos,
      excludeRepos: config.excludeRepos,
    },
    logger
  );

  if (repos.length === 0) {
    logger.info("No projects found. Exiting.");
    return summarize([]);
  }
  logger.info(`Found ${repos.length} project(s).`);

  const context: MigrationContext = {
    options: {
      sourceDir: config.paths.sourceDir,
      logsDir: config.paths.logsDir,
      lfsThreshold: config.lfsThreshold,
      skipExistingNonEmpty: config.skipExistingNonEmpty,
      rewriteSubmodules: config.rewriteSubmodules,
      dryRun: config.dryRun,
      destinationGitUrl: config.github.gitUrl,
      retry: { attempts: config.retryAttempts },
    },
    git: deps.git,
    destination: deps.destination,
    progress: deps.progress,
    logger,
  };

  const results = await runWithConcurrency(
    repos,
    config.migrateConcurrency,
    (repo) => migrateRepo(repo, context),
    (repo, error): MigrationResult => {
      logger.error(`Unexpected failure migrating ${repo.path}: ${errorMessage(error)}`);
      return {
        slug: slugifyRepoPath(repo.path),
        path: repo.path,
        outcome: "failed",
        warnings: [],
        error: errorMessage(error),
        errorType: classifyError(error),
      };
    }
  );

  return summarize(results);
}
