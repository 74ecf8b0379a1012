import { GitLabClient, projectPathFromUrl, RepositoryDescriptor } from "../api/gitlab-client.js";
import { assertUniqueSlugs } from "../migration/slug.js";
import { Logger } from "../util/logger.js";

export interface DiscoveryOptions {
  groupId: string;
  includeArchived: boolean;
  /** Migrate only the repository at this URL. */
  singleRepoUrl?: string;
  includeRepos: string[];
  excludeRepos: string[];
}

export function filterRepos(
  repos: RepositoryDescriptor[],
  includeRepos: string[],
  excludeRepos: string[],
  logger?: Logger
): RepositoryDescriptor[] {
  let filtered = repos;

  if (includeRepos.length > 0) {
    const include = new Set(includeRepos);
    filtered = filtered.filter((repo) => include.has(repo.path));
    logger?.info(`Filtered to ${filtered.length} repos (include list)`);
  }

  if (excludeRepos.length > 0) {
    const exclude = new Set(excludeRepos);
    filtered = filtered.filter((repo) => !exclude.has(repo.path));
    logger?.info(`Filtered to ${filtered.length} repos (exclude list)`);
  }

  return filtered;
}

/**
 * Repositories to migrate this run. Listing or lookup failures propagate as
 * fatal errors, as do slug collisions.
 */
export async function discoverRepos(
  gitlab: GitLabClient,
  options: DiscoveryOptions,
  logger: Logger
): Promise<RepositoryDescriptor[]> {
  if (options.singleRepoUrl) {
    logger.info(`Targeting single repo: ${options.singleRepoUrl}`);
    const repo = await gitlab.getProject(projectPathFromUrl(options.singleRepoUrl));
    return [repo];
  }

  const listed = await gitlab.listGroupProjects(options.groupId, {
    includeArchived: options.includeArchived,
  });
  const repos = filterRepos(listed, options.includeRepos, options.excludeRepos, logger);
  assertUniqueSlugs(repos.map((repo) => repo.path));
  return repos;
}
