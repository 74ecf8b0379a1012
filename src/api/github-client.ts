import { Octokit } from "@octokit/rest";
import { throttling } from "@octokit/plugin-throttling";
import { Logger } from "../util/logger.js";
import { AbortError, isRetryableStatus, RetryPolicy, withRetry } from "../util/retry.js";

const ThrottledOctokit = Octokit.plugin(throttling);

export interface GitHubRepo {
  name: string;
  fullName: string;
  cloneUrl: string;
  isPrivate: boolean;
  defaultBranch: string;
}

export interface CreateRepoParams {
  name: string;
  description: string;
}

/**
 * What the pipeline needs from the destination platform. A `logger` passed
 * to a call receives that call's retry warnings instead of the client's.
 */
export interface DestinationClient {
  readonly org: string;
  getRepo(repoName: string, logger?: Logger): Promise<GitHubRepo | null>;
  ensureRepo(params: CreateRepoParams, logger?: Logger): Promise<GitHubRepo>;
  setDefaultBranch(repoName: string, branch: string, logger?: Logger): Promise<void>;
  /** HTTPS git URL of a repository, without credentials. */
  gitUrl(repoName: string): string;
}

export interface GitHubClientOptions {
  token: string;
  org: string;
  /** REST base, e.g. `https://github.example.com/api/v3` for GitHub Enterprise. */
  apiUrl?: string;
  /** Git base, e.g. `https://github.example.com`. */
  gitUrl?: string;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
}

function httpStatus(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export class GitHubClient implements DestinationClient {
  readonly org: string;
  private octokit: InstanceType<typeof ThrottledOctokit>;
  private gitBaseUrl: string;
  private retry: Partial<RetryPolicy>;
  private logger?: Logger;

  constructor(options: GitHubClientOptions) {
    this.logger = options.logger;
    this.octokit = new ThrottledOctokit({
      auth: options.token,
      baseUrl: options.apiUrl ?? "https://api.github.com",
      throttle: {
        onRateLimit: (
          retryAfter: number,
          requestOptions: { method: string; url: string },
          _octokit: unknown,
          retryCount: number
        ) => {
          this.logger?.warn(`Rate limit hit for ${requestOptions.method} ${requestOptions.url}`);
          if (retryCount < 3) {
            this.logger?.info(`Retrying after ${retryAfter} seconds`);
            return true;
          }
          return false;
        },
        onSecondaryRateLimit: (
          retryAfter: number,
          requestOptions: { method: string; url: string }
        ) => {
          this.logger?.warn(
            `Secondary rate limit hit for ${requestOptions.method} ${requestOptions.url}, retrying after ${retryAfter} seconds`
          );
          return true;
        },
      },
    });
    this.org = options.org;
    this.gitBaseUrl = (options.gitUrl ?? "https://github.com").replace(/\/+$/, "");
    this.retry = options.retry ?? {};
  }

  private async call<T>(
    label: string,
    operation: () => Promise<T>,
    logger: Logger | undefined = this.logger
  ): Promise<T> {
    return await withRetry(
      async () => {
        try {
          return await operation();
        } catch (error) {
          const status = httpStatus(error);
          if (status !== undefined && !isRetryableStatus(status) && error instanceof Error) {
            throw new AbortError(error);
          }
          throw error;
        }
      },
      { ...this.retry, label, logger }
    );
  }

  async getRepo(repoName: string, logger?: Logger): Promise<GitHubRepo | null> {
    return await this.call(
      `GitHub get ${this.org}/${repoName}`,
      async () => {
        try {
          const { data: repo } = await this.octokit.repos.get({
            owner: this.org,
            repo: repoName,
          });

          return {
            name: repo.name,
            fullName: repo.full_name,
            cloneUrl: repo.clone_url,
            isPrivate: repo.private,
            defaultBranch: repo.default_branch,
          };
        } catch (error) {
          if (httpStatus(error) === 404) {
            return null;
          }
          throw error;
        }
      },
      logger
    );
  }

  /** Creates the repository unless it already exists. */
  async ensureRepo(params: CreateRepoParams, logger = this.logger): Promise<GitHubRepo> {
    const existing = await this.getRepo(params.name, logger);
    if (existing) {
      logger?.info(`GitHub repo exists: ${existing.fullName}`);
      return existing;
    }

    logger?.info(`Creating GitHub repo: ${this.org}/${params.name}`);
    return await this.call(
      `GitHub create ${this.org}/${params.name}`,
      async () => {
        const { data: repo } = await this.octokit.repos.createInOrg({
          org: this.org,
          name: params.name,
          private: true,
          has_issues: true,
          has_projects: false,
          has_wiki: false,
          description: params.description,
        });

        return {
          name: repo.name,
          fullName: repo.full_name,
          cloneUrl: repo.clone_url,
          isPrivate: repo.private,
          defaultBranch: repo.default_branch,
        };
      },
      logger
    );
  }

  async setDefaultBranch(repoName: string, branch: string, logger?: Logger): Promise<void> {
    await this.call(
      `GitHub default branch ${this.org}/${repoName}`,
      async () => {
        await this.octokit.repos.update({
          owner: this.org,
          repo: repoName,
          default_branch: branch,
        });
      },
      logger
    );
  }

  gitUrl(repoName: string): string {
    return `${this.gitBaseUrl}/${this.org}/${repoName}.git`;
  }
}
