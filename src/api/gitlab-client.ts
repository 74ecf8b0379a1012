import { z } from "zod";
import { DiscoveryError, errorMessage, SourceApiError } from "../errors.js";
import { Logger } from "../util/logger.js";
import { AbortError, isRetryableStatus, RetryPolicy, withRetry } from "../util/retry.js";

export const GitLabProjectSchema = z.object({
  id: z.number(),
  name: z.string().nullish(),
  path: z.string(),
  path_with_namespace: z.string(),
  http_url_to_repo: z.string(),
  ssh_url_to_repo: z.string().nullish(),
  description: z.string().nullish(),
  default_branch: z.string().nullish(),
  archived: z.boolean().default(false),
});

export type GitLabProject = z.infer<typeof GitLabProjectSchema>;

export interface RepositoryDescriptor {
  id: number;
  /** Full namespaced path, e.g. `group/subgroup/repo`. */
  path: string;
  name: string;
  cloneUrl: string;
  sshUrl?: string;
  description: string;
  /** Null for empty repositories. */
  defaultBranch: string | null;
  archived: boolean;
}

export interface GitLabClientOptions {
  baseUrl: string;
  token: string;
  pageSize?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
}

export interface ListProjectsOptions {
  includeArchived: boolean;
}

interface Page {
  body: unknown;
  headers: Headers;
}

export function toDescriptor(project: GitLabProject): RepositoryDescriptor {
  return {
    id: project.id,
    path: project.path_with_namespace,
    name: project.name || project.path,
    cloneUrl: project.http_url_to_repo,
    sshUrl: project.ssh_url_to_repo ?? undefined,
    description: project.description ?? "",
    defaultBranch: project.default_branch || null,
    archived: project.archived,
  };
}

/** Extracts the `rel="next"` target of an RFC 8288 Link header. */
export function parseNextLink(linkHeader: string | null): string | null {
  if (!linkHeader) return null;
  for (const part of linkHeader.split(",")) {
    const match = /<([^>]+)>\s*;(.*)$/.exec(part.trim());
    if (match && /\brel="?next"?/.test(match[2])) {
      return match[1];
    }
  }
  return null;
}

/**
 * Namespaced project path from a clone or web URL:
 * `https://gitlab.example.com/group/repo.git` and
 * `git@gitlab.example.com:group/repo.git` both give `group/repo`.
 */
export function projectPathFromUrl(repoUrl: string): string {
  const trimmed = repoUrl.trim();
  let path: string;

  const scpLike = /^[\w.-]+@[\w.-]+:(?!\/\/)(.+)$/.exec(trimmed);
  if (scpLike) {
    path = scpLike[1];
  } else {
    try {
      path = new URL(trimmed).pathname;
    } catch {
      throw new DiscoveryError(`Not a repository URL: ${repoUrl}`);
    }
  }

  path = path.replace(/^\/+/, "").replace(/\/+$/, "").replace(/\.git$/, "");
  // Web URLs of a sub-page, e.g. group/repo/-/tree/main
  path = path.split("/-/")[0];

  if (!path.includes("/")) {
    throw new DiscoveryError(`Not a namespaced repository URL: ${repoUrl}`);
  }
  return path;
}

export class GitLabClient {
  private baseUrl: string;
  private token: string;
  private pageSize: number;
  private retry: Partial<RetryPolicy>;
  private logger?: Logger;

  constructor(options: GitLabClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "").replace(/\/api\/v4$/, "");
    this.token = options.token;
    this.pageSize = options.pageSize ?? 100;
    this.retry = options.retry ?? {};
    this.logger = options.logger;
  }

  private async request(url: string): Promise<Page> {
    const response = await fetch(url, {
      method: "GET",
      headers: {
        "PRIVATE-TOKEN": this.token,
        Accept: "application/json",
      },
    });

    if (!response.ok) {
      const errorText = await response.text();
      const error = new SourceApiError(response.status, response.statusText, errorText);
      throw isRetryableStatus(response.status) ? error : new AbortError(error);
    }

    const text = await response.text();
    return { body: text ? JSON.parse(text) : null, headers: response.headers };
  }

  private async requestWithRetry(url: string, label: string): Promise<Page> {
    return await withRetry(() => this.request(url), {
      ...this.retry,
      label,
      logger: this.logger,
    });
  }

  private projectsUrl(groupId: string, options: ListProjectsOptions, page?: string): string {
    const params = new URLSearchParams({
      include_subgroups: "true",
      per_page: String(this.pageSize),
      order_by: "id",
      sort: "asc",
    });
    if (page === undefined) {
      params.set("pagination", "keyset");
    } else {
      params.set("page", page);
    }
    // archived=true would return only archived projects
    if (!options.includeArchived) {
      params.set("archived", "false");
    }
    return `${this.baseUrl}/api/v4/groups/${encodeURIComponent(groupId)}/projects?${params}`;
  }

  /**
   * Every project under the group and its sub-groups, ascending by id.
   * Follows keyset `Link` headers and falls back to `X-Next-Page`.
   */
  async listGroupProjects(
    groupId: string,
    options: ListProjectsOptions
  ): Promise<RepositoryDescriptor[]> {
    const projects: RepositoryDescriptor[] = [];
    const seen = new Set<number>();
    let url: string | null = this.projectsUrl(groupId, options);
    let pageCount = 0;

    this.logger?.info(
      `Discovering projects under GitLab group ${groupId} (include_archived=${options.includeArchived})`
    );

    while (url) {
      pageCount++;
      let page: Page;
      try {
        page = await this.requestWithRetry(url, `GitLab projects page ${pageCount}`);
      } catch (error) {
        throw new DiscoveryError(
          `Failed to list projects of group ${groupId} (page ${pageCount}): ${errorMessage(error)}`,
          { cause: error }
        );
      }

      const parsed = z.array(GitLabProjectSchema).safeParse(page.body);
      if (!parsed.success) {
        throw new DiscoveryError(
          `Unexpected projects payload on page ${pageCount}: ${parsed.error.message}`
        );
      }

      for (const project of parsed.data) {
        if (seen.has(project.id)) continue;
        seen.add(project.id);
        projects.push(toDescriptor(project));
      }

      const next = parseNextLink(page.headers.get("link"));
      if (next) {
        url = next;
      } else {
        const nextPage = page.headers.get("x-next-page")?.trim();
        url = nextPage ? this.projectsUrl(groupId, options, nextPage) : null;
      }
    }

    this.logger?.info(`Fetched ${projects.length} projects over ${pageCount} page(s)`);
    return projects;
  }

  /** Looks a project up by numeric id or namespaced path. */
  async getProject(idOrPath: string | number): Promise<RepositoryDescriptor> {
    const url = `${this.baseUrl}/api/v4/projects/${encodeURIComponent(String(idOrPath))}`;
    let page: Page;
    try {
      page = await this.requestWithRetry(url, `GitLab project ${idOrPath}`);
    } catch (error) {
      throw new DiscoveryError(
        `Failed to look up project ${idOrPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const parsed = GitLabProjectSchema.safeParse(page.body);
    if (!parsed.success) {
      throw new DiscoveryError(`Unexpected project payload for ${idOrPath}: ${parsed.error.message}`);
    }
    return toDescriptor(parsed.data);
  }
}
