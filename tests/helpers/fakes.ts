import { mkdir } from "fs/promises";
import { CreateRepoParams, DestinationClient, GitHubRepo } from "../../src/api/github-client.js";
import { GitLabProject } from "../../src/api/gitlab-client.js";
import {
  GitObjectInfo,
  LargeObjectPushOptions,
  RefMap,
  SourceControl,
} from "../../src/git/source-control.js";
import { Logger } from "../../src/util/logger.js";

export interface FakeRepo {
  refs: RefMap;
  objects: GitObjectInfo[];
  /** Ids of the large objects held by the LFS store of this repository. */
  lfs: Set<string>;
}

export function fakeRepo(
  refs: Record<string, string>,
  objects: GitObjectInfo[] = [],
  lfs: string[] = []
): FakeRepo {
  return { refs: new Map(Object.entries(refs)), objects, lfs: new Set(lfs) };
}

function copyRepo(repo: FakeRepo): FakeRepo {
  return { refs: new Map(repo.refs), objects: [...repo.objects], lfs: new Set(repo.lfs) };
}

/**
 * In-memory git: repositories are keyed by URL or directory. Clones create
 * the directory on disk so existence checks behave.
 */
export class FakeSourceControl implements SourceControl {
  readonly repos = new Map<string, FakeRepo>();
  readonly origins = new Map<string, string>();
  readonly calls: string[] = [];
  readonly commits: Array<{ workDir: string; file: string; message: string }> = [];
  enumerated = 0;

  count(prefix: string): number {
    return this.calls.filter((call) => call.startsWith(prefix)).length;
  }

  private get(location: string): FakeRepo {
    const repo = this.repos.get(location);
    if (!repo) throw new Error(`repository not found: ${location}`);
    return repo;
  }

  private resolve(dir: string, remote: string): string {
    return remote === "origin" ? (this.origins.get(dir) ?? remote) : remote;
  }

  async mirrorClone(url: string, mirrorDir: string): Promise<void> {
    this.calls.push(`clone-mirror ${url}`);
    const source = this.get(url);
    await mkdir(mirrorDir, { recursive: true });
    this.repos.set(mirrorDir, { ...copyRepo(source), lfs: new Set() });
    this.origins.set(mirrorDir, url);
  }

  async updateMirror(mirrorDir: string, url: string): Promise<void> {
    this.calls.push(`fetch ${mirrorDir}`);
    const source = this.get(url);
    const mirror = this.get(mirrorDir);
    mirror.refs = new Map(source.refs);
    mirror.objects = [...source.objects];
    this.origins.set(mirrorDir, url);
  }

  async cloneWorkingCopy(mirrorDir: string, workDir: string): Promise<void> {
    this.calls.push(`clone-work ${workDir}`);
    await mkdir(workDir, { recursive: true });
    this.repos.set(workDir, { ...copyRepo(this.get(mirrorDir)), lfs: new Set() });
    this.origins.set(workDir, mirrorDir);
  }

  async pushMirror(dir: string, remote: string): Promise<void> {
    this.calls.push(`push-mirror ${remote}`);
    const source = this.get(dir);
    const target = this.repos.get(remote) ?? fakeRepo({});
    target.refs = new Map(source.refs);
    target.objects = [...source.objects];
    this.repos.set(remote, target);
  }

  async listRefs(dir: string): Promise<RefMap> {
    return new Map(this.get(dir).refs);
  }

  async listRemoteRefs(remote: string): Promise<RefMap> {
    return new Map(this.repos.get(remote)?.refs ?? []);
  }

  async *enumerateObjects(dir: string): AsyncGenerator<GitObjectInfo> {
    for (const object of this.get(dir).objects) {
      this.enumerated++;
      yield object;
    }
  }

  /** Suffixes every ref with `-lfs` and moves large blobs to the LFS store. */
  async rewriteLargeObjects(workDir: string, thresholdBytes: number): Promise<void> {
    this.calls.push(`rewrite ${workDir}`);
    const repo = this.get(workDir);
    for (const [ref, id] of repo.refs) {
      repo.refs.set(ref, `${id}-lfs`);
    }
    repo.objects = repo.objects.map((object) => {
      if (object.type !== "blob" || object.size < thresholdBytes) return object;
      repo.lfs.add(object.id);
      return { id: `${object.id}-pointer`, type: "blob", size: 132 };
    });
  }

  async commitFile(workDir: string, file: string, message: string): Promise<boolean> {
    this.commits.push({ workDir, file, message });
    return true;
  }

  async pushLargeObjects(
    dir: string,
    remote: string,
    options: LargeObjectPushOptions = {}
  ): Promise<string[]> {
    const location = this.resolve(dir, remote);
    this.calls.push(`${options.dryRun ? "lfs-dry-run" : "lfs-push"} ${location}`);
    const source = this.get(dir);
    const target = this.repos.get(location) ?? fakeRepo({});
    this.repos.set(location, target);

    const pending = [...source.lfs].filter((id) => !target.lfs.has(id));
    if (!options.dryRun) {
      for (const id of pending) target.lfs.add(id);
    }
    return pending;
  }
}

export class FakeDestination implements DestinationClient {
  readonly org = "acme";
  readonly repos = new Map<string, { description: string; defaultBranch: string | null }>();
  readonly created: string[] = [];

  private toRepo(name: string, defaultBranch: string | null): GitHubRepo {
    return {
      name,
      fullName: `${this.org}/${name}`,
      cloneUrl: this.gitUrl(name),
      isPrivate: true,
      defaultBranch: defaultBranch ?? "main",
    };
  }

  async getRepo(repoName: string): Promise<GitHubRepo | null> {
    const repo = this.repos.get(repoName);
    return repo ? this.toRepo(repoName, repo.defaultBranch) : null;
  }

  async ensureRepo(params: CreateRepoParams, logger?: Logger): Promise<GitHubRepo> {
    const existing = this.repos.get(params.name);
    if (existing) return this.toRepo(params.name, existing.defaultBranch);

    logger?.info(`Creating GitHub repo: ${this.org}/${params.name}`);
    this.repos.set(params.name, { description: params.description, defaultBranch: null });
    this.created.push(params.name);
    return this.toRepo(params.name, null);
  }

  async setDefaultBranch(repoName: string, branch: string): Promise<void> {
    const repo = this.repos.get(repoName);
    if (!repo) throw new Error(`Not Found: ${repoName}`);
    repo.defaultBranch = branch;
  }

  gitUrl(repoName: string): string {
    return `https://github.test/${this.org}/${repoName}.git`;
  }
}

export function gitlabProject(id: number, path: string): GitLabProject {
  const name = path.split("/").pop() ?? path;
  return {
    id,
    name,
    path: name,
    path_with_namespace: path,
    http_url_to_repo: `https://gitlab.test/${path}.git`,
    ssh_url_to_repo: `git@gitlab.test:${path}.git`,
    description: `${name} repository`,
    default_branch: "main",
    archived: false,
  };
}

export function jsonResponse(body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json", ...headers },
  });
}
