import { simpleGit, SimpleGit } from "simple-git";
import { spawn, ChildProcess } from "child_process";
import { createInterface } from "readline";
import {
  GitObjectInfo,
  LargeObjectPushOptions,
  RefMap,
  SourceControl,
} from "./source-control.js";

export interface GitCredential {
  /** Any URL on the host the credential applies to. */
  url: string;
  token: string;
  username?: string;
}

export interface GitCliOptions {
  credentials?: GitCredential[];
  /** Parallel large-object uploads and downloads per git-lfs process. */
  lfsConcurrency?: number;
  binary?: string;
}

/** Variables every git process of a run needs: no prompts, no LFS downloads on checkout. */
export const GIT_ENVIRONMENT = {
  GIT_TERMINAL_PROMPT: "0",
  GIT_LFS_SKIP_SMUDGE: "1",
} as const;

/**
 * Exports `GIT_ENVIRONMENT` into `env`. git processes inherit it from there;
 * simple-git refuses an explicit environment holding `EDITOR`, `GIT_ASKPASS`
 * and the like, which terminals and npm commonly set.
 */
export function applyGitEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  Object.assign(env, GIT_ENVIRONMENT);
}

const COMMITTER_CONFIG = [
  "user.name=Repository Migration",
  "user.email=repository-migration@localhost",
];

/**
 * `-c` entry that sends a basic auth header to one host for a single git
 * invocation. Nothing is written to the repository's config or remotes.
 */
export function credentialConfig(credential: GitCredential): string {
  const origin = new URL(credential.url).origin;
  const basic = Buffer.from(`${credential.username ?? "oauth2"}:${credential.token}`).toString(
    "base64"
  );
  return `http.${origin}/.extraheader=AUTHORIZATION: basic ${basic}`;
}

/** Parses `<id> <ref>` lines as printed by ls-remote. Peeled tag entries are dropped. */
export function parseRefLines(output: string): RefMap {
  const refs: RefMap = new Map();
  for (const line of output.split("\n")) {
    const [id, ref] = line.trim().split(/\s+/);
    if (!id || !ref || ref.endsWith("^{}")) continue;
    refs.set(ref, id);
  }
  return refs;
}

export function parseObjectLine(line: string): GitObjectInfo | null {
  const [id, type, size] = line.split(" ");
  if (!id || !type || type === "missing" || size === undefined) return null;
  const bytes = Number(size);
  if (!Number.isFinite(bytes)) return null;
  return { id, type, size: bytes };
}

interface ProcessWatch {
  done: Promise<number | null>;
  stderr: () => string;
}

function watch(child: ChildProcess): ProcessWatch {
  const chunks: string[] = [];
  child.stderr?.setEncoding("utf-8");
  child.stderr?.on("data", (chunk: string) => {
    if (chunks.join("").length < 64 * 1024) chunks.push(chunk);
  });
  const done = new Promise<number | null>((resolve) => {
    child.once("error", (error) => {
      chunks.push(error.message);
      resolve(null);
    });
    child.once("close", (code) => resolve(code));
  });
  return { done, stderr: () => chunks.join("").trim() };
}

export class GitCli implements SourceControl {
  private config: string[];
  private binary: string;

  constructor(options: GitCliOptions = {}) {
    this.binary = options.binary ?? "git";
    this.config = [
      ...(options.credentials ?? []).map(credentialConfig),
      ...(options.lfsConcurrency ? [`lfs.concurrenttransfers=${options.lfsConcurrency}`] : []),
    ];
  }

  private git(baseDir?: string, extraConfig: string[] = []): SimpleGit {
    return simpleGit({
      baseDir,
      binary: this.binary,
      config: [...this.config, ...extraConfig],
    });
  }

  async mirrorClone(url: string, mirrorDir: string): Promise<void> {
    await this.git().clone(url, mirrorDir, ["--mirror"]);
  }

  async updateMirror(mirrorDir: string, url: string): Promise<void> {
    const repo = this.git(mirrorDir);
    await repo.raw(["remote", "set-url", "origin", url]);
    await repo.raw(["fetch", "--prune", "--all", "--tags"]);
  }

  async cloneWorkingCopy(mirrorDir: string, workDir: string): Promise<void> {
    await this.git().clone(mirrorDir, workDir);
    // A plain clone only creates the default branch; take every ref as is
    await this.git(workDir).raw([
      "fetch",
      "--update-head-ok",
      "--prune",
      "origin",
      "+refs/*:refs/*",
    ]);
  }

  async pushMirror(dir: string, remote: string): Promise<void> {
    await this.git(dir).raw(["push", "--prune", "--mirror", remote]);
  }

  async listRefs(dir: string): Promise<RefMap> {
    const output = await this.git(dir).raw(["for-each-ref", "--format=%(objectname) %(refname)"]);
    return parseRefLines(output);
  }

  async listRemoteRefs(remote: string): Promise<RefMap> {
    return parseRefLines(await this.git().raw(["ls-remote", remote]));
  }

  async *enumerateObjects(dir: string): AsyncGenerator<GitObjectInfo> {
    const configArgs = this.config.flatMap((entry) => ["-c", entry]);
    const revList = spawn(this.binary, [...configArgs, "rev-list", "--objects", "--all"], {
      cwd: dir,
      stdio: ["ignore", "pipe", "pipe"],
    });
    const catFile = spawn(
      this.binary,
      [
        ...configArgs,
        "cat-file",
        "--batch-check=%(objectname) %(objecttype) %(objectsize) %(rest)",
        "--buffer",
      ],
      { cwd: dir, stdio: ["pipe", "pipe", "pipe"] }
    );

    const revListWatch = watch(revList);
    const catFileWatch = watch(catFile);
    // cat-file closing early (consumer stopped reading) breaks the pipe
    catFile.stdin?.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code !== "EPIPE") revList.kill();
    });
    if (revList.stdout && catFile.stdin) {
      revList.stdout.pipe(catFile.stdin);
    }

    let finished = false;
    try {
      if (catFile.stdout) {
        const lines = createInterface({ input: catFile.stdout, crlfDelay: Infinity });
        for await (const line of lines) {
          const info = parseObjectLine(line);
          if (info) yield info;
        }
      }
      finished = true;
    } finally {
      if (!finished) {
        revList.kill();
        catFile.kill();
      }
    }

    const [revListCode, catFileCode] = await Promise.all([revListWatch.done, catFileWatch.done]);
    if (revListCode !== 0) {
      throw new Error(`git rev-list failed in ${dir}: ${revListWatch.stderr()}`);
    }
    if (catFileCode !== 0) {
      throw new Error(`git cat-file failed in ${dir}: ${catFileWatch.stderr()}`);
    }
  }

  async rewriteLargeObjects(workDir: string, thresholdBytes: number): Promise<void> {
    const repo = this.git(workDir);
    await repo.raw(["lfs", "install", "--local"]);
    await repo.raw(["lfs", "migrate", "import", "--everything", `--above=${thresholdBytes}b`]);
  }

  async commitFile(workDir: string, file: string, message: string): Promise<boolean> {
    const repo = this.git(workDir, COMMITTER_CONFIG);
    await repo.raw(["add", "--", file]);
    const staged = await repo.raw(["diff", "--cached", "--name-only", "--", file]);
    if (!staged.trim()) return false;
    await repo.raw(["commit", "-m", message]);
    return true;
  }

  async pushLargeObjects(
    dir: string,
    remote: string,
    options: LargeObjectPushOptions = {}
  ): Promise<string[]> {
    const args = ["lfs", "push", "--all", ...(options.dryRun ? ["--dry-run"] : []), remote];
    const output = await this.git(dir).raw(args);
    return output
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }
}
