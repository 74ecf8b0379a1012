/** Ref name to object id, e.g. `refs/heads/main` to a commit id. */
export type RefMap = Map<string, string>;

export interface GitObjectInfo {
  id: string;
  /** `blob`, `tree`, `commit` or `tag`. */
  type: string;
  size: number;
}

export interface LargeObjectPushOptions {
  dryRun?: boolean;
}

/**
 * Git operations used by the transfer pipeline. `remote` arguments accept a
 * URL or a local repository path.
 */
export interface SourceControl {
  mirrorClone(url: string, mirrorDir: string): Promise<void>;
  /** Points origin at `url` and fetches every ref and tag, pruning deleted refs. */
  updateMirror(mirrorDir: string, url: string): Promise<void>;
  /** Fresh non-bare clone of the mirror whose refs match the mirror exactly. */
  cloneWorkingCopy(mirrorDir: string, workDir: string): Promise<void>;
  pushMirror(dir: string, remote: string): Promise<void>;
  listRefs(dir: string): Promise<RefMap>;
  listRemoteRefs(remote: string): Promise<RefMap>;
  /** Every object reachable from any ref, streamed. */
  enumerateObjects(dir: string): AsyncIterable<GitObjectInfo>;
  rewriteLargeObjects(workDir: string, thresholdBytes: number): Promise<void>;
  /** Stages and commits one file. Resolves false when there was nothing to commit. */
  commitFile(workDir: string, file: string, message: string): Promise<boolean>;
  /**
   * Uploads every large object to `remote`. Resolves to the objects that
   * were (or, with `dryRun`, would be) transferred, one line each.
   */
  pushLargeObjects(
    dir: string,
    remote: string,
    options?: LargeObjectPushOptions
  ): Promise<string[]>;
}

export function refMapsEqual(a: RefMap, b: RefMap): boolean {
  if (a.size !== b.size) return false;
  for (const [ref, id] of a) {
    if (b.get(ref) !== id) return false;
  }
  return true;
}
