import { RefMap, SourceControl } from "../git/source-control.js";
import { Logger } from "../util/logger.js";
import { RetryOptions, withRetry } from "../util/retry.js";

export interface RefMismatch {
  ref: string;
  kind: "missing" | "different";
  localId: string;
  remoteId?: string;
}

export interface VerificationReport {
  consistent: boolean;
  mismatches: RefMismatch[];
  pendingLargeObjects: string[];
}

/** Every local ref must exist remotely with the same id. Extra remote refs are ignored. */
export function compareRefs(local: RefMap, remote: RefMap): RefMismatch[] {
  const mismatches: RefMismatch[] = [];
  for (const [ref, localId] of local) {
    const remoteId = remote.get(ref);
    if (remoteId === undefined) {
      mismatches.push({ ref, kind: "missing", localId });
    } else if (remoteId !== localId) {
      mismatches.push({ ref, kind: "different", localId, remoteId });
    }
  }
  return mismatches;
}

export function describeMismatch(mismatch: RefMismatch): string {
  return mismatch.kind === "missing"
    ? `Ref missing on GitHub: ${mismatch.ref}`
    : `Ref mismatch on GitHub: ${mismatch.ref} (local ${mismatch.localId}, remote ${mismatch.remoteId})`;
}

export async function verifyPush(
  git: SourceControl,
  mirrorDir: string,
  destinationUrl: string,
  logger: Logger,
  retry: Omit<RetryOptions, "label" | "logger"> = {}
): Promise<VerificationReport> {
  const local = await git.listRefs(mirrorDir);
  const remote = await withRetry(() => git.listRemoteRefs(destinationUrl), {
    ...retry,
    label: "ls-remote destination",
    logger,
  });

  const mismatches = compareRefs(local, remote);
  for (const mismatch of mismatches) {
    logger.warn(describeMismatch(mismatch));
  }

  const pendingLargeObjects = await withRetry(
    () => git.pushLargeObjects(mirrorDir, destinationUrl, { dryRun: true }),
    { ...retry, label: "LFS dry-run push", logger }
  );
  if (pendingLargeObjects.length > 0) {
    logger.warn(
      `LFS objects still pending for ${destinationUrl}: ${pendingLargeObjects.length}`
    );
  }

  return {
    consistent: mismatches.length === 0 && pendingLargeObjects.length === 0,
    mismatches,
    pendingLargeObjects,
  };
}
