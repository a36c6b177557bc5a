import { FREE_TIER_EXTENSIONS } from "./constants.js";
import { PlanInvariantError } from "./errors.js";
import { comparePaths, fileExtension, isBeneath } from "./paths.js";
import type {
  DeleteAction,
  LocalEntry,
  PlanOptions,
  PlanSummary,
  RemoteEntry,
  RemoveDirectoryAction,
  SyncAction,
  UploadAction,
} from "./types.js";

function indexByPath<T extends { path: string }>(entries: readonly T[], side: string): Map<string, T> {
  const index = new Map<string, T>();
  for (const entry of entries) {
    if (index.has(entry.path)) {
      throw new PlanInvariantError(`Duplicate ${side} path "${entry.path}"`);
    }
    index.set(entry.path, entry);
  }
  return index;
}

/**
 * Whether a file belongs to the set this run manages. Without
 * `syncDisallowed`, file types a free account cannot upload are left alone
 * on both sides.
 */
export function isManagedFile(path: string, syncDisallowed: boolean): boolean {
  return syncDisallowed || FREE_TIER_EXTENSIONS.has(fileExtension(path));
}

/**
 * Compare the local and remote snapshots and derive the actions that make
 * the remote mirror the local tree.
 *
 * @param local   - Entries found by the local scanner
 * @param remote  - Entries from the remote listing
 * @param options - Site flags that affect the plan
 * @returns Uploads, then deletes, then directory removals
 */
export function planSync(
  local: readonly LocalEntry[],
  remote: readonly RemoteEntry[],
  options: PlanOptions,
): SyncAction[] {
  const localIndex = indexByPath(local, "local");
  const remoteIndex = indexByPath(remote, "remote");

  const uploads: UploadAction[] = [];
  const deletes: DeleteAction[] = [];

  // Remote directories going away as a whole; nothing beneath needs its own delete
  const deletedDirectories: string[] = [];

  for (const entry of [...localIndex.values()].sort((a, b) => comparePaths(a.path, b.path))) {
    if (entry.isDirectory || !isManagedFile(entry.path, options.syncDisallowed)) continue;

    const remoteEntry = remoteIndex.get(entry.path);

    if (!remoteEntry) {
      uploads.push({ type: "upload", path: entry.path, reason: "missing-remotely", replacesDirectory: false });
    } else if (remoteEntry.isDirectory) {
      uploads.push({ type: "upload", path: entry.path, reason: "directory-in-remote", replacesDirectory: true });
      deletes.push({ type: "delete", path: entry.path, reason: "replaced-by-file" });
      deletedDirectories.push(entry.path);
    } else if (remoteEntry.size !== undefined && remoteEntry.size !== entry.size) {
      uploads.push({ type: "upload", path: entry.path, reason: "size-changed", replacesDirectory: false });
    } else if (remoteEntry.fingerprint !== entry.fingerprint) {
      uploads.push({ type: "upload", path: entry.path, reason: "fingerprint-changed", replacesDirectory: false });
    }
    // Same size and fingerprint → already in sync
  }

  const deletedFiles = new Set<string>();

  for (const entry of remoteIndex.values()) {
    if (entry.isDirectory || !isManagedFile(entry.path, options.syncDisallowed)) continue;

    const localEntry = localIndex.get(entry.path);
    if (localEntry && !localEntry.isDirectory) continue;
    if (deletedDirectories.some((dir) => isBeneath(dir, entry.path))) continue;

    deletes.push({
      type: "delete",
      path: entry.path,
      reason: localEntry ? "directory-locally" : "missing-locally",
    });
    deletedFiles.add(entry.path);
  }

  uploads.sort((a, b) => comparePaths(a.path, b.path));
  deletes.sort((a, b) => comparePaths(a.path, b.path));

  const removals = options.removeEmptyDirs
    ? findEmptyDirectories(remoteIndex, deletedFiles, deletedDirectories, uploads)
    : [];

  return [...uploads, ...deletes, ...removals];
}

/**
 * Remote directories with no file left beneath them once the planned
 * deletes and uploads are applied, children before their ancestors.
 */
function findEmptyDirectories(
  remoteIndex: Map<string, RemoteEntry>,
  deletedFiles: Set<string>,
  deletedDirectories: string[],
  uploads: UploadAction[],
): RemoveDirectoryAction[] {
  const remainingFiles: string[] = uploads.map((action) => action.path);
  for (const entry of remoteIndex.values()) {
    if (entry.isDirectory || deletedFiles.has(entry.path)) continue;
    if (deletedDirectories.some((dir) => isBeneath(dir, entry.path))) continue;
    remainingFiles.push(entry.path);
  }

  const removals: RemoveDirectoryAction[] = [];
  for (const entry of remoteIndex.values()) {
    if (!entry.isDirectory) continue;
    if (deletedDirectories.some((dir) => dir === entry.path || isBeneath(dir, entry.path))) continue;
    if (remainingFiles.some((path) => isBeneath(entry.path, path))) continue;
    removals.push({ type: "remove-directory", path: entry.path });
  }

  // Descending order puts every directory after all of its descendants
  return removals.sort((a, b) => comparePaths(b.path, a.path));
}

const REASON_TEXT: Record<UploadAction["reason"] | DeleteAction["reason"], string> = {
  "missing-remotely": "file doesn't exist in remote",
  "size-changed": "sizes differ",
  "fingerprint-changed": "SHA1 hashes don't match",
  "directory-in-remote": "path is a directory in remote",
  "missing-locally": "file doesn't exist locally",
  "directory-locally": "path is a directory locally",
  "replaced-by-file": "path is a file locally",
};

/**
 * One-line description of an action for logs.
 */
export function describeAction(action: SyncAction): string {
  switch (action.type) {
    case "upload":
      return `Upload "${action.path}": ${REASON_TEXT[action.reason]}`;
    case "delete":
      return `Delete "${action.path}": ${REASON_TEXT[action.reason]}`;
    case "remove-directory":
      return `Remove empty directory "${action.path}"`;
  }
}

export function summarizePlan(actions: readonly SyncAction[]): PlanSummary {
  const summary: PlanSummary = { uploads: 0, deletes: 0, directoryRemovals: 0 };
  for (const action of actions) {
    if (action.type === "upload") summary.uploads++;
    else if (action.type === "delete") summary.deletes++;
    else summary.directoryRemovals++;
  }
  return summary;
}

/**
 * Deletes that must finish before the uploads start: those removing the path
 * an upload writes to, or one of its parent directories.
 */
export function isBlockingDelete(action: DeleteAction, uploads: readonly UploadAction[]): boolean {
  return uploads.some((upload) => upload.path === action.path || isBeneath(action.path, upload.path));
}
