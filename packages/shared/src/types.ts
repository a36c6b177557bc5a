/**
 * Configuration for one site, as loaded from a config file section.
 */
export interface SiteConfig {
  /** API key of the site */
  readonly apiKey: string;
  /** Absolute path of the local directory to sync */
  readonly rootDir: string;
  /** Sync file types that only paying accounts may upload */
  readonly syncDisallowed: boolean;
  /** Sync files and directories whose name starts with a dot */
  readonly syncHidden: boolean;
  /** Sync version-control metadata (.git, .hg, ...) */
  readonly syncVcs: boolean;
  /** Remove remote directories left without files after the sync */
  readonly removeEmptyDirs: boolean;
  /** Lowercase extensions with a leading dot, or null for no restriction */
  readonly allowedExtensions: readonly string[] | null;
}

/**
 * A file or directory found by the local scanner.
 */
export interface LocalEntry {
  /** Root-relative POSIX path (e.g. "images/cat.png") */
  path: string;
  isDirectory: boolean;
  /** File size in bytes (0 for directories) */
  size: number;
  /** SHA-1 hex digest of the contents, null for directories */
  fingerprint: string | null;
  /** Last modified timestamp (ms since epoch) */
  mtime: number;
}

/**
 * A file or directory as reported by the remote listing.
 */
export interface RemoteEntry {
  path: string;
  isDirectory: boolean;
  size?: number;
  /** SHA-1 hex digest reported by the host, null for directories */
  fingerprint: string | null;
  updatedAt?: string;
}

export type UploadReason =
  | "missing-remotely"
  | "size-changed"
  | "fingerprint-changed"
  | "directory-in-remote";

export type DeleteReason = "missing-locally" | "directory-locally" | "replaced-by-file";

export interface UploadAction {
  type: "upload";
  path: string;
  reason: UploadReason;
  /** A remote directory sits at this path and is deleted first */
  replacesDirectory: boolean;
}

export interface DeleteAction {
  type: "delete";
  path: string;
  reason: DeleteReason;
}

export interface RemoveDirectoryAction {
  type: "remove-directory";
  path: string;
}

export type SyncAction = UploadAction | DeleteAction | RemoveDirectoryAction;

export interface PlanOptions {
  syncDisallowed: boolean;
  removeEmptyDirs: boolean;
}

export interface PlanSummary {
  uploads: number;
  deletes: number;
  directoryRemovals: number;
}

/**
 * Remote operations the sync needs. The credential is bound to the
 * implementation when it is constructed.
 */
export interface RemoteSiteApi {
  listRemoteEntries(): Promise<RemoteEntry[]>;
  uploadFile(path: string, bytes: Uint8Array): Promise<void>;
  deleteEntry(path: string): Promise<void>;
}

export type ScanIssueKind = "unreadable" | "unsupported" | "outside-root" | "symlinked-directory";

/**
 * An entry the scanner could not or would not sync. Never fatal.
 */
export interface ScanIssue {
  path: string;
  kind: ScanIssueKind;
  message: string;
}

export interface ScanResult {
  /** Entries sorted by path */
  entries: LocalEntry[];
  issues: ScanIssue[];
}

export interface ActionFailure {
  action: SyncAction;
  error: Error;
}

export interface SkippedAction {
  action: SyncAction;
  reason: "dry-run" | "cancelled";
}

export interface ExecutionReport {
  dryRun: boolean;
  succeeded: SyncAction[];
  failed: ActionFailure[];
  skipped: SkippedAction[];
}
