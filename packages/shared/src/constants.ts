import freeTierExtensions from "./data/free-tier-extensions.json" with { type: "json" };

export const PACKAGE_VERSION = "0.1.0";

/** Name of the per-directory ignore file */
export const IGNORE_FILE_NAME = ".neocitiesignore";

/** Version-control metadata entries, skipped unless `sync_vcs` is set */
export const VCS_NAMES: ReadonlySet<string> = new Set([".git", ".hg", ".svn", ".bzr", "_darcs", "CVS"]);

/** Default API base URL */
export const DEFAULT_API_URL = "https://neocities.org/api";

/** API route paths */
export const API_ROUTES = {
  LIST: "/list",
  UPLOAD: "/upload",
  DELETE: "/delete",
} as const;

/** Maximum concurrent file transfers */
export const MAX_CONCURRENT_TRANSFERS = 5;

/** Maximum retry attempts for transient failures */
export const MAX_RETRIES = 3;

/** Retry backoff base in milliseconds */
export const RETRY_BACKOFF_MS = 1000;

/** Timeout for a single API request in milliseconds */
export const REQUEST_TIMEOUT_MS = 60_000;

/**
 * Extensions a free account may upload. Everything else needs a paid plan
 * and is left alone unless `sync_disallowed` is set.
 */
export const FREE_TIER_EXTENSIONS: ReadonlySet<string> = new Set(
  freeTierExtensions.map((ext) => `.${ext.toLowerCase()}`),
);
