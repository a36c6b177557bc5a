import {
  CancelledError,
  MAX_CONCURRENT_TRANSFERS,
  describeAction,
  planSync,
  summarizePlan,
  toError,
} from "@neocities-sync/shared";
import type {
  ExecutionReport,
  PlanSummary,
  RemoteSiteApi,
  ScanIssue,
  SiteConfig,
  SyncAction,
} from "@neocities-sync/shared";
import { createSilentLogger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";
import { executePlan } from "./executor.js";
import { scanLocalTree } from "./scanner.js";

export interface ProgressHandle {
  succeed(text?: string): void;
  fail(text?: string): void;
}

/** Marks the long phases of a run, e.g. with a spinner. */
export interface ProgressReporter {
  start(text: string): ProgressHandle;
}

export interface SyncOptions {
  dryRun?: boolean;
  concurrency?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  progress?: ProgressReporter;
}

export interface SiteSyncResult {
  site: string;
  /** Local entries that could not be synced */
  issues: ScanIssue[];
  plan: SyncAction[];
  summary: PlanSummary | null;
  /** Null when the run ended before execution */
  report: ExecutionReport | null;
  /** Error that ended the site's run early */
  fatal: Error | null;
  cancelled: boolean;
}

const noProgress: ProgressReporter = {
  start: () => ({ succeed: () => {}, fail: () => {} }),
};

function countEntries(entries: readonly { isDirectory: boolean }[]): string {
  const dirs = entries.filter((entry) => entry.isDirectory).length;
  return `${entries.length - dirs} file(s) and ${dirs} dir(s)`;
}

async function phase<T>(progress: ProgressReporter, text: string, work: () => Promise<T>): Promise<T> {
  const handle = progress.start(text);
  try {
    const result = await work();
    handle.succeed();
    return result;
  } catch (error) {
    handle.fail();
    throw error;
  }
}

/**
 * Sync one site: scan the local tree, list the remote one, plan and apply.
 */
export async function syncSite(
  site: string,
  config: SiteConfig,
  api: RemoteSiteApi,
  options: SyncOptions = {},
): Promise<SiteSyncResult> {
  const logger = options.logger ?? createSilentLogger();
  const progress = options.progress ?? noProgress;
  const result: SiteSyncResult = {
    site,
    issues: [],
    plan: [],
    summary: null,
    report: null,
    fatal: null,
    cancelled: false,
  };

  logger.info(`Starting sync for site "${site}".`);

  try {
    const scan = await phase(progress, "Scanning local files...", () =>
      scanLocalTree(config, { concurrency: options.concurrency ?? MAX_CONCURRENT_TRANSFERS, signal: options.signal }),
    );
    result.issues = scan.issues;
    for (const issue of scan.issues) {
      logger.warn(`Skipping "${issue.path}": ${issue.message}`);
    }
    logger.info(`Local file tree has ${countEntries(scan.entries)}.`);

    const remote = await phase(progress, "Fetching remote file tree...", () => api.listRemoteEntries());
    logger.info(`Remote file tree has ${countEntries(remote)}.`);

    result.plan = planSync(scan.entries, remote, {
      syncDisallowed: config.syncDisallowed,
      removeEmptyDirs: config.removeEmptyDirs,
    });
    result.summary = summarizePlan(result.plan);
    for (const action of result.plan) {
      logger.debug(`Planned: ${describeAction(action)}`);
    }

    if (options.signal?.aborted) throw new CancelledError();

    const report = await phase(progress, options.dryRun ? "Planning actions..." : "Applying actions...", () =>
      executePlan(result.plan, api, {
        rootDir: config.rootDir,
        dryRun: options.dryRun,
        concurrency: options.concurrency,
        maxRetries: options.maxRetries,
        retryBackoffMs: options.retryBackoffMs,
        signal: options.signal,
        logger,
      }),
    );
    result.report = report;

    if (report.dryRun) {
      logger.info(`Would apply ${report.skipped.length} action(s).`);
    } else {
      logger.info(`Applied ${report.succeeded.length} action(s).`);
      if (report.failed.length > 0) {
        logger.error(`${report.failed.length} action(s) failed.`);
      }
      const cancelled = report.skipped.filter((skip) => skip.reason === "cancelled").length;
      if (cancelled > 0) {
        result.cancelled = true;
        logger.warn(`${cancelled} action(s) not started: cancelled.`);
      }
    }
  } catch (error) {
    if (error instanceof CancelledError) {
      result.cancelled = true;
      logger.warn(`Sync for site "${site}" cancelled.`);
      return result;
    }
    result.fatal = toError(error);
    logger.fatal(`Sync for site "${site}" failed: ${result.fatal.message}`);
    return result;
  }

  logger.info(`Finished sync for site "${site}".`);
  return result;
}

export interface RunSyncOptions extends SyncOptions {
  createApi: (config: SiteConfig) => RemoteSiteApi;
}

/**
 * Sync sites one after another. A cancellation stops before the next site.
 */
export async function runSync(
  sites: ReadonlyArray<readonly [string, SiteConfig]>,
  options: RunSyncOptions,
): Promise<SiteSyncResult[]> {
  const results: SiteSyncResult[] = [];
  for (const [site, config] of sites) {
    if (options.signal?.aborted) break;
    results.push(await syncSite(site, config, options.createApi(config), options));
  }
  return results;
}

/**
 * Process exit status for a finished run.
 */
export function exitCodeFor(results: readonly SiteSyncResult[]): number {
  return results.some((result) => result.fatal !== null || (result.report?.failed.length ?? 0) > 0) ? 1 : 0;
}
