import { readFile } from "node:fs/promises";
import { join } from "node:path";
import {
  CancelledError,
  describeAction,
  isBlockingDelete,
  isTransientError,
  toError,
} from "@neocities-sync/shared";
import type {
  DeleteAction,
  ExecutionReport,
  RemoteSiteApi,
  SkippedAction,
  SyncAction,
  UploadAction,
} from "@neocities-sync/shared";
import { createSilentLogger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";
import { TaskQueue } from "./queue.js";

export interface ExecuteOptions {
  /** Local directory upload contents are read from */
  rootDir: string;
  dryRun?: boolean;
  concurrency?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

type Outcome =
  | { status: "succeeded" }
  | { status: "failed"; error: Error }
  | { status: "skipped"; reason: SkippedAction["reason"] };

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

async function perform(action: SyncAction, api: RemoteSiteApi, rootDir: string): Promise<void> {
  switch (action.type) {
    case "upload": {
      const bytes = await readFile(join(rootDir, ...action.path.split("/")));
      await api.uploadFile(action.path, bytes);
      return;
    }
    case "delete":
    case "remove-directory":
      await api.deleteEntry(action.path);
      return;
  }
}

/**
 * Apply a plan to the remote site.
 *
 * Deletes that make room for an upload run first, then the remaining uploads
 * and deletes concurrently, then directory removals one at a time. A failed
 * action is recorded and the rest carry on.
 */
export async function executePlan(
  actions: readonly SyncAction[],
  api: RemoteSiteApi,
  options: ExecuteOptions,
): Promise<ExecutionReport> {
  const logger = options.logger ?? createSilentLogger();
  const outcomes = new Map<SyncAction, Outcome>();

  if (options.dryRun) {
    for (const action of actions) {
      logger.info(`Would ${lowerFirst(describeAction(action))}`);
      outcomes.set(action, { status: "skipped", reason: "dry-run" });
    }
    return buildReport(actions, outcomes, true);
  }

  const queue = new TaskQueue({
    concurrency: options.concurrency,
    maxRetries: options.maxRetries,
    backoffMs: options.retryBackoffMs,
    shouldRetry: isTransientError,
    onRetry: (error, attempt, delayMs) => {
      logger.warn(`${error.message} (retry ${attempt} in ${delayMs}ms)`);
    },
    signal: options.signal,
  });

  const run = async (action: SyncAction): Promise<void> => {
    try {
      await queue.enqueue(() => {
        logger.info(describeAction(action));
        return perform(action, api, options.rootDir);
      });
      outcomes.set(action, { status: "succeeded" });
    } catch (error) {
      if (error instanceof CancelledError) {
        outcomes.set(action, { status: "skipped", reason: "cancelled" });
        return;
      }
      const failure = toError(error);
      logger.error(`Failed to ${lowerFirst(describeAction(action))}\n${failure.message}`);
      outcomes.set(action, { status: "failed", error: failure });
    }
  };

  const uploads = actions.filter((action): action is UploadAction => action.type === "upload");
  const deletes = actions.filter((action): action is DeleteAction => action.type === "delete");
  const blocking = deletes.filter((action) => isBlockingDelete(action, uploads));
  const fileActions = actions.filter(
    (action) => action.type === "upload" || (action.type === "delete" && !blocking.includes(action)),
  );
  const directoryRemovals = actions.filter((action) => action.type === "remove-directory");

  await Promise.all(blocking.map(run));
  await Promise.all(fileActions.map(run));
  for (const action of directoryRemovals) {
    await run(action);
  }

  return buildReport(actions, outcomes, false);
}

function buildReport(actions: readonly SyncAction[], outcomes: Map<SyncAction, Outcome>, dryRun: boolean): ExecutionReport {
  const report: ExecutionReport = { dryRun, succeeded: [], failed: [], skipped: [] };

  for (const action of actions) {
    const outcome: Outcome = outcomes.get(action) ?? { status: "skipped", reason: "cancelled" };
    switch (outcome.status) {
      case "succeeded":
        report.succeeded.push(action);
        break;
      case "failed":
        report.failed.push({ action, error: outcome.error });
        break;
      case "skipped":
        report.skipped.push({ action, reason: outcome.reason });
        break;
    }
  }
  return report;
}
