import {
  CancelledError,
  MAX_CONCURRENT_TRANSFERS,
  MAX_RETRIES,
  RETRY_BACKOFF_MS,
  toError,
} from "@neocities-sync/shared";

interface QueueTask {
  run: () => Promise<void>;
  reject: (error: Error) => void;
  retries: number;
}

interface RetryTimer {
  timer: ReturnType<typeof setTimeout>;
  task: QueueTask;
  error: Error;
}

export interface TaskQueueOptions {
  concurrency?: number;
  maxRetries?: number;
  backoffMs?: number;
  /** Failures for which this returns false are not retried */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Once aborted, queued tasks reject with CancelledError; running ones finish */
  signal?: AbortSignal;
}

/**
 * Concurrent task queue with retry logic.
 */
export class TaskQueue {
  private queue: QueueTask[] = [];
  private retrying = new Set<RetryTimer>();
  private active = 0;
  private concurrency: number;
  private maxRetries: number;
  private backoffMs: number;
  private shouldRetry: (error: Error) => boolean;
  private onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  private signal?: AbortSignal;
  private watching = false;
  private readonly onAbort = () => this.cancelPending();

  constructor(options: TaskQueueOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? MAX_CONCURRENT_TRANSFERS);
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.backoffMs = options.backoffMs ?? RETRY_BACKOFF_MS;
    this.shouldRetry = options.shouldRetry ?? (() => true);
    this.onRetry = options.onRetry;
    this.signal = options.signal;
  }

  /**
   * Add a task to the queue.
   */
  enqueue<T>(execute: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      this.watchSignal();
      this.queue.push({
        run: async () => resolve(await execute()),
        reject,
        retries: 0,
      });
      this.processNext();
    });
  }

  /**
   * Process the next task in the queue.
   */
  private processNext(): void {
    if (this.active >= this.concurrency) return;

    const task = this.queue.shift();
    if (!task) return;
    this.active++;

    void task
      .run()
      .catch((error: unknown) => {
        const failure = toError(error);
        if (!this.signal?.aborted && task.retries < this.maxRetries && this.shouldRetry(failure)) {
          task.retries++;
          const delay = this.backoffMs * Math.pow(2, task.retries - 1);
          this.onRetry?.(failure, task.retries, delay);
          this.scheduleRetry(task, failure, delay);
        } else {
          task.reject(failure);
        }
      })
      .finally(() => {
        this.active--;
        this.processNext();
        this.releaseSignal();
      });
  }

  /** The abort listener is only held while work is outstanding */
  private watchSignal(): void {
    if (!this.signal || this.watching) return;
    this.signal.addEventListener("abort", this.onAbort, { once: true });
    this.watching = true;
  }

  private releaseSignal(): void {
    if (!this.watching || this.active > 0 || this.queue.length > 0 || this.retrying.size > 0) return;
    this.signal?.removeEventListener("abort", this.onAbort);
    this.watching = false;
  }

  private scheduleRetry(task: QueueTask, error: Error, delay: number): void {
    const entry: RetryTimer = {
      task,
      error,
      timer: setTimeout(() => {
        this.retrying.delete(entry);
        this.queue.unshift(task);
        this.processNext();
      }, delay),
    };
    this.retrying.add(entry);
  }

  private cancelPending(): void {
    this.watching = false;
    for (const task of this.queue.splice(0)) {
      task.reject(new CancelledError());
    }
    // Tasks waiting out a backoff already ran; they fail with their last error
    for (const entry of this.retrying) {
      clearTimeout(entry.timer);
      entry.task.reject(entry.error);
    }
    this.retrying.clear();
  }

  /** Number of tasks currently active */
  get activeCount(): number {
    return this.active;
  }

  /** Number of tasks waiting in queue */
  get pendingCount(): number {
    return this.queue.length;
  }

  /** Number of failed tasks waiting to be retried */
  get retryingCount(): number {
    return this.retrying.size;
  }
}
