import { StageError } from './ingestion.js';
import { ApiError, EmbeddingError, describeError } from '../utils/errors.js';
import { isTransientHttpError } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import { sleep } from '../utils/retry.js';

export interface IngestionQueueOptions {
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  isTransient?: (error: unknown) => boolean;
}

export interface IngestionJobHandlers {
  run(documentId: string): Promise<unknown>;
  /** Called before each retry, e.g. to move a FAILED document back to UPLOADED */
  beforeRetry?(documentId: string): void;
  /** Called once per job after its last attempt, whatever the outcome */
  onSettled?(documentId: string): void;
}

export interface JobFailure {
  documentId: string;
  error: string;
  attempts: number;
}

const logger = createLogger('queue');

/**
 * Provider and network failures are worth another attempt; parse and validation failures are not
 */
export function isTransientIngestionError(error: unknown): boolean {
  const inner = error instanceof StageError ? error.original : error;
  if (inner instanceof EmbeddingError) return true;
  if (inner instanceof ApiError) return isTransientHttpError(inner);
  return false;
}

/**
 * In-process background queue with bounded concurrency, de-duplicated by document id
 */
export class IngestionQueue {
  private semaphore: Semaphore;
  private pending = new Set<string>();
  private running = new Set<Promise<void>>();
  private failures: JobFailure[] = [];

  constructor(
    private handlers: IngestionJobHandlers,
    private options: IngestionQueueOptions
  ) {
    this.semaphore = new Semaphore(options.concurrency);
  }

  /**
   * Schedule a document. Returns false when it is already queued or running.
   */
  enqueue(documentId: string): boolean {
    if (this.pending.has(documentId)) {
      logger.debug(`${documentId} is already queued`);
      return false;
    }

    this.pending.add(documentId);
    const job = this.semaphore
      .run(() => this.execute(documentId))
      .finally(() => {
        this.pending.delete(documentId);
        this.running.delete(job);
      });
    this.running.add(job);
    return true;
  }

  isPending(documentId: string): boolean {
    return this.pending.has(documentId);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Failures since the queue was created, oldest first
   */
  getFailures(): JobFailure[] {
    return [...this.failures];
  }

  /**
   * Resolves once every queued job, including jobs enqueued while waiting, has settled
   */
  async waitForIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  private async execute(documentId: string): Promise<void> {
    try {
      await this.attempt(documentId);
    } finally {
      this.handlers.onSettled?.(documentId);
    }
  }

  private async attempt(documentId: string): Promise<void> {
    const isTransient = this.options.isTransient ?? isTransientIngestionError;
    const attempts = Math.max(1, this.options.maxRetries);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.handlers.run(documentId);
        return;
      } catch (error) {
        const retry = attempt < attempts && isTransient(error);
        if (!retry) {
          this.failures.push({ documentId, error: describeError(error), attempts: attempt });
          logger.error(`Processing ${documentId} failed after ${attempt} attempt(s)`, describeError(error));
          return;
        }

        logger.warn(`Processing ${documentId} failed (attempt ${attempt}/${attempts}), retrying`, describeError(error));
        await sleep(this.options.retryDelayMs);
        try {
          this.handlers.beforeRetry?.(documentId);
        } catch (resetError) {
          this.failures.push({ documentId, error: describeError(resetError), attempts: attempt });
          logger.error(`Could not reset ${documentId} for retry`, describeError(resetError));
          return;
        }
      }
    }
  }
}
