import { ConfigError, ConflictError } from '../shared/errors.js';
import { createLogger, errorMessage } from '../shared/logger.js';

const log = createLogger('executions');

export type PoolWork = (signal: AbortSignal) => Promise<unknown>;

interface Inflight {
  controller: AbortController;
  done: Promise<void>;
  started: boolean;
}

/**
 * Runs executions in the background, at most `maxConcurrent` at a time.
 * Work past the limit waits in submission order. Each submission gets an
 * AbortSignal that `cancel` trips; work aborted while it waits never starts.
 */
export class ExecutionPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly inflight = new Map<string, Inflight>();

  constructor(readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new ConfigError(`max_concurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  has(jobId: string): boolean {
    return this.inflight.has(jobId);
  }

  submit(jobId: string, work: PoolWork): void {
    if (this.inflight.has(jobId)) {
      throw new ConflictError(`Execution ${jobId} is already submitted`);
    }
    const controller = new AbortController();
    const done = this.execute(jobId, controller.signal, work);
    this.inflight.set(jobId, { controller, done, started: false });
  }

  /** Abort the job's signal. False when the pool does not hold the job. */
  cancel(jobId: string): boolean {
    const entry = this.inflight.get(jobId);
    if (!entry) return false;
    entry.controller.abort();
    return true;
  }

  /**
   * Drop a job that is still waiting for a slot. False when its work has
   * already started; true when it was withdrawn or the pool never held it.
   */
  withdraw(jobId: string): boolean {
    const entry = this.inflight.get(jobId);
    if (!entry) return true;
    if (entry.started) return false;
    entry.controller.abort();
    return true;
  }

  /** Resolves once nothing is running or waiting. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight.values()].map((e) => e.done));
    }
  }

  private async execute(jobId: string, signal: AbortSignal, work: PoolWork): Promise<void> {
    await this.acquire();
    try {
      if (signal.aborted) {
        log.debug('Skipped execution aborted before it started', { job_id: jobId });
        return;
      }
      const entry = this.inflight.get(jobId);
      if (entry) entry.started = true;
      await work(signal);
    } catch (e) {
      log.error('Background execution failed', { job_id: jobId, error: errorMessage(e) });
    } finally {
      this.release();
      this.inflight.delete(jobId);
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active -= 1;
    this.waiting.shift()?.();
  }
}
