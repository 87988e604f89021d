import type Database from 'better-sqlite3';
import { createLogger, errorMessage } from '../shared/logger.js';
import type { ExecutionRecord } from '../execution/types.js';
import type { ExecutionRequest } from '../execution/runner.js';
import { claimSchedule, findDueSchedules } from './schedules.js';

const log = createLogger('scheduler');

/** Starts executions; the Orchestrator in production. */
export interface Launcher {
  launch(request: ExecutionRequest): ExecutionRecord;
}

export interface SchedulerLoopOptions {
  intervalMs?: number;
  now?: () => Date;
}

export interface TickResult {
  due: number;
  launched: string[];
  skipped: string[];
}

/**
 * Polls for due schedules on a timer. Each firing is claimed atomically
 * before its execution is launched, so overlapping ticks cannot fire the
 * same boundary twice.
 */
export class SchedulerLoop {
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private readonly intervalMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    private readonly launcher: Launcher,
    opts: SchedulerLoopOptions = {},
  ) {
    this.intervalMs = opts.intervalMs ?? 60_000;
    this.now = opts.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      log.warn('Scheduler already running');
      return;
    }
    this.running = true;
    log.info('Scheduler started', { interval_ms: this.intervalMs });
    this.poll();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    log.info('Scheduler stopped');
  }

  tick(now: Date = this.now()): TickResult {
    const due = findDueSchedules(this.db, now);
    const result: TickResult = { due: due.length, launched: [], skipped: [] };

    for (const schedule of due) {
      const claimed = claimSchedule(this.db, schedule, now);
      if (!claimed) {
        log.debug('Schedule already claimed', { schedule_id: schedule.id });
        result.skipped.push(schedule.id);
        continue;
      }
      try {
        const execution = this.launcher.launch({
          definition: claimed.job_config.definition,
          inputs: claimed.job_config.inputs,
          runName: `${claimed.name} @ ${now.toISOString()}`,
          triggerType: 'scheduled',
          scheduleId: claimed.id,
        });
        result.launched.push(execution.job_id);
        log.info('Scheduled execution launched', {
          schedule_id: claimed.id,
          job_id: execution.job_id,
          next_run_at: claimed.next_run_at,
        });
      } catch (e) {
        result.skipped.push(schedule.id);
        log.error('Scheduled execution failed to launch', {
          schedule_id: schedule.id,
          error: errorMessage(e),
        });
      }
    }
    return result;
  }

  private poll(): void {
    if (!this.running) return;
    try {
      this.tick();
    } catch (e) {
      log.error('Scheduler tick failed', { error: errorMessage(e) });
    }
    if (this.running) {
      this.timer = setTimeout(() => this.poll(), this.intervalMs);
      this.timer.unref();
    }
  }
}
