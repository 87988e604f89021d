import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import {
  claimSchedule,
  createSchedule,
  deleteSchedule,
  findDueSchedules,
  getSchedule,
  listSchedules,
  toggleSchedule,
  updateSchedule,
} from '../scheduler/schedules.js';
import type { ScheduleRecord } from '../scheduler/schedules.js';
import { SchedulerLoop } from '../scheduler/loop.js';
import type { Launcher } from '../scheduler/loop.js';
import { createOrchestrator } from '../execution/orchestrator.js';
import type { ExecutionRequest } from '../execution/runner.js';
import type { ExecutionRecord } from '../execution/types.js';
import { getExecution } from '../execution/status.js';
import { ConfigError, NotFoundError } from '../shared/errors.js';
import { createTestDb, testConfig, twoTaskFlow } from './test-helpers.js';

const at = (iso: string): Date => new Date(iso);

/** Launcher that records requests instead of running them. */
class RecordingLauncher implements Launcher {
  readonly requests: ExecutionRequest[] = [];

  launch(request: ExecutionRequest): ExecutionRecord {
    this.requests.push(request);
    return {
      id: this.requests.length,
      job_id: `job-${this.requests.length}`,
      status: 'PENDING',
      run_name: request.runName ?? null,
      trigger_type: request.triggerType ?? 'api',
      schedule_id: request.scheduleId ?? null,
      inputs: { definition: request.definition, inputs: request.inputs ?? {} },
      result: null,
      error: null,
      message: null,
      created_at: '2026-01-31T13:00:00.000Z',
      started_at: null,
      completed_at: null,
    };
  }
}

describe('schedules', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  function hourly(name = 'hourly-report', now = at('2026-01-31T10:00:00Z')): ScheduleRecord {
    return createSchedule(
      db,
      { name, cron_expression: '@hourly', job_config: { definition: twoTaskFlow(), inputs: { region: 'CH' } } },
      now,
    );
  }

  it('creates a schedule with its next run', () => {
    const schedule = hourly('hourly-report', at('2026-01-31T12:34:00Z'));
    expect(schedule).toMatchObject({
      name: 'hourly-report',
      cron_expression: '0 * * * *',
      is_active: true,
      last_run_at: null,
      next_run_at: '2026-01-31T13:00:00.000Z',
    });
    expect(schedule.job_config.inputs).toEqual({ region: 'CH' });
    expect(getSchedule(db, schedule.id)).toEqual(schedule);
  });

  it('keeps job config inputs with secret-looking keys as given', () => {
    const created = createSchedule(db, {
      name: 'sync',
      cron_expression: '@daily',
      job_config: { definition: twoTaskFlow(), inputs: { api_key: 'test-key' } },
    });
    expect(getSchedule(db, created.id)?.job_config.inputs).toEqual({ api_key: 'test-key' });

    const updated = updateSchedule(db, created.id, {
      job_config: { definition: twoTaskFlow(), inputs: { token: 'test-token' } },
    });
    expect(updated.job_config.inputs).toEqual({ token: 'test-token' });
    expect(getSchedule(db, created.id)?.job_config.definition).toEqual(twoTaskFlow());
  });

  it('rejects a bad cron expression or job config', () => {
    const job_config = { definition: twoTaskFlow(), inputs: {} };
    expect(() => createSchedule(db, { name: 'x', cron_expression: 'bad', job_config })).toThrow(
      'Invalid cron expression: bad',
    );
    expect(() =>
      createSchedule(db, { name: 'x', cron_expression: '@daily', job_config: { definition: null, inputs: {} } }),
    ).toThrow('Invalid job config: Flow definition must be an object');
    expect(listSchedules(db)).toEqual([]);
  });

  it('recomputes the next run on reactivation', () => {
    const schedule = hourly();
    expect(schedule.next_run_at).toBe('2026-01-31T11:00:00.000Z');

    const paused = toggleSchedule(db, schedule.id, at('2026-01-31T11:30:00Z'));
    expect(paused.is_active).toBe(false);
    expect(paused.next_run_at).toBe('2026-01-31T11:00:00.000Z');
    expect(findDueSchedules(db, at('2026-01-31T12:00:00Z'))).toEqual([]);

    const resumed = toggleSchedule(db, schedule.id, at('2026-01-31T12:34:00Z'));
    expect(resumed.is_active).toBe(true);
    expect(resumed.next_run_at).toBe('2026-01-31T13:00:00.000Z');
  });

  it('updates fields and recomputes the next run only for a new cron', () => {
    const schedule = hourly();
    const renamed = updateSchedule(db, schedule.id, { name: 'renamed' }, at('2026-01-31T10:20:00Z'));
    expect(renamed.name).toBe('renamed');
    expect(renamed.next_run_at).toBe('2026-01-31T11:00:00.000Z');

    const daily = updateSchedule(db, schedule.id, { cron_expression: '30 6 * * *' }, at('2026-01-31T10:20:00Z'));
    expect(daily.cron_expression).toBe('30 6 * * *');
    expect(daily.next_run_at).toBe('2026-02-01T06:30:00.000Z');

    expect(() =>
      updateSchedule(db, schedule.id, { job_config: { definition: { agents: {} }, inputs: {} } }),
    ).toThrow(ConfigError);
  });

  it('deletes a schedule', () => {
    const schedule = hourly();
    expect(deleteSchedule(db, schedule.id).id).toBe(schedule.id);
    expect(getSchedule(db, schedule.id)).toBeUndefined();
    expect(() => deleteSchedule(db, schedule.id)).toThrow(NotFoundError);
    expect(() => deleteSchedule(db, schedule.id)).toThrow(`Schedule ${schedule.id} not found`);
  });

  it('lets only one claim win a firing', () => {
    const schedule = hourly();
    const now = at('2026-01-31T11:00:00Z');
    const [due] = findDueSchedules(db, now);
    expect(due?.id).toBe(schedule.id);
    if (!due) return;

    const claimed = claimSchedule(db, due, now);
    expect(claimed?.last_run_at).toBe('2026-01-31T11:00:00.000Z');
    expect(claimed?.next_run_at).toBe('2026-01-31T12:00:00.000Z');
    expect(claimSchedule(db, due, now)).toBeNull();
  });
});

describe('SchedulerLoop', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it('launches due schedules once per firing', async () => {
    const schedule = createSchedule(
      db,
      { name: 'nightly', cron_expression: '0 * * * *', job_config: { definition: twoTaskFlow(), inputs: {} } },
      at('2026-01-31T12:34:00Z'),
    );
    const orchestrator = createOrchestrator(db, testConfig());
    const loop = new SchedulerLoop(db, orchestrator);
    const now = at('2026-01-31T13:00:00Z');

    const first = loop.tick(now);
    expect(first.due).toBe(1);
    expect(first.launched).toHaveLength(1);
    expect(loop.tick(now)).toEqual({ due: 0, launched: [], skipped: [] });

    await orchestrator.drain();
    const execution = getExecution(db, first.launched[0] ?? '');
    expect(execution?.status).toBe('COMPLETED');
    expect(execution?.trigger_type).toBe('scheduled');
    expect(execution?.schedule_id).toBe(schedule.id);
    expect(execution?.run_name).toBe('nightly @ 2026-01-31T13:00:00.000Z');
    expect(getSchedule(db, schedule.id)?.next_run_at).toBe('2026-01-31T14:00:00.000Z');
  });

  it('skips a firing whose launch fails and moves on', () => {
    const schedule = createSchedule(
      db,
      { name: 'nightly', cron_expression: '0 * * * *', job_config: { definition: twoTaskFlow(), inputs: {} } },
      at('2026-01-31T12:34:00Z'),
    );
    const launcher: Launcher = {
      launch: () => {
        throw new Error('pool closed');
      },
    };
    const result = new SchedulerLoop(db, launcher).tick(at('2026-01-31T13:05:00Z'));
    expect(result).toEqual({ due: 1, launched: [], skipped: [schedule.id] });
    expect(getSchedule(db, schedule.id)?.last_run_at).toBe('2026-01-31T13:05:00.000Z');
  });

  it('ticks on start and stops cleanly', () => {
    createSchedule(
      db,
      { name: 'nightly', cron_expression: '0 * * * *', job_config: { definition: twoTaskFlow(), inputs: { a: 1 } } },
      at('2026-01-31T12:34:00Z'),
    );
    const launcher = new RecordingLauncher();
    const loop = new SchedulerLoop(db, launcher, { intervalMs: 1000, now: () => at('2026-01-31T13:00:00Z') });

    loop.start();
    expect(loop.isRunning).toBe(true);
    loop.stop();
    expect(loop.isRunning).toBe(false);

    expect(launcher.requests).toHaveLength(1);
    expect(launcher.requests[0]).toMatchObject({
      inputs: { a: 1 },
      triggerType: 'scheduled',
      runName: 'nightly @ 2026-01-31T13:00:00.000Z',
    });
  });
});
