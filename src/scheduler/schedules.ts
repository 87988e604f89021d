import type Database from 'better-sqlite3';
import { ConfigError, NotFoundError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { generateId } from '../shared/ids.js';
import { isPlainObject, parseJsonObject, toJsonText } from '../shared/json.js';
import { prepareFlow } from '../flow/prepare.js';
import type { JobConfig } from '../execution/types.js';
import { nextRunTime, normalizeCron } from './cron.js';

const log = createLogger('scheduler');

export interface ScheduleRecord {
  id: string;
  name: string;
  cron_expression: string;
  job_config: JobConfig;
  is_active: boolean;
  last_run_at: string | null;
  next_run_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ScheduleRow extends Omit<ScheduleRecord, 'job_config' | 'is_active'> {
  job_config_json: string;
  is_active: number;
}

export interface ScheduleInput {
  name: string;
  cron_expression: string;
  job_config: JobConfig;
  is_active?: boolean;
}

export type SchedulePatch = Partial<Pick<ScheduleInput, 'name' | 'cron_expression' | 'job_config'>>;

function fromRow(row: ScheduleRow): ScheduleRecord {
  const config = parseJsonObject(row.job_config_json) ?? {};
  const inputs = config['inputs'];
  return {
    id: row.id,
    name: row.name,
    cron_expression: row.cron_expression,
    job_config: { definition: config['definition'], inputs: isPlainObject(inputs) ? inputs : {} },
    is_active: row.is_active === 1,
    last_run_at: row.last_run_at,
    next_run_at: row.next_run_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/** Reject a job config whose flow definition would not prepare. */
function checkJobConfig(config: JobConfig): void {
  try {
    prepareFlow(config.definition);
  } catch (e) {
    if (e instanceof ConfigError) {
      throw new ConfigError(`Invalid job config: ${e.message}`, e.context);
    }
    throw e;
  }
}

export function getSchedule(db: Database.Database, id: string): ScheduleRecord | undefined {
  const row = db.prepare(`SELECT * FROM schedules WHERE id = ?`).get(id) as ScheduleRow | undefined;
  return row ? fromRow(row) : undefined;
}

function requireSchedule(db: Database.Database, id: string): ScheduleRecord {
  const schedule = getSchedule(db, id);
  if (!schedule) throw new NotFoundError(`Schedule ${id} not found`);
  return schedule;
}

export function listSchedules(db: Database.Database): ScheduleRecord[] {
  const rows = db
    .prepare(`SELECT * FROM schedules ORDER BY created_at ASC, name ASC`)
    .all() as ScheduleRow[];
  return rows.map(fromRow);
}

export function createSchedule(
  db: Database.Database,
  input: ScheduleInput,
  now: Date = new Date(),
): ScheduleRecord {
  const cron = normalizeCron(input.cron_expression);
  const nextRun = nextRunTime(cron, now).toISOString();
  checkJobConfig(input.job_config);

  const id = generateId();
  const ts = now.toISOString();
  db.prepare(
    `INSERT INTO schedules (id, name, cron_expression, job_config_json, is_active, last_run_at, next_run_at, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, NULL, ?, ?, ?)`,
  ).run(id, input.name, cron, toJsonText(input.job_config), input.is_active === false ? 0 : 1, nextRun, ts, ts);

  log.info('Schedule created', { schedule_id: id, name: input.name, cron, next_run_at: nextRun });
  return requireSchedule(db, id);
}

export function updateSchedule(
  db: Database.Database,
  id: string,
  patch: SchedulePatch,
  now: Date = new Date(),
): ScheduleRecord {
  const current = requireSchedule(db, id);
  const cron = patch.cron_expression === undefined ? current.cron_expression : normalizeCron(patch.cron_expression);
  const nextRun =
    cron === current.cron_expression ? current.next_run_at : nextRunTime(cron, now).toISOString();
  const jobConfig = patch.job_config ?? current.job_config;
  if (patch.job_config) checkJobConfig(patch.job_config);

  db.prepare(
    `UPDATE schedules SET name = ?, cron_expression = ?, job_config_json = ?, next_run_at = ?, updated_at = ?
     WHERE id = ?`,
  ).run(patch.name ?? current.name, cron, toJsonText(jobConfig), nextRun, now.toISOString(), id);
  return requireSchedule(db, id);
}

export function deleteSchedule(db: Database.Database, id: string): ScheduleRecord {
  const current = requireSchedule(db, id);
  db.prepare(`DELETE FROM schedules WHERE id = ?`).run(id);
  log.info('Schedule deleted', { schedule_id: id });
  return current;
}

/**
 * Flip `is_active`. Activating computes `next_run_at` from `now`, so a
 * schedule that was off for a while does not fire for the runs it missed.
 */
export function toggleSchedule(
  db: Database.Database,
  id: string,
  now: Date = new Date(),
): ScheduleRecord {
  const current = requireSchedule(db, id);
  const active = !current.is_active;
  const nextRun = active ? nextRunTime(current.cron_expression, now).toISOString() : current.next_run_at;
  db.prepare(`UPDATE schedules SET is_active = ?, next_run_at = ?, updated_at = ? WHERE id = ?`).run(
    active ? 1 : 0,
    nextRun,
    now.toISOString(),
    id,
  );
  log.info(active ? 'Schedule activated' : 'Schedule paused', { schedule_id: id, next_run_at: nextRun });
  return requireSchedule(db, id);
}

export function findDueSchedules(db: Database.Database, now: Date = new Date()): ScheduleRecord[] {
  const rows = db
    .prepare(
      `SELECT * FROM schedules
       WHERE is_active = 1 AND next_run_at IS NOT NULL AND next_run_at <= ?
       ORDER BY next_run_at ASC`,
    )
    .all(now.toISOString()) as ScheduleRow[];
  return rows.map(fromRow);
}

/**
 * Claim one due firing: advance `last_run_at`/`next_run_at` only if
 * `next_run_at` still holds the value the caller read. Null means another
 * tick claimed it first (or the schedule changed meanwhile).
 */
export function claimSchedule(
  db: Database.Database,
  schedule: ScheduleRecord,
  now: Date = new Date(),
): ScheduleRecord | null {
  if (schedule.next_run_at === null) return null;
  const nextRun = nextRunTime(schedule.cron_expression, now).toISOString();
  const ts = now.toISOString();
  const info = db
    .prepare(
      `UPDATE schedules SET last_run_at = ?, next_run_at = ?, updated_at = ?
       WHERE id = ? AND is_active = 1 AND next_run_at = ?`,
    )
    .run(ts, nextRun, ts, schedule.id, schedule.next_run_at);
  if (info.changes === 0) return null;
  return getSchedule(db, schedule.id) ?? null;
}
