import type Database from 'better-sqlite3';
import { ConflictError, NotFoundError, StateError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { timestampAfter } from '../shared/clock.js';
import { ok, err } from '../shared/result.js';
import type { Result } from '../shared/result.js';
import type { TaskDef } from '../flow/types.js';
import type { TaskRollup, TaskState, TaskStatusRecord } from './types.js';

const log = createLogger('tasks');

export function isTerminalTask(status: TaskState): boolean {
  return status === 'COMPLETED' || status === 'FAILED';
}

export function getTaskStatus(
  db: Database.Database,
  jobId: string,
  taskKey: string,
): TaskStatusRecord | undefined {
  return db
    .prepare(`SELECT * FROM task_statuses WHERE job_id = ? AND task_key = ?`)
    .get(jobId, taskKey) as TaskStatusRecord | undefined;
}

export function listTaskStatuses(db: Database.Database, jobId: string): TaskStatusRecord[] {
  return db
    .prepare(`SELECT * FROM task_statuses WHERE job_id = ? ORDER BY id ASC`)
    .all(jobId) as TaskStatusRecord[];
}

/**
 * Insert one RUNNING row per dispatched task. All-or-nothing: if any
 * (job, task_key) pair already exists, or the batch repeats a key, nothing
 * is written and a ConflictError is thrown.
 */
export function createTaskStatuses(
  db: Database.Database,
  jobId: string,
  defs: TaskDef[],
): TaskStatusRecord[] {
  const exists = db.prepare(`SELECT 1 FROM executions WHERE job_id = ?`);
  const insert = db.prepare(`
    INSERT INTO task_statuses (job_id, task_key, agent_name, status, started_at)
    VALUES (?, ?, ?, 'RUNNING', ?)
  `);

  const create = db.transaction((items: TaskDef[]) => {
    if (!exists.get(jobId)) {
      throw new NotFoundError(`Execution ${jobId} not found`, { job_id: jobId });
    }
    const batch = new Set<string>();
    for (const def of items) {
      if (batch.has(def.taskKey) || getTaskStatus(db, jobId, def.taskKey)) {
        throw new ConflictError(`Task ${def.taskKey} already dispatched for execution ${jobId}`, {
          job_id: jobId,
          task_key: def.taskKey,
        });
      }
      batch.add(def.taskKey);
    }
    const startedAt = new Date().toISOString();
    const created: TaskStatusRecord[] = [];
    for (const def of items) {
      const info = insert.run(jobId, def.taskKey, def.agentName, startedAt);
      created.push({
        id: Number(info.lastInsertRowid),
        job_id: jobId,
        task_key: def.taskKey,
        agent_name: def.agentName,
        status: 'RUNNING',
        started_at: startedAt,
        completed_at: null,
      });
    }
    return created;
  });

  const created = create(defs);
  log.debug('Tasks dispatched', { job_id: jobId, tasks: defs.map((d) => d.taskKey) });
  return created;
}

/**
 * Move a task to `next`. Terminal tasks never change: the attempt is
 * reported as a StateError result and logged, never thrown.
 */
export function transitionTask(
  db: Database.Database,
  jobId: string,
  taskKey: string,
  next: TaskState,
): Result<TaskStatusRecord, NotFoundError | StateError> {
  const apply = db.transaction((): Result<TaskStatusRecord, NotFoundError | StateError> => {
    const row = getTaskStatus(db, jobId, taskKey);
    if (!row) {
      return err(new NotFoundError(`Task ${taskKey} not found for execution ${jobId}`));
    }
    if (isTerminalTask(row.status)) {
      return err(
        new StateError(`Task ${taskKey} is already ${row.status}; ignoring ${next}`, {
          job_id: jobId,
          task_key: taskKey,
          current: row.status,
          requested: next,
        }),
      );
    }
    if (next === 'RUNNING') return ok(row);

    const completedAt = timestampAfter(row.started_at);
    db.prepare(
      `UPDATE task_statuses SET status = ?, completed_at = ? WHERE id = ? AND status = 'RUNNING'`,
    ).run(next, completedAt, row.id);
    return ok({ ...row, status: next, completed_at: completedAt });
  });

  const result = apply();
  if (!result.ok && result.error instanceof StateError) {
    log.warn(result.error.message, result.error.context);
  }
  return result;
}

export function taskRollup(db: Database.Database, jobId: string): TaskRollup {
  const row = db
    .prepare(
      `SELECT COUNT(*) AS total,
              COALESCE(SUM(status = 'RUNNING'), 0) AS running,
              COALESCE(SUM(status = 'COMPLETED'), 0) AS completed,
              COALESCE(SUM(status = 'FAILED'), 0) AS failed
       FROM task_statuses WHERE job_id = ?`,
    )
    .get(jobId) as TaskRollup;
  return row;
}

/** True when no task of the job is still RUNNING (vacuously true with no tasks). */
export function allTasksTerminal(db: Database.Database, jobId: string): boolean {
  return taskRollup(db, jobId).running === 0;
}

export function runningTaskKeys(db: Database.Database, jobId: string): string[] {
  const rows = db
    .prepare(`SELECT task_key FROM task_statuses WHERE job_id = ? AND status = 'RUNNING' ORDER BY id`)
    .all(jobId) as Array<{ task_key: string }>;
  return rows.map((r) => r.task_key);
}

export function failedTaskKeys(db: Database.Database, jobId: string): string[] {
  const rows = db
    .prepare(`SELECT task_key FROM task_statuses WHERE job_id = ? AND status = 'FAILED' ORDER BY id`)
    .all(jobId) as Array<{ task_key: string }>;
  return rows.map((r) => r.task_key);
}
