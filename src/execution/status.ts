import type Database from 'better-sqlite3';
import { ConflictError, NotFoundError, StateError } from '../shared/errors.js';
import type { EngineError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { timestampAfter } from '../shared/clock.js';
import { isPlainObject, parseJsonObject, toJsonText } from '../shared/json.js';
import type { Result } from '../shared/result.js';
import {
  failedTaskKeys,
  runningTaskKeys,
  taskRollup,
  transitionTask,
} from '../tracking/task-status.js';
import { recordErrorTrace } from '../tracking/error-traces.js';
import type { TaskStatusRecord } from '../tracking/types.js';
import { isTerminalStatus } from './types.js';
import type {
  CreateExecutionOptions,
  ExecutionPolicy,
  ExecutionRecord,
  ExecutionStatus,
  JobConfig,
  TriggerType,
} from './types.js';

const log = createLogger('executions');

interface ExecutionRow {
  id: number;
  job_id: string;
  status: ExecutionStatus;
  run_name: string | null;
  trigger_type: TriggerType;
  schedule_id: string | null;
  inputs_json: string;
  result_json: string | null;
  error: string | null;
  message: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

const NEXT_STATUSES: Record<ExecutionStatus, readonly ExecutionStatus[]> = {
  PENDING: ['RUNNING', 'FAILED', 'CANCELLED'],
  RUNNING: ['RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
};

function parseJobConfig(json: string): JobConfig {
  const value = parseJsonObject(json);
  if (!value) return { definition: null, inputs: {} };
  const inputs = value['inputs'];
  return { definition: value['definition'], inputs: isPlainObject(inputs) ? inputs : {} };
}

function fromRow(row: ExecutionRow): ExecutionRecord {
  return {
    id: row.id,
    job_id: row.job_id,
    status: row.status,
    run_name: row.run_name,
    trigger_type: row.trigger_type,
    schedule_id: row.schedule_id,
    inputs: parseJobConfig(row.inputs_json),
    result: parseJsonObject(row.result_json),
    error: row.error,
    message: row.message,
    created_at: row.created_at,
    started_at: row.started_at,
    completed_at: row.completed_at,
  };
}

/**
 * Structured form of an engine result: strings become { value }, lists
 * { items }, booleans { success }; plain objects are kept as they are.
 */
export function normalizeResult(result: unknown): Record<string, unknown> | null {
  if (result === undefined || result === null) return null;
  if (typeof result === 'string') return { value: result };
  if (Array.isArray(result)) return { items: result };
  if (typeof result === 'boolean') return { success: result };
  if (typeof result === 'number') return { value: result };
  if (isPlainObject(result)) return result;
  return { value: toJsonText(result) };
}

export function getExecution(db: Database.Database, jobId: string): ExecutionRecord | undefined {
  const row = db.prepare(`SELECT * FROM executions WHERE job_id = ?`).get(jobId) as
    | ExecutionRow
    | undefined;
  return row ? fromRow(row) : undefined;
}

export interface ListExecutionsOptions {
  status?: ExecutionStatus;
  limit?: number;
  offset?: number;
}

export function listExecutions(
  db: Database.Database,
  opts: ListExecutionsOptions = {},
): ExecutionRecord[] {
  const limit = opts.limit ?? 50;
  const offset = opts.offset ?? 0;
  const rows = (
    opts.status
      ? db
          .prepare(
            `SELECT * FROM executions WHERE status = ? ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`,
          )
          .all(opts.status, limit, offset)
      : db
          .prepare(`SELECT * FROM executions ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`)
          .all(limit, offset)
  ) as ExecutionRow[];
  return rows.map(fromRow);
}

/**
 * Create the PENDING execution for `jobId`. Calling it again for the same
 * job returns the stored execution unchanged.
 */
export function createExecution(
  db: Database.Database,
  jobId: string,
  opts: CreateExecutionOptions,
): ExecutionRecord {
  const create = db.transaction((): ExecutionRecord => {
    const existing = getExecution(db, jobId);
    if (existing) return existing;

    const createdAt = new Date().toISOString();
    const inputsJson = toJsonText(opts.config);
    const info = db
      .prepare(
        `INSERT INTO executions (job_id, status, run_name, trigger_type, schedule_id, inputs_json, created_at)
         VALUES (?, 'PENDING', ?, ?, ?, ?, ?)`,
      )
      .run(
        jobId,
        opts.runName ?? null,
        opts.triggerType ?? 'api',
        opts.scheduleId ?? null,
        inputsJson,
        createdAt,
      );
    return {
      id: Number(info.lastInsertRowid),
      job_id: jobId,
      status: 'PENDING',
      run_name: opts.runName ?? null,
      trigger_type: opts.triggerType ?? 'api',
      schedule_id: opts.scheduleId ?? null,
      inputs: parseJobConfig(inputsJson),
      result: null,
      error: null,
      message: null,
      created_at: createdAt,
      started_at: null,
      completed_at: null,
    };
  });
  return create();
}

/**
 * Apply one status change atomically. Returns null when the job does not
 * exist; throws StateError for a terminal execution or an illegal move.
 * `completed_at` is written exactly when `status` is terminal and always
 * sorts after `created_at`; `result` and `error` are only stored then.
 */
export function updateExecutionStatus(
  db: Database.Database,
  jobId: string,
  status: ExecutionStatus,
  message: string,
  result?: unknown,
): ExecutionRecord | null {
  const update = db.transaction((): ExecutionRecord | null => {
    const current = getExecution(db, jobId);
    if (!current) return null;
    if (isTerminalStatus(current.status)) {
      throw new StateError(`Execution ${jobId} is already ${current.status}`, {
        job_id: jobId,
        current: current.status,
        requested: status,
      });
    }
    if (!NEXT_STATUSES[current.status].includes(status)) {
      throw new StateError(`Illegal execution transition ${current.status} -> ${status}`, {
        job_id: jobId,
      });
    }

    const now = new Date();
    const terminal = isTerminalStatus(status);
    const startedAt = current.started_at ?? (status === 'RUNNING' ? now.toISOString() : null);
    const completedAt = terminal ? timestampAfter(current.created_at, now) : null;
    const normalized = terminal ? normalizeResult(result) : null;
    const error = status === 'FAILED' ? message : null;

    db.prepare(
      `UPDATE executions
       SET status = ?, message = ?, started_at = ?, completed_at = ?, result_json = ?, error = ?
       WHERE job_id = ?`,
    ).run(
      status,
      message,
      startedAt,
      completedAt,
      normalized === null ? null : toJsonText(normalized),
      error,
      jobId,
    );

    return getExecution(db, jobId) ?? null;
  });

  const updated = update();
  if (updated && updated.status !== 'RUNNING') {
    log.info('Execution status updated', { job_id: jobId, status, message });
  }
  return updated;
}

/** Move a live execution straight to CANCELLED, whatever its tasks are doing. */
export function cancelExecution(
  db: Database.Database,
  jobId: string,
  reason = 'Cancelled by request',
): ExecutionRecord {
  const cancel = db.transaction((): ExecutionRecord => {
    const current = getExecution(db, jobId);
    if (!current) throw new NotFoundError(`Execution ${jobId} not found`);
    if (isTerminalStatus(current.status)) {
      throw new ConflictError(`Execution ${jobId} is already ${current.status}`);
    }
    const updated = updateExecutionStatus(db, jobId, 'CANCELLED', reason);
    if (!updated) throw new NotFoundError(`Execution ${jobId} not found`);
    return updated;
  });
  return cancel();
}

export interface DeleteSummary {
  job_id: string;
  task_statuses: number;
  error_traces: number;
  traces: number;
  logs: number;
}

/**
 * Delete an execution with every row that belongs to it, in one
 * transaction. A RUNNING execution cannot be deleted.
 */
export function deleteExecution(db: Database.Database, jobId: string): DeleteSummary {
  const remove = db.transaction((): DeleteSummary => {
    const current = getExecution(db, jobId);
    if (!current) throw new NotFoundError(`Execution ${jobId} not found`);
    if (current.status === 'RUNNING') {
      throw new ConflictError(`Execution ${jobId} is running; cancel it before deleting`);
    }
    const summary: DeleteSummary = {
      job_id: jobId,
      task_statuses: db.prepare(`DELETE FROM task_statuses WHERE job_id = ?`).run(jobId).changes,
      error_traces: db.prepare(`DELETE FROM error_traces WHERE execution_id = ?`).run(current.id).changes,
      traces: db.prepare(`DELETE FROM execution_traces WHERE job_id = ?`).run(jobId).changes,
      logs: db.prepare(`DELETE FROM execution_logs WHERE job_id = ?`).run(jobId).changes,
    };
    db.prepare(`DELETE FROM executions WHERE id = ?`).run(current.id);
    return summary;
  });
  const summary = remove();
  log.info('Execution deleted', { ...summary });
  return summary;
}

export interface FinalizeResult {
  execution: ExecutionRecord;
  /** Tasks still RUNNING when the engine returned, now FAILED. */
  abandoned: TaskStatusRecord[];
}

/**
 * Settle an execution once its engine returned. Tasks still RUNNING are
 * failed first, so the execution only turns terminal after all its tasks.
 * With FAILED tasks the execution fails unless the policy allows partial
 * failure and the engine produced a result. An execution that is already
 * terminal (cancelled meanwhile) is left untouched.
 */
export function finalizeExecution(
  db: Database.Database,
  jobId: string,
  outcome: Result<unknown, EngineError>,
  policy: Pick<ExecutionPolicy, 'allowPartialFailure'>,
): FinalizeResult | null {
  const finalize = db.transaction((): FinalizeResult | null => {
    const current = getExecution(db, jobId);
    if (!current) return null;
    if (isTerminalStatus(current.status)) {
      log.info('Execution already terminal, keeping status', {
        job_id: jobId,
        status: current.status,
      });
      return { execution: current, abandoned: [] };
    }

    const abandoned: TaskStatusRecord[] = [];
    for (const taskKey of runningTaskKeys(db, jobId)) {
      const moved = transitionTask(db, jobId, taskKey, 'FAILED');
      if (!moved.ok) continue;
      abandoned.push(moved.value);
      recordErrorTrace(db, jobId, {
        taskKey,
        errorType: outcome.ok ? 'IncompleteTask' : outcome.error.name,
        message: outcome.ok ? 'Engine finished without completing this task' : outcome.error.message,
      });
    }
    if (!outcome.ok) {
      recordErrorTrace(db, jobId, {
        taskKey: null,
        errorType: outcome.error.name,
        message: outcome.error.message,
        metadata: outcome.error.context,
      });
    }

    if (current.status === 'PENDING') {
      updateExecutionStatus(db, jobId, 'RUNNING', 'Execution started');
    }

    let execution: ExecutionRecord | null;
    if (!outcome.ok) {
      execution = updateExecutionStatus(db, jobId, 'FAILED', outcome.error.message);
    } else {
      const { failed } = taskRollup(db, jobId);
      const hasResult = normalizeResult(outcome.value) !== null;
      if (failed === 0) {
        execution = updateExecutionStatus(db, jobId, 'COMPLETED', 'Execution completed', outcome.value);
      } else if (policy.allowPartialFailure && hasResult) {
        execution = updateExecutionStatus(
          db,
          jobId,
          'COMPLETED',
          `Execution completed with ${failed} failed task(s)`,
          outcome.value,
        );
      } else {
        execution = updateExecutionStatus(
          db,
          jobId,
          'FAILED',
          `${failed} task(s) failed: ${failedTaskKeys(db, jobId).join(', ')}`,
          outcome.value,
        );
      }
    }
    return execution ? { execution, abandoned } : null;
  });
  return finalize();
}
