import type Database from 'better-sqlite3';
import { createLogger, errorMessage } from '../shared/logger.js';
import { safeStringify } from '../shared/redact.js';
import type { ErrorTraceInput, ErrorTraceRecord } from './types.js';

const log = createLogger('tasks');

interface ErrorTraceRow {
  id: number;
  job_id: string;
  task_key: string | null;
  error_type: string;
  error_message: string;
  metadata_json: string;
  created_at: string;
}

function parseMetadata(json: string): Record<string, unknown> {
  const value: unknown = JSON.parse(json);
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : { value };
}

function fromRow(row: ErrorTraceRow): ErrorTraceRecord {
  return {
    id: row.id,
    job_id: row.job_id,
    task_key: row.task_key,
    error_type: row.error_type,
    error_message: row.error_message,
    metadata: parseMetadata(row.metadata_json),
    created_at: row.created_at,
  };
}

/**
 * Append an error trace. Never throws: a failed write is logged and
 * reported as null so the caller's flow continues.
 */
export function recordErrorTrace(
  db: Database.Database,
  jobId: string,
  trace: ErrorTraceInput,
): ErrorTraceRecord | null {
  try {
    const createdAt = new Date().toISOString();
    const metadataJson = safeStringify(trace.metadata ?? {});
    const info = db
      .prepare(
        `INSERT INTO error_traces (execution_id, task_key, error_type, error_message, metadata_json, created_at)
         SELECT id, ?, ?, ?, ?, ? FROM executions WHERE job_id = ?`,
      )
      .run(trace.taskKey, trace.errorType, trace.message, metadataJson, createdAt, jobId);
    if (info.changes === 0) {
      log.warn('Error trace dropped: execution not found', { job_id: jobId, error_type: trace.errorType });
      return null;
    }
    return {
      id: Number(info.lastInsertRowid),
      job_id: jobId,
      task_key: trace.taskKey,
      error_type: trace.errorType,
      error_message: trace.message,
      metadata: parseMetadata(metadataJson),
      created_at: createdAt,
    };
  } catch (e) {
    log.error('Failed to record error trace', {
      job_id: jobId,
      error_type: trace.errorType,
      error: errorMessage(e),
    });
    return null;
  }
}

export function listErrorTraces(db: Database.Database, jobId: string): ErrorTraceRecord[] {
  const rows = db
    .prepare(
      `SELECT t.id, e.job_id, t.task_key, t.error_type, t.error_message, t.metadata_json, t.created_at
       FROM error_traces t JOIN executions e ON e.id = t.execution_id
       WHERE e.job_id = ? ORDER BY t.id ASC`,
    )
    .all(jobId) as ErrorTraceRow[];
  return rows.map(fromRow);
}
