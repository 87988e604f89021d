import type Database from 'better-sqlite3';
import { safeStringify } from '../../shared/redact.js';
import type { ExecutionEvent, Initializable, Observer } from '../types.js';

export interface TraceRecord {
  id: number;
  job_id: string;
  seq: number;
  event_type: string;
  task_key: string | null;
  agent_name: string | null;
  payload: unknown;
  created_at: string;
}

interface TraceRow extends Omit<TraceRecord, 'payload'> {
  payload_json: string;
}

/** Persists every event as an execution_traces row. */
export class TracingObserver implements Observer {
  readonly name = 'tracing';
  private readonly insert: Database.Statement;

  constructor(db: Database.Database) {
    this.insert = db.prepare(`
      INSERT INTO execution_traces (job_id, seq, event_type, task_key, agent_name, payload_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
  }

  onEvent(event: ExecutionEvent): void {
    this.insert.run(
      event.jobId,
      event.seq,
      event.type,
      event.taskKey,
      event.agentName,
      safeStringify(event.payload),
      event.at,
    );
  }

  close(): void {}
}

export const tracingObserver: Initializable = {
  name: 'tracing',
  init: (ctx) => new TracingObserver(ctx.db),
};

export function listTraces(db: Database.Database, jobId: string): TraceRecord[] {
  const rows = db
    .prepare(`SELECT * FROM execution_traces WHERE job_id = ? ORDER BY seq ASC`)
    .all(jobId) as TraceRow[];
  return rows.map(({ payload_json, ...rest }) => {
    const payload: unknown = JSON.parse(payload_json);
    return { ...rest, payload };
  });
}
