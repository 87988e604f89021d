import type Database from 'better-sqlite3';
import { createLogger, errorMessage } from '../../shared/logger.js';
import type { ExecutionEvent, Initializable, Observer } from '../types.js';

const log = createLogger('observers');

export interface LogLine {
  jobId: string;
  seq: number;
  content: string;
  at: string;
}

export interface ExecutionLogRecord {
  id: number;
  job_id: string;
  seq: number;
  content: string;
  created_at: string;
}

export type LogListener = (line: LogLine) => void;

/** In-process fan-out of log lines to live subscribers (CLI follow mode, tests). */
export class LogHub {
  private readonly listeners = new Map<string, Set<LogListener>>();

  subscribe(jobId: string, listener: LogListener): () => void {
    let set = this.listeners.get(jobId);
    if (!set) {
      set = new Set();
      this.listeners.set(jobId, set);
    }
    set.add(listener);
    return () => {
      const current = this.listeners.get(jobId);
      current?.delete(listener);
      if (current && current.size === 0) this.listeners.delete(jobId);
    };
  }

  publish(line: LogLine): void {
    for (const listener of this.listeners.get(line.jobId) ?? []) {
      try {
        listener(line);
      } catch (e) {
        log.warn('Log subscriber failed', { job_id: line.jobId, error: errorMessage(e) });
      }
    }
  }
}

export function formatEvent(event: ExecutionEvent): string {
  const subject = event.taskKey ? ` ${event.taskKey}` : '';
  const agent = event.agentName ? ` (${event.agentName})` : '';
  const message = event.payload['message'];
  const detail = typeof message === 'string' && message.length > 0 ? `: ${message}` : '';
  return `[${event.type}]${subject}${agent}${detail}`;
}

/** Writes a readable line per event to execution_logs and the hub. */
export class StreamingObserver implements Observer {
  readonly name = 'streaming';
  private readonly insert: Database.Statement;

  constructor(
    db: Database.Database,
    private readonly hub: LogHub | null,
  ) {
    this.insert = db.prepare(
      `INSERT INTO execution_logs (job_id, seq, content, created_at) VALUES (?, ?, ?, ?)`,
    );
  }

  onEvent(event: ExecutionEvent): void {
    const line: LogLine = { jobId: event.jobId, seq: event.seq, content: formatEvent(event), at: event.at };
    this.insert.run(line.jobId, line.seq, line.content, line.at);
    this.hub?.publish(line);
  }

  close(): void {}
}

export function streamingObserver(hub: LogHub | null = null): Initializable {
  return {
    name: 'streaming',
    init: (ctx) => new StreamingObserver(ctx.db, hub),
  };
}

export function listExecutionLogs(
  db: Database.Database,
  jobId: string,
  afterSeq = 0,
): ExecutionLogRecord[] {
  return db
    .prepare(`SELECT * FROM execution_logs WHERE job_id = ? AND seq > ? ORDER BY seq ASC`)
    .all(jobId, afterSeq) as ExecutionLogRecord[];
}
