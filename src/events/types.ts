import type Database from 'better-sqlite3';

export type ExecutionEventType =
  | 'execution_started'
  | 'status_changed'
  | 'task_started'
  | 'agent_step'
  | 'task_output'
  | 'guardrail_rejected'
  | 'task_completed'
  | 'task_failed'
  | 'execution_completed'
  | 'execution_failed'
  | 'execution_cancelled';

export interface ExecutionEvent {
  /** Position of the event within its execution, starting at 1. */
  seq: number;
  jobId: string;
  type: ExecutionEventType;
  taskKey: string | null;
  agentName: string | null;
  payload: Record<string, unknown>;
  at: string;
}

export type RaisedEvent = Pick<ExecutionEvent, 'type'> &
  Partial<Pick<ExecutionEvent, 'taskKey' | 'agentName' | 'payload'>>;

/** Receives every event of the execution it was created for. */
export interface EventSink {
  onEvent(event: ExecutionEvent): void | Promise<void>;
}

/** Releases whatever the observer holds once the execution is over. */
export interface Closeable {
  close(): void | Promise<void>;
}

export interface Observer extends EventSink, Closeable {
  readonly name: string;
}

export interface ObserverContext {
  jobId: string;
  db: Database.Database;
  runName: string | null;
}

/** Builds one observer per execution. */
export interface Initializable {
  readonly name: string;
  init(ctx: ObserverContext): Observer | Promise<Observer>;
}
