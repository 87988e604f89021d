import type { PreparedFlow } from '../flow/types.js';

/** What the engine reports about a task while it works on it. */
export interface EngineTaskEvent {
  taskKey: string;
  type: 'task_started' | 'agent_step' | 'task_failed';
  agentName?: string | null;
  payload?: Record<string, unknown>;
}

export type SubmitVerdict =
  | { accepted: true }
  | { accepted: false; feedback: string; exhausted: boolean };

/**
 * The orchestrator's side of one execution, handed to the engine. The
 * engine reports progress through `emit` and hands every candidate task
 * output to `submitOutput`, which applies the task's guardrail and returns
 * feedback for a retry.
 */
export interface EngineSession {
  readonly jobId: string;
  readonly inputs: Readonly<Record<string, unknown>>;
  /** Aborted when the execution is cancelled. */
  readonly signal: AbortSignal;
  emit(event: EngineTaskEvent): void;
  submitOutput(taskKey: string, output: unknown): SubmitVerdict;
}

/**
 * Runs a prepared flow. Resolves with the overall result, or rejects when
 * the run as a whole failed.
 */
export interface ExecutionEngine {
  readonly name: string;
  run(flow: PreparedFlow, session: EngineSession): Promise<unknown>;
}
