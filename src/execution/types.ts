export type ExecutionStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED' | 'CANCELLED';
export type TerminalStatus = Extract<ExecutionStatus, 'COMPLETED' | 'FAILED' | 'CANCELLED'>;
export type TriggerType = 'api' | 'cli' | 'scheduled';

export const EXECUTION_STATUSES: readonly ExecutionStatus[] = [
  'PENDING',
  'RUNNING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
];

export function isTerminalStatus(status: ExecutionStatus): status is TerminalStatus {
  return status === 'COMPLETED' || status === 'FAILED' || status === 'CANCELLED';
}

export function isExecutionStatus(value: unknown): value is ExecutionStatus {
  return EXECUTION_STATUSES.some((s) => s === value);
}

/** What an execution runs: the flow definition and its inputs. */
export interface JobConfig {
  definition: unknown;
  inputs: Record<string, unknown>;
}

export interface ExecutionRecord {
  id: number;
  job_id: string;
  status: ExecutionStatus;
  run_name: string | null;
  trigger_type: TriggerType;
  schedule_id: string | null;
  inputs: JobConfig;
  result: Record<string, unknown> | null;
  error: string | null;
  message: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

export interface CreateExecutionOptions {
  config: JobConfig;
  runName?: string | null;
  triggerType?: TriggerType;
  scheduleId?: string | null;
}

export interface ExecutionPolicy {
  /** Let an execution complete with FAILED tasks when the engine produced a result. */
  allowPartialFailure: boolean;
  /** Guardrail retries for tasks that set no max_retries of their own. */
  defaultMaxRetries: number;
}

export const DEFAULT_POLICY: ExecutionPolicy = {
  allowPartialFailure: false,
  defaultMaxRetries: 3,
};
