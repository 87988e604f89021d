export type TaskState = 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface TaskStatusRecord {
  id: number;
  job_id: string;
  task_key: string;
  agent_name: string | null;
  status: TaskState;
  started_at: string;
  completed_at: string | null;
}

export interface TaskRollup {
  total: number;
  running: number;
  completed: number;
  failed: number;
}

export interface ErrorTraceInput {
  taskKey: string | null;
  errorType: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface ErrorTraceRecord {
  id: number;
  job_id: string;
  task_key: string | null;
  error_type: string;
  error_message: string;
  metadata: Record<string, unknown>;
  created_at: string;
}
