export * from './shared/errors.js';
export { ok, err } from './shared/result.js';
export type { Result } from './shared/result.js';
export { createLogger, setLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';

export { prepareFlow, planTaskKeys, selectBranch } from './flow/prepare.js';
export * from './flow/types.js';

export {
  createTaskStatuses,
  transitionTask,
  listTaskStatuses,
  taskRollup,
  allTasksTerminal,
} from './tracking/task-status.js';
export { recordErrorTrace, listErrorTraces } from './tracking/error-traces.js';
export * from './tracking/types.js';

export { validateOutput, applyGuardrail } from './guardrails/engine.js';
export { createGuardrail, parseGuardrailConfig } from './guardrails/factory.js';
export { SqliteRecordSource } from './guardrails/records.js';
export type { RecordSource } from './guardrails/records.js';
export type { Guardrail, GuardrailResult, GuardrailContext, TaskOutput } from './guardrails/types.js';

export { EventBroadcaster, BroadcastSession } from './events/broadcaster.js';
export { builtInObservers } from './events/observers/index.js';
export { LogHub } from './events/observers/streaming.js';
export * from './events/types.js';

export {
  createExecution,
  updateExecutionStatus,
  cancelExecution,
  deleteExecution,
  getExecution,
  listExecutions,
  finalizeExecution,
} from './execution/status.js';
export { startExecution, driveExecution, runExecution } from './execution/runner.js';
export type { RunnerContext, ExecutionRequest } from './execution/runner.js';
export { DryRunEngine } from './execution/dry-run.js';
export type { ExecutionEngine, EngineSession, SubmitVerdict } from './execution/engine.js';
export { ExecutionPool } from './execution/pool.js';
export { Orchestrator, createOrchestrator, createRunnerContext } from './execution/orchestrator.js';
export * from './execution/types.js';

export { nextRunTime, nextRunTimes, isValidCron } from './scheduler/cron.js';
export {
  createSchedule,
  updateSchedule,
  deleteSchedule,
  toggleSchedule,
  listSchedules,
  getSchedule,
} from './scheduler/schedules.js';
export { SchedulerLoop } from './scheduler/loop.js';

export { createServer, startServer } from './api/server.js';
export { openDb, applySchema, closeDb } from './workspace/db.js';
export { initWorkspace } from './workspace/init.js';
