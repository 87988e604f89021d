import type Database from 'better-sqlite3';
import { ConflictError, EngineError, GuardrailFailure, NotFoundError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { generateJobId } from '../shared/ids.js';
import { ok, err } from '../shared/result.js';
import type { Result } from '../shared/result.js';
import { prepareFlow, taskDef } from '../flow/prepare.js';
import type { PreparedFlow } from '../flow/types.js';
import { createTaskStatuses, getTaskStatus, transitionTask } from '../tracking/task-status.js';
import { recordErrorTrace } from '../tracking/error-traces.js';
import { validateOutput } from '../guardrails/engine.js';
import { PASS } from '../guardrails/types.js';
import type { RecordSource } from '../guardrails/records.js';
import type { EventBroadcaster } from '../events/broadcaster.js';
import type { ExecutionEventType, RaisedEvent } from '../events/types.js';
import { createExecution, finalizeExecution, getExecution, updateExecutionStatus } from './status.js';
import type { EngineSession, ExecutionEngine, SubmitVerdict } from './engine.js';
import type {
  ExecutionPolicy,
  ExecutionRecord,
  ExecutionStatus,
  TriggerType,
} from './types.js';

const log = createLogger('executions');

export interface RunnerContext {
  db: Database.Database;
  engine: ExecutionEngine;
  broadcaster: EventBroadcaster;
  /** Backing store for the record-count guardrails. */
  records?: RecordSource;
  policy: ExecutionPolicy;
}

export interface ExecutionRequest {
  definition: unknown;
  inputs?: Record<string, unknown>;
  runName?: string | null;
  triggerType?: TriggerType;
  scheduleId?: string | null;
  /** Reuse a caller-chosen job id; one is generated otherwise. */
  jobId?: string;
}

export interface StartedExecution {
  execution: ExecutionRecord;
  flow: PreparedFlow;
}

const TERMINAL_EVENTS: Partial<Record<ExecutionStatus, ExecutionEventType>> = {
  COMPLETED: 'execution_completed',
  FAILED: 'execution_failed',
  CANCELLED: 'execution_cancelled',
};

/**
 * Validate the definition and create the PENDING execution. An invalid
 * definition throws ConfigError before any row is written.
 */
export function startExecution(ctx: RunnerContext, request: ExecutionRequest): StartedExecution {
  const flow = prepareFlow(request.definition);
  const jobId = request.jobId ?? generateJobId();
  const execution = createExecution(ctx.db, jobId, {
    config: { definition: request.definition, inputs: request.inputs ?? {} },
    runName: request.runName ?? null,
    triggerType: request.triggerType ?? 'api',
    scheduleId: request.scheduleId ?? null,
  });
  if (execution.status !== 'PENDING') {
    throw new ConflictError(`Execution ${jobId} is already ${execution.status}`, { job_id: jobId });
  }
  log.info('Execution created', {
    job_id: jobId,
    trigger: execution.trigger_type,
    tasks: flow.tasks.size,
    plan: flow.plan.type,
  });
  return { execution, flow };
}

/**
 * Run a started execution on the engine and settle it. Task rows are
 * created as the engine starts tasks; every candidate output goes through
 * the task's guardrail. Observers are cleaned up whatever the outcome.
 */
export async function driveExecution(
  ctx: RunnerContext,
  started: StartedExecution,
  signal: AbortSignal = new AbortController().signal,
): Promise<ExecutionRecord> {
  const { db } = ctx;
  const { execution, flow } = started;
  const jobId = execution.job_id;
  const session = await ctx.broadcaster.init({ jobId, db, runName: execution.run_name });
  const raise = (event: RaisedEvent): void => {
    ctx.broadcaster.dispatch(session, event);
  };
  const attempts = new Map<string, number>();

  const markRunning = (): void => {
    if (getExecution(db, jobId)?.status !== 'PENDING') return;
    updateExecutionStatus(db, jobId, 'RUNNING', 'Execution started');
    raise({ type: 'status_changed', payload: { status: 'RUNNING', message: 'Execution started' } });
  };

  const dispatchTask = (taskKey: string): boolean => {
    if (!flow.tasks.has(taskKey)) {
      log.warn('Ignoring start of a task the flow does not define', { job_id: jobId, task_key: taskKey });
      return false;
    }
    markRunning();
    try {
      createTaskStatuses(db, jobId, [taskDef(flow, taskKey)]);
      return true;
    } catch (e) {
      if (!(e instanceof ConflictError)) throw e;
      log.warn(e.message, e.context);
      return false;
    }
  };

  const failTask = (
    taskKey: string,
    errorType: string,
    message: string,
    metadata: Record<string, unknown> = {},
  ): void => {
    const moved = transitionTask(db, jobId, taskKey, 'FAILED');
    if (!moved.ok) return;
    recordErrorTrace(db, jobId, { taskKey, errorType, message, metadata });
    raise({
      type: 'task_failed',
      taskKey,
      agentName: moved.value.agent_name,
      payload: { message, error_type: errorType },
    });
  };

  const submitOutput = (taskKey: string, output: unknown): SubmitVerdict => {
    const task = flow.tasks.get(taskKey);
    if (!task) return { accepted: false, feedback: `Unknown task ${taskKey}`, exhausted: true };
    if (!getTaskStatus(db, jobId, taskKey)) dispatchTask(taskKey);
    const row = getTaskStatus(db, jobId, taskKey);
    if (!row || row.status !== 'RUNNING') {
      return {
        accepted: false,
        feedback: `Task ${taskKey} is already ${row?.status ?? 'gone'}`,
        exhausted: true,
      };
    }

    const attempt = (attempts.get(taskKey) ?? 0) + 1;
    attempts.set(taskKey, attempt);
    raise({ type: 'task_output', taskKey, agentName: task.agent, payload: { attempt } });

    const verdict =
      task.guardrail === undefined
        ? PASS
        : validateOutput(output, task.guardrail, { records: ctx.records });
    if (verdict.valid) {
      const moved = transitionTask(db, jobId, taskKey, 'COMPLETED');
      if (moved.ok) {
        raise({ type: 'task_completed', taskKey, agentName: task.agent, payload: { attempt } });
      }
      return { accepted: true };
    }

    const maxRetries = task.max_retries ?? ctx.policy.defaultMaxRetries;
    const exhausted = attempt > maxRetries;
    raise({
      type: 'guardrail_rejected',
      taskKey,
      agentName: task.agent,
      payload: { attempt, message: verdict.feedback },
    });
    if (exhausted) {
      const failure = new GuardrailFailure(verdict.feedback, { attempts: attempt });
      failTask(taskKey, failure.name, failure.message, failure.context);
    }
    return { accepted: false, feedback: verdict.feedback, exhausted };
  };

  const engineSession: EngineSession = {
    jobId,
    inputs: execution.inputs.inputs,
    signal,
    emit: (event) => {
      switch (event.type) {
        case 'task_started':
          if (dispatchTask(event.taskKey)) {
            raise({
              type: 'task_started',
              taskKey: event.taskKey,
              agentName: event.agentName ?? taskDef(flow, event.taskKey).agentName,
              payload: event.payload,
            });
          }
          break;
        case 'agent_step':
          raise({
            type: 'agent_step',
            taskKey: event.taskKey,
            agentName: event.agentName ?? null,
            payload: event.payload,
          });
          break;
        case 'task_failed': {
          const message = event.payload?.['message'];
          failTask(
            event.taskKey,
            'EngineError',
            typeof message === 'string' ? message : 'Task failed in engine',
            event.payload,
          );
          break;
        }
      }
    },
    submitOutput,
  };

  try {
    raise({
      type: 'execution_started',
      payload: { message: execution.run_name ?? flow.plan.type, trigger: execution.trigger_type },
    });

    let outcome: Result<unknown, EngineError>;
    try {
      outcome = ok(await ctx.engine.run(flow, engineSession));
    } catch (e) {
      outcome = err(EngineError.from(e));
    }

    const settled = finalizeExecution(db, jobId, outcome, ctx.policy);
    if (!settled) throw new NotFoundError(`Execution ${jobId} not found`);
    for (const task of settled.abandoned) {
      raise({
        type: 'task_failed',
        taskKey: task.task_key,
        agentName: task.agent_name,
        payload: { message: 'Task did not complete before the execution ended' },
      });
    }
    const terminal = TERMINAL_EVENTS[settled.execution.status];
    if (terminal) {
      raise({
        type: terminal,
        payload: { status: settled.execution.status, message: settled.execution.message ?? '' },
      });
    }
    return settled.execution;
  } finally {
    await ctx.broadcaster.cleanup(session);
  }
}

/** Start and drive an execution to its end in one call. */
export async function runExecution(
  ctx: RunnerContext,
  request: ExecutionRequest,
  signal?: AbortSignal,
): Promise<ExecutionRecord> {
  const started = startExecution(ctx, request);
  return driveExecution(ctx, started, signal);
}
