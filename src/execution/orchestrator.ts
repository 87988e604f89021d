import type Database from 'better-sqlite3';
import { EventBroadcaster } from '../events/broadcaster.js';
import { builtInObservers } from '../events/observers/index.js';
import type { LogHub } from '../events/observers/streaming.js';
import { SqliteRecordSource } from '../guardrails/records.js';
import type { WorkspaceConfig } from '../workspace/types.js';
import { ConflictError } from '../shared/errors.js';
import { DryRunEngine } from './dry-run.js';
import type { ExecutionEngine } from './engine.js';
import { ExecutionPool } from './pool.js';
import { driveExecution, startExecution } from './runner.js';
import type { ExecutionRequest, RunnerContext } from './runner.js';
import { cancelExecution, deleteExecution } from './status.js';
import type { DeleteSummary } from './status.js';
import type { ExecutionRecord } from './types.js';

/**
 * Entry point for everything that starts or stops executions (REST API,
 * CLI, scheduler). Validation and the PENDING row happen synchronously;
 * the run itself goes to the pool.
 */
export class Orchestrator {
  constructor(
    readonly ctx: RunnerContext,
    private readonly pool: ExecutionPool,
  ) {}

  get db(): Database.Database {
    return this.ctx.db;
  }

  launch(request: ExecutionRequest): ExecutionRecord {
    const started = startExecution(this.ctx, request);
    this.pool.submit(started.execution.job_id, (signal) => driveExecution(this.ctx, started, signal));
    return started.execution;
  }

  cancel(jobId: string, reason?: string): ExecutionRecord {
    const cancelled = cancelExecution(this.ctx.db, jobId, reason);
    this.pool.cancel(jobId);
    return cancelled;
  }

  /**
   * Delete an execution. A job still waiting in the pool is withdrawn first;
   * one whose run has started must end before its rows can go.
   */
  delete(jobId: string): DeleteSummary {
    if (!this.pool.withdraw(jobId)) {
      throw new ConflictError(`Execution ${jobId} is still running in the background`);
    }
    return deleteExecution(this.ctx.db, jobId);
  }

  isActive(jobId: string): boolean {
    return this.pool.has(jobId);
  }

  drain(): Promise<void> {
    return this.pool.drain();
  }
}

export interface OrchestratorOptions {
  engine?: ExecutionEngine;
  hub?: LogHub | null;
}

/** Runner context wired from the workspace config. */
export function createRunnerContext(
  db: Database.Database,
  config: WorkspaceConfig,
  opts: OrchestratorOptions = {},
): RunnerContext {
  return {
    db,
    engine: opts.engine ?? new DryRunEngine(),
    broadcaster: new EventBroadcaster(builtInObservers(config.observers, opts.hub ?? null)),
    records: new SqliteRecordSource(db, config.records.table),
    policy: {
      allowPartialFailure: config.execution.allow_partial_failure,
      defaultMaxRetries: config.execution.default_max_retries,
    },
  };
}

export function createOrchestrator(
  db: Database.Database,
  config: WorkspaceConfig,
  opts: OrchestratorOptions = {},
): Orchestrator {
  return new Orchestrator(
    createRunnerContext(db, config, opts),
    new ExecutionPool(config.execution.max_concurrent),
  );
}
