import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import {
  cancelExecution,
  createExecution,
  deleteExecution,
  finalizeExecution,
  getExecution,
  listExecutions,
  normalizeResult,
  updateExecutionStatus,
} from '../execution/status.js';
import { createTaskStatuses, getTaskStatus, transitionTask } from '../tracking/task-status.js';
import { listErrorTraces, recordErrorTrace } from '../tracking/error-traces.js';
import { ConflictError, EngineError, NotFoundError, StateError } from '../shared/errors.js';
import { ok, err } from '../shared/result.js';
import { createTestDb } from './test-helpers.js';

const config = { definition: { flow: 'test' }, inputs: { region: 'CH' } };
const STRICT = { allowPartialFailure: false };
const PARTIAL = { allowPartialFailure: true };

describe('execution status', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  function runningJob(jobId: string, tasks: string[] = []): void {
    createExecution(db, jobId, { config });
    updateExecutionStatus(db, jobId, 'RUNNING', 'Execution started');
    if (tasks.length > 0) {
      createTaskStatuses(db, jobId, tasks.map((taskKey) => ({ taskKey, agentName: 'A' })));
    }
  }

  describe('createExecution', () => {
    it('creates a PENDING execution', () => {
      const e = createExecution(db, 'job-1', { config, runName: 'nightly', triggerType: 'cli' });
      expect(e).toMatchObject({
        job_id: 'job-1',
        status: 'PENDING',
        run_name: 'nightly',
        trigger_type: 'cli',
        inputs: config,
        result: null,
        completed_at: null,
      });
      expect(getExecution(db, 'job-1')).toEqual(e);
    });

    it('returns the stored execution when called again', () => {
      createExecution(db, 'job-1', { config, runName: 'first' });
      const again = createExecution(db, 'job-1', { config, runName: 'second' });
      expect(again.run_name).toBe('first');
      expect(listExecutions(db)).toHaveLength(1);
    });

    it('keeps inputs with secret-looking keys as given', () => {
      const withSecrets = {
        definition: { flow: 'test' },
        inputs: { token: 'test-token', api_key: 'test-key', password: 'test-password' },
      };
      const e = createExecution(db, 'job-1', { config: withSecrets });
      expect(e.inputs).toEqual(withSecrets);
      expect(getExecution(db, 'job-1')?.inputs).toEqual(withSecrets);
    });
  });

  describe('updateExecutionStatus', () => {
    it('sets started_at when the execution starts running', () => {
      createExecution(db, 'job-1', { config });
      const e = updateExecutionStatus(db, 'job-1', 'RUNNING', 'Execution started');
      expect(e?.status).toBe('RUNNING');
      expect(e?.started_at).not.toBeNull();
      expect(e?.completed_at).toBeNull();
    });

    it('stores a normalized result and a completion time on success', () => {
      runningJob('job-1');
      const e = updateExecutionStatus(db, 'job-1', 'COMPLETED', 'Execution completed', 'done');
      expect(e?.result).toEqual({ value: 'done' });
      expect(e?.error).toBeNull();
      expect((e?.completed_at ?? '') > (e?.created_at ?? '')).toBe(true);
    });

    it('stores a result with shared objects and secret-looking keys unchanged', () => {
      runningJob('job-1');
      const shared = { n: 1 };
      const e = updateExecutionStatus(db, 'job-1', 'COMPLETED', 'Execution completed', {
        a: shared,
        b: shared,
        secret: 'test-secret',
      });
      const expected = { a: { n: 1 }, b: { n: 1 }, secret: 'test-secret' };
      expect(e?.result).toEqual(expected);
      expect(getExecution(db, 'job-1')?.result).toEqual(expected);
    });

    it('records the message as error on failure', () => {
      runningJob('job-1');
      const e = updateExecutionStatus(db, 'job-1', 'FAILED', 'model unavailable');
      expect(e?.error).toBe('model unavailable');
      expect(e?.message).toBe('model unavailable');
    });

    it('never leaves a terminal status', () => {
      runningJob('job-1');
      updateExecutionStatus(db, 'job-1', 'COMPLETED', 'Execution completed');
      expect(() => updateExecutionStatus(db, 'job-1', 'FAILED', 'late')).toThrow(StateError);
      expect(getExecution(db, 'job-1')?.status).toBe('COMPLETED');
    });

    it('rejects completing an execution that never started', () => {
      createExecution(db, 'job-1', { config });
      expect(() => updateExecutionStatus(db, 'job-1', 'COMPLETED', 'done')).toThrow(
        'Illegal execution transition PENDING -> COMPLETED',
      );
    });

    it('returns null for an unknown job', () => {
      expect(updateExecutionStatus(db, 'job-404', 'RUNNING', 'x')).toBeNull();
    });
  });

  describe('normalizeResult', () => {
    it('wraps non-object results', () => {
      expect(normalizeResult('text')).toEqual({ value: 'text' });
      expect(normalizeResult([1, 2])).toEqual({ items: [1, 2] });
      expect(normalizeResult(true)).toEqual({ success: true });
      expect(normalizeResult(42)).toEqual({ value: 42 });
      expect(normalizeResult({ summary: 'ok' })).toEqual({ summary: 'ok' });
      expect(normalizeResult(null)).toBeNull();
      expect(normalizeResult(undefined)).toBeNull();
      expect(normalizeResult(new Date('2026-01-01T00:00:00.000Z'))).toEqual({
        value: '"2026-01-01T00:00:00.000Z"',
      });
    });
  });

  describe('cancelExecution', () => {
    it('cancels a pending execution', () => {
      createExecution(db, 'job-1', { config });
      const e = cancelExecution(db, 'job-1', 'No longer needed');
      expect(e.status).toBe('CANCELLED');
      expect(e.message).toBe('No longer needed');
      expect(e.completed_at).not.toBeNull();
    });

    it('refuses to cancel a finished execution', () => {
      createExecution(db, 'job-1', { config });
      cancelExecution(db, 'job-1');
      expect(() => cancelExecution(db, 'job-1')).toThrow(ConflictError);
      expect(() => cancelExecution(db, 'job-1')).toThrow('Execution job-1 is already CANCELLED');
    });

    it('reports an unknown job', () => {
      expect(() => cancelExecution(db, 'job-404')).toThrow(NotFoundError);
    });
  });

  describe('deleteExecution', () => {
    it('removes the execution with its tasks and traces', () => {
      runningJob('job-1', ['T1']);
      transitionTask(db, 'job-1', 'T1', 'FAILED');
      recordErrorTrace(db, 'job-1', { taskKey: 'T1', errorType: 'EngineError', message: 'boom' });
      updateExecutionStatus(db, 'job-1', 'FAILED', 'boom');

      expect(deleteExecution(db, 'job-1')).toEqual({
        job_id: 'job-1',
        task_statuses: 1,
        error_traces: 1,
        traces: 0,
        logs: 0,
      });
      expect(getExecution(db, 'job-1')).toBeUndefined();
      expect(getTaskStatus(db, 'job-1', 'T1')).toBeUndefined();
    });

    it('refuses to delete a running execution', () => {
      runningJob('job-1');
      expect(() => deleteExecution(db, 'job-1')).toThrow(ConflictError);
    });

    it('reports an unknown job', () => {
      expect(() => deleteExecution(db, 'job-404')).toThrow(NotFoundError);
    });
  });

  describe('listExecutions', () => {
    it('lists newest first and filters by status', () => {
      createExecution(db, 'job-1', { config });
      createExecution(db, 'job-2', { config });
      createExecution(db, 'job-3', { config });
      cancelExecution(db, 'job-2');

      expect(listExecutions(db).map((e) => e.job_id)).toEqual(['job-3', 'job-2', 'job-1']);
      expect(listExecutions(db, { status: 'PENDING' }).map((e) => e.job_id)).toEqual([
        'job-3',
        'job-1',
      ]);
      expect(listExecutions(db, { limit: 1, offset: 1 }).map((e) => e.job_id)).toEqual(['job-2']);
    });
  });

  describe('finalizeExecution', () => {
    it('completes when every task completed', () => {
      runningJob('job-1', ['T1', 'T2']);
      transitionTask(db, 'job-1', 'T1', 'COMPLETED');
      transitionTask(db, 'job-1', 'T2', 'COMPLETED');

      const settled = finalizeExecution(db, 'job-1', ok('out'), STRICT);
      expect(settled?.execution.status).toBe('COMPLETED');
      expect(settled?.execution.message).toBe('Execution completed');
      expect(settled?.execution.result).toEqual({ value: 'out' });
      expect(settled?.abandoned).toEqual([]);
    });

    it('fails when a task failed and partial failure is not allowed', () => {
      runningJob('job-1', ['T1', 'T2']);
      transitionTask(db, 'job-1', 'T1', 'COMPLETED');
      transitionTask(db, 'job-1', 'T2', 'FAILED');

      const settled = finalizeExecution(db, 'job-1', ok({ summary: 'x' }), STRICT);
      expect(settled?.execution.status).toBe('FAILED');
      expect(settled?.execution.error).toBe('1 task(s) failed: T2');
    });

    it('completes with failed tasks when the policy allows it and there is a result', () => {
      runningJob('job-1', ['T1', 'T2']);
      transitionTask(db, 'job-1', 'T1', 'COMPLETED');
      transitionTask(db, 'job-1', 'T2', 'FAILED');

      const settled = finalizeExecution(db, 'job-1', ok({ summary: 'x' }), PARTIAL);
      expect(settled?.execution.status).toBe('COMPLETED');
      expect(settled?.execution.message).toBe('Execution completed with 1 failed task(s)');
      expect(settled?.execution.result).toEqual({ summary: 'x' });
    });

    it('still fails a partial run that produced no result', () => {
      runningJob('job-1', ['T1']);
      transitionTask(db, 'job-1', 'T1', 'FAILED');
      const settled = finalizeExecution(db, 'job-1', ok(null), PARTIAL);
      expect(settled?.execution.status).toBe('FAILED');
    });

    it('fails tasks the engine left running before settling', () => {
      runningJob('job-1', ['T1']);
      const settled = finalizeExecution(db, 'job-1', ok('out'), STRICT);

      expect(settled?.abandoned.map((t) => [t.task_key, t.status])).toEqual([['T1', 'FAILED']]);
      expect(getTaskStatus(db, 'job-1', 'T1')?.status).toBe('FAILED');
      expect(settled?.execution.status).toBe('FAILED');
      expect(settled?.execution.message).toBe('1 task(s) failed: T1');
      expect(listErrorTraces(db, 'job-1').map((t) => [t.task_key, t.error_type])).toEqual([
        ['T1', 'IncompleteTask'],
      ]);
    });

    it('fails on an engine error and traces it', () => {
      runningJob('job-1');
      const settled = finalizeExecution(db, 'job-1', err(new EngineError('boom')), STRICT);
      expect(settled?.execution.status).toBe('FAILED');
      expect(settled?.execution.error).toBe('boom');
      expect(listErrorTraces(db, 'job-1').map((t) => [t.task_key, t.error_type, t.error_message])).toEqual([
        [null, 'EngineError', 'boom'],
      ]);
    });

    it('leaves a cancelled execution alone', () => {
      runningJob('job-1', ['T1']);
      cancelExecution(db, 'job-1', 'stop');
      const settled = finalizeExecution(db, 'job-1', ok('late'), STRICT);
      expect(settled?.execution.status).toBe('CANCELLED');
      expect(settled?.abandoned).toEqual([]);
      expect(getTaskStatus(db, 'job-1', 'T1')?.status).toBe('RUNNING');
    });

    it('starts and completes a pending execution with no tasks', () => {
      createExecution(db, 'job-1', { config });
      const settled = finalizeExecution(db, 'job-1', ok('out'), STRICT);
      expect(settled?.execution.status).toBe('COMPLETED');
      expect(settled?.execution.started_at).not.toBeNull();
    });

    it('returns null for an unknown job', () => {
      expect(finalizeExecution(db, 'job-404', ok('x'), STRICT)).toBeNull();
    });
  });
});
