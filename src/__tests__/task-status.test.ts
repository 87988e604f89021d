import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import {
  allTasksTerminal,
  createTaskStatuses,
  failedTaskKeys,
  getTaskStatus,
  listTaskStatuses,
  runningTaskKeys,
  taskRollup,
  transitionTask,
} from '../tracking/task-status.js';
import { listErrorTraces, recordErrorTrace } from '../tracking/error-traces.js';
import { createExecution } from '../execution/status.js';
import { ConflictError, NotFoundError, StateError } from '../shared/errors.js';
import { createTestDb } from './test-helpers.js';

const T1 = { taskKey: 'T1', agentName: 'A' };
const T2 = { taskKey: 'T2', agentName: 'A' };

describe('task status tracking', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    createExecution(db, 'job-1', { config: { definition: {}, inputs: {} } });
  });

  afterEach(() => {
    db.close();
  });

  it('creates one RUNNING row per dispatched task', () => {
    const rows = createTaskStatuses(db, 'job-1', [T1, T2]);
    expect(rows.map((r) => [r.task_key, r.agent_name, r.status])).toEqual([
      ['T1', 'A', 'RUNNING'],
      ['T2', 'A', 'RUNNING'],
    ]);
    expect(rows[0]?.started_at).toBe(rows[1]?.started_at);
    expect(listTaskStatuses(db, 'job-1')).toHaveLength(2);
    expect(allTasksTerminal(db, 'job-1')).toBe(false);
  });

  it('reports all tasks terminal once every task has finished', () => {
    createTaskStatuses(db, 'job-1', [T1, T2]);
    transitionTask(db, 'job-1', 'T1', 'COMPLETED');
    expect(allTasksTerminal(db, 'job-1')).toBe(false);
    transitionTask(db, 'job-1', 'T2', 'COMPLETED');
    expect(allTasksTerminal(db, 'job-1')).toBe(true);
    expect(taskRollup(db, 'job-1')).toEqual({ total: 2, running: 0, completed: 2, failed: 0 });
  });

  it('treats a job without tasks as terminal', () => {
    expect(allTasksTerminal(db, 'job-1')).toBe(true);
    expect(taskRollup(db, 'job-1')).toEqual({ total: 0, running: 0, completed: 0, failed: 0 });
  });

  it('refuses to dispatch a task twice', () => {
    createTaskStatuses(db, 'job-1', [T1]);
    expect(() => createTaskStatuses(db, 'job-1', [T2, T1])).toThrow(ConflictError);
    expect(listTaskStatuses(db, 'job-1').map((r) => r.task_key)).toEqual(['T1']);
  });

  it('writes nothing when a batch repeats a key', () => {
    expect(() => createTaskStatuses(db, 'job-1', [T1, T1])).toThrow(
      'Task T1 already dispatched for execution job-1',
    );
    expect(listTaskStatuses(db, 'job-1')).toEqual([]);
  });

  it('requires the execution to exist', () => {
    expect(() => createTaskStatuses(db, 'job-404', [T1])).toThrow(NotFoundError);
  });

  it('stamps completed_at strictly after started_at', () => {
    createTaskStatuses(db, 'job-1', [T1]);
    const moved = transitionTask(db, 'job-1', 'T1', 'FAILED');
    if (!moved.ok) throw moved.error;
    expect(moved.value.status).toBe('FAILED');
    expect(moved.value.completed_at).not.toBeNull();
    expect((moved.value.completed_at ?? '') > moved.value.started_at).toBe(true);
  });

  it('never changes a terminal task', () => {
    createTaskStatuses(db, 'job-1', [T1]);
    transitionTask(db, 'job-1', 'T1', 'COMPLETED');
    const again = transitionTask(db, 'job-1', 'T1', 'FAILED');
    expect(again.ok).toBe(false);
    if (again.ok) return;
    expect(again.error).toBeInstanceOf(StateError);
    expect(again.error.message).toBe('Task T1 is already COMPLETED; ignoring FAILED');
    expect(getTaskStatus(db, 'job-1', 'T1')?.status).toBe('COMPLETED');
  });

  it('keeps a RUNNING task as it is when asked to run again', () => {
    createTaskStatuses(db, 'job-1', [T1]);
    const same = transitionTask(db, 'job-1', 'T1', 'RUNNING');
    expect(same.ok && same.value.status).toBe('RUNNING');
    expect(getTaskStatus(db, 'job-1', 'T1')?.completed_at).toBeNull();
  });

  it('reports a missing task as not found', () => {
    const missing = transitionTask(db, 'job-1', 'T9', 'COMPLETED');
    expect(!missing.ok && missing.error).toBeInstanceOf(NotFoundError);
  });

  it('lists running and failed keys', () => {
    createTaskStatuses(db, 'job-1', [T1, T2]);
    transitionTask(db, 'job-1', 'T2', 'FAILED');
    expect(runningTaskKeys(db, 'job-1')).toEqual(['T1']);
    expect(failedTaskKeys(db, 'job-1')).toEqual(['T2']);
  });
});

describe('error traces', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    createExecution(db, 'job-1', { config: { definition: {}, inputs: {} } });
  });

  afterEach(() => {
    db.close();
  });

  it('records traces against the execution', () => {
    const trace = recordErrorTrace(db, 'job-1', {
      taskKey: 'T1',
      errorType: 'GuardrailFailure',
      message: 'too few companies',
      metadata: { attempts: 2 },
    });
    expect(trace?.job_id).toBe('job-1');

    const traces = listErrorTraces(db, 'job-1');
    expect(traces).toHaveLength(1);
    expect(traces[0]).toMatchObject({
      job_id: 'job-1',
      task_key: 'T1',
      error_type: 'GuardrailFailure',
      error_message: 'too few companies',
      metadata: { attempts: 2 },
    });
  });

  it('drops a trace for an unknown execution without throwing', () => {
    expect(
      recordErrorTrace(db, 'job-404', { taskKey: null, errorType: 'EngineError', message: 'boom' }),
    ).toBeNull();
    expect(listErrorTraces(db, 'job-404')).toEqual([]);
  });
});
