import { describe, it, expect, beforeEach, afterEach, afterAll } from '@jest/globals';
import type Database from 'better-sqlite3';
import { EventBroadcaster } from '../events/broadcaster.js';
import type { ExecutionEvent, Initializable, Observer } from '../events/types.js';
import { tracingObserver, listTraces } from '../events/observers/tracing.js';
import {
  LogHub,
  formatEvent,
  listExecutionLogs,
  streamingObserver,
} from '../events/observers/streaming.js';
import type { LogLine } from '../events/observers/streaming.js';
import { builtInObservers } from '../events/observers/index.js';
import { createExecution } from '../execution/status.js';
import { RecordingObserver, createTestDb, observerFactory } from './test-helpers.js';

function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function event(overrides: Partial<ExecutionEvent> = {}): ExecutionEvent {
  return {
    seq: 1,
    jobId: 'job-1',
    type: 'task_started',
    taskKey: null,
    agentName: null,
    payload: {},
    at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('EventBroadcaster', () => {
  const ctx = { jobId: 'job-1', db: createTestDb(), runName: null };

  afterAll(() => {
    ctx.db.close();
  });

  it('numbers events and delivers them in dispatch order', async () => {
    const recorder = new RecordingObserver();
    const broadcaster = new EventBroadcaster([observerFactory(recorder)]);
    const session = await broadcaster.init(ctx);

    broadcaster.dispatch(session, { type: 'execution_started' });
    broadcaster.dispatch(session, { type: 'task_started', taskKey: 'T1', agentName: 'A' });
    const third = broadcaster.dispatch(session, { type: 'task_completed', taskKey: 'T1' });
    await broadcaster.cleanup(session);

    expect(third?.seq).toBe(3);
    expect(recorder.events.map((e) => [e.seq, e.type, e.taskKey])).toEqual([
      [1, 'execution_started', null],
      [2, 'task_started', 'T1'],
      [3, 'task_completed', 'T1'],
    ]);
    expect(recorder.events[1]?.agentName).toBe('A');
    expect(recorder.closed).toBe(true);
  });

  it('does not let a slow observer hold up the others', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slowEvents: string[] = [];
    const slow: Observer = {
      name: 'slow',
      onEvent: async (e) => {
        await gate;
        slowEvents.push(e.type);
      },
      close: () => undefined,
    };
    const fast = new RecordingObserver('fast');
    const broadcaster = new EventBroadcaster([observerFactory(slow), observerFactory(fast)]);
    const session = await broadcaster.init(ctx);

    broadcaster.dispatch(session, { type: 'task_started' });
    broadcaster.dispatch(session, { type: 'task_completed' });
    await nextMacrotask();

    expect(fast.types()).toEqual(['task_started', 'task_completed']);
    expect(slowEvents).toEqual([]);

    release();
    await session.drain();
    expect(slowEvents).toEqual(['task_started', 'task_completed']);
  });

  it('isolates an observer that throws', async () => {
    const broken: Observer = {
      name: 'broken',
      onEvent: () => {
        throw new Error('disk full');
      },
      close: () => undefined,
    };
    const recorder = new RecordingObserver();
    const broadcaster = new EventBroadcaster([observerFactory(broken), observerFactory(recorder)]);
    const session = await broadcaster.init(ctx);

    broadcaster.dispatch(session, { type: 'task_started' });
    broadcaster.dispatch(session, { type: 'task_completed' });
    await session.drain();

    expect(recorder.types()).toEqual(['task_started', 'task_completed']);
    expect(session.failures()).toEqual({ broken: 2, recording: 0 });
  });

  it('leaves out observers that fail to initialize', async () => {
    const failing: Initializable = {
      name: 'failing',
      init: () => Promise.reject(new Error('no credentials')),
    };
    const recorder = new RecordingObserver();
    const session = await new EventBroadcaster([failing, observerFactory(recorder)]).init(ctx);
    expect(session.observerNames).toEqual(['recording']);
  });

  it('drops events after cleanup and tolerates close failures', async () => {
    const unclosable: Observer = {
      name: 'unclosable',
      onEvent: () => undefined,
      close: () => {
        throw new Error('already gone');
      },
    };
    const recorder = new RecordingObserver();
    const broadcaster = new EventBroadcaster([observerFactory(unclosable), observerFactory(recorder)]);
    const session = await broadcaster.init(ctx);

    await broadcaster.cleanup(session);
    expect(recorder.closed).toBe(true);
    expect(session.isClosed).toBe(true);
    expect(broadcaster.dispatch(session, { type: 'task_started' })).toBeNull();
    expect(recorder.events).toEqual([]);
  });
});

describe('built-in observers', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    createExecution(db, 'job-1', { config: { definition: null, inputs: {} } });
  });

  afterEach(() => {
    db.close();
  });

  it('persists traces and log lines', async () => {
    const hub = new LogHub();
    const lines: LogLine[] = [];
    hub.subscribe('job-1', (line) => lines.push(line));

    const broadcaster = new EventBroadcaster([tracingObserver, streamingObserver(hub)]);
    const session = await broadcaster.init({ jobId: 'job-1', db, runName: null });
    broadcaster.dispatch(session, { type: 'execution_started', payload: { message: 'sequential' } });
    broadcaster.dispatch(session, { type: 'task_started', taskKey: 'T1', agentName: 'A' });
    await broadcaster.cleanup(session);

    expect(listTraces(db, 'job-1').map((t) => [t.seq, t.event_type, t.task_key, t.payload])).toEqual([
      [1, 'execution_started', null, { message: 'sequential' }],
      [2, 'task_started', 'T1', {}],
    ]);
    expect(listExecutionLogs(db, 'job-1').map((l) => l.content)).toEqual([
      '[execution_started]: sequential',
      '[task_started] T1 (A)',
    ]);
    expect(listExecutionLogs(db, 'job-1', 1).map((l) => l.seq)).toEqual([2]);
    expect(lines.map((l) => l.content)).toEqual([
      '[execution_started]: sequential',
      '[task_started] T1 (A)',
    ]);
  });

  it('builds the configured observers by name', () => {
    expect(builtInObservers(['logging', 'streaming']).map((o) => o.name)).toEqual([
      'logging',
      'streaming',
    ]);
  });
});

describe('formatEvent', () => {
  it('renders type, task, agent and message', () => {
    expect(
      formatEvent(
        event({ type: 'guardrail_rejected', taskKey: 'T1', agentName: 'A', payload: { message: 'Too few' } }),
      ),
    ).toBe('[guardrail_rejected] T1 (A): Too few');
    expect(formatEvent(event({ type: 'execution_completed' }))).toBe('[execution_completed]');
  });
});

describe('LogHub', () => {
  it('keeps delivering when a subscriber throws and stops after unsubscribe', () => {
    const hub = new LogHub();
    const seen: number[] = [];
    hub.subscribe('job-1', () => {
      throw new Error('closed pipe');
    });
    const unsubscribe = hub.subscribe('job-1', (line) => seen.push(line.seq));
    const line = { jobId: 'job-1', seq: 1, content: 'x', at: '2026-01-01T00:00:00.000Z' };

    hub.publish(line);
    unsubscribe();
    hub.publish({ ...line, seq: 2 });
    hub.publish({ ...line, jobId: 'job-2', seq: 3 });

    expect(seen).toEqual([1]);
  });
});
