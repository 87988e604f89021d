import { ObserverError } from '../shared/errors.js';
import { createLogger, errorMessage } from '../shared/logger.js';
import type {
  ExecutionEvent,
  Initializable,
  Observer,
  ObserverContext,
  RaisedEvent,
} from './types.js';

const log = createLogger('observers');

interface Delivery {
  observer: Observer;
  /** Tail of this observer's delivery chain. Never rejects. */
  tail: Promise<void>;
  failures: number;
}

/**
 * Live observers of one execution. Events get a sequence number on dispatch
 * and are queued per observer, so each observer sees them in dispatch order
 * while a slow observer never holds up the others.
 */
export class BroadcastSession {
  private seq = 0;
  private closed = false;
  private readonly deliveries: Delivery[];

  constructor(
    readonly jobId: string,
    observers: Observer[],
  ) {
    this.deliveries = observers.map((observer) => ({ observer, tail: Promise.resolve(), failures: 0 }));
  }

  get observerNames(): string[] {
    return this.deliveries.map((d) => d.observer.name);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Delivery failures per observer name. */
  failures(): Record<string, number> {
    return Object.fromEntries(this.deliveries.map((d) => [d.observer.name, d.failures]));
  }

  enqueue(raised: RaisedEvent): ExecutionEvent | null {
    if (this.closed) {
      log.debug('Event dropped after cleanup', { job_id: this.jobId, type: raised.type });
      return null;
    }
    this.seq += 1;
    const event: ExecutionEvent = {
      seq: this.seq,
      jobId: this.jobId,
      type: raised.type,
      taskKey: raised.taskKey ?? null,
      agentName: raised.agentName ?? null,
      payload: raised.payload ?? {},
      at: new Date().toISOString(),
    };
    for (const delivery of this.deliveries) {
      delivery.tail = delivery.tail
        .then(() => delivery.observer.onEvent(event))
        .catch((e: unknown) => {
          delivery.failures += 1;
          const failure = new ObserverError(delivery.observer.name, errorMessage(e), {
            job_id: this.jobId,
            seq: event.seq,
            type: event.type,
          });
          log.warn(failure.message, failure.context);
        });
    }
    return event;
  }

  /** Resolves once every observer has handled every event queued so far. */
  async drain(): Promise<void> {
    await Promise.all(this.deliveries.map((d) => d.tail));
  }

  /** Drain, then close each observer. Close failures are logged and dropped. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.drain();
    for (const { observer } of this.deliveries) {
      try {
        await observer.close();
      } catch (e) {
        log.warn('Observer cleanup failed', {
          job_id: this.jobId,
          observer: observer.name,
          error: errorMessage(e),
        });
      }
    }
  }
}

/**
 * Fans execution events out to independent observers. Each observer is
 * built separately; one that fails to initialize is left out and the rest
 * still run.
 */
export class EventBroadcaster {
  constructor(private readonly factories: readonly Initializable[]) {}

  async init(ctx: ObserverContext): Promise<BroadcastSession> {
    const observers: Observer[] = [];
    for (const factory of this.factories) {
      try {
        observers.push(await factory.init(ctx));
      } catch (e) {
        log.error('Observer failed to initialize', {
          job_id: ctx.jobId,
          observer: factory.name,
          error: errorMessage(e),
        });
      }
    }
    log.debug('Observers ready', { job_id: ctx.jobId, observers: observers.map((o) => o.name) });
    return new BroadcastSession(ctx.jobId, observers);
  }

  dispatch(session: BroadcastSession, event: RaisedEvent): ExecutionEvent | null {
    return session.enqueue(event);
  }

  async cleanup(session: BroadcastSession): Promise<void> {
    await session.close();
  }
}
