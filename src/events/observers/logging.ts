import { createLogger } from '../../shared/logger.js';
import type { LogFields } from '../../shared/logger.js';
import type { ExecutionEvent, Initializable, Observer } from '../types.js';

const log = createLogger('executions');

const WARN_EVENTS = new Set(['guardrail_rejected', 'task_failed', 'execution_failed']);

export class LoggingObserver implements Observer {
  readonly name = 'logging';

  constructor(private readonly runName: string | null) {}

  onEvent(event: ExecutionEvent): void {
    const fields: LogFields = {
      job_id: event.jobId,
      seq: event.seq,
      event: event.type,
      run_name: this.runName ?? undefined,
    };
    if (event.taskKey) fields['task'] = event.taskKey;
    if (event.agentName) fields['agent'] = event.agentName;
    if (WARN_EVENTS.has(event.type)) {
      log.warn(event.type, { ...fields, ...event.payload });
    } else if (event.type === 'agent_step' || event.type === 'task_output') {
      log.debug(event.type, fields);
    } else {
      log.info(event.type, fields);
    }
  }

  close(): void {}
}

export const loggingObserver: Initializable = {
  name: 'logging',
  init: (ctx) => new LoggingObserver(ctx.runName),
};
