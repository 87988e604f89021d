/**
 * Error taxonomy for the orchestration core.
 *
 * ConfigError    bad flow/agent/task/schedule definitions, rejected before dispatch
 * StateError     illegal state transition
 * GuardrailFailure  output rejected by a guardrail, carries retry feedback
 * EngineError    the external execution engine failed
 * ObserverError  one observer misbehaved, isolated from the execution
 * NotFoundError / ConflictError  lookups and conflicting requests
 */
export class CrewlineError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(code: string, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

export class ConfigError extends CrewlineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('CONFIG_ERROR', message, context);
  }
}

export class StateError extends CrewlineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('STATE_ERROR', message, context);
  }
}

export class GuardrailFailure extends CrewlineError {
  readonly feedback: string;

  constructor(feedback: string, context: Record<string, unknown> = {}) {
    super('GUARDRAIL_FAILURE', feedback, context);
    this.feedback = feedback;
  }
}

export class EngineError extends CrewlineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('ENGINE_ERROR', message, context);
  }

  static from(err: unknown): EngineError {
    if (err instanceof EngineError) return err;
    if (err instanceof Error) {
      return new EngineError(err.message, { cause_type: err.name });
    }
    return new EngineError(String(err));
  }
}

export class ObserverError extends CrewlineError {
  readonly observer: string;

  constructor(observer: string, message: string, context: Record<string, unknown> = {}) {
    super('OBSERVER_ERROR', `Observer ${observer}: ${message}`, context);
    this.observer = observer;
  }
}

export class NotFoundError extends CrewlineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('NOT_FOUND', message, context);
  }
}

export class ConflictError extends CrewlineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('CONFLICT', message, context);
  }
}

/** REST status for an error raised by the core. */
export function httpStatusFor(err: unknown): number {
  if (err instanceof ConfigError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof ConflictError || err instanceof StateError) return 409;
  return 500;
}
