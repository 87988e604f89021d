import { createLogger } from '../shared/logger.js';
import { err } from '../shared/result.js';
import type { Result } from '../shared/result.js';
import { createGuardrail } from './factory.js';
import { reject, toTaskOutput } from './types.js';
import type { Guardrail, GuardrailContext, GuardrailResult, TaskOutput } from './types.js';

const log = createLogger('guardrails');

function runCheck(
  guardrail: Guardrail,
  output: TaskOutput,
  ctx: GuardrailContext,
): Result<GuardrailResult, Error> {
  try {
    return guardrail.check(output, ctx);
  } catch (e) {
    // A check that throws is reported like one that returned an error result
    return err(e instanceof Error ? e : new Error(String(e)));
  }
}

/**
 * Run an already built guardrail over a raw task output. Never throws:
 * internal failures come back as `{ valid: false }` with a diagnostic.
 */
export function applyGuardrail(
  guardrail: Guardrail,
  raw: unknown,
  ctx: GuardrailContext = {},
): GuardrailResult {
  const checked = runCheck(guardrail, toTaskOutput(raw), ctx);
  if (!checked.ok) {
    log.error('Guardrail check failed', { type: guardrail.type, error: checked.error.message });
    return reject(`Guardrail ${guardrail.type} could not validate the output: ${checked.error.message}`);
  }
  if (checked.value.valid) {
    log.debug('Guardrail passed', { type: guardrail.type });
  } else {
    log.info('Guardrail rejected output', { type: guardrail.type, feedback: checked.value.feedback });
  }
  return checked.value;
}

/** Validate a raw task output against a rule config (object or JSON string). */
export function validateOutput(
  raw: unknown,
  ruleConfig: unknown,
  ctx: GuardrailContext = {},
): GuardrailResult {
  const built = createGuardrail(ruleConfig);
  if (!built.ok) {
    log.warn('Guardrail config rejected', { error: built.error.message });
    return reject(built.error.message);
  }
  return applyGuardrail(built.value, raw, ctx);
}
