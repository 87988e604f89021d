import type { Result } from '../shared/result.js';
import { safeStringify } from '../shared/redact.js';
import { isPlainObject } from '../shared/json.js';
import type { RecordSource } from './records.js';

/**
 * A task's raw output, classified once at the boundary:
 * text for strings, structured for plain objects and arrays,
 * opaque for everything else (bytes, engine objects, primitives).
 */
export type TaskOutput =
  | { kind: 'text'; text: string }
  | { kind: 'structured'; data: Record<string, unknown> | unknown[] }
  | { kind: 'opaque'; value: unknown };

export interface GuardrailResult {
  valid: boolean;
  feedback: string;
}

export interface GuardrailContext {
  /** Record store backing the count-based guardrails. */
  records?: RecordSource;
}

export interface Guardrail {
  readonly type: string;
  check(output: TaskOutput, ctx: GuardrailContext): Result<GuardrailResult, Error>;
}

export const PASS: GuardrailResult = { valid: true, feedback: '' };

export function reject(feedback: string): GuardrailResult {
  return { valid: false, feedback };
}

/** Keys an engine commonly uses for the text of a task result. */
const TEXT_KEYS = ['content', 'raw_output', 'raw', 'output', 'text', 'result', 'response'];

export function toTaskOutput(raw: unknown): TaskOutput {
  if (typeof raw === 'string') return { kind: 'text', text: raw };
  if (Array.isArray(raw) || isPlainObject(raw)) return { kind: 'structured', data: raw };
  return { kind: 'opaque', value: raw };
}

function ownFields(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function textField(fields: Record<string, unknown>): string | undefined {
  for (const key of TEXT_KEYS) {
    const v = fields[key];
    if (typeof v === 'string' && v.length > 0) return v;
  }
  return undefined;
}

/**
 * Text view of an output: the string itself, a recognized text field, or a
 * string coercion of the whole value when no such field exists.
 */
export function outputText(output: TaskOutput): string {
  switch (output.kind) {
    case 'text':
      return output.text;
    case 'structured': {
      const field = Array.isArray(output.data) ? undefined : textField(output.data);
      return field ?? safeStringify(output.data, 2);
    }
    case 'opaque': {
      const { value } = output;
      if (value === null || value === undefined) return '';
      if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
      if (typeof value === 'object') {
        const fields = ownFields(value);
        const field = textField(fields);
        if (field !== undefined) return field;
        const str = String(value);
        return str === '[object Object]' ? safeStringify(fields, 2) : str;
      }
      return String(value);
    }
  }
}

/**
 * Record view of an output: the object itself, an object stored under a
 * recognized text key, or a JSON object parsed from the text view.
 */
export function outputRecord(output: TaskOutput): Record<string, unknown> | undefined {
  if (output.kind === 'structured') {
    if (!Array.isArray(output.data)) return output.data;
    return undefined;
  }
  if (output.kind === 'opaque' && typeof output.value === 'object' && output.value !== null
    && !(output.value instanceof Uint8Array)) {
    const fields = ownFields(output.value);
    for (const key of TEXT_KEYS) {
      const nested = fields[key];
      if (isPlainObject(nested)) return nested;
    }
    const parsed = parseJsonObject(outputText(output));
    return parsed ?? fields;
  }
  return parseJsonObject(outputText(output));
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{')) return undefined;
  try {
    const value: unknown = JSON.parse(trimmed);
    return isPlainObject(value) ? value : undefined;
  } catch {
    // not JSON; callers fall back to the text view
    return undefined;
  }
}
