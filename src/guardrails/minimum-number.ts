import { ok } from '../shared/result.js';
import type { Result } from '../shared/result.js';
import { isPlainObject } from '../shared/json.js';
import { PASS, outputRecord, outputText, reject } from './types.js';
import type { Guardrail, GuardrailResult, TaskOutput } from './types.js';

const COUNT_FIELDS = new Set(['count', 'total_count', 'results_count', 'length', 'size']);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim().length > 0) {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/** Guardrail accepting an output whose numeric `fieldName` exceeds `minValue`. */
export class MinimumNumberGuardrail implements Guardrail {
  readonly type = 'minimum_number';
  readonly message: string;

  constructor(
    readonly minValue: number,
    readonly fieldName: string,
    message?: string,
  ) {
    this.message = message ?? `The output should contain a '${fieldName}' value greater than ${minValue}.`;
  }

  check(output: TaskOutput): Result<GuardrailResult, Error> {
    const raw = this.extract(output);
    if (raw === undefined) {
      return ok(
        reject(
          `No ${this.fieldName} found in the output. Please include a ${this.fieldName} value greater than ${this.minValue}.`,
        ),
      );
    }
    const value = toNumber(raw);
    if (value === undefined) {
      return ok(
        reject(
          `The ${this.fieldName} value '${String(raw)}' is not a valid number. ` +
            `Please provide a numeric value greater than ${this.minValue}.`,
        ),
      );
    }
    if (value > this.minValue) return ok(PASS);
    return ok(reject(`${this.message} Found ${value}, required more than ${this.minValue}.`));
  }

  private extract(output: TaskOutput): unknown {
    const record = outputRecord(output);
    if (record) {
      const found = this.fromRecord(record);
      if (found !== undefined) return found;
    }
    const pattern = new RegExp(
      `["']?${escapeRegExp(this.fieldName)}["']?\\s*[:=]\\s*(-?\\d+(?:\\.\\d+)?)`,
      'i',
    );
    return pattern.exec(outputText(output))?.[1];
  }

  private fromRecord(record: Record<string, unknown>): unknown {
    const field = this.fieldName;
    if (Object.hasOwn(record, field)) return record[field];

    const results = record['results'];
    if (Array.isArray(results) && COUNT_FIELDS.has(field.toLowerCase())) return results.length;

    const metadata = record['metadata'];
    if (isPlainObject(metadata) && Object.hasOwn(metadata, field)) return metadata[field];

    if (field === 'total_count' && Object.hasOwn(record, 'count')) return record['count'];
    if (field === 'count' && Object.hasOwn(record, 'total_count')) return record['total_count'];

    for (const nested of Object.values(record)) {
      if (isPlainObject(nested) && Object.hasOwn(nested, field)) return nested[field];
    }
    return undefined;
  }
}
