import { ok, err } from '../shared/result.js';
import type { Result } from '../shared/result.js';
import { readCount } from './records.js';
import type { RecordSource } from './records.js';
import { PASS, reject } from './types.js';
import type { Guardrail, GuardrailContext, GuardrailResult } from './types.js';

function requireSource(ctx: GuardrailContext): Result<RecordSource, Error> {
  return ctx.records ? ok(ctx.records) : err(new Error('no record source is configured'));
}

/** Passes when the record source holds at least `minimumCount` records. */
export class DataProcessingCountGuardrail implements Guardrail {
  readonly type = 'data_processing_count';

  constructor(readonly minimumCount: number) {}

  check(_output: unknown, ctx: GuardrailContext): Result<GuardrailResult, Error> {
    const source = requireSource(ctx);
    if (!source.ok) return source;
    const total = readCount(source.value, (s) => s.countTotal());
    if (!total.ok) return total;
    if (total.value >= this.minimumCount) return ok(PASS);
    return ok(
      reject(
        `Insufficient records: the ${source.value.name} table holds ${total.value} records, ` +
          `below the minimum count required (${this.minimumCount}).`,
      ),
    );
  }
}

/** Passes only while the record source is empty. */
export class EmptyDataProcessingGuardrail implements Guardrail {
  readonly type = 'empty_data_processing';

  check(_output: unknown, ctx: GuardrailContext): Result<GuardrailResult, Error> {
    const source = requireSource(ctx);
    if (!source.ok) return source;
    const total = readCount(source.value, (s) => s.countTotal());
    if (!total.ok) return total;
    if (total.value === 0) return ok(PASS);
    return ok(
      reject(`Expected the ${source.value.name} table to be empty, but it holds ${total.value} records.`),
    );
  }
}

/** Passes when records exist and none is left unprocessed. */
export class DataProcessingGuardrail implements Guardrail {
  readonly type = 'data_processing';

  check(_output: unknown, ctx: GuardrailContext): Result<GuardrailResult, Error> {
    const source = requireSource(ctx);
    if (!source.ok) return source;
    const total = readCount(source.value, (s) => s.countTotal());
    if (!total.ok) return total;
    if (total.value === 0) {
      return ok(reject(`No records found in the ${source.value.name} table. Load the records before completing this task.`));
    }
    const unprocessed = readCount(source.value, (s) => s.countUnprocessed());
    if (!unprocessed.ok) return unprocessed;
    if (unprocessed.value === 0) return ok(PASS);
    return ok(
      reject(
        `${unprocessed.value} of ${total.value} records in the ${source.value.name} table are still unprocessed. ` +
          'Process every record before completing this task.',
      ),
    );
  }
}

/** Passes when records exist and every one of them has `field` set. */
export class CompanyNameNotNullGuardrail implements Guardrail {
  readonly type = 'company_name_not_null';

  constructor(readonly field: string = 'company_name') {}

  check(_output: unknown, ctx: GuardrailContext): Result<GuardrailResult, Error> {
    const source = requireSource(ctx);
    if (!source.ok) return source;
    const total = readCount(source.value, (s) => s.countTotal());
    if (!total.ok) return total;
    if (total.value === 0) {
      return ok(reject(`No records found in the ${source.value.name} table.`));
    }
    const missing = readCount(source.value, (s) => s.countNull(this.field));
    if (!missing.ok) return missing;
    if (missing.value === 0) return ok(PASS);
    return ok(
      reject(
        `${missing.value} of ${total.value} records in the ${source.value.name} table have no ${this.field}. ` +
          `Fill in ${this.field} for every record.`,
      ),
    );
  }
}
