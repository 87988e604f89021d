import { ok } from '../shared/result.js';
import type { Result } from '../shared/result.js';
import { extractEntityNames } from './entities.js';
import { PASS, outputText, reject } from './types.js';
import type { Guardrail, GuardrailResult, TaskOutput } from './types.js';

export class CompanyCountGuardrail implements Guardrail {
  readonly type = 'company_count';

  constructor(readonly minCompanies: number) {}

  check(output: TaskOutput): Result<GuardrailResult, Error> {
    if (outputText(output).trim().length === 0) {
      return ok(
        reject(
          `No content found in the output. Provide a list of at least ${this.minCompanies} companies, one per line.`,
        ),
      );
    }
    const count = extractEntityNames(output).length;
    if (count >= this.minCompanies) return ok(PASS);
    return ok(
      reject(
        `Your response only includes ${count} companies, but at least ${this.minCompanies} are required. ` +
          'Please try again and list more distinct company names, one per line.',
      ),
    );
  }
}
