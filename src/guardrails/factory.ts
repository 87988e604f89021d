import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import { formatZodError } from '../shared/schemas.js';
import { ok, err } from '../shared/result.js';
import type { Result } from '../shared/result.js';
import { CompanyCountGuardrail } from './company-count.js';
import { MinimumNumberGuardrail } from './minimum-number.js';
import {
  CompanyNameNotNullGuardrail,
  DataProcessingCountGuardrail,
  DataProcessingGuardrail,
  EmptyDataProcessingGuardrail,
} from './record-checks.js';
import type { Guardrail } from './types.js';

const count = z.coerce.number().int().min(0);

export const GuardrailConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('company_count'),
    min_companies: count.optional(),
    /** Alias of min_companies. */
    minimum_count: count.optional(),
  }),
  z.object({
    type: z.literal('minimum_number'),
    min_value: z.coerce.number().default(1),
    field_name: z.string().min(1).default('total_count'),
    message: z.string().optional(),
  }),
  z.object({
    type: z.literal('data_processing_count'),
    minimum_count: count.default(0),
  }),
  z.object({ type: z.literal('empty_data_processing') }),
  z.object({ type: z.literal('data_processing') }),
  z.object({
    type: z.literal('company_name_not_null'),
    field: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain column name')
      .default('company_name'),
  }),
]);

export type GuardrailConfig = z.output<typeof GuardrailConfigSchema>;
export type GuardrailType = GuardrailConfig['type'];

export const DEFAULT_MIN_COMPANIES = 50;

function decode(config: unknown): Result<unknown, ConfigError> {
  if (typeof config !== 'string') return ok(config);
  try {
    const parsed: unknown = JSON.parse(config);
    return ok(parsed);
  } catch {
    return err(new ConfigError('Guardrail config is not valid JSON'));
  }
}

export function parseGuardrailConfig(config: unknown): Result<GuardrailConfig, ConfigError> {
  const decoded = decode(config);
  if (!decoded.ok) return decoded;
  const parsed = GuardrailConfigSchema.safeParse(decoded.value);
  if (!parsed.success) {
    return err(new ConfigError(`Invalid guardrail config: ${formatZodError(parsed.error)}`));
  }
  return ok(parsed.data);
}

export function buildGuardrail(config: GuardrailConfig): Guardrail {
  switch (config.type) {
    case 'company_count':
      return new CompanyCountGuardrail(
        config.min_companies ?? config.minimum_count ?? DEFAULT_MIN_COMPANIES,
      );
    case 'minimum_number':
      return new MinimumNumberGuardrail(config.min_value, config.field_name, config.message);
    case 'data_processing_count':
      return new DataProcessingCountGuardrail(config.minimum_count);
    case 'empty_data_processing':
      return new EmptyDataProcessingGuardrail();
    case 'data_processing':
      return new DataProcessingGuardrail();
    case 'company_name_not_null':
      return new CompanyNameNotNullGuardrail(config.field);
  }
}

/** Build the guardrail a rule config (object or JSON string) describes. */
export function createGuardrail(config: unknown): Result<Guardrail, ConfigError> {
  const parsed = parseGuardrailConfig(config);
  if (!parsed.ok) return parsed;
  return ok(buildGuardrail(parsed.value));
}
