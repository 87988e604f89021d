import { z } from 'zod';

export const OBSERVER_NAMES = ['logging', 'tracing', 'streaming'] as const;

const identifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

export const WorkspaceConfigSchema = z.object({
  workspace_id: z.string(),
  created_at: z.string(),
  version: z.string(),
  log_level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  api: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(1).max(65535).default(7800),
    })
    .default({}),
  scheduler: z
    .object({
      enabled: z.boolean().default(true),
      interval_seconds: z.number().int().positive().default(60),
    })
    .default({}),
  execution: z
    .object({
      allow_partial_failure: z.boolean().default(false),
      max_concurrent: z.number().int().positive().default(4),
      default_max_retries: z.number().int().min(0).default(3),
    })
    .default({}),
  observers: z.array(z.enum(OBSERVER_NAMES)).default([...OBSERVER_NAMES]),
  records: z
    .object({
      table: identifier.default('data_processing'),
    })
    .default({}),
});

export const AgentSpecSchema = z
  .object({
    role: z.string().optional(),
    goal: z.string().optional(),
    backstory: z.string().optional(),
  })
  .passthrough();

export const TaskSpecSchema = z
  .object({
    agent: z.string({ required_error: 'agent is required' }).min(1),
    description: z.string().optional(),
    expected_output: z.string().optional(),
    guardrail: z.union([z.string(), z.record(z.unknown())]).optional(),
    max_retries: z.number().int().min(0).optional(),
  })
  .passthrough();

export const ExecutionRequestSchema = z.object({
  definition: z.unknown(),
  inputs: z.record(z.unknown()).default({}),
  run_name: z.string().min(1).optional(),
});

export const ScheduleCreateSchema = z.object({
  name: z.string().min(1),
  cron_expression: z.string().min(1),
  job_config: z.object({
    definition: z.unknown(),
    inputs: z.record(z.unknown()).default({}),
  }),
  is_active: z.boolean().default(true),
});

export const ScheduleUpdateSchema = z
  .object({
    name: z.string().min(1),
    cron_expression: z.string().min(1),
    job_config: ScheduleCreateSchema.shape.job_config,
  })
  .partial();

/** "field: message; field: message" summary of a zod failure. */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export const ExecutionListQuerySchema = z.object({
  status: z.enum(['PENDING', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED']).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const GuardrailValidateSchema = z.object({
  output: z.unknown(),
  config: z.union([z.string(), z.record(z.unknown())]),
});
