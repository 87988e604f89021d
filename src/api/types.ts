import type Database from 'better-sqlite3';
import type { z } from 'zod';
import type { WorkspaceConfig } from '../workspace/types.js';
import type { Orchestrator } from '../execution/orchestrator.js';
import { ConfigError } from '../shared/errors.js';
import { formatZodError } from '../shared/schemas.js';

export interface RouteOpts {
  db: Database.Database;
  config: WorkspaceConfig;
  orchestrator: Orchestrator;
}

/** Validate a request body or query string; failures surface as 400s. */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid request: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
