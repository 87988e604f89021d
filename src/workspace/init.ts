import { mkdirSync, existsSync } from 'node:fs';
import { generateId } from '../shared/ids.js';
import { getCrewlinePaths } from './paths.js';
import { openDb } from './db.js';
import { parseWorkspaceConfig, writeWorkspaceConfig } from './config.js';
import { ConflictError } from '../shared/errors.js';
import type { WorkspaceConfig, WorkspaceConfigInput } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
  port?: number;
}

export async function initWorkspace(opts: InitOptions = {}): Promise<WorkspaceConfig> {
  const paths = getCrewlinePaths(opts.cwd);

  if (existsSync(paths.root) && !opts.force) {
    throw new ConflictError(
      `Workspace already exists at ${paths.root}. Use --force to reinitialize.`,
    );
  }

  for (const dir of [paths.root, paths.flowsDir]) {
    mkdirSync(dir, { recursive: true });
  }

  const input: WorkspaceConfigInput = {
    workspace_id: generateId(12),
    created_at: new Date().toISOString(),
    version: '0.1.0',
    log_level: 'info',
    api: { host: '127.0.0.1', port: opts.port ?? 7800 },
    scheduler: { enabled: true, interval_seconds: 60 },
    execution: { allow_partial_failure: false, max_concurrent: 4, default_max_retries: 3 },
    observers: ['logging', 'tracing', 'streaming'],
    records: { table: 'data_processing' },
  };

  writeWorkspaceConfig(paths.config, input);

  // Creates the state DB and applies the schema
  openDb(paths.stateDb);

  return parseWorkspaceConfig(input, paths.config);
}
