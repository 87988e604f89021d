import { readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import type Database from 'better-sqlite3';
import { getCrewlinePaths } from '../workspace/paths.js';
import { readWorkspaceConfig } from '../workspace/config.js';
import { openDb } from '../workspace/db.js';
import type { CrewlinePaths, WorkspaceConfig } from '../workspace/types.js';
import { isPlainObject } from '../shared/json.js';
import { errorMessage, setLogLevel } from '../shared/logger.js';

export interface WorkspaceContext {
  paths: CrewlinePaths;
  config: WorkspaceConfig;
  db: Database.Database;
}

/** Print `prefix: message` and exit non-zero. */
export function fail(prefix: string, err: unknown): never {
  console.error(`${prefix}: ${errorMessage(err)}`);
  process.exit(1);
}

/**
 * Load workspace config and open db, or print error and exit.
 * Use at the top of every CLI command that requires an initialized workspace.
 */
export function requireWorkspace(cwd?: string): WorkspaceContext {
  const paths = getCrewlinePaths(cwd);
  let config: WorkspaceConfig;
  try {
    config = readWorkspaceConfig(paths.config);
  } catch (err) {
    fail('Workspace unavailable', err);
  }
  // CLI output goes to the console; keep structured logs for warnings up
  setLogLevel(process.env['LOG_LEVEL'] ? config.log_level : 'warn');
  const db = openDb(paths.stateDb);
  return { paths, config, db };
}

/** Read a flow definition from a YAML or JSON file. */
export function loadFlowFile(file: string): unknown {
  return load(readFileSync(file, 'utf8'));
}

/** Parse a `--inputs` style JSON object option. */
export function parseInputs(json: string | undefined): Record<string, unknown> {
  if (json === undefined) return {};
  const value: unknown = JSON.parse(json);
  if (!isPlainObject(value)) throw new Error('inputs must be a JSON object');
  return value;
}
