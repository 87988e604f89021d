import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import type { WorkspaceConfig, WorkspaceConfigInput } from './types.js';
import { WorkspaceConfigSchema, formatZodError } from '../shared/schemas.js';
import { ConfigError, NotFoundError } from '../shared/errors.js';

export function readWorkspaceConfig(configPath: string): WorkspaceConfig {
  if (!existsSync(configPath)) {
    throw new NotFoundError('Workspace not initialized. Run `crewline init` first.', {
      path: configPath,
    });
  }
  const raw = readFileSync(configPath, 'utf8');
  return parseWorkspaceConfig(load(raw), configPath);
}

export function parseWorkspaceConfig(
  value: unknown,
  source = 'config',
  env: NodeJS.ProcessEnv = process.env,
): WorkspaceConfig {
  const parsed = WorkspaceConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid workspace config (${source}): ${formatZodError(parsed.error)}`);
  }
  return applyEnvOverrides(parsed.data, env);
}

export function writeWorkspaceConfig(configPath: string, config: WorkspaceConfigInput): void {
  writeFileSync(configPath, dump(config), 'utf8');
}

/**
 * CREWLINE_API_HOST, CREWLINE_API_PORT and LOG_LEVEL take precedence over the file.
 */
export function applyEnvOverrides(
  config: WorkspaceConfig,
  env: NodeJS.ProcessEnv = process.env,
): WorkspaceConfig {
  const host = env['CREWLINE_API_HOST'];
  const port = env['CREWLINE_API_PORT'] ? parseInt(env['CREWLINE_API_PORT'], 10) : NaN;
  const level = env['LOG_LEVEL'];
  return {
    ...config,
    api: {
      host: host && host.length > 0 ? host : config.api.host,
      port: Number.isInteger(port) && port > 0 && port < 65536 ? port : config.api.port,
    },
    log_level:
      level === 'debug' || level === 'info' || level === 'warn' || level === 'error'
        ? level
        : config.log_level,
  };
}
