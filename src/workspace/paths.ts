import { join } from 'node:path';
import type { CrewlinePaths } from './types.js';

export function getCrewlinePaths(cwd: string = process.cwd()): CrewlinePaths {
  const root = join(cwd, '.crewline');
  return {
    root,
    config: join(root, 'config.yaml'),
    stateDb: join(root, 'state.db'),
    flowsDir: join(root, 'flows'),
  };
}
