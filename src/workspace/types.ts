import type { z } from 'zod';
import type { WorkspaceConfigSchema } from '../shared/schemas.js';

export type WorkspaceConfig = z.output<typeof WorkspaceConfigSchema>;
export type WorkspaceConfigInput = z.input<typeof WorkspaceConfigSchema>;

export interface CrewlinePaths {
  root: string;      // .crewline/
  config: string;    // .crewline/config.yaml
  stateDb: string;   // .crewline/state.db
  flowsDir: string;  // .crewline/flows/
}
