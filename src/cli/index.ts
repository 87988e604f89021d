#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerRunCommand } from './commands/run.js';
import { registerServeCommand } from './commands/serve.js';
import { registerExecutionsCommand } from './commands/executions.js';
import { registerSchedulesCommand } from './commands/schedules.js';

const program = new Command();

program
  .name('crewline')
  .description('crewline: run agent flows with tracked tasks, guardrails and schedules')
  .version('0.1.0');

registerInitCommand(program);
registerValidateCommand(program);
registerRunCommand(program);
registerServeCommand(program);
registerExecutionsCommand(program);
registerSchedulesCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
