import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';
import { fail } from '../cli-shared.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a crewline workspace in the current directory')
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .option('--port <port>', 'API port to record in the config', '7800')
    .action(async (opts: { force: boolean; port: string }) => {
      const port = parseInt(opts.port, 10);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        fail('Init failed', new Error(`Invalid port: ${opts.port}`));
      }
      try {
        const config = await initWorkspace({ force: opts.force, port });
        console.log(`Workspace initialized!`);
        console.log(`  Workspace ID: ${config.workspace_id}`);
        console.log(`  API:          http://${config.api.host}:${config.api.port}/v1`);
        console.log(`  Observers:    ${config.observers.join(', ')}`);
        console.log(`\nNext steps:`);
        console.log(`  crewline validate <flow.yaml>   check a flow definition`);
        console.log(`  crewline run <flow.yaml>        run it locally`);
        console.log(`  crewline serve                  start the API and scheduler`);
      } catch (err) {
        fail('Init failed', err);
      }
    });
}
