import type { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { requireWorkspace } from '../cli-shared.js';

interface ServeOptions {
  host?: string;
  port?: string;
  scheduler: boolean;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the crewline API server and the cron scheduler')
    .option('--host <host>', 'Bind host (default: from config)')
    .option('--port <port>', 'Port (default: from config)')
    .option('--no-scheduler', 'Do not fire scheduled executions in this process')
    .action(async (opts: ServeOptions) => {
      const { config } = requireWorkspace();
      const host = opts.host ?? config.api.host;
      const port = opts.port ? parseInt(opts.port, 10) : config.api.port;

      console.log(`Starting crewline...`);
      console.log(`  API:       http://${host}:${port}/v1`);
      console.log(`  Scheduler: ${opts.scheduler && config.scheduler.enabled ? 'on' : 'off'}`);
      console.log('\nPress Ctrl+C to stop\n');

      await startServer({ host, port, config, scheduler: opts.scheduler && config.scheduler.enabled });
    });
}
