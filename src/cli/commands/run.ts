import type { Command } from 'commander';
import { requireWorkspace, fail, loadFlowFile, parseInputs } from '../cli-shared.js';
import { LogHub } from '../../events/observers/streaming.js';
import { createRunnerContext } from '../../execution/orchestrator.js';
import { driveExecution, startExecution } from '../../execution/runner.js';
import type { StartedExecution } from '../../execution/runner.js';
import { cancelExecution, getExecution } from '../../execution/status.js';
import { isTerminalStatus } from '../../execution/types.js';
import { listTaskStatuses } from '../../tracking/task-status.js';
import { errorMessage } from '../../shared/logger.js';

interface RunOptions {
  inputs?: string;
  name?: string;
  quiet: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run <flow-file>')
    .description('Run a flow locally and follow its progress')
    .option('--inputs <json>', 'JSON object of flow inputs (e.g. \'{"condition":"urgent"}\')')
    .option('--name <label>', 'Run name recorded on the execution')
    .option('-q, --quiet', 'Do not stream progress lines', false)
    .action(async (file: string, opts: RunOptions) => {
      const { config, db } = requireWorkspace();
      const hub = new LogHub();
      const ctx = createRunnerContext(db, config, { hub });

      let started: StartedExecution;
      try {
        started = startExecution(ctx, {
          definition: loadFlowFile(file),
          inputs: parseInputs(opts.inputs),
          runName: opts.name ?? null,
          triggerType: 'cli',
        });
      } catch (err) {
        fail('Run rejected', err);
      }

      const jobId = started.execution.job_id;
      console.log(`Execution ${jobId} started`);
      const unsubscribe = opts.quiet ? () => {} : hub.subscribe(jobId, (line) => console.log(`  ${line.content}`));

      const controller = new AbortController();
      const onInterrupt = (): void => {
        const current = getExecution(db, jobId);
        if (current && !isTerminalStatus(current.status)) {
          cancelExecution(db, jobId, 'Interrupted from the CLI');
        }
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const execution = await driveExecution(ctx, started, controller.signal);
        console.log(`\nExecution ${execution.status}: ${execution.message ?? ''}`);
        for (const task of listTaskStatuses(db, jobId)) {
          console.log(`  [${task.status.padEnd(9)}] ${task.task_key}`);
        }
        if (execution.status !== 'COMPLETED') process.exitCode = 1;
      } catch (err) {
        console.error(`Run failed: ${errorMessage(err)}`);
        process.exitCode = 1;
      } finally {
        unsubscribe();
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
