import type { Command } from 'commander';
import { requireWorkspace, fail } from '../cli-shared.js';
import {
  cancelExecution,
  deleteExecution,
  getExecution,
  listExecutions,
} from '../../execution/status.js';
import { isExecutionStatus } from '../../execution/types.js';
import { listTaskStatuses } from '../../tracking/task-status.js';
import { listErrorTraces } from '../../tracking/error-traces.js';
import { listExecutionLogs } from '../../events/observers/streaming.js';

export function registerExecutionsCommand(program: Command): void {
  const executions = program.command('executions').description('Inspect and manage executions');

  executions
    .command('list')
    .description('List recent executions')
    .option('--status <status>', 'Filter by status (PENDING, RUNNING, COMPLETED, FAILED, CANCELLED)')
    .option('--limit <n>', 'Maximum rows', '20')
    .action((opts: { status?: string; limit: string }) => {
      const { db } = requireWorkspace();
      const status = opts.status?.toUpperCase();
      if (status !== undefined && !isExecutionStatus(status)) {
        fail('Invalid status', opts.status);
      }
      const items = listExecutions(db, {
        status: isExecutionStatus(status) ? status : undefined,
        limit: parseInt(opts.limit, 10),
      });
      if (items.length === 0) {
        console.log('No executions found.');
        return;
      }
      for (const e of items) {
        const label = e.run_name ? `  ${e.run_name}` : '';
        console.log(`  [${e.status.padEnd(9)}] ${e.job_id}  ${e.trigger_type.padEnd(9)} ${e.created_at}${label}`);
      }
    });

  executions
    .command('show <jobId>')
    .description('Show an execution with its tasks and errors')
    .option('--logs', 'Print the stored progress log', false)
    .action((jobId: string, opts: { logs: boolean }) => {
      const { db } = requireWorkspace();
      const e = getExecution(db, jobId);
      if (!e) fail('Not found', `Execution ${jobId} not found`);
      console.log(`Execution ${e.job_id}`);
      console.log(`  Status:    ${e.status}`);
      if (e.run_name) console.log(`  Name:      ${e.run_name}`);
      console.log(`  Trigger:   ${e.trigger_type}`);
      console.log(`  Created:   ${e.created_at}`);
      if (e.completed_at) console.log(`  Completed: ${e.completed_at}`);
      if (e.message) console.log(`  Message:   ${e.message}`);

      const tasks = listTaskStatuses(db, jobId);
      if (tasks.length > 0) console.log('\nTasks:');
      for (const t of tasks) {
        console.log(`  [${t.status.padEnd(9)}] ${t.task_key}${t.agent_name ? ` (${t.agent_name})` : ''}`);
      }
      const errors = listErrorTraces(db, jobId);
      if (errors.length > 0) console.log('\nErrors:');
      for (const trace of errors) {
        console.log(`  ${trace.error_type}${trace.task_key ? ` [${trace.task_key}]` : ''}: ${trace.error_message}`);
      }
      if (opts.logs) {
        console.log('\nLog:');
        for (const line of listExecutionLogs(db, jobId)) console.log(`  ${line.content}`);
      }
    });

  executions
    .command('cancel <jobId>')
    .description('Cancel a pending or running execution')
    .option('--reason <reason>', 'Reason recorded on the execution')
    .action((jobId: string, opts: { reason?: string }) => {
      const { db } = requireWorkspace();
      try {
        const e = cancelExecution(db, jobId, opts.reason);
        console.log(`Cancelled: ${e.job_id}`);
      } catch (err) {
        fail('Cancel failed', err);
      }
    });

  executions
    .command('delete <jobId>')
    .description('Delete an execution and everything recorded for it')
    .action((jobId: string) => {
      const { db } = requireWorkspace();
      try {
        const summary = deleteExecution(db, jobId);
        console.log(
          `Deleted ${summary.job_id} (${summary.task_statuses} tasks, ${summary.error_traces} errors, ${summary.traces} traces, ${summary.logs} log lines)`,
        );
      } catch (err) {
        fail('Delete failed', err);
      }
    });
}
