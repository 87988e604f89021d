import type { Command } from 'commander';
import { requireWorkspace, fail, loadFlowFile, parseInputs } from '../cli-shared.js';
import {
  createSchedule,
  deleteSchedule,
  listSchedules,
  toggleSchedule,
} from '../../scheduler/schedules.js';
import { nextRunTimes } from '../../scheduler/cron.js';

export function registerSchedulesCommand(program: Command): void {
  const schedules = program.command('schedules').description('Manage cron schedules');

  schedules
    .command('add <name> <cron> <flow-file>')
    .description('Schedule a flow, e.g. crewline schedules add nightly "@daily" flow.yaml')
    .option('--inputs <json>', 'JSON object of flow inputs')
    .option('--inactive', 'Create the schedule paused', false)
    .action((name: string, cron: string, file: string, opts: { inputs?: string; inactive: boolean }) => {
      const { db } = requireWorkspace();
      try {
        const schedule = createSchedule(db, {
          name,
          cron_expression: cron,
          job_config: { definition: loadFlowFile(file), inputs: parseInputs(opts.inputs) },
          is_active: !opts.inactive,
        });
        console.log(`Schedule created: ${schedule.id}`);
        console.log(`  Next run: ${schedule.next_run_at ?? '-'}`);
      } catch (err) {
        fail('Schedule rejected', err);
      }
    });

  schedules
    .command('list')
    .description('List schedules')
    .action(() => {
      const { db } = requireWorkspace();
      const items = listSchedules(db);
      if (items.length === 0) {
        console.log('No schedules found.');
        return;
      }
      for (const s of items) {
        const state = s.is_active ? 'ACTIVE' : 'PAUSED';
        console.log(`  [${state}] ${s.id}  ${s.name}`);
        console.log(`           Cron:     ${s.cron_expression}`);
        console.log(`           Next run: ${s.next_run_at ?? '-'}`);
        if (s.last_run_at) console.log(`           Last run: ${s.last_run_at}`);
      }
    });

  schedules
    .command('toggle <id>')
    .description('Pause or resume a schedule')
    .action((id: string) => {
      const { db } = requireWorkspace();
      try {
        const s = toggleSchedule(db, id);
        console.log(`${s.name} is now ${s.is_active ? 'active' : 'paused'} (next run ${s.next_run_at ?? '-'})`);
      } catch (err) {
        fail('Toggle failed', err);
      }
    });

  schedules
    .command('remove <id>')
    .description('Delete a schedule')
    .action((id: string) => {
      const { db } = requireWorkspace();
      try {
        const s = deleteSchedule(db, id);
        console.log(`Removed: ${s.name}`);
      } catch (err) {
        fail('Remove failed', err);
      }
    });

  schedules
    .command('next <cron>')
    .description('Print the next UTC fire times of a cron expression')
    .option('-n, --count <n>', 'How many times to print', '5')
    .action((cron: string, opts: { count: string }) => {
      try {
        for (const t of nextRunTimes(cron, parseInt(opts.count, 10))) console.log(t.toISOString());
      } catch (err) {
        fail('Invalid cron', err);
      }
    });
}
