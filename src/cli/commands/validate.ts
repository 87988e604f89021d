import type { Command } from 'commander';
import { prepareFlow } from '../../flow/prepare.js';
import { fail, loadFlowFile } from '../cli-shared.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <flow-file>')
    .description('Validate a flow definition (YAML or JSON) without running it')
    .action((file: string) => {
      try {
        const flow = prepareFlow(loadFlowFile(file));
        console.log(`Valid ${flow.plan.type} flow`);
        console.log(`  Agents: ${[...flow.agents.keys()].join(', ')}`);
        console.log(`  Tasks:  ${[...flow.tasks.keys()].join(', ')}`);
        for (const task of flow.tasks.values()) {
          if (task.guardrail !== undefined) console.log(`  Guardrail on ${task.key}`);
        }
      } catch (err) {
        fail('Invalid flow', err);
      }
    });
}
