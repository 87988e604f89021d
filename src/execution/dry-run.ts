import { EngineError } from '../shared/errors.js';
import { selectBranch } from '../flow/prepare.js';
import type { PreparedFlow, TaskSpec } from '../flow/types.js';
import type { EngineSession, ExecutionEngine } from './engine.js';

export interface ProduceRequest {
  task: TaskSpec;
  attempt: number;
  /** Guardrail feedback from the previous attempt. */
  feedback: string | null;
  inputs: Readonly<Record<string, unknown>>;
}

export type OutputProducer = (request: ProduceRequest) => unknown;

const describeTask: OutputProducer = ({ task }) =>
  task.expected_output ?? task.description ?? `Output of ${task.key}`;

/**
 * Local engine that walks the ordering plan without calling any model.
 * Each task's output comes from `produce`; rejected outputs are produced
 * again with the guardrail feedback until accepted or out of retries. A
 * task that runs out of retries stops the tasks planned after it.
 */
export class DryRunEngine implements ExecutionEngine {
  readonly name = 'dry-run';

  constructor(private readonly produce: OutputProducer = describeTask) {}

  async run(flow: PreparedFlow, session: EngineSession): Promise<unknown> {
    const outputs: Record<string, unknown> = {};
    const failed: string[] = [];
    const plan = flow.plan;

    const runTask = async (key: string): Promise<boolean> => {
      const output = await this.runTask(flow, key, session);
      if (output.done) outputs[key] = output.value;
      else failed.push(key);
      return output.done;
    };

    switch (plan.type) {
      case 'sequential':
        for (const key of plan.order) {
          if (!(await runTask(key))) break;
        }
        break;
      case 'parallel':
        for (const group of plan.groups) {
          const done = await Promise.all(group.map(runTask));
          if (done.includes(false)) break;
        }
        break;
      case 'conditional': {
        const branch = selectBranch(plan.branches, session.inputs['condition']);
        for (const key of branch?.tasks ?? []) {
          if (!(await runTask(key))) break;
        }
        break;
      }
    }
    return { outputs, failed };
  }

  private async runTask(
    flow: PreparedFlow,
    key: string,
    session: EngineSession,
  ): Promise<{ done: true; value: unknown } | { done: false }> {
    const task = flow.tasks.get(key);
    if (!task) throw new EngineError(`Unknown task ${key}`);
    this.checkCancelled(session);
    session.emit({ type: 'task_started', taskKey: key, agentName: task.agent });

    let feedback: string | null = null;
    for (let attempt = 1; ; attempt++) {
      const value = await this.produce({ task, attempt, feedback, inputs: session.inputs });
      this.checkCancelled(session);
      session.emit({ type: 'agent_step', taskKey: key, agentName: task.agent, payload: { attempt } });
      const verdict = session.submitOutput(key, value);
      if (verdict.accepted) return { done: true, value };
      if (verdict.exhausted) return { done: false };
      feedback = verdict.feedback;
    }
  }

  private checkCancelled(session: EngineSession): void {
    if (session.signal.aborted) {
      throw new EngineError('Execution cancelled', { job_id: session.jobId });
    }
  }
}
