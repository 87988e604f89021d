import { ConfigError } from '../shared/errors.js';
import { AgentSpecSchema, TaskSpecSchema, formatZodError } from '../shared/schemas.js';
import { parseGuardrailConfig } from '../guardrails/factory.js';
import { FLOW_TYPES } from './types.js';
import type {
  AgentSpec,
  ConditionalBranch,
  FlowType,
  OrderingPlan,
  PreparedFlow,
  TaskDef,
  TaskSpec,
} from './types.js';

type Obj = Record<string, unknown>;

function isObject(value: unknown): value is Obj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isObject(value)) return Object.keys(value).length === 0;
  return false;
}

function isFlowType(value: unknown): value is FlowType {
  return FLOW_TYPES.some((t) => t === value);
}

/**
 * Sections may be written as a map keyed by name or as a list of entries
 * carrying a `name` field. Both normalize to [name, entry] pairs.
 */
function namedEntries(section: unknown, kind: 'Agent' | 'Task'): Array<[string, Obj]> {
  if (Array.isArray(section)) {
    return section.map((entry, index) => {
      if (!isObject(entry)) {
        throw new ConfigError(`${kind} entry ${index} must be an object`);
      }
      const name = entry['name'];
      if (typeof name !== 'string' || name.length === 0) {
        throw new ConfigError(`${kind} must have a name`, { index });
      }
      return [name, entry];
    });
  }
  if (isObject(section)) {
    return Object.entries(section).map(([name, entry]) => {
      if (!isObject(entry)) {
        throw new ConfigError(`${kind} ${name} must be an object`);
      }
      return [name, entry];
    });
  }
  throw new ConfigError(`Section ${kind === 'Agent' ? 'agents' : 'tasks'} must be a map or a list`);
}

function prepareAgents(section: unknown): Map<string, AgentSpec> {
  const agents = new Map<string, AgentSpec>();
  for (const [name, entry] of namedEntries(section, 'Agent')) {
    if (agents.has(name)) throw new ConfigError(`Duplicate agent: ${name}`);
    const parsed = AgentSpecSchema.safeParse(entry);
    if (!parsed.success) {
      throw new ConfigError(`Invalid agent ${name}: ${formatZodError(parsed.error)}`);
    }
    agents.set(name, { ...parsed.data, name });
  }
  return agents;
}

function prepareTasks(section: unknown, agents: ReadonlyMap<string, AgentSpec>): Map<string, TaskSpec> {
  const tasks = new Map<string, TaskSpec>();
  for (const [name, entry] of namedEntries(section, 'Task')) {
    if (tasks.has(name)) throw new ConfigError(`Duplicate task: ${name}`);
    const agent = entry['agent'];
    if (typeof agent !== 'string' || agent.length === 0) {
      throw new ConfigError(`Task ${name} must be assigned to an agent`);
    }
    if (!agents.has(agent)) {
      throw new ConfigError(`Task ${name} assigned to undefined agent: ${agent}`, {
        task: name,
        agent,
      });
    }
    const parsed = TaskSpecSchema.safeParse(entry);
    if (!parsed.success) {
      throw new ConfigError(`Invalid task ${name}: ${formatZodError(parsed.error)}`);
    }
    if (parsed.data.guardrail !== undefined) {
      const guardrail = parseGuardrailConfig(parsed.data.guardrail);
      if (!guardrail.ok) {
        throw new ConfigError(`Task ${name}: ${guardrail.error.message}`, { task: name });
      }
    }
    tasks.set(name, { ...parsed.data, key: name, agent });
  }
  return tasks;
}

function taskNameList(value: unknown, notAList: string): string[] {
  if (!Array.isArray(value)) throw new ConfigError(notAList);
  return value.map((item) => {
    if (typeof item !== 'string') throw new ConfigError(`${notAList}: entries must be task names`);
    return item;
  });
}

function requireDefined(names: string[], tasks: ReadonlyMap<string, TaskSpec>, message: string): void {
  for (const name of names) {
    if (!tasks.has(name)) throw new ConfigError(`${message}: ${name}`, { task: name });
  }
}

function requireUnique(names: string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) throw new ConfigError(`Task ${name} appears more than once in the flow`);
    seen.add(name);
  }
}

function buildPlan(type: FlowType, flow: Obj, tasks: ReadonlyMap<string, TaskSpec>): OrderingPlan {
  switch (type) {
    case 'sequential': {
      if (isEmpty(flow['tasks'])) {
        throw new ConfigError('Sequential flow must define tasks sequence');
      }
      const order = taskNameList(flow['tasks'], 'Sequential flow tasks must be a list');
      requireDefined(order, tasks, 'Undefined task in flow sequence');
      requireUnique(order);
      return { type, order };
    }
    case 'parallel': {
      const raw = flow['parallel_tasks'];
      if (isEmpty(raw)) {
        throw new ConfigError('Parallel flow must define parallel task groups');
      }
      if (!Array.isArray(raw)) throw new ConfigError('Parallel task groups must be a list');
      const groups = raw.map((group) => {
        const names = taskNameList(group, 'Parallel task group must be a list');
        if (names.length === 0) throw new ConfigError('Parallel task group must not be empty');
        requireDefined(names, tasks, 'Undefined task in parallel group');
        return names;
      });
      requireUnique(groups.flat());
      return { type, groups };
    }
    case 'conditional': {
      const raw = flow['conditional_tasks'];
      if (isEmpty(raw)) {
        throw new ConfigError('Conditional flow must define conditional tasks');
      }
      if (!isObject(raw)) throw new ConfigError('Conditional tasks must be a map of condition to tasks');
      const branches: ConditionalBranch[] = Object.entries(raw).map(([condition, value]) => {
        const names = taskNameList(value, `Tasks for condition ${condition} must be a list`);
        if (names.length === 0) {
          throw new ConfigError(`Tasks for condition ${condition} must not be empty`);
        }
        requireDefined(names, tasks, 'Undefined task in conditional flow');
        requireUnique(names);
        return { condition, tasks: names };
      });
      return { type, branches };
    }
  }
}

/**
 * Validate a flow definition and normalize it for dispatch. Pure: throws
 * ConfigError on the first problem found and touches no storage.
 */
export function prepareFlow(definition: unknown): PreparedFlow {
  if (!isObject(definition)) {
    throw new ConfigError('Flow definition must be an object');
  }
  for (const section of ['agents', 'tasks', 'flow']) {
    if (isEmpty(definition[section])) {
      throw new ConfigError(`Missing or empty required section: ${section}`, { section });
    }
  }

  const flow = definition['flow'];
  if (!isObject(flow)) throw new ConfigError('Section flow must be a map');
  const type = flow['type'];
  if (!isFlowType(type)) {
    throw new ConfigError(
      `Invalid flow type: ${String(type)}. Must be one of ${FLOW_TYPES.join(', ')}`,
    );
  }

  const agents = prepareAgents(definition['agents']);
  const tasks = prepareTasks(definition['tasks'], agents);
  const plan = buildPlan(type, flow, tasks);
  return { agents, tasks, plan };
}

/** Every task key the plan can dispatch, in plan order, without duplicates. */
export function planTaskKeys(plan: OrderingPlan): string[] {
  switch (plan.type) {
    case 'sequential':
      return [...plan.order];
    case 'parallel':
      return plan.groups.flat();
    case 'conditional':
      return [...new Set(plan.branches.flatMap((b) => b.tasks))];
  }
}

export function taskDef(flow: PreparedFlow, taskKey: string): TaskDef {
  return { taskKey, agentName: flow.tasks.get(taskKey)?.agent ?? null };
}

/** Pick the branch for a conditional plan: the named one, else the first. */
export function selectBranch(
  branches: ConditionalBranch[],
  condition: unknown,
): ConditionalBranch | undefined {
  const named = typeof condition === 'string' ? branches.find((b) => b.condition === condition) : undefined;
  return named ?? branches[0];
}
