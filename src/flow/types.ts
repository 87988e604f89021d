export const FLOW_TYPES = ['sequential', 'parallel', 'conditional'] as const;
export type FlowType = (typeof FLOW_TYPES)[number];

export interface AgentSpec {
  name: string;
  role?: string;
  goal?: string;
  backstory?: string;
  [extra: string]: unknown;
}

export interface TaskSpec {
  key: string;
  agent: string;
  description?: string;
  expected_output?: string;
  /** Guardrail rule config, either an object or its JSON encoding. */
  guardrail?: string | Record<string, unknown>;
  max_retries?: number;
  [extra: string]: unknown;
}

export interface ConditionalBranch {
  condition: string;
  tasks: string[];
}

export type OrderingPlan =
  | { type: 'sequential'; order: string[] }
  | { type: 'parallel'; groups: string[][] }
  | { type: 'conditional'; branches: ConditionalBranch[] };

export interface PreparedFlow {
  agents: ReadonlyMap<string, AgentSpec>;
  tasks: ReadonlyMap<string, TaskSpec>;
  plan: OrderingPlan;
}

/** Seed for a TaskStatus row. */
export interface TaskDef {
  taskKey: string;
  agentName: string | null;
}
