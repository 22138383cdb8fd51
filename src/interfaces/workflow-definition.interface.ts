/**
 * The authoring shape of a workflow graph. This is the wire and storage
 * contract other tooling reads and writes.
 */
export interface WorkflowGraph {
  /** Ordered, unique state names. */
  states: string[];
  /** Successor lists keyed by source state. Missing keys mean no successors. */
  transitions: Record<string, string[]>;
  initialState: string;
  /** States with no successors. Reaching one ends the instance. */
  terminalStates: string[];
}

export interface WorkflowDefinitionInput extends WorkflowGraph {
  /** Unique, stable key (e.g. "repair_job" or "repair_job@2"). */
  key: string;
  name?: string;
  /** Names of registered transition guards run before every transition. */
  guards?: string[];
}

export interface WorkflowDefinition extends WorkflowGraph {
  id: string;
  key: string;
  name: string;
  guards: string[];
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type GraphRuleCode =
  | 'malformed-graph'
  | 'duplicate-state'
  | 'initial-state-undeclared'
  | 'terminal-state-undeclared'
  | 'transition-source-undeclared'
  | 'transition-target-undeclared'
  | 'terminal-state-has-outgoing'
  | 'state-unreachable'
  | 'guard-not-registered'
  | 'custom';

export interface GraphViolation {
  rule: GraphRuleCode;
  message: string;
  state?: string;
  from?: string;
  to?: string;
  /** Name of the custom rule that reported the violation. */
  ruleName?: string;
}

export interface GraphValidationResult {
  valid: boolean;
  violations: GraphViolation[];
}

/**
 * Extra, caller-supplied check run after every structural rule passed.
 * Returns a violation message, or null when the graph is acceptable.
 */
export interface GraphRule {
  name: string;
  check(graph: WorkflowGraph): string | null;
}

export interface GraphValidationOptions {
  rules?: GraphRule[];
  /** Stop at the first violation instead of collecting all of them. */
  failFast?: boolean;
}
