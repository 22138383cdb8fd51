import type {
  GraphValidationOptions,
  GraphValidationResult,
  GraphViolation,
  WorkflowGraph,
} from '../interfaces/workflow-definition.interface';

export function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

function isAdjacencyList(value: unknown): value is Record<string, string[]> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isStringArray)
  );
}

function shapeViolations(
  states: unknown,
  transitions: unknown,
  initialState: unknown,
  terminalStates: unknown,
): GraphViolation[] {
  const problems: string[] = [];
  if (!isStringArray(states)) problems.push('states must be an array of strings');
  if (!isAdjacencyList(transitions)) {
    problems.push('transitions must map each state to an array of strings');
  }
  if (typeof initialState !== 'string') {
    problems.push('initialState must be a string');
  }
  if (!isStringArray(terminalStates)) {
    problems.push('terminalStates must be an array of strings');
  }

  return problems.map((message) => ({ rule: 'malformed-graph', message }));
}

/**
 * Breadth-first walk from `start` over the adjacency list.
 * The start state is always part of the result.
 */
export function findReachableStates(
  start: string,
  transitions: Record<string, string[]>,
): Set<string> {
  const visited = new Set<string>([start]);
  const queue: string[] = [start];

  for (let head = 0; head < queue.length; head++) {
    const successors = Object.prototype.hasOwnProperty.call(
      transitions,
      queue[head],
    )
      ? transitions[queue[head]]
      : [];
    for (const next of successors) {
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }

  return visited;
}

function structuralViolations(graph: WorkflowGraph): GraphViolation[] {
  const { states, transitions, initialState, terminalStates } = graph;
  const violations: GraphViolation[] = [];
  const declared = new Set<string>();

  for (const state of states) {
    if (declared.has(state)) {
      violations.push({
        rule: 'duplicate-state',
        message: `state '${state}' is declared more than once`,
        state,
      });
    }
    declared.add(state);
  }

  if (!declared.has(initialState)) {
    violations.push({
      rule: 'initial-state-undeclared',
      message: `initial state '${initialState}' not in states`,
      state: initialState,
    });
  }

  for (const terminal of terminalStates) {
    if (!declared.has(terminal)) {
      violations.push({
        rule: 'terminal-state-undeclared',
        message: `terminal state '${terminal}' not in states`,
        state: terminal,
      });
    }
  }

  for (const [from, targets] of Object.entries(transitions)) {
    if (!declared.has(from)) {
      violations.push({
        rule: 'transition-source-undeclared',
        message: `transition from unknown state '${from}'`,
        from,
      });
    }
    for (const to of targets) {
      if (!declared.has(to)) {
        violations.push({
          rule: 'transition-target-undeclared',
          message: `transition from '${from}' to unknown state '${to}'`,
          from,
          to,
        });
      }
    }
  }

  for (const terminal of new Set(terminalStates)) {
    const outgoing = Object.prototype.hasOwnProperty.call(transitions, terminal)
      ? transitions[terminal]
      : [];
    if (outgoing.length > 0) {
      violations.push({
        rule: 'terminal-state-has-outgoing',
        message: `terminal state '${terminal}' has outgoing transitions`,
        state: terminal,
      });
    }
  }

  if (declared.has(initialState)) {
    const reachable = findReachableStates(initialState, transitions);
    for (const state of declared) {
      if (!reachable.has(state)) {
        violations.push({
          rule: 'state-unreachable',
          message: `state '${state}' unreachable from initial state '${initialState}'`,
          state,
        });
      }
    }
  }

  return violations;
}

/**
 * Checks a proposed graph for structural soundness. Total over its input:
 * malformed values are reported as violations, never thrown.
 */
export function validateWorkflowGraph(
  states: unknown,
  transitions: unknown,
  initialState: unknown,
  terminalStates: unknown,
  options: GraphValidationOptions = {},
): GraphValidationResult {
  const finish = (violations: GraphViolation[]): GraphValidationResult => {
    const reported = options.failFast ? violations.slice(0, 1) : violations;
    return { valid: reported.length === 0, violations: reported };
  };

  const malformed = shapeViolations(
    states,
    transitions,
    initialState,
    terminalStates,
  );
  if (
    malformed.length > 0 ||
    !isStringArray(states) ||
    !isAdjacencyList(transitions) ||
    typeof initialState !== 'string' ||
    !isStringArray(terminalStates)
  ) {
    return finish(malformed);
  }

  const graph: WorkflowGraph = {
    states,
    transitions,
    initialState,
    terminalStates,
  };

  const structural = structuralViolations(graph);
  if (structural.length > 0) {
    return finish(structural);
  }

  const custom: GraphViolation[] = [];
  for (const rule of options.rules ?? []) {
    let message: string | null;
    try {
      message = rule.check(graph);
    } catch (error) {
      message = `rule threw: ${error instanceof Error ? error.message : String(error)}`;
    }
    if (message !== null) {
      custom.push({ rule: 'custom', ruleName: rule.name, message });
      if (options.failFast) break;
    }
  }

  return finish(custom);
}

export function validateGraph(
  graph: WorkflowGraph,
  options?: GraphValidationOptions,
): GraphValidationResult {
  return validateWorkflowGraph(
    graph.states,
    graph.transitions,
    graph.initialState,
    graph.terminalStates,
    options,
  );
}
