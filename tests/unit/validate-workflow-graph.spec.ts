import {
  findReachableStates,
  validateGraph,
  validateWorkflowGraph,
} from '../../src/utils/validate-workflow-graph';
import type { WorkflowGraph } from '../../src/interfaces/workflow-definition.interface';
import { reviewWorkflow } from '../helpers';

/** Deterministic pseudo-random sequence (LCG) so failures reproduce. */
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function randomChainGraph(random: () => number): WorkflowGraph {
  const size = 2 + Math.floor(random() * 8);
  const states = Array.from({ length: size }, (_, i) => `S${i}`);
  const transitions: Record<string, string[]> = {};

  for (let i = 0; i < size - 1; i++) {
    transitions[states[i]] = [states[i + 1]];
    const extra = Math.floor(random() * 3);
    for (let e = 0; e < extra; e++) {
      transitions[states[i]].push(states[Math.floor(random() * size)]);
    }
  }

  return {
    states,
    transitions,
    initialState: 'S0',
    terminalStates: [states[size - 1]],
  };
}

/** Arbitrary edges: cycles, self-loops and unreachable states all occur. */
function randomGraph(random: () => number): WorkflowGraph {
  const size = 2 + Math.floor(random() * 9);
  const states = Array.from({ length: size }, (_, i) => `S${i}`);
  const transitions: Record<string, string[]> = {};

  for (const state of states) {
    const degree = Math.floor(random() * 3);
    if (degree === 0) continue;
    transitions[state] = Array.from(
      { length: degree },
      () => states[Math.floor(random() * size)],
    );
  }

  return {
    states,
    transitions,
    initialState: states[Math.floor(random() * size)],
    terminalStates: [],
  };
}

/** Fixpoint over the edge list, independent of the walk under test. */
function reachableByFixpoint(graph: WorkflowGraph): Set<string> {
  const reached = new Set<string>([graph.initialState]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const [from, targets] of Object.entries(graph.transitions)) {
      if (!reached.has(from)) continue;
      for (const to of targets) {
        if (!reached.has(to)) {
          reached.add(to);
          grew = true;
        }
      }
    }
  }
  return reached;
}

describe('validateWorkflowGraph', () => {
  it('should accept a well-formed graph', () => {
    expect(validateGraph(reviewWorkflow)).toEqual({
      valid: true,
      violations: [],
    });
  });

  it('should report a state with no path from the initial state', () => {
    const result = validateWorkflowGraph(
      ['A', 'B', 'C', 'ORPHAN'],
      { A: ['B'], B: ['C'] },
      'A',
      ['C'],
    );

    expect(result).toEqual({
      valid: false,
      violations: [
        {
          rule: 'state-unreachable',
          message: "state 'ORPHAN' unreachable from initial state 'A'",
          state: 'ORPHAN',
        },
      ],
    });
  });

  it('should report every unreachable state in declaration order', () => {
    const result = validateWorkflowGraph(
      ['A', 'B', 'X', 'Y'],
      { A: ['B'], X: ['Y'] },
      'A',
      ['B'],
    );

    expect(result.violations.map((v) => v.state)).toEqual(['X', 'Y']);
  });

  it('should stop after the first violation with failFast', () => {
    const result = validateWorkflowGraph(
      ['A', 'B', 'X', 'Y'],
      { A: ['B'] },
      'A',
      ['B'],
      { failFast: true },
    );

    expect(result.valid).toBe(false);
    expect(result.violations).toHaveLength(1);
    expect(result.violations[0].state).toBe('X');
  });

  it('should report an undeclared initial state and skip reachability', () => {
    const result = validateWorkflowGraph(['A', 'B'], { A: ['B'] }, 'X', ['B']);

    expect(result.violations).toEqual([
      {
        rule: 'initial-state-undeclared',
        message: "initial state 'X' not in states",
        state: 'X',
      },
    ]);
  });

  it('should report undeclared terminal states', () => {
    const result = validateWorkflowGraph(['A', 'B'], { A: ['B'] }, 'A', [
      'B',
      'DONE',
    ]);

    expect(result.violations).toEqual([
      {
        rule: 'terminal-state-undeclared',
        message: "terminal state 'DONE' not in states",
        state: 'DONE',
      },
    ]);
  });

  it('should report transitions touching undeclared states', () => {
    const result = validateWorkflowGraph(
      ['A', 'B'],
      { A: ['B', 'Z'], Y: ['A'] },
      'A',
      ['B'],
    );

    expect(result.violations).toEqual([
      {
        rule: 'transition-target-undeclared',
        message: "transition from 'A' to unknown state 'Z'",
        from: 'A',
        to: 'Z',
      },
      {
        rule: 'transition-source-undeclared',
        message: "transition from unknown state 'Y'",
        from: 'Y',
      },
    ]);
  });

  it('should report a terminal state with outgoing transitions', () => {
    const result = validateWorkflowGraph(
      ['A', 'B'],
      { A: ['B'], B: ['A'] },
      'A',
      ['B'],
    );

    expect(result.violations).toEqual([
      {
        rule: 'terminal-state-has-outgoing',
        message: "terminal state 'B' has outgoing transitions",
        state: 'B',
      },
    ]);
  });

  it('should report duplicate state names', () => {
    const result = validateWorkflowGraph(
      ['A', 'B', 'A'],
      { A: ['B'] },
      'A',
      ['B'],
    );

    expect(result.violations).toEqual([
      {
        rule: 'duplicate-state',
        message: "state 'A' is declared more than once",
        state: 'A',
      },
    ]);
  });

  it('should report malformed input instead of throwing', () => {
    const result = validateWorkflowGraph('nope', null, 42, ['x']);

    expect(result).toEqual({
      valid: false,
      violations: [
        { rule: 'malformed-graph', message: 'states must be an array of strings' },
        {
          rule: 'malformed-graph',
          message: 'transitions must map each state to an array of strings',
        },
        { rule: 'malformed-graph', message: 'initialState must be a string' },
      ],
    });
  });

  it('should reject successor lists that are not arrays', () => {
    const result = validateWorkflowGraph(['A', 'B'], { A: 'B' }, 'A', ['B']);

    expect(result.violations.map((v) => v.rule)).toEqual(['malformed-graph']);
  });

  describe('custom rules', () => {
    it('should run custom rules once the structure is sound', () => {
      const result = validateGraph(reviewWorkflow, {
        rules: [
          {
            name: 'max-three-states',
            check: (graph) =>
              graph.states.length > 3 ? 'too many states' : null,
          },
          { name: 'always-ok', check: () => null },
        ],
      });

      expect(result.violations).toEqual([
        { rule: 'custom', ruleName: 'max-three-states', message: 'too many states' },
      ]);
    });

    it('should not run custom rules on a structurally invalid graph', () => {
      const check = jest.fn().mockReturnValue(null);

      validateWorkflowGraph(['A', 'ORPHAN'], {}, 'A', [], {
        rules: [{ name: 'spy', check }],
      });

      expect(check).not.toHaveBeenCalled();
    });

    it('should turn a throwing rule into a violation', () => {
      const result = validateGraph(reviewWorkflow, {
        rules: [
          {
            name: 'explodes',
            check: () => {
              throw new Error('boom');
            },
          },
        ],
      });

      expect(result.violations).toEqual([
        { rule: 'custom', ruleName: 'explodes', message: 'rule threw: boom' },
      ]);
    });
  });

  it('should flag an added orphan in randomly generated chain graphs', () => {
    const random = createRandom(20240301);

    for (let run = 0; run < 200; run++) {
      const graph = randomChainGraph(random);
      expect(validateGraph(graph).valid).toBe(true);

      const withOrphan: WorkflowGraph = {
        ...graph,
        states: [...graph.states, 'ORPHAN'],
        transitions: { ...graph.transitions, ORPHAN: ['S0'] },
      };
      expect(validateGraph(withOrphan).violations).toEqual([
        {
          rule: 'state-unreachable',
          message: "state 'ORPHAN' unreachable from initial state 'S0'",
          state: 'ORPHAN',
        },
      ]);
    }
  });
});

describe('reachability on randomly generated graphs', () => {
  it('should flag exactly the states a fixpoint cannot reach', () => {
    const random = createRandom(20240417);
    let sawUnreachable = 0;
    let sawCycle = 0;

    for (let run = 0; run < 300; run++) {
      const graph = randomGraph(random);
      const reached = reachableByFixpoint(graph);
      const expected = graph.states
        .filter((state) => !reached.has(state))
        .map((state) => ({
          rule: 'state-unreachable',
          message: `state '${state}' unreachable from initial state '${graph.initialState}'`,
          state,
        }));

      expect(validateGraph(graph).violations).toEqual(expected);
      expect(
        [...findReachableStates(graph.initialState, graph.transitions)].sort(),
      ).toEqual([...reached].sort());

      if (expected.length > 1) sawUnreachable++;
      if (
        Object.entries(graph.transitions).some(([from, targets]) =>
          targets.some(
            (to) => to === from || (graph.transitions[to] ?? []).includes(from),
          ),
        )
      ) {
        sawCycle++;
      }
    }

    // the generator must actually cover the interesting shapes
    expect(sawUnreachable).toBeGreaterThan(0);
    expect(sawCycle).toBeGreaterThan(0);
  });
});

describe('findReachableStates', () => {
  it('should include the start state and follow cycles once', () => {
    const reachable = findReachableStates('A', {
      A: ['B'],
      B: ['C', 'A'],
      C: ['B'],
      D: ['A'],
    });

    expect([...reachable]).toEqual(['A', 'B', 'C']);
  });

  it('should ignore inherited object keys', () => {
    expect([...findReachableStates('toString', {})]).toEqual(['toString']);
  });
});
