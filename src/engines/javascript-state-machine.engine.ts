import StateMachine from 'javascript-state-machine';
import type { WorkflowGraph } from '../interfaces/workflow-definition.interface';
import type {
  EvaluateTransitionInput,
  IWorkflowEngine,
  TransitionDecision,
} from '../interfaces/workflow-engine.interface';

const TRANSITION_PREFIX = 'enter:';
const UNDECLARED_STATE = 'undeclared';

/**
 * State names are opaque to the workflow but not to the machine, which
 * reads '*' (and '') as "any state". The machine only ever sees one
 * positional token per declared state.
 */
interface MachineTokens {
  toToken: Map<string, string>;
  toState: Map<string, string>;
}

function tokenize(graph: WorkflowGraph): MachineTokens {
  const toToken = new Map<string, string>();
  const toState = new Map<string, string>();
  graph.states.forEach((state, index) => {
    if (toToken.has(state)) return;
    const token = `s${index}`;
    toToken.set(state, token);
    toState.set(token, state);
  });
  return { toToken, toState };
}

/** One machine transition per target, named after the state it enters. */
function transitionName(token: string): string {
  return `${TRANSITION_PREFIX}${token}`;
}

function buildMachine(
  graph: WorkflowGraph,
  tokens: MachineTokens,
  currentState: string,
): StateMachine {
  const transitions = Object.entries(graph.transitions).flatMap(
    ([from, targets]) => {
      const fromToken = tokens.toToken.get(from);
      if (fromToken === undefined) return [];
      return targets.flatMap((to) => {
        const toToken = tokens.toToken.get(to);
        return toToken === undefined
          ? []
          : [{ name: transitionName(toToken), from: fromToken, to: toToken }];
      });
    },
  );

  return new StateMachine({
    init: tokens.toToken.get(currentState) ?? UNDECLARED_STATE,
    transitions,
  });
}

export class JavascriptStateMachineEngine implements IWorkflowEngine {
  evaluate(input: EvaluateTransitionInput): TransitionDecision {
    const { graph, currentState, toState } = input;

    if (graph.terminalStates.includes(currentState)) {
      return { kind: 'terminal', fromState: currentState, toState };
    }

    const tokens = tokenize(graph);
    const target = tokens.toToken.get(toState);
    if (
      target !== undefined &&
      buildMachine(graph, tokens, currentState).can(transitionName(target))
    ) {
      return { kind: 'allowed', fromState: currentState, toState };
    }

    return {
      kind: 'illegal',
      fromState: currentState,
      toState,
      allowedTargets: this.allowedTargets(graph, currentState),
    };
  }

  allowedTargets(graph: WorkflowGraph, currentState: string): string[] {
    if (graph.terminalStates.includes(currentState)) {
      return [];
    }

    const tokens = tokenize(graph);
    const fsm = buildMachine(graph, tokens, currentState);
    const targets = fsm
      .transitions()
      .filter((name) => name.startsWith(TRANSITION_PREFIX))
      .map((name) => tokens.toState.get(name.slice(TRANSITION_PREFIX.length)));

    // keep declaration order, drop duplicate edges
    const declared = Object.prototype.hasOwnProperty.call(
      graph.transitions,
      currentState,
    )
      ? graph.transitions[currentState]
      : [];
    return declared.filter(
      (target, index) =>
        targets.includes(target) && declared.indexOf(target) === index,
    );
  }
}
