import type { WorkflowGraph } from './workflow-definition.interface';

export interface EvaluateTransitionInput {
  graph: WorkflowGraph;
  currentState: string;
  toState: string;
}

export type TransitionDecision =
  | { kind: 'allowed'; fromState: string; toState: string }
  | { kind: 'terminal'; fromState: string; toState: string }
  | {
      kind: 'illegal';
      fromState: string;
      toState: string;
      allowedTargets: string[];
    };

/**
 * Decides whether a single edge may be taken. Pure: no I/O, no clock.
 */
export interface IWorkflowEngine {
  evaluate(input: EvaluateTransitionInput): TransitionDecision;
  allowedTargets(graph: WorkflowGraph, currentState: string): string[];
}
