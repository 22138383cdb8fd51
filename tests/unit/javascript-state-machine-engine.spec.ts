import { JavascriptStateMachineEngine } from '../../src/engines/javascript-state-machine.engine';
import type { WorkflowGraph } from '../../src/interfaces/workflow-definition.interface';
import { counterWorkflow, reviewWorkflow } from '../helpers';

describe('JavascriptStateMachineEngine', () => {
  const engine = new JavascriptStateMachineEngine();

  describe('evaluate', () => {
    it('should allow a declared edge', () => {
      expect(
        engine.evaluate({
          graph: reviewWorkflow,
          currentState: 'draft',
          toState: 'review',
        }),
      ).toEqual({ kind: 'allowed', fromState: 'draft', toState: 'review' });
    });

    it('should reject an undeclared edge and list the allowed targets', () => {
      expect(
        engine.evaluate({
          graph: reviewWorkflow,
          currentState: 'draft',
          toState: 'approved',
        }),
      ).toEqual({
        kind: 'illegal',
        fromState: 'draft',
        toState: 'approved',
        allowedTargets: ['review'],
      });
    });

    it('should report a terminal current state before looking at edges', () => {
      expect(
        engine.evaluate({
          graph: reviewWorkflow,
          currentState: 'approved',
          toState: 'draft',
        }),
      ).toEqual({ kind: 'terminal', fromState: 'approved', toState: 'draft' });
    });

    it('should allow a self-loop', () => {
      expect(
        engine.evaluate({
          graph: counterWorkflow,
          currentState: 'open',
          toState: 'open',
        }).kind,
      ).toBe('allowed');
    });

    it('should reject moves to unknown states', () => {
      const decision = engine.evaluate({
        graph: reviewWorkflow,
        currentState: 'review',
        toState: 'archived',
      });

      expect(decision).toEqual({
        kind: 'illegal',
        fromState: 'review',
        toState: 'archived',
        allowedTargets: ['draft', 'approved', 'rejected'],
      });
    });

    describe('state names the machine treats as wildcards', () => {
      const starGraph: WorkflowGraph = {
        states: ['A', '*', 'B'],
        transitions: { A: ['*'], '*': ['B'] },
        initialState: 'A',
        terminalStates: ['B'],
      };

      it('should not let an edge out of "*" apply to every state', () => {
        expect(
          engine.evaluate({ graph: starGraph, currentState: 'A', toState: 'B' }),
        ).toEqual({
          kind: 'illegal',
          fromState: 'A',
          toState: 'B',
          allowedTargets: ['*'],
        });
        expect(
          engine.evaluate({ graph: starGraph, currentState: 'A', toState: '*' })
            .kind,
        ).toBe('allowed');
        expect(
          engine.evaluate({ graph: starGraph, currentState: '*', toState: 'B' })
            .kind,
        ).toBe('allowed');
        expect(engine.allowedTargets(starGraph, '*')).toEqual(['B']);
      });

      it('should treat an empty state name as an ordinary state', () => {
        const graph: WorkflowGraph = {
          states: ['A', '', 'B'],
          transitions: { A: [''], '': ['B'] },
          initialState: 'A',
          terminalStates: ['B'],
        };

        expect(
          engine.evaluate({ graph, currentState: 'A', toState: 'B' }).kind,
        ).toBe('illegal');
        expect(engine.allowedTargets(graph, 'A')).toEqual(['']);
      });
    });
  });

  describe('allowedTargets', () => {
    it('should keep declaration order', () => {
      expect(engine.allowedTargets(reviewWorkflow, 'review')).toEqual([
        'draft',
        'approved',
        'rejected',
      ]);
    });

    it('should drop duplicate edges', () => {
      const graph: WorkflowGraph = {
        states: ['A', 'B'],
        transitions: { A: ['B', 'B'] },
        initialState: 'A',
        terminalStates: ['B'],
      };

      expect(engine.allowedTargets(graph, 'A')).toEqual(['B']);
    });

    it('should return nothing for a terminal state', () => {
      expect(engine.allowedTargets(reviewWorkflow, 'rejected')).toEqual([]);
    });
  });
});
