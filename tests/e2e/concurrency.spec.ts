import { IllegalTransitionError } from '../../src/errors/illegal-transition.error';
import {
  counterWorkflow,
  createWorkflowStack,
  reviewWorkflow,
  WorkflowStack,
} from '../helpers';

describe('E2E: Concurrency (in-memory row locks)', () => {
  let stack: WorkflowStack;

  beforeEach(async () => {
    stack = createWorkflowStack();
    await stack.definitions.register(reviewWorkflow);
    await stack.definitions.register(counterWorkflow);
  });

  it('should let exactly one of two racing transitions win', async () => {
    const instance = await stack.manager.createInstance({
      definition: 'document_review',
      subject: { kind: 'document', id: 'doc-1' },
    });

    const results = await Promise.allSettled([
      stack.engine.transition(instance, 'review', { actor: 'alice' }),
      stack.engine.transition(instance, 'review', { actor: 'bob' }),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected',
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(IllegalTransitionError);

    const history = await stack.ledger.history(instance.id);
    expect(history).toHaveLength(1);
    expect(await stack.manager.getInstance(instance.id)).toMatchObject({
      currentState: 'review',
      version: 1,
    });
  });

  it('should serialize parallel transitions on the same instance', async () => {
    const instance = await stack.manager.createInstance({
      definition: 'counter',
      subject: { kind: 'meter', id: 'm-1' },
    });

    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        stack.engine.transition(instance, 'open', { actor: `worker-${i}` }),
      ),
    );

    expect(results.map((r) => r.record.sequence).sort((a, b) => a - b)).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8, 9, 10,
    ]);

    const history = await stack.ledger.history(instance.id);
    expect(history.map((r) => r.sequence)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(new Set(history.map((r) => r.actor)).size).toBe(10);
    expect(await stack.manager.getInstance(instance.id)).toMatchObject({
      currentState: 'open',
      version: 10,
    });
  });

  it('should not block transitions of different instances', async () => {
    const instances = await Promise.all(
      ['m-1', 'm-2', 'm-3', 'm-4', 'm-5'].map((id) =>
        stack.manager.createInstance({
          definition: 'counter',
          subject: { kind: 'meter', id },
        }),
      ),
    );

    const results = await Promise.all(
      instances.map((instance) => stack.engine.transition(instance, 'closed')),
    );

    expect(results.map((r) => r.record.sequence)).toEqual([1, 1, 1, 1, 1]);
    expect(results.every((r) => r.instance.endedAt !== null)).toBe(true);
    expect(
      await stack.manager.findByState('counter', 'closed'),
    ).toHaveLength(5);
  });
});
