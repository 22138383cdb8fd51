import { DefinitionFrozenError } from '../../src/errors/definition-frozen.error';
import { DefinitionNotFoundError } from '../../src/errors/definition-not-found.error';
import { DuplicateDefinitionError } from '../../src/errors/duplicate-definition.error';
import { InvalidGraphError } from '../../src/errors/invalid-graph.error';
import { WorkflowEventType } from '../../src/events/workflow-event-type.enum';
import { abcWorkflow, createWorkflowStack, reviewWorkflow, WorkflowStack } from '../helpers';

describe('WorkflowDefinitionStore', () => {
  let stack: WorkflowStack;

  beforeEach(() => {
    stack = createWorkflowStack();
  });

  describe('register', () => {
    it('should store a valid definition and emit an event', async () => {
      const emitSpy = jest.spyOn(stack.events, 'emit');

      const definition = await stack.definitions.register(abcWorkflow);

      expect(definition).toMatchObject({
        key: 'abc',
        name: 'abc',
        states: ['A', 'B', 'C'],
        transitions: { A: ['B'], B: ['C'] },
        initialState: 'A',
        terminalStates: ['C'],
        guards: [],
        active: true,
      });
      expect(emitSpy).toHaveBeenCalledWith(
        WorkflowEventType.DEFINITION_REGISTERED,
        expect.objectContaining({
          definitionId: definition.id,
          definitionKey: 'abc',
        }),
      );
    });

    it('should refuse a graph with an unreachable state', async () => {
      const attempt = stack.definitions.register({
        key: 'orphaned',
        states: ['A', 'B', 'C', 'ORPHAN'],
        transitions: { A: ['B'], B: ['C'] },
        initialState: 'A',
        terminalStates: ['C'],
      });

      await expect(attempt).rejects.toThrow(InvalidGraphError);
      await expect(attempt).rejects.toMatchObject({
        definitionKey: 'orphaned',
        violations: [
          {
            rule: 'state-unreachable',
            message: "state 'ORPHAN' unreachable from initial state 'A'",
            state: 'ORPHAN',
          },
        ],
      });
      await expect(attempt).rejects.toThrow(
        `Workflow definition "orphaned" is invalid: state 'ORPHAN' unreachable from initial state 'A'`,
      );
      expect(await stack.definitions.list()).toEqual([]);
    });

    it('should refuse a definition naming an unregistered guard', async () => {
      await expect(
        stack.definitions.register({ ...abcWorkflow, guards: ['missing'] }),
      ).rejects.toMatchObject({
        violations: [
          {
            rule: 'guard-not-registered',
            message: "transition guard 'missing' is not registered",
          },
        ],
      });
    });

    it('should report guards that are not an array as a violation', async () => {
      for (const guards of ['missing', { name: 'missing' }, ['ok', 7]]) {
        const attempt = stack.definitions.register({
          ...abcWorkflow,
          guards: guards as unknown as string[],
        });

        await expect(attempt).rejects.toBeInstanceOf(InvalidGraphError);
        await expect(attempt).rejects.toMatchObject({
          violations: [
            {
              rule: 'malformed-graph',
              message: 'guards must be an array of strings',
            },
          ],
        });
      }
      expect(await stack.definitions.list()).toEqual([]);
    });

    it('should apply configured graph rules', async () => {
      stack = createWorkflowStack({
        graphRules: [
          {
            name: 'no-single-letter-states',
            check: (graph) =>
              graph.states.some((s) => s.length === 1)
                ? 'state names must be descriptive'
                : null,
          },
        ],
      });

      await expect(stack.definitions.register(abcWorkflow)).rejects.toThrow(
        'Workflow definition "abc" is invalid: state names must be descriptive',
      );
      await expect(
        stack.definitions.register(reviewWorkflow),
      ).resolves.toMatchObject({ key: 'document_review' });
    });

    it('should refuse a key that already exists', async () => {
      await stack.definitions.register(abcWorkflow);

      await expect(
        stack.definitions.register({ ...abcWorkflow, name: 'ABC again' }),
      ).rejects.toThrow(DuplicateDefinitionError);
    });
  });

  describe('get and list', () => {
    it('should find a definition by key or id', async () => {
      const definition = await stack.definitions.register(abcWorkflow);

      expect(await stack.definitions.get('abc')).toEqual(definition);
      expect(await stack.definitions.get(definition.id)).toEqual(definition);
    });

    it('should throw DefinitionNotFoundError for an unknown key', async () => {
      await expect(stack.definitions.get('nope')).rejects.toThrow(
        'No workflow definition found for "nope".',
      );
      await expect(
        stack.definitions.get('00000000-0000-4000-8000-000000000000'),
      ).rejects.toThrow(DefinitionNotFoundError);
    });

    it('should list only active definitions when asked', async () => {
      await stack.definitions.register(abcWorkflow);
      await stack.definitions.register(reviewWorkflow);
      await stack.definitions.deactivate('abc');

      const active = await stack.definitions.list({ activeOnly: true });
      const all = await stack.definitions.list();

      expect(active.map((d) => d.key)).toEqual(['document_review']);
      expect(all.map((d) => d.key)).toEqual(['abc', 'document_review']);
    });
  });

  describe('updateGraph', () => {
    const extended = {
      states: ['A', 'B', 'C', 'D'],
      transitions: { A: ['B'], B: ['C', 'D'] },
      initialState: 'A',
      terminalStates: ['C', 'D'],
    };

    it('should replace the graph while no instance exists', async () => {
      await stack.definitions.register(abcWorkflow);

      const updated = await stack.definitions.updateGraph('abc', extended);

      expect(updated).toMatchObject({ key: 'abc', ...extended });
      expect(await stack.definitions.get('abc')).toMatchObject(extended);
    });

    it('should refuse an invalid replacement graph', async () => {
      await stack.definitions.register(abcWorkflow);

      await expect(
        stack.definitions.updateGraph('abc', {
          ...extended,
          states: [...extended.states, 'ORPHAN'],
        }),
      ).rejects.toThrow(InvalidGraphError);
      expect((await stack.definitions.get('abc')).states).toEqual(['A', 'B', 'C']);
    });

    it('should freeze the graph once an instance uses it', async () => {
      await stack.definitions.register(abcWorkflow);
      await stack.manager.createInstance({
        definition: 'abc',
        subject: { kind: 'ticket', id: 't-1' },
      });

      const attempt = stack.definitions.updateGraph('abc', extended);

      await expect(attempt).rejects.toThrow(DefinitionFrozenError);
      await expect(attempt).rejects.toThrow(
        'Workflow definition "abc" is referenced by 1 instance(s) and can no longer be edited. ' +
          'Register a new definition to evolve the workflow.',
      );
      expect((await stack.definitions.get('abc')).states).toEqual(['A', 'B', 'C']);
    });
  });

  describe('deactivate and activate', () => {
    it('should flip the active flag and emit on deactivation', async () => {
      await stack.definitions.register(abcWorkflow);
      const emitSpy = jest.spyOn(stack.events, 'emit');

      const deactivated = await stack.definitions.deactivate('abc');
      const reactivated = await stack.definitions.activate('abc');

      expect(deactivated.active).toBe(false);
      expect(reactivated.active).toBe(true);
      expect(emitSpy).toHaveBeenCalledTimes(1);
      expect(emitSpy).toHaveBeenCalledWith(
        WorkflowEventType.DEFINITION_DEACTIVATED,
        expect.objectContaining({ definitionKey: 'abc' }),
      );
    });
  });
});
