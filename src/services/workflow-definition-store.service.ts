import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DefinitionFrozenError } from '../errors/definition-frozen.error';
import { DefinitionNotFoundError } from '../errors/definition-not-found.error';
import { DuplicateDefinitionError } from '../errors/duplicate-definition.error';
import { InvalidGraphError } from '../errors/invalid-graph.error';
import { WorkflowEventType } from '../events/workflow-event-type.enum';
import type {
  WorkflowDefinitionDeactivatedEvent,
  WorkflowDefinitionRegisteredEvent,
} from '../events/workflow-events';
import type { IWorkflowDbAdapter } from '../interfaces/workflow-db-adapter.interface';
import type {
  GraphRule,
  GraphViolation,
  WorkflowDefinition,
  WorkflowDefinitionInput,
  WorkflowGraph,
} from '../interfaces/workflow-definition.interface';
import { isStringArray, validateGraph } from '../utils/validate-workflow-graph';
import { WORKFLOW_DB_ADAPTER, WORKFLOW_GRAPH_RULES } from '../workflow.constants';
import { TransitionGuardRegistry } from './transition-guard-registry.service';

const UUID_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface ListDefinitionsOptions {
  activeOnly?: boolean;
}

function copyGraph(graph: WorkflowGraph): WorkflowGraph {
  return {
    states: [...graph.states],
    transitions: Object.fromEntries(
      Object.entries(graph.transitions).map(([from, targets]) => [
        from,
        [...targets],
      ]),
    ),
    initialState: graph.initialState,
    terminalStates: [...graph.terminalStates],
  };
}

@Injectable()
export class WorkflowDefinitionStore {
  private readonly logger = new Logger(WorkflowDefinitionStore.name);
  private readonly graphRules: GraphRule[];

  constructor(
    @Inject(WORKFLOW_DB_ADAPTER) private readonly adapter: IWorkflowDbAdapter,
    private readonly guards: TransitionGuardRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Optional() @Inject(WORKFLOW_GRAPH_RULES) graphRules?: GraphRule[],
  ) {
    this.graphRules = graphRules ?? [];
  }

  /**
   * Validates and stores a new definition. Keys are unique: evolving a
   * workflow means registering it again under a new key.
   */
  async register(input: WorkflowDefinitionInput): Promise<WorkflowDefinition> {
    const guards: unknown = input.guards ?? [];
    const violations = this.check(input, guards);
    if (violations.length > 0 || !isStringArray(guards)) {
      throw new InvalidGraphError(input.key, violations);
    }

    if (await this.adapter.findDefinitionByKey(input.key)) {
      throw new DuplicateDefinitionError(input.key);
    }

    const definition = await this.adapter.insertDefinition({
      ...copyGraph(input),
      key: input.key,
      name: input.name ?? input.key,
      guards: [...guards],
      active: true,
    });

    this.eventEmitter.emit(WorkflowEventType.DEFINITION_REGISTERED, {
      definitionId: definition.id,
      definitionKey: definition.key,
      timestamp: new Date(),
    } satisfies WorkflowDefinitionRegisteredEvent);

    this.logger.log(
      `Registered workflow definition ${definition.key} (${definition.states.length} states)`,
    );
    return definition;
  }

  /** Looks a definition up by id when given a UUID, otherwise by key. */
  async get(keyOrId: string): Promise<WorkflowDefinition> {
    const definition = UUID_REGEX.test(keyOrId)
      ? ((await this.adapter.findDefinitionById(keyOrId)) ??
        (await this.adapter.findDefinitionByKey(keyOrId)))
      : await this.adapter.findDefinitionByKey(keyOrId);

    if (!definition) {
      throw new DefinitionNotFoundError(keyOrId);
    }
    return definition;
  }

  list(options: ListDefinitionsOptions = {}): Promise<WorkflowDefinition[]> {
    return this.adapter.listDefinitions(options.activeOnly ?? false);
  }

  /**
   * Replaces the graph of a definition no instance has used yet. Holds the
   * definition row lock so no instance can attach while the graph changes.
   */
  async updateGraph(
    keyOrId: string,
    graph: WorkflowGraph,
  ): Promise<WorkflowDefinition> {
    const { id } = await this.get(keyOrId);

    const updated = await this.adapter.transaction(async (txAdapter) => {
      const definition = await txAdapter.findDefinitionById(id, 'update');
      if (!definition) {
        throw new DefinitionNotFoundError(id);
      }

      const instanceCount = await txAdapter.countInstances(id);
      if (instanceCount > 0) {
        throw new DefinitionFrozenError(id, definition.key, instanceCount);
      }

      const violations = this.check(graph, definition.guards);
      if (violations.length > 0) {
        throw new InvalidGraphError(definition.key, violations);
      }

      await txAdapter.updateDefinitionGraph(id, copyGraph(graph));
      const reloaded = await txAdapter.findDefinitionById(id);
      if (!reloaded) {
        throw new DefinitionNotFoundError(id);
      }
      return reloaded;
    });

    this.logger.log(`Replaced graph of workflow definition ${updated.key}`);
    return updated;
  }

  /** Stops new instances from starting. Running instances are unaffected. */
  async deactivate(keyOrId: string): Promise<WorkflowDefinition> {
    const definition = await this.setActive(keyOrId, false);

    this.eventEmitter.emit(WorkflowEventType.DEFINITION_DEACTIVATED, {
      definitionId: definition.id,
      definitionKey: definition.key,
      timestamp: new Date(),
    } satisfies WorkflowDefinitionDeactivatedEvent);

    this.logger.log(`Deactivated workflow definition ${definition.key}`);
    return definition;
  }

  async activate(keyOrId: string): Promise<WorkflowDefinition> {
    const definition = await this.setActive(keyOrId, true);
    this.logger.log(`Activated workflow definition ${definition.key}`);
    return definition;
  }

  private async setActive(
    keyOrId: string,
    active: boolean,
  ): Promise<WorkflowDefinition> {
    const definition = await this.get(keyOrId);
    if (definition.active !== active) {
      await this.adapter.setDefinitionActive(definition.id, active);
    }
    return this.get(definition.id);
  }

  private check(graph: WorkflowGraph, guards: unknown): GraphViolation[] {
    const { violations } = validateGraph(graph, { rules: this.graphRules });
    if (!isStringArray(guards)) {
      return [
        ...violations,
        { rule: 'malformed-graph', message: 'guards must be an array of strings' },
      ];
    }
    const missingGuards = guards
      .filter((name) => !this.guards.has(name))
      .map(
        (name): GraphViolation => ({
          rule: 'guard-not-registered',
          message: `transition guard '${name}' is not registered`,
        }),
      );
    return [...violations, ...missingGuards];
  }
}
