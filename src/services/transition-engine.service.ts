import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { assertTransitionAllowed } from '../engines/assert-transition-allowed';
import { JavascriptStateMachineEngine } from '../engines/javascript-state-machine.engine';
import { ConcurrentModificationError } from '../errors/concurrent-modification.error';
import { DefinitionNotFoundError } from '../errors/definition-not-found.error';
import { IllegalTransitionError } from '../errors/illegal-transition.error';
import { InstanceNotFoundError } from '../errors/instance-not-found.error';
import { InstanceTerminatedError } from '../errors/instance-terminated.error';
import { TransitionBlockedError } from '../errors/transition-blocked.error';
import { WorkflowEventType } from '../events/workflow-event-type.enum';
import type { WorkflowTransitionEvent } from '../events/workflow-events';
import type { IWorkflowDbAdapter } from '../interfaces/workflow-db-adapter.interface';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import type {
  IWorkflowEngine,
  TransitionDecision,
} from '../interfaces/workflow-engine.interface';
import type {
  JsonObject,
  TransitionRecord,
  WorkflowInstance,
} from '../interfaces/workflow-records.interface';
import { Clock, TimestampInput, toValidDate } from '../utils/clock';
import {
  WORKFLOW_CLOCK,
  WORKFLOW_DB_ADAPTER,
  WORKFLOW_ENGINE,
} from '../workflow.constants';
import { AuditLedger } from './audit-ledger.service';
import { TransitionGuardRegistry } from './transition-guard-registry.service';

export type InstanceRef = string | Pick<WorkflowInstance, 'id'>;

export interface TransitionOptions {
  actor?: string | null;
  /** Business time of the change. Defaults to now. */
  effectiveAt?: TimestampInput;
  metadata?: JsonObject;
  /** Proceed past guard warnings; they are kept as `overriddenWarnings`. */
  overrideWarnings?: boolean;
}

export interface TransitionResult {
  instance: WorkflowInstance;
  record: TransitionRecord;
}

export interface TransitionCheck {
  /** Edge declared and no guard blocks it. Warnings may still apply. */
  allowed: boolean;
  decision: TransitionDecision;
  blocks: string[];
  warnings: string[];
}

interface GuardOutcome {
  blocks: string[];
  warnings: string[];
}

@Injectable()
export class TransitionEngine {
  private readonly logger = new Logger(TransitionEngine.name);
  private readonly engine: IWorkflowEngine;

  constructor(
    @Inject(WORKFLOW_DB_ADAPTER) private readonly adapter: IWorkflowDbAdapter,
    private readonly ledger: AuditLedger,
    private readonly guards: TransitionGuardRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(WORKFLOW_CLOCK) private readonly clock: Clock,
    @Optional() @Inject(WORKFLOW_ENGINE) engine?: IWorkflowEngine,
  ) {
    this.engine = engine ?? new JavascriptStateMachineEngine();
  }

  /**
   * Moves an instance along one declared edge after its guards pass. The
   * ledger append and the instance update commit together or not at all.
   */
  async transition(
    ref: InstanceRef,
    toState: string,
    options: TransitionOptions = {},
  ): Promise<TransitionResult> {
    const instanceId = typeof ref === 'string' ? ref : ref.id;
    const requestedAt =
      options.effectiveAt === undefined
        ? undefined
        : toValidDate(options.effectiveAt, 'effectiveAt');
    const actor = options.actor ?? null;

    let outcome: TransitionResult & { definition: WorkflowDefinition };
    try {
      outcome = await this.adapter.transaction(async (txAdapter) => {
        const instance = await txAdapter.findInstance(instanceId, true);
        if (!instance) {
          throw new InstanceNotFoundError(instanceId);
        }
        const definition = await this.loadDefinition(
          txAdapter,
          instance.definitionId,
        );

        assertTransitionAllowed(
          instance.id,
          this.engine.evaluate({
            graph: definition,
            currentState: instance.currentState,
            toState,
          }),
        );

        let metadata: JsonObject = { ...options.metadata };
        const guarded = await this.runGuards(
          definition,
          instance,
          toState,
          actor,
          metadata,
        );
        if (guarded.blocks.length > 0) {
          throw new TransitionBlockedError(instanceId, 'blocked', guarded.blocks);
        }
        if (guarded.warnings.length > 0) {
          if (!options.overrideWarnings) {
            throw new TransitionBlockedError(
              instanceId,
              'warning',
              guarded.warnings,
            );
          }
          metadata = { ...metadata, overriddenWarnings: guarded.warnings };
        }

        const record = await this.ledger.append(
          {
            instanceId,
            fromState: instance.currentState,
            toState,
            actor,
            effectiveAt: requestedAt ?? this.clock.now(),
            metadata,
          },
          txAdapter,
        );

        const updated = await txAdapter.findInstance(instanceId);
        if (!updated) {
          throw new InstanceNotFoundError(instanceId);
        }
        return { definition, instance: updated, record };
      });
    } catch (error) {
      this.logFailure(instanceId, toState, error);
      throw error;
    }

    const { definition, instance, record } = outcome;
    const done = instance.endedAt !== null;

    this.eventEmitter.emit(WorkflowEventType.TRANSITION, {
      definitionKey: definition.key,
      instanceId,
      sequence: record.sequence,
      fromState: record.fromState,
      toState: record.toState,
      actor: record.actor,
      effectiveAt: record.effectiveAt,
      recordedAt: record.recordedAt,
      done,
    } satisfies WorkflowTransitionEvent);

    this.logger.log(
      `Workflow ${definition.key}/${instanceId}: ${record.fromState} -> ${record.toState} (#${record.sequence})${done ? ', done' : ''}`,
    );

    return { instance, record };
  }

  /** Dry run of `transition` against the current state. Writes nothing. */
  async validateTransition(
    ref: InstanceRef,
    toState: string,
    options: Pick<TransitionOptions, 'actor' | 'metadata'> = {},
  ): Promise<TransitionCheck> {
    const { instance, definition } = await this.load(ref);
    const decision = this.engine.evaluate({
      graph: definition,
      currentState: instance.currentState,
      toState,
    });
    if (decision.kind !== 'allowed') {
      return { allowed: false, decision, blocks: [], warnings: [] };
    }

    const { blocks, warnings } = await this.runGuards(
      definition,
      instance,
      toState,
      options.actor ?? null,
      { ...options.metadata },
    );
    return { allowed: blocks.length === 0, decision, blocks, warnings };
  }

  /** Targets declared from the current state; empty once terminal. */
  async getAllowedTransitions(ref: InstanceRef): Promise<string[]> {
    const { instance, definition } = await this.load(ref);
    return this.engine.allowedTargets(definition, instance.currentState);
  }

  private async load(
    ref: InstanceRef,
  ): Promise<{ instance: WorkflowInstance; definition: WorkflowDefinition }> {
    const instanceId = typeof ref === 'string' ? ref : ref.id;
    const instance = await this.adapter.findInstance(instanceId);
    if (!instance) {
      throw new InstanceNotFoundError(instanceId);
    }
    const definition = await this.loadDefinition(
      this.adapter,
      instance.definitionId,
    );
    return { instance, definition };
  }

  private async loadDefinition(
    db: IWorkflowDbAdapter,
    definitionId: string,
  ): Promise<WorkflowDefinition> {
    const definition = await db.findDefinitionById(definitionId);
    if (!definition) {
      throw new DefinitionNotFoundError(definitionId);
    }
    return definition;
  }

  private async runGuards(
    definition: WorkflowDefinition,
    instance: WorkflowInstance,
    toState: string,
    actor: string | null,
    metadata: JsonObject,
  ): Promise<GuardOutcome> {
    const outcome: GuardOutcome = { blocks: [], warnings: [] };

    for (const name of definition.guards) {
      const result = await this.guards.getOrThrow(name).validate({
        definition,
        instance,
        fromState: instance.currentState,
        toState,
        actor,
        metadata,
      });
      outcome.blocks.push(...(result.blocks ?? []));
      outcome.warnings.push(...(result.warnings ?? []));
    }

    return outcome;
  }

  private logFailure(instanceId: string, toState: string, error: unknown): void {
    if (
      error instanceof InstanceNotFoundError ||
      error instanceof IllegalTransitionError ||
      error instanceof InstanceTerminatedError ||
      error instanceof TransitionBlockedError ||
      error instanceof ConcurrentModificationError
    ) {
      this.logger.warn(error.message);
      return;
    }
    this.logger.error(
      `Transition of workflow instance ${instanceId} to "${toState}" rolled back`,
      error instanceof Error ? error.stack : String(error),
    );
  }
}
