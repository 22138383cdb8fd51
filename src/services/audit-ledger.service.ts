import { Inject, Injectable, Optional } from '@nestjs/common';
import { assertTransitionAllowed } from '../engines/assert-transition-allowed';
import { JavascriptStateMachineEngine } from '../engines/javascript-state-machine.engine';
import { ConcurrentModificationError } from '../errors/concurrent-modification.error';
import { DefinitionNotFoundError } from '../errors/definition-not-found.error';
import { InstanceNotFoundError } from '../errors/instance-not-found.error';
import { LedgerChainError } from '../errors/ledger-chain.error';
import type { IWorkflowDbAdapter } from '../interfaces/workflow-db-adapter.interface';
import type { IWorkflowEngine } from '../interfaces/workflow-engine.interface';
import type {
  NewTransitionRow,
  TransitionRecord,
  WorkflowInstance,
} from '../interfaces/workflow-records.interface';
import { Clock, latestOf, TimestampInput, toValidDate } from '../utils/clock';
import { stateAsOf, stateRecordedAsOf } from '../utils/temporal-queries';
import {
  WORKFLOW_CLOCK,
  WORKFLOW_DB_ADAPTER,
  WORKFLOW_ENGINE,
} from '../workflow.constants';

/** What a caller supplies; the ledger assigns sequence and recordedAt. */
export type AppendTransitionInput = Omit<
  NewTransitionRow,
  'sequence' | 'recordedAt'
>;

export interface AsOfOptions {
  /** Ignore records appended after this wall-clock time. */
  knownAt?: TimestampInput;
}

/**
 * Append-only store of transition records. There is no way to change or
 * remove a record through this service or the adapter underneath it, and
 * no way to append one without moving the instance along with it.
 */
@Injectable()
export class AuditLedger {
  private readonly engine: IWorkflowEngine;

  constructor(
    @Inject(WORKFLOW_DB_ADAPTER) private readonly adapter: IWorkflowDbAdapter,
    @Inject(WORKFLOW_CLOCK) private readonly clock: Clock,
    @Optional() @Inject(WORKFLOW_ENGINE) engine?: IWorkflowEngine,
  ) {
    this.engine = engine ?? new JavascriptStateMachineEngine();
  }

  /**
   * Appends the next record of an instance and moves its cached state in
   * the same unit of work, holding the instance row lock. The record must
   * continue from the current state along a declared edge. Pass a
   * transaction-bound adapter to join an outer unit of work.
   * recordedAt never goes below the previous record's.
   */
  async append(
    input: AppendTransitionInput,
    db: IWorkflowDbAdapter = this.adapter,
  ): Promise<TransitionRecord> {
    const effectiveAt = toValidDate(input.effectiveAt, 'effectiveAt');

    return db.transaction(async (txAdapter) => {
      const instance = await txAdapter.findInstance(input.instanceId, true);
      if (!instance) {
        throw new InstanceNotFoundError(input.instanceId);
      }
      if (input.fromState !== instance.currentState) {
        throw new LedgerChainError(
          instance.id,
          instance.currentState,
          input.fromState,
        );
      }

      const definition = await txAdapter.findDefinitionById(
        instance.definitionId,
      );
      if (!definition) {
        throw new DefinitionNotFoundError(instance.definitionId);
      }
      assertTransitionAllowed(
        instance.id,
        this.engine.evaluate({
          graph: definition,
          currentState: instance.currentState,
          toState: input.toState,
        }),
      );

      const tail = await txAdapter.findLastTransition(instance.id);
      const tailSequence = tail?.sequence ?? 0;
      if (tailSequence !== instance.version) {
        throw new ConcurrentModificationError(
          instance.id,
          instance.version,
          tailSequence,
        );
      }

      const now = this.clock.now();
      const record = await txAdapter.insertTransition({
        instanceId: instance.id,
        fromState: input.fromState,
        toState: input.toState,
        actor: input.actor,
        effectiveAt,
        metadata: { ...input.metadata },
        sequence: tailSequence + 1,
        recordedAt: tail ? latestOf(now, tail.recordedAt) : now,
      });

      const done = definition.terminalStates.includes(input.toState);
      const swapped = await txAdapter.updateInstanceState(
        instance.id,
        {
          currentState: input.toState,
          endedAt: done ? record.effectiveAt : null,
          version: record.sequence,
        },
        instance.version,
      );
      if (!swapped) {
        const current = await txAdapter.findInstance(instance.id);
        throw new ConcurrentModificationError(
          instance.id,
          instance.version,
          current?.version ?? null,
        );
      }

      return record;
    });
  }

  history(instanceId: string): Promise<TransitionRecord[]> {
    return this.adapter.findTransitions(instanceId);
  }

  /**
   * State the instance was in at business time `at`, or null if it had not
   * started yet. With `knownAt`, answers from the records that had been
   * appended by then.
   */
  async asOf(
    instanceId: string,
    at: TimestampInput,
    options: AsOfOptions = {},
  ): Promise<string | null> {
    const atDate = toValidDate(at, 'at');
    const knownAt =
      options.knownAt === undefined
        ? undefined
        : toValidDate(options.knownAt, 'knownAt');
    const instance = await this.getInstance(instanceId);
    const records = await this.adapter.findTransitions(instanceId);
    const record = stateAsOf(records, atDate, { knownAt });
    if (record) {
      return record.toState;
    }
    return instance.startedAt.getTime() <= atDate.getTime()
      ? initialStateOf(instance, records)
      : null;
  }

  /** State the instance cache held at wall-clock time `at`. */
  async recordedAsOf(
    instanceId: string,
    at: TimestampInput,
  ): Promise<string | null> {
    const atDate = toValidDate(at, 'at');
    const instance = await this.getInstance(instanceId);
    const records = await this.adapter.findTransitions(instanceId);

    const record = stateRecordedAsOf(records, atDate);
    if (record) {
      return record.toState;
    }
    return instance.createdAt.getTime() <= atDate.getTime()
      ? initialStateOf(instance, records)
      : null;
  }

  private async getInstance(instanceId: string): Promise<WorkflowInstance> {
    const instance = await this.adapter.findInstance(instanceId);
    if (!instance) {
      throw new InstanceNotFoundError(instanceId);
    }
    return instance;
  }
}

function initialStateOf(
  instance: WorkflowInstance,
  records: readonly TransitionRecord[],
): string {
  return records[0]?.fromState ?? instance.currentState;
}
