import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DefinitionInactiveError } from '../errors/definition-inactive.error';
import { DefinitionNotFoundError } from '../errors/definition-not-found.error';
import { InstanceNotFoundError } from '../errors/instance-not-found.error';
import { InvalidSubjectError } from '../errors/invalid-subject.error';
import { WorkflowEventType } from '../events/workflow-event-type.enum';
import type { WorkflowInstanceCreatedEvent } from '../events/workflow-events';
import type { IWorkflowDbAdapter } from '../interfaces/workflow-db-adapter.interface';
import type {
  JsonObject,
  SubjectRef,
  WorkflowInstance,
} from '../interfaces/workflow-records.interface';
import { Clock, TimestampInput, toValidDate } from '../utils/clock';
import { WORKFLOW_CLOCK, WORKFLOW_DB_ADAPTER } from '../workflow.constants';
import { WorkflowDefinitionStore } from './workflow-definition-store.service';

export interface CreateInstanceInput {
  /** Definition key or id. */
  definition: string;
  subject: SubjectRef;
  createdBy?: string | null;
  /** Business start time. Defaults to now. */
  startedAt?: TimestampInput;
  metadata?: JsonObject;
}

export interface FindBySubjectOptions {
  /** Restrict to one definition (key or id). */
  definition?: string;
  openOnly?: boolean;
}

function assertSubject(subject: SubjectRef): SubjectRef {
  for (const field of ['kind', 'id'] as const) {
    const value: unknown = subject[field];
    if (typeof value !== 'string' || value.trim() === '') {
      throw new InvalidSubjectError(
        `subject.${field} must be a non-empty string`,
      );
    }
  }
  return { kind: subject.kind, id: subject.id };
}

@Injectable()
export class WorkflowManager {
  private readonly logger = new Logger(WorkflowManager.name);

  constructor(
    private readonly definitions: WorkflowDefinitionStore,
    @Inject(WORKFLOW_DB_ADAPTER) private readonly adapter: IWorkflowDbAdapter,
    private readonly eventEmitter: EventEmitter2,
    @Inject(WORKFLOW_CLOCK) private readonly clock: Clock,
  ) {}

  /** Starts a new instance of an active definition in its initial state. */
  async createInstance(input: CreateInstanceInput): Promise<WorkflowInstance> {
    const subject = assertSubject(input.subject);
    const startedAt =
      input.startedAt === undefined
        ? this.clock.now()
        : toValidDate(input.startedAt, 'startedAt');
    const { id: definitionId } = await this.definitions.get(input.definition);

    const { definitionKey, instance } = await this.adapter.transaction(
      async (txAdapter) => {
        const definition = await txAdapter.findDefinitionById(
          definitionId,
          'share',
        );
        if (!definition) {
          throw new DefinitionNotFoundError(definitionId);
        }
        if (!definition.active) {
          throw new DefinitionInactiveError(definition.key);
        }

        const startsTerminal = definition.terminalStates.includes(
          definition.initialState,
        );
        const created = await txAdapter.insertInstance({
          definitionId,
          subject,
          currentState: definition.initialState,
          createdBy: input.createdBy ?? null,
          startedAt,
          endedAt: startsTerminal ? startedAt : null,
          metadata: { ...input.metadata },
        });
        return { definitionKey: definition.key, instance: created };
      },
    );

    this.eventEmitter.emit(WorkflowEventType.INSTANCE_CREATED, {
      definitionKey,
      instanceId: instance.id,
      subject: instance.subject,
      initialState: instance.currentState,
      timestamp: new Date(),
    } satisfies WorkflowInstanceCreatedEvent);

    this.logger.log(
      `Workflow ${definitionKey}/${instance.id} created for ${subject.kind}:${subject.id}, state=${instance.currentState}`,
    );
    return instance;
  }

  async getInstance(id: string): Promise<WorkflowInstance> {
    const instance = await this.adapter.findInstance(id);
    if (!instance) {
      throw new InstanceNotFoundError(id);
    }
    return instance;
  }

  /** Instances attached to a subject, most recently started first. */
  async findBySubject(
    subject: SubjectRef,
    options: FindBySubjectOptions = {},
  ): Promise<WorkflowInstance[]> {
    const definitionId = options.definition
      ? (await this.definitions.get(options.definition)).id
      : undefined;

    return this.adapter.findInstancesBySubject(assertSubject(subject), {
      definitionId,
      openOnly: options.openOnly,
    });
  }

  async findByState(
    definition: string,
    state: string,
  ): Promise<WorkflowInstance[]> {
    const { id } = await this.definitions.get(definition);
    return this.adapter.findInstancesByState(id, state);
  }
}
