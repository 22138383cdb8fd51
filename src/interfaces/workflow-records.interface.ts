import type { WorkflowDefinition } from './workflow-definition.interface';

export type JsonObject = Record<string, unknown>;

/**
 * Type-erased pointer at whatever the workflow tracks. Never dereferenced.
 */
export interface SubjectRef {
  kind: string;
  id: string;
}

export interface WorkflowInstance {
  id: string;
  definitionId: string;
  subject: SubjectRef;
  /** Cache of the ledger tail; written only by the transition engine. */
  currentState: string;
  /** Number of committed transitions; doubles as the optimistic lock. */
  version: number;
  createdBy: string | null;
  /** Business time the instance started. */
  startedAt: Date;
  /** Business time of the transition into a terminal state. */
  endedAt: Date | null;
  metadata: JsonObject;
  createdAt: Date;
  updatedAt: Date;
}

export interface TransitionRecord {
  readonly id: string;
  readonly instanceId: string;
  /** 1-based append position within the instance. */
  readonly sequence: number;
  readonly fromState: string;
  readonly toState: string;
  readonly actor: string | null;
  /** Business time: caller-supplied, may be backdated or in the future. */
  readonly effectiveAt: Date;
  /** System time: assigned at append, never caller-supplied. */
  readonly recordedAt: Date;
  readonly metadata: Readonly<JsonObject>;
}

export type NewDefinitionRow = Omit<
  WorkflowDefinition,
  'id' | 'createdAt' | 'updatedAt'
>;

export type NewInstanceRow = Omit<
  WorkflowInstance,
  'id' | 'version' | 'createdAt' | 'updatedAt'
>;

export interface InstanceStatePatch {
  currentState: string;
  endedAt: Date | null;
  version: number;
}

export type NewTransitionRow = Omit<TransitionRecord, 'id'>;

export interface InstanceQuery {
  definitionId?: string;
  /** Only instances that have not reached a terminal state. */
  openOnly?: boolean;
}
