import type { SubjectRef } from '../interfaces/workflow-records.interface';

export interface WorkflowDefinitionRegisteredEvent {
  definitionId: string;
  definitionKey: string;
  timestamp: Date;
}

export interface WorkflowDefinitionDeactivatedEvent {
  definitionId: string;
  definitionKey: string;
  timestamp: Date;
}

export interface WorkflowInstanceCreatedEvent {
  definitionKey: string;
  instanceId: string;
  subject: SubjectRef;
  initialState: string;
  timestamp: Date;
}

export interface WorkflowTransitionEvent {
  definitionKey: string;
  instanceId: string;
  sequence: number;
  fromState: string;
  toState: string;
  actor: string | null;
  effectiveAt: Date;
  recordedAt: Date;
  /** True when toState is terminal. */
  done: boolean;
}
