import type { WorkflowDefinition } from './workflow-definition.interface';
import type {
  JsonObject,
  WorkflowInstance,
} from './workflow-records.interface';

export interface TransitionGuardInput {
  definition: WorkflowDefinition;
  instance: WorkflowInstance;
  fromState: string;
  toState: string;
  actor: string | null;
  metadata: JsonObject;
}

export interface TransitionGuardResult {
  /** Hard blocks always reject the transition. */
  blocks?: string[];
  /** Soft warnings reject unless the caller overrides them. */
  warnings?: string[];
}

export interface ITransitionGuard {
  validate(
    input: TransitionGuardInput,
  ): TransitionGuardResult | Promise<TransitionGuardResult>;
}
