import 'reflect-metadata';

// Module
export { WorkflowModule } from './workflow.module';

// Services
export { WorkflowManager } from './services/workflow-manager.service';
export type {
  CreateInstanceInput,
  FindBySubjectOptions,
} from './services/workflow-manager.service';
export { WorkflowDefinitionStore } from './services/workflow-definition-store.service';
export type { ListDefinitionsOptions } from './services/workflow-definition-store.service';
export { TransitionEngine } from './services/transition-engine.service';
export type {
  InstanceRef,
  TransitionCheck,
  TransitionOptions,
  TransitionResult,
} from './services/transition-engine.service';
export { AuditLedger } from './services/audit-ledger.service';
export type {
  AppendTransitionInput,
  AsOfOptions,
} from './services/audit-ledger.service';
export { TransitionGuardRegistry } from './services/transition-guard-registry.service';
export type { RegisteredGuard } from './services/transition-guard-registry.service';

// Decorators
export { TransitionGuard } from './decorators/transition-guard.decorator';
export { JavascriptStateMachineEngine } from './engines/javascript-state-machine.engine';

// Interfaces
export type {
  DefinitionLock,
  IWorkflowDbAdapter,
} from './interfaces/workflow-db-adapter.interface';
export type {
  GraphRule,
  GraphRuleCode,
  GraphValidationOptions,
  GraphValidationResult,
  GraphViolation,
  WorkflowDefinition,
  WorkflowDefinitionInput,
  WorkflowGraph,
} from './interfaces/workflow-definition.interface';
export type {
  EvaluateTransitionInput,
  IWorkflowEngine,
  TransitionDecision,
} from './interfaces/workflow-engine.interface';
export type {
  InstanceQuery,
  InstanceStatePatch,
  JsonObject,
  NewDefinitionRow,
  NewInstanceRow,
  NewTransitionRow,
  SubjectRef,
  TransitionRecord,
  WorkflowInstance,
} from './interfaces/workflow-records.interface';
export type {
  ITransitionGuard,
  TransitionGuardInput,
  TransitionGuardResult,
} from './interfaces/transition-guard.interface';
export type {
  WorkflowModuleOptions,
  WorkflowModuleAsyncOptions,
} from './interfaces/workflow-module-options.interface';

// Adapters
export { DrizzleWorkflowAdapter } from './adapters/drizzle-workflow.adapter';
export { InMemoryWorkflowAdapter } from './adapters/in-memory-workflow.adapter';
export { PgWorkflowAdapter } from './adapters/pg-workflow.adapter';

// Time
export { MonotonicClock, toValidDate } from './utils/clock';
export type { Clock, TimestampInput } from './utils/clock';
export { stateAsOf, stateRecordedAsOf } from './utils/temporal-queries';
export type { StateAsOfOptions } from './utils/temporal-queries';

// Validation
export {
  findReachableStates,
  validateGraph,
  validateWorkflowGraph,
} from './utils/validate-workflow-graph';

// Errors
export { InvalidGraphError } from './errors/invalid-graph.error';
export { DefinitionFrozenError } from './errors/definition-frozen.error';
export { InstanceTerminatedError } from './errors/instance-terminated.error';
export { IllegalTransitionError } from './errors/illegal-transition.error';
export { ConcurrentModificationError } from './errors/concurrent-modification.error';
export { LedgerImmutabilityViolationError } from './errors/ledger-immutability-violation.error';
export { LedgerChainError } from './errors/ledger-chain.error';
export type { LedgerOperation } from './errors/ledger-immutability-violation.error';
export { DefinitionNotFoundError } from './errors/definition-not-found.error';
export { DefinitionInactiveError } from './errors/definition-inactive.error';
export { DuplicateDefinitionError } from './errors/duplicate-definition.error';
export { InstanceNotFoundError } from './errors/instance-not-found.error';
export { TransitionBlockedError } from './errors/transition-blocked.error';
export type { TransitionBlockKind } from './errors/transition-blocked.error';
export { GuardNotRegisteredError } from './errors/guard-not-registered.error';
export { DuplicateGuardError } from './errors/duplicate-guard.error';
export { InvalidTimestampError } from './errors/invalid-timestamp.error';
export { InvalidSubjectError } from './errors/invalid-subject.error';
export { isRetryableWorkflowError } from './errors/is-retryable';

// Events
export { WorkflowEventType } from './events/workflow-event-type.enum';
export type {
  WorkflowDefinitionDeactivatedEvent,
  WorkflowDefinitionRegisteredEvent,
  WorkflowInstanceCreatedEvent,
  WorkflowTransitionEvent,
} from './events/workflow-events';

// CLI
export { generateMigration } from './cli/generate-migration';
export { DEFAULT_TABLE_PREFIX } from './utils/table-prefix';

// Constants
export {
  WORKFLOW_MODULE_OPTIONS,
  WORKFLOW_DB_ADAPTER,
  WORKFLOW_ENGINE,
  WORKFLOW_CLOCK,
  WORKFLOW_GRAPH_RULES,
  TRANSITION_GUARD_METADATA,
} from './workflow.constants';
