import type {
  WorkflowDefinition,
  WorkflowGraph,
} from './workflow-definition.interface';
import type {
  InstanceQuery,
  InstanceStatePatch,
  NewDefinitionRow,
  NewInstanceRow,
  NewTransitionRow,
  SubjectRef,
  TransitionRecord,
  WorkflowInstance,
} from './workflow-records.interface';

/**
 * Row lock taken on a definition: `share` while an instance is attached
 * to it, `update` while its graph is rewritten.
 */
export type DefinitionLock = 'share' | 'update';

/**
 * Storage contract. Transition rows can only be inserted and read: there
 * is no method that updates or deletes one.
 */
export interface IWorkflowDbAdapter {
  insertDefinition(data: NewDefinitionRow): Promise<WorkflowDefinition>;

  /**
   * @param lock - Row lock to hold until the surrounding transaction ends
   */
  findDefinitionById(
    id: string,
    lock?: DefinitionLock,
  ): Promise<WorkflowDefinition | null>;

  findDefinitionByKey(key: string): Promise<WorkflowDefinition | null>;

  listDefinitions(activeOnly: boolean): Promise<WorkflowDefinition[]>;

  updateDefinitionGraph(id: string, graph: WorkflowGraph): Promise<void>;

  setDefinitionActive(id: string, active: boolean): Promise<void>;

  countInstances(definitionId: string): Promise<number>;

  insertInstance(data: NewInstanceRow): Promise<WorkflowInstance>;

  /**
   * Find a workflow instance by ID.
   * @param lock - If true, use SELECT ... FOR UPDATE
   */
  findInstance(id: string, lock?: boolean): Promise<WorkflowInstance | null>;

  /**
   * Compare-and-swap on the instance version.
   * @returns false when the stored version no longer equals expectedVersion
   */
  updateInstanceState(
    id: string,
    patch: InstanceStatePatch,
    expectedVersion: number,
  ): Promise<boolean>;

  findInstancesBySubject(
    subject: SubjectRef,
    query?: InstanceQuery,
  ): Promise<WorkflowInstance[]>;

  findInstancesByState(
    definitionId: string,
    state: string,
  ): Promise<WorkflowInstance[]>;

  insertTransition(data: NewTransitionRow): Promise<TransitionRecord>;

  /** All transitions of an instance, ordered by sequence. */
  findTransitions(instanceId: string): Promise<TransitionRecord[]>;

  findLastTransition(instanceId: string): Promise<TransitionRecord | null>;

  /**
   * Execute a callback within a database transaction.
   * The callback receives an adapter instance bound to the transaction.
   */
  transaction<T>(cb: (adapter: IWorkflowDbAdapter) => Promise<T>): Promise<T>;
}
