import { randomUUID } from 'crypto';
import { ConcurrentModificationError } from '../errors/concurrent-modification.error';
import { DuplicateDefinitionError } from '../errors/duplicate-definition.error';
import type {
  DefinitionLock,
  IWorkflowDbAdapter,
} from '../interfaces/workflow-db-adapter.interface';
import type {
  WorkflowDefinition,
  WorkflowGraph,
} from '../interfaces/workflow-definition.interface';
import type {
  InstanceQuery,
  InstanceStatePatch,
  NewDefinitionRow,
  NewInstanceRow,
  NewTransitionRow,
  SubjectRef,
  TransitionRecord,
  WorkflowInstance,
} from '../interfaces/workflow-records.interface';
import { createAppendOnlyLog } from '../utils/append-only-log';
import {
  DEFAULT_TABLE_PREFIX,
  resolveTableNames,
  WorkflowTableNames,
} from '../utils/table-prefix';

/** FIFO mutex per row key. */
class RowLocks {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}

interface InMemoryState {
  definitions: Map<string, WorkflowDefinition>;
  instances: Map<string, WorkflowInstance>;
  transitions: TransitionRecord[];
  locks: RowLocks;
}

interface PendingWrites {
  definitions: Map<string, WorkflowDefinition>;
  instances: Map<string, WorkflowInstance>;
  transitions: TransitionRecord[];
  /** Version each committed instance must still have at commit time. */
  expectedVersions: Map<string, number>;
  heldLocks: Map<string, () => void>;
}

function createEmptyState(tables: WorkflowTableNames): InMemoryState {
  return {
    definitions: new Map<string, WorkflowDefinition>(),
    instances: new Map<string, WorkflowInstance>(),
    transitions: createAppendOnlyLog<TransitionRecord>(tables.transitions),
    locks: new RowLocks(),
  };
}

function createPendingWrites(): PendingWrites {
  return {
    definitions: new Map<string, WorkflowDefinition>(),
    instances: new Map<string, WorkflowInstance>(),
    transitions: [],
    expectedVersions: new Map<string, number>(),
    heldLocks: new Map<string, () => void>(),
  };
}

function freezeTransition(record: TransitionRecord): TransitionRecord {
  const copy = structuredClone(record);
  return Object.freeze({ ...copy, metadata: Object.freeze(copy.metadata) });
}

function byStartedAtDesc(a: WorkflowInstance, b: WorkflowInstance): number {
  return (
    b.startedAt.getTime() - a.startedAt.getTime() ||
    b.createdAt.getTime() - a.createdAt.getTime()
  );
}

export class InMemoryWorkflowAdapter implements IWorkflowDbAdapter {
  private readonly tables: WorkflowTableNames;
  private readonly state: InMemoryState;

  constructor(
    private readonly tablePrefix: string = DEFAULT_TABLE_PREFIX,
    state?: InMemoryState,
    private readonly pending?: PendingWrites,
  ) {
    this.tables = resolveTableNames(tablePrefix);
    this.state = state ?? createEmptyState(this.tables);
  }

  async insertDefinition(data: NewDefinitionRow): Promise<WorkflowDefinition> {
    if (this.allDefinitions().some((row) => row.key === data.key)) {
      throw new DuplicateDefinitionError(data.key);
    }

    const now = new Date();
    const row: WorkflowDefinition = {
      ...structuredClone(data),
      id: randomUUID(),
      createdAt: now,
      updatedAt: now,
    };
    this.writeDefinition(row);
    return structuredClone(row);
  }

  async findDefinitionById(
    id: string,
    lock?: DefinitionLock,
  ): Promise<WorkflowDefinition | null> {
    if (lock) {
      await this.lockRow(`${this.tables.definitions}:${id}`);
    }
    const row = this.readDefinition(id);
    return row ? structuredClone(row) : null;
  }

  async findDefinitionByKey(key: string): Promise<WorkflowDefinition | null> {
    const row = this.allDefinitions().find((candidate) => candidate.key === key);
    return row ? structuredClone(row) : null;
  }

  async listDefinitions(activeOnly: boolean): Promise<WorkflowDefinition[]> {
    return this.allDefinitions()
      .filter((row) => !activeOnly || row.active)
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((row) => structuredClone(row));
  }

  async updateDefinitionGraph(id: string, graph: WorkflowGraph): Promise<void> {
    const existing = this.readDefinition(id);
    if (!existing) return;

    this.writeDefinition({
      ...existing,
      states: [...graph.states],
      transitions: structuredClone(graph.transitions),
      initialState: graph.initialState,
      terminalStates: [...graph.terminalStates],
      updatedAt: new Date(),
    });
  }

  async setDefinitionActive(id: string, active: boolean): Promise<void> {
    const existing = this.readDefinition(id);
    if (!existing) return;

    this.writeDefinition({ ...existing, active, updatedAt: new Date() });
  }

  async countInstances(definitionId: string): Promise<number> {
    return this.allInstances().filter(
      (row) => row.definitionId === definitionId,
    ).length;
  }

  async insertInstance(data: NewInstanceRow): Promise<WorkflowInstance> {
    const now = new Date();
    const row: WorkflowInstance = {
      ...structuredClone(data),
      id: randomUUID(),
      version: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.writeInstance(row);
    return structuredClone(row);
  }

  async findInstance(
    id: string,
    lock?: boolean,
  ): Promise<WorkflowInstance | null> {
    if (lock) {
      await this.lockRow(`${this.tables.instances}:${id}`);
    }
    const row = this.readInstance(id);
    return row ? structuredClone(row) : null;
  }

  async updateInstanceState(
    id: string,
    patch: InstanceStatePatch,
    expectedVersion: number,
  ): Promise<boolean> {
    const current = this.readInstance(id);
    if (!current || current.version !== expectedVersion) {
      return false;
    }

    if (this.pending && !this.pending.expectedVersions.has(id)) {
      this.pending.expectedVersions.set(id, expectedVersion);
    }
    this.writeInstance({
      ...current,
      currentState: patch.currentState,
      endedAt: patch.endedAt ? new Date(patch.endedAt) : null,
      version: patch.version,
      updatedAt: new Date(),
    });
    return true;
  }

  async findInstancesBySubject(
    subject: SubjectRef,
    query: InstanceQuery = {},
  ): Promise<WorkflowInstance[]> {
    return this.allInstances()
      .filter(
        (row) =>
          row.subject.kind === subject.kind &&
          row.subject.id === subject.id &&
          (!query.definitionId || row.definitionId === query.definitionId) &&
          (!query.openOnly || row.endedAt === null),
      )
      .sort(byStartedAtDesc)
      .map((row) => structuredClone(row));
  }

  async findInstancesByState(
    definitionId: string,
    state: string,
  ): Promise<WorkflowInstance[]> {
    return this.allInstances()
      .filter(
        (row) => row.definitionId === definitionId && row.currentState === state,
      )
      .sort(byStartedAtDesc)
      .map((row) => structuredClone(row));
  }

  async insertTransition(data: NewTransitionRow): Promise<TransitionRecord> {
    const existing = this.transitionsFor(data.instanceId);
    if (existing.some((row) => row.sequence === data.sequence)) {
      throw new ConcurrentModificationError(
        data.instanceId,
        data.sequence - 1,
        existing.length,
      );
    }

    const row = freezeTransition({ ...data, id: randomUUID() });
    if (this.pending) {
      this.pending.transitions.push(row);
    } else {
      this.state.transitions.push(row);
    }
    return freezeTransition(row);
  }

  async findTransitions(instanceId: string): Promise<TransitionRecord[]> {
    return this.transitionsFor(instanceId).map(freezeTransition);
  }

  async findLastTransition(
    instanceId: string,
  ): Promise<TransitionRecord | null> {
    const rows = this.transitionsFor(instanceId);
    const last = rows[rows.length - 1];
    return last ? freezeTransition(last) : null;
  }

  async transaction<T>(
    cb: (adapter: IWorkflowDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.pending) {
      return cb(this);
    }

    const pending = createPendingWrites();
    const txAdapter = new InMemoryWorkflowAdapter(
      this.tablePrefix,
      this.state,
      pending,
    );

    try {
      const result = await cb(txAdapter);
      this.commit(pending);
      return result;
    } finally {
      for (const release of pending.heldLocks.values()) {
        release();
      }
    }
  }

  private commit(pending: PendingWrites): void {
    for (const [id, expected] of pending.expectedVersions) {
      const committed = this.state.instances.get(id);
      if (committed && committed.version !== expected) {
        throw new ConcurrentModificationError(id, expected, committed.version);
      }
    }

    for (const row of pending.definitions.values()) {
      const clash = [...this.state.definitions.values()].find(
        (other) => other.key === row.key && other.id !== row.id,
      );
      if (clash) {
        throw new DuplicateDefinitionError(row.key);
      }
    }

    for (const row of pending.transitions) {
      const committed = this.state.transitions.filter(
        (other) => other.instanceId === row.instanceId,
      );
      if (committed.some((other) => other.sequence === row.sequence)) {
        throw new ConcurrentModificationError(
          row.instanceId,
          row.sequence - 1,
          committed.length,
        );
      }
    }

    for (const [id, row] of pending.definitions) {
      this.state.definitions.set(id, row);
    }
    for (const [id, row] of pending.instances) {
      this.state.instances.set(id, row);
    }
    for (const row of pending.transitions) {
      this.state.transitions.push(row);
    }
  }

  private async lockRow(key: string): Promise<void> {
    if (!this.pending || this.pending.heldLocks.has(key)) {
      return;
    }
    const release = await this.state.locks.acquire(key);
    this.pending.heldLocks.set(key, release);
  }

  private readDefinition(id: string): WorkflowDefinition | undefined {
    return this.pending?.definitions.get(id) ?? this.state.definitions.get(id);
  }

  private allDefinitions(): WorkflowDefinition[] {
    const merged = new Map(this.state.definitions);
    for (const [id, row] of this.pending?.definitions ?? []) {
      merged.set(id, row);
    }
    return [...merged.values()];
  }

  private writeDefinition(row: WorkflowDefinition): void {
    (this.pending?.definitions ?? this.state.definitions).set(row.id, row);
  }

  private readInstance(id: string): WorkflowInstance | undefined {
    return this.pending?.instances.get(id) ?? this.state.instances.get(id);
  }

  private allInstances(): WorkflowInstance[] {
    const merged = new Map(this.state.instances);
    for (const [id, row] of this.pending?.instances ?? []) {
      merged.set(id, row);
    }
    return [...merged.values()];
  }

  private writeInstance(row: WorkflowInstance): void {
    (this.pending?.instances ?? this.state.instances).set(row.id, row);
  }

  private transitionsFor(instanceId: string): TransitionRecord[] {
    return [...this.state.transitions, ...(this.pending?.transitions ?? [])]
      .filter((row) => row.instanceId === instanceId)
      .sort((a, b) => a.sequence - b.sequence);
  }
}
