import { sql, SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
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
import {
  CountRow,
  DEFINITION_COLUMNS,
  DefinitionRow,
  INSTANCE_COLUMNS,
  InstanceRow,
  sqlStateOf,
  toDefinition,
  toInstance,
  toLedgerViolation,
  toTransition,
  TRANSITION_COLUMNS,
  TransitionRow,
  UNIQUE_VIOLATION_SQLSTATE,
} from '../utils/sql-rows';
import {
  DEFAULT_TABLE_PREFIX,
  resolveTableNames,
  WorkflowTableNames,
} from '../utils/table-prefix';

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
function extractRows<T>(result: unknown): T[] {
  if (Array.isArray(result)) return result as T[];
  if (result && typeof result === 'object' && 'rows' in result) {
    return (result as { rows: T[] }).rows;
  }
  return [];
}

const DEFINITION_LOCK_CLAUSES: Record<DefinitionLock, string> = {
  share: ' FOR SHARE',
  update: ' FOR UPDATE',
};

export class DrizzleWorkflowAdapter implements IWorkflowDbAdapter {
  private readonly tables: WorkflowTableNames;

  /**
   * @param inTransaction - Set on adapters bound to a `db.transaction` handle;
   *   nested `transaction()` calls then reuse it.
   */
  constructor(
    private readonly db: PgDatabase<any, any, any>,
    private readonly tablePrefix: string = DEFAULT_TABLE_PREFIX,
    private readonly inTransaction = false,
  ) {
    this.tables = resolveTableNames(tablePrefix);
  }

  async insertDefinition(data: NewDefinitionRow): Promise<WorkflowDefinition> {
    try {
      const rows = await this.query<DefinitionRow>(
        sql`INSERT INTO ${sql.raw(this.tables.definitions)}
            (key, name, states, transitions, initial_state, terminal_states, guards, active)
            VALUES (${data.key}, ${data.name}, ${JSON.stringify(data.states)}::jsonb,
                    ${JSON.stringify(data.transitions)}::jsonb, ${data.initialState},
                    ${JSON.stringify(data.terminalStates)}::jsonb, ${JSON.stringify(data.guards)}::jsonb,
                    ${data.active})
            RETURNING ${sql.raw(DEFINITION_COLUMNS)}`,
      );
      return toDefinition(rows[0]);
    } catch (error) {
      if (sqlStateOf(error) === UNIQUE_VIOLATION_SQLSTATE) {
        throw new DuplicateDefinitionError(data.key);
      }
      throw error;
    }
  }

  async findDefinitionById(
    id: string,
    lock?: DefinitionLock,
  ): Promise<WorkflowDefinition | null> {
    const lockClause = lock ? sql.raw(DEFINITION_LOCK_CLAUSES[lock]) : sql``;
    const rows = await this.query<DefinitionRow>(
      sql`SELECT ${sql.raw(DEFINITION_COLUMNS)} FROM ${sql.raw(this.tables.definitions)} WHERE id = ${id}${lockClause}`,
    );

    if (rows.length === 0) return null;
    return toDefinition(rows[0]);
  }

  async findDefinitionByKey(key: string): Promise<WorkflowDefinition | null> {
    const rows = await this.query<DefinitionRow>(
      sql`SELECT ${sql.raw(DEFINITION_COLUMNS)} FROM ${sql.raw(this.tables.definitions)} WHERE key = ${key}`,
    );

    if (rows.length === 0) return null;
    return toDefinition(rows[0]);
  }

  async listDefinitions(activeOnly: boolean): Promise<WorkflowDefinition[]> {
    const filter = activeOnly ? sql` WHERE active = TRUE` : sql``;
    const rows = await this.query<DefinitionRow>(
      sql`SELECT ${sql.raw(DEFINITION_COLUMNS)} FROM ${sql.raw(this.tables.definitions)}${filter} ORDER BY key ASC`,
    );

    return rows.map(toDefinition);
  }

  async updateDefinitionGraph(id: string, graph: WorkflowGraph): Promise<void> {
    await this.db.execute(
      sql`UPDATE ${sql.raw(this.tables.definitions)}
          SET states = ${JSON.stringify(graph.states)}::jsonb,
              transitions = ${JSON.stringify(graph.transitions)}::jsonb,
              initial_state = ${graph.initialState},
              terminal_states = ${JSON.stringify(graph.terminalStates)}::jsonb,
              updated_at = CURRENT_TIMESTAMP
          WHERE id = ${id}`,
    );
  }

  async setDefinitionActive(id: string, active: boolean): Promise<void> {
    await this.db.execute(
      sql`UPDATE ${sql.raw(this.tables.definitions)}
          SET active = ${active}, updated_at = CURRENT_TIMESTAMP
          WHERE id = ${id}`,
    );
  }

  async countInstances(definitionId: string): Promise<number> {
    const rows = await this.query<CountRow>(
      sql`SELECT COUNT(*) AS count FROM ${sql.raw(this.tables.instances)} WHERE definition_id = ${definitionId}`,
    );

    return Number(rows[0]?.count ?? 0);
  }

  async insertInstance(data: NewInstanceRow): Promise<WorkflowInstance> {
    const rows = await this.query<InstanceRow>(
      sql`INSERT INTO ${sql.raw(this.tables.instances)}
          (definition_id, subject_kind, subject_id, current_state, version, created_by, started_at, ended_at, metadata)
          VALUES (${data.definitionId}, ${data.subject.kind}, ${data.subject.id}, ${data.currentState}, 0,
                  ${data.createdBy}, ${data.startedAt}, ${data.endedAt}, ${JSON.stringify(data.metadata)}::jsonb)
          RETURNING ${sql.raw(INSTANCE_COLUMNS)}`,
    );

    return toInstance(rows[0]);
  }

  async findInstance(
    id: string,
    lock?: boolean,
  ): Promise<WorkflowInstance | null> {
    const lockClause = lock ? sql` FOR UPDATE` : sql``;
    const rows = await this.query<InstanceRow>(
      sql`SELECT ${sql.raw(INSTANCE_COLUMNS)} FROM ${sql.raw(this.tables.instances)} WHERE id = ${id}${lockClause}`,
    );

    if (rows.length === 0) return null;
    return toInstance(rows[0]);
  }

  async updateInstanceState(
    id: string,
    patch: InstanceStatePatch,
    expectedVersion: number,
  ): Promise<boolean> {
    const rows = await this.query<{ id: string }>(
      sql`UPDATE ${sql.raw(this.tables.instances)}
          SET current_state = ${patch.currentState},
              ended_at = ${patch.endedAt},
              version = ${patch.version},
              updated_at = CURRENT_TIMESTAMP
          WHERE id = ${id} AND version = ${expectedVersion}
          RETURNING id`,
    );

    return rows.length === 1;
  }

  async findInstancesBySubject(
    subject: SubjectRef,
    query: InstanceQuery = {},
  ): Promise<WorkflowInstance[]> {
    const conditions: SQL[] = [
      sql`subject_kind = ${subject.kind}`,
      sql`subject_id = ${subject.id}`,
    ];
    if (query.definitionId) {
      conditions.push(sql`definition_id = ${query.definitionId}`);
    }
    if (query.openOnly) {
      conditions.push(sql`ended_at IS NULL`);
    }

    const rows = await this.query<InstanceRow>(
      sql`SELECT ${sql.raw(INSTANCE_COLUMNS)} FROM ${sql.raw(this.tables.instances)}
          WHERE ${sql.join(conditions, sql` AND `)}
          ORDER BY started_at DESC, created_at DESC`,
    );

    return rows.map(toInstance);
  }

  async findInstancesByState(
    definitionId: string,
    state: string,
  ): Promise<WorkflowInstance[]> {
    const rows = await this.query<InstanceRow>(
      sql`SELECT ${sql.raw(INSTANCE_COLUMNS)} FROM ${sql.raw(this.tables.instances)}
          WHERE definition_id = ${definitionId} AND current_state = ${state}
          ORDER BY started_at DESC, created_at DESC`,
    );

    return rows.map(toInstance);
  }

  async insertTransition(data: NewTransitionRow): Promise<TransitionRecord> {
    try {
      const rows = await this.query<TransitionRow>(
        sql`INSERT INTO ${sql.raw(this.tables.transitions)}
            (instance_id, sequence, from_state, to_state, actor, effective_at, recorded_at, metadata)
            VALUES (${data.instanceId}, ${data.sequence}, ${data.fromState}, ${data.toState}, ${data.actor},
                    ${data.effectiveAt}, ${data.recordedAt}, ${JSON.stringify(data.metadata)}::jsonb)
            RETURNING ${sql.raw(TRANSITION_COLUMNS)}`,
      );
      return toTransition(rows[0]);
    } catch (error) {
      if (sqlStateOf(error) === UNIQUE_VIOLATION_SQLSTATE) {
        throw new ConcurrentModificationError(
          data.instanceId,
          data.sequence - 1,
          null,
        );
      }
      throw error;
    }
  }

  async findTransitions(instanceId: string): Promise<TransitionRecord[]> {
    const rows = await this.query<TransitionRow>(
      sql`SELECT ${sql.raw(TRANSITION_COLUMNS)} FROM ${sql.raw(this.tables.transitions)}
          WHERE instance_id = ${instanceId}
          ORDER BY sequence ASC`,
    );

    return rows.map(toTransition);
  }

  async findLastTransition(
    instanceId: string,
  ): Promise<TransitionRecord | null> {
    const rows = await this.query<TransitionRow>(
      sql`SELECT ${sql.raw(TRANSITION_COLUMNS)} FROM ${sql.raw(this.tables.transitions)}
          WHERE instance_id = ${instanceId}
          ORDER BY sequence DESC
          LIMIT 1`,
    );

    if (rows.length === 0) return null;
    return toTransition(rows[0]);
  }

  async transaction<T>(
    cb: (adapter: IWorkflowDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.inTransaction) {
      return cb(this);
    }

    try {
      return await this.db.transaction(async (tx) => {
        const txAdapter = new DrizzleWorkflowAdapter(
          tx,
          this.tablePrefix,
          true,
        );
        return cb(txAdapter);
      });
    } catch (error) {
      throw toLedgerViolation(error, this.tables.transitions) ?? error;
    }
  }

  private async query<T>(query: SQL): Promise<T[]> {
    return extractRows<T>(await this.db.execute(query));
  }
}
