import type { Pool, PoolClient } from 'pg';
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

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

const DEFINITION_LOCK_CLAUSES: Record<DefinitionLock, string> = {
  share: ' FOR SHARE',
  update: ' FOR UPDATE',
};

export class PgWorkflowAdapter implements IWorkflowDbAdapter {
  private readonly tables: WorkflowTableNames;

  constructor(
    private readonly pool: Pool,
    private readonly tablePrefix: string = DEFAULT_TABLE_PREFIX,
    private readonly client?: PoolClient,
  ) {
    this.tables = resolveTableNames(tablePrefix);
  }

  async insertDefinition(data: NewDefinitionRow): Promise<WorkflowDefinition> {
    try {
      const result = await this.getConn().query<DefinitionRow>(
        `INSERT INTO ${this.tables.definitions}
         (key, name, states, transitions, initial_state, terminal_states, guards, active)
         VALUES ($1, $2, $3::jsonb, $4::jsonb, $5, $6::jsonb, $7::jsonb, $8)
         RETURNING ${DEFINITION_COLUMNS}`,
        [
          data.key,
          data.name,
          JSON.stringify(data.states),
          JSON.stringify(data.transitions),
          data.initialState,
          JSON.stringify(data.terminalStates),
          JSON.stringify(data.guards),
          data.active,
        ],
      );
      return toDefinition(result.rows[0]);
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
    const lockClause = lock ? DEFINITION_LOCK_CLAUSES[lock] : '';
    const result = await this.getConn().query<DefinitionRow>(
      `SELECT ${DEFINITION_COLUMNS}
       FROM ${this.tables.definitions}
       WHERE id = $1::uuid${lockClause}`,
      [id],
    );

    if (result.rows.length === 0) return null;
    return toDefinition(result.rows[0]);
  }

  async findDefinitionByKey(key: string): Promise<WorkflowDefinition | null> {
    const result = await this.getConn().query<DefinitionRow>(
      `SELECT ${DEFINITION_COLUMNS}
       FROM ${this.tables.definitions}
       WHERE key = $1`,
      [key],
    );

    if (result.rows.length === 0) return null;
    return toDefinition(result.rows[0]);
  }

  async listDefinitions(activeOnly: boolean): Promise<WorkflowDefinition[]> {
    const filter = activeOnly ? ' WHERE active = TRUE' : '';
    const result = await this.getConn().query<DefinitionRow>(
      `SELECT ${DEFINITION_COLUMNS}
       FROM ${this.tables.definitions}${filter}
       ORDER BY key ASC`,
    );

    return result.rows.map(toDefinition);
  }

  async updateDefinitionGraph(id: string, graph: WorkflowGraph): Promise<void> {
    await this.getConn().query(
      `UPDATE ${this.tables.definitions}
       SET states = $2::jsonb,
           transitions = $3::jsonb,
           initial_state = $4,
           terminal_states = $5::jsonb,
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $1::uuid`,
      [
        id,
        JSON.stringify(graph.states),
        JSON.stringify(graph.transitions),
        graph.initialState,
        JSON.stringify(graph.terminalStates),
      ],
    );
  }

  async setDefinitionActive(id: string, active: boolean): Promise<void> {
    await this.getConn().query(
      `UPDATE ${this.tables.definitions}
       SET active = $2, updated_at = CURRENT_TIMESTAMP
       WHERE id = $1::uuid`,
      [id, active],
    );
  }

  async countInstances(definitionId: string): Promise<number> {
    const result = await this.getConn().query<CountRow>(
      `SELECT COUNT(*) AS count
       FROM ${this.tables.instances}
       WHERE definition_id = $1::uuid`,
      [definitionId],
    );

    return Number(result.rows[0]?.count ?? 0);
  }

  async insertInstance(data: NewInstanceRow): Promise<WorkflowInstance> {
    const result = await this.getConn().query<InstanceRow>(
      `INSERT INTO ${this.tables.instances}
       (definition_id, subject_kind, subject_id, current_state, version, created_by, started_at, ended_at, metadata)
       VALUES ($1::uuid, $2, $3, $4, 0, $5, $6, $7, $8::jsonb)
       RETURNING ${INSTANCE_COLUMNS}`,
      [
        data.definitionId,
        data.subject.kind,
        data.subject.id,
        data.currentState,
        data.createdBy,
        data.startedAt,
        data.endedAt,
        JSON.stringify(data.metadata),
      ],
    );

    return toInstance(result.rows[0]);
  }

  async findInstance(
    id: string,
    lock?: boolean,
  ): Promise<WorkflowInstance | null> {
    const lockClause = lock ? ' FOR UPDATE' : '';
    const result = await this.getConn().query<InstanceRow>(
      `SELECT ${INSTANCE_COLUMNS}
       FROM ${this.tables.instances}
       WHERE id = $1::uuid${lockClause}`,
      [id],
    );

    if (result.rows.length === 0) return null;
    return toInstance(result.rows[0]);
  }

  async updateInstanceState(
    id: string,
    patch: InstanceStatePatch,
    expectedVersion: number,
  ): Promise<boolean> {
    const result = await this.getConn().query(
      `UPDATE ${this.tables.instances}
       SET current_state = $2,
           ended_at = $3,
           version = $4,
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $1::uuid AND version = $5`,
      [id, patch.currentState, patch.endedAt, patch.version, expectedVersion],
    );

    return (result.rowCount ?? 0) === 1;
  }

  async findInstancesBySubject(
    subject: SubjectRef,
    query: InstanceQuery = {},
  ): Promise<WorkflowInstance[]> {
    const conditions = ['subject_kind = $1', 'subject_id = $2'];
    const params: unknown[] = [subject.kind, subject.id];
    if (query.definitionId) {
      params.push(query.definitionId);
      conditions.push(`definition_id = $${params.length}::uuid`);
    }
    if (query.openOnly) {
      conditions.push('ended_at IS NULL');
    }

    const result = await this.getConn().query<InstanceRow>(
      `SELECT ${INSTANCE_COLUMNS}
       FROM ${this.tables.instances}
       WHERE ${conditions.join(' AND ')}
       ORDER BY started_at DESC, created_at DESC`,
      params,
    );

    return result.rows.map(toInstance);
  }

  async findInstancesByState(
    definitionId: string,
    state: string,
  ): Promise<WorkflowInstance[]> {
    const result = await this.getConn().query<InstanceRow>(
      `SELECT ${INSTANCE_COLUMNS}
       FROM ${this.tables.instances}
       WHERE definition_id = $1::uuid AND current_state = $2
       ORDER BY started_at DESC, created_at DESC`,
      [definitionId, state],
    );

    return result.rows.map(toInstance);
  }

  async insertTransition(data: NewTransitionRow): Promise<TransitionRecord> {
    try {
      const result = await this.getConn().query<TransitionRow>(
        `INSERT INTO ${this.tables.transitions}
         (instance_id, sequence, from_state, to_state, actor, effective_at, recorded_at, metadata)
         VALUES ($1::uuid, $2, $3, $4, $5, $6, $7, $8::jsonb)
         RETURNING ${TRANSITION_COLUMNS}`,
        [
          data.instanceId,
          data.sequence,
          data.fromState,
          data.toState,
          data.actor,
          data.effectiveAt,
          data.recordedAt,
          JSON.stringify(data.metadata),
        ],
      );
      return toTransition(result.rows[0]);
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
    const result = await this.getConn().query<TransitionRow>(
      `SELECT ${TRANSITION_COLUMNS}
       FROM ${this.tables.transitions}
       WHERE instance_id = $1::uuid
       ORDER BY sequence ASC`,
      [instanceId],
    );

    return result.rows.map(toTransition);
  }

  async findLastTransition(
    instanceId: string,
  ): Promise<TransitionRecord | null> {
    const result = await this.getConn().query<TransitionRow>(
      `SELECT ${TRANSITION_COLUMNS}
       FROM ${this.tables.transitions}
       WHERE instance_id = $1::uuid
       ORDER BY sequence DESC
       LIMIT 1`,
      [instanceId],
    );

    if (result.rows.length === 0) return null;
    return toTransition(result.rows[0]);
  }

  async transaction<T>(
    cb: (adapter: IWorkflowDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new PgWorkflowAdapter(
        this.pool,
        this.tablePrefix,
        client,
      );
      const result = await cb(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw toLedgerViolation(error, this.tables.transitions) ?? error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }
}
