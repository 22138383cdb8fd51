import { LedgerImmutabilityViolationError } from '../errors/ledger-immutability-violation.error';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import type {
  JsonObject,
  TransitionRecord,
  WorkflowInstance,
} from '../interfaces/workflow-records.interface';

type SqlTimestamp = Date | string;

export interface DefinitionRow {
  id: string;
  key: string;
  name: string;
  states: unknown;
  transitions: unknown;
  initial_state: string;
  terminal_states: unknown;
  guards: unknown;
  active: boolean;
  created_at: SqlTimestamp;
  updated_at: SqlTimestamp;
}

export interface InstanceRow {
  id: string;
  definition_id: string;
  subject_kind: string;
  subject_id: string;
  current_state: string;
  version: number | string;
  created_by: string | null;
  started_at: SqlTimestamp;
  ended_at: SqlTimestamp | null;
  metadata: unknown;
  created_at: SqlTimestamp;
  updated_at: SqlTimestamp;
}

export interface TransitionRow {
  id: string;
  instance_id: string;
  sequence: number | string;
  from_state: string;
  to_state: string;
  actor: string | null;
  effective_at: SqlTimestamp;
  recorded_at: SqlTimestamp;
  metadata: unknown;
}

export interface CountRow {
  count: number | string;
}

/** jsonb arrives parsed from node-postgres but as text from some drivers. */
function parseJson(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

function toStringArray(value: unknown, column: string): string[] {
  const parsed = parseJson(value);
  if (!Array.isArray(parsed) || !parsed.every((v) => typeof v === 'string')) {
    throw new Error(`Column ${column} does not hold a JSON array of strings`);
  }
  return parsed;
}

function toJsonObject(value: unknown, column: string): JsonObject {
  const parsed = parseJson(value ?? {});
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Column ${column} does not hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toAdjacency(value: unknown): Record<string, string[]> {
  const parsed = toJsonObject(value, 'transitions');
  const adjacency: Record<string, string[]> = {};
  for (const [state, targets] of Object.entries(parsed)) {
    adjacency[state] = toStringArray(targets, `transitions.${state}`);
  }
  return adjacency;
}

export function toDefinition(row: DefinitionRow): WorkflowDefinition {
  return {
    id: row.id,
    key: row.key,
    name: row.name,
    states: toStringArray(row.states, 'states'),
    transitions: toAdjacency(row.transitions),
    initialState: row.initial_state,
    terminalStates: toStringArray(row.terminal_states, 'terminal_states'),
    guards: toStringArray(row.guards ?? [], 'guards'),
    active: row.active,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toInstance(row: InstanceRow): WorkflowInstance {
  return {
    id: row.id,
    definitionId: row.definition_id,
    subject: { kind: row.subject_kind, id: row.subject_id },
    currentState: row.current_state,
    version: Number(row.version),
    createdBy: row.created_by,
    startedAt: new Date(row.started_at),
    endedAt: row.ended_at ? new Date(row.ended_at) : null,
    metadata: toJsonObject(row.metadata, 'metadata'),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toTransition(row: TransitionRow): TransitionRecord {
  return Object.freeze({
    id: row.id,
    instanceId: row.instance_id,
    sequence: Number(row.sequence),
    fromState: row.from_state,
    toState: row.to_state,
    actor: row.actor,
    effectiveAt: new Date(row.effective_at),
    recordedAt: new Date(row.recorded_at),
    metadata: Object.freeze(toJsonObject(row.metadata, 'metadata')),
  });
}

export const DEFINITION_COLUMNS =
  'id, key, name, states, transitions, initial_state, terminal_states, guards, active, created_at, updated_at';

export const INSTANCE_COLUMNS =
  'id, definition_id, subject_kind, subject_id, current_state, version, created_by, started_at, ended_at, metadata, created_at, updated_at';

export const TRANSITION_COLUMNS =
  'id, instance_id, sequence, from_state, to_state, actor, effective_at, recorded_at, metadata';

/** SQLSTATE raised by the append-only trigger in the generated migration. */
export const LEDGER_IMMUTABLE_SQLSTATE = 'WL001';
export const UNIQUE_VIOLATION_SQLSTATE = '23505';

interface SqlErrorInfo {
  code: string;
  message: string;
}

/** Finds the driver error carrying a SQLSTATE, following wrapped causes. */
function findSqlError(error: unknown): SqlErrorInfo | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    const message =
      'message' in error && typeof error.message === 'string'
        ? error.message
        : '';
    return { code: error.code, message };
  }
  return 'cause' in error ? findSqlError(error.cause) : undefined;
}

export function sqlStateOf(error: unknown): string | undefined {
  return findSqlError(error)?.code;
}

/**
 * Maps the append-only trigger's error onto the ledger error. The trigger
 * message starts with the rejected operation (UPDATE, DELETE, TRUNCATE).
 */
export function toLedgerViolation(
  error: unknown,
  table: string,
): LedgerImmutabilityViolationError | null {
  const sqlError = findSqlError(error);
  if (sqlError?.code !== LEDGER_IMMUTABLE_SQLSTATE) {
    return null;
  }

  const operation = sqlError.message.split(' ')[0]?.toLowerCase();
  return new LedgerImmutabilityViolationError(
    operation === 'delete' || operation === 'truncate' ? operation : 'update',
    table,
  );
}
