import type { TransitionRecord } from '../interfaces/workflow-records.interface';

export interface StateAsOfOptions {
  /** Only consider records the system had recorded by this time. */
  knownAt?: Date;
}

/**
 * Business-time query: the last record, in append order, whose effectiveAt
 * is at or before `at`. Records must be in sequence order. A backdated
 * record therefore still wins over earlier appends with a later effectiveAt,
 * so asking about "now" always answers the cached current state.
 */
export function stateAsOf(
  records: readonly TransitionRecord[],
  at: Date,
  options: StateAsOfOptions = {},
): TransitionRecord | null {
  let match: TransitionRecord | null = null;

  for (const record of records) {
    if (
      options.knownAt &&
      record.recordedAt.getTime() > options.knownAt.getTime()
    ) {
      continue;
    }
    if (record.effectiveAt.getTime() > at.getTime()) {
      continue;
    }
    match = record;
  }

  return match;
}

/**
 * System-time query: the last record appended at or before wall-clock
 * `at`, i.e. what the instance cache held at that moment.
 */
export function stateRecordedAsOf(
  records: readonly TransitionRecord[],
  at: Date,
): TransitionRecord | null {
  let match: TransitionRecord | null = null;

  for (const record of records) {
    if (record.recordedAt.getTime() <= at.getTime()) {
      match = record;
    }
  }

  return match;
}
