import { InvalidTimestampError } from '../errors/invalid-timestamp.error';

export interface Clock {
  now(): Date;
}

/**
 * Wall clock that never goes backwards within the process, even if the
 * system time is stepped back.
 */
export class MonotonicClock implements Clock {
  private last = 0;

  now(): Date {
    this.last = Math.max(this.last, Date.now());
    return new Date(this.last);
  }
}

export type TimestampInput = Date | string | number;

export function toValidDate(value: TimestampInput, field: string): Date {
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidTimestampError(field, value);
  }
  return date;
}

export function latestOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}
