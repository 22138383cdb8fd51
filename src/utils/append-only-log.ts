import { LedgerImmutabilityViolationError } from '../errors/ledger-immutability-violation.error';

/**
 * Array that only grows. `push` is the one way in; every other write
 * (index assignment, defineProperty, delete, length changes, and the
 * mutators built on them such as unshift, splice, sort or reverse) throws
 * before anything changes. Entries are frozen on the way in.
 */
export function createAppendOnlyLog<T extends object>(label: string): T[] {
  const entries: T[] = [];

  const refuse = (prop: string | symbol): never => {
    throw new LedgerImmutabilityViolationError(
      'update',
      typeof prop === 'string' && /^\d+$/.test(prop)
        ? `${label}[${prop}]`
        : `${label}.${String(prop)}`,
    );
  };

  // writes to the raw array, so it never reaches the traps below
  const push = (...items: T[]): number => {
    for (const item of items) {
      entries[entries.length] = Object.freeze(item);
    }
    return entries.length;
  };

  return new Proxy(entries, {
    get(target, prop, receiver) {
      if (prop === 'push') {
        return push;
      }
      return Reflect.get(target, prop, receiver);
    },
    set(target, prop, value) {
      if (prop === 'length') {
        if (typeof value === 'number' && value < target.length) {
          throw new LedgerImmutabilityViolationError('truncate', label);
        }
        if (value === target.length) {
          return true;
        }
      }
      return refuse(prop);
    },
    defineProperty(_target, prop) {
      return refuse(prop);
    },
    deleteProperty(_target, prop) {
      throw new LedgerImmutabilityViolationError('delete', `${label}[${String(prop)}]`);
    },
  });
}
