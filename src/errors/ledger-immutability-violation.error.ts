export type LedgerOperation = 'update' | 'delete' | 'truncate';

export class LedgerImmutabilityViolationError extends Error {
  constructor(
    public readonly operation: LedgerOperation,
    public readonly target: string,
  ) {
    super(
      `Refusing to ${operation} ${target}: transition records are append-only.`,
    );
    this.name = 'LedgerImmutabilityViolationError';
  }
}
