export class InvalidTimestampError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(`${field} must be a valid date, received ${String(value)}`);
    this.name = 'InvalidTimestampError';
  }
}
