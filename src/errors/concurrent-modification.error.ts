export class ConcurrentModificationError extends Error {
  constructor(
    public readonly instanceId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number | null,
  ) {
    super(
      `Workflow instance ${instanceId} was modified concurrently ` +
        `(expected version ${expectedVersion}, found ${actualVersion ?? 'none'}). Re-read and retry.`,
    );
    this.name = 'ConcurrentModificationError';
  }
}
