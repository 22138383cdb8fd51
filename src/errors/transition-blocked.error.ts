export type TransitionBlockKind = 'blocked' | 'warning';

export class TransitionBlockedError extends Error {
  constructor(
    public readonly instanceId: string,
    public readonly kind: TransitionBlockKind,
    public readonly reasons: string[],
  ) {
    super(
      kind === 'blocked'
        ? `Transition blocked for workflow instance ${instanceId}: ${reasons.join('; ')}`
        : `Transition for workflow instance ${instanceId} has unacknowledged warnings: ${reasons.join('; ')}`,
    );
    this.name = 'TransitionBlockedError';
  }
}
