export class IllegalTransitionError extends Error {
  constructor(
    public readonly instanceId: string,
    public readonly fromState: string,
    public readonly toState: string,
    public readonly allowedTargets: string[],
  ) {
    super(
      `Transition "${fromState}" -> "${toState}" is not allowed for workflow instance ${instanceId}. ` +
        `Allowed targets: ${allowedTargets.length > 0 ? allowedTargets.join(', ') : '(none)'}.`,
    );
    this.name = 'IllegalTransitionError';
  }
}
