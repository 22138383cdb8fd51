export class LedgerChainError extends Error {
  constructor(
    public readonly instanceId: string,
    public readonly expectedFromState: string,
    public readonly fromState: string,
  ) {
    super(
      `Transition record for workflow instance ${instanceId} must start from "${expectedFromState}", ` +
        `the state it is in, not "${fromState}".`,
    );
    this.name = 'LedgerChainError';
  }
}
