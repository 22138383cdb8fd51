export class InstanceTerminatedError extends Error {
  constructor(
    public readonly instanceId: string,
    public readonly currentState: string,
    public readonly toState: string,
  ) {
    super(
      `Workflow instance ${instanceId} is in terminal state "${currentState}" and cannot move to "${toState}".`,
    );
    this.name = 'InstanceTerminatedError';
  }
}
