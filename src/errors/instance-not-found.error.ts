export class InstanceNotFoundError extends Error {
  constructor(public readonly instanceId: string) {
    super(`No workflow instance found with id "${instanceId}".`);
    this.name = 'InstanceNotFoundError';
  }
}
