export class DefinitionFrozenError extends Error {
  constructor(
    public readonly definitionId: string,
    public readonly definitionKey: string,
    public readonly instanceCount: number,
  ) {
    super(
      `Workflow definition "${definitionKey}" is referenced by ${instanceCount} instance(s) and can no longer be edited. ` +
        'Register a new definition to evolve the workflow.',
    );
    this.name = 'DefinitionFrozenError';
  }
}
