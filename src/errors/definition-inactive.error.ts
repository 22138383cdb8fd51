export class DefinitionInactiveError extends Error {
  constructor(public readonly definitionKey: string) {
    super(
      `Workflow definition "${definitionKey}" is inactive; new instances cannot be created from it.`,
    );
    this.name = 'DefinitionInactiveError';
  }
}
