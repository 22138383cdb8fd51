export class DuplicateDefinitionError extends Error {
  constructor(public readonly definitionKey: string) {
    super(
      `Duplicate workflow definition key "${definitionKey}". ` +
        'Definitions are immutable once registered; use a new key (for example with a version suffix).',
    );
    this.name = 'DuplicateDefinitionError';
  }
}
