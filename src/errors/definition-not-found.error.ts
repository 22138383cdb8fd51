export class DefinitionNotFoundError extends Error {
  constructor(public readonly keyOrId: string) {
    super(`No workflow definition found for "${keyOrId}".`);
    this.name = 'DefinitionNotFoundError';
  }
}
