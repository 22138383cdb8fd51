export class GuardNotRegisteredError extends Error {
  constructor(public readonly guardName: string) {
    super(`No transition guard registered under the name "${guardName}".`);
    this.name = 'GuardNotRegisteredError';
  }
}
