export class DuplicateGuardError extends Error {
  constructor(
    public readonly guardName: string,
    public readonly class1: string,
    public readonly class2: string,
  ) {
    super(
      `Duplicate transition guard name "${guardName}". ` +
        `Both ${class1} and ${class2} are registered with the same name.`,
    );
    this.name = 'DuplicateGuardError';
  }
}
