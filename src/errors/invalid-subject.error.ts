export class InvalidSubjectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSubjectError';
  }
}
