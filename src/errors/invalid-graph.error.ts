import type { GraphViolation } from '../interfaces/workflow-definition.interface';

export class InvalidGraphError extends Error {
  constructor(
    public readonly definitionKey: string,
    public readonly violations: GraphViolation[],
  ) {
    super(
      `Workflow definition "${definitionKey}" is invalid: ` +
        violations.map((violation) => violation.message).join('; '),
    );
    this.name = 'InvalidGraphError';
  }
}
