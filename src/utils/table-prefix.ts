const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const DEFAULT_TABLE_PREFIX = 'workflow';

export interface WorkflowTableNames {
  definitions: string;
  instances: string;
  transitions: string;
}

export function validateTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}

export function resolveTableNames(prefix: string): WorkflowTableNames {
  validateTableName(prefix);
  return {
    definitions: `${prefix}_definitions`,
    instances: `${prefix}_instances`,
    transitions: `${prefix}_transitions`,
  };
}
