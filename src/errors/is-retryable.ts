import { ConcurrentModificationError } from './concurrent-modification.error';

/**
 * Only a lost race on the same instance is worth retrying; every other
 * workflow error is a caller logic error.
 */
export function isRetryableWorkflowError(error: unknown): boolean {
  return error instanceof ConcurrentModificationError;
}
