import { serializeError } from 'serialize-error';
import type { GroupDirectoryContext } from '../core/types';
import { normalizeError } from '../utils/normalize-error';
import { type GroupDirectoryError, ReadonlyHandleError, toStoreError } from './groups.errors';

export function assertWritable(context: GroupDirectoryContext, operation: string): void {
  if (context.mode === 'readonly') {
    throw new ReadonlyHandleError(operation);
  }
}

/**
 * Counts and logs a failed operation and returns the error to throw: errors of
 * the group directory taxonomy as they are, anything else as a `StoreError`.
 */
export function reportStoreFailure(
  context: GroupDirectoryContext,
  operation: string,
  error: unknown,
): GroupDirectoryError {
  context.metrics.storeErrorsTotal.add(1, { operation });
  context.logger.error({
    msg: `Group ${operation} failed`,
    mode: context.mode,
    error: serializeError(normalizeError(error)),
  });
  return toStoreError(error, `Group ${operation} failed`);
}
