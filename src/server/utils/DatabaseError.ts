// =============================================================================
// DatabaseError — Typed error for all sync store failures
// =============================================================================
// Wraps raw database/Mongoose errors so consumers get a clean, predictable
// error type. NEVER includes record contents in the message — only the
// operation name and a scrubbed driver message.
// =============================================================================
import { sanitizeMessage } from './sanitizeError';

export type DatabaseOperation =
  | 'nextId'
  | 'insert'
  | 'findDuplicate'
  | 'findById'
  | 'update'
  | 'claim'
  | 'findDue'
  | 'count'
  | 'reset'
  | 'delete'
  | 'cleanup'
  | 'recoverStale'
  | 'findMapping'
  | 'upsertMapping'
  | 'deleteMapping'
  | 'listMappings'
  | 'readSetting'
  | 'writeSetting';

export class DatabaseError extends Error {
  /** Which store operation failed */
  public readonly operation: DatabaseOperation;
  /** The original error (for internal logging only — never expose to callers) */
  public readonly cause: Error;

  constructor(operation: DatabaseOperation, cause: Error) {
    super(`Sync store ${operation} failed: ${sanitizeMessage(cause.message).slice(0, 200)}`);
    this.name = 'DatabaseError';
    this.operation = operation;
    this.cause = cause;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, DatabaseError.prototype);
  }
}

/** Run a store call, re-throwing anything it raises as a DatabaseError. */
export async function safeDbCall<T>(
  operation: DatabaseOperation,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new DatabaseError(operation, err instanceof Error ? err : new Error(String(err)));
  }
}
