// =============================================================================
// Sync Errors — Transient / Permanent classification
// =============================================================================
// Handlers throw (or return) failures tagged with an ErrorKind. The engine
// retries transient ones with backoff and moves permanent ones straight to
// `dead`. Anything that is not a SyncError is treated as transient.
// =============================================================================
import { ErrorKind } from '../types';
import { sanitizeMessage } from './sanitizeError';

/** Upper bound for error text persisted on a job */
export const MAX_ERROR_LENGTH = 2000;

export class SyncError extends Error {
  public readonly kind: ErrorKind;
  /** Remote id created before the failure, if any */
  public readonly entityId?: number;

  constructor(message: string, kind: ErrorKind, entityId?: number) {
    super(message);
    this.name = 'SyncError';
    this.kind = kind;
    this.entityId = entityId;
    Object.setPrototypeOf(this, SyncError.prototype);
  }
}

/** Timeout, connection refused, 5xx, rate-limited… */
export class TransientSyncError extends SyncError {
  constructor(message: string, entityId?: number) {
    super(message, 'transient', entityId);
    this.name = 'TransientSyncError';
    Object.setPrototypeOf(this, TransientSyncError.prototype);
  }
}

/** Validation failure, access denied, missing required field… */
export class PermanentSyncError extends SyncError {
  constructor(message: string, entityId?: number) {
    super(message, 'permanent', entityId);
    this.name = 'PermanentSyncError';
    Object.setPrototypeOf(this, PermanentSyncError.prototype);
  }
}

export interface ClassifiedError {
  message: string;
  kind: ErrorKind;
  entityId?: number;
}

/**
 * Reduce any thrown value to a message + kind.
 *
 * @param err — Whatever a handler threw
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof SyncError) {
    return { message: err.message, kind: err.kind, entityId: err.entityId };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { message, kind: 'transient' };
}

/** Scrub and truncate error text before it is persisted. */
export function toStoredError(message: string): string {
  return sanitizeMessage(message).slice(0, MAX_ERROR_LENGTH);
}
