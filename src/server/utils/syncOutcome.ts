// =============================================================================
// Sync Outcome helpers
// =============================================================================
import { ErrorKind, SyncOutcome } from '../types';
import { classifyError } from './syncErrors';

export function succeeded(entityId?: number): SyncOutcome {
  return entityId === undefined ? { ok: true } : { ok: true, entityId };
}

export function failed(message: string, kind: ErrorKind, entityId?: number): SyncOutcome {
  return entityId === undefined
    ? { ok: false, message, kind }
    : { ok: false, message, kind, entityId };
}

/** Convert a thrown value into a failure outcome. */
export function outcomeFromError(err: unknown): SyncOutcome {
  const { message, kind, entityId } = classifyError(err);
  return failed(message, kind, entityId);
}
