// =============================================================================
// Payload decoding
// =============================================================================
// Job payloads are stored as serialized JSON objects. An empty payload means
// "no snapshot, re-read the live record" and decodes to `{}`. Anything that
// does not parse to a plain object can never succeed on retry, so it is
// reported as a PermanentSyncError.
// =============================================================================
import { JsonPayload } from '../types';
import { PermanentSyncError } from './syncErrors';

function isJsonObject(value: unknown): value is JsonPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a job payload.
 *
 * @throws PermanentSyncError when the payload is not a JSON object
 */
export function decodePayload(raw: string): JsonPayload {
  if (raw.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PermanentSyncError(`Invalid JSON payload: ${reason.slice(0, 120)}`);
  }

  if (!isJsonObject(parsed)) {
    throw new PermanentSyncError('Invalid JSON payload: expected an object');
  }
  return parsed;
}

/** Serialize a payload for storage (strings are stored as given). */
export function encodePayload(payload: JsonPayload | string | undefined): string {
  if (payload === undefined) return '';
  return typeof payload === 'string' ? payload : JSON.stringify(payload);
}
