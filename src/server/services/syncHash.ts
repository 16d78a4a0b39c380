// =============================================================================
// Sync Hash — Content fingerprint used to skip no-op updates
// =============================================================================
// SHA-256 of the record's fields with keys sorted at every level. Strings are
// trimmed and null/undefined normalise to the empty string, so key order and
// stray whitespace do not produce false mismatches.
//
// Always computed over the local-side representation of a record, in both
// directions, so the DiffScanner and the push/pull paths compare like with
// like.
// =============================================================================
import crypto from 'crypto';
import { JsonPayload } from '../types';

function canonicalValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) return `[${value.map(canonicalValue).join(',')}]`;
  if (typeof value === 'object') {
    const fields = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${k}:${canonicalValue(v)}`)
      .join(',');
    return `{${fields}}`;
  }
  return String(value);
}

/**
 * Deterministic SHA-256 hex digest of a record's content.
 *
 * @param content — Flat or nested field values
 */
export function computeSyncHash(content: JsonPayload): string {
  const sorted = Object.keys(content)
    .sort()
    .map((k) => `${k}=${canonicalValue(content[k])}`)
    .join('|');
  return crypto.createHash('sha256').update(sorted).digest('hex');
}
