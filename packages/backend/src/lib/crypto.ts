import { createHash, randomUUID } from 'crypto';

export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Serialize a value as JSON with object keys sorted at every level, so that
 * structurally equal payloads always produce the same text.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((entry) => canonicalJson(entry ?? null)).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
  }

  return JSON.stringify(value ?? null);
}

/** Fingerprint of a request payload, used to detect idempotency key reuse. */
export function fingerprint(payload: unknown): string {
  return sha256(canonicalJson(payload));
}

/** Checksum of a stored part payload. */
export function checksum(payload: unknown): string {
  return sha256(canonicalJson(payload));
}

export function generateId(): string {
  return randomUUID();
}
