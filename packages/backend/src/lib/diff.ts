import { z } from 'zod';
import { canonicalJson } from './crypto.js';

// ============================================================================
// Diff
// ============================================================================
// The before/after record an order type's apply() returns. Stored on the
// `applied` event and compared structurally to check apply() idempotence.

export const DiffChangeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('added'), value: z.unknown() }),
  z.object({ type: z.literal('modified'), from: z.unknown(), to: z.unknown() }),
  z.object({ type: z.literal('removed'), value: z.unknown() }),
]);

export const DiffSchema = z.object({
  before: z.record(z.string(), z.unknown()),
  after: z.record(z.string(), z.unknown()),
  changes: z.record(z.string(), DiffChangeSchema),
  summary: z.string().nullable(),
});

export type DiffChange = z.infer<typeof DiffChangeSchema>;
export type Diff = z.infer<typeof DiffSchema>;

function sameValue(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b);
}

export function computeChanges(
  before: Record<string, unknown>,
  after: Record<string, unknown>,
): Record<string, DiffChange> {
  const changes: Record<string, DiffChange> = {};

  for (const [key, value] of Object.entries(after)) {
    if (!(key in before)) {
      changes[key] = { type: 'added', value };
    } else if (!sameValue(before[key], value)) {
      changes[key] = { type: 'modified', from: before[key], to: value };
    }
  }

  for (const [key, value] of Object.entries(before)) {
    if (!(key in after)) {
      changes[key] = { type: 'removed', value };
    }
  }

  return changes;
}

export function createDiff(
  before: Record<string, unknown>,
  after: Record<string, unknown>,
  summary: string | null = null,
): Diff {
  return { before, after, changes: computeChanges(before, after), summary };
}

export function emptyDiff(summary: string | null = null): Diff {
  return { before: {}, after: {}, changes: {}, summary };
}

export function hasChanges(diff: Diff): boolean {
  return Object.keys(diff.changes).length > 0;
}

/** Structural equality, independent of key order. */
export function diffsEqual(a: Diff, b: Diff): boolean {
  return sameValue(a, b);
}
