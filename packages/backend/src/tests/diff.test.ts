import { describe, it, expect } from 'vitest';
import { backoffDelaySeconds } from '../lib/backoff.js';
import { canonicalJson, fingerprint } from '../lib/crypto.js';
import { computeChanges, createDiff, diffsEqual, emptyDiff, hasChanges } from '../lib/diff.js';

describe('Diff', () => {
  it('classifies added, modified and removed keys', () => {
    expect(computeChanges({ a: 1, b: [1, 2], c: 'gone' }, { a: 1, b: [1, 3], d: true })).toEqual({
      b: { type: 'modified', from: [1, 2], to: [1, 3] },
      d: { type: 'added', value: true },
      c: { type: 'removed', value: 'gone' },
    });
  });

  it('ignores key order when comparing nested values', () => {
    const changes = computeChanges({ meta: { x: 1, y: 2 } }, { meta: { y: 2, x: 1 } });

    expect(changes).toEqual({});
  });

  it('reports whether anything changed', () => {
    expect(hasChanges(createDiff({ a: 1 }, { a: 1 }))).toBe(false);
    expect(hasChanges(createDiff({ a: 1 }, { a: 2 }))).toBe(true);
    expect(emptyDiff('nothing to do')).toEqual({ before: {}, after: {}, changes: {}, summary: 'nothing to do' });
  });

  it('treats structurally equal diffs as equal', () => {
    const first = createDiff({ count: 0 }, { count: 2, keys: ['a', 'b'] }, 'Wrote 2');
    const second = createDiff({ count: 0 }, { keys: ['a', 'b'], count: 2 }, 'Wrote 2');

    expect(diffsEqual(first, second)).toBe(true);
    expect(diffsEqual(first, createDiff({ count: 0 }, { count: 2, keys: ['b', 'a'] }, 'Wrote 2'))).toBe(false);
    expect(diffsEqual(first, createDiff({ count: 0 }, { count: 2, keys: ['a', 'b'] }, 'Wrote two'))).toBe(false);
  });
});

describe('canonicalJson', () => {
  it('sorts keys at every level and drops undefined members', () => {
    expect(canonicalJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: undefined } })).toBe('{"a":{"d":[{"y":2,"z":1}]},"b":1}');
  });

  it('gives equal fingerprints to reordered payloads', () => {
    expect(fingerprint({ a: 1, b: 2 })).toBe(fingerprint({ b: 2, a: 1 }));
    expect(fingerprint({ a: 1 })).not.toBe(fingerprint({ a: '1' }));
  });
});

describe('backoffDelaySeconds', () => {
  it('doubles the base delay per attempt', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelaySeconds(attempt, 60, 0))).toEqual([60, 120, 240, 480]);
  });

  it('adds up to the full jitter', () => {
    expect(backoffDelaySeconds(1, 60, 20, () => 0)).toBe(60);
    expect(backoffDelaySeconds(1, 60, 20, () => 0.5)).toBe(70);
    expect(backoffDelaySeconds(1, 60, 20, () => 0.999)).toBe(80);
  });

  it('treats attempts below one as the first', () => {
    expect(backoffDelaySeconds(0, 30, 0)).toBe(30);
  });
});
