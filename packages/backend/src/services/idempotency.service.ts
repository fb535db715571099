import { setTimeout as sleep } from 'node:timers/promises';
import type { z } from 'zod';
import type { Clock } from '../lib/clock.js';
import { fingerprint, sha256 } from '../lib/crypto.js';
import { IdempotencyInFlightError, IdempotencyMismatchError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { WorkManagerConfig } from '../lib/config/work-manager.js';
import type { IdempotencyRecord, WorkStore } from './work-store.js';

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

type Claim = { kind: 'owner' } | { kind: 'replay'; record: IdempotencyRecord };

/**
 * At-most-once execution of a mutating call per (scope, client key).
 *
 * A pending record is reserved under the store's unique key before `fn`
 * runs; the response is stored when it completes. Duplicates with the same
 * payload fingerprint get the stored response, duplicates with a different
 * one get IdempotencyMismatchError. A reservation is never taken over while
 * pending; one left behind by a crashed process is removed by prune-keys.
 */
export class IdempotencyGuard {
  constructor(
    private readonly store: WorkStore,
    private readonly config: WorkManagerConfig['idempotency'],
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  async guard<T>(
    scope: string,
    key: string,
    payload: unknown,
    schema: ResponseSchema<T>,
    fn: () => Promise<T>,
  ): Promise<T> {
    const keyHash = sha256(key);
    const requestFingerprint = fingerprint(payload);

    const claim = await this.claim(scope, keyHash, requestFingerprint);
    if (claim.kind === 'replay') {
      this.logger.debug({ scope }, 'Replaying idempotent response');
      return schema.parse(JSON.parse(claim.record.response ?? 'null'));
    }

    let result: T;
    try {
      result = await fn();
    } catch (err) {
      this.store.releaseIdempotencyKey(scope, keyHash, requestFingerprint);
      throw err;
    }

    this.store.completeIdempotencyKey(scope, keyHash, JSON.stringify(result), this.clock().toISOString());
    return result;
  }

  /**
   * Reserve the key, or wait for the request that holds it to finish.
   */
  private async claim(scope: string, keyHash: string, requestFingerprint: string): Promise<Claim> {
    const reserve = (): boolean =>
      this.store.reserveIdempotencyKey({
        scope,
        keyHash,
        fingerprint: requestFingerprint,
        createdAt: this.clock().toISOString(),
      });

    if (reserve()) {
      return { kind: 'owner' };
    }

    const polls = Math.ceil(this.config.waitTimeoutMs / this.config.pollIntervalMs);
    for (let poll = 0; poll <= polls; poll++) {
      const record = this.store.findIdempotencyKey(scope, keyHash);

      if (!record) {
        // The holder failed and released its reservation.
        if (reserve()) {
          return { kind: 'owner' };
        }
        continue;
      }
      if (record.fingerprint !== requestFingerprint) {
        throw new IdempotencyMismatchError(scope);
      }
      if (record.status === 'completed') {
        return { kind: 'replay', record };
      }
      if (poll < polls) {
        await sleep(this.config.pollIntervalMs);
      }
    }

    this.logger.warn({ scope }, 'Idempotent request still in flight');
    throw new IdempotencyInFlightError(scope);
  }

  /** Delete records created before `olderThan`. Returns how many were removed. */
  prune(olderThan: string): number {
    return this.store.pruneIdempotencyKeys(olderThan);
  }
}
