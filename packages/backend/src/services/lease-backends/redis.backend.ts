import type { Redis } from 'ioredis';
import type { LeaseBackend } from './types.js';

// Compare-and-set scripts: only the current holder may extend or delete.
const EXTEND_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('pexpire', KEYS[1], ARGV[2])
end
return 0
`;

const RELEASE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0
`;

/**
 * The three atomic operations the Redis backend needs. `ioredisLeaseClient`
 * implements them with SET NX PX and the scripts above; tests supply an
 * in-process implementation.
 */
export interface RedisLeaseClient {
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  extendIfValue(key: string, value: string, ttlMs: number): Promise<boolean>;
  deleteIfValue(key: string, value: string): Promise<boolean>;
}

export function ioredisLeaseClient(redis: Redis): RedisLeaseClient {
  return {
    async setIfAbsent(key, value, ttlMs) {
      const reply = await redis.set(key, value, 'PX', ttlMs, 'NX');
      return reply === 'OK';
    },
    async extendIfValue(key, value, ttlMs) {
      const reply = await redis.eval(EXTEND_SCRIPT, 1, key, value, String(ttlMs));
      return reply === 1;
    },
    async deleteIfValue(key, value) {
      const reply = await redis.eval(RELEASE_SCRIPT, 1, key, value);
      return reply === 1;
    },
  };
}

/**
 * Leases as Redis keys with a native TTL; an expired lease simply vanishes,
 * which is what lets SET NX take it over.
 */
export class RedisLeaseBackend implements LeaseBackend {
  readonly name = 'redis';

  constructor(
    private readonly client: RedisLeaseClient,
    private readonly prefix = 'work:lease:',
  ) {}

  async tryAcquire(key: string, holder: string, ttlMs: number): Promise<boolean> {
    return this.client.setIfAbsent(this.prefix + key, holder, ttlMs);
  }

  async tryExtend(key: string, holder: string, ttlMs: number): Promise<boolean> {
    return this.client.extendIfValue(this.prefix + key, holder, ttlMs);
  }

  async release(key: string, holder: string): Promise<boolean> {
    return this.client.deleteIfValue(this.prefix + key, holder);
  }
}
