import type { Db } from '../../lib/db.js';
import type { Clock } from '../../lib/clock.js';
import type { LeaseBackend } from './types.js';

/**
 * Lease rows in the work-order database itself. Each call is one statement,
 * so SQLite's write lock makes acquire and extend atomic compare-and-set.
 */
export class SqliteLeaseBackend implements LeaseBackend {
  readonly name = 'database';

  constructor(
    private readonly db: Db,
    private readonly clock: Clock,
  ) {}

  async tryAcquire(key: string, holder: string, ttlMs: number): Promise<boolean> {
    const now = this.clock().getTime();
    const result = this.db
      .prepare(
        `INSERT INTO work_leases (lease_key, holder, expires_at) VALUES (?, ?, ?)
         ON CONFLICT (lease_key) DO UPDATE SET holder = excluded.holder, expires_at = excluded.expires_at
         WHERE work_leases.expires_at <= ?`,
      )
      .run(key, holder, now + ttlMs, now);
    return result.changes === 1;
  }

  async tryExtend(key: string, holder: string, ttlMs: number): Promise<boolean> {
    const now = this.clock().getTime();
    const result = this.db
      .prepare(`UPDATE work_leases SET expires_at = ? WHERE lease_key = ? AND holder = ? AND expires_at > ?`)
      .run(now + ttlMs, key, holder, now);
    return result.changes === 1;
  }

  async release(key: string, holder: string): Promise<boolean> {
    const result = this.db.prepare(`DELETE FROM work_leases WHERE lease_key = ? AND holder = ?`).run(key, holder);
    return result.changes === 1;
  }
}
