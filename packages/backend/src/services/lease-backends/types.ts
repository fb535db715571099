/**
 * Atomic lease primitive behind LeaseManager.
 *
 * Keys are opaque (`item:{id}`); `holder` is the worker id. Implementations
 * must make each call a single atomic step against their store.
 */
export interface LeaseBackend {
  readonly name: string;
  /** Set the lease if it is absent or expired. */
  tryAcquire(key: string, holder: string, ttlMs: number): Promise<boolean>;
  /** Push expiry forward if `holder` still owns an unexpired lease. */
  tryExtend(key: string, holder: string, ttlMs: number): Promise<boolean>;
  /** Drop the lease if `holder` owns it. Returns whether anything was removed. */
  release(key: string, holder: string): Promise<boolean>;
}

export function itemLeaseKey(itemId: string): string {
  return `item:${itemId}`;
}
