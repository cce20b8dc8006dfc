/**
 * Cache backend contract
 *
 * A string key-value store with per-entry TTL. The permission cache only
 * needs these three calls, so Redis and the in-process memory cache are
 * interchangeable behind it.
 */

export interface Cache {
  /** Stored value, or null when absent or expired */
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}
