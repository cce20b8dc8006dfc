/**
 * Permission Cache
 *
 * Read-through cache of each user's effective permission set, stored as a
 * JSON array of `resource:action` strings under `user:perms:{userId}`.
 *
 * Flow on check:
 * 1. Cache hit (valid JSON string array) - resolve against it, done
 * 2. Miss, corrupt entry or cache error - load from the store, resolve,
 *    populate in the background
 *
 * Populates and invalidations go through `dispatch`: submitted to the
 * executor's `cache` pool when one is set, run in-line otherwise. Neither
 * ever sees the caller's AbortSignal. A hit is trusted until its TTL
 * runs out.
 */

// External packages
import { type } from 'arktype';
import { allows, toPermissionSet } from 'permission-resolver';

// Internal imports
import type { Cache } from '../databases/cache.js';
import type { Executor } from '../common/executor.js';
import { createChildLogger, type Logger } from '../common/logger.js';
import { getErrorMessage } from '../common/errors.js';
import type { EntityStore } from './store.js';
import type { OperationContext } from './types.js';

export const CACHE_KEY_PREFIX = 'user:perms:';
export const CACHE_TTL_SECONDS = 3600;
export const CACHE_POOL = 'cache';

export function permissionCacheKey(userId: number): string {
  return `${CACHE_KEY_PREFIX}${userId}`;
}

const CachedPermissions = type('string[]');

export interface PermissionCacheOptions {
  /** Entry lifetime in seconds (default: 3600) */
  ttlSeconds?: number;
  cache?: Cache | null;
  executor?: Executor | null;
  log?: Logger;
}

type BackgroundOperation = 'populate' | 'invalidate';

export class PermissionCache {
  private cache: Cache | null;
  private executor: Executor | null;
  private readonly log: Logger;
  readonly ttlSeconds: number;

  constructor(
    private readonly store: Pick<EntityStore, 'getUserPermissions'>,
    options: PermissionCacheOptions = {},
  ) {
    this.cache = options.cache ?? null;
    this.executor = options.executor ?? null;
    this.ttlSeconds = options.ttlSeconds ?? CACHE_TTL_SECONDS;
    this.log = options.log ?? createChildLogger({ metadata: { component: 'permission-cache' } });
  }

  // ─────────────────────────────────────────────────────────────────
  // Backends
  // ─────────────────────────────────────────────────────────────────

  /** Swap or remove the cache backend; in-flight operations keep their snapshot */
  setCache(cache: Cache | null): void {
    this.cache = cache;
  }

  setExecutor(executor: Executor | null): void {
    this.executor = executor;
  }

  // ─────────────────────────────────────────────────────────────────
  // Check
  // ─────────────────────────────────────────────────────────────────

  async checkPermission(ctx: OperationContext, userId: number, resource: string, action: string): Promise<boolean> {
    const cache = this.cache;
    const key = permissionCacheKey(userId);
    const request = { resource, action };

    if (cache) {
      const cached = await this.read(cache, key);
      if (cached) {
        const allowed = allows(cached, request);
        this.log.debug('Permission cache hit', { userId, resource, action, allowed });
        return allowed;
      }
    }

    let permissions: string[];
    try {
      permissions = toPermissionSet(await this.store.getUserPermissions(ctx, userId));
    } catch (error) {
      this.log.error('Permission lookup failed', { userId, resource, action, error: getErrorMessage(error) });
      throw error;
    }

    const allowed = allows(permissions, request);
    this.log.debug('Permission cache miss', { userId, resource, action, allowed, cached: cache !== null });

    if (cache) {
      const value = JSON.stringify(permissions);
      const ttl = this.ttlSeconds;
      await this.dispatch('populate', userId, () => cache.set(key, value, ttl));
    }

    return allowed;
  }

  // ─────────────────────────────────────────────────────────────────
  // Invalidation
  // ─────────────────────────────────────────────────────────────────

  /**
   * Best-effort delete of the user's entry. Failures are logged; the TTL
   * bounds how long a missed invalidation can matter.
   */
  async invalidateUser(userId: number): Promise<void> {
    const cache = this.cache;
    if (!cache) return;

    const key = permissionCacheKey(userId);
    await this.dispatch('invalidate', userId, () => cache.delete(key));
  }

  async invalidateUsers(userIds: Iterable<number>): Promise<void> {
    for (const userId of new Set(userIds)) {
      await this.invalidateUser(userId);
    }
  }

  /**
   * The cached set as stored, or null on miss / corrupt entry / no cache
   */
  async readCached(userId: number): Promise<string[] | null> {
    const cache = this.cache;
    if (!cache) return null;
    return this.read(cache, permissionCacheKey(userId));
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private async read(cache: Cache, key: string): Promise<string[] | null> {
    let raw: string | null;
    try {
      raw = await cache.get(key);
    } catch (error) {
      this.log.warn('Permission cache read failed', { key, error: getErrorMessage(error) });
      return null;
    }
    if (!raw) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.log.debug('Ignoring corrupt permission cache entry', { key, reason: 'invalid JSON' });
      return null;
    }

    const permissions = CachedPermissions(parsed);
    if (permissions instanceof type.errors) {
      this.log.debug('Ignoring corrupt permission cache entry', { key, reason: permissions.summary });
      return null;
    }
    return permissions;
  }

  /**
   * Run cache work off the caller's path. Without an executor the task runs
   * in-line and is awaited.
   */
  private async dispatch(operation: BackgroundOperation, userId: number, work: () => Promise<void>): Promise<void> {
    const task = async (): Promise<void> => {
      try {
        await work();
      } catch (error) {
        this.log.warn(`Permission cache ${operation} failed`, { userId, error: getErrorMessage(error) });
      }
    };

    const executor = this.executor;
    if (!executor) {
      await task();
      return;
    }

    try {
      executor.execute(CACHE_POOL, task);
    } catch (error) {
      this.log.warn(`Permission cache ${operation} dropped`, { userId, error: getErrorMessage(error) });
    }
  }
}
