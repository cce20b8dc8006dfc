/**
 * Permission Cache - Test Suite
 *
 * Read-through behaviour, corrupt entries, background dispatch and
 * invalidation, observed through the store call counter.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import {
  PermissionCache,
  permissionCacheKey,
  CACHE_POOL,
  CACHE_TTL_SECONDS,
} from '../src/access/permission-cache.js';
import { MemoryCache } from '../src/databases/memory-cache.js';
import { TaskRejectedError } from '../src/common/executor.js';
import { configureLogger, subscribeToLogs, type LogEntry } from '../src/common/logger.js';
import { InMemoryEntityStore } from './helpers/memory-store.js';
import { ManualExecutor, RecordingCache } from './helpers/fakes.js';

const ctx = {};

async function seedUser(store: InMemoryEntityStore, userId: number, grants: Array<[string, string]>): Promise<void> {
  const role = await store.createRole(ctx, { name: `role-${userId}`, description: '', status: 'enabled' });
  for (const [resource, action] of grants) {
    const permission = await store.createPermission(ctx, {
      name: `${userId}/${resource}:${action}`,
      resource,
      action,
      description: '',
      status: 'enabled',
    });
    await store.assignPermissionToRole(ctx, role.id, permission.id);
  }
  await store.assignRoleToUser(ctx, userId, role.id);
  store.resetCounts();
}

describe('PermissionCache', () => {
  let store: InMemoryEntityStore;
  let entries: LogEntry[];
  let unsubscribe: () => void;

  beforeAll(() => {
    configureLogger({ output: false });
  });

  beforeEach(async () => {
    store = new InMemoryEntityStore();
    await seedUser(store, 1, [['posts', 'write'], ['users', 'read']]);
    entries = [];
    unsubscribe = subscribeToLogs(entry => entries.push(entry));
  });

  afterEach(() => {
    unsubscribe();
  });

  // ═══════════════════════════════════════════════════════════════════
  // KEYS
  // ═══════════════════════════════════════════════════════════════════

  it('should key entries by user id', () => {
    expect(permissionCacheKey(42)).toBe('user:perms:42');
  });

  // ═══════════════════════════════════════════════════════════════════
  // READ-THROUGH
  // ═══════════════════════════════════════════════════════════════════

  describe('read-through', () => {
    it('should load from the store on a miss and populate the cache', async () => {
      const cache = new MemoryCache();
      const permissions = new PermissionCache(store, { cache });

      expect(await permissions.checkPermission(ctx, 1, 'posts', 'write')).toBe(true);
      expect(store.callCount('getUserPermissions')).toBe(1);
      expect(await cache.get('user:perms:1')).toBe('["posts:write","users:read"]');
    });

    it('should answer repeat checks from the cache without a store query', async () => {
      const permissions = new PermissionCache(store, { cache: new MemoryCache() });

      await permissions.checkPermission(ctx, 1, 'posts', 'write');
      expect(await permissions.checkPermission(ctx, 1, 'users', 'read')).toBe(true);
      expect(await permissions.checkPermission(ctx, 1, 'posts', 'delete')).toBe(false);
      expect(store.callCount('getUserPermissions')).toBe(1);
    });

    it('should trust a cached entry over the store', async () => {
      const cache = new MemoryCache();
      await cache.set('user:perms:7', '["posts:*"]', 60);
      const permissions = new PermissionCache(store, { cache });

      expect(await permissions.checkPermission(ctx, 7, 'posts', 'delete')).toBe(true);
      expect(await permissions.checkPermission(ctx, 7, 'users', 'read')).toBe(false);
      expect(store.callCount('getUserPermissions')).toBe(0);
    });

    it('should treat a cached empty list as a hit', async () => {
      const cache = new MemoryCache();
      await cache.set('user:perms:1', '[]', 60);
      const permissions = new PermissionCache(store, { cache });

      expect(await permissions.checkPermission(ctx, 1, 'posts', 'write')).toBe(false);
      expect(store.callCount('getUserPermissions')).toBe(0);
    });

    it.each([
      ['invalid JSON', 'not json'],
      ['an object', '{"posts":"write"}'],
      ['non-string items', '[1,2]'],
      ['a bare string', '"posts:write"'],
      ['null', 'null'],
      ['an empty value', ''],
    ])('should treat %s as a miss and overwrite it', async (_label, stored) => {
      const cache = new MemoryCache();
      await cache.set('user:perms:1', stored, 60);
      const permissions = new PermissionCache(store, { cache });

      expect(await permissions.checkPermission(ctx, 1, 'posts', 'write')).toBe(true);
      expect(store.callCount('getUserPermissions')).toBe(1);
      expect(await cache.get('user:perms:1')).toBe('["posts:write","users:read"]');
    });

    it('should fall back to the store when the cache read fails', async () => {
      const cache = new RecordingCache();
      cache.failures.get = new Error('redis down');
      const permissions = new PermissionCache(store, { cache });

      expect(await permissions.checkPermission(ctx, 1, 'users', 'read')).toBe(true);
      expect(store.callCount('getUserPermissions')).toBe(1);
      expect(entries.map(e => e.message)).toContain('Permission cache read failed');
    });

    it('should store with the configured TTL', async () => {
      const cache = new RecordingCache();
      await new PermissionCache(store, { cache }).checkPermission(ctx, 1, 'posts', 'write');
      await new PermissionCache(store, { cache, ttlSeconds: 60 }).checkPermission(ctx, 2, 'posts', 'write');

      expect(cache.callsOf('set')).toEqual([
        { op: 'set', key: 'user:perms:1', value: '["posts:write","users:read"]', ttlSeconds: CACHE_TTL_SECONDS },
        { op: 'set', key: 'user:perms:2', value: '[]', ttlSeconds: 60 },
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // FAILURES
  // ═══════════════════════════════════════════════════════════════════

  describe('failures', () => {
    it('should propagate store errors and cache nothing', async () => {
      const cache = new MemoryCache();
      const permissions = new PermissionCache(store, { cache });
      store.failOn('getUserPermissions', new Error('connection reset'));

      await expect(permissions.checkPermission(ctx, 1, 'posts', 'write')).rejects.toThrow('connection reset');
      expect(cache.size).toBe(0);
      expect(entries.find(e => e.level === 'error')?.message).toBe('Permission lookup failed');
    });

    it('should return the verdict when populating fails', async () => {
      const cache = new RecordingCache();
      cache.failures.set = new Error('read only replica');
      const permissions = new PermissionCache(store, { cache });

      expect(await permissions.checkPermission(ctx, 1, 'posts', 'write')).toBe(true);
      const warning = entries.find(e => e.level === 'warn');
      expect(warning?.message).toBe('Permission cache populate failed');
      expect(warning?.data).toEqual({ component: 'permission-cache', userId: 1, error: 'read only replica' });
    });

    it('should stop before the store once the caller is cancelled', async () => {
      const permissions = new PermissionCache(store, { cache: new MemoryCache() });
      const controller = new AbortController();
      controller.abort(new Error('request cancelled'));

      await expect(
        permissions.checkPermission({ signal: controller.signal }, 1, 'posts', 'write'),
      ).rejects.toThrow('request cancelled');
      expect(store.callCount('getUserPermissions')).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // BACKGROUND DISPATCH
  // ═══════════════════════════════════════════════════════════════════

  describe('background dispatch', () => {
    it('should submit the populate to the cache pool and not wait for it', async () => {
      const cache = new MemoryCache();
      const executor = new ManualExecutor();
      const permissions = new PermissionCache(store, { cache, executor });

      expect(await permissions.checkPermission(ctx, 1, 'posts', 'write')).toBe(true);
      expect(executor.submitted.map(s => s.pool)).toEqual([CACHE_POOL]);
      expect(await cache.get('user:perms:1')).toBeNull();

      await executor.runAll();
      expect(await cache.get('user:perms:1')).toBe('["posts:write","users:read"]');
    });

    it('should finish the populate after the caller is cancelled', async () => {
      const cache = new MemoryCache();
      const executor = new ManualExecutor();
      const permissions = new PermissionCache(store, { cache, executor });
      const controller = new AbortController();

      await permissions.checkPermission({ signal: controller.signal }, 1, 'posts', 'write');
      controller.abort();
      await executor.runAll();

      expect(await cache.get('user:perms:1')).toBe('["posts:write","users:read"]');
    });

    it('should drop work the executor rejects', async () => {
      const cache = new MemoryCache();
      const executor = new ManualExecutor();
      executor.rejectWith = new TaskRejectedError(CACHE_POOL, 'queue-full');
      const permissions = new PermissionCache(store, { cache, executor });

      expect(await permissions.checkPermission(ctx, 1, 'posts', 'write')).toBe(true);
      expect(cache.size).toBe(0);
      expect(entries.find(e => e.level === 'warn')?.message).toBe('Permission cache populate dropped');
    });

    it('should run in-line once the executor is removed', async () => {
      const cache = new MemoryCache();
      const executor = new ManualExecutor();
      const permissions = new PermissionCache(store, { cache, executor });

      permissions.setExecutor(null);
      await permissions.checkPermission(ctx, 1, 'posts', 'write');

      expect(executor.submitted).toHaveLength(0);
      expect(await cache.get('user:perms:1')).not.toBeNull();
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // INVALIDATION
  // ═══════════════════════════════════════════════════════════════════

  describe('invalidation', () => {
    it('should delete the user entry', async () => {
      const cache = new MemoryCache();
      const permissions = new PermissionCache(store, { cache });
      await permissions.checkPermission(ctx, 1, 'posts', 'write');

      await permissions.invalidateUser(1);

      expect(await cache.get('user:perms:1')).toBeNull();
      await permissions.checkPermission(ctx, 1, 'posts', 'write');
      expect(store.callCount('getUserPermissions')).toBe(2);
    });

    it('should swallow delete failures', async () => {
      const cache = new RecordingCache();
      cache.failures.delete = new Error('timeout');
      const permissions = new PermissionCache(store, { cache });

      await expect(permissions.invalidateUser(1)).resolves.toBeUndefined();
      expect(entries.find(e => e.level === 'warn')?.message).toBe('Permission cache invalidate failed');
    });

    it('should invalidate each distinct user once', async () => {
      const cache = new RecordingCache();
      const permissions = new PermissionCache(store, { cache });

      await permissions.invalidateUsers([3, 1, 3]);

      expect(cache.callsOf('delete').map(c => c.key)).toEqual(['user:perms:3', 'user:perms:1']);
    });

    it('should submit deletes to the cache pool', async () => {
      const cache = new RecordingCache();
      const executor = new ManualExecutor();
      const permissions = new PermissionCache(store, { cache, executor });

      await permissions.invalidateUser(1);
      expect(cache.callsOf('delete')).toHaveLength(0);

      await executor.runAll();
      expect(cache.callsOf('delete')).toEqual([{ op: 'delete', key: 'user:perms:1' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // BACKENDS
  // ═══════════════════════════════════════════════════════════════════

  describe('backends', () => {
    it('should go to the store every time without a cache', async () => {
      const permissions = new PermissionCache(store);

      await permissions.checkPermission(ctx, 1, 'posts', 'write');
      await permissions.checkPermission(ctx, 1, 'posts', 'write');

      expect(store.callCount('getUserPermissions')).toBe(2);
      expect(await permissions.readCached(1)).toBeNull();
      await expect(permissions.invalidateUser(1)).resolves.toBeUndefined();
    });

    it('should use a swapped-in cache for later checks', async () => {
      const first = new MemoryCache();
      const second = new MemoryCache();
      const permissions = new PermissionCache(store, { cache: first });
      await permissions.checkPermission(ctx, 1, 'posts', 'write');

      permissions.setCache(second);
      await permissions.checkPermission(ctx, 1, 'posts', 'write');

      expect(store.callCount('getUserPermissions')).toBe(2);
      expect(await second.get('user:perms:1')).toBe('["posts:write","users:read"]');
    });

    it('should read back the cached set', async () => {
      const permissions = new PermissionCache(store, { cache: new MemoryCache() });
      await permissions.checkPermission(ctx, 1, 'posts', 'write');

      expect(await permissions.readCached(1)).toEqual(['posts:write', 'users:read']);
      expect(await permissions.readCached(2)).toBeNull();
    });
  });
});
