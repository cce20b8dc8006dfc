/**
 * Bootstrap - Test Suite
 */

import { describe, it, expect, vi, beforeAll, beforeEach } from 'vitest';
import { createAuthorization } from '../src/bootstrap.js';
import { loadConfig, ConfigValidationError } from '../src/config.js';
import { MemoryCache } from '../src/databases/memory-cache.js';
import { CACHE_POOL } from '../src/access/permission-cache.js';
import { configureLogger } from '../src/common/logger.js';
import { InMemoryEntityStore } from './helpers/memory-store.js';

const connections = vi.hoisted(() => ({
  connectDatabase: vi.fn(),
  closeDatabase: vi.fn(async () => {}),
  connectRedis: vi.fn(),
  closeRedis: vi.fn(async () => {}),
}));

vi.mock('../src/databases/mongodb.js', () => ({
  connectDatabase: connections.connectDatabase,
  closeDatabase: connections.closeDatabase,
}));

vi.mock('../src/databases/redis.js', () => ({
  connectRedis: connections.connectRedis,
  closeRedis: connections.closeRedis,
}));

function fakeDb(createIndex: () => Promise<string>) {
  return { collection: () => ({ createIndex }) };
}

describe('createAuthorization', () => {
  beforeAll(() => {
    configureLogger({ output: false });
  });

  it('should wire an in-process cache when no Redis URL is set', async () => {
    const config = await loadConfig({ env: { AUTHZ_CACHE_INVALIDATION: 'fan-out' } });
    const store = new InMemoryEntityStore();

    const authz = await createAuthorization(config, { store });

    expect(authz.store).toBe(store);
    expect(authz.cache).toBeInstanceOf(MemoryCache);
    expect(authz.service.invalidation).toBe('fan-out');
    expect(authz.executor.stats(CACHE_POOL)).toMatchObject({ active: 0, queued: 0 });

    const role = await authz.service.createRole({}, { name: 'editor' });
    const write = await authz.service.createPermission({}, { name: 'posts.write', resource: 'posts', action: 'write' });
    await authz.service.assignPermission({}, role.id, write.id);
    await authz.service.assignRole({}, 42, role.id);
    await authz.executor.onIdle();

    expect(await authz.service.checkPermission({}, 42, 'posts', 'write')).toBe(true);
    await authz.executor.onIdle();
    expect(await authz.cache.get('user:perms:42')).toBe('["posts:write"]');

    await authz.close();
    expect(authz.executor.isShutdown).toBe(true);
  });

  it('should require a MongoDB URI when no store is given', async () => {
    const config = await loadConfig({ env: {} });

    await expect(createAuthorization(config)).rejects.toBeInstanceOf(ConfigValidationError);
  });

  describe('startup failures', () => {
    const connected = { AUTHZ_MONGO_URI: 'mongodb://localhost:27017', AUTHZ_REDIS_URL: 'redis://localhost:6379' };

    beforeEach(() => {
      vi.clearAllMocks();
    });

    it('should close MongoDB when Redis cannot be reached', async () => {
      connections.connectDatabase.mockResolvedValue(fakeDb(async () => 'name_1'));
      connections.connectRedis.mockRejectedValue(new Error('redis refused'));

      await expect(createAuthorization(await loadConfig({ env: connected }))).rejects.toThrow('redis refused');

      expect(connections.closeDatabase).toHaveBeenCalledTimes(1);
      expect(connections.closeRedis).not.toHaveBeenCalled();
    });

    it('should close MongoDB when index creation fails', async () => {
      connections.connectDatabase.mockResolvedValue(fakeDb(async () => {
        throw new Error('index build failed');
      }));

      await expect(createAuthorization(await loadConfig({ env: connected }))).rejects.toThrow('index build failed');

      expect(connections.closeDatabase).toHaveBeenCalledTimes(1);
      expect(connections.connectRedis).not.toHaveBeenCalled();
    });
  });
});
