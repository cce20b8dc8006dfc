/**
 * Authorization bootstrap
 *
 * Wires the store, cache backend, executor and service from a loaded config.
 * MongoDB is connected unless a store is passed in; Redis is used when
 * `redis.url` is set, the in-process MemoryCache otherwise.
 *
 * @example
 * ```typescript
 * const authz = await createAuthorization(await loadConfig());
 * await authz.service.checkPermission({}, 42, 'posts', 'write');
 * await authz.close();
 * ```
 */

import { configureLogger, logger } from './common/logger.js';
import { TaskExecutor } from './common/executor.js';
import { getErrorMessage } from './common/errors.js';
import { ConfigValidationError, redactConfig, type AuthzConfig } from './config.js';
import type { Cache } from './databases/cache.js';
import { MemoryCache } from './databases/memory-cache.js';
import { RedisCache } from './databases/redis-cache.js';
import { closeRedis, connectRedis } from './databases/redis.js';
import { closeDatabase, connectDatabase } from './databases/mongodb.js';
import { AuthorizationService } from './access/authorization-service.js';
import { CACHE_POOL } from './access/permission-cache.js';
import { MongoEntityStore, type EntityStore } from './access/store.js';

export interface Authorization {
  service: AuthorizationService;
  store: EntityStore;
  cache: Cache;
  executor: TaskExecutor;
  /** Drain background work, then disconnect */
  close(): Promise<void>;
}

export interface AuthorizationDependencies {
  /** Use this store instead of connecting to MongoDB */
  store?: EntityStore;
}

export async function createAuthorization(
  config: AuthzConfig,
  dependencies: AuthorizationDependencies = {},
): Promise<Authorization> {
  configureLogger({ level: config.log.level, format: config.log.format });
  logger.info('Starting authorization service', { config: redactConfig(config) });

  const disconnect: Array<() => Promise<void>> = [];
  const closeAll = async (): Promise<void> => {
    for (const close of disconnect.reverse()) {
      await close();
    }
  };

  let store = dependencies.store;
  let cache: Cache;
  try {
    if (!store) {
      if (!config.mongo.uri) {
        throw new ConfigValidationError('mongo.uri is required when no store is provided');
      }
      const db = await connectDatabase({ uri: config.mongo.uri, dbName: config.mongo.dbName });
      disconnect.push(closeDatabase);

      const mongoStore = new MongoEntityStore(db);
      await mongoStore.initialize();
      store = mongoStore;
    }

    if (config.redis.url) {
      cache = new RedisCache(await connectRedis(config.redis.url));
      disconnect.push(closeRedis);
    } else {
      cache = new MemoryCache({ maxEntries: config.cache.maxEntries });
      logger.info('No Redis URL configured, using in-process permission cache');
    }
  } catch (error) {
    logger.error('Authorization startup failed', { error: getErrorMessage(error) });
    await closeAll();
    throw error;
  }

  const executor = new TaskExecutor({
    [CACHE_POOL]: { concurrency: config.executor.concurrency, maxQueue: config.executor.maxQueue },
  });

  const service = new AuthorizationService(store, {
    cache,
    executor,
    ttlSeconds: config.cache.ttlSeconds,
    invalidation: config.cache.invalidation,
  });

  return {
    service,
    store,
    cache,
    executor,
    async close() {
      await executor.shutdown();
      await closeAll();
    },
  };
}
