/**
 * Authorization Service Configuration Defaults
 *
 * Every key read in loadConfig must exist here. Values are the lowest
 * priority source; a JSON file and then environment variables override them.
 */

export type ConfigSection = 'mongo' | 'redis' | 'cache' | 'executor' | 'log';

export interface ConfigDefault {
  value: Record<string, unknown>;
  description: string;
  /** Dotted paths masked by redactConfig */
  sensitivePaths?: string[];
}

export const AUTHZ_CONFIG_DEFAULTS: Record<ConfigSection, ConfigDefault> = {
  mongo: {
    value: { uri: '', dbName: 'authz' },
    sensitivePaths: ['mongo.uri'],
    description: 'MongoDB connection for the entity store',
  },
  redis: {
    value: { url: '' },
    sensitivePaths: ['redis.url'],
    description: 'Redis connection for the permission cache; empty uses the in-process cache',
  },
  cache: {
    value: {
      // Seconds a cached permission set is trusted
      ttlSeconds: 3600,
      // 'ttl-only' | 'fan-out'
      invalidation: 'ttl-only',
      // In-process cache only
      maxEntries: 10000,
    },
    description: 'Permission cache settings',
  },
  executor: {
    value: { concurrency: 4, maxQueue: 1000 },
    description: 'Background pool for cache populate/invalidate',
  },
  log: {
    value: { level: 'info', format: 'json' },
    description: 'Logger level and output format',
  },
};
