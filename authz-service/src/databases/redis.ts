/**
 * Redis Client - connection with reconnect strategy
 */

import { createClient } from 'redis';
import { logger } from '../common/logger.js';
import { getErrorMessage } from '../common/errors.js';

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface RedisConfig {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Enable auto-reconnect (default: true) */
  autoReconnect?: boolean;
  /** Max reconnect retries (default: 10) */
  maxReconnectRetries?: number;
  /** Reconnect delay in ms (default: 1000) */
  reconnectDelay?: number;
}

const DEFAULT_CONFIG: Omit<Required<RedisConfig>, 'url'> = {
  connectTimeout: 5000,
  autoReconnect: true,
  maxReconnectRetries: 10,
  reconnectDelay: 1000,
};

export function maskUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

export async function connectRedis(urlOrConfig: string | RedisConfig): Promise<RedisClient> {
  if (client) return client;

  const config: RedisConfig = typeof urlOrConfig === 'string' ? { url: urlOrConfig } : urlOrConfig;
  const cfg = { ...DEFAULT_CONFIG, ...config };

  const redis = createClient({
    url: cfg.url,
    socket: {
      connectTimeout: cfg.connectTimeout,
      reconnectStrategy: cfg.autoReconnect
        ? (retries: number) => {
            if (retries > cfg.maxReconnectRetries) {
              logger.error('Redis max reconnect attempts reached');
              return new Error('Max reconnect attempts reached');
            }
            return cfg.reconnectDelay;
          }
        : false,
    },
  });

  redis.on('error', (err: unknown) => logger.error('Redis error', { error: getErrorMessage(err) }));
  redis.on('reconnecting', () => logger.warn('Redis reconnecting...'));
  redis.on('ready', () => logger.debug('Redis ready'));

  try {
    await redis.connect();
    logger.info('Connected to Redis', { url: maskUrl(cfg.url) });
  } catch (error) {
    logger.error('Failed to connect to Redis', { error: getErrorMessage(error), url: maskUrl(cfg.url) });
    throw error;
  }

  client = redis;
  return redis;
}

export function getRedis(): RedisClient | null {
  return client;
}

// ═══════════════════════════════════════════════════════════════════
// Cleanup
// ═══════════════════════════════════════════════════════════════════

export async function closeRedis(): Promise<void> {
  if (client) {
    const redis = client;
    client = null;
    await redis.quit();
    logger.info('Redis disconnected');
  }
}
