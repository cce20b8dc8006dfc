/**
 * Redis cache backend
 *
 * GET / SETEX / DEL over a connected node-redis client.
 */

import type { Cache } from './cache.js';

/**
 * The slice of a node-redis client this backend calls.
 * A connected `createClient()` result satisfies it.
 */
export interface RedisCommands {
  get(key: string): Promise<unknown>;
  setEx(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

export class RedisCache implements Cache {
  constructor(private readonly client: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    const value = await this.client.get(key);
    return typeof value === 'string' ? value : null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setEx(key, ttlSeconds, value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }
}
