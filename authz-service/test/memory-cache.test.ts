/**
 * Memory Cache - Test Suite
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryCache } from '../src/databases/memory-cache.js';

describe('MemoryCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return stored values until they expire', async () => {
    const cache = new MemoryCache();
    await cache.set('user:perms:1', '["posts:write"]', 60);

    vi.advanceTimersByTime(59_999);
    expect(await cache.get('user:perms:1')).toBe('["posts:write"]');

    vi.advanceTimersByTime(1);
    expect(await cache.get('user:perms:1')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('should return null for unknown keys', async () => {
    expect(await new MemoryCache().get('user:perms:1')).toBeNull();
  });

  it('should evict the oldest entry when full', async () => {
    const cache = new MemoryCache({ maxEntries: 2 });
    await cache.set('a', '1', 60);
    await cache.set('b', '2', 60);
    await cache.set('c', '3', 60);

    expect(cache.size).toBe(2);
    expect(await cache.get('a')).toBeNull();
    expect(await cache.get('c')).toBe('3');
  });

  it('should treat an overwrite as the newest entry', async () => {
    const cache = new MemoryCache({ maxEntries: 2 });
    await cache.set('a', '1', 60);
    await cache.set('b', '2', 60);
    await cache.set('a', '1b', 60);
    await cache.set('c', '3', 60);

    expect(await cache.get('a')).toBe('1b');
    expect(await cache.get('b')).toBeNull();
  });

  it('should delete and clear', async () => {
    const cache = new MemoryCache();
    await cache.set('a', '1', 60);
    await cache.set('b', '2', 60);

    await cache.delete('a');
    expect(await cache.get('a')).toBeNull();
    expect(cache.size).toBe(1);

    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('should sweep expired entries', async () => {
    const cache = new MemoryCache();
    await cache.set('short', '1', 10);
    await cache.set('long', '2', 100);

    vi.advanceTimersByTime(10_000);

    expect(cache.cleanupExpired()).toBe(1);
    expect(cache.size).toBe(1);
    expect(await cache.get('long')).toBe('2');
  });
});
