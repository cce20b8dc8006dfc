/**
 * Task Executor
 *
 * In-process bounded task pools, addressed by name. Work submitted here runs
 * detached from the submitter: `execute` returns before the task starts and
 * task failures are logged, never rethrown.
 *
 * @example
 * ```typescript
 * const executor = new TaskExecutor({ cache: { concurrency: 4, maxQueue: 1000 } });
 * executor.execute('cache', () => cache.delete('user:perms:42'));
 * await executor.shutdown();
 * ```
 */

import { createChildLogger, type Logger } from './logger.js';
import { getErrorMessage } from './errors.js';

export type Task = () => Promise<unknown> | unknown;

/**
 * Anything that can take background work for a named pool.
 * Implementations throw `TaskRejectedError` when the work cannot be accepted.
 */
export interface Executor {
  execute(pool: string, task: Task): void;
}

export type RejectionReason = 'unknown-pool' | 'queue-full' | 'shutdown';

export class TaskRejectedError extends Error {
  constructor(
    readonly pool: string,
    readonly reason: RejectionReason,
  ) {
    super(`Task rejected by pool "${pool}": ${reason}`);
    this.name = 'TaskRejectedError';
  }
}

// ═══════════════════════════════════════════════════════════════════
// Pools
// ═══════════════════════════════════════════════════════════════════

export interface PoolOptions {
  /** Tasks running at once */
  concurrency: number;
  /** Tasks waiting for a slot; submissions beyond this are rejected */
  maxQueue: number;
}

export interface PoolStats {
  pool: string;
  active: number;
  queued: number;
  completed: number;
  failed: number;
  rejected: number;
}

interface Pool {
  name: string;
  options: PoolOptions;
  queue: Task[];
  active: number;
  completed: number;
  failed: number;
  rejected: number;
  idleWaiters: Array<() => void>;
}

// ═══════════════════════════════════════════════════════════════════
// Executor
// ═══════════════════════════════════════════════════════════════════

export class TaskExecutor implements Executor {
  private readonly pools = new Map<string, Pool>();
  private closed = false;

  constructor(
    pools: Record<string, PoolOptions>,
    private readonly log: Logger = createChildLogger({ metadata: { component: 'executor' } }),
  ) {
    for (const [name, options] of Object.entries(pools)) {
      if (options.concurrency < 1) {
        throw new Error(`Pool "${name}" needs a concurrency of at least 1`);
      }
      this.pools.set(name, {
        name,
        options,
        queue: [],
        active: 0,
        completed: 0,
        failed: 0,
        rejected: 0,
        idleWaiters: [],
      });
    }
  }

  execute(poolName: string, task: Task): void {
    const pool = this.pools.get(poolName);
    if (!pool) {
      throw new TaskRejectedError(poolName, 'unknown-pool');
    }
    if (this.closed) {
      pool.rejected++;
      throw new TaskRejectedError(poolName, 'shutdown');
    }
    if (pool.active >= pool.options.concurrency && pool.queue.length >= pool.options.maxQueue) {
      pool.rejected++;
      throw new TaskRejectedError(poolName, 'queue-full');
    }

    pool.queue.push(task);
    this.drain(pool);
  }

  /**
   * Resolves once the pool (or every pool) has nothing queued or running
   */
  async onIdle(poolName?: string): Promise<void> {
    if (poolName !== undefined) {
      const pool = this.pools.get(poolName);
      if (pool) await this.waitIdle(pool);
      return;
    }
    await Promise.all([...this.pools.values()].map(pool => this.waitIdle(pool)));
  }

  /**
   * Stop accepting work and wait for what was accepted
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.onIdle();
    this.log.debug('Executor shut down');
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  stats(poolName: string): PoolStats | null {
    const pool = this.pools.get(poolName);
    if (!pool) return null;
    return {
      pool: pool.name,
      active: pool.active,
      queued: pool.queue.length,
      completed: pool.completed,
      failed: pool.failed,
      rejected: pool.rejected,
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private drain(pool: Pool): void {
    while (pool.active < pool.options.concurrency) {
      const task = pool.queue.shift();
      if (!task) break;
      this.start(pool, task);
    }

    if (pool.active === 0 && pool.queue.length === 0) {
      const waiters = pool.idleWaiters.splice(0);
      for (const resolve of waiters) resolve();
    }
  }

  private start(pool: Pool, task: Task): void {
    pool.active++;
    void Promise.resolve()
      .then(task)
      .then(
        () => {
          pool.completed++;
        },
        (error: unknown) => {
          pool.failed++;
          this.log.warn('Background task failed', { pool: pool.name, error: getErrorMessage(error) });
        },
      )
      .finally(() => {
        pool.active--;
        this.drain(pool);
      });
  }

  private waitIdle(pool: Pool): Promise<void> {
    if (pool.active === 0 && pool.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      pool.idleWaiters.push(resolve);
    });
  }
}
