/**
 * @fileoverview Minimal async resource pool
 *
 * Hands out up to `max` resources (database connections in practice),
 * validates each one before use and replaces resources that fail
 * validation or fail with a connection-level error.
 *
 * @module storage/resource-pool
 * @license MIT
 */

export interface ResourcePoolOptions<T> {
  create: () => T | Promise<T>;
  destroy: (resource: T) => void | Promise<void>;
  /** Checked before every use; a false result replaces the resource. */
  validate?: (resource: T) => boolean;
  /** Errors for which the resource itself is considered broken. */
  isConnectionError?: (error: unknown) => boolean;
  max?: number;
}

type Waiter<T> = (resource: T) => void;

/**
 * @example
 * const pool = new ResourcePool({
 *   create: () => openDatabase(path),
 *   destroy: (db) => db.close(),
 *   validate: pingDatabase,
 * });
 * const count = await pool.use((db) => db.prepare('SELECT COUNT(*) AS n FROM t').get());
 */
export class ResourcePool<T> {
  private readonly idle: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private total = 0;
  private closed = false;
  private readonly max: number;

  constructor(private readonly options: ResourcePoolOptions<T>) {
    this.max = Math.max(1, options.max ?? 1);
  }

  /** Resources currently alive (idle or in use). */
  get size(): number {
    return this.total;
  }

  /**
   * Run `fn` with a pooled resource.
   */
  async use<R>(fn: (resource: T) => R | Promise<R>): Promise<R> {
    let resource = await this.acquire();
    if (this.options.validate && !this.options.validate(resource)) {
      await this.destroyResource(resource);
      resource = await this.createResource();
    }

    let result: R;
    try {
      result = await fn(resource);
    } catch (error) {
      if (this.options.isConnectionError?.(error)) {
        await this.discard(resource);
      } else {
        await this.release(resource);
      }
      throw error;
    }
    await this.release(resource);
    return result;
  }

  /**
   * Destroy idle resources and refuse further use. Resources in use are
   * destroyed when they are returned.
   */
  async drain(): Promise<void> {
    this.closed = true;
    const idle = this.idle.splice(0);
    for (const resource of idle) {
      await this.discard(resource);
    }
  }

  private async acquire(): Promise<T> {
    if (this.closed) {
      throw new Error('Resource pool is closed');
    }
    const resource = this.idle.pop();
    if (resource !== undefined) {
      return resource;
    }
    if (this.total < this.max) {
      return this.createResource();
    }
    return new Promise<T>((resolve) => this.waiters.push(resolve));
  }

  private async createResource(): Promise<T> {
    this.total++;
    try {
      return await this.options.create();
    } catch (error) {
      this.total--;
      throw error;
    }
  }

  private async release(resource: T): Promise<void> {
    if (this.closed) {
      await this.discard(resource);
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(resource);
    } else {
      this.idle.push(resource);
    }
  }

  private async destroyResource(resource: T): Promise<void> {
    this.total--;
    await this.options.destroy(resource);
  }

  private async discard(resource: T): Promise<void> {
    await this.destroyResource(resource);
    // A waiter blocked on the limit gets a fresh resource.
    const waiter = this.waiters.shift();
    if (waiter && !this.closed) {
      try {
        waiter(await this.createResource());
      } catch (error) {
        this.waiters.unshift(waiter);
        throw error;
      }
    }
  }
}
