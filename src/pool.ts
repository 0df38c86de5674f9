/**
 * Bounded cache of live workers, one per kind, with strict LRU eviction.
 *
 * Two locks: `cacheLock` guards every cache mutation (insert, evict, promote)
 * and is held only briefly; `admission` is the single-flight lock under which
 * at most one worker is constructed and initialized at a time across all kinds.
 * Evicted workers leave the map inside the cache critical section. Capacity
 * evictions are torn down under `admission` before the replacement is built.
 */

import { randomUUID } from 'node:crypto';
import { getHeapStatistics } from 'node:v8';
import { E_TIMEOUT, Mutex, withTimeout as lockWithTimeout, type MutexInterface } from 'async-mutex';
import { AcquireTimeoutError, InitFailedError, NotRegisteredError, OperationTimeoutError, errorMessage } from './errors.js';
import { PeriodicTask } from './timeout.js';
import type { Worker, WorkerConfig, WorkerFactory, WorkerPerformance } from './worker.js';
import type { Clock, EventSink, PoolStats, WorkerKind, WorkerStatus } from './types.js';

export interface PoolConfig {
  maxActiveWorkers: number;
  idleTimeoutMs: number;
  /** Heap fraction above which idle workers are reclaimed before a load. */
  memoryThreshold: number;
  /** Heap fraction above which a health check reclaims idle workers. */
  criticalMemoryThreshold: number;
  cleanupIntervalMs: number;
  /** Upper bound on waiting for either lock. */
  acquireTimeoutMs: number;
}

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  maxActiveWorkers: 3,
  idleTimeoutMs: 300_000,
  memoryThreshold: 0.8,
  criticalMemoryThreshold: 0.9,
  cleanupIntervalMs: 60_000,
  acquireTimeoutMs: 600_000,
};

export interface PoolOptions {
  clock?: Clock;
  onEvent?: EventSink;
  /** Fraction of memory in use, 0..1. */
  memoryProbe?: () => number;
}

/** A worker pinned for the caller; teardown of an evicted worker waits for it. */
export interface Lease {
  worker: Worker;
  release(): void;
}

export interface WorkerInfo extends WorkerPerformance {
  id: string;
  kind: WorkerKind;
  status: WorkerStatus;
}

export type EvictionReason = 'lru' | 'idle' | 'memory' | 'error' | 'shutdown';

interface Registration {
  factory: WorkerFactory;
  config: WorkerConfig;
}

interface Eviction {
  worker: Worker;
  reason: EvictionReason;
}

type Lookup =
  | { kind: 'hit'; lease: Lease; teardown: Promise<void> }
  | { kind: 'wait'; pending: Promise<Lease>; teardown: Promise<void> }
  | { kind: 'load'; pending: Promise<Lease>; teardown: Promise<void> };

export function heapFraction(): number {
  const heap = getHeapStatistics();
  return heap.heap_size_limit > 0 ? heap.used_heap_size / heap.heap_size_limit : 0;
}

export function cacheKey(kind: WorkerKind): string {
  return `${kind}_instance`;
}

function boundedMutex(timeoutMs: number): MutexInterface {
  const mutex = new Mutex();
  return Number.isFinite(timeoutMs) && timeoutMs > 0 ? lockWithTimeout(mutex, timeoutMs) : mutex;
}

export class WorkerPool {
  readonly config: Readonly<PoolConfig>;
  private readonly registrations = new Map<WorkerKind, Registration>();
  /** Insertion order is recency: the first key is least recently used. */
  private readonly cache = new Map<string, Worker>();
  private readonly loading = new Map<WorkerKind, Promise<Lease>>();
  private readonly cacheLock: MutexInterface;
  private readonly admission: MutexInterface;
  private readonly clock: Clock;
  private readonly emit: EventSink;
  private readonly memoryProbe: () => number;
  private readonly maintenance: PeriodicTask;
  private requests = 0;
  private hits = 0;
  private loads = 0;
  private unloads = 0;

  constructor(config: Partial<PoolConfig> = {}, options: PoolOptions = {}) {
    this.config = Object.freeze({ ...DEFAULT_POOL_CONFIG, ...config });
    if (!Number.isInteger(this.config.maxActiveWorkers) || this.config.maxActiveWorkers < 1) {
      throw new RangeError(`maxActiveWorkers must be a positive integer, got ${this.config.maxActiveWorkers}`);
    }
    this.cacheLock = boundedMutex(this.config.acquireTimeoutMs);
    this.admission = boundedMutex(this.config.acquireTimeoutMs);
    this.clock = options.clock ?? Date.now;
    this.emit = options.onEvent ?? (() => {});
    this.memoryProbe = options.memoryProbe ?? heapFraction;
    this.maintenance = new PeriodicTask(
      'pool-maintenance',
      this.config.cleanupIntervalMs,
      async () => {
        await this.healthCheck();
        this.emit('pool:stats', this.stats());
      },
      (name, err) => this.emit('warn', { message: `${name} failed: ${errorMessage(err)}` }),
    );
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /** Re-registering a kind replaces its recipe; a cached instance stays until evicted. */
  register(kind: WorkerKind, factory: WorkerFactory, config: WorkerConfig): void {
    this.registrations.set(kind, { factory, config });
    this.emit('pool:register', { kind });
  }

  isRegistered(kind: WorkerKind): boolean {
    return this.registrations.has(kind);
  }

  // ==========================================================================
  // Acquisition
  // ==========================================================================

  /** Return the live worker for `kind`, loading it on a miss. */
  async acquire(kind: WorkerKind): Promise<Worker> {
    const lease = await this.lease(kind);
    lease.release();
    return lease.worker;
  }

  /** Acquire and keep the worker pinned while `fn` runs. */
  async use<T>(kind: WorkerKind, fn: (worker: Worker) => Promise<T>): Promise<T> {
    const lease = await this.lease(kind);
    try {
      return await fn(lease.worker);
    } finally {
      lease.release();
    }
  }

  async lease(kind: WorkerKind): Promise<Lease> {
    this.requests++;
    const registration = this.registrations.get(kind);
    if (!registration) throw new NotRegisteredError(kind);

    for (;;) {
      const step = await this.exclusive(() => this.lookup(kind, registration), kind);
      await step.teardown;
      if (step.kind === 'hit') return step.lease;
      if (step.kind === 'load') return step.pending;
      // Another caller is loading this kind. Once it lands, come back through
      // the cache so the hold is taken under the lock.
      await step.pending;
    }
  }

  private lookup(kind: WorkerKind, registration: Registration): Lookup {
    const key = cacheKey(kind);
    const cached = this.cache.get(key);

    if (cached && cached.status !== 'error') {
      this.cache.delete(key);
      this.cache.set(key, cached);
      this.hits++;
      this.emit('pool:hit', { kind, worker: cached.id });
      return { kind: 'hit', lease: this.leaseOf(cached), teardown: Promise.resolve() };
    }
    const broken = this.teardown(cached ? [this.detach(key, 'error')] : []);

    const inflight = this.loading.get(kind);
    if (inflight) return { kind: 'wait', pending: inflight, teardown: broken };

    const pending = this.admit(kind, registration, broken).finally(() => this.loading.delete(kind));
    this.loading.set(kind, pending);
    return { kind: 'load', pending, teardown: broken };
  }

  /**
   * Loads run one at a time under the admission lock. Room is made and the
   * evicted workers are torn down before the new one is constructed, so the
   * cache plus the single worker being loaded never exceed the bound.
   */
  private async admit(kind: WorkerKind, registration: Registration, evictions: Promise<void>): Promise<Lease> {
    await evictions;

    return this.guard(this.admission, kind, async () => {
      await this.teardown(await this.exclusive(() => this.makeRoom(kind), kind));

      const id = `${kind}-${randomUUID().slice(0, 8)}`;
      let worker: Worker;
      try {
        worker = registration.factory(id, kind, registration.config);
      } catch (err) {
        throw new InitFailedError(kind, errorMessage(err));
      }

      this.emit('pool:load', { kind, worker: id });
      const started = this.clock();
      if (!(await worker.initialize())) {
        await worker.release();
        this.emit('pool:load-failed', { kind, worker: id });
        throw new InitFailedError(kind, `worker ${id} did not become active`);
      }

      return this.exclusive(() => {
        this.cache.set(cacheKey(kind), worker);
        this.loads++;
        this.emit('pool:loaded', { kind, worker: id, duration: this.clock() - started });
        return this.leaseOf(worker);
      }, kind);
    });
  }

  /** Detach workers until one slot is free; idle ones go first under memory pressure. */
  private makeRoom(kind: WorkerKind): Eviction[] {
    const evicted: Eviction[] = [];
    const memory = this.memoryProbe();
    if (memory > this.config.memoryThreshold) {
      this.emit('warn', { message: `Memory at ${(memory * 100).toFixed(1)}%, reclaiming idle workers before loading ${kind}` });
      evicted.push(...this.detachIdle('memory'));
    }
    while (this.cache.size >= this.config.maxActiveWorkers) {
      const oldest = this.detachOldest('lru');
      if (!oldest) break;
      evicted.push(oldest);
    }
    return evicted;
  }

  private leaseOf(worker: Worker): Lease {
    return { worker, release: worker.retain() };
  }

  // ==========================================================================
  // Eviction
  // ==========================================================================

  /** Evict every idle worker, regardless of capacity. Returns how many went. */
  async reclaim(): Promise<number> {
    const idle = await this.exclusive(() => this.detachIdle('idle'));
    await this.teardown(idle);
    return idle.length;
  }

  /** Tear down every cached worker, waiting out loads still in flight. */
  async releaseAll(): Promise<void> {
    for (;;) {
      const all = await this.exclusive(() => [...this.cache.keys()].map((key) => this.detach(key, 'shutdown')));
      await this.teardown(all);
      const pending = [...this.loading.values()];
      if (pending.length === 0 && this.cache.size === 0) break;
      await Promise.allSettled(pending);
    }
    this.emit('pool:released', { unloads: this.unloads });
  }

  /**
   * Evict workers observed in error status and reclaim idle ones above the
   * critical memory mark. False only when the pool itself faulted.
   */
  async healthCheck(): Promise<boolean> {
    try {
      const broken = await this.exclusive(() =>
        [...this.cache.entries()].filter(([, w]) => w.status === 'error').map(([key]) => this.detach(key, 'error')),
      );
      await this.teardown(broken);

      const memory = this.memoryProbe();
      if (memory > this.config.criticalMemoryThreshold) {
        this.emit('warn', { message: `Memory at ${(memory * 100).toFixed(1)}%, above critical threshold` });
        await this.reclaim();
      }
      return true;
    } catch (err) {
      this.emit('warn', { message: `Pool health check failed: ${errorMessage(err)}` });
      return false;
    }
  }

  private detach(key: string, reason: EvictionReason): Eviction {
    const worker = this.cache.get(key);
    this.cache.delete(key);
    if (!worker) throw new Error(`No cached worker under ${key}`);
    this.unloads++;
    this.emit('pool:evict', { kind: worker.kind, worker: worker.id, reason });
    return { worker, reason };
  }

  private detachOldest(reason: EvictionReason): Eviction | undefined {
    const oldest = this.cache.keys().next();
    return oldest.done ? undefined : this.detach(oldest.value, reason);
  }

  private detachIdle(reason: EvictionReason): Eviction[] {
    const now = this.clock();
    return [...this.cache.entries()]
      .filter(([, w]) => w.isIdle(this.config.idleTimeoutMs, now))
      .map(([key]) => this.detach(key, reason));
  }

  private async teardown(evicted: Eviction[]): Promise<void> {
    for (const { worker, reason } of evicted) {
      const ok = await worker.release();
      if (!ok) this.emit('warn', { message: `Worker ${worker.id} did not clean up after ${reason} eviction` });
    }
  }

  // ==========================================================================
  // Locks
  // ==========================================================================

  private exclusive<T>(fn: () => T | Promise<T>, kind?: WorkerKind): Promise<T> {
    return this.guard(this.cacheLock, kind, fn);
  }

  private async guard<T>(lock: MutexInterface, kind: WorkerKind | undefined, fn: () => T | Promise<T>): Promise<T> {
    try {
      return await lock.runExclusive(fn);
    } catch (err) {
      if (err !== E_TIMEOUT) throw err;
      throw kind
        ? new AcquireTimeoutError(kind, this.config.acquireTimeoutMs)
        : new OperationTimeoutError('pool lock', this.config.acquireTimeoutMs);
    }
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  start(): void {
    this.maintenance.start();
  }

  stop(): Promise<void> {
    return this.maintenance.stop();
  }

  get isRunning(): boolean {
    return this.maintenance.isRunning;
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  has(kind: WorkerKind): boolean {
    return this.cache.has(cacheKey(kind));
  }

  get size(): number {
    return this.cache.size;
  }

  /** Cached workers, least recently used first. */
  listWorkers(): WorkerInfo[] {
    return [...this.cache.values()].map((w) => ({
      ...w.performance(),
      id: w.id,
      kind: w.kind,
      status: w.status,
    }));
  }

  stats(): PoolStats {
    return {
      registeredCount: this.registrations.size,
      activeCount: this.cache.size,
      loadingCount: this.loading.size,
      memoryFraction: this.memoryProbe(),
      cacheHitRate: this.requests > 0 ? this.hits / this.requests : 0,
      requests: this.requests,
      hits: this.hits,
      loads: this.loads,
      unloads: this.unloads,
    };
  }
}
