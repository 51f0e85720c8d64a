/**
 * Single-Flight Analysis Job Cache
 *
 * Deduplicates and caches expensive analysis computations keyed by a request
 * fingerprint. Concurrent callers for the same key share one execution;
 * completed results are served from memory until their TTL elapses, failures
 * are cached for a short independent window.
 *
 * The key→entry map is only mutated in synchronous sections; each entry
 * carries a single-resolution deferred that waiters await outside of them.
 *
 * @module @carelens/core/orchestration/job-cache-manager
 */

import {
  AppError,
  ComputeFailedError,
  JobTimeoutError,
  KeyInvalidatedError,
  ValidationError,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { createOrchestrationMetrics, type OrchestrationMetrics } from '../observability/metrics.js';

const defaultLogger = createLogger({ name: 'job-cache-manager' });

export type JobState = 'pending' | 'running' | 'completed' | 'failed';

/**
 * Settled value of one execution: every caller that shared it receives the
 * same value or the same error instance
 */
export type JobOutcome<T> = { ok: true; value: T } | { ok: false; error: AppError };

export type ComputeFn<T> = () => T | Promise<T>;

/**
 * How a caller obtained its value
 * - cache: served from a completed entry
 * - joined: waited on an execution started by another caller
 * - computed: started the execution itself
 */
export type JobSource = 'cache' | 'joined' | 'computed';

export interface JobResolution<T> {
  key: string;
  value: T;
  source: JobSource;
}

export interface GetOrComputeOptions {
  /** Success TTL for this key; 0 deduplicates concurrent callers without caching */
  ttlSeconds?: number;
  /** How long this caller waits before giving up with JobTimeoutError */
  timeoutMs?: number;
  /** Discard a settled entry and compute again (joins an in-flight one) */
  forceRefresh?: boolean;
  /** Subject label used by invalidateSubject() and settlement listeners */
  subjectId?: string;
  /** Correlation ID of the initiating request */
  correlationId?: string;
}

/**
 * Reported to settlement listeners once per execution whose result was kept
 */
export interface JobSettlement<T> {
  key: string;
  subjectId: string | undefined;
  correlationId: string | undefined;
  outcome: JobOutcome<T>;
  durationMs: number;
  /** False when the TTL was 0 and the result was handed out without caching */
  cached: boolean;
}

export type SettlementListener<T> = (settlement: JobSettlement<T>) => void;

/**
 * Read-only view of an entry
 */
export interface JobSnapshot {
  key: string;
  state: JobState;
  createdAt: number;
  expiresAt: number | null;
  waiterCount: number;
  subjectId: string | null;
}

export interface JobCacheStats {
  size: number;
  entries: Record<JobState, number>;
  hits: number;
  misses: number;
  joins: number;
  negativeHits: number;
  negativeEvictions: number;
  expirations: number;
  evictions: number;
  invalidations: number;
  computeSuccesses: number;
  computeFailures: number;
  timeouts: number;
  hitRate: number;
}

export interface JobCacheManagerConfig {
  /** Default success TTL in seconds (default: 300) */
  ttlSeconds?: number;
  /** Failure-cache window in seconds (default: 5) */
  negativeTtlSeconds?: number;
  /** Entry limit before oldest settled entries are evicted (default: 10000) */
  maxEntries?: number;
  /** Default caller wait deadline in ms; 0 waits until settled (default: 0) */
  defaultTimeoutMs?: number;
  logger?: Logger;
  metrics?: OrchestrationMetrics;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

interface Deferred<T> {
  readonly promise: Promise<T>;
  /** First call wins; later calls are ignored */
  resolve(value: T): void;
}

function createDeferred<T>(): Deferred<T> {
  let resolvePromise: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    resolvePromise = resolve;
  });
  let resolved = false;

  return {
    promise,
    resolve(value: T) {
      if (resolved) return;
      resolved = true;
      resolvePromise(value);
    },
  };
}

interface JobEntry<T> {
  readonly key: string;
  state: JobState;
  readonly createdAt: number;
  readonly ttlSeconds: number;
  readonly subjectId: string | undefined;
  readonly correlationId: string | undefined;
  waiterCount: number;
  settlement: { outcome: JobOutcome<T>; expiresAt: number } | null;
  readonly done: Deferred<JobOutcome<T>>;
}

const emptyStats = () => ({
  hits: 0,
  misses: 0,
  joins: 0,
  negativeHits: 0,
  negativeEvictions: 0,
  expirations: 0,
  evictions: 0,
  invalidations: 0,
  computeSuccesses: 0,
  computeFailures: 0,
  timeouts: 0,
});

/**
 * Single-flight TTL cache for analysis results
 *
 * @example
 * ```typescript
 * const cache = new JobCacheManager<PatientAnalysis>({ ttlSeconds: 300 });
 *
 * const analysis = await cache.getOrCompute(
 *   fingerprintAnalysis(request),
 *   () => analyzer.analyze(request),
 *   { subjectId: request.patientId, timeoutMs: 30_000 }
 * );
 * ```
 */
export class JobCacheManager<T> {
  private readonly entries = new Map<string, JobEntry<T>>();
  private readonly listeners = new Set<SettlementListener<T>>();
  private readonly ttlSeconds: number;
  private readonly negativeTtlSeconds: number;
  private readonly maxEntries: number;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics: OrchestrationMetrics;
  private readonly now: () => number;
  private counters = emptyStats();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly removeCollector: () => void;

  constructor(config: JobCacheManagerConfig = {}) {
    this.ttlSeconds = config.ttlSeconds ?? 300;
    this.negativeTtlSeconds = config.negativeTtlSeconds ?? 5;
    this.maxEntries = config.maxEntries ?? 10000;
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 0;
    this.logger = config.logger ?? defaultLogger;
    this.metrics = config.metrics ?? createOrchestrationMetrics();
    this.now = config.now ?? Date.now;

    assertNonNegative('ttlSeconds', this.ttlSeconds);
    assertNonNegative('negativeTtlSeconds', this.negativeTtlSeconds);
    assertNonNegative('defaultTimeoutMs', this.defaultTimeoutMs);
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new ValidationError('maxEntries must be a positive integer');
    }

    this.removeCollector = this.metrics.registry.addCollector(() => this.updateEntryGauge());

    this.logger.debug(
      {
        ttlSeconds: this.ttlSeconds,
        negativeTtlSeconds: this.negativeTtlSeconds,
        maxEntries: this.maxEntries,
      },
      'Job cache initialized'
    );
  }

  /**
   * Return the cached value for `key`, join the in-flight computation, or
   * start one with `computeFn`.
   *
   * Rejects with ComputeFailedError, JobTimeoutError or KeyInvalidatedError.
   */
  async getOrCompute(
    key: string,
    computeFn: ComputeFn<T>,
    options: GetOrComputeOptions = {}
  ): Promise<T> {
    const resolution = await this.resolve(key, computeFn, options);
    return resolution.value;
  }

  /**
   * Same as getOrCompute(), also reporting where the value came from
   */
  async resolve(
    key: string,
    computeFn: ComputeFn<T>,
    options: GetOrComputeOptions = {}
  ): Promise<JobResolution<T>> {
    assertKey(key);
    const ttlSeconds = options.ttlSeconds ?? this.ttlSeconds;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    assertNonNegative('ttlSeconds', ttlSeconds);
    assertNonNegative('timeoutMs', timeoutMs);

    let entry = this.lookup(key);

    if (entry?.settlement && options.forceRefresh) {
      this.entries.delete(key);
      entry = undefined;
    }

    if (entry?.settlement) {
      const { outcome } = entry.settlement;
      if (outcome.ok) {
        this.counters.hits++;
        this.metrics.cacheLookups.inc({ outcome: 'hit' });
        return { key, value: outcome.value, source: 'cache' };
      }
      this.counters.negativeHits++;
      this.metrics.cacheLookups.inc({ outcome: 'negative_hit' });
      throw outcome.error;
    }

    if (entry) {
      this.counters.joins++;
      this.metrics.cacheLookups.inc({ outcome: 'join' });
      const outcome = await this.wait(entry, timeoutMs);
      return unwrap(key, outcome, 'joined');
    }

    this.counters.misses++;
    this.metrics.cacheLookups.inc({ outcome: 'miss' });
    const started = this.start(key, computeFn, ttlSeconds, options);
    const outcome = await this.wait(started, timeoutMs);
    return unwrap(key, outcome, 'computed');
  }

  /**
   * Start a fresh computation unless one is already in flight.
   * Nobody waits on it; later callers join it or read its result.
   *
   * @returns false when a computation for the key was already running
   */
  refreshInBackground(
    key: string,
    computeFn: ComputeFn<T>,
    options: Omit<GetOrComputeOptions, 'timeoutMs' | 'forceRefresh'> = {}
  ): boolean {
    assertKey(key);
    const ttlSeconds = options.ttlSeconds ?? this.ttlSeconds;
    assertNonNegative('ttlSeconds', ttlSeconds);

    const existing = this.entries.get(key);
    if (existing && !existing.settlement) {
      return false;
    }
    if (existing) {
      this.entries.delete(key);
    }

    this.start(key, computeFn, ttlSeconds, options);
    this.logger.debug({ key }, 'Background refresh started');
    return true;
  }

  /**
   * Remove the entry for `key` regardless of state.
   *
   * Callers waiting on an in-flight computation are released with
   * KeyInvalidatedError; the computation runs to completion and its result
   * is discarded.
   */
  invalidate(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }

    this.entries.delete(key);
    this.counters.invalidations++;
    this.metrics.cacheRemovals.inc({ reason: 'invalidated' });

    if (!entry.settlement) {
      entry.done.resolve({ ok: false, error: new KeyInvalidatedError(key) });
    }

    this.logger.debug({ key, state: entry.state }, 'Job cache entry invalidated');
    return true;
  }

  /**
   * Invalidate every entry labelled with `subjectId`
   */
  invalidateSubject(subjectId: string): number {
    const keys = Array.from(this.entries.values())
      .filter((entry) => entry.subjectId === subjectId)
      .map((entry) => entry.key);

    for (const key of keys) {
      this.invalidate(key);
    }
    return keys.length;
  }

  /**
   * Invalidate all keys
   *
   * @returns number of entries invalidated
   */
  clear(): number {
    const keys = Array.from(this.entries.keys());
    for (const key of keys) {
      this.invalidate(key);
    }
    if (keys.length > 0) {
      this.logger.info({ cleared: keys.length }, 'Job cache cleared');
    }
    return keys.length;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  peek(key: string): JobSnapshot | undefined {
    const entry = this.lookup(key);
    if (!entry) {
      return undefined;
    }
    return {
      key: entry.key,
      state: entry.state,
      createdAt: entry.createdAt,
      expiresAt: entry.settlement?.expiresAt ?? null,
      waiterCount: entry.waiterCount,
      subjectId: entry.subjectId ?? null,
    };
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Listen for settled computations (one call per execution, not per caller).
   *
   * @returns unsubscribe function
   */
  onSettled(listener: SettlementListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  stats(): JobCacheStats {
    const entries: Record<JobState, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const entry of this.entries.values()) {
      entries[entry.state]++;
    }
    const lookups = this.counters.hits + this.counters.misses;

    return {
      size: this.entries.size,
      entries,
      ...this.counters,
      hitRate: lookups > 0 ? this.counters.hits / lookups : 0,
    };
  }

  resetStats(): void {
    this.counters = emptyStats();
  }

  /**
   * Remove expired entries that were never looked up again
   *
   * @returns number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const entry of this.entries.values()) {
      if (entry.settlement && now >= entry.settlement.expiresAt) {
        this.removeExpired(entry);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug({ removed }, 'Expired job cache entries swept');
    }
    return removed;
  }

  startSweeper(intervalMs: number): void {
    if (intervalMs <= 0) {
      throw new ValidationError('Sweep interval must be positive');
    }
    this.stopSweeper();
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Stop the sweeper and drop every entry
   */
  dispose(): void {
    this.stopSweeper();
    this.clear();
    this.listeners.clear();
    this.removeCollector();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Fetch an entry, removing it first if its settlement has expired
   */
  private lookup(key: string): JobEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry?.settlement) {
      return entry;
    }
    if (this.now() < entry.settlement.expiresAt) {
      return entry;
    }
    this.removeExpired(entry);
    return undefined;
  }

  private removeExpired(entry: JobEntry<T>): void {
    this.entries.delete(entry.key);
    if (entry.state === 'failed') {
      this.counters.negativeEvictions++;
    } else {
      this.counters.expirations++;
    }
    this.metrics.cacheRemovals.inc({ reason: 'expired' });
  }

  private start(
    key: string,
    computeFn: ComputeFn<T>,
    ttlSeconds: number,
    options: Pick<GetOrComputeOptions, 'subjectId' | 'correlationId'>
  ): JobEntry<T> {
    this.ensureCapacity();

    const entry: JobEntry<T> = {
      key,
      state: 'pending',
      createdAt: this.now(),
      ttlSeconds,
      subjectId: options.subjectId,
      correlationId: options.correlationId,
      waiterCount: 0,
      settlement: null,
      done: createDeferred<JobOutcome<T>>(),
    };
    this.entries.set(key, entry);

    this.execute(entry, computeFn).catch((error: unknown) => {
      this.logger.fatal({ err: error, key }, 'Job settlement failed');
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
      entry.done.resolve({ ok: false, error: new ComputeFailedError(key) });
    });

    return entry;
  }

  private async execute(entry: JobEntry<T>, computeFn: ComputeFn<T>): Promise<void> {
    entry.state = 'running';
    const startedAt = this.now();
    const stopTimer = this.metrics.computeDuration.startTimer();

    let outcome: JobOutcome<T>;
    try {
      const value = await computeFn();
      outcome = { ok: true, value };
      this.counters.computeSuccesses++;
    } catch (error) {
      this.counters.computeFailures++;
      // Only the initiating execution sees the raw cause
      this.logger.warn({ err: error, key: entry.key }, 'Analysis computation failed');
      outcome = { ok: false, error: ComputeFailedError.fromCause(entry.key, error) };
    }

    stopTimer({ outcome: outcome.ok ? 'success' : 'failure' });
    this.settle(entry, outcome, this.now() - startedAt);
  }

  private settle(entry: JobEntry<T>, outcome: JobOutcome<T>, durationMs: number): void {
    if (this.entries.get(entry.key) !== entry) {
      this.logger.debug({ key: entry.key }, 'Discarding result of invalidated computation');
      return;
    }

    entry.state = outcome.ok ? 'completed' : 'failed';
    const ttlSeconds = outcome.ok ? entry.ttlSeconds : this.negativeTtlSeconds;
    const cached = ttlSeconds > 0;

    if (cached) {
      entry.settlement = { outcome, expiresAt: this.now() + ttlSeconds * 1000 };
    } else {
      this.entries.delete(entry.key);
    }

    entry.done.resolve(outcome);
    this.notify({
      key: entry.key,
      subjectId: entry.subjectId,
      correlationId: entry.correlationId,
      outcome,
      durationMs,
      cached,
    });
  }

  private notify(settlement: JobSettlement<T>): void {
    for (const listener of this.listeners) {
      try {
        listener(settlement);
      } catch (error) {
        this.logger.warn({ err: error, key: settlement.key }, 'Settlement listener threw');
      }
    }
  }

  private async wait(entry: JobEntry<T>, timeoutMs: number): Promise<JobOutcome<T>> {
    entry.waiterCount++;
    try {
      if (timeoutMs <= 0) {
        return await entry.done.promise;
      }

      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<JobOutcome<T>>((resolve) => {
        timer = setTimeout(() => {
          this.counters.timeouts++;
          this.metrics.waitTimeouts.inc();
          this.logger.debug({ key: entry.key, timeoutMs }, 'Caller stopped waiting for analysis');
          resolve({ ok: false, error: new JobTimeoutError(entry.key, timeoutMs) });
        }, timeoutMs);
      });

      try {
        return await Promise.race([entry.done.promise, deadline]);
      } finally {
        clearTimeout(timer);
      }
    } finally {
      entry.waiterCount--;
    }
  }

  /**
   * Make room for one more entry: purge expired entries, then evict the
   * oldest settled ones. In-flight entries are never evicted.
   */
  private ensureCapacity(): void {
    if (this.entries.size < this.maxEntries) {
      return;
    }

    this.sweep();

    for (const entry of this.entries.values()) {
      if (this.entries.size < this.maxEntries) {
        break;
      }
      if (entry.settlement) {
        this.entries.delete(entry.key);
        this.counters.evictions++;
        this.metrics.cacheRemovals.inc({ reason: 'evicted' });
      }
    }

    if (this.entries.size >= this.maxEntries) {
      this.logger.warn(
        { size: this.entries.size, maxEntries: this.maxEntries },
        'Job cache over capacity with only in-flight entries'
      );
    }
  }

  private updateEntryGauge(): void {
    const { entries } = this.stats();
    for (const [state, count] of Object.entries(entries)) {
      this.metrics.cacheEntries.set(count, { state });
    }
  }
}

function unwrap<T>(key: string, outcome: JobOutcome<T>, source: JobSource): JobResolution<T> {
  if (!outcome.ok) {
    throw outcome.error;
  }
  return { key, value: outcome.value, source };
}

function assertKey(key: string): void {
  if (typeof key !== 'string' || key.length === 0) {
    throw new ValidationError('Cache key must be a non-empty string');
  }
}

function assertNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number`, { [name]: value });
  }
}
