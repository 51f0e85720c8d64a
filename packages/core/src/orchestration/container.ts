/**
 * Orchestration Container
 *
 * Owns one job cache, one broadcast hub and one orchestrator for the life of
 * a process. Handlers receive the container by reference; nothing here is a
 * module-level singleton.
 */

import type { OrchestrationConfig, OrchestrationConfigInput } from '@carelens/types';
import { parseOrchestrationConfig } from '../env.js';
import { createLogger, type Logger } from '../logger.js';
import { createOrchestrationMetrics, type OrchestrationMetrics } from '../observability/metrics.js';
import {
  AnalysisOrchestrator,
  type AnalysisAuditSink,
  type AnalysisProvider,
} from './analysis-orchestrator.js';
import { BroadcastHub, type ShutdownReport } from './broadcast-hub.js';
import { JobCacheManager } from './job-cache-manager.js';

export type ContainerState = 'created' | 'started' | 'stopped';

export interface OrchestrationContainerOptions<T> {
  provider: AnalysisProvider<T>;
  /** Partial config; missing fields take the schema defaults */
  config?: OrchestrationConfigInput;
  audit?: AnalysisAuditSink;
  metrics?: OrchestrationMetrics;
  toEventPayload?: (result: T) => unknown;
  logger?: Logger;
}

export interface OrchestrationContainer<T> {
  readonly config: OrchestrationConfig;
  readonly cache: JobCacheManager<T>;
  readonly hub: BroadcastHub;
  readonly orchestrator: AnalysisOrchestrator<T>;
  readonly metrics: OrchestrationMetrics;
  readonly state: ContainerState;
  /** Start background maintenance */
  start(): void;
  /** Drain subscribers and release the cache; resolves with the hub's drain report */
  shutdown(): Promise<ShutdownReport>;
}

/**
 * Build and wire the orchestration services
 *
 * @example
 * ```typescript
 * const container = createOrchestrationContainer({
 *   provider: patientAnalyzer,
 *   config: loadOrchestrationConfig(),
 * });
 * container.start();
 * process.once('SIGTERM', () => void container.shutdown());
 * ```
 */
export function createOrchestrationContainer<T>(
  options: OrchestrationContainerOptions<T>
): OrchestrationContainer<T> {
  const config = parseOrchestrationConfig(options.config ?? {});
  const metrics = options.metrics ?? createOrchestrationMetrics();
  const logger = options.logger ?? createLogger({ name: 'orchestration' });

  const cache = new JobCacheManager<T>({
    ttlSeconds: config.ttlSeconds,
    negativeTtlSeconds: config.negativeTtlSeconds,
    maxEntries: config.maxCacheEntries,
    defaultTimeoutMs: config.waitTimeoutSeconds * 1000,
    logger: logger.child({ component: 'job-cache-manager' }),
    metrics,
  });

  const hub = new BroadcastHub({
    queueCapacity: config.subscriberQueueCapacity,
    drainGraceMs: config.drainGraceSeconds * 1000,
    maxSubscribers: config.maxSubscribers,
    logger: logger.child({ component: 'broadcast-hub' }),
    metrics,
  });

  const orchestrator = new AnalysisOrchestrator<T>({
    provider: options.provider,
    cache,
    hub,
    ...(options.audit && { audit: options.audit }),
    ...(options.toEventPayload && { toEventPayload: options.toEventPayload }),
    logger: logger.child({ component: 'analysis-orchestrator' }),
  });

  let state: ContainerState = 'created';
  let stopping: Promise<ShutdownReport> | null = null;

  const stop = async (): Promise<ShutdownReport> => {
    state = 'stopped';
    cache.stopSweeper();
    const report = await hub.shutdown();
    orchestrator.dispose();
    cache.dispose();
    logger.info({ ...report }, 'Orchestration container stopped');
    return report;
  };

  return {
    config,
    cache,
    hub,
    orchestrator,
    metrics,
    get state() {
      return state;
    },
    start() {
      if (state !== 'created') return;
      state = 'started';
      if (config.sweepIntervalSeconds > 0) {
        cache.startSweeper(config.sweepIntervalSeconds * 1000);
      }
      logger.info(
        {
          ttlSeconds: config.ttlSeconds,
          negativeTtlSeconds: config.negativeTtlSeconds,
          subscriberQueueCapacity: config.subscriberQueueCapacity,
        },
        'Orchestration container started'
      );
    },
    shutdown() {
      stopping ??= stop();
      return stopping;
    },
  };
}
