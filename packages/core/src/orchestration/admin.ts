/**
 * Administrative operations over a running orchestration container
 */

import type { RequestContext } from './analysis-orchestrator.js';
import type { BroadcastHubStats } from './broadcast-hub.js';
import type { OrchestrationContainer } from './container.js';
import type { JobCacheStats } from './job-cache-manager.js';

export interface AdminSurface {
  /** Invalidate every cached analysis; the actor is recorded in the audit trail */
  clearCache(context: RequestContext): Promise<{ cleared: number }>;
  cacheStats(): JobCacheStats;
  hubStats(): BroadcastHubStats;
  /** Prometheus text exposition */
  metrics(): string;
}

export function createAdminSurface<T>(container: OrchestrationContainer<T>): AdminSurface {
  return {
    async clearCache(context) {
      const cleared = await container.orchestrator.clearCache(context);
      return { cleared };
    },
    cacheStats: () => container.cache.stats(),
    hubStats: () => container.hub.stats(),
    metrics: () => container.metrics.registry.toPrometheusText(),
  };
}
