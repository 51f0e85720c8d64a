/**
 * Orchestration Configuration Schema
 *
 * @module @carelens/types/schemas/orchestration
 */
import { z } from 'zod';

export const OrchestrationConfigSchema = z.object({
  /** Success-cache lifetime in seconds (0 = deduplicate only, never cache) */
  ttlSeconds: z.number().min(0).max(86400).default(300),
  /** Failure-cache lifetime in seconds, independent of the success TTL */
  negativeTtlSeconds: z.number().min(0).max(3600).default(5),
  /** Bounded outbound queue size per subscriber */
  subscriberQueueCapacity: z.number().int().min(1).max(65536).default(256),
  /** Shutdown flush deadline in seconds */
  drainGraceSeconds: z.number().min(0).max(300).default(5),
  /** Expired-entry sweep interval in seconds (0 disables the sweeper) */
  sweepIntervalSeconds: z.number().min(0).max(86400).default(60),
  /** Maximum cache entries before oldest settled entries are evicted */
  maxCacheEntries: z.number().int().min(1).max(1_000_000).default(10000),
  /** Maximum concurrently registered subscribers */
  maxSubscribers: z.number().int().min(1).max(100_000).default(1000),
  /** Default caller wait deadline in seconds (0 = wait until the computation settles) */
  waitTimeoutSeconds: z.number().min(0).max(3600).default(0),
});

export type OrchestrationConfig = z.infer<typeof OrchestrationConfigSchema>;
export type OrchestrationConfigInput = z.input<typeof OrchestrationConfigSchema>;

export const DEFAULT_ORCHESTRATION_CONFIG: OrchestrationConfig = OrchestrationConfigSchema.parse({});
