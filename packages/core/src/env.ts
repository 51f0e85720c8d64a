import { z } from 'zod';
import { OrchestrationConfigSchema, type OrchestrationConfig } from '@carelens/types';
import { ValidationError } from './errors.js';

/**
 * Environment Variable Validation
 * Maps the orchestration environment onto the typed configuration at boot time
 */

const numeric = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'Must be a non-negative number')
  .transform(Number)
  .optional();

const OrchestrationEnvSchema = z.object({
  ANALYSIS_CACHE_TTL_SECONDS: numeric,
  ANALYSIS_NEGATIVE_TTL_SECONDS: numeric,
  BROADCAST_QUEUE_CAPACITY: numeric,
  BROADCAST_DRAIN_GRACE_SECONDS: numeric,
  ANALYSIS_CACHE_SWEEP_INTERVAL_SECONDS: numeric,
  ANALYSIS_CACHE_MAX_ENTRIES: numeric,
  BROADCAST_MAX_SUBSCRIBERS: numeric,
  ANALYSIS_WAIT_TIMEOUT_SECONDS: numeric,
});

export type OrchestrationEnv = z.infer<typeof OrchestrationEnvSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Validate an orchestration config object, filling defaults
 */
export function parseOrchestrationConfig(input: unknown = {}): OrchestrationConfig {
  const result = OrchestrationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid orchestration config: ${formatIssues(result.error)}`,
      result.error.flatten()
    );
  }
  return result.data;
}

/**
 * Load the orchestration config from environment variables
 *
 * Unset variables fall back to the schema defaults.
 */
export function loadOrchestrationConfig(
  env: Record<string, string | undefined> = process.env
): OrchestrationConfig {
  const parsed = OrchestrationEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid orchestration environment: ${formatIssues(parsed.error)}`,
      parsed.error.flatten()
    );
  }

  const vars = parsed.data;
  const candidate: Record<string, number> = {};
  const mapping: [keyof OrchestrationEnv, keyof OrchestrationConfig][] = [
    ['ANALYSIS_CACHE_TTL_SECONDS', 'ttlSeconds'],
    ['ANALYSIS_NEGATIVE_TTL_SECONDS', 'negativeTtlSeconds'],
    ['BROADCAST_QUEUE_CAPACITY', 'subscriberQueueCapacity'],
    ['BROADCAST_DRAIN_GRACE_SECONDS', 'drainGraceSeconds'],
    ['ANALYSIS_CACHE_SWEEP_INTERVAL_SECONDS', 'sweepIntervalSeconds'],
    ['ANALYSIS_CACHE_MAX_ENTRIES', 'maxCacheEntries'],
    ['BROADCAST_MAX_SUBSCRIBERS', 'maxSubscribers'],
    ['ANALYSIS_WAIT_TIMEOUT_SECONDS', 'waitTimeoutSeconds'],
  ];

  for (const [envKey, configKey] of mapping) {
    const value = vars[envKey];
    if (value !== undefined) {
      candidate[configKey] = value;
    }
  }

  return parseOrchestrationConfig(candidate);
}
