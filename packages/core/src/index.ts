export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  redactObject,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ComputeFailedError,
  JobTimeoutError,
  KeyInvalidatedError,
  HubUnavailableError,
  SubscriberLimitError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export { parseOrchestrationConfig, loadOrchestrationConfig, type OrchestrationEnv } from './env.js';

export { createBroadcastEvent, freezeEvent, type CreateEventOptions } from './events.js';

// Metrics
export {
  Counter,
  Gauge,
  Histogram,
  MetricsRegistry,
  createOrchestrationMetrics,
  type OrchestrationMetrics,
} from './observability/metrics.js';

// Orchestration
export {
  FINGERPRINT_NAMESPACE,
  createFingerprint,
  fingerprintAnalysis,
  type FingerprintInput,
} from './orchestration/fingerprint.js';

export { BoundedQueue } from './orchestration/bounded-queue.js';

export {
  JobCacheManager,
  type JobState,
  type JobOutcome,
  type ComputeFn,
  type JobSource,
  type JobResolution,
  type GetOrComputeOptions,
  type JobSettlement,
  type SettlementListener,
  type JobSnapshot,
  type JobCacheStats,
  type JobCacheManagerConfig,
} from './orchestration/job-cache-manager.js';

export {
  BroadcastHub,
  type HubState,
  type SubscriberState,
  type SubscribeOptions,
  type Subscription,
  type PublishResult,
  type ShutdownOptions,
  type ShutdownReport,
  type SubscriberStats,
  type BroadcastHubStats,
  type BroadcastHubConfig,
} from './orchestration/broadcast-hub.js';

export {
  AnalysisOrchestrator,
  type AnalysisProvider,
  type AnalysisAuditSink,
  type AuditAction,
  type AuditEntry,
  type RequestContext,
  type AnalyzeOptions,
  type AnalysisOutcome,
  type AnalysisOrchestratorDeps,
} from './orchestration/analysis-orchestrator.js';

export {
  createOrchestrationContainer,
  type ContainerState,
  type OrchestrationContainer,
  type OrchestrationContainerOptions,
} from './orchestration/container.js';

export { createAdminSurface, type AdminSurface } from './orchestration/admin.js';
