/**
 * Analysis Orchestrator
 *
 * Runs patient analyses through the single-flight job cache and announces
 * settled analyses, invalidations and alerts on the broadcast hub.
 *
 * @module @carelens/core/orchestration/analysis-orchestrator
 */

import {
  AnalysisRequestSchema,
  type AnalysisRequest,
  type BroadcastEvent,
  type BroadcastEventType,
} from '@carelens/types';
import { ValidationError } from '../errors.js';
import { createBroadcastEvent } from '../events.js';
import { createLogger, type Logger } from '../logger.js';
import type { BroadcastHub, PublishResult } from './broadcast-hub.js';
import { fingerprintAnalysis } from './fingerprint.js';
import type {
  GetOrComputeOptions,
  JobCacheManager,
  JobSettlement,
  JobSource,
} from './job-cache-manager.js';

const defaultLogger = createLogger({ name: 'analysis-orchestrator' });

// =============================================================================
// Ports
// =============================================================================

/**
 * The expensive analysis pipeline
 */
export interface AnalysisProvider<T> {
  analyze(request: AnalysisRequest): Promise<T>;
}

export type AuditAction = 'analysis.computed' | 'cache.cleared';

export interface AuditEntry {
  action: AuditAction;
  actor: string | null;
  subjectId: string | null;
  fingerprint: string | null;
  correlationId: string | null;
  details: Record<string, unknown>;
  recordedAt: Date;
}

/**
 * Audit trail for computed analyses and administrative actions
 */
export interface AnalysisAuditSink {
  record(entry: AuditEntry): Promise<void>;
}

// =============================================================================
// Types
// =============================================================================

export interface RequestContext {
  /** Opaque caller identity, recorded not checked */
  actor?: string;
  correlationId?: string;
}

export interface AnalyzeOptions extends RequestContext {
  /** Discard a cached analysis and compute again */
  forceRefresh?: boolean;
  /** How long to wait before failing with JobTimeoutError */
  timeoutMs?: number;
  /** Override the cache TTL for this analysis */
  ttlSeconds?: number;
}

export interface AnalysisOutcome<T> {
  result: T;
  fingerprint: string;
  /** True when this call did not run the provider itself */
  fromCache: boolean;
  source: JobSource;
}

export interface AnalysisOrchestratorDeps<T> {
  provider: AnalysisProvider<T>;
  cache: JobCacheManager<T>;
  hub: BroadcastHub;
  audit?: AnalysisAuditSink;
  /**
   * Shape of the `analysis.completed` payload (default: a structured clone of
   * the result). The payload is frozen on publish, so returning the result
   * itself freezes the value `analyze()` callers receive.
   */
  toEventPayload?: (result: T) => unknown;
  logger?: Logger;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class AnalysisOrchestrator<T> {
  private readonly provider: AnalysisProvider<T>;
  private readonly cache: JobCacheManager<T>;
  private readonly hub: BroadcastHub;
  private readonly audit: AnalysisAuditSink | undefined;
  private readonly toEventPayload: (result: T) => unknown;
  private readonly logger: Logger;
  private readonly detach: () => void;

  constructor(deps: AnalysisOrchestratorDeps<T>) {
    this.provider = deps.provider;
    this.cache = deps.cache;
    this.hub = deps.hub;
    this.audit = deps.audit;
    this.toEventPayload = deps.toEventPayload ?? ((result) => structuredClone(result));
    this.logger = deps.logger ?? defaultLogger;
    this.detach = this.cache.onSettled((settlement) => {
      this.announce(settlement);
    });
  }

  /**
   * Analyze a patient, sharing the computation with concurrent identical
   * requests and serving fresh cached results
   *
   * @throws ValidationError on a malformed request
   */
  async analyze(input: unknown, options: AnalyzeOptions = {}): Promise<AnalysisOutcome<T>> {
    const parsed = AnalysisRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid analysis request', parsed.error.flatten());
    }

    const correlationId = options.correlationId ?? parsed.data.correlationId;
    const request: AnalysisRequest = { ...parsed.data };
    if (correlationId !== undefined) {
      request.correlationId = correlationId;
    }

    const fingerprint = fingerprintAnalysis(request);
    const log = this.logger.child({ fingerprint, correlationId });

    const jobOptions: GetOrComputeOptions = { subjectId: request.patientId };
    if (correlationId !== undefined) jobOptions.correlationId = correlationId;
    if (options.forceRefresh !== undefined) jobOptions.forceRefresh = options.forceRefresh;
    if (options.timeoutMs !== undefined) jobOptions.timeoutMs = options.timeoutMs;
    if (options.ttlSeconds !== undefined) jobOptions.ttlSeconds = options.ttlSeconds;

    const resolution = await this.cache.resolve(
      fingerprint,
      () => this.provider.analyze(request),
      jobOptions
    );

    log.debug({ source: resolution.source }, 'Analysis resolved');

    if (resolution.source === 'computed') {
      await this.recordAudit({
        action: 'analysis.computed',
        actor: options.actor ?? null,
        subjectId: request.patientId,
        fingerprint,
        correlationId: correlationId ?? null,
        details: {
          includeRecommendations: request.includeRecommendations,
          specialty: request.specialty ?? null,
        },
        recordedAt: new Date(),
      });
    }

    return {
      result: resolution.value,
      fingerprint,
      fromCache: resolution.source !== 'computed',
      source: resolution.source,
    };
  }

  /**
   * Drop every cached analysis for a patient, e.g. after new clinical data arrives
   *
   * @returns number of cache entries invalidated
   */
  invalidatePatient(patientId: string, context: RequestContext = {}): number {
    const invalidated = this.cache.invalidateSubject(patientId);
    this.publish('analysis.invalidated', patientId, { invalidated }, context.correlationId);
    this.logger.info(
      { invalidated, actor: context.actor, correlationId: context.correlationId },
      'Patient analyses invalidated'
    );
    return invalidated;
  }

  /**
   * Administrative reset of the analysis cache
   */
  async clearCache(context: RequestContext = {}): Promise<number> {
    const cleared = this.cache.clear();
    this.logger.info(
      { cleared, actor: context.actor, correlationId: context.correlationId },
      'Analysis cache cleared'
    );

    await this.recordAudit({
      action: 'cache.cleared',
      actor: context.actor ?? null,
      subjectId: null,
      fingerprint: null,
      correlationId: context.correlationId ?? null,
      details: { cleared },
      recordedAt: new Date(),
    });
    this.publish('cache.cleared', null, { cleared }, context.correlationId);
    return cleared;
  }

  /**
   * Publish an alert through the same hub as analysis updates
   */
  publishAlert(
    subjectId: string | null,
    payload: unknown,
    context: RequestContext = {}
  ): PublishResult {
    return this.publish('alert.raised', subjectId, payload, context.correlationId);
  }

  /**
   * Stop listening to cache settlements
   */
  dispose(): void {
    this.detach();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private announce(settlement: JobSettlement<T>): void {
    const subjectId = settlement.subjectId ?? null;
    const { outcome } = settlement;

    if (outcome.ok) {
      const payload = this.toEventPayload(outcome.value);
      this.publish('analysis.completed', subjectId, payload, settlement.correlationId);
    } else {
      this.publish(
        'analysis.failed',
        subjectId,
        { error: outcome.error.toSafeError(), fingerprint: settlement.key },
        settlement.correlationId
      );
    }
  }

  private publish(
    type: BroadcastEventType,
    subjectId: string | null,
    payload: unknown,
    correlationId: string | undefined
  ): PublishResult {
    const event: BroadcastEvent = createBroadcastEvent(type, subjectId, payload, { correlationId });
    const result = this.hub.publish(event);
    this.logger.debug({ eventId: event.id, type, ...result }, 'Broadcast event published');
    return result;
  }

  private async recordAudit(entry: AuditEntry): Promise<void> {
    if (!this.audit) return;
    try {
      await this.audit.record(entry);
    } catch (error) {
      this.logger.error(
        { err: error, action: entry.action, correlationId: entry.correlationId },
        'Failed to record audit entry'
      );
    }
  }
}
