/**
 * Patient Analysis Request Schemas
 *
 * The request shape accepted by the analysis orchestrator. Every field except
 * the correlation ID takes part in the cache fingerprint.
 *
 * @module @carelens/types/schemas/analysis
 */
import { z } from 'zod';

import { CorrelationIdSchema, SubjectIdSchema } from './common.js';

/**
 * Analysis request
 *
 * @example
 * ```typescript
 * const request = AnalysisRequestSchema.parse({
 *   patientId: 'p-42',
 *   specialty: 'cardiology',
 * });
 * ```
 */
export const AnalysisRequestSchema = z.object({
  /** Patient being analysed */
  patientId: SubjectIdSchema,
  /** Generate treatment recommendations alongside the risk analysis */
  includeRecommendations: z.boolean().default(true),
  /** Specialty adapter requested by the caller (e.g. cardiology) */
  specialty: z.string().trim().min(1).max(64).optional(),
  /** Focus of the analysis (e.g. dashboard_summary) */
  analysisFocus: z.string().trim().min(1).max(64).optional(),
  /** Adapter selected by the specialty model registry */
  adapterId: z.string().trim().min(1).max(128).optional(),
  /** Correlation ID of the originating request (not part of the fingerprint) */
  correlationId: CorrelationIdSchema.optional(),
});

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;
export type AnalysisRequestInput = z.input<typeof AnalysisRequestSchema>;
