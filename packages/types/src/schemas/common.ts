/**
 * Common schemas shared across the orchestration core
 */
import { z } from 'zod';

/**
 * UUID v4 validation
 */
export const UUIDSchema = z.string().uuid('Invalid UUID format').describe('UUID v4 identifier');

/**
 * ISO 8601 timestamp
 */
export const TimestampSchema = z.coerce.date().describe('ISO 8601 timestamp');

/**
 * Correlation ID for request tracing
 */
export const CorrelationIdSchema = z
  .string()
  .min(1)
  .max(64)
  .describe('Correlation ID for distributed tracing');

/**
 * Subject identifier (patient ID in the clinical application)
 */
export const SubjectIdSchema = z
  .string()
  .trim()
  .min(1, 'Subject ID is required')
  .max(128)
  .describe('Identifier of the analysed subject');

export type UUID = z.infer<typeof UUIDSchema>;
export type Timestamp = z.infer<typeof TimestampSchema>;
export type CorrelationId = z.infer<typeof CorrelationIdSchema>;
export type SubjectId = z.infer<typeof SubjectIdSchema>;
