/**
 * Broadcast Event Schemas
 *
 * Events fanned out to live subscribers (dashboards, mobile push, UI sockets).
 *
 * @module @carelens/types/schemas/broadcast
 */
import { z } from 'zod';

import { CorrelationIdSchema, SubjectIdSchema, TimestampSchema, UUIDSchema } from './common.js';

/**
 * Broadcast event types
 */
export const BroadcastEventTypeSchema = z.enum([
  'analysis.completed',
  'analysis.failed',
  'analysis.invalidated',
  'cache.cleared',
  'alert.raised',
]);

/**
 * Broadcast event
 *
 * A `null` subject marks a system-wide event delivered to every subscriber
 * regardless of its subject filter.
 */
export const BroadcastEventSchema = z.object({
  id: UUIDSchema,
  type: BroadcastEventTypeSchema,
  subjectId: SubjectIdSchema.nullable(),
  payload: z.unknown(),
  publishedAt: TimestampSchema,
  correlationId: CorrelationIdSchema.optional(),
});

/**
 * Subscriber delivery filter
 */
export const SubscriberFilterSchema = z.object({
  /** Only deliver events for this subject (plus system-wide events) */
  subjectId: SubjectIdSchema.optional(),
  /** Only deliver these event types */
  types: z.array(BroadcastEventTypeSchema).min(1).optional(),
});

export type BroadcastEventType = z.infer<typeof BroadcastEventTypeSchema>;
export type BroadcastEvent = z.infer<typeof BroadcastEventSchema>;
export type SubscriberFilter = z.infer<typeof SubscriberFilterSchema>;
