/**
 * Broadcast event helpers
 */

import { randomUUID } from 'node:crypto';
import {
  BroadcastEventSchema,
  type BroadcastEvent,
  type BroadcastEventType,
} from '@carelens/types';
import { ValidationError } from './errors.js';

/**
 * Options for creating a broadcast event
 */
export interface CreateEventOptions {
  /** Correlation ID of the request that produced the event */
  correlationId?: string | undefined;
  /** Publish time (defaults to now) */
  publishedAt?: Date;
}

// Typed arrays and Buffers cannot be frozen while they hold elements
function deepFreeze<T>(value: T): T {
  if (
    value !== null &&
    typeof value === 'object' &&
    !ArrayBuffer.isView(value) &&
    !Object.isFrozen(value)
  ) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Freeze an event and its payload in place so every subscriber sees the
 * same unchanging value
 */
export function freezeEvent(event: BroadcastEvent): BroadcastEvent {
  return deepFreeze(event);
}

/**
 * Create an immutable broadcast event
 *
 * The payload is frozen along with the event, so share only values that no
 * one mutates afterwards.
 *
 * @param type - Event type identifier
 * @param subjectId - Subject the event concerns, or null for system-wide events
 * @param payload - Event payload data
 */
export function createBroadcastEvent(
  type: BroadcastEventType,
  subjectId: string | null,
  payload: unknown,
  options: CreateEventOptions = {}
): BroadcastEvent {
  const event: BroadcastEvent = {
    id: randomUUID(),
    type,
    subjectId,
    payload,
    publishedAt: options.publishedAt ?? new Date(),
  };

  // Only add optional fields if they have values (exactOptionalPropertyTypes compliance)
  if (options.correlationId !== undefined) {
    event.correlationId = options.correlationId;
  }

  const parsed = BroadcastEventSchema.safeParse(event);
  if (!parsed.success) {
    throw new ValidationError('Invalid broadcast event', parsed.error.flatten());
  }

  return freezeEvent(event);
}
