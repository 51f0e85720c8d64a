import { describe, it, expect } from 'vitest';
import {
  AnalysisRequestSchema,
  BroadcastEventSchema,
  DEFAULT_ORCHESTRATION_CONFIG,
  OrchestrationConfigSchema,
  SubscriberFilterSchema,
} from '../index.js';

describe('AnalysisRequestSchema', () => {
  it('should default includeRecommendations and trim labels', () => {
    const request = AnalysisRequestSchema.parse({ patientId: ' p-42 ', specialty: ' Cardiology ' });
    expect(request).toEqual({
      patientId: 'p-42',
      includeRecommendations: true,
      specialty: 'Cardiology',
    });
  });

  it('should require a patient ID', () => {
    expect(AnalysisRequestSchema.safeParse({ patientId: '   ' }).success).toBe(false);
    expect(AnalysisRequestSchema.safeParse({}).success).toBe(false);
  });

  it('should reject overlong labels', () => {
    const result = AnalysisRequestSchema.safeParse({ patientId: 'p-1', specialty: 'x'.repeat(65) });
    expect(result.success).toBe(false);
  });
});

describe('BroadcastEventSchema', () => {
  const event = {
    id: '3f1c2a9e-8b7d-4c6e-9f0a-1b2c3d4e5f60',
    type: 'alert.raised',
    subjectId: null,
    payload: { severity: 'critical' },
    publishedAt: '2026-04-01T12:00:00.000Z',
  };

  it('should accept a system-wide event and coerce the timestamp', () => {
    const parsed = BroadcastEventSchema.parse(event);
    expect(parsed.publishedAt).toEqual(new Date('2026-04-01T12:00:00.000Z'));
    expect(parsed.subjectId).toBeNull();
  });

  it('should reject unknown event types', () => {
    expect(BroadcastEventSchema.safeParse({ ...event, type: 'lead.created' }).success).toBe(false);
  });
});

describe('SubscriberFilterSchema', () => {
  it('should reject an empty type list', () => {
    expect(SubscriberFilterSchema.safeParse({ types: [] }).success).toBe(false);
    expect(SubscriberFilterSchema.safeParse({ types: ['cache.cleared'] }).success).toBe(true);
  });
});

describe('OrchestrationConfigSchema', () => {
  it('should expose defaults', () => {
    expect(DEFAULT_ORCHESTRATION_CONFIG).toMatchObject({
      ttlSeconds: 300,
      negativeTtlSeconds: 5,
      subscriberQueueCapacity: 256,
      drainGraceSeconds: 5,
    });
  });

  it('should require an integer queue capacity', () => {
    expect(OrchestrationConfigSchema.safeParse({ subscriberQueueCapacity: 2.5 }).success).toBe(
      false
    );
  });
});
