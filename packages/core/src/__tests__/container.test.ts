/**
 * Tests for the orchestration container lifecycle and admin surface
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { AnalysisRequest } from '@carelens/types';
import { createOrchestrationContainer } from '../orchestration/container.js';
import { createAdminSurface } from '../orchestration/admin.js';
import { HubUnavailableError, ValidationError } from '../errors.js';

function createProvider() {
  return {
    analyze: vi.fn(async (request: AnalysisRequest) => ({
      patientId: request.patientId,
      summary: 'stable',
    })),
  };
}

describe('createOrchestrationContainer', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should wire the cache, hub and orchestrator from config', async () => {
    const container = createOrchestrationContainer({
      provider: createProvider(),
      config: { subscriberQueueCapacity: 8, sweepIntervalSeconds: 0 },
    });
    const subscription = container.hub.subscribe();

    const outcome = await container.orchestrator.analyze({ patientId: 'patient-1' });

    expect(container.config.subscriberQueueCapacity).toBe(8);
    expect(container.config.ttlSeconds).toBe(300);
    expect(container.cache.has(outcome.fingerprint)).toBe(true);
    expect(subscription.drain().map((e) => e.type)).toEqual(['analysis.completed']);
    await container.shutdown();
  });

  it('should reject an invalid config', () => {
    expect(() =>
      createOrchestrationContainer({ provider: createProvider(), config: { ttlSeconds: -1 } })
    ).toThrow(ValidationError);
  });

  it('should sweep expired entries once started', async () => {
    vi.useFakeTimers();
    const container = createOrchestrationContainer({
      provider: createProvider(),
      config: { ttlSeconds: 1, sweepIntervalSeconds: 1 },
    });
    container.start();
    expect(container.state).toBe('started');

    await container.orchestrator.analyze({ patientId: 'patient-1' });
    expect(container.cache.size).toBe(1);

    vi.advanceTimersByTime(2000);
    expect(container.cache.size).toBe(0);

    const stopping = container.shutdown();
    await vi.advanceTimersByTimeAsync(0);
    await stopping;
  });

  it('should shut down once and close the hub', async () => {
    const container = createOrchestrationContainer({
      provider: createProvider(),
      config: { drainGraceSeconds: 0, sweepIntervalSeconds: 0 },
    });
    container.start();
    const subscription = container.hub.subscribe();
    container.orchestrator.publishAlert(null, { message: 'maintenance window' });
    await container.orchestrator.analyze({ patientId: 'patient-1' });

    const first = container.shutdown();
    expect(container.shutdown()).toBe(first);
    await expect(first).resolves.toEqual({ drained: 0, forced: 1, discardedEvents: 2 });

    expect(container.state).toBe('stopped');
    expect(subscription.state).toBe('closed');
    expect(container.cache.size).toBe(0);
    expect(() => container.hub.subscribe()).toThrow(HubUnavailableError);
  });

  it('should not start after shutdown', async () => {
    const container = createOrchestrationContainer({ provider: createProvider() });
    await container.shutdown();
    container.start();
    expect(container.state).toBe('stopped');
  });
});

describe('createAdminSurface', () => {
  it('should expose stats, metrics and an audited cache reset', async () => {
    const audit = { record: vi.fn(async () => undefined) };
    const container = createOrchestrationContainer({
      provider: createProvider(),
      audit,
      config: { sweepIntervalSeconds: 0 },
    });
    const admin = createAdminSurface(container);
    container.hub.subscribe({ id: 'ward-board' });

    await container.orchestrator.analyze({ patientId: 'patient-1' });
    await container.orchestrator.analyze({ patientId: 'patient-1' });

    expect(admin.cacheStats()).toMatchObject({ size: 1, hits: 1, misses: 1, hitRate: 0.5 });
    expect(admin.hubStats()).toMatchObject({ state: 'running', subscriberCount: 1, published: 1 });

    const text = admin.metrics();
    expect(text).toContain('carelens_analysis_cache_lookups_total{outcome="hit"} 1');
    expect(text).toContain('carelens_analysis_cache_entries{state="completed"} 1');
    expect(text).toContain('carelens_broadcast_subscribers 1');

    await expect(admin.clearCache({ actor: 'ops-admin' })).resolves.toEqual({ cleared: 1 });
    expect(audit.record).toHaveBeenLastCalledWith(
      expect.objectContaining({ action: 'cache.cleared', actor: 'ops-admin' })
    );
    expect(admin.cacheStats().size).toBe(0);

    await container.shutdown();
  });
});
