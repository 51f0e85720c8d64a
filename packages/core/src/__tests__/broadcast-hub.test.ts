/**
 * Tests for the broadcast hub: fan-out order, backpressure and shutdown
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { BroadcastEvent, BroadcastEventType } from '@carelens/types';
import { BroadcastHub } from '../orchestration/broadcast-hub.js';
import { createBroadcastEvent } from '../events.js';
import { HubUnavailableError, SubscriberLimitError, ValidationError } from '../errors.js';
import { MetricsRegistry, createOrchestrationMetrics } from '../observability/metrics.js';

function makeEvents(
  count: number,
  subjectId: string | null = 'patient-1',
  type: BroadcastEventType = 'analysis.completed'
): BroadcastEvent[] {
  return Array.from({ length: count }, (_, i) =>
    createBroadcastEvent(type, subjectId, { seq: i + 1 })
  );
}

function seqs(events: BroadcastEvent[]): unknown[] {
  return events.map((event) => event.payload);
}

describe('BroadcastHub', () => {
  describe('fan-out', () => {
    it('should deliver events to every subscriber in publish order', () => {
      const hub = new BroadcastHub();
      const subscribers = [hub.subscribe(), hub.subscribe(), hub.subscribe()];
      const events = makeEvents(5);

      for (const event of events) {
        expect(hub.publish(event)).toEqual({ delivered: 3, dropped: 0, filtered: 0 });
      }

      for (const subscription of subscribers) {
        expect(subscription.drain()).toEqual(events);
        expect(subscription.delivered).toBe(5);
        expect(subscription.dropped).toBe(0);
      }
    });

    it('should hand an event straight to a waiting reader', async () => {
      const hub = new BroadcastHub();
      const subscription = hub.subscribe();
      const [event] = makeEvents(1);

      const pending = subscription.next();
      if (event) hub.publish(event);

      await expect(pending).resolves.toBe(event);
      expect(subscription.size).toBe(0);
      expect(subscription.delivered).toBe(1);
    });

    it('should publish frozen events', () => {
      const [event] = makeEvents(1);
      expect(Object.isFrozen(event)).toBe(true);
      expect(Object.isFrozen(event?.payload)).toBe(true);
    });

    it('should freeze plain event objects before fan-out', () => {
      const hub = new BroadcastHub();
      const first = hub.subscribe();
      const second = hub.subscribe();
      const event: BroadcastEvent = {
        id: 'evt-plain-1',
        type: 'alert.raised',
        subjectId: 'patient-1',
        payload: { level: 'critical', vitals: { heartRate: 148 } },
        publishedAt: new Date('2026-04-01T12:00:00.000Z'),
      };

      hub.publish(event);
      const [seenByFirst] = first.drain();
      const [seenBySecond] = second.drain();

      expect(seenBySecond).toBe(seenByFirst);
      expect(Object.isFrozen(seenBySecond)).toBe(true);
      expect(Object.isFrozen(seenBySecond?.payload)).toBe(true);
      expect(Reflect.set(event, 'type', 'cache.cleared')).toBe(false);
      expect(seenBySecond).toMatchObject({
        type: 'alert.raised',
        payload: { level: 'critical', vitals: { heartRate: 148 } },
      });
    });
  });

  describe('backpressure', () => {
    it('should keep the newest events and count drops when a queue overflows', () => {
      const hub = new BroadcastHub({ queueCapacity: 4 });
      const subscription = hub.subscribe();
      const events = makeEvents(10);

      const results = events.map((event) => hub.publish(event));

      expect(results[3]).toEqual({ delivered: 1, dropped: 0, filtered: 0 });
      expect(results[9]).toEqual({ delivered: 1, dropped: 1, filtered: 0 });
      expect(subscription.dropped).toBe(6);
      expect(subscription.size).toBe(4);
      expect(seqs(subscription.drain())).toEqual([{ seq: 7 }, { seq: 8 }, { seq: 9 }, { seq: 10 }]);
    });

    it('should not let a slow subscriber affect a fast one', async () => {
      const hub = new BroadcastHub({ queueCapacity: 2 });
      const slow = hub.subscribe({ label: 'slow' });
      const fast = hub.subscribe({ label: 'fast' });
      const events = makeEvents(6);

      const received: BroadcastEvent[] = [];
      for (const event of events) {
        hub.publish(event);
        const next = await fast.next();
        if (next) received.push(next);
      }

      expect(received).toEqual(events);
      expect(fast.dropped).toBe(0);
      expect(slow.dropped).toBe(4);
      expect(seqs(slow.drain())).toEqual([{ seq: 5 }, { seq: 6 }]);
    });
  });

  describe('filters', () => {
    it('should deliver subject events only to matching subscribers', () => {
      const hub = new BroadcastHub();
      const scoped = hub.subscribe({ filter: { subjectId: 'patient-1' } });
      const everyone = hub.subscribe();

      const [other] = makeEvents(1, 'patient-2');
      const [own] = makeEvents(1, 'patient-1');
      const [system] = makeEvents(1, null, 'cache.cleared');
      if (!other || !own || !system) throw new Error('missing fixture');

      expect(hub.publish(other)).toEqual({ delivered: 1, dropped: 0, filtered: 1 });
      hub.publish(own);
      hub.publish(system);

      expect(scoped.drain()).toEqual([own, system]);
      expect(everyone.drain()).toEqual([other, own, system]);
    });

    it('should deliver only the requested event types', () => {
      const hub = new BroadcastHub();
      const alerts = hub.subscribe({ filter: { types: ['alert.raised'] } });

      const [completed] = makeEvents(1, 'patient-1', 'analysis.completed');
      const [alert] = makeEvents(1, 'patient-1', 'alert.raised');
      if (!completed || !alert) throw new Error('missing fixture');

      hub.publish(completed);
      hub.publish(alert);
      expect(alerts.drain()).toEqual([alert]);
    });
  });

  describe('registration', () => {
    it('should reject subscribers past the limit', () => {
      const hub = new BroadcastHub({ maxSubscribers: 1 });
      hub.subscribe();
      expect(() => hub.subscribe()).toThrow(SubscriberLimitError);
    });

    it('should reject a duplicate subscriber ID', () => {
      const hub = new BroadcastHub();
      hub.subscribe({ id: 'dashboard-1' });
      expect(() => hub.subscribe({ id: 'dashboard-1' })).toThrow(ValidationError);
    });

    it('should unsubscribe idempotently', () => {
      const hub = new BroadcastHub();
      const subscription = hub.subscribe({ id: 'dashboard-1' });

      expect(hub.unsubscribe(subscription)).toBe(true);
      expect(hub.unsubscribe('dashboard-1')).toBe(false);
      expect(subscription.state).toBe('closed');
      expect(hub.subscriberCount).toBe(0);
    });

    it('should skip closed subscribers on publish', () => {
      const hub = new BroadcastHub();
      const closed = hub.subscribe();
      const open = hub.subscribe();
      closed.close();

      const [event] = makeEvents(1);
      if (!event) throw new Error('missing fixture');
      expect(hub.publish(event)).toEqual({ delivered: 1, dropped: 0, filtered: 0 });
      expect(open.size).toBe(1);
      expect(closed.size).toBe(0);
    });

    it('should release a pending reader when the subscription closes', async () => {
      const hub = new BroadcastHub();
      const subscription = hub.subscribe();
      const pending = subscription.next();

      subscription.close();
      await expect(pending).resolves.toBeUndefined();
      await expect(subscription.next()).resolves.toBeUndefined();
    });

    it('should reject invalid configuration', () => {
      expect(() => new BroadcastHub({ queueCapacity: 0 })).toThrow(ValidationError);
      expect(() => new BroadcastHub({ maxSubscribers: 0 })).toThrow(ValidationError);
    });
  });

  describe('shutdown', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should let consumers drain their queues before closing', async () => {
      const hub = new BroadcastHub();
      const subscription = hub.subscribe();
      const events = makeEvents(3);
      events.forEach((event) => hub.publish(event));

      const report = hub.shutdown({ graceMs: 1000 });
      expect(hub.state).toBe('draining');
      expect(subscription.state).toBe('draining');

      const received: BroadcastEvent[] = [];
      for await (const event of subscription) {
        received.push(event);
      }

      expect(received).toEqual(events);
      await expect(report).resolves.toEqual({ drained: 1, forced: 0, discardedEvents: 0 });
      expect(hub.state).toBe('closed');
      expect(subscription.state).toBe('closed');
    });

    it('should force-close subscribers still holding events at the deadline', async () => {
      const hub = new BroadcastHub();
      const idle = hub.subscribe();
      const stuck = hub.subscribe({ filter: { subjectId: 'patient-1' } });
      makeEvents(3, 'patient-1').forEach((event) => hub.publish(event));
      idle.drain();

      const report = hub.shutdown({ graceMs: 500 });
      await vi.advanceTimersByTimeAsync(500);

      await expect(report).resolves.toEqual({ drained: 1, forced: 1, discardedEvents: 3 });
      expect(stuck.state).toBe('closed');
      expect(stuck.size).toBe(0);
    });

    it('should use the configured grace period by default', async () => {
      const hub = new BroadcastHub({ drainGraceMs: 2000 });
      hub.subscribe();
      makeEvents(1).forEach((event) => hub.publish(event));

      const onDone = vi.fn();
      const report = hub.shutdown().then(onDone);

      await vi.advanceTimersByTimeAsync(1999);
      expect(onDone).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(1);
      await report;
      expect(onDone).toHaveBeenCalledWith({ drained: 0, forced: 1, discardedEvents: 1 });
    });

    it('should refuse subscribers and ignore events once shutdown begins', async () => {
      const hub = new BroadcastHub();
      const report = hub.shutdown({ graceMs: 0 });

      expect(() => hub.subscribe()).toThrow(HubUnavailableError);
      const [event] = makeEvents(1);
      if (!event) throw new Error('missing fixture');
      expect(hub.publish(event)).toEqual({ delivered: 0, dropped: 0, filtered: 0 });

      await vi.advanceTimersByTimeAsync(0);
      await report;
      expect(() => hub.subscribe()).toThrow('Broadcast hub is closed');
      expect(hub.stats().published).toBe(0);
    });

    it('should return the same report when called twice', async () => {
      const hub = new BroadcastHub();
      const first = hub.shutdown({ graceMs: 0 });
      const second = hub.shutdown({ graceMs: 9999 });

      expect(second).toBe(first);
      await vi.advanceTimersByTimeAsync(0);
      await expect(first).resolves.toEqual({ drained: 0, forced: 0, discardedEvents: 0 });
    });
  });

  describe('stats', () => {
    it('should report totals and per-subscriber counters', () => {
      const metrics = createOrchestrationMetrics(new MetricsRegistry());
      const hub = new BroadcastHub({ queueCapacity: 2, metrics });
      hub.subscribe({ id: 'a', label: 'ward-dashboard' });
      hub.subscribe({ id: 'b', filter: { subjectId: 'patient-9' } });
      makeEvents(3).forEach((event) => hub.publish(event));

      const stats = hub.stats();
      expect(stats).toMatchObject({
        state: 'running',
        subscriberCount: 2,
        published: 3,
        delivered: 3,
        dropped: 1,
        filtered: 3,
      });
      expect(stats.subscribers).toEqual([
        expect.objectContaining({ id: 'a', label: 'ward-dashboard', queued: 2, dropped: 1 }),
        expect.objectContaining({ id: 'b', label: null, queued: 0, dropped: 0 }),
      ]);

      expect(metrics.eventsPublished.get({ type: 'analysis.completed' })).toBe(3);
      expect(metrics.eventsDropped.get()).toBe(1);
      expect(metrics.subscribers.get()).toBe(2);
    });
  });
});
