/**
 * Broadcast Hub
 *
 * Fans events out to live subscribers. Each subscriber owns a bounded FIFO
 * queue; when a slow consumer lets it fill up, the oldest queued event is
 * dropped so that publishing never waits on any one consumer.
 *
 * @module @carelens/core/orchestration/broadcast-hub
 */

import { randomUUID } from 'node:crypto';
import type { BroadcastEvent, SubscriberFilter } from '@carelens/types';
import { HubUnavailableError, SubscriberLimitError, ValidationError } from '../errors.js';
import { freezeEvent } from '../events.js';
import { createLogger, type Logger } from '../logger.js';
import { createOrchestrationMetrics, type OrchestrationMetrics } from '../observability/metrics.js';
import { BoundedQueue } from './bounded-queue.js';

const defaultLogger = createLogger({ name: 'broadcast-hub' });

export type HubState = 'running' | 'draining' | 'closed';
export type SubscriberState = 'registered' | 'draining' | 'closed';

export interface SubscribeOptions {
  /** Subscriber ID (default: random UUID) */
  id?: string;
  /** Free-form label for logs and stats, e.g. a dashboard name */
  label?: string;
  /** Only deliver matching events */
  filter?: SubscriberFilter;
}

/**
 * Read side of a subscriber queue
 */
export interface Subscription extends AsyncIterable<BroadcastEvent> {
  readonly id: string;
  readonly label: string | null;
  readonly connectedAt: Date;
  readonly state: SubscriberState;
  /** Events discarded by drop-oldest backpressure */
  readonly dropped: number;
  /** Events handed to the consumer */
  readonly delivered: number;
  /** Events currently queued */
  readonly size: number;
  /**
   * Next queued event, waiting for one if the queue is empty.
   * Resolves undefined once the subscription is closed or fully drained.
   */
  next(): Promise<BroadcastEvent | undefined>;
  /** Take every queued event without waiting */
  drain(): BroadcastEvent[];
  /** Unsubscribe; queued events are discarded */
  close(): void;
}

export interface PublishResult {
  /** Subscribers the event was queued for */
  delivered: number;
  /** Subscribers that dropped their oldest event to make room */
  dropped: number;
  /** Subscribers skipped by their filter */
  filtered: number;
}

export interface ShutdownOptions {
  /** How long to wait for consumers to empty their queues */
  graceMs?: number;
}

export interface ShutdownReport {
  /** Subscribers whose queues were empty by the deadline */
  drained: number;
  /** Subscribers closed with events still queued */
  forced: number;
  /** Events discarded by forced closes */
  discardedEvents: number;
}

export interface SubscriberStats {
  id: string;
  label: string | null;
  state: SubscriberState;
  connectedAt: Date;
  queued: number;
  delivered: number;
  dropped: number;
}

export interface BroadcastHubStats {
  state: HubState;
  subscriberCount: number;
  published: number;
  delivered: number;
  dropped: number;
  filtered: number;
  subscribers: SubscriberStats[];
}

export interface BroadcastHubConfig {
  /** Per-subscriber queue capacity (default: 256) */
  queueCapacity?: number;
  /** Default shutdown grace period in ms (default: 5000) */
  drainGraceMs?: number;
  /** Subscriber limit (default: 1000) */
  maxSubscribers?: number;
  logger?: Logger;
  metrics?: OrchestrationMetrics;
}

const EMPTY_PUBLISH: PublishResult = Object.freeze({ delivered: 0, dropped: 0, filtered: 0 });

interface ChannelInit {
  id: string;
  label: string | null;
  filter: SubscriberFilter | null;
  capacity: number;
  release: (channel: SubscriberChannel) => void;
}

class SubscriberChannel implements Subscription {
  readonly id: string;
  readonly label: string | null;
  readonly connectedAt = new Date();
  private readonly filter: SubscriberFilter | null;
  private readonly queue: BoundedQueue<BroadcastEvent>;
  private readonly release: (channel: SubscriberChannel) => void;
  private readers: ((event: BroadcastEvent | undefined) => void)[] = [];
  private emptyWaiters: (() => void)[] = [];
  private currentState: SubscriberState = 'registered';
  private droppedCount = 0;
  private deliveredCount = 0;

  constructor(init: ChannelInit) {
    this.id = init.id;
    this.label = init.label;
    this.filter = init.filter;
    this.queue = new BoundedQueue<BroadcastEvent>(init.capacity);
    this.release = init.release;
  }

  get state(): SubscriberState {
    return this.currentState;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  get size(): number {
    return this.queue.size;
  }

  next(): Promise<BroadcastEvent | undefined> {
    const event = this.queue.shift();
    if (event !== undefined) {
      this.deliveredCount++;
      this.checkEmpty();
      return Promise.resolve(event);
    }
    if (this.currentState !== 'registered') {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.readers.push(resolve);
    });
  }

  drain(): BroadcastEvent[] {
    const events = this.queue.drain();
    this.deliveredCount += events.length;
    this.checkEmpty();
    return events;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<BroadcastEvent> {
    for (let event = await this.next(); event !== undefined; event = await this.next()) {
      yield event;
    }
  }

  close(): void {
    this.release(this);
  }

  matches(event: BroadcastEvent): boolean {
    if (!this.filter) return true;
    const { subjectId, types } = this.filter;
    if (types && !types.includes(event.type)) return false;
    // System-wide events (no subject) reach every subject-scoped subscriber
    if (subjectId !== undefined && event.subjectId !== null && event.subjectId !== subjectId) {
      return false;
    }
    return true;
  }

  /**
   * Queue an event, handing it straight to a waiting reader if there is one
   *
   * @returns true when an older event was dropped to make room
   */
  enqueue(event: BroadcastEvent): boolean {
    const reader = this.readers.shift();
    if (reader) {
      this.deliveredCount++;
      reader(event);
      return false;
    }

    const result = this.queue.push(event);
    if (result.evicted) {
      this.droppedCount++;
      return true;
    }
    return false;
  }

  beginDrain(): void {
    if (this.currentState !== 'registered') return;
    this.currentState = 'draining';
    this.checkEmpty();
  }

  whenEmpty(): Promise<void> {
    if (this.queue.isEmpty || this.currentState === 'closed') {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.emptyWaiters.push(resolve);
    });
  }

  /**
   * Close for good
   *
   * @returns number of queued events discarded
   */
  terminate(): number {
    if (this.currentState === 'closed') return 0;
    this.currentState = 'closed';
    const discarded = this.queue.size;
    this.queue.clear();
    this.flush();
    return discarded;
  }

  private checkEmpty(): void {
    if (this.queue.isEmpty && this.currentState === 'draining') {
      this.flush();
    }
  }

  private flush(): void {
    const readers = this.readers;
    const waiters = this.emptyWaiters;
    this.readers = [];
    this.emptyWaiters = [];
    for (const reader of readers) reader(undefined);
    for (const waiter of waiters) waiter();
  }
}

/**
 * In-process fan-out of broadcast events to bounded subscriber queues
 *
 * @example
 * ```typescript
 * const hub = new BroadcastHub({ queueCapacity: 256 });
 * const subscription = hub.subscribe({ filter: { subjectId: 'patient-42' } });
 *
 * for await (const event of subscription) {
 *   socket.send(JSON.stringify(event));
 * }
 * ```
 */
export class BroadcastHub {
  private readonly subscribers = new Map<string, SubscriberChannel>();
  private readonly queueCapacity: number;
  private readonly drainGraceMs: number;
  private readonly maxSubscribers: number;
  private readonly logger: Logger;
  private readonly metrics: OrchestrationMetrics;
  private hubState: HubState = 'running';
  private shutdownPromise: Promise<ShutdownReport> | null = null;
  private totals = { published: 0, delivered: 0, dropped: 0, filtered: 0 };

  constructor(config: BroadcastHubConfig = {}) {
    this.queueCapacity = config.queueCapacity ?? 256;
    this.drainGraceMs = config.drainGraceMs ?? 5000;
    this.maxSubscribers = config.maxSubscribers ?? 1000;
    this.logger = config.logger ?? defaultLogger;
    this.metrics = config.metrics ?? createOrchestrationMetrics();

    if (!Number.isInteger(this.queueCapacity) || this.queueCapacity < 1) {
      throw new ValidationError('queueCapacity must be a positive integer');
    }
    if (!Number.isInteger(this.maxSubscribers) || this.maxSubscribers < 1) {
      throw new ValidationError('maxSubscribers must be a positive integer');
    }
    if (!Number.isFinite(this.drainGraceMs) || this.drainGraceMs < 0) {
      throw new ValidationError('drainGraceMs must be a non-negative number');
    }
  }

  get state(): HubState {
    return this.hubState;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Register a subscriber
   *
   * @throws HubUnavailableError once shutdown has begun
   * @throws SubscriberLimitError when maxSubscribers are registered
   */
  subscribe(options: SubscribeOptions = {}): Subscription {
    if (this.hubState !== 'running') {
      throw new HubUnavailableError(this.hubState);
    }
    if (this.subscribers.size >= this.maxSubscribers) {
      throw new SubscriberLimitError(this.maxSubscribers);
    }

    const id = options.id ?? randomUUID();
    if (this.subscribers.has(id)) {
      throw new ValidationError('Subscriber ID already registered', { id });
    }

    const channel = new SubscriberChannel({
      id,
      label: options.label ?? null,
      filter: options.filter ?? null,
      capacity: this.queueCapacity,
      release: (ch) => {
        this.unsubscribe(ch);
      },
    });
    this.subscribers.set(id, channel);
    this.metrics.subscribers.set(this.subscribers.size);

    this.logger.info(
      { subscriberId: id, label: channel.label, subscribers: this.subscribers.size },
      'Subscriber registered'
    );
    return channel;
  }

  /**
   * Deregister a subscriber and discard its queue. Unknown IDs are ignored.
   */
  unsubscribe(subscription: Subscription | string): boolean {
    const id = typeof subscription === 'string' ? subscription : subscription.id;
    const channel = this.subscribers.get(id);
    if (!channel) {
      return false;
    }

    this.subscribers.delete(id);
    const discarded = channel.terminate();
    this.metrics.subscribers.set(this.subscribers.size);

    this.logger.info(
      { subscriberId: id, discarded, dropped: channel.dropped, delivered: channel.delivered },
      'Subscriber removed'
    );
    return true;
  }

  /**
   * Queue an event for every matching subscriber. Never waits and never
   * throws for slow or departed consumers.
   *
   * The event and its payload are frozen before fan-out.
   */
  publish(published: BroadcastEvent): PublishResult {
    const event = freezeEvent(published);
    if (this.hubState !== 'running') {
      this.logger.debug({ eventId: event.id, type: event.type }, 'Publish ignored during shutdown');
      return EMPTY_PUBLISH;
    }

    const result: PublishResult = { delivered: 0, dropped: 0, filtered: 0 };

    for (const channel of this.subscribers.values()) {
      if (!channel.matches(event)) {
        result.filtered++;
        continue;
      }
      if (channel.enqueue(event)) {
        result.dropped++;
        this.logger.debug(
          { subscriberId: channel.id, dropped: channel.dropped },
          'Subscriber queue full, dropped oldest event'
        );
      }
      result.delivered++;
    }

    this.totals.published++;
    this.totals.delivered += result.delivered;
    this.totals.dropped += result.dropped;
    this.totals.filtered += result.filtered;
    this.metrics.eventsPublished.inc({ type: event.type });
    this.metrics.eventsDelivered.inc({}, result.delivered);
    this.metrics.eventsDropped.inc({}, result.dropped);

    return result;
  }

  /**
   * Stop accepting subscribers and events, give consumers up to `graceMs`
   * to empty their queues, then close everything.
   *
   * Calling it again returns the same report.
   */
  shutdown(options: ShutdownOptions = {}): Promise<ShutdownReport> {
    if (!this.shutdownPromise) {
      const graceMs = options.graceMs ?? this.drainGraceMs;
      if (!Number.isFinite(graceMs) || graceMs < 0) {
        throw new ValidationError('graceMs must be a non-negative number');
      }
      this.shutdownPromise = this.drainAndClose(graceMs);
    }
    return this.shutdownPromise;
  }

  stats(): BroadcastHubStats {
    return {
      state: this.hubState,
      subscriberCount: this.subscribers.size,
      ...this.totals,
      subscribers: Array.from(this.subscribers.values()).map((channel) => ({
        id: channel.id,
        label: channel.label,
        state: channel.state,
        connectedAt: channel.connectedAt,
        queued: channel.size,
        delivered: channel.delivered,
        dropped: channel.dropped,
      })),
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async drainAndClose(graceMs: number): Promise<ShutdownReport> {
    this.hubState = 'draining';
    const channels = Array.from(this.subscribers.values());
    for (const channel of channels) {
      channel.beginDrain();
    }

    this.logger.info(
      { subscribers: channels.length, graceMs },
      'Broadcast hub draining subscribers'
    );

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });
    try {
      await Promise.race([Promise.all(channels.map((channel) => channel.whenEmpty())), deadline]);
    } finally {
      clearTimeout(timer);
    }

    const report: ShutdownReport = { drained: 0, forced: 0, discardedEvents: 0 };
    for (const channel of channels) {
      if (channel.size === 0) {
        report.drained++;
      } else {
        report.forced++;
      }
      report.discardedEvents += channel.terminate();
    }

    this.subscribers.clear();
    this.hubState = 'closed';
    this.metrics.subscribers.set(0);

    if (report.forced > 0) {
      this.logger.warn(report, 'Broadcast hub closed with undelivered events');
    } else {
      this.logger.info(report, 'Broadcast hub closed');
    }
    return report;
  }
}
