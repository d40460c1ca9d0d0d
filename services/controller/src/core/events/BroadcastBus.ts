import { randomUUID } from 'node:crypto';

import type { ChannelLogger } from '@pdu-console/logging';
import { matchTopicPattern, validateTopicName, validateTopicPattern } from './topic.js';

/**
 * In-process pub/sub shared by every PDU session of the service.
 *
 * Delivery is asynchronous (microtask) and ordered per subscriber, so a
 * publisher never re-enters its own handlers while it is still mutating
 * state. `idle()` resolves once every queued delivery has run.
 */

export interface BusEvent<TPayload> {
  topic: string;
  source: string;
  payload: TPayload;
}

export type DeliveredEvent<TPayload> = Readonly<BusEvent<TPayload> & { id: string; seq: number; ts: number }>;

export type Handler<TPayload> = (event: DeliveredEvent<TPayload>) => void;

export interface Subscription {
  unsubscribe(): void;
  isActive(): boolean;
}

interface Subscriber<TPayload> {
  sid: string;
  name: string;
  patternSegments: string[];
  handler: Handler<TPayload>;
  active: boolean;
  queue: DeliveredEvent<TPayload>[];
  processing: boolean;
}

export interface BroadcastBusConfig {
  /** Per-subscriber queue bound; a subscriber that falls this far behind is dropped. */
  queueCapacity: number;
  logger?: ChannelLogger;
}

export class BroadcastBus<TPayload> {
  private readonly subscribers = new Map<string, Subscriber<TPayload>>();
  private readonly perTopicSeq = new Map<string, number>();
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly cfg: BroadcastBusConfig) {
    if (!Number.isFinite(cfg.queueCapacity) || cfg.queueCapacity <= 0) {
      throw new Error('queueCapacity must be a positive number');
    }
  }

  subscribe(topicPattern: string, handler: Handler<TPayload>, options?: { name?: string }): Subscription {
    const v = validateTopicPattern(topicPattern);
    if (!v.ok) throw new Error(`invalid subscription topic pattern "${topicPattern}": ${v.reason}`);

    const sid = randomUUID();
    const sub: Subscriber<TPayload> = {
      sid,
      name: options?.name?.trim() || sid,
      patternSegments: v.segments,
      handler,
      active: true,
      queue: [],
      processing: false,
    };
    this.subscribers.set(sid, sub);

    return {
      unsubscribe: () => {
        if (!sub.active) return;
        sub.active = false;
        sub.queue.length = 0;
        this.subscribers.delete(sid);
        this.maybeResolveIdle();
      },
      isActive: () => sub.active,
    };
  }

  publish(event: BusEvent<TPayload>): boolean {
    const tv = validateTopicName(event.topic);
    if (!tv.ok) {
      this.cfg.logger?.error('bus rejected publish: invalid topic', { topic: event.topic, reason: tv.reason });
      return false;
    }

    const delivered: DeliveredEvent<TPayload> = Object.freeze({
      ...event,
      id: randomUUID(),
      ts: Date.now(),
      seq: this.nextSeq(event.topic),
    });

    for (const sub of this.subscribers.values()) {
      if (!sub.active) continue;
      if (!matchTopicPattern(sub.patternSegments, delivered.topic)) continue;

      sub.queue.push(delivered);
      if (sub.queue.length > this.cfg.queueCapacity) {
        this.cfg.logger?.error('bus disabled subscriber: backpressure', {
          subscriber: sub.name,
          queueSize: sub.queue.length,
        });
        sub.active = false;
        sub.queue.length = 0;
        this.subscribers.delete(sub.sid);
        continue;
      }

      if (!sub.processing) {
        sub.processing = true;
        queueMicrotask(() => this.drainSubscriber(sub));
      }
    }
    return true;
  }

  async idle(): Promise<void> {
    if (this.isDrained()) return;
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  private drainSubscriber(sub: Subscriber<TPayload>): void {
    while (sub.active && sub.queue.length > 0) {
      const evt = sub.queue.shift();
      if (!evt) break;
      try {
        sub.handler(evt);
      } catch (err) {
        this.cfg.logger?.error('subscriber handler threw', {
          subscriber: sub.name,
          topic: evt.topic,
          seq: evt.seq,
          err: String(err),
        });
      }
    }
    sub.processing = false;
    this.maybeResolveIdle();
  }

  private nextSeq(topic: string): number {
    const next = (this.perTopicSeq.get(topic) ?? 0) + 1;
    this.perTopicSeq.set(topic, next);
    return next;
  }

  private isDrained(): boolean {
    for (const sub of this.subscribers.values()) {
      if (sub.processing || sub.queue.length > 0) return false;
    }
    return true;
  }

  private maybeResolveIdle(): void {
    if (!this.isDrained()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }
}
