import { describe, it, expect, vi } from 'vitest';

import { BroadcastBus, type DeliveredEvent } from './BroadcastBus.js';
import { matchTopicPattern, validateTopicName, validateTopicPattern } from './topic.js';

describe('topic helpers', () => {
  it('validates topic names', () => {
    expect(validateTopicName('pdu.broadcast.group-cycle')).toEqual({
      ok: true,
      segments: ['pdu', 'broadcast', 'group-cycle'],
    });
    expect(validateTopicName('pdu..x')).toEqual({ ok: false, reason: 'empty_segment' });
    expect(validateTopicName('pdu.*')).toEqual({ ok: false, reason: 'invalid_segment:*' });
  });

  it('matches single and multi segment wildcards', () => {
    const seg = (p: string): string[] => {
      const v = validateTopicPattern(p);
      if (!v.ok) throw new Error(v.reason);
      return v.segments;
    };
    expect(matchTopicPattern(seg('pdu.*.group-cycle'), 'pdu.broadcast.group-cycle')).toBe(true);
    expect(matchTopicPattern(seg('pdu.*'), 'pdu.broadcast.group-cycle')).toBe(false);
    expect(matchTopicPattern(seg('pdu.**'), 'pdu.broadcast.group-cycle')).toBe(true);
    expect(matchTopicPattern(seg('**.group-cycle'), 'pdu.broadcast.group-cycle')).toBe(true);
  });
});

describe('BroadcastBus', () => {
  it('delivers asynchronously to matching subscribers in order', async () => {
    const bus = new BroadcastBus<string>({ queueCapacity: 10 });
    const seen: Array<[string, number]> = [];
    bus.subscribe('pdu.**', (e) => seen.push([e.payload, e.seq]));
    bus.subscribe('other.topic', () => seen.push(['wrong', 0]));

    bus.publish({ topic: 'pdu.broadcast.group-cycle', source: 'a', payload: 'one' });
    bus.publish({ topic: 'pdu.broadcast.group-cycle', source: 'a', payload: 'two' });
    expect(seen).toEqual([]);

    await bus.idle();
    expect(seen).toEqual([
      ['one', 1],
      ['two', 2],
    ]);
  });

  it('freezes delivered events', async () => {
    const bus = new BroadcastBus<{ n: number }>({ queueCapacity: 10 });
    let got: DeliveredEvent<{ n: number }> | null = null;
    bus.subscribe('a.b', (e) => {
      got = e;
    });
    bus.publish({ topic: 'a.b', source: 's', payload: { n: 1 } });
    await bus.idle();
    expect(got).not.toBeNull();
    expect(Object.isFrozen(got)).toBe(true);
  });

  it('rejects invalid topics', () => {
    const error = vi.fn();
    const bus = new BroadcastBus<string>({
      queueCapacity: 10,
      logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error, fatal: vi.fn() },
    });
    expect(bus.publish({ topic: 'Bad Topic', source: 's', payload: 'x' })).toBe(false);
    expect(error).toHaveBeenCalledOnce();
  });

  it('keeps delivering after a handler throws', async () => {
    const bus = new BroadcastBus<string>({ queueCapacity: 10 });
    const seen: string[] = [];
    bus.subscribe('a.b', (e) => {
      if (e.payload === 'boom') throw new Error('boom');
      seen.push(e.payload);
    });
    bus.publish({ topic: 'a.b', source: 's', payload: 'boom' });
    bus.publish({ topic: 'a.b', source: 's', payload: 'ok' });
    await bus.idle();
    expect(seen).toEqual(['ok']);
  });

  it('drops a subscriber that falls behind its queue bound', async () => {
    const bus = new BroadcastBus<number>({ queueCapacity: 2 });
    const handler = vi.fn();
    bus.subscribe('a.b', handler);
    for (let i = 0; i < 3; i++) bus.publish({ topic: 'a.b', source: 's', payload: i });
    await bus.idle();
    expect(handler).not.toHaveBeenCalled();
    expect(bus.subscriberCount).toBe(0);
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new BroadcastBus<string>({ queueCapacity: 10 });
    const handler = vi.fn();
    const sub = bus.subscribe('a.b', handler);
    bus.publish({ topic: 'a.b', source: 's', payload: 'x' });
    sub.unsubscribe();
    await bus.idle();
    expect(handler).not.toHaveBeenCalled();
    expect(sub.isActive()).toBe(false);
  });
});
