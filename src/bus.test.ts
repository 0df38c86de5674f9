import { describe, it, expect, vi, afterEach } from 'vitest';
import { MessageBus, type BusConfig } from './bus.js';
import { BusStoppedError } from './errors.js';
import { BROADCAST } from './types.js';
import { manualClock, message } from '../tests/helpers.js';

const started: MessageBus[] = [];

function makeBus(config: Partial<BusConfig> = {}) {
  const clock = manualClock();
  const onEvent = vi.fn();
  const bus = new MessageBus({ sweepIntervalMs: 60_000, ...config }, { clock: clock.now, onEvent });
  bus.start();
  started.push(bus);
  return { bus, clock, onEvent };
}

afterEach(async () => {
  await Promise.all(started.splice(0).map((bus) => bus.stop()));
});

describe('MessageBus state', () => {
  it('rejects a non-positive queue size', () => {
    expect(() => new MessageBus({ maxQueueSize: 0 })).toThrow(RangeError);
  });

  it('refuses send and receive while stopped', () => {
    const bus = new MessageBus();
    expect(bus.state).toBe('stopped');
    expect(() => bus.send(message())).toThrow(BusStoppedError);
    expect(() => bus.receive('worker')).toThrow(BusStoppedError);
  });

  it('wakes pending receives with null on stop', async () => {
    const { bus, onEvent } = makeBus();
    const pending = bus.receive('worker', 10_000);
    await bus.stop();
    expect(await pending).toBeNull();
    expect(bus.isRunning).toBe(false);
    expect(onEvent).toHaveBeenCalledWith('bus:stopped', expect.objectContaining({ totalSent: 0 }));
  });
});

describe('MessageBus unicast', () => {
  it('delivers in send order', async () => {
    const { bus } = makeBus();
    for (const id of ['m1', 'm2', 'm3']) bus.send(message({ id }));
    const ids: Array<string | undefined> = [];
    for (let i = 0; i < 3; i++) ids.push((await bus.receive('worker', 0))?.id);
    expect(ids).toEqual(['m1', 'm2', 'm3']);
    expect(await bus.receive('worker', 0)).toBeNull();
  });

  it('keeps the caller timestamp and assigns a missing id', async () => {
    const { bus } = makeBus();
    bus.send(message({ timestamp: 42 }));
    const got = await bus.receive('worker', 0);
    expect(got?.timestamp).toBe(42);
    expect(typeof got?.id).toBe('string');
  });

  it('hands a message straight to a waiting receiver', async () => {
    const { bus } = makeBus();
    const pending = bus.receive('worker', 10_000);
    expect(bus.send(message({ id: 'direct' }))).toBe(true);
    expect((await pending)?.id).toBe('direct');
    expect(bus.queueStatus()).toEqual({});
    expect(bus.stats()).toMatchObject({ totalSent: 1, totalReceived: 1 });
  });

  it('returns null when nothing arrives in time', async () => {
    const { bus } = makeBus();
    expect(await bus.receive('worker', 10)).toBeNull();
  });

  it('rejects new messages once a queue is full', async () => {
    const { bus, onEvent } = makeBus({ maxQueueSize: 2 });
    expect(bus.send(message({ id: 'a' }))).toBe(true);
    expect(bus.send(message({ id: 'b' }))).toBe(true);
    expect(bus.send(message({ id: 'c' }))).toBe(false);
    expect(onEvent).toHaveBeenCalledWith('bus:rejected', { recipient: 'worker', type: 'generate_response', queueSize: 2 });
    expect(bus.stats()).toMatchObject({ totalSent: 2, failedDeliveries: 1 });
    expect((await bus.receive('worker', 0))?.id).toBe('a');
    expect((await bus.receive('worker', 0))?.id).toBe('b');
  });
});

describe('MessageBus broadcast', () => {
  it('copies to every subscriber except the sender', async () => {
    const { bus, clock } = makeBus();
    bus.subscribe('a', ['news']);
    bus.subscribe('b', ['news']);
    bus.subscribe('c', ['news', 'other']);
    clock.set(5_000);
    const original = message({ senderId: 'a', receiverId: BROADCAST, type: 'news', payload: { n: 1 } });
    expect(bus.send(original)).toBe(true);

    expect(await bus.receive('a', 0)).toBeNull();
    const b = await bus.receive('b', 0);
    const c = await bus.receive('c', 0);
    expect(b).toMatchObject({ receiverId: 'b', senderId: 'a', type: 'news', timestamp: 5_000, payload: { n: 1 } });
    expect(c?.receiverId).toBe('c');
    expect(b?.id).not.toBe(c?.id);
    expect(b?.payload).not.toBe(original.payload);
    expect(bus.stats().totalBroadcast).toBe(1);
  });

  it('succeeds with a warning when nobody subscribes', () => {
    const { bus, onEvent } = makeBus();
    bus.subscribe('a', ['news']);
    expect(bus.send(message({ senderId: 'a', receiverId: BROADCAST, type: 'news' }))).toBe(true);
    expect(onEvent).toHaveBeenCalledWith('warn', { message: 'Broadcast of news from a has no subscribers' });
  });

  it('unsubscribes from selected or all types', () => {
    const { bus } = makeBus();
    bus.subscribe('a', ['news', 'other']);
    bus.subscribe('b', ['news']);
    bus.unsubscribe('b', ['news']);
    expect(bus.subscribers('news')).toEqual(['a']);
    bus.unsubscribe('a');
    expect(bus.subscribers('news')).toEqual([]);
    expect(bus.subscribers('other')).toEqual([]);
  });
});

describe('MessageBus maintenance', () => {
  it('sweeps messages older than the timeout from the queue head', async () => {
    const { bus, clock, onEvent } = makeBus({ messageTimeoutMs: 1_000 });
    bus.send(message({ id: 'old', timestamp: 1_000 }));
    bus.send(message({ id: 'new', timestamp: 1_500 }));
    clock.set(2_100);
    expect(bus.sweep()).toBe(1);
    expect(onEvent).toHaveBeenCalledWith('bus:expired', { recipient: 'worker', count: 1 });
    expect(bus.stats().expired).toBe(1);
    expect((await bus.receive('worker', 0))?.id).toBe('new');
  });

  it('forgets a queue whose messages all expired', () => {
    const { bus, clock } = makeBus({ messageTimeoutMs: 1_000 });
    bus.send(message({ receiverId: 'reply-inbox-1', timestamp: 1_000 }));
    bus.send(message({ receiverId: 'worker', timestamp: 2_000 }));
    clock.set(2_100);
    expect(bus.sweep()).toBe(1);
    expect(bus.queueCount).toBe(1);
    expect(Object.keys(bus.queueStatus())).toEqual(['worker']);
  });

  it('forgets a queue once receive drains it', async () => {
    const { bus } = makeBus();
    bus.send(message({ id: 'm1' }));
    bus.send(message({ id: 'm2' }));
    expect((await bus.receive('worker', 0))?.id).toBe('m1');
    expect(bus.queueCount).toBe(1);
    expect((await bus.receive('worker', 0))?.id).toBe('m2');
    expect(bus.queueCount).toBe(0);
    expect(bus.queueStatus()).toEqual({});
  });

  it('tracks delivery latency and message types', async () => {
    const { bus, clock } = makeBus();
    bus.send(message({ timestamp: 1_000 }));
    bus.send(message({ type: 'ping', timestamp: 1_000 }));
    clock.advance(40);
    await bus.receive('worker', 0);
    clock.advance(20);
    await bus.receive('worker', 0);
    expect(bus.stats()).toEqual({
      totalSent: 2,
      totalReceived: 2,
      totalBroadcast: 0,
      failedDeliveries: 0,
      expired: 0,
      averageDeliveryTime: 50,
      messageTypes: { generate_response: 1, ping: 1 },
    });
  });

  it('reports and clears queues', () => {
    const { bus } = makeBus({ maxQueueSize: 4 });
    bus.send(message({ receiverId: 'x' }));
    bus.send(message({ receiverId: 'x' }));
    bus.send(message({ receiverId: 'y' }));
    expect(bus.queueStatus()).toEqual({
      x: { size: 2, max: 4, usage: 0.5 },
      y: { size: 1, max: 4, usage: 0.25 },
    });
    expect(bus.clearQueue('x')).toBe(2);
    expect(bus.clearQueue('missing')).toBe(0);
    expect(bus.clearAllQueues()).toBe(1);
    expect(bus.queueCount).toBe(0);
  });

  it('health check warns on full queues and failed deliveries', () => {
    const { bus, onEvent } = makeBus({ maxQueueSize: 1 });
    bus.send(message());
    bus.send(message());
    expect(bus.healthCheck()).toBe(true);
    expect(onEvent).toHaveBeenCalledWith('warn', { message: 'Queue for worker is 100% full' });
    expect(onEvent).toHaveBeenCalledWith('warn', { message: 'Delivery failure rate 50.0%' });
  });

  it('health check fails when stopped', async () => {
    const { bus } = makeBus();
    await bus.stop();
    expect(bus.healthCheck()).toBe(false);
  });
});
