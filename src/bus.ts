/**
 * In-process message bus: one bounded FIFO per recipient, topic subscriptions
 * for broadcast, periodic expiry sweep and delivery statistics.
 *
 * A full queue rejects the new message (send returns false); nothing queued
 * is ever dropped to make room. The bus never retries.
 */

import { randomUUID } from 'node:crypto';
import { BusStoppedError, errorMessage } from './errors.js';
import { RingBuffer } from './ring-buffer.js';
import { PeriodicTask } from './timeout.js';
import { BROADCAST, type BusStats, type Clock, type EventSink, type Message } from './types.js';

export interface BusConfig {
  maxQueueSize: number;
  /** Queued messages older than this are swept. */
  messageTimeoutMs: number;
  /** Passed through to callers as a hint; the bus itself never retries. */
  retryAttempts: number;
  sweepIntervalMs: number;
  /** How many recent deliveries the latency average covers. */
  deliveryWindow: number;
}

export const DEFAULT_BUS_CONFIG: BusConfig = {
  maxQueueSize: 1000,
  messageTimeoutMs: 30_000,
  retryAttempts: 3,
  sweepIntervalMs: 500,
  deliveryWindow: 100,
};

export interface BusOptions {
  clock?: Clock;
  onEvent?: EventSink;
}

export interface QueueStatus {
  size: number;
  max: number;
  /** 0..1 */
  usage: number;
}

export type BusState = 'stopped' | 'running';

interface Waiter {
  resolve(message: Message | null): void;
  timer: NodeJS.Timeout | null;
}

export class MessageBus {
  readonly config: Readonly<BusConfig>;
  private stateValue: BusState = 'stopped';
  private readonly queues = new Map<string, RingBuffer<Message>>();
  private readonly waiters = new Map<string, Waiter[]>();
  private readonly subscriptions = new Map<string, Set<string>>();
  private readonly deliveryTimes: RingBuffer<number>;
  private readonly clock: Clock;
  private readonly emit: EventSink;
  private readonly sweeper: PeriodicTask;
  private readonly counters = {
    totalSent: 0,
    totalReceived: 0,
    totalBroadcast: 0,
    failedDeliveries: 0,
    expired: 0,
  };
  private readonly messageTypes = new Map<string, number>();
  private averageDeliveryTime = 0;

  constructor(config: Partial<BusConfig> = {}, options: BusOptions = {}) {
    this.config = Object.freeze({ ...DEFAULT_BUS_CONFIG, ...config });
    if (!Number.isInteger(this.config.maxQueueSize) || this.config.maxQueueSize < 1) {
      throw new RangeError(`maxQueueSize must be a positive integer, got ${this.config.maxQueueSize}`);
    }
    this.deliveryTimes = new RingBuffer<number>(Math.max(1, this.config.deliveryWindow));
    this.clock = options.clock ?? Date.now;
    this.emit = options.onEvent ?? (() => {});
    this.sweeper = new PeriodicTask(
      'bus-sweep',
      this.config.sweepIntervalMs,
      () => {
        this.sweep();
      },
      (name, err) => this.emit('warn', { message: `${name} failed: ${errorMessage(err)}` }),
    );
  }

  get state(): BusState {
    return this.stateValue;
  }

  get isRunning(): boolean {
    return this.stateValue === 'running';
  }

  get retryAttempts(): number {
    return this.config.retryAttempts;
  }

  start(): void {
    if (this.stateValue === 'running') return;
    this.stateValue = 'running';
    this.sweeper.start();
    this.emit('bus:started', { maxQueueSize: this.config.maxQueueSize });
  }

  /** Cancel the sweep, wait for it, and wake every pending receive with null. */
  async stop(): Promise<void> {
    if (this.stateValue === 'stopped') return;
    this.stateValue = 'stopped';
    await this.sweeper.stop();
    for (const [recipient, list] of this.waiters) {
      this.waiters.delete(recipient);
      for (const waiter of list) this.settle(waiter, null);
    }
    this.emit('bus:stopped', this.stats());
  }

  // ==========================================================================
  // Delivery
  // ==========================================================================

  /**
   * Unicast to `receiverId`, or broadcast to subscribers of `message.type`
   * when it is the wildcard. False means capacity rejection.
   */
  send(message: Message): boolean {
    this.assertRunning('send');
    this.messageTypes.set(message.type, (this.messageTypes.get(message.type) ?? 0) + 1);

    if (message.receiverId !== BROADCAST) {
      return this.enqueue({ ...message, id: message.id ?? randomUUID() });
    }

    this.counters.totalBroadcast++;
    const recipients = [...(this.subscriptions.get(message.type) ?? [])].filter((id) => id !== message.senderId);
    if (recipients.length === 0) {
      this.emit('warn', { message: `Broadcast of ${message.type} from ${message.senderId} has no subscribers` });
      return true;
    }

    let accepted = 0;
    for (const recipient of recipients) {
      const copy: Message = {
        ...message,
        id: randomUUID(),
        receiverId: recipient,
        payload: { ...message.payload },
        timestamp: this.clock(),
      };
      if (this.enqueue(copy)) accepted++;
    }
    return accepted > 0;
  }

  /**
   * Next message for `recipientId`, waiting up to `timeoutMs`. Null on timeout
   * or when the bus stops while waiting.
   */
  receive(recipientId: string, timeoutMs: number = this.config.messageTimeoutMs): Promise<Message | null> {
    this.assertRunning('receive');
    const queue = this.queues.get(recipientId);
    const queued = queue?.shift();
    if (queue?.isEmpty) this.queues.delete(recipientId);
    if (queued) return Promise.resolve(this.delivered(queued));
    if (!(timeoutMs > 0)) return Promise.resolve(null);

    return new Promise((resolve) => {
      const waiter: Waiter = { resolve, timer: null };
      waiter.timer = setTimeout(() => {
        this.dropWaiter(recipientId, waiter);
        this.settle(waiter, null);
      }, timeoutMs);
      const list = this.waiters.get(recipientId) ?? [];
      list.push(waiter);
      this.waiters.set(recipientId, list);
    });
  }

  private enqueue(message: Message): boolean {
    const recipient = message.receiverId;
    const waiter = this.waiters.get(recipient)?.shift();
    if (waiter) {
      if (this.waiters.get(recipient)?.length === 0) this.waiters.delete(recipient);
      this.counters.totalSent++;
      this.settle(waiter, this.delivered(message));
      return true;
    }

    let queue = this.queues.get(recipient);
    if (!queue) {
      queue = new RingBuffer<Message>(this.config.maxQueueSize);
      this.queues.set(recipient, queue);
    }
    if (queue.isFull) {
      this.counters.failedDeliveries++;
      this.emit('bus:rejected', { recipient, type: message.type, queueSize: queue.size });
      return false;
    }
    queue.push(message);
    this.counters.totalSent++;
    return true;
  }

  private delivered(message: Message): Message {
    this.counters.totalReceived++;
    this.deliveryTimes.push(Math.max(0, this.clock() - message.timestamp));
    return message;
  }

  private settle(waiter: Waiter, message: Message | null): void {
    if (waiter.timer) clearTimeout(waiter.timer);
    waiter.timer = null;
    waiter.resolve(message);
  }

  private dropWaiter(recipient: string, waiter: Waiter): void {
    const list = this.waiters.get(recipient);
    if (!list) return;
    const index = list.indexOf(waiter);
    if (index >= 0) list.splice(index, 1);
    if (list.length === 0) this.waiters.delete(recipient);
  }

  private assertRunning(operation: string): void {
    if (this.stateValue !== 'running') throw new BusStoppedError(operation);
  }

  // ==========================================================================
  // Subscriptions
  // ==========================================================================

  subscribe(id: string, types: readonly string[]): void {
    for (const type of types) {
      let set = this.subscriptions.get(type);
      if (!set) {
        set = new Set();
        this.subscriptions.set(type, set);
      }
      set.add(id);
    }
  }

  /** Without `types`, removes `id` from every subscription. */
  unsubscribe(id: string, types?: readonly string[]): void {
    const targets = types ?? [...this.subscriptions.keys()];
    for (const type of targets) {
      const set = this.subscriptions.get(type);
      if (!set) continue;
      set.delete(id);
      if (set.size === 0) this.subscriptions.delete(type);
    }
  }

  subscribers(type: string): string[] {
    return [...(this.subscriptions.get(type) ?? [])];
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Drop expired messages from the head of every queue, forget emptied queues
   * and refresh the delivery-latency average. Returns how many messages expired.
   */
  sweep(): number {
    const now = this.clock();
    let total = 0;
    for (const [recipient, queue] of this.queues) {
      let expired = 0;
      for (let head = queue.peek(); head && now - head.timestamp > this.config.messageTimeoutMs; head = queue.peek()) {
        queue.shift();
        expired++;
      }
      if (queue.isEmpty) this.queues.delete(recipient);
      if (expired > 0) {
        this.emit('bus:expired', { recipient, count: expired });
        total += expired;
      }
    }
    this.counters.expired += total;
    this.refreshAverage();
    return total;
  }

  private refreshAverage(): void {
    const samples = this.deliveryTimes.toArray();
    this.averageDeliveryTime = samples.length > 0 ? samples.reduce((a, b) => a + b, 0) / samples.length : 0;
  }

  stats(): BusStats {
    this.refreshAverage();
    return {
      ...this.counters,
      averageDeliveryTime: this.averageDeliveryTime,
      messageTypes: Object.fromEntries(this.messageTypes),
    };
  }

  /** Recipients with at least one queued message. */
  get queueCount(): number {
    return this.queues.size;
  }

  queueStatus(): Record<string, QueueStatus> {
    const out: Record<string, QueueStatus> = {};
    for (const [recipient, queue] of this.queues) {
      out[recipient] = { size: queue.size, max: this.config.maxQueueSize, usage: queue.size / this.config.maxQueueSize };
    }
    return out;
  }

  /** Returns the number of messages dropped. */
  clearQueue(recipientId: string): number {
    const queue = this.queues.get(recipientId);
    if (!queue) return 0;
    this.queues.delete(recipientId);
    return queue.size;
  }

  clearAllQueues(): number {
    let dropped = 0;
    for (const recipient of this.queues.keys()) dropped += this.clearQueue(recipient);
    return dropped;
  }

  /** False when the bus is not running. Near-full queues and a high failure rate only warn. */
  healthCheck(): boolean {
    if (!this.isRunning) return false;
    for (const [recipient, status] of Object.entries(this.queueStatus())) {
      if (status.usage > 0.9) {
        this.emit('warn', { message: `Queue for ${recipient} is ${(status.usage * 100).toFixed(0)}% full` });
      }
    }
    const attempts = this.counters.totalSent + this.counters.failedDeliveries;
    if (attempts > 0 && this.counters.failedDeliveries / attempts > 0.1) {
      this.emit('warn', {
        message: `Delivery failure rate ${((this.counters.failedDeliveries / attempts) * 100).toFixed(1)}%`,
      });
    }
    return true;
  }
}
