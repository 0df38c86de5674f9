/**
 * In-process stand-ins shared by the test suites: a scripted text generator,
 * a manual clock and worker config builders.
 */

import { getPersona } from '../src/personas.js';
import { DEFAULT_TEMPLATES } from '../src/prompts.js';
import { Worker, type WorkerConfig, type WorkerFactory } from '../src/worker.js';
import type { Clock, EventSink, Message, Scenario, TextGenerator, WorkerKind } from '../src/types.js';

export type Reply = (prompt: string) => string | Promise<string>;

export interface ScriptedOptions {
  name?: string;
  /** Resolve initialize() with false. */
  failInit?: boolean;
  /** Reject initialize() with this error. */
  initError?: Error;
  /** Awaited at the start of initialize(). */
  beforeInit?: () => Promise<void>;
  /** Counts generators inside initialize(). */
  initializing?: Gauge;
  /** Counts generators between a successful initialize() and cleanup(). */
  live?: Gauge;
  /** cleanup() never settles. */
  hangCleanup?: boolean;
}

export interface Gauge {
  current: number;
  peak: number;
}

export function gauge(): Gauge {
  return { current: 0, peak: 0 };
}

function raise(g: Gauge | undefined): void {
  if (!g) return;
  g.current++;
  g.peak = Math.max(g.peak, g.current);
}

function lower(g: Gauge | undefined): void {
  if (g) g.current--;
}

export class ScriptedGenerator implements TextGenerator {
  readonly name: string;
  readonly prompts: string[] = [];
  cleanups = 0;
  private ready = false;

  constructor(
    private readonly reply: Reply,
    private readonly options: ScriptedOptions = {},
  ) {
    this.name = options.name ?? 'scripted';
  }

  async initialize(): Promise<boolean> {
    raise(this.options.initializing);
    try {
      await this.options.beforeInit?.();
      if (this.options.initError) throw this.options.initError;
      this.ready = !this.options.failInit;
      if (this.ready) raise(this.options.live);
      return this.ready;
    } finally {
      lower(this.options.initializing);
    }
  }

  async generate(prompt: string): Promise<string> {
    if (!this.ready) throw new Error('generate() before initialize()');
    this.prompts.push(prompt);
    return this.reply(prompt);
  }

  async cleanup(): Promise<boolean> {
    this.cleanups++;
    if (this.options.hangCleanup) return new Promise<boolean>(() => {});
    if (this.ready) lower(this.options.live);
    this.ready = false;
    return true;
  }
}

export type Stage = 'initial' | 'feedback' | 'final';

/** Which default template produced `prompt`. */
export function stageOf(prompt: string): Stage {
  const end = prompt.trimEnd();
  if (end.endsWith('Final answer:')) return 'final';
  if (end.endsWith('Feedback:')) return 'feedback';
  return 'initial';
}

export function workerConfig(kind: WorkerKind, overrides: Partial<WorkerConfig> = {}): WorkerConfig {
  return {
    persona: getPersona(kind),
    maxHistory: 10,
    maxNewTokens: 64,
    temperature: 0,
    requestTimeoutMs: 1_000,
    initTimeoutMs: 1_000,
    templates: { ...DEFAULT_TEMPLATES },
    ...overrides,
  };
}

export interface ManualClock {
  now: Clock;
  advance(ms: number): void;
  set(ms: number): void;
}

export function manualClock(start = 1_000): ManualClock {
  let t = start;
  return {
    now: () => t,
    advance: (ms) => {
      t += ms;
    },
    set: (ms) => {
      t = ms;
    },
  };
}

/**
 * Factory that builds workers over scripted generators and keeps every
 * generator it made, in creation order.
 */
export function scriptedFactory(
  reply: (kind: WorkerKind) => Reply,
  options: { clock?: Clock; onEvent?: EventSink; generator?: (kind: WorkerKind) => ScriptedOptions } = {},
): { factory: WorkerFactory; generators: Array<{ kind: WorkerKind; generator: ScriptedGenerator }> } {
  const generators: Array<{ kind: WorkerKind; generator: ScriptedGenerator }> = [];
  const factory: WorkerFactory = (id, kind, config) => {
    const generator = new ScriptedGenerator(reply(kind), options.generator?.(kind));
    generators.push({ kind, generator });
    return new Worker(id, kind, config, generator, { clock: options.clock, onEvent: options.onEvent });
  };
  return { factory, generators };
}

export function message(overrides: Partial<Message> = {}): Message {
  return {
    senderId: 'tester',
    receiverId: 'worker',
    type: 'generate_response',
    payload: {},
    timestamp: 1_000,
    conversationId: 'conv-1',
    ...overrides,
  };
}

export const EGYPT: Scenario = {
  country: 'egypt',
  story: 'At a formal business meeting, Sam arrived in casual clothes while everyone else wore suits.',
  ruleOfThumb: 'Formal dress signals respect',
};

/** Resolve on the next macrotask so queued microtasks settle first. */
export const flush = (): Promise<void> => new Promise((r) => setImmediate(r));

export function deferred<T>(): { promise: Promise<T>; resolve(value: T): void; reject(err: unknown): void } {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
