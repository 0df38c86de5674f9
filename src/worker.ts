/**
 * A worker is one live persona instance backed by a TextGenerator.
 *
 * Lifecycle: inactive → loading → active ⇄ processing, unloading → inactive on
 * teardown, error reachable from anywhere. `handle` produces exactly one
 * response per message and never throws.
 */

import { z } from 'zod';
import { RingBuffer } from './ring-buffer.js';
import { withTimeout } from './timeout.js';
import { errorMessage } from './errors.js';
import type { Persona } from './personas.js';
import { buildConsultationPrompt, buildStagePrompt, type PromptTemplates } from './prompts.js';
import type {
  Clock,
  EventSink,
  Message,
  TextGenerator,
  WorkerKind,
  WorkerResponse,
  WorkerStatus,
} from './types.js';

export interface WorkerConfig {
  persona: Persona;
  maxHistory: number;
  maxNewTokens: number;
  temperature: number;
  requestTimeoutMs: number;
  initTimeoutMs: number;
  templates: PromptTemplates;
}

export interface WorkerOptions {
  clock?: Clock;
  onEvent?: EventSink;
}

export interface WorkerPerformance {
  requestCount: number;
  totalProcessingTime: number;
  averageProcessingTime: number;
  lastActivity: number;
  status: WorkerStatus;
}

export type WorkerFactory = (id: string, kind: WorkerKind, config: WorkerConfig) => Worker;

const TRANSITIONS: Record<WorkerStatus, readonly WorkerStatus[]> = {
  inactive: ['loading', 'error'],
  loading: ['active', 'error'],
  active: ['processing', 'unloading', 'error'],
  processing: ['active', 'error'],
  error: ['unloading'],
  unloading: ['inactive', 'error'],
};

export const MESSAGE_TYPES = {
  generate: 'generate_response',
  consultation: 'cultural_consultation',
  valueAssessment: 'value_assessment',
} as const;

const StageContextSchema = z.object({
  stage: z.enum(['initial_decision', 'feedback', 'final_decision', 'custom']).default('custom'),
  country: z.string().default(''),
  story: z.string().default(''),
  ruleOfThumb: z.string().default(''),
  yourResponse: z.string().optional(),
  otherResponse: z.string().optional(),
  yourFeedback: z.string().optional(),
  otherFeedback: z.string().optional(),
});

const GeneratePayloadSchema = z.object({
  prompt: z.string().default(''),
  context: StageContextSchema.default({}),
});

const ConsultationPayloadSchema = z.object({
  scenario: z.string().default(''),
  question: z.string().default(''),
});

const ValueAssessmentPayloadSchema = z.object({
  values: z.array(z.string()).default([]),
});

export class Worker {
  readonly config: Readonly<WorkerConfig>;
  private statusValue: WorkerStatus = 'inactive';
  private readonly history: RingBuffer<Message>;
  private readonly clock: Clock;
  private readonly emit: EventSink;
  private requestCount = 0;
  private totalProcessingTime = 0;
  private lastActivity: number;
  private inflight: Promise<WorkerResponse> | null = null;
  private releasing: Promise<boolean> | null = null;
  private holds = 0;
  private drainWaiters: Array<() => void> = [];

  constructor(
    readonly id: string,
    readonly kind: WorkerKind,
    config: WorkerConfig,
    private readonly generator: TextGenerator,
    options?: WorkerOptions,
  ) {
    this.config = Object.freeze({ ...config, templates: Object.freeze({ ...config.templates }) });
    this.history = new RingBuffer<Message>(Math.max(1, config.maxHistory));
    this.clock = options?.clock ?? Date.now;
    this.emit = options?.onEvent ?? (() => {});
    this.lastActivity = this.clock();
  }

  get status(): WorkerStatus {
    return this.statusValue;
  }

  get persona(): Persona {
    return this.config.persona;
  }

  async initialize(): Promise<boolean> {
    if (this.statusValue !== 'inactive') return this.statusValue === 'active';
    this.setStatus('loading');
    this.emit('worker:loading', { worker: this.id, generator: this.generator.name });
    try {
      const ok = await withTimeout(this.generator.initialize(), this.config.initTimeoutMs, `${this.id} initialize`);
      if (!ok) {
        this.setStatus('error');
        this.emit('warn', { message: `${this.id}: generator reported initialization failure` });
        return false;
      }
      this.setStatus('active');
      this.lastActivity = this.clock();
      this.emit('worker:ready', { worker: this.id });
      return true;
    } catch (err) {
      this.setStatus('error');
      this.emit('warn', { message: `${this.id} initialization error: ${errorMessage(err)}` });
      return false;
    }
  }

  async handle(message: Message): Promise<WorkerResponse> {
    const started = this.clock();
    if (this.statusValue !== 'active') {
      return this.failure(message, started, new Error(`Worker ${this.id} is ${this.statusValue}`));
    }
    const run = this.process(message, started);
    this.inflight = run;
    try {
      return await run;
    } finally {
      this.inflight = null;
      this.notifyDrained();
    }
  }

  /**
   * Pin the worker for the caller. Teardown waits until every hold is dropped.
   * The returned disposer is safe to call more than once.
   */
  retain(): () => void {
    this.holds++;
    let dropped = false;
    return () => {
      if (dropped) return;
      dropped = true;
      this.holds--;
      this.notifyDrained();
    };
  }

  get isHeld(): boolean {
    return this.holds > 0;
  }

  /**
   * Tear down the generator. Concurrent and repeated calls share one teardown;
   * an in-flight request finishes first.
   */
  release(): Promise<boolean> {
    if (this.releasing) return this.releasing;
    if (this.statusValue === 'inactive') return Promise.resolve(true);
    this.releasing = (async () => {
      await this.drained();
      this.setStatus('unloading');
      try {
        const ok = await withTimeout(this.generator.cleanup(), this.config.initTimeoutMs, `${this.id} cleanup`);
        this.setStatus('inactive');
        this.emit('worker:released', { worker: this.id });
        return ok;
      } catch (err) {
        this.setStatus('error');
        this.emit('warn', { message: `${this.id} cleanup error: ${errorMessage(err)}` });
        return false;
      }
    })();
    return this.releasing;
  }

  isIdle(thresholdMs: number, now: number = this.clock()): boolean {
    return this.holds === 0 && this.statusValue !== 'processing' && now - this.lastActivity > thresholdMs;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  getHistory(limit?: number): Message[] {
    return limit === undefined ? this.history.toArray() : this.history.tail(limit);
  }

  performance(): WorkerPerformance {
    return {
      requestCount: this.requestCount,
      totalProcessingTime: this.totalProcessingTime,
      averageProcessingTime: this.requestCount > 0 ? this.totalProcessingTime / this.requestCount : 0,
      lastActivity: this.lastActivity,
      status: this.statusValue,
    };
  }

  /** Length-based confidence, boosted by the persona's value keywords. */
  scoreConfidence(text: string): number {
    const { minLength, fullLength, baseCeiling, keywords, keywordBoost, maxBoost, ceiling } = this.config.persona.scoring;
    const length = text.trim().length;
    const base = length < minLength ? 0.1 : Math.min(baseCeiling, length / fullLength);
    const lower = text.toLowerCase();
    const matched = keywords.filter((k) => lower.includes(k.toLowerCase())).length;
    return Math.min(ceiling, base + Math.min(maxBoost, matched * keywordBoost));
  }

  private async process(message: Message, started: number): Promise<WorkerResponse> {
    this.setStatus('processing');
    this.history.push(message);
    this.lastActivity = started;
    try {
      const text = await this.dispatch(message);
      const processingTime = this.clock() - started;
      this.requestCount++;
      this.totalProcessingTime += processingTime;
      this.setStatus('active');
      return {
        workerId: this.id,
        text,
        confidence: this.scoreConfidence(text),
        metadata: {
          messageType: message.type,
          conversationId: message.conversationId,
          timestamp: this.clock(),
        },
        processingTime,
      };
    } catch (err) {
      this.setStatus('error');
      return this.failure(message, started, err);
    }
  }

  private async dispatch(message: Message): Promise<string> {
    switch (message.type) {
      case MESSAGE_TYPES.generate: {
        const { prompt, context } = GeneratePayloadSchema.parse(message.payload);
        return this.generate(buildStagePrompt(this.persona, context, prompt, this.config.templates));
      }
      case MESSAGE_TYPES.consultation: {
        const { scenario, question } = ConsultationPayloadSchema.parse(message.payload);
        return this.generate(buildConsultationPrompt(this.persona, scenario, question, this.config.templates));
      }
      case MESSAGE_TYPES.valueAssessment: {
        const { values } = ValueAssessmentPayloadSchema.parse(message.payload);
        return this.assessValues(values);
      }
      default:
        return `Received message type: ${message.type}`;
    }
  }

  private generate(prompt: string): Promise<string> {
    return withTimeout(
      this.generator.generate(prompt, {
        maxTokens: this.config.maxNewTokens,
        temperature: this.config.temperature,
      }),
      this.config.requestTimeoutMs,
      `${this.id} generate`,
    );
  }

  private assessValues(values: string[]): string {
    const own = this.persona.values.map((v) => v.toLowerCase());
    const norms = Object.values(this.persona.norms).map((n) => n.toLowerCase());
    const lines = values.map((value) => {
      const v = value.toLowerCase();
      const importance = own.includes(v) ? 'high' : norms.some((n) => n.includes(v)) ? 'medium' : 'low';
      return `${value}: ${importance} importance`;
    });
    return [`Value assessment from the ${this.persona.displayName} perspective:`, ...lines].join('\n');
  }

  private failure(message: Message, started: number, err: unknown): WorkerResponse {
    const reason = errorMessage(err);
    this.emit('worker:error', { worker: this.id, messageType: message.type, error: reason });
    return {
      workerId: this.id,
      text: `Error processing message: ${reason}`,
      confidence: 0,
      metadata: { error: reason, messageType: message.type, timestamp: this.clock() },
      processingTime: this.clock() - started,
    };
  }

  private drained(): Promise<void> {
    if (this.holds === 0 && !this.inflight) return Promise.resolve();
    return new Promise((resolve) => this.drainWaiters.push(resolve));
  }

  private notifyDrained(): void {
    if (this.holds > 0 || this.inflight) return;
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private setStatus(next: WorkerStatus): void {
    if (next === this.statusValue) return;
    if (next !== 'error' && !TRANSITIONS[this.statusValue].includes(next)) {
      throw new Error(`Invalid worker transition ${this.statusValue} → ${next} (${this.id})`);
    }
    this.statusValue = next;
  }
}
