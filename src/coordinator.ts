/**
 * Debate coordinator: three forward-only phases over a set of worker kinds.
 *
 *   initial_decision → feedback → final_decision → completed
 *
 * Each phase fans out one request per participating kind and waits for all of
 * them. A worker that fails is logged and left out of that phase's map; the
 * debate itself fails only when nobody survives phase 1 or nobody reaches
 * phase 3.
 *
 * Feedback is pairwise-asymmetric: each kind reacts to exactly one counterpart,
 * the first other survivor in participant order, and the final prompt pairs
 * the same two kinds.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { parseDetailedResponse, parseFinalAnswer } from './answers.js';
import { PhaseAbortedError, errorMessage } from './errors.js';
import type { MessageBus } from './bus.js';
import type { WorkerPool } from './pool.js';
import type { StageContext } from './prompts.js';
import { withTimeout } from './timeout.js';
import { abstainAggregate, majorityVote } from './voting.js';
import { MESSAGE_TYPES, type Worker } from './worker.js';
import {
  CULTURAL_KINDS,
  type Clock,
  type ConversationPhase,
  type DebateResult,
  type DebateStage,
  type DecisionEntry,
  type EventSink,
  type FeedbackEntry,
  type Message,
  type PhaseName,
  type Scenario,
  type WorkerKind,
  type WorkerResponse,
} from './types.js';

export type Transport = 'direct' | 'bus';

export interface CoordinatorConfig {
  participants: WorkerKind[];
  transport: Transport;
  /** Bus transport: how long each side waits for its message. */
  receiveTimeoutMs: number;
  /** Upper bound on one worker's task within a phase, acquisition included. */
  phaseTimeoutMs: number;
}

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  participants: [...CULTURAL_KINDS],
  transport: 'direct',
  receiveTimeoutMs: 120_000,
  phaseTimeoutMs: 600_000,
};

export interface CoordinatorOptions {
  clock?: Clock;
  onEvent?: EventSink;
  /** Required for the bus transport. */
  bus?: MessageBus;
}

export interface ConversationContext {
  conversationId: string;
  scenario: Scenario;
  participants: WorkerKind[];
  phase: ConversationPhase;
  responses: {
    initial: Partial<Record<WorkerKind, DecisionEntry>>;
    feedback: Partial<Record<WorkerKind, FeedbackEntry>>;
    final: Partial<Record<WorkerKind, DecisionEntry>>;
  };
  /** Per-worker failure reasons, by phase. */
  failures: Partial<Record<PhaseName, Partial<Record<WorkerKind, string>>>>;
  phaseDurations: Partial<Record<PhaseName, number>>;
  startedAt: number;
  endedAt?: number;
  error?: string;
}

export const COORDINATOR_ID = 'coordinator';
export const RESPONSE_TYPE = 'worker_response';

const ResponsePayloadSchema = z.object({
  workerId: z.string(),
  text: z.string(),
  confidence: z.number().min(0).max(1),
  metadata: z.record(z.unknown()),
  processingTime: z.number(),
});

/**
 * Worker side of the bus transport: take the next request off the worker's
 * queue, handle it and send the response to the request's sender.
 */
export async function serveNext(
  bus: MessageBus,
  worker: Worker,
  timeoutMs: number,
  clock: Clock = Date.now,
): Promise<boolean> {
  const request = await bus.receive(worker.id, timeoutMs);
  if (!request) return false;
  const response = await worker.handle(request);
  return bus.send({
    senderId: worker.id,
    receiverId: request.senderId,
    type: RESPONSE_TYPE,
    payload: { ...response },
    timestamp: clock(),
    conversationId: request.conversationId,
  });
}

export class DebateCoordinator {
  readonly config: Readonly<CoordinatorConfig>;
  private readonly contexts = new Map<string, ConversationContext>();
  private readonly clock: Clock;
  private readonly emit: EventSink;
  private readonly bus: MessageBus | undefined;

  constructor(
    private readonly pool: WorkerPool,
    config: Partial<CoordinatorConfig> = {},
    options: CoordinatorOptions = {},
  ) {
    this.config = Object.freeze({ ...DEFAULT_COORDINATOR_CONFIG, ...config });
    this.clock = options.clock ?? Date.now;
    this.emit = options.onEvent ?? (() => {});
    this.bus = options.bus;
    if (this.config.transport === 'bus' && !this.bus) {
      throw new Error('Bus transport requires a MessageBus');
    }
  }

  async runDebate(scenario: Scenario, kinds: readonly WorkerKind[] = this.config.participants): Promise<DebateResult> {
    const participants = [...new Set(kinds)];
    if (participants.length === 0) throw new Error('A debate needs at least one participant');

    const context: ConversationContext = {
      conversationId: randomUUID(),
      scenario: { ...scenario },
      participants,
      phase: 'initial_decision',
      responses: { initial: {}, feedback: {}, final: {} },
      failures: {},
      phaseDurations: {},
      startedAt: this.clock(),
    };
    this.contexts.set(context.conversationId, context);
    this.emit('debate:start', { conversationId: context.conversationId, participants, transport: this.config.transport });

    // Phase 1: INITIAL DECISION
    context.responses.initial = await this.runPhase(context, 'initial', participants, async (kind) => {
      const response = await this.request(kind, context, { stage: 'initial_decision', ...scenario });
      const { answer, explanation } = parseDetailedResponse(response.text);
      return { ...this.entry(response), parsedAnswer: answer, explanation };
    });
    const survivors = participants.filter((k) => context.responses.initial[k]);
    if (survivors.length === 0) this.abort(context, 'initial', 'no participant produced an initial decision');

    // Phase 2: FEEDBACK
    context.phase = 'feedback';
    const initial = context.responses.initial;
    const pairs = survivors.flatMap((kind) => {
      const counterpart = survivors.find((k) => k !== kind);
      return counterpart ? [{ kind, counterpart }] : [];
    });
    context.responses.feedback = await this.runPhase(context, 'feedback', pairs.map((p) => p.kind), async (kind) => {
      const counterpart = pairs.find((p) => p.kind === kind)?.counterpart ?? kind;
      const response = await this.request(kind, context, {
        stage: 'feedback',
        ...scenario,
        yourResponse: initial[kind]?.rawResponse ?? '',
        otherResponse: initial[counterpart]?.rawResponse ?? '',
      });
      return { ...this.entry(response), counterpart };
    });

    // Phase 3: FINAL DECISION
    const feedback = context.responses.feedback;
    const eligible = survivors.filter((k) => feedback[k]);
    if (eligible.length === 0) this.abort(context, 'feedback', 'no participant reached the final decision');
    context.phase = 'final_decision';
    context.responses.final = await this.runPhase(context, 'final', eligible, async (kind) => {
      const counterpart = feedback[kind]?.counterpart ?? kind;
      const response = await this.request(kind, context, {
        stage: 'final_decision',
        ...scenario,
        yourResponse: initial[kind]?.rawResponse ?? '',
        otherResponse: initial[counterpart]?.rawResponse ?? '',
        yourFeedback: feedback[kind]?.rawResponse ?? '',
        otherFeedback: feedback[counterpart]?.rawResponse ?? '',
      });
      return { ...this.entry(response), parsedAnswer: parseFinalAnswer(response.text) };
    });

    const finals = context.responses.final;
    const answers = participants.flatMap((k) => {
      const entry = finals[k];
      return entry ? [entry.parsedAnswer] : [];
    });
    if (answers.length === 0) this.abort(context, 'final', 'no participant produced a final decision');

    context.phase = 'completed';
    context.endedAt = this.clock();
    const aggregate = majorityVote(answers);
    const result: DebateResult = {
      conversationId: context.conversationId,
      scenario: context.scenario,
      participants,
      initialResponses: context.responses.initial,
      feedbackResponses: context.responses.feedback,
      finalResponses: context.responses.final,
      aggregate,
      phaseDurations: context.phaseDurations,
      duration: Math.max(0, context.endedAt - context.startedAt),
    };
    this.emit('debate:complete', { conversationId: result.conversationId, aggregate, duration: result.duration });
    return result;
  }

  getContext(conversationId: string): ConversationContext | undefined {
    return this.contexts.get(conversationId);
  }

  discardContext(conversationId: string): boolean {
    return this.contexts.delete(conversationId);
  }

  get contextCount(): number {
    return this.contexts.size;
  }

  // ==========================================================================
  // Phase plumbing
  // ==========================================================================

  /**
   * Fan `task` out over `kinds` and collect every outcome. Failures are
   * recorded on the context and left out of the returned map.
   */
  private async runPhase<T>(
    context: ConversationContext,
    phase: PhaseName,
    kinds: WorkerKind[],
    task: (kind: WorkerKind) => Promise<T>,
  ): Promise<Partial<Record<WorkerKind, T>>> {
    const { conversationId } = context;
    this.emit('phase', { conversationId, phase, kinds });
    const start = this.clock();

    const outcomes = await Promise.all(
      kinds.map(async (kind) => {
        try {
          const value = await withTimeout(task(kind), this.config.phaseTimeoutMs, `${phase} phase for ${kind}`);
          this.emit('response', { conversationId, phase, kind });
          return [kind, value] as const;
        } catch (err) {
          const reason = errorMessage(err);
          const failures = context.failures[phase] ?? {};
          failures[kind] = reason;
          context.failures[phase] = failures;
          this.emit('warn', { message: `${kind} failed in ${phase} phase: ${reason}` });
          return null;
        }
      }),
    );

    const results: Partial<Record<WorkerKind, T>> = {};
    for (const outcome of outcomes) {
      if (outcome) results[outcome[0]] = outcome[1];
    }
    const duration = this.clock() - start;
    context.phaseDurations[phase] = duration;
    this.emit('phase:done', {
      conversationId,
      phase,
      duration,
      succeeded: Object.keys(results).length,
      failed: kinds.length - Object.keys(results).length,
    });
    return results;
  }

  private abort(context: ConversationContext, phase: PhaseName, reason: string): never {
    context.phase = 'failed';
    context.endedAt = this.clock();
    context.error = reason;
    const aggregate = abstainAggregate();
    this.emit('debate:aborted', { conversationId: context.conversationId, phase, reason });
    throw new PhaseAbortedError(context.conversationId, phase, reason, aggregate);
  }

  private entry(response: WorkerResponse): { rawResponse: string; confidence: number; processingTime: number } {
    return {
      rawResponse: response.text,
      confidence: response.confidence,
      processingTime: response.processingTime,
    };
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  /** One request to one worker. Throws when the worker's reply is a failure. */
  private async request(kind: WorkerKind, context: ConversationContext, stage: StageContext & { stage: DebateStage }): Promise<WorkerResponse> {
    const message: Message = {
      senderId: COORDINATOR_ID,
      receiverId: kind,
      type: MESSAGE_TYPES.generate,
      payload: { prompt: '', context: { ...stage } },
      timestamp: this.clock(),
      conversationId: context.conversationId,
    };

    const response = await this.pool.use(kind, (worker) =>
      this.config.transport === 'bus' ? this.viaBus(worker, message) : worker.handle(message),
    );
    const error = response.metadata.error;
    if (typeof error === 'string') throw new Error(error);
    return response;
  }

  private async viaBus(worker: Worker, message: Message): Promise<WorkerResponse> {
    const bus = this.bus;
    if (!bus) throw new Error('Bus transport requires a MessageBus');

    const inbox = `${COORDINATOR_ID}:${message.conversationId}:${worker.kind}:${randomUUID().slice(0, 8)}`;
    const accepted = bus.send({ ...message, senderId: inbox, receiverId: worker.id });
    if (!accepted) throw new Error(`Queue for ${worker.id} is full`);

    const [served, reply] = await Promise.all([
      serveNext(bus, worker, this.config.receiveTimeoutMs, this.clock),
      bus.receive(inbox, this.config.receiveTimeoutMs),
    ]);
    if (!served) throw new Error(`${worker.id} did not answer over the bus`);
    if (!reply) throw new Error(`No reply from ${worker.id} within ${this.config.receiveTimeoutMs}ms`);
    if (reply.type !== RESPONSE_TYPE) throw new Error(`Unexpected reply type ${reply.type} from ${worker.id}`);
    return ResponsePayloadSchema.parse(reply.payload);
  }
}
