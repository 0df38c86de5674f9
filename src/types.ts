/**
 * Core types for Agora
 */

// --- Worker kinds ---

export const CULTURAL_KINDS = [
  'cultural_christian',
  'cultural_islamic',
  'cultural_buddhist',
  'cultural_hindu',
  'cultural_traditional',
] as const;

export const ROLE_KINDS = ['conflict_detector', 'mediator', 'decision_maker'] as const;

export const WORKER_KINDS = [...CULTURAL_KINDS, ...ROLE_KINDS] as const;

export type CulturalKind = (typeof CULTURAL_KINDS)[number];
export type WorkerKind = (typeof WORKER_KINDS)[number];

export function isWorkerKind(value: string): value is WorkerKind {
  return WORKER_KINDS.some((kind) => kind === value);
}

export type WorkerStatus = 'inactive' | 'loading' | 'active' | 'processing' | 'error' | 'unloading';

// --- Messages ---

export type Payload = Record<string, unknown>;

export interface Message {
  /** Assigned by the bus when the message is framed for a recipient. */
  id?: string;
  senderId: string;
  /** Concrete recipient id, or BROADCAST for topic fan-out. */
  receiverId: string;
  type: string;
  payload: Payload;
  /** epoch ms */
  timestamp: number;
  conversationId: string;
}

export const BROADCAST = '*';

export interface WorkerResponse {
  workerId: string;
  text: string;
  /** 0..1 */
  confidence: number;
  metadata: Payload;
  /** ms */
  processingTime: number;
}

// --- Debate ---

export type Answer = 'yes' | 'no' | 'neither';

/** Canonical order; also the tie-break order for majority votes. */
export const ANSWERS: readonly Answer[] = ['yes', 'no', 'neither'];

export type DebateStage = 'initial_decision' | 'feedback' | 'final_decision';

export interface Scenario {
  country: string;
  story: string;
  ruleOfThumb: string;
}

export interface DecisionEntry {
  rawResponse: string;
  parsedAnswer: Answer;
  explanation?: string;
  confidence: number;
  processingTime: number;
}

export interface FeedbackEntry {
  rawResponse: string;
  /** Kind whose initial answer this feedback reacts to. */
  counterpart: WorkerKind;
  confidence: number;
  processingTime: number;
}

export type PhaseName = 'initial' | 'feedback' | 'final';

export type ConversationPhase = 'initial_decision' | 'feedback' | 'final_decision' | 'completed' | 'failed';

export interface Aggregate {
  answer: Answer;
  counts: Record<Answer, number>;
  confidence: number;
}

export interface DebateResult {
  conversationId: string;
  scenario: Scenario;
  participants: WorkerKind[];
  initialResponses: Partial<Record<WorkerKind, DecisionEntry>>;
  feedbackResponses: Partial<Record<WorkerKind, FeedbackEntry>>;
  finalResponses: Partial<Record<WorkerKind, DecisionEntry>>;
  aggregate: Aggregate;
  phaseDurations: Partial<Record<PhaseName, number>>;
  /** ms */
  duration: number;
}

// --- Collaborators ---

/**
 * The opaque "produce a text reply" capability a worker wraps.
 */
export interface TextGenerator {
  name: string;
  initialize(): Promise<boolean>;
  generate(prompt: string, context: GenerationContext): Promise<string>;
  cleanup(): Promise<boolean>;
}

export interface GenerationContext {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export type EventSink = (event: string, data: unknown) => void;

export type Clock = () => number;

// --- Stats ---

export interface PoolStats {
  registeredCount: number;
  activeCount: number;
  loadingCount: number;
  memoryFraction: number;
  cacheHitRate: number;
  requests: number;
  hits: number;
  loads: number;
  unloads: number;
}

export interface BusStats {
  totalSent: number;
  totalReceived: number;
  totalBroadcast: number;
  failedDeliveries: number;
  expired: number;
  /** ms, rolling over the delivery window */
  averageDeliveryTime: number;
  messageTypes: Record<string, number>;
}
