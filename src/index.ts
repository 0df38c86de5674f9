export * from './types.js';
export * from './errors.js';
export { RingBuffer } from './ring-buffer.js';
export { withTimeout, PeriodicTask } from './timeout.js';
export { Worker, MESSAGE_TYPES, type WorkerConfig, type WorkerFactory, type WorkerOptions, type WorkerPerformance } from './worker.js';
export { WorkerPool, DEFAULT_POOL_CONFIG, heapFraction, type Lease, type PoolConfig, type PoolOptions, type WorkerInfo } from './pool.js';
export { MessageBus, DEFAULT_BUS_CONFIG, type BusConfig, type BusOptions, type QueueStatus } from './bus.js';
export {
  DebateCoordinator,
  DEFAULT_COORDINATOR_CONFIG,
  serveNext,
  type ConversationContext,
  type CoordinatorConfig,
  type CoordinatorOptions,
  type Transport,
} from './coordinator.js';
export { DebateSystem, type DebateSystemOptions, type GeneratorFactory, type SystemStats } from './system.js';
export { majorityVote, answerDistribution } from './voting.js';
export { parseFinalAnswer, parseDetailedResponse } from './answers.js';
export { loadPersonaTable, getPersona, culturalSimilarity, type Persona, type PersonaTable } from './personas.js';
export { DEFAULT_TEMPLATES, renderTemplate, type PromptTemplates } from './prompts.js';
export { loadConfig, saveConfig, parseConfig, defaultConfig } from './config.js';
export type { AgoraConfig } from './config-schema.js';
export { createGenerator, type ProviderConfig } from './providers/base.js';
export { SessionStore } from './session.js';
export { runBatch, loadScenarios, writeResults, summarize, type BatchItemResult, type BatchSummary } from './batch.js';
