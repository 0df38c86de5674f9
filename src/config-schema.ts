import { z } from 'zod';
import { WORKER_KINDS, CULTURAL_KINDS } from './types.js';

// Durations are in seconds here and converted to milliseconds at the edge.

const seconds = z.number().nonnegative();
const fraction = z.number().min(0).max(1);

export const WorkerKindSchema = z.enum(WORKER_KINDS);

export const ProviderSettingsSchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1),
    baseUrl: z.string().optional(),
    apiKeyEnv: z.string().optional(),
    timeout: seconds.optional(),
  })
  .strict();

const TemplatesSchema = z
  .object({
    initial_decision: z.string(),
    feedback: z.string(),
    final_decision: z.string(),
    custom: z.string(),
    consultation: z.string(),
  })
  .partial()
  .strict();

export const WorkerSettingsSchema = z
  .object({
    provider: ProviderSettingsSchema.optional(),
    maxNewTokens: z.number().int().positive().default(512),
    temperature: z.number().min(0).max(2).default(0),
    maxHistory: z.number().int().positive().default(100),
    requestTimeout: seconds.default(120),
    templates: TemplatesSchema.default({}),
  })
  .strict();

export const PoolSettingsSchema = z
  .object({
    maxActiveWorkers: z.number().int().positive().default(3),
    idleTimeout: seconds.default(300),
    memoryThreshold: fraction.default(0.8),
    criticalMemoryThreshold: fraction.default(0.9),
    cleanupInterval: z.number().positive().default(60),
    acquireTimeout: seconds.default(600),
    initTimeout: seconds.default(300),
  })
  .strict();

export const BusSettingsSchema = z
  .object({
    maxQueueSize: z.number().int().positive().default(1000),
    messageTimeout: seconds.default(30),
    retryAttempts: z.number().int().nonnegative().default(3),
    sweepInterval: z.number().positive().default(0.5),
    deliveryWindow: z.number().int().positive().default(100),
  })
  .strict();

export const DebateSettingsSchema = z
  .object({
    participants: z.array(WorkerKindSchema).min(1).default([...CULTURAL_KINDS]),
    transport: z.enum(['direct', 'bus']).default('direct'),
    receiveTimeout: seconds.default(120),
    phaseTimeout: seconds.default(600),
  })
  .strict();

export const AgoraConfigSchema = z
  .object({
    provider: ProviderSettingsSchema.default({ provider: 'ollama', model: 'llama3.1:8b', baseUrl: 'http://localhost:11434/v1' }),
    pool: PoolSettingsSchema.default({}),
    bus: BusSettingsSchema.default({}),
    debate: DebateSettingsSchema.default({}),
    workers: z.record(WorkerKindSchema, WorkerSettingsSchema.partial()).default({}),
    defaults: WorkerSettingsSchema.default({}),
    sessionDir: z.string().optional(),
  })
  .strict();

export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type WorkerSettings = z.infer<typeof WorkerSettingsSchema>;
export type PoolSettings = z.infer<typeof PoolSettingsSchema>;
export type BusSettings = z.infer<typeof BusSettingsSchema>;
export type DebateSettings = z.infer<typeof DebateSettingsSchema>;
export type AgoraConfig = z.infer<typeof AgoraConfigSchema>;
/** What a YAML file may contain: every field optional. */
export type AgoraConfigInput = z.input<typeof AgoraConfigSchema>;
