import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { parse, stringify } from 'yaml';
import {
  AgoraConfigSchema,
  type AgoraConfig,
  type AgoraConfigInput,
  type ProviderSettings,
  type WorkerSettings,
} from './config-schema.js';
import { ConfigError, errorMessage } from './errors.js';
import type { BusConfig } from './bus.js';
import type { CoordinatorConfig } from './coordinator.js';
import type { PoolConfig } from './pool.js';
import type { WorkerKind } from './types.js';

export const CONFIG_DIR = join(homedir(), '.agora');
export const CONFIG_PATH = join(CONFIG_DIR, 'config.yaml');
export const LOCAL_CONFIG_NAME = 'agora.yaml';

export interface LoadConfigOptions {
  /** Explicit file; skips the lookup. */
  path?: string;
  cwd?: string;
  /** Global config file, defaults to ~/.agora/config.yaml */
  globalPath?: string;
}

export interface LoadedConfig {
  config: AgoraConfig;
  /** File the config came from, or null for built-in defaults. */
  source: string | null;
}

export function defaultConfig(): AgoraConfig {
  return AgoraConfigSchema.parse({});
}

/** Parse YAML text into a validated config. */
export function parseConfig(raw: string, source?: string): AgoraConfig {
  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${errorMessage(err)}`, source);
  }
  const result = AgoraConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(details, source);
  }
  return result.data;
}

/**
 * Project-local agora.yaml first, then the global file, then defaults.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const candidates = options.path
    ? [options.path]
    : [join(options.cwd ?? process.cwd(), LOCAL_CONFIG_NAME), options.globalPath ?? CONFIG_PATH];

  for (const path of candidates) {
    if (!existsSync(path)) {
      if (options.path) throw new ConfigError('file not found', path);
      continue;
    }
    const raw = await readFile(path, 'utf-8');
    return { config: parseConfig(raw, path), source: path };
  }
  return { config: defaultConfig(), source: null };
}

export async function saveConfig(config: AgoraConfig | AgoraConfigInput, path: string = CONFIG_PATH): Promise<string> {
  const validated = AgoraConfigSchema.parse(config);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, stringify(validated), { encoding: 'utf-8', mode: 0o600 });
  return path;
}

// ============================================================================
// Seconds in config → milliseconds at the edge
// ============================================================================

const ms = (seconds: number): number => Math.round(seconds * 1000);

export function poolConfigFrom(config: AgoraConfig): PoolConfig {
  const { pool } = config;
  return {
    maxActiveWorkers: pool.maxActiveWorkers,
    idleTimeoutMs: ms(pool.idleTimeout),
    memoryThreshold: pool.memoryThreshold,
    criticalMemoryThreshold: pool.criticalMemoryThreshold,
    cleanupIntervalMs: ms(pool.cleanupInterval),
    acquireTimeoutMs: ms(pool.acquireTimeout),
  };
}

export function busConfigFrom(config: AgoraConfig): BusConfig {
  const { bus } = config;
  return {
    maxQueueSize: bus.maxQueueSize,
    messageTimeoutMs: ms(bus.messageTimeout),
    retryAttempts: bus.retryAttempts,
    sweepIntervalMs: ms(bus.sweepInterval),
    deliveryWindow: bus.deliveryWindow,
  };
}

export function coordinatorConfigFrom(config: AgoraConfig): CoordinatorConfig {
  const { debate } = config;
  return {
    participants: [...debate.participants],
    transport: debate.transport,
    receiveTimeoutMs: ms(debate.receiveTimeout),
    phaseTimeoutMs: ms(debate.phaseTimeout),
  };
}

/** Worker defaults overlaid with the kind's own section. */
export function workerSettingsFor(config: AgoraConfig, kind: WorkerKind): WorkerSettings {
  const override = config.workers[kind] ?? {};
  return {
    ...config.defaults,
    ...override,
    templates: { ...config.defaults.templates, ...override.templates },
  };
}

export function providerFor(config: AgoraConfig, kind: WorkerKind): ProviderSettings {
  return workerSettingsFor(config, kind).provider ?? config.provider;
}

export function initTimeoutMs(config: AgoraConfig): number {
  return ms(config.pool.initTimeout);
}

export function requestTimeoutMs(settings: WorkerSettings): number {
  return ms(settings.requestTimeout);
}
