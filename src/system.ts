/**
 * DebateSystem owns one pool, one bus and one coordinator built from config,
 * and registers every worker kind with a persona-backed factory.
 */

import { MessageBus } from './bus.js';
import {
  busConfigFrom,
  coordinatorConfigFrom,
  initTimeoutMs,
  poolConfigFrom,
  providerFor,
  requestTimeoutMs,
  workerSettingsFor,
} from './config.js';
import type { AgoraConfig } from './config-schema.js';
import { DebateCoordinator } from './coordinator.js';
import { getPersona, loadPersonaTable, type PersonaTable } from './personas.js';
import { WorkerPool } from './pool.js';
import { createGenerator, type ProviderConfig } from './providers/base.js';
import { Worker, type WorkerConfig } from './worker.js';
import {
  WORKER_KINDS,
  type BusStats,
  type Clock,
  type DebateResult,
  type EventSink,
  type PoolStats,
  type Scenario,
  type TextGenerator,
  type WorkerKind,
} from './types.js';

export type GeneratorFactory = (kind: WorkerKind, provider: ProviderConfig) => TextGenerator;

export interface DebateSystemOptions {
  onEvent?: EventSink;
  clock?: Clock;
  memoryProbe?: () => number;
  /** Replaces the pi-ai backed generator, e.g. with a scripted one in tests. */
  generatorFactory?: GeneratorFactory;
  personas?: PersonaTable;
}

export interface SystemStats {
  pool: PoolStats;
  bus: BusStats;
  conversations: number;
}

export class DebateSystem {
  readonly pool: WorkerPool;
  readonly bus: MessageBus;
  readonly coordinator: DebateCoordinator;
  private readonly emit: EventSink;
  private started = false;

  constructor(
    readonly config: AgoraConfig,
    options: DebateSystemOptions = {},
  ) {
    this.emit = options.onEvent ?? (() => {});
    const shared = { clock: options.clock, onEvent: this.emit };
    this.pool = new WorkerPool(poolConfigFrom(config), { ...shared, memoryProbe: options.memoryProbe });
    this.bus = new MessageBus(busConfigFrom(config), shared);
    this.coordinator = new DebateCoordinator(this.pool, coordinatorConfigFrom(config), { ...shared, bus: this.bus });

    const table = options.personas ?? loadPersonaTable();
    const makeGenerator = options.generatorFactory ?? ((kind, provider) => createGenerator(provider, `${kind}@${provider.provider}/${provider.model}`));

    for (const kind of WORKER_KINDS) {
      const settings = workerSettingsFor(config, kind);
      const workerConfig: WorkerConfig = {
        persona: getPersona(kind, table),
        maxHistory: settings.maxHistory,
        maxNewTokens: settings.maxNewTokens,
        temperature: settings.temperature,
        requestTimeoutMs: requestTimeoutMs(settings),
        initTimeoutMs: initTimeoutMs(config),
        templates: settings.templates,
      };
      const provider = providerFor(config, kind);
      this.pool.register(
        kind,
        (id, k, cfg) => new Worker(id, k, cfg, makeGenerator(k, provider), shared),
        workerConfig,
      );
    }
  }

  get isStarted(): boolean {
    return this.started;
  }

  /** Start the bus sweep and pool maintenance. */
  start(): void {
    if (this.started) return;
    this.bus.start();
    this.pool.start();
    this.started = true;
    this.emit('system:started', { kinds: WORKER_KINDS.length });
  }

  runDebate(scenario: Scenario, kinds?: readonly WorkerKind[]): Promise<DebateResult> {
    return this.coordinator.runDebate(scenario, kinds);
  }

  discardContext(conversationId: string): boolean {
    return this.coordinator.discardContext(conversationId);
  }

  stats(): SystemStats {
    return {
      pool: this.pool.stats(),
      bus: this.bus.stats(),
      conversations: this.coordinator.contextCount,
    };
  }

  async healthCheck(): Promise<boolean> {
    const poolOk = await this.pool.healthCheck();
    const busOk = this.bus.healthCheck();
    return poolOk && busOk;
  }

  /** Stop the bus, stop pool maintenance, then release every worker. */
  async shutdown(): Promise<void> {
    try {
      await this.bus.stop();
      await this.pool.stop();
    } finally {
      await this.pool.releaseAll();
      this.started = false;
    }
    this.emit('system:stopped', {});
  }
}
