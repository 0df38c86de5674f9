import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  busConfigFrom,
  coordinatorConfigFrom,
  defaultConfig,
  initTimeoutMs,
  loadConfig,
  parseConfig,
  poolConfigFrom,
  providerFor,
  requestTimeoutMs,
  saveConfig,
  workerSettingsFor,
} from './config.js';
import { ConfigError } from './errors.js';
import { CULTURAL_KINDS } from './types.js';

describe('parseConfig', () => {
  it('fills every default from an empty document', () => {
    const config = parseConfig('');
    expect(config).toEqual(defaultConfig());
    expect(config.provider).toEqual({ provider: 'ollama', model: 'llama3.1:8b', baseUrl: 'http://localhost:11434/v1' });
    expect(config.pool.maxActiveWorkers).toBe(3);
    expect(config.debate.participants).toEqual([...CULTURAL_KINDS]);
    expect(config.debate.transport).toBe('direct');
    expect(config.defaults.maxNewTokens).toBe(512);
  });

  it('reports malformed YAML with the source', () => {
    expect(() => parseConfig('pool: [', 'cfg.yaml')).toThrow(/^cfg\.yaml: invalid YAML: /);
  });

  it('reports each schema violation by path', () => {
    expect(() => parseConfig('pool:\n  maxActiveWorkers: 0\n')).toThrow('pool.maxActiveWorkers: Number must be greater than 0');
    expect(() => parseConfig('debate:\n  participants: [wizard]\n')).toThrow(ConfigError);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('pool:\n  maxActive: 2\n')).toThrow("pool: Unrecognized key(s) in object: 'maxActive'");
  });
});

describe('config conversions', () => {
  it('converts seconds to milliseconds', () => {
    const config = parseConfig(
      ['pool:', '  idleTimeout: 1.5', '  initTimeout: 2', 'debate:', '  transport: bus', '  phaseTimeout: 2', ''].join('\n'),
    );
    expect(poolConfigFrom(config)).toEqual({
      maxActiveWorkers: 3,
      idleTimeoutMs: 1_500,
      memoryThreshold: 0.8,
      criticalMemoryThreshold: 0.9,
      cleanupIntervalMs: 60_000,
      acquireTimeoutMs: 600_000,
    });
    expect(busConfigFrom(config)).toEqual({
      maxQueueSize: 1000,
      messageTimeoutMs: 30_000,
      retryAttempts: 3,
      sweepIntervalMs: 500,
      deliveryWindow: 100,
    });
    expect(coordinatorConfigFrom(config)).toEqual({
      participants: [...CULTURAL_KINDS],
      transport: 'bus',
      receiveTimeoutMs: 120_000,
      phaseTimeoutMs: 2_000,
    });
    expect(initTimeoutMs(config)).toBe(2_000);
  });

  it('overlays per-kind worker settings on the defaults', () => {
    const config = parseConfig(
      [
        'defaults:',
        '  maxNewTokens: 256',
        '  templates:',
        '    feedback: "F {culture}"',
        'workers:',
        '  mediator:',
        '    maxNewTokens: 64',
        '    requestTimeout: 5',
        '    provider: { provider: anthropic, model: test-model }',
        '    templates:',
        '      final_decision: "X"',
        '',
      ].join('\n'),
    );
    const mediator = workerSettingsFor(config, 'mediator');
    expect(mediator.maxNewTokens).toBe(64);
    expect(mediator.temperature).toBe(0);
    expect(mediator.templates).toEqual({ feedback: 'F {culture}', final_decision: 'X' });
    expect(requestTimeoutMs(mediator)).toBe(5_000);
    expect(workerSettingsFor(config, 'cultural_hindu').maxNewTokens).toBe(256);
    expect(providerFor(config, 'mediator')).toEqual({ provider: 'anthropic', model: 'test-model' });
    expect(providerFor(config, 'cultural_hindu').provider).toBe('ollama');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'agora-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prefers the local file over the global one', async () => {
    const local = join(dir, 'agora.yaml');
    const global = join(dir, 'global.yaml');
    await writeFile(local, 'pool:\n  maxActiveWorkers: 2\n');
    await writeFile(global, 'pool:\n  maxActiveWorkers: 7\n');
    const loaded = await loadConfig({ cwd: dir, globalPath: global });
    expect(loaded.source).toBe(local);
    expect(loaded.config.pool.maxActiveWorkers).toBe(2);
  });

  it('falls back to the global file, then to defaults', async () => {
    const global = join(dir, 'global.yaml');
    await writeFile(global, 'pool:\n  maxActiveWorkers: 7\n');
    expect((await loadConfig({ cwd: dir, globalPath: global })).config.pool.maxActiveWorkers).toBe(7);
    expect(await loadConfig({ cwd: dir, globalPath: join(dir, 'absent.yaml') })).toEqual({
      config: defaultConfig(),
      source: null,
    });
  });

  it('fails on an explicit path that does not exist', async () => {
    const path = join(dir, 'missing.yaml');
    await expect(loadConfig({ path })).rejects.toThrow(`${path}: file not found`);
  });

  it('saves a config readable only by the owner and loads it back', async () => {
    const path = join(dir, 'nested', 'config.yaml');
    const config = parseConfig('debate:\n  transport: bus\n');
    expect(await saveConfig(config, path)).toBe(path);
    expect((await stat(path)).mode & 0o777).toBe(0o600);
    expect((await loadConfig({ path })).config).toEqual(config);
  });
});
