import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DebateSystem, type GeneratorFactory } from '../src/system.js';
import { parseConfig } from '../src/config.js';
import { PhaseAbortedError } from '../src/errors.js';
import { SessionStore } from '../src/session.js';
import { CULTURAL_KINDS, type WorkerKind } from '../src/types.js';
import { EGYPT, ScriptedGenerator, stageOf } from './helpers.js';

const FINALS: Record<WorkerKind, string> = {
  cultural_christian: 'Yes',
  cultural_islamic: 'No',
  cultural_buddhist: 'Yes',
  cultural_hindu: 'No',
  cultural_traditional: 'Yes',
  conflict_detector: 'Neither',
  mediator: 'Neither',
  decision_maker: 'Neither',
};

function scripted(finals: Record<WorkerKind, string> = FINALS) {
  const generators: ScriptedGenerator[] = [];
  const factory: GeneratorFactory = (kind) => {
    const generator = new ScriptedGenerator(
      (prompt) => {
        switch (stageOf(prompt)) {
          case 'initial':
            return `No\nIn ${kind} tradition this is disrespectful.`;
          case 'feedback':
            return 'Context matters, but the meeting was formal.';
          case 'final':
            return finals[kind];
        }
      },
      { name: kind },
    );
    generators.push(generator);
    return generator;
  };
  return { factory, generators };
}

const systems: DebateSystem[] = [];
afterEach(async () => {
  await Promise.all(systems.splice(0).map((system) => system.shutdown()));
});

function makeSystem(yaml: string, finals?: Record<WorkerKind, string>) {
  const { factory, generators } = scripted(finals);
  const system = new DebateSystem(parseConfig(yaml), { generatorFactory: factory, memoryProbe: () => 0 });
  system.start();
  systems.push(system);
  return { system, generators };
}

describe('five-culture debate', () => {
  it('collects a final decision from every culture', async () => {
    const { system } = makeSystem('pool:\n  maxActiveWorkers: 5\n');
    const result = await system.runDebate(EGYPT);

    expect(Object.keys(result.finalResponses).sort()).toEqual([...CULTURAL_KINDS].sort());
    expect(result.initialResponses.cultural_islamic?.parsedAnswer).toBe('no');
    expect(result.aggregate).toEqual({ answer: 'yes', counts: { yes: 3, no: 2, neither: 0 }, confidence: 0.6 });
    expect(result.duration).toBeGreaterThanOrEqual(0);
    expect(system.stats()).toMatchObject({ conversations: 1, pool: { loads: 5, activeCount: 5 } });
  });

  it('reaches the same outcome over the bus', async () => {
    const { system } = makeSystem('pool:\n  maxActiveWorkers: 5\ndebate:\n  transport: bus\n');
    const result = await system.runDebate(EGYPT);
    expect(result.aggregate.answer).toBe('yes');
    expect(system.stats().bus.messageTypes).toEqual({ generate_response: 15, worker_response: 15 });
    expect(system.bus.queueCount).toBe(0);
  });

  it('leaves no reply inboxes behind across repeated debates', async () => {
    const { system } = makeSystem('pool:\n  maxActiveWorkers: 5\ndebate:\n  transport: bus\n');
    for (let i = 0; i < 3; i++) await system.runDebate(EGYPT);
    expect(system.stats().bus.totalReceived).toBe(90);
    expect(system.bus.queueCount).toBe(0);
  });

  it('completes when the pool is smaller than the panel', async () => {
    const { system, generators } = makeSystem('pool:\n  maxActiveWorkers: 2\n');
    const result = await system.runDebate(EGYPT);
    expect(Object.keys(result.finalResponses)).toHaveLength(5);
    expect(system.pool.size).toBeLessThanOrEqual(2);

    await system.shutdown();
    expect(system.pool.size).toBe(0);
    expect(generators.every((g) => g.cleanups === 1)).toBe(true);
  });

  it('runs a panel of role workers', async () => {
    const { system } = makeSystem('');
    const result = await system.runDebate(EGYPT, ['mediator', 'conflict_detector', 'decision_maker']);
    expect(result.aggregate).toEqual({ answer: 'neither', counts: { yes: 0, no: 0, neither: 3 }, confidence: 1 });
  });
});

describe('session persistence', () => {
  let dir: string;

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes meta and one file per completed phase', async () => {
    dir = await mkdtemp(join(tmpdir(), 'agora-session-'));
    const { system } = makeSystem('');
    const result = await system.runDebate(EGYPT, ['cultural_hindu', 'cultural_buddhist']);
    const context = system.coordinator.getContext(result.conversationId);
    if (!context) throw new Error('context missing');

    const store = new SessionStore(result.conversationId, dir);
    await store.writeContext(context);
    await store.writeResult(result);

    expect((await readdir(store.path)).sort()).toEqual(['feedback.json', 'final.json', 'initial.json', 'meta.json', 'result.json']);
    const meta = JSON.parse(await readFile(join(store.path, 'meta.json'), 'utf-8'));
    expect(meta).toMatchObject({ conversationId: result.conversationId, phase: 'completed', error: null });
    const final = JSON.parse(await readFile(join(store.path, 'final.json'), 'utf-8'));
    expect(Object.keys(final.responses).sort()).toEqual(['cultural_buddhist', 'cultural_hindu']);
  });

  it('keeps a failed debate for inspection', async () => {
    dir = await mkdtemp(join(tmpdir(), 'agora-session-'));
    const { system } = makeSystem('');
    let aborted: PhaseAbortedError | undefined;
    try {
      await system.runDebate(EGYPT, ['cultural_hindu']);
    } catch (err) {
      if (!(err instanceof PhaseAbortedError)) throw err;
      aborted = err;
    }
    if (!aborted) throw new Error('expected the debate to abort');

    const context = system.coordinator.getContext(aborted.conversationId);
    if (!context) throw new Error('context missing');
    const store = new SessionStore(aborted.conversationId, dir);
    await store.writeContext(context);

    expect((await readdir(store.path)).sort()).toEqual(['feedback.json', 'initial.json', 'meta.json']);
    const meta = JSON.parse(await readFile(join(store.path, 'meta.json'), 'utf-8'));
    expect(meta).toMatchObject({ phase: 'failed', error: 'no participant reached the final decision' });
  });
});
