/**
 * Session file manager: persists one debate's phases to disk.
 *
 *   ~/.agora/sessions/<conversationId>/
 *     meta.json, initial.json, feedback.json, final.json, result.json
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { ConversationContext } from './coordinator.js';
import type { DebateResult, PhaseName, WorkerKind } from './types.js';

export const SESSIONS_DIR = join(homedir(), '.agora', 'sessions');

export interface PhaseOutput {
  phase: PhaseName;
  duration: number;
  responses: Partial<Record<WorkerKind, unknown>>;
  failures: Partial<Record<WorkerKind, string>>;
}

const PHASES: readonly PhaseName[] = ['initial', 'feedback', 'final'];

export class SessionStore {
  private dir: string;

  constructor(conversationId: string, baseDir?: string) {
    this.dir = join(baseDir ?? SESSIONS_DIR, conversationId);
  }

  get path(): string {
    return this.dir;
  }

  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  async writePhase(data: PhaseOutput): Promise<void> {
    await writeFile(join(this.dir, `${data.phase}.json`), JSON.stringify(data, null, 2), 'utf-8');
  }

  async writeMeta(meta: Record<string, unknown>): Promise<void> {
    await writeFile(join(this.dir, 'meta.json'), JSON.stringify(meta, null, 2), 'utf-8');
  }

  async writeResult(result: DebateResult): Promise<void> {
    await writeFile(join(this.dir, 'result.json'), JSON.stringify(result, null, 2), 'utf-8');
  }

  /**
   * Write everything a context holds: meta plus one file per phase that ran.
   * Works for failed debates too.
   */
  async writeContext(context: ConversationContext): Promise<void> {
    await this.init();
    await this.writeMeta({
      conversationId: context.conversationId,
      scenario: context.scenario,
      participants: context.participants,
      phase: context.phase,
      startedAt: context.startedAt,
      endedAt: context.endedAt ?? null,
      error: context.error ?? null,
    });
    for (const phase of PHASES) {
      const duration = context.phaseDurations[phase];
      if (duration === undefined) continue;
      await this.writePhase({
        phase,
        duration,
        responses: context.responses[phase],
        failures: context.failures[phase] ?? {},
      });
    }
  }
}
