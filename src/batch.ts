/**
 * Batch runner: JSONL scenario records in, one debate per record, JSONL
 * results out. Items run sequentially; a failed debate is recorded with its
 * error and a `neither` majority instead of stopping the batch.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { PhaseAbortedError, errorMessage } from './errors.js';
import { answerDistribution, majorityVote } from './voting.js';
import { ANSWERS, type Answer, type DebateResult, type EventSink, type Scenario, type WorkerKind } from './types.js';

export const ScenarioRecordSchema = z
  .object({
    ID: z.union([z.string(), z.number()]).optional(),
    Country: z.string().default(''),
    Story: z.string().default(''),
    'Rule-of-Thumb': z.string().default(''),
    'Gold Label': z.string().default(''),
  })
  .passthrough();

export type ScenarioRecord = z.infer<typeof ScenarioRecordSchema>;

export interface DebateRunner {
  runDebate(scenario: Scenario): Promise<DebateResult>;
  discardContext?(conversationId: string): boolean;
}

export interface BatchItemResult {
  id: string | number | null;
  country: string;
  story: string;
  ruleOfThumb: string;
  goldLabel: string;
  decisions: Partial<Record<WorkerKind, Answer>>;
  majority: Answer;
  conversationId?: string;
  duration?: number;
  initialResponses?: Partial<Record<WorkerKind, { answer: Answer; explanation: string; confidence: number }>>;
  finalResponses?: Partial<Record<WorkerKind, { answer: Answer; confidence: number }>>;
  error?: string;
}

export interface BatchOptions {
  startFrom?: number;
  maxItems?: number;
  /** Write a checkpoint after every N items. */
  checkpointEvery?: number;
  onCheckpoint?: (results: BatchItemResult[]) => Promise<void>;
  onEvent?: EventSink;
}

export interface BatchSummary {
  processed: number;
  failed: number;
  /** Only items that did not fail are scored. */
  accuracy: { correct: number; total: number; rate: number };
  distribution: Partial<Record<WorkerKind, Record<Answer, number>>>;
  duration: number;
}

export function parseScenarioLines(text: string, source = 'input'): ScenarioRecord[] {
  const records: ScenarioRecord[] = [];
  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      throw new Error(`${source}:${i + 1}: invalid JSON (${errorMessage(err)})`);
    }
    const parsed = ScenarioRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`${source}:${i + 1}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }
    records.push(parsed.data);
  }
  return records;
}

export async function loadScenarios(path: string): Promise<ScenarioRecord[]> {
  return parseScenarioLines(await readFile(path, 'utf-8'), path);
}

export function toScenario(record: ScenarioRecord): Scenario {
  return {
    country: record.Country.toLowerCase(),
    story: record.Story,
    ruleOfThumb: record['Rule-of-Thumb'],
  };
}

function baseResult(record: ScenarioRecord): Omit<BatchItemResult, 'decisions' | 'majority'> {
  const scenario = toScenario(record);
  return {
    id: record.ID ?? null,
    country: scenario.country,
    story: scenario.story,
    ruleOfThumb: scenario.ruleOfThumb,
    goldLabel: record['Gold Label'],
  };
}

export async function runItem(runner: DebateRunner, record: ScenarioRecord): Promise<BatchItemResult> {
  try {
    const debate = await runner.runDebate(toScenario(record));
    runner.discardContext?.(debate.conversationId);

    const decisions: Partial<Record<WorkerKind, Answer>> = {};
    const finalResponses: BatchItemResult['finalResponses'] = {};
    const initialResponses: BatchItemResult['initialResponses'] = {};
    for (const kind of debate.participants) {
      const initial = debate.initialResponses[kind];
      if (initial) {
        initialResponses[kind] = {
          answer: initial.parsedAnswer,
          explanation: initial.explanation ?? '',
          confidence: initial.confidence,
        };
      }
      const final = debate.finalResponses[kind];
      if (final) {
        decisions[kind] = final.parsedAnswer;
        finalResponses[kind] = { answer: final.parsedAnswer, confidence: final.confidence };
      }
    }

    return {
      ...baseResult(record),
      decisions,
      majority: majorityVote(Object.values(decisions)).answer,
      conversationId: debate.conversationId,
      duration: debate.duration,
      initialResponses,
      finalResponses,
    };
  } catch (err) {
    if (err instanceof PhaseAbortedError) runner.discardContext?.(err.conversationId);
    return { ...baseResult(record), decisions: {}, majority: 'neither', error: errorMessage(err) };
  }
}

export async function runBatch(
  runner: DebateRunner,
  records: readonly ScenarioRecord[],
  options: BatchOptions = {},
): Promise<{ results: BatchItemResult[]; summary: BatchSummary }> {
  const emit = options.onEvent ?? (() => {});
  const start = options.startFrom ?? 0;
  const end = options.maxItems !== undefined ? Math.min(start + options.maxItems, records.length) : records.length;
  const slice = records.slice(start, end);
  const checkpointEvery = options.checkpointEvery ?? 10;
  const started = Date.now();
  const results: BatchItemResult[] = [];

  emit('batch:start', { total: records.length, from: start, to: end });
  for (let i = 0; i < slice.length; i++) {
    const itemStart = Date.now();
    const result = await runItem(runner, slice[i]);
    results.push(result);
    emit('batch:item', {
      index: start + i,
      total: records.length,
      id: result.id,
      majority: result.majority,
      goldLabel: result.goldLabel,
      error: result.error,
      duration: Date.now() - itemStart,
    });
    if (options.onCheckpoint && checkpointEvery > 0 && (i + 1) % checkpointEvery === 0) {
      await options.onCheckpoint(results);
      emit('batch:checkpoint', { completed: i + 1 });
    }
  }

  const summary = summarize(results, Date.now() - started);
  emit('batch:done', summary);
  return { results, summary };
}

export function summarize(results: readonly BatchItemResult[], duration = 0): BatchSummary {
  const scored = results.filter((r) => r.error === undefined);
  const correct = scored.filter((r) => r.majority === normalizeLabel(r.goldLabel)).length;
  return {
    processed: results.length,
    failed: results.length - scored.length,
    accuracy: { correct, total: scored.length, rate: scored.length > 0 ? correct / scored.length : 0 },
    distribution: answerDistribution(scored.map((r) => r.decisions)),
    duration,
  };
}

export function normalizeLabel(label: string): Answer | null {
  const lower = label.trim().toLowerCase();
  return ANSWERS.find((a) => a === lower) ?? null;
}

export async function writeResults(path: string, results: readonly BatchItemResult[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const body = results.map((r) => JSON.stringify(r)).join('\n');
  await writeFile(path, results.length > 0 ? `${body}\n` : '', 'utf-8');
}
