/**
 * Persona capability table: one record per worker kind, read from
 * data/personas.json. Worker behaviour is shared and parameterised by this data.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { WORKER_KINDS, type WorkerKind } from './types.js';
import { ConfigError } from './errors.js';

/**
 * Confidence is reply length over `fullLength`, capped at `baseCeiling`, plus
 * `keywordBoost` for each persona keyword the reply mentions (at most
 * `maxBoost`), capped at `ceiling`. Replies shorter than `minLength` start at 0.1.
 */
const ScoringSchema = z.object({
  minLength: z.number().int().nonnegative().default(10),
  fullLength: z.number().positive().default(100),
  baseCeiling: z.number().min(0).max(1).default(0.9),
  keywords: z.array(z.string().min(1)).default([]),
  keywordBoost: z.number().nonnegative().default(0.05),
  maxBoost: z.number().nonnegative().default(0.2),
  ceiling: z.number().min(0).max(1).default(0.95),
});

const PersonaSchema = z.object({
  kind: z.enum(WORKER_KINDS),
  displayName: z.string(),
  summary: z.string(),
  values: z.array(z.string()).default([]),
  norms: z.record(z.string(), z.string()).default({}),
  communicationStyle: z.record(z.string(), z.string()).default({}),
  decisionFactors: z.array(z.string()).default([]),
  scoring: ScoringSchema.default({}),
});

const PersonaFileSchema = z.object({
  personas: z.array(PersonaSchema),
  similarity: z
    .array(z.object({ a: z.enum(WORKER_KINDS), b: z.enum(WORKER_KINDS), score: z.number().min(0).max(1) }))
    .default([]),
});

export type ConfidenceScoring = z.infer<typeof ScoringSchema>;
export type Persona = z.infer<typeof PersonaSchema>;

export const DEFAULT_SCORING: ConfidenceScoring = ScoringSchema.parse({});
export const DEFAULT_SIMILARITY = 0.1;

export const PERSONAS_PATH = new URL('../data/personas.json', import.meta.url);

export interface PersonaTable {
  personas: Map<WorkerKind, Persona>;
  similarity: Map<string, number>;
}

let cached: PersonaTable | null = null;

const pairKey = (a: WorkerKind, b: WorkerKind) => [a, b].sort().join('|');

export function parsePersonaTable(raw: unknown, source = 'personas'): PersonaTable {
  const parsed = PersonaFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '), source);
  }
  const personas = new Map<WorkerKind, Persona>();
  for (const p of parsed.data.personas) {
    personas.set(p.kind, p);
  }
  const similarity = new Map<string, number>();
  for (const s of parsed.data.similarity) {
    similarity.set(pairKey(s.a, s.b), s.score);
  }
  return { personas, similarity };
}

export function loadPersonaTable(path: string | URL = PERSONAS_PATH): PersonaTable {
  if (path === PERSONAS_PATH && cached) return cached;
  const table = parsePersonaTable(JSON.parse(readFileSync(path, 'utf-8')), String(path));
  if (path === PERSONAS_PATH) cached = table;
  return table;
}

export function getPersona(kind: WorkerKind, table: PersonaTable = loadPersonaTable()): Persona {
  const persona = table.personas.get(kind);
  if (!persona) {
    throw new ConfigError(`No persona data for worker kind "${kind}"`);
  }
  return persona;
}

/**
 * Descriptive only; the debate flow never consults it.
 */
export function culturalSimilarity(
  a: WorkerKind,
  b: WorkerKind,
  table: PersonaTable = loadPersonaTable(),
): number {
  if (a === b) return 1;
  return table.similarity.get(pairKey(a, b)) ?? DEFAULT_SIMILARITY;
}
