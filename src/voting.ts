/**
 * Vote aggregation for debate outcomes.
 */

import { ANSWERS, type Aggregate, type Answer } from './types.js';

export function emptyCounts(): Record<Answer, number> {
  return { yes: 0, no: 0, neither: 0 };
}

/**
 * Plurality vote. Ties go to the first tied answer in canonical
 * [yes, no, neither] order, never to arrival order.
 * Confidence is the winning share of the votes cast.
 */
export function majorityVote(answers: Iterable<Answer>): Aggregate {
  const counts = emptyCounts();
  let total = 0;
  for (const a of answers) {
    counts[a]++;
    total++;
  }
  if (total === 0) {
    return { answer: 'neither', counts, confidence: 0 };
  }

  let winner: Answer = ANSWERS[0];
  for (const a of ANSWERS) {
    if (counts[a] > counts[winner]) winner = a;
  }
  return { answer: winner, counts, confidence: counts[winner] / total };
}

/** Aggregate used when a debate produced no final answers at all. */
export function abstainAggregate(): Aggregate {
  return { answer: 'neither', counts: emptyCounts(), confidence: 0 };
}

/**
 * Per-key answer distribution, e.g. per worker kind across a batch.
 */
export function answerDistribution<K extends string>(
  rows: Iterable<Partial<Record<K, Answer>>>,
): Partial<Record<K, Record<Answer, number>>> {
  const out: Partial<Record<K, Record<Answer, number>>> = {};
  for (const row of rows) {
    for (const key in row) {
      const answer = row[key];
      if (!answer) continue;
      const bucket = out[key] ?? emptyCounts();
      bucket[answer]++;
      out[key] = bucket;
    }
  }
  return out;
}
