/**
 * Parsing of yes/no/neither answers out of free text.
 * Matching is case-insensitive substring search in canonical priority order.
 */

import { ANSWERS, type Answer } from './types.js';

export function findAnswer(text: string): Answer | null {
  const lower = text.toLowerCase();
  for (const answer of ANSWERS) {
    if (lower.includes(answer)) return answer;
  }
  return null;
}

/** Final-decision text: first recognised token wins, default `neither`. */
export function parseFinalAnswer(text: string): Answer {
  return findAnswer(text.trim()) ?? 'neither';
}

export interface DetailedAnswer {
  answer: Answer;
  explanation: string;
}

/**
 * Initial-decision text: the first line mentioning a token is the answer line,
 * everything else is the explanation.
 */
export function parseDetailedResponse(text: string): DetailedAnswer {
  const trimmed = text.trim();
  const answerLine = trimmed
    .split('\n')
    .map((l) => l.trim())
    .find((l) => findAnswer(l) !== null);

  if (!answerLine) {
    return { answer: 'neither', explanation: trimmed };
  }
  return {
    answer: findAnswer(answerLine) ?? 'neither',
    explanation: trimmed.replace(answerLine, '').trim(),
  };
}
