/**
 * FILE PURPOSE: Coerce parsed model output into well-formed turns
 * WHY: The analysis model invents turn types ("statement", "reply"), returns
 *      likelihoods as strings or out of range, and drops fields. Downstream code
 *      wants a Turn; bad values degrade to defaults instead of failing the chunk.
 */

import type { Turn, TurnType } from '@turnkit/shared-types';
import { isTurnType } from '@turnkit/shared-types';

const TURN_TYPE_SYNONYMS: Readonly<Record<string, TurnType>> = {
  statement: 'monologue',
  comment: 'monologue',
  discussion: 'monologue',
  context: 'monologue',
  other: 'monologue',
  response: 'answer',
  reply: 'answer',
  'follow-up': 'followup',
  'follow up': 'followup',
  questioning: 'question',
};

export function normalizeTurnType(raw: unknown): TurnType {
  if (typeof raw !== 'string') return 'monologue';
  const key = raw.trim().toLowerCase();
  if (isTurnType(key)) return key;
  return TURN_TYPE_SYNONYMS[key] ?? 'monologue';
}

/** Clamp to [0, 1]; anything non-numeric becomes 0. */
export function normalizeLikelihood(raw: unknown): number {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function asString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a parsed `turns` array into Turn records. Non-object entries are
 * skipped; a missing or non-integer idx becomes the entry's position.
 */
export function normalizeTurns(raw: unknown): Turn[] {
  if (!Array.isArray(raw)) return [];

  const turns: Turn[] = [];
  raw.forEach((entry: unknown, position: number) => {
    if (!isRecord(entry)) return;
    const idx = entry.idx;
    turns.push({
      idx: typeof idx === 'number' && Number.isInteger(idx) ? idx : position,
      start_ts: asString(entry.start_ts),
      end_ts: asString(entry.end_ts),
      speaker: asString(entry.speaker).trim(),
      type: normalizeTurnType(entry.type),
      question_likelihood: normalizeLikelihood(entry.question_likelihood),
      text: asString(entry.text),
    });
  });
  return turns;
}
