/**
 * FILE PURPOSE: Schema check for a turn list before it is written out
 * WHY: The merge stage reports problems without blocking; callers that want a
 *      hard gate can throw on a non-empty result.
 */

import { isTurnType } from '@turnkit/shared-types';

const REQUIRED_TURN_FIELDS = [
  'idx',
  'start_ts',
  'end_ts',
  'speaker',
  'type',
  'question_likelihood',
  'text',
] as const;

/** Human-readable problems, empty when every turn is valid. */
export function validateTurns(turns: readonly unknown[]): string[] {
  const errors: string[] = [];

  turns.forEach((turn, i) => {
    if (typeof turn !== 'object' || turn === null || Array.isArray(turn)) {
      errors.push(`Turn ${i} must be an object`);
      return;
    }
    const record: Record<string, unknown> = { ...turn };

    for (const field of REQUIRED_TURN_FIELDS) {
      if (!(field in record)) {
        errors.push(`Turn ${i}: Missing required field: ${field}`);
      } else if (record[field] === null || record[field] === undefined) {
        errors.push(`Turn ${i}: Field '${field}' cannot be null`);
      }
    }

    if ('type' in record && record.type != null && !isTurnType(record.type)) {
      errors.push(`Turn ${i}: Invalid type '${String(record.type)}'`);
    }

    const likelihood = record.question_likelihood;
    if (likelihood != null) {
      if (typeof likelihood !== 'number' || !Number.isFinite(likelihood)) {
        errors.push(`Turn ${i}: question_likelihood must be a number`);
      } else if (likelihood < 0 || likelihood > 1) {
        errors.push(`Turn ${i}: question_likelihood must be between 0 and 1`);
      }
    }
  });

  return errors;
}
