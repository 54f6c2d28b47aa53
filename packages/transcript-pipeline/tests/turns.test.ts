import { describe, it, expect } from 'vitest';
import type { Turn } from '@turnkit/shared-types';
import { normalizeLikelihood, normalizeTurns, normalizeTurnType } from '../src/turns/normalize.js';
import { validateTurns } from '../src/turns/validate.js';

const VALID: Turn = {
  idx: 0,
  start_ts: '00:00:01',
  end_ts: '00:00:04',
  speaker: 'Alice',
  type: 'question',
  question_likelihood: 0.9,
  text: 'Can everyone hear me?',
};

describe('normalizeTurnType', () => {
  it('keeps known types and maps synonyms', () => {
    expect(normalizeTurnType('QUESTION')).toBe('question');
    expect(normalizeTurnType('Reply')).toBe('answer');
    expect(normalizeTurnType('follow-up')).toBe('followup');
    expect(normalizeTurnType('Statement ')).toBe('monologue');
  });

  it('falls back to monologue', () => {
    expect(normalizeTurnType('banter')).toBe('monologue');
    expect(normalizeTurnType(42)).toBe('monologue');
  });
});

describe('normalizeLikelihood', () => {
  it('parses and clamps', () => {
    expect(normalizeLikelihood('0.4')).toBe(0.4);
    expect(normalizeLikelihood(1.7)).toBe(1);
    expect(normalizeLikelihood(-2)).toBe(0);
  });

  it('treats non-numbers as 0', () => {
    expect(normalizeLikelihood('abc')).toBe(0);
    expect(normalizeLikelihood(null)).toBe(0);
  });
});

describe('normalizeTurns', () => {
  it('coerces model output into turns', () => {
    const raw = [
      {
        speaker: ' Bob ',
        text: 'hi',
        type: 'reply',
        question_likelihood: '0.25',
        start_ts: '00:00:01',
        end_ts: '00:00:02',
      },
      'junk',
      { idx: 7, text: 'x' },
    ];

    expect(normalizeTurns(raw)).toEqual([
      {
        idx: 0,
        start_ts: '00:00:01',
        end_ts: '00:00:02',
        speaker: 'Bob',
        type: 'answer',
        question_likelihood: 0.25,
        text: 'hi',
      },
      { idx: 7, start_ts: '', end_ts: '', speaker: '', type: 'monologue', question_likelihood: 0, text: 'x' },
    ]);
  });

  it('returns nothing for a non-array', () => {
    expect(normalizeTurns('nope')).toEqual([]);
    expect(normalizeTurns({ turns: [] })).toEqual([]);
  });
});

describe('validateTurns', () => {
  it('accepts well-formed turns', () => {
    expect(validateTurns([VALID])).toEqual([]);
  });

  it('lists every missing field', () => {
    expect(validateTurns([{ idx: 0 }])).toEqual([
      'Turn 0: Missing required field: start_ts',
      'Turn 0: Missing required field: end_ts',
      'Turn 0: Missing required field: speaker',
      'Turn 0: Missing required field: type',
      'Turn 0: Missing required field: question_likelihood',
      'Turn 0: Missing required field: text',
    ]);
  });

  it('flags null fields, bad types and out-of-range likelihoods', () => {
    expect(validateTurns([{ ...VALID, speaker: null }])).toEqual(["Turn 0: Field 'speaker' cannot be null"]);
    expect(validateTurns([VALID, { ...VALID, type: 'statement', question_likelihood: 1.5 }])).toEqual([
      "Turn 1: Invalid type 'statement'",
      'Turn 1: question_likelihood must be between 0 and 1',
    ]);
    expect(validateTurns([{ ...VALID, question_likelihood: 'high' }])).toEqual([
      'Turn 0: question_likelihood must be a number',
    ]);
  });

  it('rejects non-object entries', () => {
    expect(validateTurns(['x', null])).toEqual(['Turn 0 must be an object', 'Turn 1 must be an object']);
  });
});
