import { describe, it, expect } from 'vitest';
import { findDuplicateTurn, normalizeText, textSimilarity } from '../src/merging/similarity.js';

describe('textSimilarity', () => {
  it('scores word-set overlap symmetrically', () => {
    expect(textSimilarity('the quick brown fox', 'The quick brown fox jumps')).toBe(0.8);
    expect(textSimilarity('The quick brown fox jumps', 'the quick brown fox')).toBe(0.8);
  });

  it('ignores case and whitespace', () => {
    expect(textSimilarity('  Hello   World ', 'hello world')).toBe(1);
  });

  it('scores disjoint text, or text against nothing, as 0', () => {
    expect(textSimilarity('apples and pears', 'rain tomorrow')).toBe(0);
    expect(textSimilarity(null, 'something')).toBe(0);
  });

  it('treats two empty texts as identical', () => {
    expect(textSimilarity('', '')).toBe(1);
    expect(textSimilarity('  ', '\n')).toBe(1);
    expect(textSimilarity(undefined, null)).toBe(1);
  });
});

describe('normalizeText', () => {
  it('collapses whitespace and lowercases', () => {
    expect(normalizeText(' Some\n\tTEXT  here ')).toBe('some text here');
    expect(normalizeText(undefined)).toBe('');
  });
});

describe('findDuplicateTurn', () => {
  const candidates = [
    { speaker: 'Bob', text: 'the quick brown fox jumps' },
    { speaker: 'Alice', text: 'the quick brown fox jumps' },
  ];

  it('matches the same speaker regardless of case and padding', () => {
    expect(findDuplicateTurn({ speaker: ' alice ', text: 'the quick brown fox' }, candidates)).toBe(1);
  });

  it('never matches a different speaker', () => {
    expect(findDuplicateTurn({ speaker: 'Charlie', text: 'the quick brown fox jumps' }, candidates)).toBeNull();
  });

  it('respects the threshold', () => {
    expect(findDuplicateTurn({ speaker: 'Alice', text: 'the quick brown fox' }, candidates, 0.9)).toBeNull();
  });

  it('treats missing fields as empty strings', () => {
    expect(findDuplicateTurn({}, [{ speaker: '', text: '' }])).toBe(0);
    expect(findDuplicateTurn({}, [{ speaker: '', text: 'said something' }])).toBeNull();
  });
});
