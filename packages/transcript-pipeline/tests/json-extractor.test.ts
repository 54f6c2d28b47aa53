import { describe, it, expect } from 'vitest';
import { extractJson, JsonExtractionError } from '../src/json-extractor.js';

describe('extractJson', () => {
  it('prefers a fenced block', () => {
    const text = 'Here you go:\n```json\n{"turns": [{"idx": 0}]}\n```\nDone.';
    expect(extractJson(text)).toEqual({ data: { turns: [{ idx: 0 }] }, strategy: 1 });
  });

  it('finds a bare array inside prose', () => {
    const text = 'Result: [{"idx": 0, "text": "hi"}] end';
    expect(extractJson(text)).toEqual({ data: [{ idx: 0, text: 'hi' }], strategy: 2 });
  });

  it('ignores brackets inside strings', () => {
    expect(extractJson('{"text": "a } b"}').data).toEqual({ text: 'a } b' });
  });

  it('drops trailing commas', () => {
    expect(extractJson('{"a": 1, "b": [1, 2,],}').data).toEqual({ a: 1, b: [1, 2] });
  });

  it('closes a response cut off mid-string', () => {
    expect(extractJson('{"turns": [{"idx": 0, "text": "hel').data).toEqual({ turns: [{ idx: 0, text: 'hel' }] });
  });

  it('throws when there is no JSON at all', () => {
    expect(() => extractJson('I could not find any turns.')).toThrow(JsonExtractionError);
  });
});
