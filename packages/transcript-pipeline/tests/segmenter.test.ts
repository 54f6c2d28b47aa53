import { describe, it, expect } from 'vitest';
import { createSegmentsFromTurns, segmentRawTranscript } from '../src/segmenting/segmenter.js';
import { parseTimestampSeconds } from '../src/segmenting/timestamps.js';
import type { TokenEstimator } from '../src/tokens/estimator.js';

/** One token per word keeps the arithmetic readable. */
const words: TokenEstimator = {
  name: 'words',
  estimate: (text) => text.split(/\s+/).filter(Boolean).length,
};

describe('createSegmentsFromTurns', () => {
  const turns = [
    { speaker: 'A', text: 'one two three', start_ts: '00:00:01', end_ts: '00:00:05' },
    { speaker: 'B', text: 'four five', start_ts: '00:00:05', end_ts: '00:01:00' },
    { speaker: 'A', text: 'six seven', start_ts: '00:01:00', end_ts: '00:01:30.5' },
    { speaker: 'C', text: 'eight', start_ts: '00:01:31', end_ts: 'bad' },
  ];

  it('cuts between turns when the next one would pass the ceiling', () => {
    const segments = createSegmentsFromTurns(turns, { maxTokensPerSegment: 5, estimator: words });

    expect(segments).toEqual([
      {
        id: 1,
        start_time: 1,
        end_time: 60,
        topic: 'Segment 1',
        speakers: ['A', 'B'],
        text: 'one two three\nfour five',
        first_turn: 0,
        last_turn: 1,
      },
      {
        id: 2,
        start_time: 60,
        end_time: null,
        topic: 'Segment 2',
        speakers: ['A', 'C'],
        text: 'six seven\neight',
        first_turn: 2,
        last_turn: 3,
      },
    ]);
  });

  it('gives an oversized turn a segment of its own', () => {
    const segments = createSegmentsFromTurns(
      [{ text: 'a' }, { text: 'a b c d e' }, { text: 'z' }],
      { maxTokensPerSegment: 2, estimator: words },
    );
    expect(segments.map((s) => s.text)).toEqual(['a', 'a b c d e', 'z']);
  });

  it('covers every turn exactly once, in order', () => {
    const many = Array.from({ length: 40 }, (_, i) => ({
      speaker: `S${i % 4}`,
      text: 'word '.repeat((i * 7) % 9 + 1).trim(),
    }));
    const segments = createSegmentsFromTurns(many, { maxTokensPerSegment: 12, estimator: words });

    let expected = 0;
    for (const segment of segments) {
      expect(segment.first_turn).toBe(expected);
      expect(segment.last_turn).toBeGreaterThanOrEqual(segment.first_turn);
      expected = segment.last_turn + 1;
    }
    expect(expected).toBe(many.length);
    expect(segments.map((s) => s.id)).toEqual(segments.map((_, i) => i + 1));
  });

  it('labels a missing speaker as Unknown', () => {
    const [segment] = createSegmentsFromTurns([{ text: 'hi' }, { speaker: 'Dana', text: 'hello' }]);
    expect(segment?.speakers).toEqual(['Unknown', 'Dana']);
    expect(segment?.start_time).toBeNull();
  });

  it('returns nothing for no turns', () => {
    expect(createSegmentsFromTurns([])).toEqual([]);
  });
});

describe('segmentRawTranscript', () => {
  it('wraps the text in one monologue turn', () => {
    expect(segmentRawTranscript('hello')).toEqual([
      {
        id: 1,
        start_time: 0,
        end_time: 0,
        topic: 'Segment 1',
        speakers: ['Tester'],
        text: 'hello',
        first_turn: 0,
        last_turn: 0,
      },
    ]);
  });
});

describe('parseTimestampSeconds', () => {
  it('parses HH:MM:SS', () => {
    expect(parseTimestampSeconds('01:02:03')).toBe(3723);
    expect(parseTimestampSeconds('00:00:07.5')).toBe(7.5);
  });

  it('rejects anything else', () => {
    expect(parseTimestampSeconds('12:30')).toBeNull();
    expect(parseTimestampSeconds('aa:bb:cc')).toBeNull();
    expect(parseTimestampSeconds('1::2')).toBeNull();
    expect(parseTimestampSeconds('0x1:00:00')).toBeNull();
    expect(parseTimestampSeconds('1e2:00:00')).toBeNull();
    expect(parseTimestampSeconds('00:00:-5')).toBeNull();
    expect(parseTimestampSeconds('')).toBeNull();
    expect(parseTimestampSeconds(undefined)).toBeNull();
  });
});
