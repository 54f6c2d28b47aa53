/**
 * FILE PURPOSE: Group merged turns into token-bounded segments
 * WHY: The later analysis pass works on segments, not single turns. Cuts fall
 *      only between turns; the ceiling decides where to cut, never rejects input,
 *      so one oversized turn still gets a segment of its own.
 */

import type { Segment, Turn } from '@turnkit/shared-types';
import type { TokenEstimator } from '../tokens/estimator.js';
import { HeuristicTokenEstimator } from '../tokens/estimator.js';
import { parseTimestampSeconds } from './timestamps.js';

export const DEFAULT_SEGMENT_MAX_TOKENS = 3000;

/** Fields the segmenter reads. Missing ones degrade to empty / null. */
export type SegmentableTurn = Partial<Pick<Turn, 'speaker' | 'text' | 'start_ts' | 'end_ts'>>;

export interface SegmentOptions {
  maxTokensPerSegment?: number;
  estimator?: TokenEstimator;
}

function collectSpeakers(turns: readonly SegmentableTurn[]): string[] {
  const seen = new Set<string>();
  for (const turn of turns) {
    seen.add(turn.speaker ?? 'Unknown');
  }
  return [...seen];
}

function buildSegment(id: number, turns: readonly SegmentableTurn[], firstTurn: number): Segment {
  const first = turns[0];
  const last = turns[turns.length - 1];

  return {
    id,
    start_time: parseTimestampSeconds(first?.start_ts),
    end_time: parseTimestampSeconds(last?.end_ts),
    topic: `Segment ${id}`,
    speakers: collectSpeakers(turns),
    text: turns.map((turn) => turn.text ?? '').join('\n'),
    first_turn: firstTurn,
    last_turn: firstTurn + turns.length - 1,
  };
}

export function createSegmentsFromTurns(
  turns: readonly SegmentableTurn[],
  options: SegmentOptions = {},
): Segment[] {
  const {
    maxTokensPerSegment = DEFAULT_SEGMENT_MAX_TOKENS,
    estimator = new HeuristicTokenEstimator(),
  } = options;

  const segments: Segment[] = [];
  let buffer: SegmentableTurn[] = [];
  let bufferStart = 0;
  let bufferTokens = 0;

  turns.forEach((turn, position) => {
    const tokens = estimator.estimate(turn.text ?? '');

    if (buffer.length > 0 && bufferTokens + tokens > maxTokensPerSegment) {
      segments.push(buildSegment(segments.length + 1, buffer, bufferStart));
      buffer = [];
      bufferTokens = 0;
    }

    if (buffer.length === 0) bufferStart = position;
    buffer.push(turn);
    bufferTokens += tokens;
  });

  if (buffer.length > 0) {
    segments.push(buildSegment(segments.length + 1, buffer, bufferStart));
  }

  return segments;
}

/** Wrap a raw transcript in a single monologue turn and segment it. For local runs. */
export function segmentRawTranscript(text: string, options: SegmentOptions = {}): Segment[] {
  const turn: Turn = {
    idx: 0,
    start_ts: '00:00:00',
    end_ts: '00:00:00',
    speaker: 'Tester',
    type: 'monologue',
    question_likelihood: 0,
    text,
  };
  return createSegmentsFromTurns([turn], { maxTokensPerSegment: 10_000, ...options });
}
