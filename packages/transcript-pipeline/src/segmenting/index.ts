export { createSegmentsFromTurns, segmentRawTranscript, DEFAULT_SEGMENT_MAX_TOKENS } from './segmenter.js';
export type { SegmentableTurn, SegmentOptions } from './segmenter.js';
export { parseTimestampSeconds } from './timestamps.js';
