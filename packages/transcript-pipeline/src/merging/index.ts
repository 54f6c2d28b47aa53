export {
  textSimilarity,
  findDuplicateTurn,
  normalizeSpeaker,
  normalizeText,
  TURN_DUPLICATE_THRESHOLD,
} from './similarity.js';
export type { ComparableTurn } from './similarity.js';
export {
  mergeChunkTurns,
  mergeTurnData,
  mergeWindowSize,
  CROSS_CHUNK_DUPLICATE_THRESHOLD,
} from './merge.js';
export type {
  MergeableTurn,
  MergeMetadata,
  MergeOptions,
  MergeWindowOptions,
  MergeOutcome,
  ChunkMergeStats,
} from './merge.js';
export { MissingChunkResultError, UnexpectedChunkResultError } from './errors.js';
export { assembleTurnsDocument } from './document.js';
export type { AssembleOptions } from './document.js';
