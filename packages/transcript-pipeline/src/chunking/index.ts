export { findNaturalBreak, DEFAULT_SEARCH_RADIUS_CHARS } from './natural-break.js';
export { createOverlappingChunks, resolveChunkingParams, DEFAULT_CHUNKING_PARAMS } from './overlapping.js';
export { planTranscriptChunks, buildChunkMetadata, DEFAULT_CHUNKING_THRESHOLD_TOKENS } from './plan.js';
export type { ChunkPlan, ChunkPlanOptions } from './plan.js';
