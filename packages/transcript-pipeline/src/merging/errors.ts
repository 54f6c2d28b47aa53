/**
 * Chunk-result contract violations. Dropping a chunk's turns silently would
 * corrupt the transcript, so the merge aborts instead.
 */

export class MissingChunkResultError extends Error {
  readonly chunkIndex: number;

  constructor(chunkIndex: number, chunkCount: number) {
    super(`No analysis result for chunk ${chunkIndex} of ${chunkCount}`);
    this.name = 'MissingChunkResultError';
    this.chunkIndex = chunkIndex;
  }
}

export class UnexpectedChunkResultError extends Error {
  readonly chunkIndex: number;

  constructor(chunkIndex: number, reason: 'duplicate' | 'unknown') {
    super(
      reason === 'duplicate'
        ? `Chunk ${chunkIndex} has more than one analysis result`
        : `Analysis result for chunk ${chunkIndex}, which is not in the chunk metadata`,
    );
    this.name = 'UnexpectedChunkResultError';
    this.chunkIndex = chunkIndex;
  }
}
