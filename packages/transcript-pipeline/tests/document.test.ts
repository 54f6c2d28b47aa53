import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Turn } from '@turnkit/shared-types';
import { assembleTurnsDocument } from '../src/merging/document.js';
import { MissingChunkResultError } from '../src/merging/errors.js';

const META = { chunks: [{ index: 0 }, { index: 1 }], params: { overlapTokens: 2000, charsPerToken: 3 } };

function turn(idx: number, speaker: string, text: string): Turn {
  return { idx, start_ts: '00:00:01', end_ts: '00:00:02', speaker, type: 'monologue', question_likelihood: 0, text };
}

describe('assembleTurnsDocument', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds the turns document for a meeting', () => {
    const doc = assembleTurnsDocument(
      'meeting-42',
      [
        { chunkIndex: 1, turns: [turn(0, 'Bob', 'see you next week'), turn(1, 'Alice', 'bye')] },
        { chunkIndex: 0, turns: [turn(0, 'Alice', 'kick off'), turn(1, 'Bob', 'see you next week')] },
      ],
      META,
      { now: () => new Date('2025-03-04T05:06:07.000Z') },
    );

    expect(doc.meeting_id).toBe('meeting-42');
    expect(doc.turns.map((t) => [t.idx, t.text])).toEqual([
      [0, 'kick off'],
      [1, 'see you next week'],
      [2, 'bye'],
    ]);
    expect(doc.metadata).toEqual({ total_turns: 3, chunk_count: 2, merged_at: '2025-03-04T05:06:07.000Z' });
  });

  it('warns about invalid turns without failing', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const bad = { ...turn(0, 'Alice', 'odd'), question_likelihood: 3 };

    const doc = assembleTurnsDocument('m', [{ chunkIndex: 0, turns: [bad] }], { ...META, chunks: [{ index: 0 }] });

    expect(doc.turns).toHaveLength(1);
    expect(write).toHaveBeenCalledWith(
      'WARN: Merged turns failed validation (1 problems): Turn 0: question_likelihood must be between 0 and 1\n',
    );
  });

  it('propagates a missing chunk result', () => {
    expect(() => assembleTurnsDocument('m', [{ chunkIndex: 0, turns: [] }], META)).toThrow(MissingChunkResultError);
  });
});
