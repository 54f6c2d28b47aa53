/**
 * FILE PURPOSE: Records that cross the transcript pipeline boundary
 *
 * WHY: The turn extractor, the merger, the segmenter and whatever writes the
 *      JSON artifacts all agree on one shape. Field names are snake_case because
 *      these records are the on-disk / model-output JSON, not internal state.
 */

/** Every turn classification the analysis step may emit. */
export const TURN_TYPES = ['question', 'answer', 'followup', 'monologue', 'housekeeping'] as const;

export type TurnType = (typeof TURN_TYPES)[number];

/** One attributed utterance extracted from a chunk of transcript. */
export interface Turn {
  /** Chunk-local until the merger re-sequences the whole meeting. */
  idx: number;
  /** HH:MM:SS */
  start_ts: string;
  /** HH:MM:SS */
  end_ts: string;
  speaker: string;
  type: TurnType;
  /** 0.0 – 1.0 */
  question_likelihood: number;
  text: string;
}

/** A token-bounded run of consecutive turns, the unit of the coarser analysis pass. */
export interface Segment {
  id: number;
  start_time: number | null;
  end_time: number | null;
  topic: string;
  speakers: string[];
  text: string;
  /** Position of the segment's first turn in the input sequence. */
  first_turn: number;
  /** Position of the segment's last turn in the input sequence (inclusive). */
  last_turn: number;
}

/** Merged turns for a whole meeting, as written to the turns artifact. */
export interface TurnsDocument {
  meeting_id: string;
  turns: Turn[];
  metadata: {
    total_turns: number;
    chunk_count: number;
    merged_at: string;
  };
}

export function isTurnType(value: unknown): value is TurnType {
  return typeof value === 'string' && TURN_TYPES.some((type) => type === value);
}
