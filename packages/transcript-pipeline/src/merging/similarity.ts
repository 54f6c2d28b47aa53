/**
 * FILE PURPOSE: Turn-level near-duplicate detection
 * WHY: The overlap region is analysed twice, once per neighbouring chunk, and the
 *      model rarely phrases a turn identically both times. Word-set Jaccard on
 *      normalised text catches those copies without embeddings.
 */

/** Threshold for a general "are these the same turn" check. */
export const TURN_DUPLICATE_THRESHOLD = 0.8;

/** Fields the duplicate check reads. Anything may be missing on model output. */
export interface ComparableTurn {
  speaker?: string | null;
  text?: string | null;
}

export function normalizeSpeaker(speaker: string | null | undefined): string {
  return (speaker ?? '').trim().toLowerCase();
}

export function normalizeText(text: string | null | undefined): string {
  return (text ?? '').split(/\s+/).filter(Boolean).join(' ').toLowerCase();
}

/**
 * Jaccard similarity of the two texts' word sets, in [0, 1].
 * Identical normalised text (empty included) short-circuits to 1; otherwise text
 * with no words scores 0.
 */
export function textSimilarity(a: string | null | undefined, b: string | null | undefined): number {
  const normA = normalizeText(a);
  const normB = normalizeText(b);

  if (normA === normB) return 1;
  if (!normA || !normB) return 0;

  const wordsA = new Set(normA.split(' '));
  const wordsB = new Set(normB.split(' '));

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Position of the first candidate spoken by the same speaker whose text is at
 * least `threshold` similar, or null.
 */
export function findDuplicateTurn(
  turn: ComparableTurn,
  candidates: readonly ComparableTurn[],
  threshold = TURN_DUPLICATE_THRESHOLD,
): number | null {
  const speaker = normalizeSpeaker(turn.speaker);

  for (let i = 0; i < candidates.length; i++) {
    const candidate = candidates[i];
    if (!candidate || normalizeSpeaker(candidate.speaker) !== speaker) continue;
    if (textSimilarity(turn.text, candidate.text) >= threshold) {
      return i;
    }
  }
  return null;
}
