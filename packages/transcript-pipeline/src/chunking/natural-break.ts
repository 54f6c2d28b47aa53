/**
 * FILE PURPOSE: Find a paragraph or line boundary near a target offset
 *
 * Precedence is fixed and asymmetric: backward blank line, forward blank line,
 * backward newline, forward newline, then the raw target. Chunk boundaries of
 * existing runs depend on this order; keep it.
 */

export const DEFAULT_SEARCH_RADIUS_CHARS = 500;

/**
 * Returns the offset just after the chosen break, or `target` when no break
 * lies within `radius` characters of it.
 */
export function findNaturalBreak(
  text: string,
  target: number,
  radius = DEFAULT_SEARCH_RADIUS_CHARS,
): number {
  const start = Math.max(0, target - radius);
  const end = Math.min(text.length, target + radius);

  for (let i = target; i > start; i--) {
    if (i + 1 < text.length && text[i] === '\n' && text[i + 1] === '\n') {
      return i + 2;
    }
  }

  for (let i = target; i < end - 1; i++) {
    if (text[i] === '\n' && text[i + 1] === '\n') {
      return i + 2;
    }
  }

  for (let i = target; i > start; i--) {
    if (text[i] === '\n') {
      return i + 1;
    }
  }

  for (let i = target; i < end; i++) {
    if (text[i] === '\n') {
      return i + 1;
    }
  }

  return target;
}
