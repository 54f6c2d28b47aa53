const DECIMAL = /^\d+(\.\d+)?$/;

/** `HH:MM:SS` (seconds may be fractional) to seconds; anything else is null. */
export function parseTimestampSeconds(ts: string | null | undefined): number | null {
  if (!ts) return null;
  const parts = ts.split(':');
  if (parts.length !== 3) return null;

  const trimmed = parts.map((part) => part.trim());
  if (!trimmed.every((part) => DECIMAL.test(part))) return null;
  const values = trimmed.map(Number);

  const [hours = 0, minutes = 0, seconds = 0] = values;
  return hours * 3600 + minutes * 60 + seconds;
}
