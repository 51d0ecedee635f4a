// Layout of the timestamps the router writes at the start of each log line:
// UTC, nine fractional digits, literal Z (e.g. 2006-01-02T15:04:05.000000000Z).
export const NANO_TIMESTAMP_LAYOUT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{9})Z$/;

/**
 * Parse a timestamp in the fixed nanosecond layout. Returns null when the text
 * does not follow the layout or names an impossible date. Precision below a
 * millisecond is dropped.
 */
export function parseNanoTimestamp(text: string): Date | null {
  const match = NANO_TIMESTAMP_LAYOUT.exec(text);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(part => parseInt(part, 10));
  const millis = parseInt(match[7].slice(0, 3), 10);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date;
}

export function formatNanoTimestamp(date: Date): string {
  return date.toISOString().replace(/\.(\d{3})Z$/, '.$1000000Z');
}
