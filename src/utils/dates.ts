/**
 * Calendar date utilities. All dates are handled as UTC midnight timestamps.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Parse a calendar date into its UTC midnight timestamp.
 *
 * Accepts `YYYY-MM-DD`, optionally followed by a time part (which is ignored,
 * e.g. `2024-03-01T00:00:00`).
 *
 * @param value - Date string
 * @returns Timestamp in milliseconds, or undefined if the date is invalid
 *
 * @example
 * ```typescript
 * parseDate('2024-03-01'); // 1709251200000
 * parseDate('2024-02-30'); // undefined
 * ```
 */
export function parseDate(value: string): number | undefined {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const timestamp = Date.UTC(year, month - 1, day);

  // Reject dates that Date.UTC rolled over (e.g. Feb 30 -> Mar 1)
  const check = new Date(timestamp);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return undefined;
  }

  return timestamp;
}

/**
 * Format a timestamp as `YYYY-MM-DD` (UTC).
 */
export function formatDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * UTC calendar year of a timestamp.
 */
export function getUTCYear(timestamp: number): number {
  return new Date(timestamp).getUTCFullYear();
}
