/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Convert a compact `YYYYMMDD` date (as printed by the fetch tool) to an ISO
 * calendar date. Anything else is returned unchanged.
 *
 * @example
 * normalizeCompactDate('20240307'); // '2024-03-07'
 */
export function normalizeCompactDate(value: string): string {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value.trim());
  if (!match) return value;
  const [, year, month, day] = match;
  return `${year}-${month}-${day}`;
}

/**
 * Format a timestamp for log files: `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Format duration in human-readable format
 *
 * @param ms - Duration in milliseconds
 * @returns e.g. "1h 2m 3s", "4m 5s", "6s"
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}
