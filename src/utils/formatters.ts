/**
 * Utility functions for formatting sizes, dates, and other display values
 */

const KB = 1024;
const MB = 1024 * 1024;

/**
 * Format a byte count for display
 * @returns e.g. "500 B", "2.0 KB", "5.00 MB"
 */
export function humanBytes(bytes: number): string {
  if (bytes < KB) return `${bytes} B`;
  if (bytes < MB) return `${(bytes / KB).toFixed(1)} KB`;
  return `${(bytes / MB).toFixed(2)} MB`;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `yyyy-MM-dd HH:mm:ss` in local time
 * @param value - Date or epoch milliseconds
 */
export function formatDateTime(value: Date | number): string {
  const date = typeof value === 'number' ? new Date(value) : value;
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Format an optional archive timestamp, falling back to an em-dash
 */
export function formatTraceTimestamp(millis: number | undefined): string {
  return millis === undefined ? '—' : formatDateTime(millis);
}
