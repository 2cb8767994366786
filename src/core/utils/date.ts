/**
 * Date formatting utilities
 */

const pad = (n: number): string => String(n).padStart(2, "0");

/**
 * Formats a date on the local clock as "YYYY-MM-DD HH:MM:SS"
 * @param date - Date to format
 * @returns Timestamp string with second precision
 */
export function formatLocalTimestamp(date: Date): string {
  const y = date.getFullYear();
  const m = pad(date.getMonth() + 1);
  const d = pad(date.getDate());
  const hh = pad(date.getHours());
  const mm = pad(date.getMinutes());
  const ss = pad(date.getSeconds());
  return `${y}-${m}-${d} ${hh}:${mm}:${ss}`;
}

/** Matches timestamps produced by formatLocalTimestamp */
export const LOCAL_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/**
 * Formats a duration in seconds to a human-readable string
 * @param sec - Duration in seconds
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(sec: number): string {
  const s = Math.max(0, Math.floor(sec));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}
