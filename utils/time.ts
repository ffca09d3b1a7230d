/**
 * Time formatting helpers (all UTC)
 */

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Unix seconds to `YYYY-MM-DDTHH:MM:SSZ`; sub-second precision is dropped
 */
export function formatUnixSeconds(seconds: number): string | null {
  if (!Number.isFinite(seconds)) {
    return null;
  }
  const date = new Date(Math.floor(seconds) * 1000);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function nowIso(date: Date = new Date()): string {
  return date.toISOString();
}

/**
 * `YYYYMMDD_HHMMSS`, optionally with `_mmm` milliseconds
 */
export function fileTimestamp(date: Date = new Date(), withMilliseconds: boolean = false): string {
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return withMilliseconds ? `${stamp}_${pad(date.getUTCMilliseconds(), 3)}` : stamp;
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}
