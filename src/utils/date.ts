/**
 * Capture timestamps are naive wall-clock values (EXIF stores no zone).
 * They are held in Date objects whose UTC fields carry the wall-clock time,
 * so arithmetic and calendar dates never shift with the host's time zone.
 */

const EXIF_DATETIME = /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?/;

const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

function buildWallClock(parts: RegExpMatchArray): Date | null {
  const [, y, mo, d, h, mi, s, frac] = parts;
  const year = parseInt(y, 10);
  const month = parseInt(mo, 10);
  const day = parseInt(d, 10);
  const hour = parseInt(h, 10);
  const minute = parseInt(mi, 10);
  const second = parseInt(s, 10);

  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const ms = frac ? Math.floor(parseInt(frac.padEnd(6, "0"), 10) / 1000) : 0;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));

  // Reject rollovers such as Feb 30
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) return null;
  // Years below 100 are mapped to 19xx by Date.UTC
  date.setUTCFullYear(year);
  return date;
}

/**
 * Parse an EXIF timestamp ("2017:09:23 23:11:37", "2017-09-23 23:11:37",
 * optional fractional seconds). Zeroed placeholders like "0000:00:00 00:00:00"
 * yield null.
 */
export function parseExifDateTime(value: string): Date | null {
  const match = value.trim().match(EXIF_DATETIME);
  if (!match) return null;
  return buildWallClock(match);
}

/** Parse the index's persisted form ("2017-09-23T23:11:37"). */
export function parseIsoDateTime(value: string): Date | null {
  const match = value.match(ISO_DATETIME);
  if (!match) return null;
  return buildWallClock(match);
}

/** Persisted form: seconds precision, milliseconds only when non-zero. */
export function formatIsoDateTime(date: Date): string {
  const iso = date.toISOString();
  return date.getUTCMilliseconds() === 0 ? iso.slice(0, 19) : iso.slice(0, 23);
}

/** Calendar date (YYYY-MM-DD) used to group photos for matching. */
export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Format a signed time delta as "+41m37s", "-1h05m00s" or "+12s".
 */
export function formatTimeDelta(deltaMs: number): string {
  const totalSeconds = Math.trunc(deltaMs / 1000);
  const sign = totalSeconds < 0 ? "-" : "+";
  const abs = Math.abs(totalSeconds);
  const hours = Math.floor(abs / 3600);
  const minutes = Math.floor((abs % 3600) / 60);
  const seconds = abs % 60;

  if (hours > 0) {
    return `${sign}${hours}h${String(minutes).padStart(2, "0")}m${String(seconds).padStart(2, "0")}s`;
  }
  if (minutes > 0) {
    return `${sign}${minutes}m${String(seconds).padStart(2, "0")}s`;
  }
  return `${sign}${seconds}s`;
}
