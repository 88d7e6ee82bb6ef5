/**
 * Capture Time Parsing
 *
 * Capture times are naive wall-clock values (`YYYY-MM-DD HH:MM:SS`). They are
 * held as milliseconds on a UTC-anchored scale so that arithmetic never
 * crosses a time zone rule; the scale is only meaningful relative to other
 * wall-clock values from the same site.
 */

const CAPTURE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;

export function parseCaptureTime(value: string): number | null {
  const match = CAPTURE_TIME_RE.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match;
  const wallClock = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds)
  );

  return Number.isNaN(wallClock) ? null : wallClock;
}

export function formatCaptureTime(wallClock: number): string {
  return new Date(wallClock).toISOString().replace('T', ' ').substring(0, 19);
}

/**
 * `YYYY-MM-DD` of a wall-clock value
 */
export function formatCaptureDate(wallClock: number): string {
  return new Date(wallClock).toISOString().substring(0, 10);
}
