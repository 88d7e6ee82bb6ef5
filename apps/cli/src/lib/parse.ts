/**
 * Option parsing helpers
 *
 * Numbers are parsed leniently here; the job runner rejects what is not a
 * usable value, so a bad option fails the job with a readable reason.
 */

export function parseNumber(value: string): number {
  return value.trim().length === 0 ? Number.NaN : Number(value);
}

export function parseOptionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value.trim().length === 0 ? undefined : parseNumber(value);
}
