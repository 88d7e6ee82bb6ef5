/**
 * Solar Events
 *
 * Sunrise and sunset from the NOAA General Solar Position approximation:
 * fractional year, equation of time, solar declination and the hour angle
 * at a given zenith. Accurate to a minute or two, which is far below the
 * spacing of time-lapse frames.
 */

export type SunEvent = 'sunrise' | 'sunset';

export const SUN_EVENTS: readonly SunEvent[] = ['sunrise', 'sunset'];

/** Sun centre 50' below the horizon: refraction plus apparent radius */
export const OFFICIAL_ZENITH = 90.833;

export interface SiteLocation {
  latitude: number;
  longitude: number;
  /** Fixed offset of the camera clock from UTC, in hours (e.g. -8) */
  utcOffsetHours: number;
}

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTES_PER_DAY = 1440;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function dayOfYear(date: CalendarDate): number {
  const start = Date.UTC(date.year, 0, 1);
  const current = Date.UTC(date.year, date.month - 1, date.day);
  return Math.round((current - start) / DAY_MS) + 1;
}

/**
 * Wall-clock time of a sun event at the site's UTC offset, on the same
 * UTC-anchored scale as parsed capture times. Null when the sun stays
 * above or below the zenith all day.
 */
export function computeSunEvent(
  date: CalendarDate,
  event: SunEvent,
  site: SiteLocation,
  zenith: number = OFFICIAL_ZENITH
): number | null {
  const gamma = ((2 * Math.PI) / 365) * (dayOfYear(date) - 1);

  const eqtime = 229.18 * (
    0.000075
    + 0.001868 * Math.cos(gamma)
    - 0.032077 * Math.sin(gamma)
    - 0.014615 * Math.cos(2 * gamma)
    - 0.040849 * Math.sin(2 * gamma)
  );

  const decl = 0.006918
    - 0.399912 * Math.cos(gamma)
    + 0.070257 * Math.sin(gamma)
    - 0.006758 * Math.cos(2 * gamma)
    + 0.000907 * Math.sin(2 * gamma)
    - 0.002697 * Math.cos(3 * gamma)
    + 0.00148 * Math.sin(3 * gamma);

  const lat = toRadians(site.latitude);
  const cosHa = Math.cos(toRadians(zenith)) / (Math.cos(lat) * Math.cos(decl)) - Math.tan(lat) * Math.tan(decl);

  if (cosHa > 1 || cosHa < -1) {
    return null;
  }

  const haDeg = toDegrees(Math.acos(cosHa));
  const solarNoonUtc = 720 - 4 * site.longitude - eqtime;
  const utcMinutes = event === 'sunrise' ? solarNoonUtc - 4 * haDeg : solarNoonUtc + 4 * haDeg;

  const localMinutes =
    (((utcMinutes + site.utcOffsetHours * 60) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;

  return Date.UTC(date.year, date.month - 1, date.day) + Math.round(localMinutes * 60) * 1000;
}

export function calendarDateOf(wallClock: number): CalendarDate {
  const value = new Date(wallClock);
  return {
    year: value.getUTCFullYear(),
    month: value.getUTCMonth() + 1,
    day: value.getUTCDate(),
  };
}

/**
 * Midnight of each calendar day from `from` to `to`, inclusive
 */
export function eachDay(from: number, to: number): number[] {
  const days: number[] = [];
  for (let day = Math.floor(from / DAY_MS) * DAY_MS; day <= to; day += DAY_MS) {
    days.push(day);
  }
  return days;
}
