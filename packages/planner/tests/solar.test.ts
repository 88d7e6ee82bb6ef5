import { describe, expect, test } from 'vitest';

import { calendarDateOf, computeSunEvent, dayOfYear, eachDay, type SiteLocation } from '../src/solar.js';

const SAN_FRANCISCO: SiteLocation = { latitude: 37.791667734079596, longitude: -122.41549323195979, utcOffsetHours: -7 };
const HIGH_ARCTIC: SiteLocation = { latitude: 80, longitude: 10, utcOffsetHours: 1 };

function expectNear(actual: number | null, expected: number, toleranceMs: number = 60_000): void {
  expect(actual).not.toBeNull();
  expect(Math.abs((actual ?? 0) - expected)).toBeLessThanOrEqual(toleranceMs);
}

describe('computeSunEvent', () => {
  test('summer solstice in daylight saving time', () => {
    const date = { year: 2025, month: 6, day: 21 };

    expectNear(computeSunEvent(date, 'sunrise', SAN_FRANCISCO), Date.UTC(2025, 5, 21, 5, 47, 28));
    expectNear(computeSunEvent(date, 'sunset', SAN_FRANCISCO), Date.UTC(2025, 5, 21, 20, 34, 31));
  });

  test('winter sunset in standard time', () => {
    const site = { ...SAN_FRANCISCO, utcOffsetHours: -8 };

    expectNear(
      computeSunEvent({ year: 2025, month: 12, day: 15 }, 'sunset', site),
      Date.UTC(2025, 11, 15, 16, 51, 52)
    );
  });

  test('returns null during polar night and midnight sun', () => {
    expect(computeSunEvent({ year: 2025, month: 12, day: 21 }, 'sunrise', HIGH_ARCTIC)).toBeNull();
    expect(computeSunEvent({ year: 2025, month: 6, day: 21 }, 'sunset', HIGH_ARCTIC)).toBeNull();
  });
});

describe('calendar helpers', () => {
  test('dayOfYear counts from 1', () => {
    expect(dayOfYear({ year: 2025, month: 1, day: 1 })).toBe(1);
    expect(dayOfYear({ year: 2025, month: 6, day: 21 })).toBe(172);
    expect(dayOfYear({ year: 2024, month: 12, day: 31 })).toBe(366);
  });

  test('eachDay covers both ends of the window', () => {
    expect(eachDay(Date.UTC(2025, 5, 21, 5, 0, 0), Date.UTC(2025, 5, 22, 1, 0, 0))).toEqual([
      Date.UTC(2025, 5, 21),
      Date.UTC(2025, 5, 22),
    ]);
  });

  test('calendarDateOf reads the wall-clock date', () => {
    expect(calendarDateOf(Date.UTC(2025, 11, 31, 23, 59, 59))).toEqual({ year: 2025, month: 12, day: 31 });
  });
});
