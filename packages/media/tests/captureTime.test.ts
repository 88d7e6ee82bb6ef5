import { describe, expect, test } from 'vitest';

import { formatCaptureDate, formatCaptureTime, parseCaptureTime } from '../src/captureTime.js';

describe('capture times', () => {
  test('parses wall-clock values', () => {
    expect(parseCaptureTime('2025-06-21 05:00:00')).toBe(Date.UTC(2025, 5, 21, 5, 0, 0));
    expect(parseCaptureTime(' 2025-06-21T23:59:59 ')).toBe(Date.UTC(2025, 5, 21, 23, 59, 59));
  });

  test('rejects other shapes', () => {
    expect(parseCaptureTime('2025:06:21 05:00:00')).toBeNull();
    expect(parseCaptureTime('')).toBeNull();
  });

  test('formats back to the same text', () => {
    const value = Date.UTC(2024, 0, 15, 17, 4, 9);

    expect(formatCaptureTime(value)).toBe('2024-01-15 17:04:09');
    expect(formatCaptureDate(value)).toBe('2024-01-15');
  });
});
