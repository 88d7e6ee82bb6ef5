import { describe, expect, test } from 'vitest';

import {
  BatchFileNotFoundError,
  EmptyRangeError,
  EncodeFailedError,
  MissingParameterError,
  NoFramesFoundError,
  TimelapseError,
  isTimelapseError,
} from '../src/errors/index.js';

describe('error taxonomy', () => {
  test('each error carries its code and message', () => {
    expect(new NoFramesFoundError('/frames', 'TLS_*.jpg')).toMatchObject({
      code: 'NO_FRAMES_FOUND',
      message: 'No TLS_*.jpg files found in /frames',
    });
    expect(new EmptyRangeError(50, 10)).toMatchObject({
      code: 'EMPTY_RANGE',
      details: { start: 50, end: 10 },
    });
    expect(new MissingParameterError('outputPath').message).toBe('Missing parameter outputPath: is required');
    expect(new EncodeFailedError('/videos/out.mp4', 1).message).toBe('Failed to create /videos/out.mp4');
    expect(new BatchFileNotFoundError('timelapse_config.txt').message).toBe("Config file 'timelapse_config.txt' not found");
  });

  test('subclasses are recognised as time-lapse errors', () => {
    const error = new EmptyRangeError(2, 1);

    expect(error).toBeInstanceOf(TimelapseError);
    expect(error.name).toBe('EmptyRangeError');
    expect(isTimelapseError(error)).toBe(true);
    expect(isTimelapseError(new Error('plain'))).toBe(false);
  });

  test('fromUnknown wraps foreign errors and keeps ours', () => {
    const ours = new EmptyRangeError(2, 1);
    const foreign = new TypeError('bad value');
    const wrapped = TimelapseError.fromUnknown(foreign);

    expect(TimelapseError.fromUnknown(ours)).toBe(ours);
    expect(wrapped.code).toBe('UNEXPECTED_ERROR');
    expect(wrapped.message).toBe('bad value');
    expect(wrapped.cause).toBe(foreign);
    expect(TimelapseError.fromUnknown('boom').message).toBe('Unknown error');
  });
});
