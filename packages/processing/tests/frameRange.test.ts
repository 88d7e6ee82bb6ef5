import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import {
  EmptyRangeError,
  FolderNotFoundError,
  InvalidParameterError,
  NoFramesFoundError,
} from '@timelapse/core';

import { countFrames, detectLastFrame, listFrameFiles, parseFrameIndex, resolveFrameRange } from '../src/frameRange.js';
import { frameName, makeTempDir, writeFrames } from './fixtures.js';

let folder: string;

beforeEach(async () => {
  folder = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(folder, { recursive: true, force: true });
});

describe('parseFrameIndex', () => {
  test('strips prefix, extension and leading zeros', () => {
    expect(parseFrameIndex('TLS_000000042.jpg')).toBe(42);
    expect(parseFrameIndex('TLS_000001800.jpg')).toBe(1800);
    expect(parseFrameIndex('TLS_100000000.jpg')).toBe(100000000);
  });

  test('treats an all-zero index as frame 1', () => {
    expect(parseFrameIndex('TLS_000000000.jpg')).toBe(1);
  });
});

describe('listFrameFiles', () => {
  test('ignores files outside the naming convention', async () => {
    await writeFrames(folder, 1, 3);
    await fs.writeFile(path.join(folder, 'TLS_1.jpg'), '');
    await fs.writeFile(path.join(folder, 'TLS_000000004.JPG'), '');
    await fs.writeFile(path.join(folder, 'notes.txt'), '');

    expect(await listFrameFiles(folder)).toEqual([frameName(1), frameName(2), frameName(3)]);
  });

  test('fails on a missing folder', async () => {
    await expect(listFrameFiles(path.join(folder, 'missing'))).rejects.toBeInstanceOf(FolderNotFoundError);
  });
});

describe('detectLastFrame', () => {
  test('uses the highest index, not the count', async () => {
    await writeFrames(folder, 10, 12);
    await writeFrames(folder, 500, 500);

    expect(await detectLastFrame(folder)).toBe(500);
  });

  test('fails when no frame matches', async () => {
    await fs.writeFile(path.join(folder, 'IMG_0001.jpg'), '');

    const failure = detectLastFrame(folder);
    await expect(failure).rejects.toBeInstanceOf(NoFramesFoundError);
    await expect(failure).rejects.toThrow(`No TLS_*.jpg files found in ${folder}`);
  });
});

describe('resolveFrameRange', () => {
  test('auto-detects the end of a full sequence', async () => {
    await writeFrames(folder, 1, 1800);

    expect(await resolveFrameRange(folder, 1, undefined)).toEqual({
      start: 1,
      end: 1800,
      frameCount: 1800,
      autoDetected: true,
    });
  });

  test('resolves a sole zero-index frame to frame 1', async () => {
    await fs.writeFile(path.join(folder, 'TLS_000000000.jpg'), '');

    expect(await resolveFrameRange(folder, 1, undefined)).toEqual({
      start: 1,
      end: 1,
      frameCount: 1,
      autoDetected: true,
    });
  });

  test('trusts an explicit end without reading the folder', async () => {
    expect(await resolveFrameRange(path.join(folder, 'missing'), 100, 399)).toEqual({
      start: 100,
      end: 399,
      frameCount: 300,
      autoDetected: false,
    });
  });

  test('rejects an end before the start', async () => {
    const failure = resolveFrameRange(folder, 50, 10);

    await expect(failure).rejects.toBeInstanceOf(EmptyRangeError);
    await expect(failure).rejects.toMatchObject({ code: 'EMPTY_RANGE', details: { start: 50, end: 10 } });
  });

  test('accepts a single-frame range', async () => {
    expect(await resolveFrameRange(folder, 7, 7)).toMatchObject({ frameCount: 1 });
  });

  test('rejects a start frame below 1', async () => {
    await expect(resolveFrameRange(folder, 0, 10)).rejects.toBeInstanceOf(InvalidParameterError);
  });

  test('countFrames is inclusive', () => {
    expect(countFrames(100, 399)).toBe(300);
  });
});
