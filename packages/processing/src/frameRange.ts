/**
 * Frame Range Resolver
 *
 * Determines the first and last frame index to encode. When the last frame
 * is not given it is detected from the highest-numbered frame on disk.
 */

import { readdir } from 'node:fs/promises';
import {
  EmptyRangeError,
  FolderNotFoundError,
  InvalidParameterError,
  NoFramesFoundError,
  type ResolvedRange,
} from '@timelapse/core';
import {
  DEFAULT_FRAME_PATTERN,
  describeFramePattern,
  frameFileRegex,
  type FramePattern,
} from '@timelapse/media';
import { isDirectory, isPositiveInteger } from '@timelapse/utils';

/**
 * Parse the numeric field of a frame filename.
 *
 * Strips the prefix, the extension and any leading zeros. An all-zero index
 * strips down to nothing and falls back to 1, so index 0 is never returned.
 */
export function parseFrameIndex(
  filename: string,
  pattern: FramePattern = DEFAULT_FRAME_PATTERN
): number {
  let digits = filename;
  if (digits.startsWith(pattern.prefix)) {
    digits = digits.substring(pattern.prefix.length);
  }
  if (digits.endsWith(pattern.extension)) {
    digits = digits.substring(0, digits.length - pattern.extension.length);
  }
  digits = digits.replace(/^0+/, '');

  if (digits.length === 0) {
    return 1;
  }

  const index = Number.parseInt(digits, 10);
  return Number.isNaN(index) || index === 0 ? 1 : index;
}

/**
 * Frame filenames in a folder, in ascending index order
 */
export async function listFrameFiles(
  folder: string,
  pattern: FramePattern = DEFAULT_FRAME_PATTERN
): Promise<string[]> {
  if (!(await isDirectory(folder))) {
    throw new FolderNotFoundError(folder);
  }

  const matcher = frameFileRegex(pattern);
  const entries = await readdir(folder);

  // Code-unit comparison; fixed width makes this numeric order too
  return entries
    .filter((name) => matcher.test(name))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export async function detectLastFrame(
  folder: string,
  pattern: FramePattern = DEFAULT_FRAME_PATTERN
): Promise<number> {
  const frames = await listFrameFiles(folder, pattern);
  const last = frames[frames.length - 1];
  if (last === undefined) {
    throw new NoFramesFoundError(folder, describeFramePattern(pattern));
  }
  return parseFrameIndex(last, pattern);
}

export function countFrames(start: number, end: number): number {
  return end - start + 1;
}

/**
 * Resolve the frame range for a job.
 *
 * An explicit end frame is trusted as-is and never touches the filesystem.
 */
export async function resolveFrameRange(
  folder: string,
  start: number,
  end: number | undefined,
  pattern: FramePattern = DEFAULT_FRAME_PATTERN
): Promise<ResolvedRange> {
  if (!isPositiveInteger(start)) {
    throw new InvalidParameterError('startFrame', start, 'must be a positive integer');
  }

  let resolvedEnd: number;
  let autoDetected = false;

  if (end === undefined) {
    resolvedEnd = await detectLastFrame(folder, pattern);
    autoDetected = true;
  } else {
    if (!Number.isInteger(end)) {
      throw new InvalidParameterError('endFrame', end, 'must be an integer');
    }
    resolvedEnd = end;
  }

  if (resolvedEnd < start) {
    throw new EmptyRangeError(start, resolvedEnd);
  }

  return {
    start,
    end: resolvedEnd,
    frameCount: countFrames(start, resolvedEnd),
    autoDetected,
  };
}
