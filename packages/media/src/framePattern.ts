/**
 * Frame Naming Convention
 *
 * Frames live in one folder as `<prefix><zero-padded index><extension>`,
 * e.g. `TLS_000000042.jpg`. The width is fixed, so lexicographic order of
 * matching names equals numeric order of their indices.
 */

import { join } from 'node:path';

export interface FramePattern {
  prefix: string;
  width: number;
  extension: string;
}

export const DEFAULT_FRAME_PATTERN: Readonly<FramePattern> = Object.freeze({
  prefix: 'TLS_',
  width: 9,
  extension: '.jpg',
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches a frame filename exactly, capturing the digits
 */
export function frameFileRegex(pattern: FramePattern): RegExp {
  return new RegExp(
    `^${escapeRegExp(pattern.prefix)}(\\d{${pattern.width}})${escapeRegExp(pattern.extension)}$`
  );
}

export function frameFileName(pattern: FramePattern, index: number): string {
  return `${pattern.prefix}${String(index).padStart(pattern.width, '0')}${pattern.extension}`;
}

export function framePath(folder: string, pattern: FramePattern, index: number): string {
  return join(folder, frameFileName(pattern, index));
}

/**
 * printf-style sequence pattern the encoder expands itself
 */
export function sequencePattern(folder: string, pattern: FramePattern): string {
  return join(folder, `${pattern.prefix}%0${pattern.width}d${pattern.extension}`);
}

/**
 * Shell-glob rendering for messages
 */
export function describeFramePattern(pattern: FramePattern): string {
  return `${pattern.prefix}*${pattern.extension}`;
}
