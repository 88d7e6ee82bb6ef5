/**
 * Batch Description
 *
 * One job per line: `date, folder, start_frame, end_frame, fps, rotation`.
 * The last three fields are optional. Blank lines and `#` comments are
 * skipped; every field is whitespace-trimmed.
 */

import { join } from 'node:path';
import {
  BatchFileNotFoundError,
  DEFAULT_TIMESTAMP_STYLE,
  type TimelapseJob,
  type TimestampOverlay,
} from '@timelapse/core';
import { safeReadFile, sanitizeFilename } from '@timelapse/utils';

export interface BatchEntry {
  lineNumber: number;
  date: string;
  folder: string;
  start: string;
  end: string;
  fps: string;
  rotation: string;
}

export interface BatchDefaults {
  outputDir: string;
  frameRate: number;
  rotation: string;
  timestamp: TimestampOverlay;
}

export const DEFAULT_BATCH_DEFAULTS: Readonly<BatchDefaults> = Object.freeze({
  outputDir: '.',
  frameRate: 30,
  rotation: 'cw',
  // Overlay is opt-in for batch runs
  timestamp: { enabled: false, style: { ...DEFAULT_TIMESTAMP_STYLE } },
});

export const COMMENT_MARKER = '#';

export function parseBatchDescription(text: string): BatchEntry[] {
  const entries: BatchEntry[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith(COMMENT_MARKER)) {
      return;
    }

    const [date = '', folder = '', start = '', end = '', fps = '', rotation = ''] = line
      .split(',')
      .map((field) => field.trim());

    entries.push({ lineNumber: index + 1, date, folder, start, end, fps, rotation });
  });

  return entries;
}

/**
 * Read a batch description from disk. A missing or unreadable file is fatal
 * for the whole batch.
 */
export async function loadBatchFile(path: string): Promise<BatchEntry[]> {
  let content: string | null;
  try {
    content = await safeReadFile(path);
  } catch (error) {
    throw new BatchFileNotFoundError(path, error instanceof Error ? error.message : String(error));
  }

  if (content === null) {
    throw new BatchFileNotFoundError(path);
  }

  return parseBatchDescription(content);
}

/**
 * Integer field; an empty field is NaN so validation reports it as missing
 */
function numericField(value: string): number {
  return value.length === 0 ? Number.NaN : Number(value);
}

export function outputNameForDate(date: string): string {
  return `timelapse_${sanitizeFilename(date)}.mp4`;
}

/**
 * Turn an entry into a job, filling in defaults for the optional fields.
 * Malformed values are passed through for the runner to reject.
 */
export function entryToJob(
  entry: BatchEntry,
  defaults: BatchDefaults = DEFAULT_BATCH_DEFAULTS
): TimelapseJob {
  return {
    id: `line-${entry.lineNumber}`,
    sourceFolder: entry.folder,
    outputPath: entry.date.length > 0 ? join(defaults.outputDir, outputNameForDate(entry.date)) : '',
    startFrame: numericField(entry.start),
    endFrame: entry.end.length > 0 ? numericField(entry.end) : undefined,
    frameRate: entry.fps.length > 0 ? numericField(entry.fps) : defaults.frameRate,
    rotation: entry.rotation.length > 0 ? entry.rotation : defaults.rotation,
    timestamp: {
      enabled: defaults.timestamp.enabled,
      style: { ...defaults.timestamp.style },
    },
  };
}
