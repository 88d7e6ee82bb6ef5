/**
 * ExifTool Wrapper
 * 
 * Safe wrapper for exiftool command execution.
 * Reads capture dates from image metadata.
 */

import { executeCommand, createLogger } from '@timelapse/utils';
import type { CaptureTime, MetadataField, MetadataReader } from '../types.js';

const logger = createLogger({ module: 'exiftool' });

/**
 * Date fields tried in order when looking for a capture time
 */
export const CAPTURE_TIME_FIELDS: readonly MetadataField[] = ['DateTimeOriginal', 'CreateDate'];

export const CAPTURE_TIME_FORMAT = '%Y-%m-%d %H:%M:%S';

export class ExifToolProbe implements MetadataReader {
  private exiftoolPath: string;
  private timeout: number;

  constructor(exiftoolPath: string = 'exiftool', timeout: number = 30000) {
    this.exiftoolPath = exiftoolPath;
    this.timeout = timeout;
  }

  /**
   * Build the argument list for a single-field read
   */
  buildArgs(filePath: string, field: MetadataField): string[] {
    return [`-${field}`, '-d', CAPTURE_TIME_FORMAT, '-s3', filePath];
  }

  async readField(filePath: string, field: MetadataField): Promise<string | null> {
    const result = await executeCommand(this.exiftoolPath, this.buildArgs(filePath, field), {
      timeout: this.timeout,
    });

    if (result.exitCode !== 0) {
      logger.debug({ filePath, field, exitCode: result.exitCode, stderr: result.stderr.trim() }, 'exiftool returned an error');
      return null;
    }

    // -s3 prints the bare value; keep the first line if several tags matched
    const value = result.stdout.trim().split('\n')[0]?.trim() ?? '';
    return value.length > 0 ? value : null;
  }
}

/**
 * Try each field in order and return the first non-empty value
 */
export async function readCaptureTime(
  reader: MetadataReader,
  filePath: string,
  fields: readonly MetadataField[] = CAPTURE_TIME_FIELDS
): Promise<CaptureTime | null> {
  for (const field of fields) {
    const value = await reader.readField(filePath, field);
    if (value) {
      return { field, value };
    }
  }
  return null;
}
