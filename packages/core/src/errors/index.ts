/**
 * Custom Error Classes
 */

export type ErrorCode =
  | 'FOLDER_NOT_FOUND'
  | 'NO_FRAMES_FOUND'
  | 'EMPTY_RANGE'
  | 'MISSING_PARAMETER'
  | 'INVALID_PARAMETER'
  | 'ENCODE_FAILED'
  | 'BATCH_FILE_NOT_FOUND'
  | 'UNEXPECTED_ERROR';

/**
 * Conditions recovered within the same job by substituting a default
 */
export type WarningCode =
  | 'METADATA_UNAVAILABLE'
  | 'UNKNOWN_ROTATION'
  | 'FONT_NOT_FOUND';

/**
 * Base error class for all time-lapse errors
 */
export class TimelapseError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TimelapseError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  static fromUnknown(error: unknown): TimelapseError {
    if (error instanceof TimelapseError) {
      return error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    const wrapped = new TimelapseError(message, 'UNEXPECTED_ERROR');
    wrapped.cause = error;
    return wrapped;
  }
}

export class FolderNotFoundError extends TimelapseError {
  constructor(folder: string) {
    super(`Folder '${folder}' does not exist`, 'FOLDER_NOT_FOUND', { folder });
    this.name = 'FolderNotFoundError';
  }
}

export class NoFramesFoundError extends TimelapseError {
  constructor(folder: string, pattern: string) {
    super(`No ${pattern} files found in ${folder}`, 'NO_FRAMES_FOUND', { folder, pattern });
    this.name = 'NoFramesFoundError';
  }
}

export class EmptyRangeError extends TimelapseError {
  constructor(start: number, end: number) {
    super(
      `End frame ${end} is before start frame ${start}`,
      'EMPTY_RANGE',
      { start, end }
    );
    this.name = 'EmptyRangeError';
  }
}

export class MissingParameterError extends TimelapseError {
  constructor(field: string, message: string = 'is required') {
    super(`Missing parameter ${field}: ${message}`, 'MISSING_PARAMETER', { field, message });
    this.name = 'MissingParameterError';
  }
}

export class InvalidParameterError extends TimelapseError {
  constructor(field: string, value: unknown, message: string) {
    super(`Invalid ${field} '${String(value)}': ${message}`, 'INVALID_PARAMETER', { field, value, message });
    this.name = 'InvalidParameterError';
  }
}

export class EncodeFailedError extends TimelapseError {
  constructor(outputFile: string, exitCode: number | null, message?: string) {
    super(
      message ?? `Failed to create ${outputFile}`,
      'ENCODE_FAILED',
      { outputFile, exitCode }
    );
    this.name = 'EncodeFailedError';
  }
}

export class BatchFileNotFoundError extends TimelapseError {
  constructor(path: string, cause?: string) {
    super(`Config file '${path}' not found`, 'BATCH_FILE_NOT_FOUND', { path, cause });
    this.name = 'BatchFileNotFoundError';
  }
}

export function isTimelapseError(error: unknown): error is TimelapseError {
  return error instanceof TimelapseError;
}
