/**
 * @timelapse/core
 * 
 * Core package containing:
 * - Job, style and outcome types
 * - Error handling
 * - External binary resolution
 */

// Types
export {
  ROTATIONS,
  DEFAULT_TIMESTAMP_STYLE,
  isRotation,
  type Rotation,
  type TimestampStyle,
  type TimestampOverlay,
  type TimelapseJob,
  type ResolvedRange,
} from './types/job.js';

export type {
  OutcomeStatus,
  JobWarning,
  JobOutcome,
  BatchSummary,
} from './types/outcome.js';

// Errors
export {
  TimelapseError,
  FolderNotFoundError,
  NoFramesFoundError,
  EmptyRangeError,
  MissingParameterError,
  InvalidParameterError,
  EncodeFailedError,
  BatchFileNotFoundError,
  isTimelapseError,
  type ErrorCode,
  type WarningCode,
} from './errors/index.js';

// Binaries
export {
  resolveBinaryPath,
  getBinariesConfig,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';
