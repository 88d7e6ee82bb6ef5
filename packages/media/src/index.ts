/**
 * @timelapse/media
 * 
 * Frame naming and image metadata layer.
 * 
 * Responsibilities:
 * - The fixed frame naming convention (prefix, zero-padded index, extension)
 * - Probe capture dates with exiftool
 * - Parse capture dates into comparable wall-clock values
 */

// Frame naming
export {
  DEFAULT_FRAME_PATTERN,
  frameFileRegex,
  frameFileName,
  framePath,
  sequencePattern,
  describeFramePattern,
  type FramePattern,
} from './framePattern.js';

// Probing
export {
  ExifToolProbe,
  CAPTURE_TIME_FIELDS,
  CAPTURE_TIME_FORMAT,
  readCaptureTime,
} from './probes/exiftool.js';

// Capture times
export { parseCaptureTime, formatCaptureTime, formatCaptureDate } from './captureTime.js';

// Types
export type { MetadataField, MetadataReader, CaptureTime } from './types.js';
