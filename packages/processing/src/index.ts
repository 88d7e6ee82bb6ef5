/**
 * @timelapse/processing
 * 
 * Time-lapse encoding layer.
 * 
 * Rules:
 * - An empty filter chain means no -vf argument at all
 * - Rotation always precedes the timestamp overlay
 * - Success needs a zero exit status AND the output file on disk
 * - One encode at a time, never retried
 */

// Frame range
export {
  resolveFrameRange,
  parseFrameIndex,
  listFrameFiles,
  detectLastFrame,
  countFrames,
} from './frameRange.js';

// Filter chain
export {
  buildFilterChain,
  rotationFilters,
  timestampFilter,
  resolveFontPath,
  quoteFilterValue,
  FONT_CANDIDATES,
  TIMESTAMP_TEXT,
  type FilterChain,
  type FilterChainOptions,
  type RotationFilters,
  type TimestampFilter,
} from './filterChain.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  type EncoderInvocation,
  type SequenceInput,
  type OutputOptions,
  type VideoCodecOptions,
} from './commandBuilder.js';

// Encoding Presets
export {
  CRF_LEVELS,
  TIMELAPSE_PRESETS,
  DEFAULT_PRESET_NAME,
  getPreset,
  getDefaultPreset,
  type EncodingPreset,
} from './presets.js';

// Encoder
export {
  FFmpegEncoder,
  type Encoder,
  type EncoderResult,
  type FFmpegEncoderOptions,
} from './encoder.js';

// Job Runner
export {
  JobRunner,
  jobSchema,
  validateJob,
  type JobRunnerOptions,
  type PreparedJob,
} from './jobRunner.js';

// Batch
export {
  parseBatchDescription,
  loadBatchFile,
  entryToJob,
  outputNameForDate,
  COMMENT_MARKER,
  DEFAULT_BATCH_DEFAULTS,
  type BatchEntry,
  type BatchDefaults,
} from './batchFile.js';

export {
  BatchRunner,
  BatchTally,
  type BatchHooks,
  type JobExecutor,
} from './batchRunner.js';
