/**
 * Job Runner
 *
 * Runs one time-lapse encode: validates the job, resolves its frame range,
 * checks timestamp metadata, builds the filter chain, invokes the encoder
 * and turns the result into an immutable outcome.
 */

import { dirname } from 'node:path';
import { z } from 'zod';
import {
  EncodeFailedError,
  FolderNotFoundError,
  InvalidParameterError,
  MissingParameterError,
  isTimelapseError,
  TimelapseError,
  type JobOutcome,
  type JobWarning,
  type ResolvedRange,
  type TimelapseJob,
} from '@timelapse/core';
import {
  DEFAULT_FRAME_PATTERN,
  ExifToolProbe,
  framePath,
  readCaptureTime,
  sequencePattern,
  type FramePattern,
  type MetadataReader,
} from '@timelapse/media';
import {
  createLogger,
  ensureDir,
  formatCommandLine,
  getFileSizeBytes,
  isDirectory,
  removeFile,
  tailLines,
} from '@timelapse/utils';
import { FFmpegCommandBuilder, type EncoderInvocation } from './commandBuilder.js';
import { FFmpegEncoder, type Encoder } from './encoder.js';
import { buildFilterChain, type FilterChain, type FilterChainOptions } from './filterChain.js';
import { resolveFrameRange } from './frameRange.js';
import { getDefaultPreset, type EncodingPreset } from './presets.js';

const logger = createLogger({ module: 'jobRunner' });

const timestampStyleSchema = z.object({
  fontPath: z.string().min(1).optional(),
  fontSize: z.number().int().positive(),
  fontColor: z.string().min(1),
  x: z.number().int(),
  y: z.number().int(),
  boxEnabled: z.boolean(),
  boxColor: z.string().min(1),
  boxPadding: z.number().int().nonnegative(),
});

export const jobSchema = z.object({
  id: z.string().min(1),
  sourceFolder: z.string().trim().min(1),
  outputPath: z.string().trim().min(1),
  startFrame: z.number().int().positive(),
  endFrame: z.number().int().optional(),
  frameRate: z.number().int().positive(),
  rotation: z.string(),
  // Style options only matter when the overlay is drawn
  timestamp: z.discriminatedUnion('enabled', [
    z.object({ enabled: z.literal(true), style: timestampStyleSchema }),
    z.object({ enabled: z.literal(false), style: z.unknown() }),
  ]),
});

/**
 * Map the first schema violation onto the error taxonomy
 */
export function validateJob(job: TimelapseJob): void {
  const parsed = jobSchema.safeParse(job);
  if (parsed.success) return;

  const issue = parsed.error.issues[0];
  if (!issue) return;

  const field = issue.path.join('.');
  const missing =
    (issue.code === 'invalid_type' && (issue.received === 'undefined' || issue.received === 'nan')) ||
    (issue.code === 'too_small' && issue.type === 'string');

  if (missing) {
    throw new MissingParameterError(field);
  }

  const value = issue.path.reduce<unknown>(
    (current, key) => (typeof current === 'object' && current !== null ? Reflect.get(current, key) : undefined),
    job
  );
  throw new InvalidParameterError(field, value, issue.message);
}

export interface JobRunnerOptions {
  encoder?: Encoder;
  metadataReader?: MetadataReader;
  ffmpegPath?: string;
  preset?: EncodingPreset;
  framePattern?: FramePattern;
  filterOptions?: FilterChainOptions;
}

export interface PreparedJob {
  job: TimelapseJob;
  range: ResolvedRange;
  durationSeconds: number;
  filterChain: FilterChain;
  timestampApplied: boolean;
  invocation: EncoderInvocation;
  warnings: JobWarning[];
}

export class JobRunner {
  private encoder: Encoder;
  private metadataReader: MetadataReader;
  private ffmpegPath: string;
  private preset: EncodingPreset;
  private framePattern: FramePattern;
  private filterOptions: FilterChainOptions;

  constructor(options: JobRunnerOptions = {}) {
    this.encoder = options.encoder ?? new FFmpegEncoder();
    this.metadataReader = options.metadataReader ?? new ExifToolProbe();
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.preset = options.preset ?? getDefaultPreset();
    this.framePattern = options.framePattern ?? DEFAULT_FRAME_PATTERN;
    this.filterOptions = options.filterOptions ?? {};
  }

  /**
   * Run a job to completion. Job-level errors become a failed outcome.
   */
  async run(job: TimelapseJob): Promise<JobOutcome> {
    logger.info({ jobId: job.id, folder: job.sourceFolder, output: job.outputPath }, 'Starting job');

    let prepared: PreparedJob;
    try {
      prepared = await this.prepare(job);
    } catch (error) {
      return this.failed(job, error, []);
    }

    try {
      const outputSize = await this.encode(prepared);

      logger.info({
        jobId: job.id,
        output: job.outputPath,
        outputSize,
        frameCount: prepared.range.frameCount,
      }, 'Job succeeded');

      const outcome: JobOutcome = {
        job,
        status: 'succeeded',
        outputSize,
        warnings: Object.freeze([...prepared.warnings]),
        range: prepared.range,
        durationSeconds: prepared.durationSeconds,
        filterChain: prepared.filterChain.expression,
      };
      return Object.freeze(outcome);
    } catch (error) {
      return this.failed(job, error, prepared.warnings, prepared);
    }
  }

  /**
   * Everything up to, but not including, the encoder run
   */
  async prepare(job: TimelapseJob): Promise<PreparedJob> {
    validateJob(job);

    if (!(await isDirectory(job.sourceFolder))) {
      throw new FolderNotFoundError(job.sourceFolder);
    }

    const range = await resolveFrameRange(job.sourceFolder, job.startFrame, job.endFrame, this.framePattern);
    if (range.autoDetected) {
      logger.info({ jobId: job.id, endFrame: range.end }, 'Auto-detected end frame');
    }

    const warnings: JobWarning[] = [];

    let timestampApplied = false;
    if (job.timestamp.enabled) {
      const warning = await this.probeTimestamp(job, range);
      if (warning) {
        warnings.push(warning);
        logger.warn({ jobId: job.id, code: warning.code }, warning.message);
      } else {
        timestampApplied = true;
      }
    }

    const durationSeconds = range.frameCount / job.frameRate;
    logger.info({ jobId: job.id, frameCount: range.frameCount, durationSeconds }, 'Frame range resolved');

    const filterChain = buildFilterChain(
      job.rotation,
      timestampApplied ? job.timestamp.style : null,
      this.filterOptions
    );
    for (const warning of filterChain.warnings) {
      warnings.push(warning);
      logger.warn({ jobId: job.id, code: warning.code }, warning.message);
    }

    return {
      job,
      range,
      durationSeconds,
      filterChain,
      timestampApplied,
      invocation: this.buildInvocation(job, range, filterChain),
      warnings,
    };
  }

  /**
   * Build the encoder invocation for a resolved job
   */
  buildInvocation(job: TimelapseJob, range: ResolvedRange, filterChain: FilterChain): EncoderInvocation {
    const builder = new FFmpegCommandBuilder()
      .addGlobalArg('-hide_banner')
      .overwrite()
      .addImageSequence(
        sequencePattern(job.sourceFolder, this.framePattern),
        range.start,
        job.frameRate,
        this.preset.inputPixFmt
      )
      .setVideoCodec(this.preset.video)
      .addVideoFilter(filterChain.expression)
      .copyMetadata(0)
      .setOutputOptions({
        movflags: this.preset.movflags,
        frames: range.frameCount,
        frameRate: job.frameRate,
      })
      .setOutput(job.outputPath);

    return builder.toInvocation(this.ffmpegPath);
  }

  /**
   * Look for a capture time on the first frame. Returns a warning when the
   * overlay has to be dropped.
   */
  private async probeTimestamp(job: TimelapseJob, range: ResolvedRange): Promise<JobWarning | null> {
    const firstFrame = framePath(job.sourceFolder, this.framePattern, range.start);

    try {
      const captureTime = await readCaptureTime(this.metadataReader, firstFrame);
      if (captureTime) {
        logger.info({ jobId: job.id, field: captureTime.field, sample: captureTime.value }, 'Sample timestamp');
        return null;
      }
      return {
        code: 'METADATA_UNAVAILABLE',
        message: 'No timestamp metadata found (checked DateTimeOriginal, CreateDate); timestamp overlay disabled',
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {
        code: 'METADATA_UNAVAILABLE',
        message: `Metadata tool unavailable (${reason}); timestamp overlay disabled`,
      };
    }
  }

  private async encode(prepared: PreparedJob): Promise<number> {
    const { invocation, job } = prepared;

    await ensureDir(dirname(invocation.outputFile));
    // Only a file written by this run may count as success
    await removeFile(invocation.outputFile);

    logger.debug({ jobId: job.id, command: formatCommandLine(invocation.binary, invocation.args) }, 'Encoder invocation');

    let exitCode: number | null = null;
    try {
      const result = await this.encoder.encode(invocation);
      exitCode = result.exitCode;
      if (result.exitCode !== 0) {
        logger.debug({ jobId: job.id, exitCode, stderr: tailLines(result.stderr) }, 'Encoder diagnostics');
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EncodeFailedError(invocation.outputFile, null, `Could not start encoder: ${reason}`);
    }

    const outputSize = await getFileSizeBytes(invocation.outputFile);
    if (exitCode !== 0 || outputSize === null) {
      throw new EncodeFailedError(invocation.outputFile, exitCode);
    }

    return outputSize;
  }

  private failed(
    job: TimelapseJob,
    error: unknown,
    warnings: readonly JobWarning[],
    prepared?: PreparedJob
  ): JobOutcome {
    const failure: TimelapseError = isTimelapseError(error) ? error : TimelapseError.fromUnknown(error);
    if (failure.code === 'UNEXPECTED_ERROR') {
      logger.error({ jobId: job.id, err: error }, 'Job failed unexpectedly');
    } else {
      logger.warn({ jobId: job.id, code: failure.code, details: failure.details }, failure.message);
    }

    const outcome: JobOutcome = {
      job,
      status: 'failed',
      reason: failure.code,
      message: failure.message,
      warnings: Object.freeze([...warnings]),
      range: prepared?.range,
      durationSeconds: prepared?.durationSeconds,
      filterChain: prepared?.filterChain.expression,
    };
    return Object.freeze(outcome);
  }
}
