/**
 * Sun Event Planner
 *
 * Finds the sunrises and sunsets covered by a folder of frames and plans one
 * clip around each. Frame positions are estimated from the capture time of
 * the first frame and a fixed capture interval.
 */

import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_TIMESTAMP_STYLE,
  InvalidParameterError,
  NoFramesFoundError,
  type JobWarning,
  type TimelapseJob,
  type TimestampOverlay,
} from '@timelapse/core';
import {
  DEFAULT_FRAME_PATTERN,
  ExifToolProbe,
  describeFramePattern,
  formatCaptureDate,
  formatCaptureTime,
  parseCaptureTime,
  readCaptureTime,
  type FramePattern,
  type MetadataReader,
} from '@timelapse/media';
import { listFrameFiles, parseFrameIndex } from '@timelapse/processing';
import { createLogger } from '@timelapse/utils';
import {
  SUN_EVENTS,
  calendarDateOf,
  computeSunEvent,
  eachDay,
  type CalendarDate,
  type SiteLocation,
  type SunEvent,
} from './solar.js';

const logger = createLogger({ module: 'eventPlanner' });

const HOUR_MS = 60 * 60 * 1000;

/**
 * Where the event sits inside its clip, as a fraction of the clip length
 */
export const DEFAULT_EVENT_PLACEMENT: Readonly<Record<SunEvent, number>> = Object.freeze({
  sunrise: 0.45,
  sunset: 0.5,
});

export interface SunEventPlanOptions {
  outputDir: string;
  site: SiteLocation;
  frameIntervalSeconds?: number;
  clipSeconds?: number;
  frameRate?: number;
  rotation?: string;
  timestamp?: TimestampOverlay;
  /** Events this far outside the capture window are ignored */
  windowMarginHours?: number;
  placement?: Readonly<Record<SunEvent, number>>;
  framePattern?: FramePattern;
  metadataReader?: MetadataReader;
  sunEvents?: (date: CalendarDate, event: SunEvent) => number | null;
  outputExists?: (path: string) => boolean;
}

export interface PlannedClip {
  date: string;
  event: SunEvent;
  eventTime: string;
  startFrame: number;
  endFrame: number;
  outputPath: string;
  /** Output already on disk; not re-encoded */
  skipped: boolean;
  job: TimelapseJob;
}

export interface SunEventPlan {
  folder: string;
  captureStart?: string;
  captureEnd?: string;
  clips: PlannedClip[];
  warnings: JobWarning[];
}

const planSettingsSchema = z.object({
  frameIntervalSeconds: z.number().finite().positive(),
  clipSeconds: z.number().finite().positive(),
  frameRate: z.number().int().positive(),
  windowMarginHours: z.number().finite().nonnegative(),
});

type PlanSettings = z.infer<typeof planSettingsSchema>;

/**
 * Apply defaults to the numeric options and reject values that cannot
 * produce frame positions
 */
export function resolvePlanSettings(options: SunEventPlanOptions): PlanSettings & { clipFrames: number } {
  const values = {
    frameIntervalSeconds: options.frameIntervalSeconds ?? 10,
    clipSeconds: options.clipSeconds ?? 60,
    frameRate: options.frameRate ?? 30,
    windowMarginHours: options.windowMarginHours ?? 2,
  };

  const parsed = planSettingsSchema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'options';
    throw new InvalidParameterError(field, Reflect.get(values, field), issue?.message ?? 'is invalid');
  }

  const clipFrames = Math.round(parsed.data.clipSeconds * parsed.data.frameRate);
  if (clipFrames < 1) {
    throw new InvalidParameterError('clipSeconds', values.clipSeconds, 'is shorter than one frame');
  }

  return { ...parsed.data, clipFrames };
}

async function captureTimeOf(reader: MetadataReader, file: string): Promise<number | null> {
  const captureTime = await readCaptureTime(reader, file);
  return captureTime ? parseCaptureTime(captureTime.value) : null;
}

export async function planSunEvents(folder: string, options: SunEventPlanOptions): Promise<SunEventPlan> {
  const settings = resolvePlanSettings(options);
  const pattern = options.framePattern ?? DEFAULT_FRAME_PATTERN;
  const reader = options.metadataReader ?? new ExifToolProbe();
  const intervalMs = settings.frameIntervalSeconds * 1000;
  const frameRate = settings.frameRate;
  const clipFrames = settings.clipFrames;
  const marginMs = settings.windowMarginHours * HOUR_MS;
  const placement = options.placement ?? DEFAULT_EVENT_PLACEMENT;
  const sunEvents = options.sunEvents ?? ((date: CalendarDate, event: SunEvent) => computeSunEvent(date, event, options.site));
  const outputExists = options.outputExists ?? existsSync;

  const frames = await listFrameFiles(folder, pattern);
  const firstFile = frames[0];
  const lastFile = frames[frames.length - 1];
  if (firstFile === undefined || lastFile === undefined) {
    throw new NoFramesFoundError(folder, describeFramePattern(pattern));
  }

  const firstIndex = parseFrameIndex(firstFile, pattern);
  const lastIndex = parseFrameIndex(lastFile, pattern);

  const captureStart = await captureTimeOf(reader, join(folder, firstFile));
  const captureEnd = await captureTimeOf(reader, join(folder, lastFile));

  if (captureStart === null || captureEnd === null) {
    const warning: JobWarning = {
      code: 'METADATA_UNAVAILABLE',
      message: `Could not get timestamps for ${folder}`,
    };
    logger.warn({ folder }, warning.message);
    return { folder, clips: [], warnings: [warning] };
  }

  logger.info({
    folder,
    captureStart: formatCaptureTime(captureStart),
    captureEnd: formatCaptureTime(captureEnd),
  }, 'Capture window');

  const clips: PlannedClip[] = [];

  for (const day of eachDay(captureStart, captureEnd)) {
    const date = formatCaptureDate(day);

    for (const event of SUN_EVENTS) {
      const eventTime = sunEvents(calendarDateOf(day), event);
      if (eventTime === null) continue;
      if (eventTime < captureStart - marginMs || eventTime > captureEnd + marginMs) continue;

      const targetFrame = firstIndex + Math.trunc((eventTime - captureStart) / intervalMs);
      const framesBefore = Math.floor(clipFrames * placement[event]);
      const startFrame = Math.max(firstIndex, targetFrame - framesBefore);
      const endFrame = Math.min(lastIndex, startFrame + clipFrames - 1);

      if (startFrame > lastIndex || endFrame < startFrame) {
        logger.debug({ folder, date, event, startFrame, endFrame }, 'Event outside available frames');
        continue;
      }

      const outputPath = join(options.outputDir, `${date}_${event}.mp4`);
      const skipped = outputExists(outputPath);

      clips.push({
        date,
        event,
        eventTime: formatCaptureTime(eventTime),
        startFrame,
        endFrame,
        outputPath,
        skipped,
        job: {
          id: `${date}_${event}`,
          sourceFolder: folder,
          outputPath,
          startFrame,
          endFrame,
          frameRate,
          rotation: options.rotation ?? 'cw',
          timestamp: options.timestamp ?? { enabled: false, style: { ...DEFAULT_TIMESTAMP_STYLE } },
        },
      });
    }
  }

  return {
    folder,
    captureStart: formatCaptureTime(captureStart),
    captureEnd: formatCaptureTime(captureEnd),
    clips,
    warnings: [],
  };
}

/**
 * Plan a folder of frames, or when it holds none, each of its subfolders
 * newest name first. Subfolders without frames are passed over. A clip
 * already planned from a newer folder is marked skipped in older ones.
 */
export async function planSunEventsInTree(root: string, options: SunEventPlanOptions): Promise<SunEventPlan[]> {
  resolvePlanSettings(options);
  const pattern = options.framePattern ?? DEFAULT_FRAME_PATTERN;

  if ((await listFrameFiles(root, pattern)).length > 0) {
    return [await planSunEvents(root, options)];
  }

  const entries = await readdir(root, { withFileTypes: true });
  const folders = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? 1 : a > b ? -1 : 0))
    .map((name) => join(root, name));

  const plans: SunEventPlan[] = [];
  const claimed = new Set<string>();

  for (const folder of folders) {
    if ((await listFrameFiles(folder, pattern)).length === 0) {
      logger.debug({ folder }, 'No frames, skipping folder');
      continue;
    }

    const plan = await planSunEvents(folder, options);
    const clips = plan.clips.map((clip) => {
      const duplicate = claimed.has(clip.outputPath);
      claimed.add(clip.outputPath);
      return duplicate ? { ...clip, skipped: true } : clip;
    });
    plans.push({ ...plan, clips });
  }

  if (plans.length === 0) {
    throw new NoFramesFoundError(root, describeFramePattern(pattern));
  }

  return plans;
}
