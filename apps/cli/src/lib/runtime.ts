/**
 * Runtime wiring: binaries, encoder, metadata probe and job runner
 */

import { getBinariesConfig } from '@timelapse/core';
import { ExifToolProbe } from '@timelapse/media';
import {
  DEFAULT_PRESET_NAME,
  FFmpegEncoder,
  JobRunner,
  getDefaultPreset,
  getPreset,
  type EncodingPreset,
} from '@timelapse/processing';
import { logger } from '@timelapse/utils';
import { config } from '../config/index.js';
import { printWarning } from './output.js';

export function createMetadataReader(): ExifToolProbe {
  return new ExifToolProbe(getBinariesConfig().exiftool.resolvedPath);
}

/**
 * Look up a preset by name, falling back to the default with a visible warning
 */
export function resolvePreset(presetName: string): EncodingPreset {
  const preset = getPreset(presetName);
  if (preset) return preset;

  logger.warn({ preset: presetName }, 'Unknown preset, using default');
  printWarning(`Unknown preset '${presetName}', using ${DEFAULT_PRESET_NAME}`);
  return getDefaultPreset();
}

export function createJobRunner(presetName: string = config.encoder.preset): JobRunner {
  const binaries = getBinariesConfig();

  return new JobRunner({
    encoder: new FFmpegEncoder({ timeout: config.encoder.timeoutMs }),
    metadataReader: createMetadataReader(),
    ffmpegPath: binaries.ffmpeg.resolvedPath,
    preset: resolvePreset(presetName),
  });
}
