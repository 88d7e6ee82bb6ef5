/**
 * Encoding Presets
 * 
 * Output profiles for image-sequence encodes. `timelapse-h264` is the
 * default: constant-quality H.264, slow compression effort, yuv420p output
 * for broad player support and a faststart MP4 layout.
 */

import type { VideoCodecOptions } from './commandBuilder.js';

export interface EncodingPreset {
  name: string;
  description: string;

  /** Pixel format declared for the decoded JPEG input */
  inputPixFmt: string;
  video: VideoCodecOptions;
  movflags: string;
  container: 'mp4';
}

// Quality levels for CRF-based encoding
export const CRF_LEVELS = {
  highQuality: 18,
  balanced: 23,
};

export const TIMELAPSE_PRESETS: Record<string, EncodingPreset> = {
  'timelapse-h264': {
    name: 'Time-lapse H.264',
    description: 'Visually lossless H.264 for final renders.',
    inputPixFmt: 'yuvj420p',
    video: {
      codec: 'libx264',
      preset: 'slow',
      crf: CRF_LEVELS.highQuality,
      pixFmt: 'yuv420p',
    },
    movflags: '+faststart',
    container: 'mp4',
  },

  'timelapse-h264-draft': {
    name: 'Time-lapse H.264 draft',
    description: 'Fast, smaller H.264 for checking framing and range.',
    inputPixFmt: 'yuvj420p',
    video: {
      codec: 'libx264',
      preset: 'veryfast',
      crf: CRF_LEVELS.balanced,
      pixFmt: 'yuv420p',
    },
    movflags: '+faststart',
    container: 'mp4',
  },
};

export const DEFAULT_PRESET_NAME = 'timelapse-h264';

export function getPreset(name: string): EncodingPreset | undefined {
  return TIMELAPSE_PRESETS[name];
}

export function getDefaultPreset(): EncodingPreset {
  const preset = TIMELAPSE_PRESETS[DEFAULT_PRESET_NAME];
  if (!preset) {
    throw new Error(`Default preset ${DEFAULT_PRESET_NAME} is not defined`);
  }
  return preset;
}
