/**
 * CLI Configuration
 *
 * Loaded before anything that creates a logger, so LOG_LEVEL from `.env`
 * takes effect everywhere.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('error'),

  // Media tools
  FFMPEG_PATH: z.string().optional(),
  EXIFTOOL_PATH: z.string().optional(),
  ENCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(3600000), // 1 hour

  // Job defaults
  TIMELAPSE_FPS: z.coerce.number().int().positive().default(30),
  TIMELAPSE_ROTATION: z.string().default('cw'),
  TIMELAPSE_PRESET: z.string().default('timelapse-h264'),

  // Camera site, for sunrise/sunset planning
  TIMELAPSE_LATITUDE: z.coerce.number().min(-90).max(90).default(37.7917),
  TIMELAPSE_LONGITUDE: z.coerce.number().min(-180).max(180).default(-122.4155),
  TIMELAPSE_UTC_OFFSET: z.coerce.number().min(-14).max(14).default(-8),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

process.env['NODE_ENV'] = env.NODE_ENV;
process.env['LOG_LEVEL'] = env.LOG_LEVEL;

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,

  encoder: {
    timeoutMs: env.ENCODE_TIMEOUT_MS,
    preset: env.TIMELAPSE_PRESET,
  },

  defaults: {
    frameRate: env.TIMELAPSE_FPS,
    rotation: env.TIMELAPSE_ROTATION,
  },

  site: {
    latitude: env.TIMELAPSE_LATITUDE,
    longitude: env.TIMELAPSE_LONGITUDE,
    utcOffsetHours: env.TIMELAPSE_UTC_OFFSET,
  },
} as const;

export type CliConfig = typeof config;
