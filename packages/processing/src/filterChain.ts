/**
 * Filter Chain Builder
 *
 * Produces the `-vf` expression for a job: rotation first, then the
 * timestamp overlay, so the text stays upright on the final frame.
 */

import {
  isRotation,
  type JobWarning,
  type Rotation,
  type TimestampStyle,
} from '@timelapse/core';
import { fileExistsSync } from '@timelapse/utils';

/**
 * Font files probed in order when a style names none
 */
export const FONT_CANDIDATES: readonly string[] = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
  '/System/Library/Fonts/Helvetica.ttc',
  '/Library/Fonts/Arial Bold.ttf',
];

/**
 * drawtext expansion of the per-frame EXIF capture time. Evaluated by the
 * encoder for every frame; the backslash escapes the colon for drawtext.
 */
export const TIMESTAMP_TEXT = "'%{metadata\\:DateTimeOriginal}'";

const ROTATION_FILTERS: Record<Rotation, readonly string[]> = {
  none: [],
  cw: ['transpose=1'],
  ccw: ['transpose=2'],
  '180': ['transpose=1', 'transpose=1'],
};

export interface FilterChain {
  primitives: string[];
  /** Comma-joined primitives; empty means the filter argument is omitted */
  expression: string;
  warnings: JobWarning[];
}

export interface FilterChainOptions {
  fontCandidates?: readonly string[];
  fileExists?: (path: string) => boolean;
}

export interface RotationFilters {
  rotation: Rotation;
  primitives: string[];
  warning?: JobWarning;
}

export function rotationFilters(requested: string): RotationFilters {
  const value = requested.trim();

  if (isRotation(value)) {
    return { rotation: value, primitives: [...ROTATION_FILTERS[value]] };
  }

  return {
    rotation: 'none',
    primitives: [],
    warning: {
      code: 'UNKNOWN_ROTATION',
      message: `Unknown rotation '${requested}', using none`,
    },
  };
}

/**
 * Quote a drawtext option value unless it is plainly safe.
 *
 * The value is unescaped twice: once by the filtergraph parser and once
 * by drawtext's option parser. Backslash-escape for the option level,
 * then quote for the graph level, leaving the quotes only to insert `'`.
 */
export function quoteFilterValue(value: string): string {
  if (/^[A-Za-z0-9_./@#+-]+$/.test(value)) {
    return value;
  }
  const optionLevel = value.replace(/[\\':]/g, '\\$&');
  return `'${optionLevel.replace(/'/g, "'\\''")}'`;
}

export function resolveFontPath(
  candidates: readonly string[] = FONT_CANDIDATES,
  fileExists: (path: string) => boolean = fileExistsSync
): string | null {
  return candidates.find((candidate) => fileExists(candidate)) ?? null;
}

export interface TimestampFilter {
  primitive: string;
  fontPath: string | null;
  warning?: JobWarning;
}

export function timestampFilter(
  style: TimestampStyle,
  options: FilterChainOptions = {}
): TimestampFilter {
  const fontPath = style.fontPath ?? resolveFontPath(options.fontCandidates, options.fileExists);

  const params: string[] = [];
  if (fontPath) {
    params.push(`fontfile=${quoteFilterValue(fontPath)}`);
  }
  params.push(`text=${TIMESTAMP_TEXT}`);
  params.push(`fontcolor=${quoteFilterValue(style.fontColor)}`);
  params.push(`fontsize=${style.fontSize}`);
  params.push(`x=${style.x}`);
  params.push(`y=${style.y}`);

  if (style.boxEnabled) {
    params.push('box=1');
    params.push(`boxcolor=${quoteFilterValue(style.boxColor)}`);
    params.push(`boxborderw=${style.boxPadding}`);
  }

  return {
    primitive: `drawtext=${params.join(':')}`,
    fontPath,
    warning: fontPath
      ? undefined
      : { code: 'FONT_NOT_FOUND', message: 'Could not find font file, using encoder default' },
  };
}

/**
 * Build the ordered filter chain for a rotation and an optional overlay
 */
export function buildFilterChain(
  rotation: string,
  timestamp?: TimestampStyle | null,
  options: FilterChainOptions = {}
): FilterChain {
  const warnings: JobWarning[] = [];

  const rotated = rotationFilters(rotation);
  const primitives = [...rotated.primitives];
  if (rotated.warning) warnings.push(rotated.warning);

  if (timestamp) {
    const overlay = timestampFilter(timestamp, options);
    primitives.push(overlay.primitive);
    if (overlay.warning) warnings.push(overlay.warning);
  }

  return {
    primitives,
    expression: primitives.join(','),
    warnings,
  };
}
