/**
 * Job Types
 * 
 * Value objects shared by the resolver, the filter builder and the runner.
 */

/**
 * Rotation modes understood by the filter chain builder. Jobs carry the raw
 * requested value; anything outside this set falls back to no rotation.
 */
export const ROTATIONS = ['none', 'cw', 'ccw', '180'] as const;

export type Rotation = (typeof ROTATIONS)[number];

export function isRotation(value: string): value is Rotation {
  return (ROTATIONS as readonly string[]).includes(value);
}

export interface TimestampStyle {
  /** Explicit font file; probed from well-known locations when absent */
  fontPath?: string;
  fontSize: number;
  /** Color name or hex, e.g. `white` or `#ffcc00` */
  fontColor: string;
  x: number;
  y: number;
  boxEnabled: boolean;
  /** Color with alpha, e.g. `black@0.7` */
  boxColor: string;
  boxPadding: number;
}

export const DEFAULT_TIMESTAMP_STYLE: Readonly<TimestampStyle> = Object.freeze({
  fontSize: 48,
  fontColor: 'white',
  x: 30,
  y: 30,
  boxEnabled: true,
  boxColor: 'black@0.7',
  boxPadding: 10,
});

export interface TimestampOverlay {
  enabled: boolean;
  style: TimestampStyle;
}

export interface TimelapseJob {
  id: string;
  sourceFolder: string;
  outputPath: string;
  startFrame: number;
  /** Absent until resolved from the frames on disk */
  endFrame?: number;
  frameRate: number;
  rotation: string;
  timestamp: TimestampOverlay;
}

export interface ResolvedRange {
  start: number;
  end: number;
  frameCount: number;
  autoDetected: boolean;
}
