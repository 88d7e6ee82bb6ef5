/**
 * Media Types
 */

export type MetadataField = 'DateTimeOriginal' | 'CreateDate';

export interface MetadataReader {
  /**
   * Read one date field from an image, formatted as `YYYY-MM-DD HH:MM:SS`.
   * Resolves null when the field is absent.
   */
  readField(filePath: string, field: MetadataField): Promise<string | null>;
}

export interface CaptureTime {
  field: MetadataField;
  value: string;
}
