/**
 * Path Utilities
 */

const RESERVED_CHARACTERS = /[<>:"/\\|?*]/g;
const CONTROL_CHARACTERS = /[\x00-\x1f\x7f-\x9f]/g;

const MAX_NAME_LENGTH = 200;

/**
 * Make a user-supplied label (a date, a clip name) usable as part of a file
 * name: path separators and other reserved characters become `_`, control
 * characters are dropped and leading or trailing dots are removed so the
 * result can never name a parent or hidden directory.
 */
export function sanitizeFilename(label: string): string {
  return label
    .replace(CONTROL_CHARACTERS, '')
    .replace(RESERVED_CHARACTERS, '_')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .substring(0, MAX_NAME_LENGTH);
}
