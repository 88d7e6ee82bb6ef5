/**
 * @timelapse/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommandLine,
  tailLines,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  getFileSizeBytes,
  isDirectory,
  fileExistsSync,
  removeFile,
} from './file.js';

// Path utilities
export { sanitizeFilename } from './path.js';

// Type guards
export { isPositiveInteger } from './guards.js';

// Time utilities
export { formatDuration, formatBytes } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
