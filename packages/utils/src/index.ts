/**
 * @encodeq/utils
 *
 * Shared utilities package containing:
 * - Logger
 * - File operations
 * - Path utilities
 * - Type guards
 * - Time utilities
 */

// File operations
export {
  ensureDir,
  pathExists,
  isReadableFile,
  removeFile,
  getFileSizeBytes,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  getBasename,
  normalizePath,
} from './path.js';

// Type guards
export { isErrnoException } from './guards.js';

// Time utilities
export {
  formatDuration,
  parseTimecode,
  formatTimecode,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
