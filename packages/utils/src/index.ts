/**
 * @meshwatch/utils
 * 
 * Shared utilities package containing:
 * - Structured logging
 * - File operations
 * - Path and file-name checks
 * - Type guards
 * - Timing helpers
 */

// File operations
export {
  safeReadBytes,
  safeStat,
  calculateFileHash,
  type FileStats,
} from './file.js';

// Path utilities
export {
  getExtension,
  isPlainFileName,
  isPartialFile,
  normalizeExtensions,
} from './path.js';

// Type guards
export {
  isString,
  isObject,
  isErrnoException,
  isNotFoundError,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  backoffDelay,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
