/**
 * @fileclassify/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Path utilities
 * - Type guards
 */

// Command execution
export {
  executeCommand,
  formatCommandLine,
  formatCmdLine,
  SPAWN_FAILURE_EXIT_CODE,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  pathExists,
  removeFile,
  calculateFileHash,
  getFileSizeBytes,
  formatBytes,
  moveFile,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  sanitizeFilename,
  executableName,
  formatDisplayPath,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatTimestamp,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
