/**
 * @audex/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File and path helpers
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export { ensureDir, ensureParentDir, isDirectory } from './file.js';

// Path utilities
export { getExtension, getBasename, stripExtension } from './path.js';

// Type guards
export { isErrnoException } from './guards.js';

// Time utilities
export { formatDuration } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
