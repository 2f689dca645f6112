/**
 * @audex/core
 * 
 * Core package containing:
 * - Job configuration types and schemas
 * - Error handling
 * - External binary resolution
 */

// Types
export {
  TRANSCODE_MODES,
  jobConfigurationSchema,
  streamSelectorSchema,
  defaultWorkerCount,
  toStreamSpecifier,
} from './types/job.js';

export type {
  TranscodeMode,
  StreamSelector,
  JobConfiguration,
  JobConfigurationInput,
  TaskResult,
  BatchProgress,
  BatchSummary,
} from './types/job.js';

// Configuration
export { parseJobConfiguration } from './config/job.js';

export {
  getBinariesConfig,
  binaries,
  isBinaryAvailable,
  verifyTools,
  type BinaryConfig,
  type BinariesConfig,
  type BinaryName,
} from './config/binaries.js';

// Errors
export {
  AudexError,
  ValidationError,
  ToolNotFoundError,
  InputDirectoryError,
  BatchInProgressError,
  errorMessage,
} from './errors/index.js';
