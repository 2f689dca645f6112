/**
 * Custom Error Classes
 */

/**
 * Base error class for all audex errors
 */
export class AudexError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AudexError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid job options
 */
export class ValidationError extends AudexError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * A required external tool is not runnable
 */
export class ToolNotFoundError extends AudexError {
  constructor(tool: string, resolvedPath: string) {
    super(
      `${tool} not found (tried "${resolvedPath}"). Install FFmpeg and make sure it is on PATH.`,
      'TOOL_NOT_FOUND',
      { tool, resolvedPath }
    );
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Input root is missing or not a directory
 */
export class InputDirectoryError extends AudexError {
  constructor(path: string) {
    super(
      `Input folder is not a valid directory: ${path}`,
      'INVALID_INPUT_DIRECTORY',
      { path }
    );
    this.name = 'InputDirectoryError';
  }
}

/**
 * A dispatcher was asked to start while a batch is still running
 */
export class BatchInProgressError extends AudexError {
  constructor() {
    super('A batch is already running on this dispatcher', 'BATCH_IN_PROGRESS');
    this.name = 'BatchInProgressError';
  }
}

/**
 * Message text of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
