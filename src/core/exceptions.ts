/**
 * Custom exception classes for the application.
 */

/**
 * Base class for all custom exceptions
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors (fatal at startup)
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * Caller input rejected before anything is enqueued
 */
export class ValidationError extends AppError {
  field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.field = field;
  }
}

/**
 * Text-to-speech engine failures
 */
export class SynthesisError extends AppError {
  provider?: string;
  statusCode?: number;

  constructor(message: string, options: { provider?: string; statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.provider = options.provider;
    this.statusCode = options.statusCode;
  }
}

/**
 * Transcoder process failed to spawn or exited abnormally
 */
export class TranscodeError extends AppError {
  exitCode?: number | null;
  signal?: string | null;

  constructor(message: string, exitCode?: number | null, signal?: string | null) {
    super(message);
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * Normalize anything thrown into a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
