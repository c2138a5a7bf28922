/**
 * Custom error classes
 */

export class CueDeckError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CueDeckError';
    this.timestamp = new Date();
    this.context = context;
    Object.setPrototypeOf(this, CueDeckError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging/debugging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * The audio backend rejected a file (bad path, unsupported format)
 */
export class LoadFailureError extends CueDeckError {
  constructor(
    message: string,
    public readonly filePath: string,
    originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'LOAD_FAILURE', originalError, { filePath, ...context });
    this.name = 'LoadFailureError';
    Object.setPrototypeOf(this, LoadFailureError.prototype);
  }
}

/**
 * The audio backend failed to start or resume playback (busy device, transient errors)
 */
export class PlaybackError extends CueDeckError {
  constructor(message: string, originalError?: unknown, context?: Record<string, unknown>) {
    super(message, 'PLAYBACK_ERROR', originalError, context);
    this.name = 'PlaybackError';
    Object.setPrototypeOf(this, PlaybackError.prototype);
  }
}

export class ValidationError extends CueDeckError {
  constructor(
    message: string,
    public readonly validationErrors?: unknown,
    context?: Record<string, unknown>,
    code = 'VALIDATION_ERROR'
  ) {
    super(message, code, validationErrors, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class InvalidRangeError extends ValidationError {
  constructor(
    public readonly start: number,
    public readonly end: number,
    context?: Record<string, unknown>
  ) {
    super(
      `End time (${end}) must be greater than start time (${start})`,
      undefined,
      { start, end, ...context },
      'INVALID_RANGE'
    );
    this.name = 'InvalidRangeError';
    Object.setPrototypeOf(this, InvalidRangeError.prototype);
  }
}

export class StorageError extends CueDeckError {
  constructor(message: string, originalError?: unknown, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', originalError, context);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}
