/**
 * tasksift errors
 *
 * The search engine itself never throws; these cover configuration and
 * the storage boundary.
 */

/**
 * Base error class for tasksift errors
 */
export class TaskSiftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TaskSiftError';
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when environment configuration fails validation
 */
export class ConfigError extends TaskSiftError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Thrown by storage adapters when a read or write fails
 */
export class StorageError extends TaskSiftError {
  public readonly key: string;

  constructor(key: string, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Storage ${operation} failed for "${key}": ${reason}`, { cause });
    this.name = 'StorageError';
    this.key = key;
  }
}
