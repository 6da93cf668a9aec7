export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", 500, cause);
    this.name = "ConfigError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", 400, cause);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "NOT_FOUND", 404, cause);
    this.name = "NotFoundError";
  }
}

export class SessionNotFoundError extends NotFoundError {
  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(`Session file not found: ${filePath}`, cause);
    this.name = "SessionNotFoundError";
  }
}

/**
 * Raised when a session cannot be written to disk. The previous
 * contents, if any, are left in the `.bak` sibling.
 */
export class SessionPersistenceError extends AppError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, "SESSION_PERSISTENCE_ERROR", 500, cause);
    this.name = "SessionPersistenceError";
  }
}
