/**
 * Base error class for CloudShelf errors.
 */
export class CloudShelfError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CloudShelfError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when the token is missing, rejected or expired.
 */
export class AuthenticationError extends CloudShelfError {
  constructor(message: string, code = 'AUTHENTICATION_ERROR', cause?: unknown) {
    super(message, code, cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when an operation targets a path that does not exist.
 */
export class NotFoundError extends CloudShelfError {
  readonly path: string;

  constructor(path: string, message = `Path not found: ${path}`, cause?: unknown) {
    super(message, 'NOT_FOUND', cause);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/**
 * Error thrown for any other remote-side failure.
 */
export class StorageError extends CloudShelfError {
  readonly status?: number;

  constructor(message: string, code = 'STORAGE_ERROR', status?: number, cause?: unknown) {
    super(message, code, cause);
    this.name = 'StorageError';
    this.status = status;
  }
}

/**
 * Error thrown when a payload cannot be encoded or decoded.
 */
export class FormatError extends CloudShelfError {
  readonly format: string;

  constructor(format: string, message: string, cause?: unknown) {
    super(message, 'FORMAT_ERROR', cause);
    this.name = 'FormatError';
    this.format = format;
  }
}

/**
 * Error thrown for invalid options.
 */
export class ConfigError extends CloudShelfError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message, 'INVALID_OPTION');
    this.name = 'ConfigError';
    this.option = option;
  }
}
