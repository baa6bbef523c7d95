/**
 * Options accepted when connecting a CloudShelf.
 */

import { ConfigError } from '../errors';
import { noopLogger, type Logger } from '../logger';

/** Default size of one upload request: 8 MiB. */
export const DEFAULT_UPLOAD_CHUNK_SIZE = 8 * 1024 * 1024;

/** Largest body a single upload request may carry: 150 MiB. */
export const MAX_UPLOAD_CHUNK_SIZE = 150 * 1024 * 1024;

/**
 * CloudShelf options.
 */
export interface ShelfOptions {
  /** Logger for progress and failures (default: no-op) */
  logger?: Logger;
  /** Payloads above this many bytes use an upload session (default: 8 MiB) */
  uploadChunkSize?: number;
  /** Team member id to act as, for team tokens */
  selectUser?: string;
  /** Path root header, for team spaces */
  pathRoot?: string;
  /** Revoke the token when the shelf is closed (default: false) */
  revokeOnClose?: boolean;
}

/**
 * Options with defaults applied.
 */
export interface ResolvedShelfOptions {
  logger: Logger;
  uploadChunkSize: number;
  selectUser?: string;
  pathRoot?: string;
  revokeOnClose: boolean;
}

/**
 * Fill defaults and validate options.
 * @throws ConfigError if an option is out of range
 */
export function resolveOptions(options: ShelfOptions = {}): ResolvedShelfOptions {
  const uploadChunkSize = options.uploadChunkSize ?? DEFAULT_UPLOAD_CHUNK_SIZE;

  if (!Number.isInteger(uploadChunkSize) || uploadChunkSize <= 0) {
    throw new ConfigError('uploadChunkSize', 'uploadChunkSize must be a positive integer');
  }
  if (uploadChunkSize > MAX_UPLOAD_CHUNK_SIZE) {
    throw new ConfigError(
      'uploadChunkSize',
      `uploadChunkSize must not exceed ${MAX_UPLOAD_CHUNK_SIZE} bytes`
    );
  }
  if (options.selectUser !== undefined && options.selectUser.trim().length === 0) {
    throw new ConfigError('selectUser', 'selectUser must not be empty');
  }

  return {
    logger: options.logger ?? noopLogger,
    uploadChunkSize,
    selectUser: options.selectUser,
    pathRoot: options.pathRoot,
    revokeOnClose: options.revokeOnClose ?? false,
  };
}
