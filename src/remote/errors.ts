import { AuthenticationError, CloudShelfError, NotFoundError, StorageError } from '../errors';

/**
 * Shape of a failed SDK call: an HTTP status and the decoded error body.
 */
interface RemoteFailure {
  status: number;
  summary?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Extract status and error summary from whatever the SDK threw.
 */
export function readRemoteFailure(error: unknown): RemoteFailure | null {
  if (!isRecord(error) || typeof error.status !== 'number') {
    return null;
  }

  const body = error.error;
  if (isRecord(body) && typeof body.error_summary === 'string') {
    return { status: error.status, summary: body.error_summary };
  }
  if (typeof body === 'string') {
    return { status: error.status, summary: body };
  }
  return { status: error.status };
}

/**
 * True when an error summary reports a missing path,
 * e.g. `path/not_found/..` or `path_lookup/not_found/`.
 */
export function isNotFoundSummary(summary: string): boolean {
  return summary.split('/').includes('not_found');
}

/**
 * Translate an SDK failure into the CloudShelf error taxonomy.
 * Errors that are already CloudShelf errors pass through unchanged.
 */
export function translateRemoteError(error: unknown, operation: string, path: string): CloudShelfError {
  if (error instanceof CloudShelfError) {
    return error;
  }

  const failure = readRemoteFailure(error);
  if (failure === null) {
    const reason = error instanceof Error ? error.message : String(error);
    return new StorageError(`${operation} failed for '${path}': ${reason}`, 'REMOTE_UNAVAILABLE', undefined, error);
  }

  if (failure.status === 401) {
    return new AuthenticationError(
      `Token rejected during ${operation} of '${path}'`,
      'TOKEN_REJECTED',
      error
    );
  }

  if (failure.summary !== undefined && isNotFoundSummary(failure.summary)) {
    return new NotFoundError(path, undefined, error);
  }

  const detail = failure.summary ?? `HTTP ${failure.status}`;
  return new StorageError(
    `${operation} failed for '${path}': ${detail}`,
    'REMOTE_ERROR',
    failure.status,
    error
  );
}
