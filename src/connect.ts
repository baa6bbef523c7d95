import { resolveOptions, type ShelfOptions } from './config';
import { AuthenticationError } from './errors';
import { readRemoteFailure } from './remote';
import { createDropboxSession } from './remote/dropbox';
import { CloudShelf } from './shelf';

/**
 * Open a session for a token and verify it with a handshake.
 *
 * @throws AuthenticationError if the token is empty, rejected, or the handshake fails
 * @throws ConfigError if an option is invalid
 */
export async function connect(token: string, options: ShelfOptions = {}): Promise<CloudShelf> {
  const resolved = resolveOptions(options);

  if (token.trim().length === 0) {
    throw new AuthenticationError('A token is required to connect', 'TOKEN_MISSING');
  }

  const session = createDropboxSession(token, resolved);

  try {
    const account = await session.usersGetCurrentAccount();
    resolved.logger.debug('Session established', { accountId: account.result.account_id });
  } catch (error) {
    const failure = readRemoteFailure(error);
    if (failure?.status === 401) {
      throw new AuthenticationError('Token was rejected', 'TOKEN_REJECTED', error);
    }
    throw new AuthenticationError('Handshake with remote storage failed', 'HANDSHAKE_FAILED', error);
  }

  return new CloudShelf(session, resolved);
}

/**
 * Connect, run `fn` with the shelf, and close the session when `fn` settles.
 *
 * @example
 * ```typescript
 * const names = await withShelf(token, {}, async (shelf) => {
 *   const entries = await shelf.ls('reports');
 *   return entries.map((entry) => entry.name);
 * });
 * ```
 */
export async function withShelf<T>(
  token: string,
  options: ShelfOptions,
  fn: (shelf: CloudShelf) => Promise<T>
): Promise<T> {
  const shelf = await connect(token, options);
  try {
    return await fn(shelf);
  } finally {
    await shelf.close();
  }
}
