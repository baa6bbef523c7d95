import { Dropbox } from 'dropbox';
import type { ResolvedShelfOptions } from '../config';
import type { DropboxSession } from './interface';

/**
 * Build an SDK client for a token. No request is made here;
 * the handshake happens in `connect`.
 */
export function createDropboxSession(token: string, options: ResolvedShelfOptions): DropboxSession {
  return new Dropbox({
    accessToken: token,
    selectUser: options.selectUser,
    pathRoot: options.pathRoot,
  });
}
