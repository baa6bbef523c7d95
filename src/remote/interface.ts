/**
 * Session interface - the subset of the Dropbox SDK client CloudShelf uses.
 * Declared locally so that a `Dropbox` instance satisfies it structurally
 * and tests can supply an in-memory stand-in.
 */
export interface DropboxSession {
  usersGetCurrentAccount(): Promise<{ result: { account_id: string } }>;

  filesGetMetadata(arg: { path: string }): Promise<{ result: RemoteMetadata }>;

  filesListFolder(arg: { path: string }): Promise<{ result: RemoteFolderPage }>;

  filesListFolderContinue(arg: { cursor: string }): Promise<{ result: RemoteFolderPage }>;

  filesDeleteV2(arg: { path: string }): Promise<unknown>;

  filesMoveV2(arg: { from_path: string; to_path: string }): Promise<unknown>;

  filesDownload(arg: { path: string }): Promise<{ result: { name: string } }>;

  filesUpload(arg: { path: string; contents: Uint8Array; mode: OverwriteMode }): Promise<unknown>;

  filesUploadSessionStart(arg: {
    contents: Uint8Array;
    close?: boolean;
  }): Promise<{ result: { session_id: string } }>;

  filesUploadSessionAppendV2(arg: {
    cursor: UploadCursor;
    contents: Uint8Array;
    close?: boolean;
  }): Promise<unknown>;

  filesUploadSessionFinish(arg: {
    cursor: UploadCursor;
    commit: { path: string; mode: OverwriteMode };
    contents: Uint8Array;
  }): Promise<unknown>;

  authTokenRevoke(): Promise<unknown>;
}

/**
 * Metadata of one remote entry, as returned by the listing and metadata endpoints.
 */
export interface RemoteMetadata {
  '.tag': string;
  name: string;
  path_display?: string;
  size?: number;
  server_modified?: string;
}

/**
 * One page of a folder listing.
 */
export interface RemoteFolderPage {
  entries: RemoteMetadata[];
  cursor: string;
  has_more: boolean;
}

/**
 * Position within an upload session.
 */
export interface UploadCursor {
  session_id: string;
  offset: number;
}

/**
 * Write mode that replaces any existing object.
 */
export interface OverwriteMode {
  '.tag': 'overwrite';
}

export const OVERWRITE: OverwriteMode = { '.tag': 'overwrite' };
