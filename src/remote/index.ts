/**
 * Remote module - the session CloudShelf drives and how its failures are read.
 */

export type {
  DropboxSession,
  RemoteMetadata,
  RemoteFolderPage,
  UploadCursor,
  OverwriteMode,
} from './interface';
export { OVERWRITE } from './interface';
export { translateRemoteError, readRemoteFailure, isNotFoundSummary } from './errors';
export { uploadBytes } from './upload';
