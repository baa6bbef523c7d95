import { OVERWRITE, type DropboxSession } from './interface';

/**
 * Upload bytes to a remote path, replacing any existing object.
 *
 * Payloads that fit in one chunk go in a single request. Larger payloads
 * open an upload session, append each full chunk and commit with the last one.
 */
export async function uploadBytes(
  session: DropboxSession,
  remotePath: string,
  contents: Uint8Array,
  chunkSize: number
): Promise<void> {
  if (contents.byteLength <= chunkSize) {
    await session.filesUpload({ path: remotePath, contents, mode: OVERWRITE });
    return;
  }

  const started = await session.filesUploadSessionStart({
    contents: contents.subarray(0, chunkSize),
  });
  const sessionId = started.result.session_id;
  let offset = chunkSize;

  while (contents.byteLength - offset > chunkSize) {
    await session.filesUploadSessionAppendV2({
      cursor: { session_id: sessionId, offset },
      contents: contents.subarray(offset, offset + chunkSize),
    });
    offset += chunkSize;
  }

  await session.filesUploadSessionFinish({
    cursor: { session_id: sessionId, offset },
    commit: { path: remotePath, mode: OVERWRITE },
    contents: contents.subarray(offset),
  });
}
