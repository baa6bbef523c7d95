import JSZip from 'jszip';
import { FormatError, NotFoundError } from '../errors';

/**
 * Names of the file entries of an archive, in archive order.
 */
export async function listZipEntries(bytes: Uint8Array): Promise<string[]> {
  const archive = await openArchive(bytes);
  return Object.values(archive.files)
    .filter((entry) => !entry.dir)
    .map((entry) => entry.name);
}

async function openArchive(bytes: Uint8Array): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new FormatError('zip', 'Content is not a readable zip archive', error);
  }
}

/**
 * Extract one entry of a zip archive. Without a name, the first file entry.
 *
 * @param archivePath - remote path of the archive, used in error messages
 */
export async function extractZipEntry(bytes: Uint8Array, archivePath: string, entryName?: string): Promise<Uint8Array> {
  const archive = await openArchive(bytes);

  const entry =
    entryName === undefined
      ? Object.values(archive.files).find((candidate) => !candidate.dir)
      : archive.file(entryName);

  if (!entry) {
    if (entryName === undefined) {
      throw new FormatError('zip', `Archive ${archivePath} holds no files`);
    }
    throw new NotFoundError(`${archivePath}:${entryName}`, `Entry '${entryName}' not found in ${archivePath}`);
  }

  try {
    return await entry.async('uint8array');
  } catch (error) {
    throw new FormatError('zip', `Entry '${entry.name}' in ${archivePath} could not be inflated`, error);
  }
}
