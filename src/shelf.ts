/**
 * CloudShelf - read and write text, YAML and tabular payloads on remote storage.
 * Every path is normalized before it reaches the remote API.
 */

import { resolveOptions, type ResolvedShelfOptions, type ShelfOptions } from './config';
import {
  decodeCsv,
  decodeExcel,
  decodeExcelSheets,
  decodeParquet,
  decodeText,
  decodeYaml,
  encodeCsv,
  encodeExcel,
  encodeParquet,
  encodeText,
  encodeYaml,
  extractZipEntry,
  type ReadCsvOptions,
  type ReadExcelOptions,
  type ReadParquetOptions,
  type WriteCsvOptions,
  type WriteExcelOptions,
  type WriteParquetOptions,
  type YamlMapping,
  type YamlObject,
} from './codecs';
import { NotFoundError, StorageError } from './errors';
import type { Logger } from './logger';
import { normalizePath, toRemotePath } from './path';
import { translateRemoteError, uploadBytes, type DropboxSession, type RemoteMetadata } from './remote';
import type { DataFrame, TabularReadOptions } from './table';

/**
 * One child of a listed folder.
 */
export interface EntryDescriptor {
  /** Entry name */
  name: string;
  /** Normalized path of the entry */
  path: string;
  /** Entry kind */
  type: 'file' | 'folder';
  /** Size in bytes (files only) */
  size?: number;
  /** Last server-side modification (files only) */
  modifiedAt?: Date;
}

function toEntry(parent: string, metadata: RemoteMetadata): EntryDescriptor | null {
  const type = metadata['.tag'];
  if (type !== 'file' && type !== 'folder') {
    return null;
  }

  const entry: EntryDescriptor = {
    name: metadata.name,
    path: normalizePath(metadata.path_display ?? `${parent}/${metadata.name}`),
    type,
  };
  if (type === 'file') {
    entry.size = metadata.size;
    entry.modifiedAt = metadata.server_modified === undefined ? undefined : new Date(metadata.server_modified);
  }
  return entry;
}

function fileBinary(result: { name: string }, path: string): Uint8Array {
  if ('fileBinary' in result && result.fileBinary instanceof Uint8Array) {
    return result.fileBinary;
  }
  throw new StorageError(`Download of '${path}' returned no content`, 'EMPTY_DOWNLOAD');
}

/**
 * Facade over one remote storage session.
 *
 * Use `connect()` to build one from a token, or pass an existing session.
 *
 * @example
 * ```typescript
 * const shelf = await connect(token, { logger: consoleLogger });
 * await shelf.writeYaml({ a: 4, b: 2 }, 'config/settings.yaml');
 * const settings = await shelf.readYaml('config/settings.yaml');
 * await shelf.close();
 * ```
 */
export class CloudShelf {
  private readonly session: DropboxSession;
  private readonly options: ResolvedShelfOptions;
  private closed = false;

  constructor(session: DropboxSession, options: ShelfOptions = {}) {
    this.session = session;
    this.options = resolveOptions(options);
  }

  get logger(): Logger {
    return this.options.logger;
  }

  /** True once `close()` has been called */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Normalize a path the way every operation does before calling the remote API.
   */
  normalizePath(path: string): string {
    return normalizePath(path);
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StorageError('Session is closed', 'SESSION_CLOSED');
    }
  }

  private async remote<T>(operation: string, path: string, call: () => Promise<T>): Promise<T> {
    this.ensureOpen();
    try {
      return await call();
    } catch (error) {
      const translated = translateRemoteError(error, operation, path);
      if (translated instanceof NotFoundError) {
        this.logger.debug(`'${path}' not found during ${operation}`);
      } else {
        this.logger.error(translated.message, { operation, path, code: translated.code });
      }
      throw translated;
    }
  }

  private async download(path: string): Promise<Uint8Array> {
    const normalized = normalizePath(path);
    this.ensureOpen();
    this.logger.debug(`Reading '${normalized}'`);

    const response = await this.remote('download', normalized, () =>
      this.session.filesDownload({ path: toRemotePath(normalized) })
    );
    return fileBinary(response.result, normalized);
  }

  private async upload(contents: Uint8Array, path: string): Promise<void> {
    const normalized = normalizePath(path);
    this.ensureOpen();
    this.logger.info(`Exporting '${normalized}'`);

    await this.remote('upload', normalized, () =>
      uploadBytes(this.session, toRemotePath(normalized), contents, this.options.uploadChunkSize)
    );
  }

  /**
   * Check whether a file or folder exists. A missing path gives `false`;
   * any other failure is thrown.
   */
  async fileExists(path: string): Promise<boolean> {
    const normalized = normalizePath(path);
    this.ensureOpen();
    if (normalized === '/') {
      return true;
    }

    try {
      await this.remote('metadata', normalized, () =>
        this.session.filesGetMetadata({ path: toRemotePath(normalized) })
      );
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * List the immediate children of a folder, sorted by name.
   * @throws NotFoundError if the folder does not exist
   */
  async ls(path: string): Promise<EntryDescriptor[]> {
    const normalized = normalizePath(path);
    const remotePath = toRemotePath(normalized);

    const entries = await this.remote('list', normalized, async () => {
      let page = (await this.session.filesListFolder({ path: remotePath })).result;
      const collected = [...page.entries];
      while (page.has_more) {
        page = (await this.session.filesListFolderContinue({ cursor: page.cursor })).result;
        collected.push(...page.entries);
      }
      return collected;
    });

    return entries
      .map((metadata) => toEntry(remotePath, metadata))
      .filter((entry): entry is EntryDescriptor => entry !== null)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Delete a file or folder.
   * @throws NotFoundError if the path does not exist
   */
  async delete(path: string): Promise<void> {
    const normalized = normalizePath(path);
    this.ensureOpen();
    this.logger.info(`Deleting '${normalized}'`);

    await this.remote('delete', normalized, () => this.session.filesDeleteV2({ path: toRemotePath(normalized) }));
  }

  /**
   * Move a file or folder.
   * @throws NotFoundError if the origin does not exist
   */
  async move(origin: string, destination: string): Promise<void> {
    const from = normalizePath(origin);
    const to = normalizePath(destination);
    this.ensureOpen();
    this.logger.debug(`Moving '${from}' to '${to}'`);

    await this.remote('move', from, () =>
      this.session.filesMoveV2({ from_path: toRemotePath(from), to_path: toRemotePath(to) })
    );
  }

  async readFile(path: string): Promise<string> {
    return decodeText(await this.download(path));
  }

  async writeFile(text: string, path: string): Promise<void> {
    await this.upload(encodeText(text), path);
  }

  async readBinary(path: string): Promise<Uint8Array> {
    return this.download(path);
  }

  async writeBinary(contents: Uint8Array, path: string): Promise<void> {
    await this.upload(contents, path);
  }

  /**
   * Read a YAML mapping. Keys keep document order.
   */
  async readYaml(path: string): Promise<YamlMapping> {
    return decodeYaml(await this.download(path));
  }

  async writeYaml(data: YamlMapping | YamlObject, path: string): Promise<void> {
    await this.upload(encodeYaml(data), path);
  }

  async readExcel(path: string, options: ReadExcelOptions = {}): Promise<DataFrame> {
    return decodeExcel(await this.download(path), options);
  }

  /**
   * Read several sheets of one workbook with a single download.
   */
  async readExcelSheets(
    path: string,
    sheetNames: readonly string[],
    options: TabularReadOptions = {}
  ): Promise<Record<string, DataFrame>> {
    return decodeExcelSheets(await this.download(path), sheetNames, options);
  }

  async writeExcel(frame: DataFrame, path: string, options: WriteExcelOptions = {}): Promise<void> {
    await this.upload(await encodeExcel(frame, options), path);
  }

  async readParquet(path: string, options: ReadParquetOptions = {}): Promise<DataFrame> {
    return decodeParquet(await this.download(path), options);
  }

  async writeParquet(frame: DataFrame, path: string, options: WriteParquetOptions = {}): Promise<void> {
    await this.upload(await encodeParquet(frame, options), path);
  }

  async readCsv(path: string, options: ReadCsvOptions = {}): Promise<DataFrame> {
    return decodeCsv(await this.download(path), options);
  }

  async writeCsv(frame: DataFrame, path: string, options: WriteCsvOptions = {}): Promise<void> {
    await this.upload(encodeCsv(frame, options), path);
  }

  /**
   * Read one entry of a zip archive; the first file entry when no name is given.
   */
  async readZip(path: string, entry?: string): Promise<Uint8Array> {
    return extractZipEntry(await this.download(path), normalizePath(path), entry);
  }

  /**
   * Release the session. Later calls fail with `SESSION_CLOSED`.
   * With `revokeOnClose`, the token is revoked remotely as well.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    try {
      if (this.options.revokeOnClose) {
        await this.remote('revoke', '/', () => this.session.authTokenRevoke());
      }
    } finally {
      this.closed = true;
      this.logger.debug('Session closed');
    }
  }
}
