/**
 * CloudShelf - convenience client over Dropbox storage
 *
 * Reads and writes text, ordered YAML mappings and tabular data
 * (xlsx, Parquet, CSV) without managing path normalization, serialization
 * or the SDK session.
 *
 * @example
 * ```typescript
 * import { connect, DataFrame } from 'cloudshelf';
 *
 * const shelf = await connect(process.env.DROPBOX_TOKEN ?? '');
 *
 * await shelf.writeYaml({ a: 4, b: 2 }, 'settings.yaml');
 *
 * const frame = DataFrame.fromColumns({ letter: ['A', 'B', 'C', 'D', 'E'] });
 * await shelf.writeParquet(frame, 'letters.parquet');
 *
 * await shelf.close();
 * ```
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Facade
export { CloudShelf } from './shelf';
export type { EntryDescriptor } from './shelf';
export { connect, withShelf } from './connect';

// Paths
export { normalizePath } from './path';

// Remote session
export { translateRemoteError, isNotFoundSummary } from './remote';
export type { DropboxSession, RemoteMetadata, RemoteFolderPage } from './remote';

// Tables
export { DataFrame, inferDType, coerceCell, DEFAULT_NA_VALUES } from './table';
export type { Cell, DType, Column, FrameOptions, TabularReadOptions } from './table';

// Codecs
export {
  encodeText,
  decodeText,
  encodeYaml,
  decodeYaml,
  encodeExcel,
  decodeExcel,
  decodeExcelSheets,
  encodeParquet,
  decodeParquet,
  encodeCsv,
  decodeCsv,
  extractZipEntry,
  listZipEntries,
} from './codecs';
export type {
  YamlMapping,
  YamlValue,
  YamlObject,
  YamlInput,
  WriteExcelOptions,
  ReadExcelOptions,
  WriteParquetOptions,
  ReadParquetOptions,
  ParquetCompression,
  WriteCsvOptions,
  ReadCsvOptions,
} from './codecs';

// Config
export { resolveOptions, DEFAULT_UPLOAD_CHUNK_SIZE, MAX_UPLOAD_CHUNK_SIZE } from './config';
export type { ShelfOptions, ResolvedShelfOptions } from './config';

// Logging
export { noopLogger, consoleLogger } from './logger';
export type { Logger } from './logger';

// Errors
export {
  CloudShelfError,
  AuthenticationError,
  NotFoundError,
  StorageError,
  FormatError,
  ConfigError,
} from './errors';
