import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { Writable } from 'stream';
import { FormatError } from '../errors';
import { DataFrame, coerceCell, inferDType, isDType, type Cell, type DType } from '../table';

export type ParquetCompression = 'UNCOMPRESSED' | 'SNAPPY' | 'GZIP' | 'BROTLI';

/**
 * Options for writing a frame as Parquet.
 */
export interface WriteParquetOptions {
  /** Page compression (default: SNAPPY) */
  compression?: ParquetCompression;
  /** Store row labels; by default only an explicit index is stored */
  index?: boolean;
  /** Rows per row group */
  rowGroupSize?: number;
}

/**
 * Options for reading Parquet into a frame.
 */
export interface ReadParquetOptions {
  /** Only read these columns, in this order */
  columns?: string[];
}

/** Key-value metadata entry holding the column dtypes. */
export const METADATA_KEY = 'cloudshelf';

/** Column name used to store row labels. */
export const INDEX_COLUMN = '__index_level_0__';

const PARQUET_TYPES = {
  string: 'UTF8',
  float64: 'DOUBLE',
  int64: 'INT64',
  bool: 'BOOLEAN',
  datetime: 'TIMESTAMP_MILLIS',
} as const;

interface StoredLayout {
  columns: Array<{ name: string; dtype: DType }>;
  index: DType | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parquetType(name: string, dtype: DType): (typeof PARQUET_TYPES)[keyof typeof PARQUET_TYPES] {
  if (dtype === 'mixed') {
    throw new FormatError('parquet', `Column '${name}' mixes value types and cannot be stored as Parquet`);
  }
  return PARQUET_TYPES[dtype];
}

function parseLayout(raw: unknown): StoredLayout | null {
  if (typeof raw !== 'string') {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.columns)) {
    return null;
  }

  const columns: StoredLayout['columns'] = [];
  for (const column of parsed.columns) {
    if (!isRecord(column) || typeof column.name !== 'string' || !isDType(column.dtype)) {
      return null;
    }
    columns.push({ name: column.name, dtype: column.dtype });
  }
  return { columns, index: isDType(parsed.index) ? parsed.index : null };
}

function fromParquet(value: unknown, column: string): Cell {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  throw new FormatError('parquet', `Column '${column}' holds values of an unsupported Parquet type`);
}

/**
 * Serialize a frame to Parquet in memory. Column dtypes are kept in the file
 * metadata so that reading restores them exactly.
 */
export async function encodeParquet(frame: DataFrame, options: WriteParquetOptions = {}): Promise<Uint8Array> {
  if (frame.columns.length === 0) {
    throw new FormatError('parquet', 'A frame with no columns cannot be stored as Parquet');
  }

  const compression = options.compression ?? 'SNAPPY';
  const storeIndex = options.index ?? frame.hasIndex;
  const columns = frame.columns.map((name) => frame.columnAt(name));
  const labels = frame.index;
  const indexDType = storeIndex ? inferDType(labels) : null;

  const fields = columns.map((column) => [
    column.name,
    { type: parquetType(column.name, column.dtype), optional: true, compression },
  ] as const);
  if (indexDType !== null) {
    fields.push([INDEX_COLUMN, { type: parquetType(INDEX_COLUMN, indexDType), optional: true, compression }]);
  }

  const layout: StoredLayout = {
    columns: columns.map((column) => ({ name: column.name, dtype: column.dtype })),
    index: indexDType,
  };

  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(Buffer.from(chunk));
      callback();
    },
  });

  try {
    const writer = await ParquetWriter.openStream(new ParquetSchema(Object.fromEntries(fields)), sink);
    if (options.rowGroupSize !== undefined) {
      writer.setRowGroupSize(options.rowGroupSize);
    }
    writer.setMetadata(METADATA_KEY, JSON.stringify(layout));

    for (let position = 0; position < frame.length; position++) {
      const row: Record<string, unknown> = {};
      for (const column of columns) {
        const value = column.values[position];
        // missing optional fields are left out of the record
        if (value !== null && value !== undefined) {
          row[column.name] = value;
        }
      }
      const label = labels[position];
      if (indexDType !== null && label !== null && label !== undefined) {
        row[INDEX_COLUMN] = label;
      }
      await writer.appendRow(row);
    }

    await writer.close();
    return new Uint8Array(Buffer.concat(chunks));
  } catch (error) {
    sink.destroy();
    if (error instanceof FormatError) {
      throw error;
    }
    throw new FormatError('parquet', 'Frame cannot be serialized as Parquet', error);
  }
}

/**
 * Read a Parquet file into a frame.
 */
export async function decodeParquet(bytes: Uint8Array, options: ReadParquetOptions = {}): Promise<DataFrame> {
  let reader: ParquetReader;
  try {
    reader = await ParquetReader.openBuffer(Buffer.from(bytes));
  } catch (error) {
    throw new FormatError('parquet', 'Content is not a readable Parquet file', error);
  }

  try {
    const layout = parseLayout(reader.getMetadata()[METADATA_KEY]);
    const stored = Object.keys(reader.getSchema().fields);
    const dtypes: Partial<Record<string, DType>> = {};
    for (const column of layout?.columns ?? []) {
      dtypes[column.name] = column.dtype;
    }

    const available = layout?.columns.map((column) => column.name) ?? stored.filter((name) => name !== INDEX_COLUMN);
    const names = options.columns ?? available;
    const unknown = names.filter((name) => !available.includes(name));
    if (unknown.length > 0) {
      throw new FormatError('parquet', `Columns not in file: ${unknown.join(', ')}`);
    }

    const records: Array<Record<string, unknown>> = [];
    const cursor = reader.getCursor();
    for (;;) {
      const record: unknown = await cursor.next();
      if (!isRecord(record)) {
        break;
      }
      records.push(record);
    }

    const entries = names.map((name) => [name, records.map((record) => fromParquet(record[name], name))] as const);
    const hasIndex = stored.includes(INDEX_COLUMN);
    const index = hasIndex ? records.map((record) => fromParquet(record[INDEX_COLUMN], INDEX_COLUMN)) : null;
    const indexDType = layout?.index ?? null;

    return DataFrame.fromEntries(entries, {
      dtypes,
      index: index !== null && indexDType !== null ? index.map((label) => coerceCell(label, indexDType, INDEX_COLUMN)) : index,
    });
  } catch (error) {
    if (error instanceof FormatError) {
      throw error;
    }
    throw new FormatError('parquet', 'Parquet content could not be decoded', error);
  } finally {
    await reader.close();
  }
}
