import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { FormatError } from '../errors';
import { frameFromGrid, type Cell, type DataFrame, type TabularReadOptions } from '../table';
import { decodeText, encodeText } from './text';

/**
 * Options for writing a frame as delimited text.
 */
export interface WriteCsvOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Write row labels as the first column (default: true) */
  index?: boolean;
  /** Header for the label column (default: blank) */
  indexLabel?: string;
  /** Write column names as the first line (default: true) */
  header?: boolean;
  /** Only write these columns, in this order */
  columns?: string[];
  /** Text written for missing values (default: empty) */
  naRep?: string;
}

/**
 * Options for reading delimited text into a frame.
 */
export interface ReadCsvOptions extends TabularReadOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
}

function formatCell(cell: Cell, naRep: string): string {
  if (cell === null) return naRep;
  if (cell instanceof Date) return cell.toISOString();
  if (typeof cell === 'boolean') return cell ? 'True' : 'False';
  return String(cell);
}

/**
 * Serialize a frame as delimited text.
 */
export function encodeCsv(frame: DataFrame, options: WriteCsvOptions = {}): Uint8Array {
  const names = options.columns ?? frame.columns;
  const withIndex = options.index ?? true;
  const naRep = options.naRep ?? '';
  const columns = names.map((name) => frame.columnAt(name).values);
  const labels = frame.index;

  const lines: string[][] = [];
  if (options.header ?? true) {
    lines.push([...(withIndex ? [options.indexLabel ?? ''] : []), ...names]);
  }
  for (let position = 0; position < frame.length; position++) {
    lines.push([
      ...(withIndex ? [formatCell(labels[position] ?? null, naRep)] : []),
      ...columns.map((values) => formatCell(values[position] ?? null, naRep)),
    ]);
  }

  return encodeText(stringify(lines, { delimiter: options.delimiter ?? ',' }));
}

function isTextRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === 'string');
}

/**
 * Read delimited text into a frame. Numeric and boolean text becomes numbers and booleans.
 */
export function decodeCsv(bytes: Uint8Array, options: ReadCsvOptions = {}): DataFrame {
  let rows: unknown;
  try {
    rows = parse(decodeText(bytes), {
      delimiter: options.delimiter ?? ',',
      relax_column_count: true,
      skip_empty_lines: true,
      bom: true,
    });
  } catch (error) {
    if (error instanceof FormatError) {
      throw error;
    }
    throw new FormatError('csv', `Malformed delimited text: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  if (!Array.isArray(rows) || !rows.every(isTextRow)) {
    throw new FormatError('csv', 'Delimited text did not parse into rows of fields');
  }
  return frameFromGrid(rows, options, true);
}
