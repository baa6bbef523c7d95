/**
 * Turns a raw cell grid (spreadsheet rows, delimited-text rows) into a DataFrame.
 */

import { FormatError } from '../errors';
import { parseScalar, type Cell, type DType } from './dtype';
import { DataFrame } from './frame';

/**
 * Options shared by every tabular reader.
 */
export interface TabularReadOptions {
  /** Row (after `skipRows`) holding column names; `null` for none (default: 0) */
  header?: number | null;
  /** Column to use as row labels, by position or name */
  indexCol?: number | string;
  /** Only keep these columns */
  usecols?: string[];
  /** Rows to skip at the top (default: 0) */
  skipRows?: number;
  /** Maximum number of data rows */
  nRows?: number;
  /** Forced dtypes per column */
  dtype?: Partial<Record<string, DType>>;
  /** Extra strings read as missing */
  naValues?: string[];
  /** Also treat the default NA spellings as missing (default: true) */
  keepDefaultNa?: boolean;
}

export const DEFAULT_NA_VALUES: readonly string[] = [
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
];

function isBlank(cell: Cell | undefined): boolean {
  return cell === undefined || cell === null || cell === '';
}

function headerName(cell: Cell | undefined, position: number): string {
  if (cell === undefined || cell === null || cell === '') {
    return `Unnamed: ${position}`;
  }
  return cell instanceof Date ? cell.toISOString() : String(cell);
}

/**
 * Make repeated names unique the way spreadsheet tools do: `a`, `a.1`, `a.2`.
 */
export function dedupeNames(names: readonly string[]): string[] {
  const used = new Set<string>();
  const counts = new Map<string, number>();

  return names.map((name) => {
    let candidate = name;
    let count = counts.get(name) ?? 0;
    while (used.has(candidate)) {
      count += 1;
      candidate = `${name}.${count}`;
    }
    counts.set(name, count);
    used.add(candidate);
    return candidate;
  });
}

/**
 * Build a frame from grid rows.
 *
 * @param grid - rows of cells, possibly ragged
 * @param parseText - convert numeric and boolean text to scalars (delimited text)
 */
export function frameFromGrid(
  grid: readonly (readonly Cell[])[],
  options: TabularReadOptions = {},
  parseText = false
): DataFrame {
  const skipped = grid.slice(options.skipRows ?? 0);
  const firstFilled = skipped.findIndex((row) => !row.every((cell) => isBlank(cell)));
  const rows = firstFilled < 0 ? [] : skipped.slice(firstFilled);
  if (rows.length === 0) {
    return DataFrame.fromEntries([]);
  }

  const width = Math.max(...rows.map((row) => row.length));
  const headerRow = options.header === undefined ? 0 : options.header;

  let names: string[];
  let body: (readonly Cell[])[];
  if (headerRow === null) {
    names = Array.from({ length: width }, (_, position) => String(position));
    body = rows;
  } else {
    const header = rows[headerRow];
    if (header === undefined) {
      throw new FormatError('table', `Header row ${headerRow} is past the end of the data`);
    }
    names = dedupeNames(Array.from({ length: width }, (_, position) => headerName(header[position], position)));
    body = rows.slice(headerRow + 1);
  }

  let end = body.length;
  while (end > 0 && body[end - 1].every((cell) => isBlank(cell))) {
    end -= 1;
  }
  body = body.slice(0, end);
  if (options.nRows !== undefined) {
    body = body.slice(0, options.nRows);
  }

  const missing = new Set<string>([
    ...(options.keepDefaultNa === false ? [] : DEFAULT_NA_VALUES),
    ...(options.naValues ?? []),
  ]);

  let entries = names.map((name, position) => {
    const keepText = options.dtype?.[name] !== undefined;
    const values = body.map((row): Cell => {
      const cell = row[position] ?? null;
      if (typeof cell !== 'string') {
        return cell;
      }
      if (missing.has(cell)) {
        return null;
      }
      return parseText && !keepText ? parseScalar(cell) : cell;
    });
    return [name, values] as const;
  });

  if (options.usecols !== undefined) {
    const wanted = new Set(options.usecols);
    const unknown = options.usecols.filter((name) => !names.includes(name));
    if (unknown.length > 0) {
      throw new FormatError('table', `usecols names missing columns: ${unknown.join(', ')}`);
    }
    entries = entries.filter(([name]) => wanted.has(name));
  }

  let index: Cell[] | null = null;
  if (options.indexCol !== undefined) {
    const wantedIndex = options.indexCol;
    const position =
      typeof wantedIndex === 'number'
        ? wantedIndex
        : entries.findIndex(([name]) => name === wantedIndex);
    const chosen = entries[position];
    if (position < 0 || chosen === undefined) {
      throw new FormatError('table', `indexCol does not name a column: ${wantedIndex}`);
    }
    index = chosen[1];
    entries = entries.filter((_, candidate) => candidate !== position);
  }

  return DataFrame.fromEntries(entries, { dtypes: options.dtype, index });
}
