import ExcelJS from 'exceljs';
import { FormatError } from '../errors';
import { frameFromGrid, type Cell, type DataFrame, type TabularReadOptions } from '../table';

/**
 * Options for writing a frame as a spreadsheet.
 */
export interface WriteExcelOptions {
  /** Worksheet name (default: Sheet1) */
  sheetName?: string;
  /** Write row labels as the first column (default: true) */
  index?: boolean;
  /** Header for the label column (default: blank) */
  indexLabel?: string;
  /** Write column names as the first row (default: true) */
  header?: boolean;
  /** Only write these columns, in this order */
  columns?: string[];
  /** Text written for missing values (default: empty cell) */
  naRep?: string;
  /** Zero-based row offset of the table (default: 0) */
  startRow?: number;
  /** Zero-based column offset of the table (default: 0) */
  startCol?: number;
  /** Freeze this many rows and columns, as `[rows, columns]` */
  freezePanes?: [number, number];
}

/**
 * Options for reading a spreadsheet into a frame.
 */
export interface ReadExcelOptions extends TabularReadOptions {
  /** Worksheet name or zero-based position (default: 0) */
  sheet?: string | number;
}

export const DEFAULT_SHEET_NAME = 'Sheet1';

/**
 * Flatten an ExcelJS cell value (rich text, formulas, links) to a plain cell.
 */
export function toCell(value: ExcelJS.CellValue): Cell {
  if (value === null || value === undefined) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    const result = value.result;
    if (
      typeof result === 'string' ||
      typeof result === 'number' ||
      typeof result === 'boolean' ||
      result instanceof Date
    ) {
      return result;
    }
  }
  // error cells and formulas without a cached result
  return null;
}

/**
 * Serialize a frame to an xlsx workbook with one sheet.
 */
export async function encodeExcel(frame: DataFrame, options: WriteExcelOptions = {}): Promise<Uint8Array> {
  const names = options.columns ?? frame.columns;
  const withIndex = options.index ?? true;
  const withHeader = options.header ?? true;
  const naRep = options.naRep ?? null;
  const rowOffset = options.startRow ?? 0;
  const colOffset = options.startCol ?? 0;

  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(options.sheetName ?? DEFAULT_SHEET_NAME);

  if (options.freezePanes) {
    const [ySplit, xSplit] = options.freezePanes;
    worksheet.views = [{ state: 'frozen', xSplit, ySplit }];
  }

  const columns = names.map((name) => frame.columnAt(name).values);
  const labels = frame.index;
  const grid: Cell[][] = [];

  if (withHeader) {
    grid.push([...(withIndex ? [options.indexLabel ?? null] : []), ...names]);
  }
  for (let position = 0; position < frame.length; position++) {
    grid.push(
      [...(withIndex ? [labels[position] ?? null] : []), ...columns.map((values) => values[position] ?? null)].map(
        (cell) => cell ?? naRep
      )
    );
  }

  grid.forEach((cells, rowPosition) => {
    const row = worksheet.getRow(rowOffset + rowPosition + 1);
    cells.forEach((cell, colPosition) => {
      row.getCell(colOffset + colPosition + 1).value = cell;
    });
  });

  try {
    const buffer = await workbook.xlsx.writeBuffer();
    return new Uint8Array(buffer);
  } catch (error) {
    throw new FormatError('excel', 'Frame cannot be serialized as xlsx', error);
  }
}

async function loadWorkbook(bytes: Uint8Array): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(Buffer.from(bytes));
  } catch (error) {
    throw new FormatError('excel', 'Content is not a readable xlsx workbook', error);
  }
  return workbook;
}

function isBlankCell(cell: Cell): boolean {
  return cell === null || cell === '';
}

/**
 * Cell grid of a worksheet. Columns left of the first non-blank cell are
 * dropped, so a table written at a column offset reads back in place.
 */
function sheetGrid(worksheet: ExcelJS.Worksheet): Cell[][] {
  const grid: Cell[][] = [];
  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const cells: Cell[] = [];
    for (let colNumber = 1; colNumber <= worksheet.columnCount; colNumber++) {
      cells.push(toCell(row.getCell(colNumber).value));
    }
    grid.push(cells);
  }

  const firstUsed = grid.reduce((first, cells) => {
    const position = cells.findIndex((cell) => !isBlankCell(cell));
    return position < 0 ? first : Math.min(first, position);
  }, Infinity);
  return Number.isFinite(firstUsed) && firstUsed > 0 ? grid.map((cells) => cells.slice(firstUsed)) : grid;
}

function pickSheet(workbook: ExcelJS.Workbook, sheet: string | number): ExcelJS.Worksheet {
  const worksheet =
    typeof sheet === 'number' ? workbook.worksheets[sheet] : workbook.worksheets.find((ws) => ws.name === sheet);
  if (worksheet === undefined) {
    throw new FormatError('excel', `Worksheet not found: ${sheet}`);
  }
  return worksheet;
}

/**
 * Read one sheet of an xlsx workbook.
 */
export async function decodeExcel(bytes: Uint8Array, options: ReadExcelOptions = {}): Promise<DataFrame> {
  const workbook = await loadWorkbook(bytes);
  return frameFromGrid(sheetGrid(pickSheet(workbook, options.sheet ?? 0)), options);
}

/**
 * Read several sheets of one xlsx workbook, keyed by sheet name.
 */
export async function decodeExcelSheets(
  bytes: Uint8Array,
  sheetNames: readonly string[],
  options: TabularReadOptions = {}
): Promise<Record<string, DataFrame>> {
  const workbook = await loadWorkbook(bytes);
  const frames: Record<string, DataFrame> = {};
  for (const name of sheetNames) {
    frames[name] = frameFromGrid(sheetGrid(pickSheet(workbook, name)), options);
  }
  return frames;
}
