import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { decodeExcel, decodeExcelSheets, encodeExcel, toCell } from '../../src/codecs';
import { FormatError } from '../../src/errors';
import { DataFrame } from '../../src/table';

const letters = DataFrame.fromColumns({ letter: ['A', 'B', 'C', 'D', 'E'] });

async function workbookWith(sheets: Record<string, unknown[][]>): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    const worksheet = workbook.addWorksheet(name);
    for (const row of rows) {
      worksheet.addRow(row);
    }
  }
  return new Uint8Array(await workbook.xlsx.writeBuffer());
}

describe('Excel codec', () => {
  it('should write the index as an unnamed first column by default', async () => {
    const frame = await decodeExcel(await encodeExcel(letters));

    expect(frame.columns).toEqual(['Unnamed: 0', 'letter']);
    expect(frame.length).toBe(5);
    expect(frame.column('Unnamed: 0')).toEqual([0, 1, 2, 3, 4]);
    expect(frame.column('letter')).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('should omit the index column with index: false', async () => {
    const frame = await decodeExcel(await encodeExcel(letters, { index: false }));

    expect(frame.columns).toEqual(['letter']);
    expect(frame.column('letter')).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('should restore the index with indexCol', async () => {
    const frame = await decodeExcel(await encodeExcel(letters), { indexCol: 0 });

    expect(frame.columns).toEqual(['letter']);
    expect(frame.index).toEqual([0, 1, 2, 3, 4]);
  });

  it('should coerce integral numbers to int64', async () => {
    const source = DataFrame.fromColumns({ whole: [1, 2], ratio: [0.5, 1.5] }, { dtypes: { whole: 'float64' } });
    const frame = await decodeExcel(await encodeExcel(source, { index: false }));

    expect(frame.dtypes).toEqual({ whole: 'int64', ratio: 'float64' });
  });

  it('should use the sheet name and index label', async () => {
    const bytes = await encodeExcel(letters, { sheetName: 'Letters', indexLabel: 'row' });
    const frame = await decodeExcel(bytes, { sheet: 'Letters' });

    expect(frame.columns).toEqual(['row', 'letter']);
  });

  it('should write missing values with naRep', async () => {
    const source = DataFrame.fromColumns({ v: ['x', null] });
    const frame = await decodeExcel(await encodeExcel(source, { index: false, naRep: '-' }), {
      keepDefaultNa: false,
    });

    expect(frame.column('v')).toEqual(['x', '-']);
  });

  it('should keep the index header blank when writing naRep', async () => {
    const source = DataFrame.fromColumns({ letter: ['A', null] });
    const frame = await decodeExcel(await encodeExcel(source, { naRep: '-' }));

    expect(frame.columns).toEqual(['Unnamed: 0', 'letter']);
    expect(frame.column('letter')).toEqual(['A', '-']);
  });

  it('should read back a table written at a row and column offset', async () => {
    const frame = await decodeExcel(await encodeExcel(letters, { index: false, startRow: 2, startCol: 1 }));

    expect(frame.columns).toEqual(['letter']);
    expect(frame.length).toBe(5);
    expect(frame.column('letter')).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('should keep the index column of an offset table', async () => {
    const frame = await decodeExcel(await encodeExcel(letters, { startRow: 1, startCol: 2 }), { indexCol: 0 });

    expect(frame.columns).toEqual(['letter']);
    expect(frame.index).toEqual([0, 1, 2, 3, 4]);
  });

  it('should freeze panes', async () => {
    const bytes = await encodeExcel(letters, { freezePanes: [1, 1] });
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(Buffer.from(bytes));

    expect(workbook.worksheets[0].views[0]).toMatchObject({ state: 'frozen', xSplit: 1, ySplit: 1 });
    expect((await decodeExcel(bytes)).column('letter')).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('should restore the index by its label', async () => {
    const frame = await decodeExcel(await encodeExcel(letters, { indexLabel: 'row' }), { indexCol: 'row' });

    expect(frame.columns).toEqual(['letter']);
    expect(frame.index).toEqual([0, 1, 2, 3, 4]);
  });

  it('should write data rows only with header: false', async () => {
    const frame = await decodeExcel(await encodeExcel(letters, { index: false, header: false }), { header: null });

    expect(frame.columns).toEqual(['0']);
    expect(frame.column('0')).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('should honour the column subset on write', async () => {
    const source = DataFrame.fromColumns({ a: [1], b: [2], c: [3] });
    const frame = await decodeExcel(await encodeExcel(source, { index: false, columns: ['c', 'a'] }));

    expect(frame.columns).toEqual(['c', 'a']);
  });

  it('should read several sheets', async () => {
    const bytes = await workbookWith({
      first: [['x'], [1]],
      second: [['y'], ['b']],
    });

    const frames = await decodeExcelSheets(bytes, ['second', 'first']);

    expect(Object.keys(frames)).toEqual(['second', 'first']);
    expect(frames.first.column('x')).toEqual([1]);
    expect(frames.second.column('y')).toEqual(['b']);
  });

  it('should read a sheet by position', async () => {
    const bytes = await workbookWith({ first: [['x'], [1]], second: [['y'], [2]] });

    expect((await decodeExcel(bytes, { sheet: 1 })).columns).toEqual(['y']);
  });

  it('should reject a missing sheet', async () => {
    const bytes = await workbookWith({ first: [['x']] });

    await expect(decodeExcel(bytes, { sheet: 'nope' })).rejects.toThrow('Worksheet not found: nope');
  });

  it('should reject bytes that are not a workbook', async () => {
    await expect(decodeExcel(new TextEncoder().encode('not a workbook'))).rejects.toBeInstanceOf(FormatError);
  });
});

describe('toCell', () => {
  it('should flatten rich text, links and formulas', () => {
    expect(toCell({ richText: [{ text: 'a' }, { text: 'b' }] })).toBe('ab');
    expect(toCell({ text: 'site', hyperlink: 'https://example.com' })).toBe('site');
    expect(toCell({ formula: 'A1+1', result: 3, date1904: false })).toBe(3);
    expect(toCell({ error: '#DIV/0!' })).toBeNull();
    expect(toCell(undefined)).toBeNull();
  });
});
