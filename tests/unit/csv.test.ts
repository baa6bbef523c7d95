import { describe, it, expect } from 'vitest';
import { decodeCsv, encodeCsv } from '../../src/codecs';
import { decodeText, encodeText } from '../../src/codecs/text';
import { DataFrame } from '../../src/table';

describe('CSV codec', () => {
  it('should write an unnamed index column by default', () => {
    const frame = DataFrame.fromColumns({ name: ['a', 'b'], n: [1, 2] });

    expect(decodeText(encodeCsv(frame))).toBe(',name,n\n0,a,1\n1,b,2\n');
  });

  it('should write without the index', () => {
    const frame = DataFrame.fromColumns({ name: ['a', 'b'], n: [1, 2] });

    expect(decodeText(encodeCsv(frame, { index: false }))).toBe('name,n\na,1\nb,2\n');
  });

  it('should quote fields holding the delimiter', () => {
    const frame = DataFrame.fromColumns({ note: ['x,y'] });

    expect(decodeText(encodeCsv(frame, { index: false }))).toBe('note\n"x,y"\n');
  });

  it('should spell booleans and missing values', () => {
    const frame = DataFrame.fromColumns({ ok: [true, null] });

    expect(decodeText(encodeCsv(frame, { index: false, naRep: 'NA' }))).toBe('ok\nTrue\nNA\n');
  });

  it('should parse numbers and booleans on read', () => {
    const frame = decodeCsv(encodeText('name,n,ok\na,1,True\nb,2.5,False\n'));

    expect(frame.dtypes).toEqual({ name: 'string', n: 'float64', ok: 'bool' });
    expect(frame.column('n')).toEqual([1, 2.5]);
    expect(frame.column('ok')).toEqual([true, false]);
  });

  it('should round-trip names and values', () => {
    const source = DataFrame.fromColumns({ letter: ['A', 'B', 'C'], count: [3, 1, 2] });
    const frame = decodeCsv(encodeCsv(source, { index: false }));

    expect(frame.columns).toEqual(['letter', 'count']);
    expect(frame.toRecords()).toEqual(source.toRecords());
  });

  it('should read with a custom delimiter and missing cells', () => {
    const frame = decodeCsv(encodeText('a;b\n1;\n2;x\n'), { delimiter: ';' });

    expect(frame.column('b')).toEqual([null, 'x']);
  });

  it('should restore the index with indexCol', () => {
    const source = DataFrame.fromColumns({ v: ['p', 'q'] });
    const frame = decodeCsv(encodeCsv(source), { indexCol: 0 });

    expect(frame.columns).toEqual(['v']);
    expect(frame.index).toEqual([0, 1]);
  });
});
