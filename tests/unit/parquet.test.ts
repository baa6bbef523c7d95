import { describe, it, expect, vi } from 'vitest';
import { decodeParquet, encodeParquet } from '../../src/codecs';
import { FormatError } from '../../src/errors';
import { DataFrame } from '../../src/table';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, mkdtemp: () => Promise.reject(new Error('scratch directories are unavailable')) };
});

const mixedTypes = DataFrame.fromColumns({
  name: ['ada', 'grace', null],
  age: [36, 45, 52],
  score: [1.5, 2, 3.25],
  active: [true, false, true],
  joined: [new Date(Date.UTC(2020, 0, 1)), null, new Date(Date.UTC(2022, 5, 15))],
});

describe('Parquet codec', () => {
  it('should preserve dtypes exactly on round-trip', async () => {
    const frame = await decodeParquet(await encodeParquet(mixedTypes));

    expect(frame.columns).toEqual(['name', 'age', 'score', 'active', 'joined']);
    expect(frame.dtypes).toEqual({
      name: 'string',
      age: 'int64',
      score: 'float64',
      active: 'bool',
      joined: 'datetime',
    });
  });

  it('should preserve values and missing cells', async () => {
    const frame = await decodeParquet(await encodeParquet(mixedTypes));

    expect(frame.column('name')).toEqual(['ada', 'grace', null]);
    expect(frame.column('age')).toEqual([36, 45, 52]);
    expect(frame.column('score')).toEqual([1.5, 2, 3.25]);
    expect(frame.column('active')).toEqual([true, false, true]);
    expect(frame.column('joined')).toEqual([new Date(Date.UTC(2020, 0, 1)), null, new Date(Date.UTC(2022, 5, 15))]);
  });

  it('should keep a float column of whole numbers as float64', async () => {
    const source = DataFrame.fromColumns({ whole: [1, 2] }, { dtypes: { whole: 'float64' } });
    const frame = await decodeParquet(await encodeParquet(source));

    expect(frame.dtypes).toEqual({ whole: 'float64' });
  });

  it('should store an explicit index', async () => {
    const source = DataFrame.fromColumns({ v: [10, 20] }, { index: ['r1', 'r2'] });
    const frame = await decodeParquet(await encodeParquet(source));

    expect(frame.columns).toEqual(['v']);
    expect(frame.hasIndex).toBe(true);
    expect(frame.index).toEqual(['r1', 'r2']);
  });

  it('should not store the default index unless asked', async () => {
    const frame = await decodeParquet(await encodeParquet(mixedTypes));

    expect(frame.hasIndex).toBe(false);
  });

  it('should read a subset of columns', async () => {
    const frame = await decodeParquet(await encodeParquet(mixedTypes, { compression: 'GZIP' }), {
      columns: ['score', 'name'],
    });

    expect(frame.columns).toEqual(['score', 'name']);
    expect(frame.column('score')).toEqual([1.5, 2, 3.25]);
  });

  it('should reject unknown columns on read', async () => {
    await expect(decodeParquet(await encodeParquet(mixedTypes), { columns: ['nope'] })).rejects.toThrow(
      'Columns not in file: nope'
    );
  });

  it('should reject a mixed column on write', async () => {
    const source = DataFrame.fromColumns({ odd: ['a', 1] });

    await expect(encodeParquet(source)).rejects.toThrow(
      "Column 'odd' mixes value types and cannot be stored as Parquet"
    );
  });

  it('should encode in memory without a scratch directory', async () => {
    const bytes = await encodeParquet(mixedTypes, { rowGroupSize: 1 });

    expect(new TextDecoder().decode(bytes.subarray(0, 4))).toBe('PAR1');
    expect((await decodeParquet(bytes)).length).toBe(3);
  });

  it('should reject a frame with no columns', async () => {
    await expect(encodeParquet(DataFrame.fromColumns({}))).rejects.toThrow(
      'A frame with no columns cannot be stored as Parquet'
    );
  });

  it('should reject bytes that are not Parquet', async () => {
    await expect(decodeParquet(new TextEncoder().encode('plain text'))).rejects.toBeInstanceOf(FormatError);
  });
});
