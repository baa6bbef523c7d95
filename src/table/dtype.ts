import { FormatError } from '../errors';

/**
 * Column data types.
 */
export type DType = 'string' | 'float64' | 'int64' | 'bool' | 'datetime' | 'mixed';

/**
 * A single cell. `null` marks a missing value.
 */
export type Cell = string | number | boolean | Date | null;

export const DTYPES: readonly DType[] = ['string', 'float64', 'int64', 'bool', 'datetime', 'mixed'];

export function isDType(value: unknown): value is DType {
  return DTYPES.some((dtype) => dtype === value);
}

/**
 * Infer the narrowest dtype holding every non-null value.
 * A column with no values at all is `string`.
 */
export function inferDType(values: readonly Cell[]): DType {
  const present = values.filter((value): value is Exclude<Cell, null> => value !== null);

  if (present.length === 0) {
    return 'string';
  }
  if (present.every((value) => typeof value === 'boolean')) {
    return 'bool';
  }
  if (present.every((value) => typeof value === 'number')) {
    return present.every((value) => Number.isInteger(value)) ? 'int64' : 'float64';
  }
  if (present.every((value) => value instanceof Date)) {
    return 'datetime';
  }
  if (present.every((value) => typeof value === 'string')) {
    return 'string';
  }
  return 'mixed';
}

const INTEGER_PATTERN = /^[-+]?\d+$/;
const FLOAT_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function fail(column: string, value: Cell, dtype: DType): never {
  const shown = value instanceof Date ? value.toISOString() : String(value);
  throw new FormatError('table', `Cannot convert '${shown}' in column '${column}' to ${dtype}`);
}

/**
 * Convert one value to a dtype.
 * @throws FormatError if the value has no representation in the dtype
 */
export function coerceCell(value: Cell, dtype: DType, column: string): Cell {
  if (value === null || dtype === 'mixed') {
    return value;
  }

  switch (dtype) {
    case 'string':
      return value instanceof Date ? value.toISOString() : String(value);

    case 'float64':
      if (typeof value === 'number') return value;
      if (typeof value === 'boolean') return value ? 1 : 0;
      if (typeof value === 'string' && FLOAT_PATTERN.test(value.trim())) return Number(value.trim());
      return fail(column, value, dtype);

    case 'int64':
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      if (typeof value === 'boolean') return value ? 1 : 0;
      if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) return Number(value.trim());
      return fail(column, value, dtype);

    case 'bool':
      if (typeof value === 'boolean') return value;
      if (value === 0 || value === 1) return value === 1;
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase();
        if (lowered === 'true') return true;
        if (lowered === 'false') return false;
      }
      return fail(column, value, dtype);

    case 'datetime':
      if (value instanceof Date) return value;
      if (typeof value === 'number') return new Date(value);
      if (typeof value === 'string') {
        const parsed = Date.parse(value);
        if (!Number.isNaN(parsed)) return new Date(parsed);
      }
      return fail(column, value, dtype);
  }
}

/**
 * Parse text read from a delimited file into the scalar it spells.
 * Integers, decimals and `true`/`false` spellings convert; anything else stays text.
 */
export function parseScalar(text: string): Cell {
  const trimmed = text.trim();

  if (INTEGER_PATTERN.test(trimmed)) {
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : text;
  }
  if (FLOAT_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  if (trimmed === 'True' || trimmed === 'true' || trimmed === 'TRUE') {
    return true;
  }
  if (trimmed === 'False' || trimmed === 'false' || trimmed === 'FALSE') {
    return false;
  }
  return text;
}
