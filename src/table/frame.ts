import { FormatError } from '../errors';
import { coerceCell, inferDType, type Cell, type DType } from './dtype';

/**
 * One named, typed column.
 */
export interface Column {
  readonly name: string;
  readonly dtype: DType;
  readonly values: readonly Cell[];
}

/**
 * Options when building a frame.
 */
export interface FrameOptions {
  /** Force dtypes for some columns; the rest are inferred */
  dtypes?: Partial<Record<string, DType>>;
  /** Row labels; `null` or absent means the default 0..n-1 labels */
  index?: readonly Cell[] | null;
}

/**
 * In-memory tabular dataset: rows × named columns with a dtype per column.
 */
export class DataFrame {
  private readonly columnList: Column[];
  private readonly labels: Cell[] | null;
  private readonly rowCount: number;

  private constructor(columns: Column[], labels: Cell[] | null, rowCount: number) {
    this.columnList = columns;
    this.labels = labels;
    this.rowCount = rowCount;
  }

  /**
   * Build a frame from ordered `[name, values]` pairs.
   * @throws FormatError on duplicate names, ragged columns or values the forced dtype rejects
   */
  static fromEntries(
    entries: ReadonlyArray<readonly [string, readonly Cell[]]>,
    options: FrameOptions = {}
  ): DataFrame {
    const seen = new Set<string>();
    const lengths = new Set<number>();

    const columns = entries.map(([name, raw]): Column => {
      if (seen.has(name)) {
        throw new FormatError('table', `Duplicate column name: ${name}`);
      }
      seen.add(name);
      lengths.add(raw.length);

      const forced = options.dtypes?.[name];
      if (forced === undefined) {
        return { name, dtype: inferDType(raw), values: [...raw] };
      }
      return { name, dtype: forced, values: raw.map((value) => coerceCell(value, forced, name)) };
    });

    const index = options.index ?? null;
    if (index !== null) {
      lengths.add(index.length);
    }
    if (lengths.size > 1) {
      throw new FormatError('table', 'All columns and the index must have the same length');
    }

    const [rowCount = 0] = lengths;
    return new DataFrame(columns, index === null ? null : [...index], rowCount);
  }

  /**
   * Build a frame from a column-name → values record.
   *
   * @example
   * const frame = DataFrame.fromColumns({ letter: ['A', 'B', 'C', 'D', 'E'] });
   */
  static fromColumns(data: Record<string, readonly Cell[]>, options: FrameOptions = {}): DataFrame {
    return DataFrame.fromEntries(Object.entries(data), options);
  }

  /**
   * Build a frame from row records. Column order follows first appearance
   * unless `columns` is given; missing keys become null.
   */
  static fromRecords(
    records: ReadonlyArray<Record<string, Cell>>,
    options: FrameOptions & { columns?: string[] } = {}
  ): DataFrame {
    const names = options.columns ?? [...new Set(records.flatMap((record) => Object.keys(record)))];
    const entries = names.map((name) => [name, records.map((record) => record[name] ?? null)] as const);
    return DataFrame.fromEntries(entries, options);
  }

  get columns(): string[] {
    return this.columnList.map((column) => column.name);
  }

  get dtypes(): Record<string, DType> {
    return Object.fromEntries(this.columnList.map((column) => [column.name, column.dtype]));
  }

  /** Number of rows */
  get length(): number {
    return this.rowCount;
  }

  /** True when the frame carries its own row labels */
  get hasIndex(): boolean {
    return this.labels !== null;
  }

  /** Row labels: the explicit index, or 0..n-1 */
  get index(): Cell[] {
    return this.labels === null
      ? Array.from({ length: this.rowCount }, (_, position) => position)
      : [...this.labels];
  }

  columnAt(name: string): Column {
    const column = this.columnList.find((candidate) => candidate.name === name);
    if (!column) {
      throw new FormatError('table', `Unknown column: ${name}`);
    }
    return column;
  }

  column(name: string): Cell[] {
    return [...this.columnAt(name).values];
  }

  row(position: number): Record<string, Cell> {
    return Object.fromEntries(this.columnList.map((column) => [column.name, column.values[position] ?? null]));
  }

  toRecords(): Array<Record<string, Cell>> {
    return Array.from({ length: this.rowCount }, (_, position) => this.row(position));
  }

  /**
   * Keep only the named columns, in the given order.
   */
  select(names: readonly string[]): DataFrame {
    return new DataFrame(
      names.map((name) => this.columnAt(name)),
      this.labels,
      this.rowCount
    );
  }
}
