/**
 * Table module - the in-memory tabular dataset shared by the spreadsheet,
 * columnar and delimited-text codecs.
 */

export { DataFrame } from './frame';
export type { Column, FrameOptions } from './frame';
export { DTYPES, isDType, inferDType, coerceCell, parseScalar } from './dtype';
export type { Cell, DType } from './dtype';
export { frameFromGrid, dedupeNames, DEFAULT_NA_VALUES } from './grid';
export type { TabularReadOptions } from './grid';
