/**
 * Codecs module - converts payloads to and from the bytes stored remotely.
 *
 * @example
 * ```typescript
 * import { encodeYaml, decodeYaml } from 'cloudshelf/codecs';
 *
 * const bytes = encodeYaml({ a: 4, b: 2 });
 * const mapping = decodeYaml(bytes); // Map { 'a' => 4, 'b' => 2 }
 * ```
 */

export { encodeText, decodeText } from './text';
export { encodeYaml, decodeYaml, YAML_INDENT } from './yaml';
export type { YamlMapping, YamlValue, YamlScalar, YamlObject, YamlInput } from './yaml';
export { encodeExcel, decodeExcel, decodeExcelSheets, toCell, DEFAULT_SHEET_NAME } from './excel';
export type { WriteExcelOptions, ReadExcelOptions } from './excel';
export { encodeParquet, decodeParquet, METADATA_KEY, INDEX_COLUMN } from './parquet';
export type { WriteParquetOptions, ReadParquetOptions, ParquetCompression } from './parquet';
export { encodeCsv, decodeCsv } from './csv';
export type { WriteCsvOptions, ReadCsvOptions } from './csv';
export { extractZipEntry, listZipEntries } from './zip';
