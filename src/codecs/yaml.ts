import { parse, stringify } from 'yaml';
import { FormatError } from '../errors';
import { decodeText, encodeText } from './text';

export type YamlScalar = string | number | boolean | null;

/**
 * Ordered mapping read back from a YAML document. Keys keep document order.
 */
export type YamlMapping = Map<string, YamlValue>;

export type YamlValue = YamlScalar | YamlValue[] | YamlMapping;

/**
 * Plain-object form accepted on write; key order is the object's own order.
 */
export interface YamlObject {
  [key: string]: YamlInput;
}

export type YamlInput = YamlScalar | YamlInput[] | Map<string, YamlInput> | YamlObject;

/** Indentation used for nested blocks. */
export const YAML_INDENT = 4;

function toYamlValue(value: unknown, at: string): YamlValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, position) => toYamlValue(item, `${at}[${position}]`));
  }
  if (value instanceof Map) {
    const mapping: YamlMapping = new Map();
    for (const [key, item] of value) {
      if (key !== null && typeof key === 'object') {
        throw new FormatError('yaml', `Complex mapping keys are not supported at ${at}`);
      }
      mapping.set(String(key), toYamlValue(item, `${at}.${String(key)}`));
    }
    return mapping;
  }
  throw new FormatError('yaml', `Unsupported YAML node at ${at}`);
}

/**
 * Serialize a mapping as block-style YAML.
 */
export function encodeYaml(data: YamlMapping | YamlObject): Uint8Array {
  try {
    return encodeText(stringify(data, { indent: YAML_INDENT }));
  } catch (error) {
    throw new FormatError('yaml', 'Value cannot be serialized as YAML', error);
  }
}

/**
 * Parse a YAML document whose root is a mapping. An empty document is an empty mapping.
 * @throws FormatError on malformed YAML or a non-mapping root
 */
export function decodeYaml(bytes: Uint8Array): YamlMapping {
  let parsed: unknown;
  try {
    parsed = parse(decodeText(bytes), { mapAsMap: true });
  } catch (error) {
    if (error instanceof FormatError) {
      throw error;
    }
    throw new FormatError('yaml', `Malformed YAML: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  if (parsed === null || parsed === undefined) {
    return new Map();
  }
  const root = toYamlValue(parsed, '$');
  if (!(root instanceof Map)) {
    throw new FormatError('yaml', 'YAML document root is not a mapping');
  }
  return root;
}
