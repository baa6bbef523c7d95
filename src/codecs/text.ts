import { FormatError } from '../errors';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Decode UTF-8 bytes.
 * @throws FormatError if the bytes are not valid UTF-8
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new FormatError('text', 'Content is not valid UTF-8', error);
  }
}
