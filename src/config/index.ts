/**
 * Configuration module for CloudShelf.
 */

export {
  resolveOptions,
  DEFAULT_UPLOAD_CHUNK_SIZE,
  MAX_UPLOAD_CHUNK_SIZE,
} from './options';

export type { ShelfOptions, ResolvedShelfOptions } from './options';
