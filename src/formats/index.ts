import type { FormatWriters } from './types.js';
import { writeListing } from './writeListing.js';
import { writeLl } from './writeLl.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeLl,
  writeListing,
};
