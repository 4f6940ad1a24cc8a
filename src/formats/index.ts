import type { FormatWriters } from './types.js';
import { writeAsm } from './writeAsm.js';
import { writeMap } from './writeMap.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers return artifacts in memory; nothing is written to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeAsm,
  writeMap,
};
