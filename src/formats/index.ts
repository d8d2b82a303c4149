import type { FormatWriters } from './types.js';
import { writeAsm } from './writeAsm.js';
import { writeListing } from './writeListing.js';
import { writeNes } from './writeNes.js';

/**
 * Default in-memory artifact writers. Nothing here touches the disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeNes,
  writeListing,
  writeAsm,
};
