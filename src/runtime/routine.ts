import type { Block } from '../program/block.js';

/**
 * Where a routine lands in the image.
 *
 * - `library`: always emitted, before user code.
 * - `support`: always emitted, after user code.
 * - `optional`: emitted after `support` only when reachable from a user call.
 * - `trailer`: emitted after literal data.
 */
export type Section = 'library' | 'support' | 'optional' | 'trailer';

/** Per-program parameters some routines are built with. */
export interface BuildContext {
  /** Bytes of locals the zero-BSS routine clears. */
  localBytes: number;
}

export interface Routine {
  /** Catalog key; also the leading label of the first block. */
  readonly name: string;
  readonly section: Section;
  /** Other catalog routines this one calls, jumps or falls into. */
  readonly requires: readonly string[];
  build(ctx: BuildContext): Block[];
}

export function routine(
  name: string,
  section: Section,
  requires: readonly string[],
  build: (ctx: BuildContext) => Block | Block[],
): Routine {
  return {
    name,
    section,
    requires,
    build: (ctx) => {
      const out = build(ctx);
      return Array.isArray(out) ? out : [out];
    },
  };
}
