import type { Instruction } from '../m6502/instruction.js';
import { instructionSize } from '../m6502/instruction.js';

/**
 * One instruction plus any labels bound to its address.
 *
 * Labels starting with `@` are local to the enclosing block; others are global.
 */
export interface CodeLine {
  readonly instruction: Instruction;
  readonly labels?: readonly string[];
}

/** A data-block fixup: write a label's address (or one byte of it) at `offset`. */
export interface Relocation {
  readonly offset: number;
  readonly label: string;
  readonly part: 'lo' | 'hi' | 'word';
}

export interface CodeBlock {
  readonly kind: 'code';
  readonly label?: string;
  readonly lines: readonly CodeLine[];
  readonly comment?: string;
}

export interface DataBlock {
  readonly kind: 'data';
  readonly label?: string;
  readonly bytes: Uint8Array;
  readonly relocations?: readonly Relocation[];
  readonly comment?: string;
}

export type Block = CodeBlock | DataBlock;

/** Marks the next instruction in a `code()` item list with a label. */
export interface LabelMark {
  readonly mark: string;
}

export const at = (name: string): LabelMark => ({ mark: name });

function isLabelMark(item: Instruction | LabelMark): item is LabelMark {
  return 'mark' in item;
}

/**
 * Build a code block from instructions interleaved with `at(label)` marks.
 */
export function code(
  label: string | undefined,
  items: ReadonlyArray<Instruction | LabelMark>,
  comment?: string,
): CodeBlock {
  const lines: CodeLine[] = [];
  let pending: string[] = [];
  for (const item of items) {
    if (isLabelMark(item)) {
      pending.push(item.mark);
      continue;
    }
    lines.push(pending.length > 0 ? { instruction: item, labels: pending } : { instruction: item });
    pending = [];
  }
  if (pending.length > 0) {
    throw new Error(`label(s) ${pending.join(', ')} not followed by an instruction`);
  }
  return {
    kind: 'code',
    ...(label !== undefined ? { label } : {}),
    lines,
    ...(comment !== undefined ? { comment } : {}),
  };
}

export function data(
  label: string | undefined,
  bytes: Uint8Array,
  relocations?: readonly Relocation[],
): DataBlock {
  return {
    kind: 'data',
    ...(label !== undefined ? { label } : {}),
    bytes,
    ...(relocations !== undefined ? { relocations } : {}),
  };
}

export function blockSize(block: Block): number {
  if (block.kind === 'data') return block.bytes.length;
  let size = 0;
  for (const line of block.lines) size += instructionSize(line.instruction);
  return size;
}
