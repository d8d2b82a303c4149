/**
 * A local variable's storage.
 *
 * `alias` locals hold no RAM: they name a literal (string or byte array) for the whole body.
 */
export type LocalSlot =
  | { kind: 'byte'; index: number; address: number; signed: boolean }
  | { kind: 'word'; index: number; address: number }
  | { kind: 'alias'; index: number; literal?: Literal }
  | { kind: 'unsupported'; index: number; typeName: string };

/** A ROM-resident byte run with a label. */
export interface Literal {
  label: string;
  /** Element count (strings: characters, without the terminator). */
  length: number;
  /** Contents when known at translation time. */
  bytes?: Uint8Array;
}

/**
 * A `newarr` result whose contents are still being filled in.
 *
 * Shared between duplicated stack entries; bound to a literal on first use.
 */
export interface PendingArray {
  length: number;
  bytes: Uint8Array;
  literal?: Literal;
}

/**
 * How the byte in A reads as a 32-bit evaluation-stack value.
 *
 * `wrapped` is the low byte of a result that may not fit in a byte: a sum, a left shift, a negation.
 */
export type ByteRange = 'u8' | 's8' | 'wrapped';

/**
 * Evaluation stack entry.
 *
 * Lazy entries (`const`, `address`, `array`, `field`, `local`) emit nothing until consumed.
 * A `value` lives in A (A/X for words) when `where` is `reg`, or on the software stack.
 *
 * Shape invariant: spilled values form a prefix of the stack, then at most one `reg` value,
 * then lazy entries.
 */
export type StackEntry =
  | { kind: 'const'; value: number }
  | { kind: 'address'; literal: Literal }
  | { kind: 'array'; ref: PendingArray }
  | { kind: 'field'; name: string; data?: Uint8Array }
  | { kind: 'local'; slot: Extract<LocalSlot, { kind: 'byte' | 'word' }> }
  | { kind: 'value'; width: 1; where: 'reg' | 'stack'; range: ByteRange }
  | { kind: 'value'; width: 2; where: 'reg' | 'stack' };

/** Range of a byte-wide entry; `undefined` for words and addresses. */
export function byteRange(entry: StackEntry): ByteRange | undefined {
  switch (entry.kind) {
    case 'const':
      if (entry.value >= 0 && entry.value <= 0xff) return 'u8';
      return entry.value >= -128 && entry.value < 0 ? 's8' : undefined;
    case 'local':
      if (entry.slot.kind !== 'byte') return undefined;
      return entry.slot.signed ? 's8' : 'u8';
    case 'value':
      return entry.width === 1 ? entry.range : undefined;
    default:
      return undefined;
  }
}

/** Storage width when the entry is materialized as a plain value. */
export function entryWidth(entry: StackEntry): 1 | 2 {
  switch (entry.kind) {
    case 'const':
      return entry.value >= -128 && entry.value <= 0xff ? 1 : 2;
    case 'local':
      return entry.slot.kind === 'byte' ? 1 : 2;
    case 'value':
      return entry.width;
    default:
      return 2;
  }
}

export function describeEntry(entry: StackEntry): string {
  switch (entry.kind) {
    case 'const':
      return `constant ${entry.value}`;
    case 'address':
      return `address of ${entry.literal.label}`;
    case 'array':
      return `array[${entry.ref.length}]`;
    case 'field':
      return `field ${entry.name}`;
    case 'local':
      return `local ${entry.slot.index}`;
    case 'value':
      if (entry.width === 2) return 'word value';
      if (entry.range === 's8') return 'signed byte value';
      return entry.range === 'wrapped' ? 'byte result that may exceed 8 bits' : 'byte value';
  }
}
