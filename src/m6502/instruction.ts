import { highByte, lowByte } from '../bytes.js';
import type { AddressMode, Mnemonic } from './isa.js';
import { modeSize, opcodeFor } from './isa.js';

/**
 * Which part of a label's address an operand uses.
 *
 * `lo`/`hi` are immediate `#<label` / `#>label` forms.
 */
export type LabelPart = 'word' | 'lo' | 'hi';

export type Operand =
  | { kind: 'none' }
  | { kind: 'value'; value: number }
  | { kind: 'label'; name: string; part: LabelPart };

/**
 * A single target-machine instruction.
 *
 * For `rel` mode a `value` operand is the raw signed displacement; a `label` operand is resolved
 * to a displacement from the following instruction.
 *
 * `relax` marks a conditional branch the resolver may turn into a branch-over-jump
 * when its label is out of range.
 */
export interface Instruction {
  readonly mnemonic: Mnemonic;
  readonly mode: AddressMode;
  readonly operand: Operand;
  readonly relax?: boolean;
}

export function instructionSize(ins: Instruction): number {
  return modeSize(ins.mode);
}

/**
 * Failure reported by `encodeInstruction`; the resolver maps these onto diagnostics.
 */
export type EncodeFailure =
  | { kind: 'unresolved'; label: string }
  | { kind: 'range'; label: string; displacement: number }
  | { kind: 'invalid'; message: string };

export type LabelLookup = (name: string) => number | undefined;

function operandValue(
  ins: Instruction,
  lookup: LabelLookup,
): { value: number } | EncodeFailure | undefined {
  const op = ins.operand;
  if (op.kind === 'none') return undefined;
  if (op.kind === 'value') return { value: op.value };
  const address = lookup(op.name);
  if (address === undefined) return { kind: 'unresolved', label: op.name };
  if (op.part === 'lo') return { value: lowByte(address) };
  if (op.part === 'hi') return { value: highByte(address) };
  return { value: address };
}

/**
 * Encode one instruction placed at `address`.
 */
export function encodeInstruction(
  ins: Instruction,
  address: number,
  lookup: LabelLookup,
): Uint8Array | EncodeFailure {
  const opcode = opcodeFor(ins.mnemonic, ins.mode);
  if (opcode === undefined) {
    return { kind: 'invalid', message: `${ins.mnemonic} has no ${ins.mode} addressing mode` };
  }
  const size = modeSize(ins.mode);
  const resolved = operandValue(ins, lookup);
  if (size === 1) {
    if (resolved !== undefined) {
      return { kind: 'invalid', message: `${ins.mnemonic} ${ins.mode} takes no operand` };
    }
    return Uint8Array.of(opcode);
  }
  if (resolved === undefined) {
    return { kind: 'invalid', message: `${ins.mnemonic} ${ins.mode} requires an operand` };
  }
  if (!('value' in resolved)) return resolved;

  if (ins.mode === 'rel') {
    let displacement = resolved.value;
    if (ins.operand.kind === 'label') {
      displacement = resolved.value - (address + 2);
      if (displacement < -128 || displacement > 127) {
        return { kind: 'range', label: ins.operand.name, displacement };
      }
    } else if (displacement < -128 || displacement > 127) {
      return { kind: 'invalid', message: `branch displacement ${displacement} out of range` };
    }
    return Uint8Array.of(opcode, displacement & 0xff);
  }

  const value = resolved.value;
  if (size === 2) {
    if (value < -128 || value > 0xff) {
      return { kind: 'invalid', message: `${ins.mnemonic} operand ${value} does not fit in a byte` };
    }
    return Uint8Array.of(opcode, value & 0xff);
  }
  if (value < 0 || value > 0xffff) {
    return { kind: 'invalid', message: `${ins.mnemonic} address ${value} out of range` };
  }
  return Uint8Array.of(opcode, lowByte(value), highByte(value));
}

function hex2(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

function hex4(n: number): string {
  return (n & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}

function operandText(ins: Instruction): string {
  const op = ins.operand;
  if (op.kind === 'none') return '';
  if (op.kind === 'label') {
    if (op.part === 'lo') return `<${op.name}`;
    if (op.part === 'hi') return `>${op.name}`;
    return op.name;
  }
  if (ins.mode === 'rel') return op.value < 0 ? `*${op.value + 2}` : `*+${op.value + 2}`;
  const size = modeSize(ins.mode);
  return size === 3 ? `$${hex4(op.value)}` : `$${hex2(op.value)}`;
}

/**
 * ca65-style text for an instruction (e.g. `LDA ($04),Y`, `JSR pal_col`).
 */
export function formatInstruction(ins: Instruction): string {
  const o = operandText(ins);
  switch (ins.mode) {
    case 'imp':
      return ins.mnemonic;
    case 'acc':
      return `${ins.mnemonic} A`;
    case 'imm':
      return `${ins.mnemonic} #${o}`;
    case 'zp':
    case 'abs':
    case 'rel':
      return `${ins.mnemonic} ${o}`;
    case 'zpx':
    case 'abx':
      return `${ins.mnemonic} ${o},X`;
    case 'zpy':
    case 'aby':
      return `${ins.mnemonic} ${o},Y`;
    case 'ind':
      return `${ins.mnemonic} (${o})`;
    case 'izx':
      return `${ins.mnemonic} (${o},X)`;
    case 'izy':
      return `${ins.mnemonic} (${o}),Y`;
  }
}
