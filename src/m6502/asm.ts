import type { Instruction, Operand } from './instruction.js';
import type { AddressMode, BranchMnemonic, Mnemonic } from './isa.js';

/** An address operand: a literal address, or a label name. */
export type Target = number | string | { label: string; part: 'lo' | 'hi' };

function operand(target: Target): Operand {
  if (typeof target === 'number') return { kind: 'value', value: target };
  if (typeof target === 'string') return { kind: 'label', name: target, part: 'word' };
  return { kind: 'label', name: target.label, part: target.part };
}

function make(mnemonic: Mnemonic, mode: AddressMode, target?: Target): Instruction {
  return { mnemonic, mode, operand: target === undefined ? { kind: 'none' } : operand(target) };
}

/** `#<label` */
export const lo = (label: string): Target => ({ label, part: 'lo' });
/** `#>label` */
export const hi = (label: string): Target => ({ label, part: 'hi' });

export const imp = (m: Mnemonic): Instruction => make(m, 'imp');
export const acc = (m: Mnemonic): Instruction => make(m, 'acc');
export const imm = (m: Mnemonic, v: Target): Instruction => make(m, 'imm', v);
export const zp = (m: Mnemonic, a: number): Instruction => make(m, 'zp', a);
export const zpx = (m: Mnemonic, a: number): Instruction => make(m, 'zpx', a);
export const zpy = (m: Mnemonic, a: number): Instruction => make(m, 'zpy', a);
export const abs = (m: Mnemonic, a: Target): Instruction => make(m, 'abs', a);
export const abx = (m: Mnemonic, a: Target): Instruction => make(m, 'abx', a);
export const aby = (m: Mnemonic, a: Target): Instruction => make(m, 'aby', a);
export const ind = (m: Mnemonic, a: Target): Instruction => make(m, 'ind', a);
export const izx = (m: Mnemonic, a: number): Instruction => make(m, 'izx', a);
export const izy = (m: Mnemonic, a: number): Instruction => make(m, 'izy', a);

/**
 * Relative branch to a label, or by a raw signed displacement.
 */
export const rel = (m: BranchMnemonic, target: string | number): Instruction =>
  make(m, 'rel', target);

/**
 * Branch the resolver may rewrite into a branch-over-`JMP` if the label ends up out of range.
 */
export const longRel = (m: BranchMnemonic, label: string): Instruction => ({
  ...make(m, 'rel', label),
  relax: true,
});
