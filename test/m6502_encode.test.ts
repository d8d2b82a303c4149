import { describe, expect, it } from 'vitest';

import { abs, acc, hi, imm, imp, ind, izy, lo, rel, zpx } from '../src/m6502/asm.js';
import { encodeInstruction, formatInstruction } from '../src/m6502/instruction.js';
import { opcodeFor } from '../src/m6502/isa.js';

const labels = new Map<string, number>([
  ['near', 0x8010],
  ['far', 0x8100],
  ['string_0', 0x85f1],
]);
const lookup = (name: string): number | undefined => labels.get(name);

function encode(...args: Parameters<typeof encodeInstruction>): number[] {
  const out = encodeInstruction(...args);
  if (!(out instanceof Uint8Array)) throw new Error(`encode failed: ${JSON.stringify(out)}`);
  return Array.from(out);
}

describe('6502 encoder', () => {
  it('encodes each operand size', () => {
    expect(encode(imp('RTS'), 0x8000, lookup)).toEqual([0x60]);
    expect(encode(acc('ASL'), 0x8000, lookup)).toEqual([0x0a]);
    expect(encode(imm('LDA', 0x10), 0x8000, lookup)).toEqual([0xa9, 0x10]);
    expect(encode(zpx('STA', 0x22), 0x8000, lookup)).toEqual([0x95, 0x22]);
    expect(encode(izy('LDA', 0x2a), 0x8000, lookup)).toEqual([0xb1, 0x2a]);
    expect(encode(abs('JSR', 0x823e), 0x8000, lookup)).toEqual([0x20, 0x3e, 0x82]);
    expect(encode(ind('JMP', 0x0014), 0x8000, lookup)).toEqual([0x6c, 0x14, 0x00]);
  });

  it('takes the low or high byte of a label for immediates', () => {
    expect(encode(imm('LDA', lo('string_0')), 0x8000, lookup)).toEqual([0xa9, 0xf1]);
    expect(encode(imm('LDX', hi('string_0')), 0x8000, lookup)).toEqual([0xa2, 0x85]);
  });

  it('encodes negative immediates as their low byte', () => {
    expect(encode(imm('LDA', -1), 0x8000, lookup)).toEqual([0xa9, 0xff]);
  });

  it('measures branch displacement from the next instruction', () => {
    expect(encode(rel('BNE', 'near'), 0x8000, lookup)).toEqual([0xd0, 0x0e]);
    expect(encode(rel('BPL', -5), 0x8000, lookup)).toEqual([0x10, 0xfb]);
  });

  it('reports a label branch out of range', () => {
    expect(encodeInstruction(rel('BEQ', 'far'), 0x8000, lookup)).toEqual({
      kind: 'range',
      label: 'far',
      displacement: 0xfe,
    });
  });

  it('reports unresolved labels and impossible forms', () => {
    expect(encodeInstruction(abs('JMP', 'missing'), 0x8000, lookup)).toEqual({
      kind: 'unresolved',
      label: 'missing',
    });
    expect(encodeInstruction(imm('STA', 1), 0x8000, lookup)).toEqual({
      kind: 'invalid',
      message: 'STA has no imm addressing mode',
    });
    expect(encodeInstruction(imm('LDA', 0x100), 0x8000, lookup)).toEqual({
      kind: 'invalid',
      message: 'LDA operand 256 does not fit in a byte',
    });
  });

  it('looks up opcodes by mnemonic and mode', () => {
    expect(opcodeFor('LDA', 'aby')).toBe(0xb9);
    expect(opcodeFor('JMP', 'zp')).toBeUndefined();
  });

  it('formats instructions ca65-style', () => {
    expect(formatInstruction(izy('LDA', 0x2a))).toBe('LDA ($2A),Y');
    expect(formatInstruction(abs('JSR', 'pal_col'))).toBe('JSR pal_col');
    expect(formatInstruction(imm('LDA', lo('string_0')))).toBe('LDA #<string_0');
    expect(formatInstruction(acc('LSR'))).toBe('LSR A');
    expect(formatInstruction(abs('STA', 0x2007))).toBe('STA $2007');
  });
});
