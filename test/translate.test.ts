import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import { formatInstruction } from '../src/m6502/instruction.js';
import {
  FILE,
  bytesAt,
  helloIl,
  helloMain,
  helloTokens,
  hexBytes,
  linkTranslation,
  method,
  symbolAddress,
  translateIl,
} from './helpers/il.js';

const MAIN = 0x8500;

function linked(hex: string, tokens: Parameters<typeof translateIl>[1], locals?: string[]) {
  const { result, diagnostics } = translateIl(hex, tokens, locals);
  expect(diagnostics).toEqual([]);
  if (result === undefined) throw new Error('translation failed');
  const { rom, diagnostics: linkDiagnostics } = linkTranslation(result);
  expect(linkDiagnostics).toEqual([]);
  if (rom === undefined) throw new Error('link failed');
  const address = (name: string): number => {
    const found = symbolAddress(rom.linked.symbols, name);
    if (found === undefined) throw new Error(`no symbol ${name}`);
    return found;
  };
  const word = (name: string): number[] => [address(name) & 0xff, address(name) >> 8];
  return { result, rom, map: rom.linked.map, address, word };
}

describe('instruction translator', () => {
  it('translates the hello body byte for byte', () => {
    const { map, result } = linked(helloIl, helloTokens);
    expect(bytesAt(map, MAIN, 67)).toEqual(Array.from(hexBytes(helloMain)));
    expect([...result.usedRoutines].sort()).toEqual(['ppu_on_all', 'pusha', 'pushax', 'pal_col', 'vram_adr', 'vram_write'].sort());
    expect(result.localBytes).toBe(0);
  });

  it('folds nametable addresses of constant coordinates', () => {
    const { result } = translateIl('1F 0A 1B 28 02 00 00 0A 28 03 00 00 0A 2A', {
      0x0a000002: method('NTADR_B', 2),
      0x0a000003: method('vram_adr', 1),
    });
    // 0x2400 | (5 << 5) | 10
    const first = result?.main.lines.slice(0, 2).map((l) => l.instruction.operand);
    expect(first).toEqual([
      { kind: 'value', value: 0x24 },
      { kind: 'value', value: 0xaa },
    ]);
  });

  it('keeps a byte local in RAM across a counted loop', () => {
    const { map, word } = linked(
      '16 0A 06 28 06 00 00 0A 06 17 58 D2 0A 06 1B 32 F1 2A',
      { 0x0a000006: method('pal_bright', 1) },
      ['System.Byte'],
    );
    expect(bytesAt(map, MAIN, 30)).toEqual([
      0xa9, 0x00, 0x8d, 0x25, 0x03,
      0xad, 0x25, 0x03, 0x20, ...word('pal_bright'),
      0xad, 0x25, 0x03, 0x18, 0x69, 0x01, 0x8d, 0x25, 0x03,
      0xad, 0x25, 0x03, 0xc9, 0x05, 0x90, 0xea,
      0x4c, 0x1b, 0x85,
    ]);
  });

  it('turns an out-of-range loop branch into a branch over a jump', () => {
    const body = '17 18 28 01 00 00 0A '.repeat(14) + '06 2D 9B 2A';
    const { map, word } = linked(body, { 0x0a000001: method('pal_col', 2) }, ['Byte']);
    const call = [0xa9, 0x01, 0x20, ...word('pusha'), 0xa9, 0x02, 0x20, 0x3e, 0x82];
    expect(bytesAt(map, MAIN, 10)).toEqual(call);
    expect(bytesAt(map, MAIN + 130, 10)).toEqual(call);
    expect(bytesAt(map, MAIN + 140, 11)).toEqual([
      0xad, 0x25, 0x03, 0xf0, 0x03, 0x4c, 0x00, 0x85, 0x4c, 0x94, 0x85,
    ]);
  });

  it('places an initialized byte array in ROM and passes its address', () => {
    const { map, result, address, word } = linked(
      '1B 8D 10 00 00 01 25 D0 20 00 00 04 28 30 00 00 0A 0A 06 28 11 00 00 0A 06 18 91 28 12 00 00 0A 2A',
      {
        0x01000010: { kind: 'type', name: 'System.Byte' },
        0x04000020: { kind: 'field', name: 'arrayInit', data: Uint8Array.of(1, 2, 3, 4, 5) },
        0x0a000030: method('InitializeArray', 2, 'System.Runtime.CompilerServices.RuntimeHelpers'),
        0x0a000011: method('pal_all', 1),
        0x0a000012: method('pal_bright', 1),
      },
      ['System.Byte[]'],
    );
    const array = word('bytes_0');
    expect(bytesAt(map, MAIN, 15)).toEqual([
      0xa9, array[0], 0xa2, array[1], 0x20, ...word('pal_all'),
      0xa9, 0x03, 0x20, ...word('pal_bright'),
      0x4c, 0x0c, 0x85,
    ]);
    expect(bytesAt(map, address('bytes_0'), 5)).toEqual([1, 2, 3, 4, 5]);
    expect(result.arrays.length).toBe(1);
  });

  it('pulls in optional routines after the support code', () => {
    const { map, result, address, word } = linked('16 28 07 00 00 0A 26 2B FE', {
      0x0a000007: method('pad_poll', 1),
    });
    expect(result.usedRoutines.has('pad_poll')).toBe(true);
    expect(address('pad_poll')).toBe(address('zerobss') + 35);
    expect(bytesAt(map, MAIN, 8)).toEqual([0xa9, 0x00, 0x20, ...word('pad_poll'), 0x4c, 0x05, 0x85]);
  });
});

describe('byte comparisons', () => {
  function listing(hex: string, locals: string[]): string[] {
    const { result, diagnostics } = translateIl(hex, {}, locals);
    expect(diagnostics).toEqual([]);
    return result?.main.lines.map((l) => formatInstruction(l.instruction)) ?? [];
  }

  it('drops a branch on a byte that can never be below -1', () => {
    expect(listing('16 0A 06 15 32 00 2A', ['System.Byte'])).toEqual(['LDA #$00', 'STA $0325', 'JMP @halt0']);
  });

  it('turns a byte at or above -1 into an unconditional jump', () => {
    expect(listing('16 0A 06 15 2F 00 2A', ['System.Byte'])).toEqual([
      'LDA #$00',
      'STA $0325',
      'JMP @IL_0006',
      'JMP @halt0',
    ]);
  });

  it('reads -1 as the largest value in an unsigned comparison', () => {
    expect(listing('16 0A 06 15 37 00 2A', ['System.Byte'])).toEqual([
      'LDA #$00',
      'STA $0325',
      'JMP @IL_0006',
      'JMP @halt0',
    ]);
  });

  it('compares a signed byte local with overflow correction', () => {
    expect(listing('15 0A 06 17 32 00 2A', ['System.SByte'])).toEqual([
      'LDA #$FF',
      'STA $0325',
      'LDA $0325',
      'SEC',
      'SBC #$01',
      'BVC @sgn0',
      'EOR #$80',
      'BMI @IL_0006',
      'JMP @halt0',
    ]);
    const { map } = linked('15 0A 06 17 32 00 2A', {}, ['System.SByte']);
    expect(bytesAt(map, MAIN, 20)).toEqual([
      0xa9, 0xff, 0x8d, 0x25, 0x03,
      0xad, 0x25, 0x03, 0x38, 0xe9, 0x01, 0x50, 0x02, 0x49, 0x80, 0x30, 0x00,
      0x4c, 0x11, 0x85,
    ]);
  });

  it('turns a signed greater-than into greater-or-equal on the next value', () => {
    expect(listing('06 1B 30 00 2A', ['System.SByte'])).toEqual([
      'LDA $0325',
      'SEC',
      'SBC #$06',
      'BVC @sgn0',
      'EOR #$80',
      'BPL @IL_0004',
      'JMP @halt0',
    ]);
  });

  it('compares a sum once it is narrowed to a byte', () => {
    expect(listing('06 20 C8 00 00 00 58 D2 20 FA 00 00 00 30 00 2A', ['System.Byte'])).toEqual([
      'LDA $0325',
      'CLC',
      'ADC #$C8',
      'CMP #$FB',
      'BCS @IL_000F',
      'JMP @halt0',
    ]);
  });

  it.each([
    ['06 20 C8 00 00 00 58 20 FA 00 00 00 30 00 2A', ['System.Byte'], 'Comparison of a byte result that may exceed 8 bits at IL_000C'],
    ['06 20 C8 00 00 00 58 0B 2A', ['System.Byte', 'System.Int32'], 'byte result that may exceed 8 bits widened to a word at IL_0007'],
    ['06 17 58 2D 00 2A', ['System.Byte'], 'Branch on a byte result that may exceed 8 bits at IL_0003'],
    ['06 17 37 00 2A', ['System.SByte'], 'Unsigned ordering of a signed byte (local 0) at IL_0002'],
    ['06 07 32 00 2A', ['System.SByte', 'System.Byte'], 'Comparison of local 0 with local 1: signedness differs at IL_0002'],
  ])('rejects %s', (hex, locals, message) => {
    const { result, diagnostics } = translateIl(hex, {}, locals);
    expect(result).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([[DiagnosticIds.UnsupportedInstruction, message]]);
  });
});

describe('translator errors', () => {
  function firstError(hex: string, tokens: Parameters<typeof translateIl>[1], locals?: string[]) {
    const { result, diagnostics } = translateIl(hex, tokens, locals);
    expect(result).toBeUndefined();
    return diagnostics[0];
  }

  it('reports a declared call with no runtime body', () => {
    expect(firstError('28 07 00 00 0A 2A', { 0x0a000007: method('rand8', 0) })).toEqual({
      id: DiagnosticIds.NotFound,
      severity: 'error',
      message: 'rand8 has no runtime implementation at IL_0000',
      file: FILE,
      offset: 0,
    });
  });

  it('reports an unknown library call', () => {
    const d = firstError('28 07 00 00 0A', { 0x0a000007: method('fly', 0) });
    expect(d?.id).toBe(DiagnosticIds.NotFound);
    expect(d?.message).toBe('Unknown library call NESLib.fly at IL_0000');
  });

  it('reports a call with the wrong argument count', () => {
    const d = firstError('17 28 01 00 00 0A', { 0x0a000001: method('pal_col', 1) });
    expect(d?.id).toBe(DiagnosticIds.CallShapeMismatch);
    expect(d?.message).toBe('pal_col takes 2 argument(s), called with 1 at IL_0001');
  });

  it('rejects calls outside the library', () => {
    const d = firstError('16 28 09 00 00 0A', { 0x0a000009: method('WriteLine', 1, 'System.Console') });
    expect(d?.id).toBe(DiagnosticIds.UnsupportedInstruction);
    expect(d?.message).toBe('Call to System.Console.WriteLine at IL_0001');
  });

  it('rejects opcodes without a translation', () => {
    const d = firstError('02 2A', {});
    expect(d?.id).toBe(DiagnosticIds.UnsupportedInstruction);
    expect(d?.message).toBe('Unsupported instruction ldarg.0 at IL_0000');
  });

  it('rejects a byte argument that does not fit', () => {
    const d = firstError('20 2C 01 00 00 16 28 01 00 00 0A', { 0x0a000001: method('pal_col', 2) });
    expect(d?.id).toBe(DiagnosticIds.ConstantOutOfRange);
    expect(d?.message).toBe('Argument 0 of pal_col: 300 does not fit in a byte at IL_0006');
  });

  it('rejects nametable helpers with runtime coordinates', () => {
    const d = firstError('06 06 28 02 00 00 0A 26 2A', { 0x0a000002: method('NTADR_A', 2) }, ['Byte']);
    expect(d?.id).toBe(DiagnosticIds.NotFound);
    expect(d?.message).toBe('NTADR_A has no runtime implementation at IL_0002');
  });

  it('rejects a branch into the middle of an instruction', () => {
    const d = firstError('2B 01 20 00 00 00 00 2A', {});
    expect(d?.id).toBe(DiagnosticIds.DecodeError);
    expect(d?.message).toBe('Branch target IL_0003 is not an instruction at IL_0000');
  });
});
