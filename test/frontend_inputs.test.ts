import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { loadChr, parseChrSource } from '../src/frontend/chr.js';
import { parseProgramModule, parseProgramModuleText } from '../src/frontend/module.js';
import { chrBankCount } from '../src/formats/writeNes.js';

describe('tile data', () => {
  it('collects .byte values from the CHARS segment only', () => {
    const diagnostics: Diagnostic[] = [];
    const text = [
      '.segment "ZEROPAGE"',
      '.byte $FF',
      '.segment "CHARS"',
      '  .byte $01, %00000010 ,3 ; comment',
      '  .res 4',
      '.segment "CODE"',
      '.byte $EE',
    ].join('\n');
    expect(Array.from(parseChrSource(text, 'tiles.s', diagnostics) ?? [])).toEqual([1, 2, 3]);
    expect(diagnostics).toEqual([]);
  });

  it('rejects a bad value and a missing segment', () => {
    const diagnostics: Diagnostic[] = [];
    expect(parseChrSource('.segment "CHARS"\n.byte $100', 'a.s', diagnostics)).toBeUndefined();
    expect(parseChrSource('.byte 1', 'b.s', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.TileDataError, 'Line 2: bad .byte value "$100"'],
      [DiagnosticIds.TileDataError, 'No "CHARS" segment'],
    ]);
  });

  it('passes binary files through unchanged', () => {
    const raw = Uint8Array.of(9, 8, 7);
    expect(loadChr('tiles.chr', raw, [])).toBe(raw);
  });

  it('rounds CHR up to whole banks', () => {
    expect(chrBankCount(new Uint8Array())).toBe(1);
    expect(chrBankCount(new Uint8Array(0x2000))).toBe(1);
    expect(chrBankCount(new Uint8Array(0x2001))).toBe(2);
  });
});

describe('program module', () => {
  const doc = {
    format: 'nesbake-module',
    version: 1,
    name: 'demo',
    mirroring: 'vertical',
    entry: { name: 'Program.Main', code: '16 2A', locals: ['System.Byte'] },
    tokens: {
      '0A000001': { kind: 'method', name: 'pal_col', owner: 'NESLib', params: 2 },
      '04000002': { kind: 'field', name: 'blob', data: '0102' },
    },
  };

  it('reads the entry body and token table', () => {
    const diagnostics: Diagnostic[] = [];
    const module = parseProgramModule(doc, 'demo.json', diagnostics);
    expect(diagnostics).toEqual([]);
    expect(module?.mirroring).toBe('vertical');
    expect(module?.chr).toBeUndefined();
    expect(Array.from(module?.entry.code ?? [])).toEqual([0x16, 0x2a]);
    expect(module?.entry.locals).toEqual(['System.Byte']);
    expect(module?.tokens.get(0x0a000001)).toEqual({ kind: 'method', name: 'pal_col', owner: 'NESLib', params: 2 });
    expect(module?.tokens.get(0x04000002)).toEqual({ kind: 'field', name: 'blob', data: Uint8Array.of(1, 2) });
  });

  it('defaults to horizontal mirroring', () => {
    const module = parseProgramModule({ ...doc, mirroring: undefined }, 'demo.json', []);
    expect(module?.mirroring).toBe('horizontal');
  });

  it('reports the first structural problem', () => {
    const cases: Array<[unknown, string]> = [
      [[], 'module must be a JSON object'],
      [{ ...doc, format: 'other' }, 'format must be "nesbake-module"'],
      [{ ...doc, version: 2 }, 'unsupported version 2'],
      [{ ...doc, entry: { name: 'M', code: 'XYZ' } }, 'entry.code is not a hex byte string'],
      [{ ...doc, tokens: { '12': { kind: 'type', name: 'T' } } }, 'token key "12" must be 8 hex digits'],
      [{ ...doc, tokens: { '01000001': { kind: 'event', name: 'T' } } }, 'tokens.01000001.kind "event" is not one of method, string, field, type'],
      [{ ...doc, mirroring: 'diagonal' }, 'mirroring must be "horizontal" or "vertical"'],
    ];
    for (const [input, message] of cases) {
      const diagnostics: Diagnostic[] = [];
      expect(parseProgramModule(input, 'm.json', diagnostics)).toBeUndefined();
      expect(diagnostics).toEqual([{ id: DiagnosticIds.ModuleFormat, severity: 'error', message, file: 'm.json' }]);
    }
  });

  it('reports invalid JSON text', () => {
    const diagnostics: Diagnostic[] = [];
    expect(parseProgramModuleText('{', 'm.json', diagnostics)).toBeUndefined();
    expect(diagnostics[0]?.id).toBe(DiagnosticIds.ModuleFormat);
    expect(diagnostics[0]?.message.startsWith('Invalid JSON: ')).toBe(true);
  });
});
