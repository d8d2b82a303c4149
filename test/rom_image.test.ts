import { describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { Artifact, AsmArtifact, ListingArtifact, NesArtifact } from '../src/formats/types.js';
import type { CompilerOptions } from '../src/pipeline.js';
import { data } from '../src/program/block.js';
import { Program } from '../src/program/program.js';
import { assembleRom } from '../src/rom/assemble.js';
import { helloIl, helloMain, helloTokens, hexBytes, linkTranslation, symbolAddress, translateIl } from './helpers/il.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const helloModule = join(__dirname, 'fixtures', 'hello.module.json');

const HEADER = 16;
const PRG = 0x4000;
const CHR = 0x2000;

const TILES = [
  0x00, 0x3c, 0x66, 0x66, 0x66, 0x66, 0x3c, 0x00, 0, 0, 0, 0, 0, 0, 0, 0,
  0x18, 0x38, 0x18, 0x18, 24, 24, 126, 0, 0, 0, 0, 0, 0, 0, 0, 0,
];

function isNes(a: Artifact): a is NesArtifact {
  return a.kind === 'nes';
}

async function rom(options: CompilerOptions = {}): Promise<Uint8Array> {
  const res = await compile(helloModule, options, { formats: defaultFormatWriters });
  expect(res.diagnostics).toEqual([]);
  const nes = res.artifacts.find(isNes);
  if (nes === undefined) throw new Error('no .nes artifact');
  return nes.bytes;
}

describe('ROM image', () => {
  it('writes the iNES header for two PRG banks and one CHR bank', async () => {
    const bytes = await rom();
    expect(Array.from(bytes.subarray(0, HEADER))).toEqual([
      0x4e, 0x45, 0x53, 0x1a, 2, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0,
    ]);
    expect(bytes.length).toBe(HEADER + 2 * PRG + CHR);
  });

  it('places user code, the string literal and the vectors', async () => {
    const bytes = await rom();
    expect(Array.from(bytes.subarray(HEADER + 0x500, HEADER + 0x500 + 67))).toEqual(Array.from(hexBytes(helloMain)));
    const text = Array.from(new TextEncoder().encode('HELLO, WORLD'));
    expect(Array.from(bytes.subarray(HEADER + 0x5f1, HEADER + 0x5f1 + 13))).toEqual([...text, 0]);
    expect(Array.from(bytes.subarray(HEADER + 2 * PRG - 6, HEADER + 2 * PRG))).toEqual([
      0xbc, 0x80, 0x00, 0x80, 0x02, 0x82,
    ]);
  });

  it('zero-fills the PRG gap before the vectors', async () => {
    const bytes = await rom();
    expect(bytes.subarray(HEADER + 0x700, HEADER + 2 * PRG - 6).every((b) => b === 0)).toBe(true);
  });

  it('copies the tile data and pads CHR to a full bank', async () => {
    const bytes = await rom();
    const chr = bytes.subarray(HEADER + 2 * PRG);
    expect(Array.from(chr.subarray(0, TILES.length))).toEqual(TILES);
    expect(chr.length).toBe(CHR);
    expect(chr.subarray(TILES.length).every((b) => b === 0)).toBe(true);
  });

  it('differs by one header bit between mirroring modes', async () => {
    const horizontal = await rom({ mirroring: 'horizontal' });
    const vertical = await rom({ mirroring: 'vertical' });
    const diff = Array.from(horizontal.keys()).filter((i) => horizontal[i] !== vertical[i]);
    expect(diff).toEqual([6]);
    expect(vertical[6]).toBe(1);
  });

  it('builds a single-bank image with the vectors at its end', async () => {
    const bytes = await rom({ prgBanks: 1 });
    expect(bytes[4]).toBe(1);
    expect(bytes.length).toBe(HEADER + PRG + CHR);
    expect(Array.from(bytes.subarray(HEADER + PRG - 6, HEADER + PRG))).toEqual([
      0xbc, 0x80, 0x00, 0x80, 0x02, 0x82,
    ]);
  });

  it('is identical across runs', async () => {
    expect(await rom()).toEqual(await rom());
  });
});

describe('image layout', () => {
  it('lays out the runtime at its canonical addresses', () => {
    const { result } = translateIl(helloIl, helloTokens);
    if (result === undefined) throw new Error('translation failed');
    const symbols = linkTranslation(result).rom?.linked.symbols ?? [];
    const at = (name: string): number | undefined => symbolAddress(symbols, name);
    expect(at('start')).toBe(0x8000);
    expect(at('nmi')).toBe(0x80bc);
    expect(at('irq')).toBe(0x8202);
    expect(at('HandyRTS')).toBe(0x8210);
    expect(at('pal_col')).toBe(0x823e);
    expect(at('ppu_on_all')).toBe(0x8289);
    expect(at('vram_write')).toBe(0x834f);
    expect(at('vram_adr')).toBe(0x83d4);
    expect(at('initlib')).toBe(0x84f4);
    expect(at('main')).toBe(0x8500);
    expect(at('donelib')).toBe(0x8543);
    expect(at('pusha')).toBe(0x85a2);
    expect(at('pushax')).toBe(0x85b8);
    expect(at('zerobss')).toBe(0x85ce);
    expect(at('string_0')).toBe(0x85f1);
    expect(symbols.find((s) => s.name === '__DESTRUCTOR_TABLE__')).toEqual({
      kind: 'data',
      name: '__DESTRUCTOR_TABLE__',
      address: 0x85fe,
      size: 37,
    });
  });

  it('rejects a program that runs into the vector table', () => {
    const diagnostics: Parameters<typeof assembleRom>[2] = [];
    const program = new Program(0x8000, [data('big', new Uint8Array(PRG - 5))]);
    const out = assembleRom(program, { prgBanks: 1, mirroring: 'horizontal', chr: new Uint8Array() }, diagnostics, 'big');
    expect(out).toBeUndefined();
    expect(diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.RomLayout]);
    expect(diagnostics[0]?.message).toBe('Program ends at $BFFB, past $BFFA (1 PRG bank(s))');
  });
});

describe('text artifacts', () => {
  it('lists bytes with file offsets and the symbol table', async () => {
    const res = await compile(helloModule, {}, { formats: defaultFormatWriters });
    const lst = res.artifacts.find((a): a is ListingArtifact => a.kind === 'lst');
    const lines = lst?.text.split('\n') ?? [];
    expect(lines[0]).toBe('; nesbake listing');
    expect(lines).toContain(`; ${'main'.padEnd(24)} $8500  label`);
    expect(lines).toContain(`; ${'string_0'.padEnd(24)} $85F1  data  13 byte(s)`);
    expect(lines.find((l) => l.startsWith('8500  000510  A9 00 20 A2 85'))).toBeDefined();
  });

  it('names the runtime locations as constants ahead of the code symbols', async () => {
    const res = await compile(helloModule, {}, { formats: defaultFormatWriters });
    const lst = res.artifacts.find((a): a is ListingArtifact => a.kind === 'lst');
    const lines = lst?.text.split('\n') ?? [];
    const table = lines.indexOf('; symbols');
    expect(lines[table + 1]).toBe(`; ${'STARTUP'.padEnd(24)} = $0001`);
    expect(lines).toContain(`; ${'TEMP'.padEnd(24)} = $0017`);
    expect(lines).toContain(`; ${'PPU_ADDR'.padEnd(24)} = $2006`);
  });

  it('writes the assembly trace on request', async () => {
    const res = await compile(helloModule, { emitAsm: true, emitListing: false }, { formats: defaultFormatWriters });
    expect(res.artifacts.map((a) => a.kind)).toEqual(['nes', 'asm']);
    const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
    const lines = asm?.text.split('\n') ?? [];
    expect(lines[0]).toBe('; nesbake assembly trace');
    expect(lines).toContain('main:');
    expect(lines).toContain(`    ${'JSR pusha'.padEnd(24)}; 8502  20 A2 85`);
    expect(lines[3]).toBe('STARTUP = $0001');
    expect(lines).toContain('BSS_START = $0325');
  });
});

describe('compile failures', () => {
  it('reports a missing module file', async () => {
    const res = await compile(join(__dirname, 'fixtures', 'absent.module.json'), {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.IoReadFailed]);
  });

  it('reports malformed JSON and a missing tile file', async () => {
    const work = await mkdtemp(join(tmpdir(), 'nesbake-'));
    try {
      const broken = join(work, 'broken.module.json');
      await writeFile(broken, '{ "format": ', 'utf8');
      const a = await compile(broken, {}, { formats: defaultFormatWriters });
      expect(a.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.ModuleFormat]);

      const b = await compile(helloModule, { chrPath: join(work, 'none.chr') }, { formats: defaultFormatWriters });
      expect(b.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.IoReadFailed]);
      expect(b.artifacts).toEqual([]);
    } finally {
      await rm(work, { recursive: true, force: true });
    }
  });

  it('stops at the first translation error', async () => {
    const work = await mkdtemp(join(tmpdir(), 'nesbake-'));
    try {
      const file = join(work, 'bad.module.json');
      const doc = {
        format: 'nesbake-module',
        version: 1,
        name: 'bad',
        entry: { name: 'Program.Main', code: '28 07 00 00 0A 2A' },
        tokens: { '0A000007': { kind: 'method', name: 'rand8', owner: 'NESLib', params: 0 } },
      };
      await writeFile(file, JSON.stringify(doc), 'utf8');
      const res = await compile(file, {}, { formats: defaultFormatWriters });
      expect(res.artifacts).toEqual([]);
      expect(res.diagnostics).toEqual([
        {
          id: DiagnosticIds.NotFound,
          severity: 'error',
          message: 'rand8 has no runtime implementation at IL_0000',
          file,
          offset: 0,
        },
      ]);
    } finally {
      await rm(work, { recursive: true, force: true });
    }
  });

  it('reports progress through the log sink', async () => {
    const messages: string[] = [];
    await compile(helloModule, {}, { formats: defaultFormatWriters, log: (m) => messages.push(m) });
    expect(messages[0]).toBe('module hello: entry Program.Main, 60 byte(s), 6 token(s)');
    expect(messages[1]).toBe('decoded 20 instruction(s)');
  });
});
