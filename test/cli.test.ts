import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { copyFile, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { formatDiagnostic } from '../src/cli.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { exists, runCliCaptured } from './helpers/cli.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixtures = join(__dirname, 'fixtures');

describe('cli', () => {
  let work = '';
  let module = '';

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'nesbake-cli-'));
    module = join(work, 'hello.module.json');
    await copyFile(join(fixtures, 'hello.module.json'), module);
    await copyFile(join(fixtures, 'tiles.s'), join(work, 'tiles.s'));
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('writes the ROM and listing beside the module', async () => {
    const res = await runCliCaptured([module]);
    expect(res).toEqual({ code: 0, stdout: `${join(work, 'hello.nes')}\n`, stderr: '' });
    expect(await exists(join(work, 'hello.lst'))).toBe(true);
    expect(await exists(join(work, 'hello.asm'))).toBe(false);
    const rom = await readFile(join(work, 'hello.nes'));
    expect(rom.length).toBe(16 + 0x8000 + 0x2000);
  });

  it('honours output path, trace, listing and layout flags', async () => {
    const out = join(work, 'build', 'game.nes');
    const res = await runCliCaptured(['-o', out, '--asm', '--nolist', '--mirroring=vertical', '--prg-banks', '1', module]);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe(`${out}\n`);
    expect(await exists(join(work, 'build', 'game.asm'))).toBe(true);
    expect(await exists(join(work, 'build', 'game.lst'))).toBe(false);
    const rom = await readFile(out);
    expect([rom[4], rom[6]]).toEqual([1, 1]);
  });

  it('takes tile data from --chr', async () => {
    const chr = join(work, 'raw.chr');
    await writeFile(chr, Uint8Array.of(0xaa, 0x55));
    const res = await runCliCaptured(['--chr', chr, module]);
    expect(res.code).toBe(0);
    const rom = await readFile(join(work, 'hello.nes'));
    expect([rom[16 + 0x8000], rom[16 + 0x8001], rom[16 + 0x8002]]).toEqual([0xaa, 0x55, 0]);
  });

  it('reports stage progress with --verbose', async () => {
    const res = await runCliCaptured(['-v', '-n', module]);
    expect(res.code).toBe(0);
    expect(res.stderr.split('\n')[0]).toBe('nesbake: module hello: entry Program.Main, 60 byte(s), 6 token(s)');
  });

  it('exits 1 with diagnostics and writes nothing on error', async () => {
    const missing = join(work, 'missing.module.json');
    const res = await runCliCaptured([missing]);
    expect(res.code).toBe(1);
    expect(res.stdout).toBe('');
    expect(res.stderr.startsWith(`${missing}: error: [${DiagnosticIds.IoReadFailed}] Failed to read program module: `)).toBe(true);
    expect(await exists(join(work, 'missing.nes'))).toBe(false);
  });

  it('exits 2 on usage errors', async () => {
    for (const args of [[], ['--bogus', module], ['--prg-banks', '3', module], ['-o', 'x.bin', module], [module, '-n']]) {
      const res = await runCliCaptured(args);
      expect(res.code).toBe(2);
      expect(res.stderr.startsWith('nesbake: ')).toBe(true);
    }
  });

  it('prints help and version', async () => {
    const help = await runCliCaptured(['--help']);
    expect(help.code).toBe(0);
    expect(help.stdout.split('\n')[0]).toBe('nesbake [options] <program.module.json>');
    const version = await runCliCaptured(['-V']);
    expect(version).toEqual({ code: 0, stdout: '0.1.0\n', stderr: '' });
  });
});

describe('diagnostic formatting', () => {
  it('appends the bytecode offset when known', () => {
    expect(
      formatDiagnostic({
        id: DiagnosticIds.NotFound,
        severity: 'error',
        message: 'rand8 has no runtime implementation at IL_0000',
        file: 'game.module.json',
        offset: 0x12,
      }),
    ).toBe('game.module.json:IL_0012: error: [NB400] rand8 has no runtime implementation at IL_0000');
  });
});
