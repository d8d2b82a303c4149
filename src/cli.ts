#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { formatOffset } from './bytecode/instruction.js';
import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, Mirroring } from './formats/types.js';
import type { CompilerOptions } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  moduleFile: string;
  outputPath?: string;
  chrPath?: string;
  mirroring?: Mirroring;
  prgBanks?: 1 | 2;
  emitListing: boolean;
  emitAsm: boolean;
  verbose: boolean;
};

function usage(): string {
  return [
    'nesbake [options] <program.module.json>',
    '',
    'Options:',
    '  -o, --output <file>     ROM output path (must end with .nes)',
    '      --chr <file>        Tile data (.s/.asm source or raw binary)',
    '      --mirroring <m>     Nametable mirroring: horizontal|vertical',
    '      --prg-banks <n>     16 KiB PRG banks: 1|2 (default: 2)',
    '  -n, --nolist            Suppress .lst',
    '      --asm               Also write the .asm trace',
    '  -v, --verbose           Report stage progress on stderr',
    '  -V, --version           Print version',
    '  -h, --help              Show help',
    '',
    'Notes:',
    '  - <program.module.json> must be the last argument.',
    '  - The listing and trace are written next to the ROM using its base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // Sources run from src/, the build from dist/src/.
  for (const candidate of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = require(candidate);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let chrPath: string | undefined;
  let mirroring: Mirroring | undefined;
  let prgBanks: 1 | 2 | undefined;
  let emitListing = true;
  let emitAsm = false;
  let verbose = false;
  let moduleFile: string | undefined;

  const valueOf = (a: string, flag: string, i: number): [string, number] => {
    if (a.startsWith(`${flag}=`)) {
      const v = a.slice(flag.length + 1);
      if (!v) fail(`${flag} expects a value`);
      return [v, i];
    }
    const v = argv[i + 1];
    if (!v) fail(`${a} expects a value`);
    return [v, i + 1];
  };
  const matches = (a: string, ...flags: string[]): boolean =>
    flags.some((f) => a === f || (f.startsWith('--') && a.startsWith(`${f}=`)));

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (matches(a, '-o', '--output')) {
      [outputPath, i] = valueOf(a, '--output', i);
      continue;
    }
    if (matches(a, '--chr')) {
      [chrPath, i] = valueOf(a, '--chr', i);
      continue;
    }
    if (matches(a, '--mirroring')) {
      let v: string;
      [v, i] = valueOf(a, '--mirroring', i);
      if (v !== 'horizontal' && v !== 'vertical') {
        fail(`Unsupported --mirroring "${v}" (expected horizontal|vertical)`);
      }
      mirroring = v;
      continue;
    }
    if (matches(a, '--prg-banks')) {
      let v: string;
      [v, i] = valueOf(a, '--prg-banks', i);
      if (v === '1') prgBanks = 1;
      else if (v === '2') prgBanks = 2;
      else fail(`Unsupported --prg-banks "${v}" (expected 1|2)`);
      continue;
    }
    if (a === '-n' || a === '--nolist') {
      emitListing = false;
      continue;
    }
    if (a === '--asm') {
      emitAsm = true;
      continue;
    }
    if (a === '-v' || a === '--verbose') {
      verbose = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (moduleFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <program.module.json> argument (and it must be last)`);
    }
    moduleFile = a;
  }

  if (!moduleFile) {
    fail(`Expected exactly one <program.module.json> argument (and it must be last)`);
  }
  if (outputPath && extname(outputPath).toLowerCase() !== '.nes') {
    fail(`--output must end with ".nes"`);
  }

  return {
    moduleFile,
    ...(outputPath ? { outputPath } : {}),
    ...(chrPath ? { chrPath } : {}),
    ...(mirroring ? { mirroring } : {}),
    ...(prgBanks ? { prgBanks } : {}),
    emitListing,
    emitAsm,
    verbose,
  };
}

function artifactBase(moduleFile: string, outputPath?: string): string {
  const path = resolve(outputPath ?? moduleFile);
  // `hello.module.json` gives `hello`.
  const stem = path.replace(/\.module\.json$/i, '');
  if (stem !== path) return stem;
  const ext = extname(path);
  return ext.length > 0 ? path.slice(0, -ext.length) : path;
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<void> {
  await mkdir(dirname(base), { recursive: true });
  const writes: Array<Promise<void>> = [];
  let romPath: string | undefined;
  for (const artifact of artifacts) {
    const path = `${base}.${artifact.kind}`;
    if (artifact.kind === 'nes') {
      romPath = path;
      writes.push(writeFile(path, artifact.bytes));
    } else {
      writes.push(writeFile(path, artifact.text, 'utf8'));
    }
  }
  await Promise.all(writes);
  if (romPath !== undefined) process.stdout.write(`${romPath}\n`);
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.replace(/\\/g, '/').localeCompare(b.file.replace(/\\/g, '/'));
  if (fileCmp !== 0) return fileCmp;

  const offsetCmp = (a.offset ?? Number.POSITIVE_INFINITY) - (b.offset ?? Number.POSITIVE_INFINITY);
  if (offsetCmp !== 0 && !Number.isNaN(offsetCmp)) return offsetCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc = d.offset !== undefined ? `${d.file}:${formatOffset(d.offset)}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const base = artifactBase(parsed.moduleFile, parsed.outputPath);
    const options: CompilerOptions = {
      emitNes: true,
      emitListing: parsed.emitListing,
      emitAsm: parsed.emitAsm,
      ...(parsed.chrPath !== undefined ? { chrPath: parsed.chrPath } : {}),
      ...(parsed.mirroring !== undefined ? { mirroring: parsed.mirroring } : {}),
      ...(parsed.prgBanks !== undefined ? { prgBanks: parsed.prgBanks } : {}),
    };

    const res = await compile(parsed.moduleFile, options, {
      formats: defaultFormatWriters,
      ...(parsed.verbose ? { log: (message: string) => process.stderr.write(`nesbake: ${message}\n`) } : {}),
    });

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) process.stderr.write(`${formatDiagnostic(d)}\n`);

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(base, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`nesbake: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  let real = resolved;
  try {
    real = realpathSync.native(resolved);
  } catch {
    // Missing or unreadable paths compare by their resolved spelling.
  }
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // npm's bin shim resolves to the built entry under a different spelling on some platforms.
  return (
    normalizePathForCompare(invokedAs).endsWith('/dist/src/cli.js') &&
    normalizePathForCompare(self).endsWith('/dist/src/cli.js')
  );
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
