import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { decodeBody } from './bytecode/reader.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { loadChr } from './frontend/chr.js';
import type { ProgramModule } from './frontend/module.js';
import { parseProgramModuleText } from './frontend/module.js';
import { translateEntry } from './lowering/translate.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import { assembleRom, layoutProgram } from './rom/assemble.js';
import { PRG_BASE } from './runtime/constants.js';

/**
 * Run one stage, turning an unexpected exception into an `Internal` diagnostic.
 */
function stage<T>(
  name: string,
  file: string,
  diagnostics: Diagnostic[],
  run: () => T | undefined,
): T | undefined {
  try {
    return run();
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.Internal,
      severity: 'error',
      message: `Internal error during ${name}: ${err instanceof Error ? err.message : String(err)}`,
      file,
    });
    return undefined;
  }
}

async function readInput(
  path: string,
  what: string,
  diagnostics: Diagnostic[],
): Promise<Buffer | undefined> {
  try {
    return await readFile(path);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read ${what}: ${err instanceof Error ? err.message : String(err)}`,
      file: path,
    });
    return undefined;
  }
}

async function loadTiles(
  module: ProgramModule,
  modulePath: string,
  options: CompilerOptions,
  diagnostics: Diagnostic[],
): Promise<Uint8Array | undefined> {
  const path =
    options.chrPath !== undefined
      ? resolve(options.chrPath)
      : module.chr !== undefined
        ? resolve(dirname(modulePath), module.chr)
        : undefined;
  if (path === undefined) return new Uint8Array();
  const contents = await readInput(path, 'tile data', diagnostics);
  if (contents === undefined) return undefined;
  return loadChr(path, contents, diagnostics);
}

/**
 * Translate a program module into a ROM image.
 *
 * Every stage reports into one diagnostics list; the first stage with an error ends the run
 * and no artifacts are returned.
 */
export const compile: CompileFn = async (
  moduleFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const file = resolve(moduleFile);
  const diagnostics: Diagnostic[] = [];
  const log = deps.log ?? (() => undefined);
  const failed = (): CompileResult => ({ diagnostics, artifacts: [] });

  const text = await readInput(file, 'program module', diagnostics);
  if (text === undefined) return failed();
  const module = parseProgramModuleText(text.toString('utf8'), file, diagnostics);
  if (module === undefined) return failed();
  log(`module ${module.name}: entry ${module.entry.name}, ${module.entry.code.length} byte(s), ${module.tokens.size} token(s)`);

  const chr = await loadTiles(module, file, options, diagnostics);
  if (chr === undefined || hasErrors(diagnostics)) return failed();

  const instructions = stage('decode', file, diagnostics, () =>
    decodeBody(module.entry.code, module.tokens, diagnostics, file),
  );
  if (instructions === undefined || hasErrors(diagnostics)) return failed();
  log(`decoded ${instructions.length} instruction(s)`);

  const translation = stage('translation', file, diagnostics, () =>
    translateEntry(
      {
        entryName: module.entry.name,
        instructions,
        ...(module.entry.locals !== undefined ? { locals: module.entry.locals } : {}),
      },
      diagnostics,
      file,
    ),
  );
  if (translation === undefined || hasErrors(diagnostics)) return failed();
  log(
    `translated: ${translation.localBytes} byte(s) of locals, ${translation.strings.length} string(s), ${translation.arrays.length} array(s)`,
  );

  const rom = stage('assembly', file, diagnostics, () =>
    assembleRom(
      layoutProgram(translation),
      {
        prgBanks: options.prgBanks ?? 2,
        mirroring: options.mirroring ?? module.mirroring,
        chr,
      },
      diagnostics,
      file,
    ),
  );
  if (rom === undefined || hasErrors(diagnostics)) return failed();
  const { map, symbols, resolution } = rom.linked;
  log(`linked ${resolution.end - PRG_BASE} byte(s) of PRG, ${symbols.length} symbol(s)`);

  const artifacts: Artifact[] = [];
  const written = stage('output', file, diagnostics, () => {
    if (options.emitNes ?? true) artifacts.push(deps.formats.writeNes(map, rom.layout));
    if (options.emitListing ?? true) {
      if (deps.formats.writeListing) artifacts.push(deps.formats.writeListing(map, rom.symbols));
      else {
        diagnostics.push({
          id: DiagnosticIds.Unknown,
          severity: 'warning',
          message: 'Listing requested but no listing writer is configured; skipping .lst artifact.',
          file,
        });
      }
    }
    if (options.emitAsm ?? false) {
      if (deps.formats.writeAsm) artifacts.push(deps.formats.writeAsm(map, rom.symbols));
      else {
        diagnostics.push({
          id: DiagnosticIds.Unknown,
          severity: 'warning',
          message: 'Assembly trace requested but no writer is configured; skipping .asm artifact.',
          file,
        });
      }
    }
    return true;
  });
  if (written === undefined) return failed();

  return { diagnostics, artifacts };
};
