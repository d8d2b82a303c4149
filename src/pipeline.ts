import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters, Mirroring } from './formats/types.js';

/**
 * Options that influence translation and which artifacts are produced.
 *
 * Unset fields fall back to the program module, then to built-in defaults.
 */
export interface CompilerOptions {
  /** Overrides the module's `mirroring`. */
  mirroring?: Mirroring;
  /** Tile data file; overrides the module's `chr`. Relative paths resolve from the working directory. */
  chrPath?: string;
  /** Number of 16 KiB PRG banks (default 2). */
  prgBanks?: 1 | 2;
  /** Emit the `.nes` image (default on). */
  emitNes?: boolean;
  /** Emit the `.lst` listing (default on). */
  emitListing?: boolean;
  /** Emit the `.asm` trace (default off). */
  emitAsm?: boolean;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays in memory, and an
 * optional progress sink.
 */
export interface PipelineDeps {
  formats: FormatWriters;
  log?: (message: string) => void;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  moduleFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
