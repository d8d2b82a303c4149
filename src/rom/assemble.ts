import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { RomLayout, SymbolEntry } from '../formats/types.js';
import type { TranslateResult } from '../lowering/translate.js';
import { Program } from '../program/program.js';
import type { LinkedProgram } from '../program/resolve.js';
import { linkProgram } from '../program/resolve.js';
import { closure, sectionBlocks } from '../runtime/catalog.js';
import { PRG_BANK_SIZE, PRG_BASE, RUNTIME_LOCATIONS, VECTOR_TABLE_SIZE } from '../runtime/constants.js';
import { IRQ_LABEL, NMI_LABEL, RESET_LABEL } from '../runtime/startup.js';

/**
 * Lay out the image in canonical order: library runtime, user code, support runtime,
 * reachable optional routines, array literals, string literals, trailer.
 */
export function layoutProgram(translation: TranslateResult): Program {
  const ctx = { localBytes: translation.localBytes };
  const optional = closure(translation.usedRoutines);
  return new Program(PRG_BASE, [
    ...sectionBlocks('library', ctx),
    translation.main,
    ...sectionBlocks('support', ctx),
    ...sectionBlocks('optional', ctx, optional),
    ...translation.arrays,
    ...translation.strings,
    ...sectionBlocks('trailer', ctx),
  ]);
}

export interface AssembleOptions {
  prgBanks: 1 | 2;
  mirroring: RomLayout['mirroring'];
  chr: Uint8Array;
}

export interface AssembledRom {
  linked: LinkedProgram;
  layout: RomLayout;
  /** Runtime locations as constants, then the linked labels and data blocks. */
  symbols: SymbolEntry[];
}

/**
 * Link the laid-out program and check it fits below the vector table.
 */
export function assembleRom(
  program: Program,
  options: AssembleOptions,
  diagnostics: Diagnostic[],
  file: string,
): AssembledRom | undefined {
  const linked = linkProgram(program, diagnostics, file);
  if (linked === undefined) return undefined;

  const limit = PRG_BASE + options.prgBanks * PRG_BANK_SIZE - VECTOR_TABLE_SIZE;
  const end = linked.resolution.end;
  if (end > limit) {
    diagnostics.push({
      id: DiagnosticIds.RomLayout,
      severity: 'error',
      message: `Program ends at $${end.toString(16).toUpperCase()}, past $${limit.toString(16).toUpperCase()} (${options.prgBanks} PRG bank(s))`,
      file,
    });
    return undefined;
  }

  const labels = linked.resolution.labels;
  const vector = (label: string): number | undefined => labels.get(label);
  const nmi = vector(NMI_LABEL);
  const reset = vector(RESET_LABEL);
  const irq = vector(IRQ_LABEL);
  if (nmi === undefined || reset === undefined || irq === undefined) {
    diagnostics.push({
      id: DiagnosticIds.UnresolvedLabel,
      severity: 'error',
      message: 'Interrupt vector target missing from the program',
      file,
    });
    return undefined;
  }

  const constants = Object.entries(RUNTIME_LOCATIONS).map(
    ([name, value]): SymbolEntry => ({ kind: 'constant', name, value }),
  );
  return {
    linked,
    symbols: [...constants, ...linked.symbols],
    layout: {
      prgBanks: options.prgBanks,
      mirroring: options.mirroring,
      chr: options.chr,
      vectors: { nmi, reset, irq },
    },
  };
}
