import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { EmittedAsmTraceEntry, EmittedByteMap, SymbolEntry } from '../formats/types.js';
import { abs, rel } from '../m6502/asm.js';
import type { EncodeFailure } from '../m6502/instruction.js';
import { encodeInstruction, formatInstruction, instructionSize } from '../m6502/instruction.js';
import { INVERTED_BRANCH, isBranchMnemonic } from '../m6502/isa.js';
import type { Block, CodeLine } from './block.js';
import type { Program } from './program.js';

/**
 * Label addresses for one resolution pass over a program.
 */
export interface Resolution {
  /** Global names, plus block-local `@` names qualified as `scope@name`. */
  readonly labels: ReadonlyMap<string, number>;
  readonly blockAddresses: readonly number[];
  /** Address one past the last byte. */
  readonly end: number;
}

function scopeOf(block: Block, index: number): string {
  return block.label ?? `#${index}`;
}

/**
 * Qualify a label reference made from inside `scope`.
 */
export function qualify(name: string, scope: string): string {
  return name.startsWith('@') ? `${scope}${name}` : name;
}

/**
 * Assign an address to every block and label.
 *
 * Pure function of the block list: running it twice yields the same addresses.
 */
export function resolveLabels(
  program: Program,
  diagnostics: Diagnostic[],
  file: string,
): Resolution | undefined {
  const labels = new Map<string, number>();
  const blockAddresses: number[] = [];
  let ok = true;

  const define = (name: string, address: number): void => {
    if (labels.has(name)) {
      diagnostics.push({
        id: DiagnosticIds.DuplicateLabel,
        severity: 'error',
        message: `Duplicate label "${name}"`,
        file,
      });
      ok = false;
      return;
    }
    labels.set(name, address);
  };

  let address = program.base;
  program.blocks.forEach((block, index) => {
    blockAddresses.push(address);
    if (block.label !== undefined) define(block.label, address);
    if (block.kind === 'data') {
      address += block.bytes.length;
      return;
    }
    const scope = scopeOf(block, index);
    for (const line of block.lines) {
      for (const name of line.labels ?? []) define(qualify(name, scope), address);
      address += instructionSize(line.instruction);
    }
  });

  if (!ok) return undefined;
  return { labels, blockAddresses, end: address };
}

function relaxLine(line: CodeLine): CodeLine[] {
  const ins = line.instruction;
  if (!isBranchMnemonic(ins.mnemonic) || ins.operand.kind !== 'label') return [line];
  const skip = rel(INVERTED_BRANCH[ins.mnemonic], 3);
  return [
    line.labels !== undefined ? { instruction: skip, labels: line.labels } : { instruction: skip },
    { instruction: abs('JMP', ins.operand.name) },
  ];
}

/**
 * Rewrite every relaxable branch whose label lies outside -128..127 into the inverted short
 * branch over an absolute `JMP`. Returns the number of branches rewritten.
 */
export function relaxBranches(program: Program, resolution: Resolution): number {
  let rewritten = 0;
  program.blocks.forEach((block, index) => {
    if (block.kind !== 'code') return;
    const scope = scopeOf(block, index);
    let address = resolution.blockAddresses[index] ?? program.base;
    let changed = false;
    const lines: CodeLine[] = [];
    for (const line of block.lines) {
      const ins = line.instruction;
      const size = instructionSize(ins);
      if (ins.relax === true && ins.mode === 'rel' && ins.operand.kind === 'label') {
        const target = resolution.labels.get(qualify(ins.operand.name, scope));
        const displacement = target === undefined ? 0 : target - (address + size);
        if (displacement < -128 || displacement > 127) {
          lines.push(...relaxLine(line));
          changed = true;
          rewritten++;
          address += size;
          continue;
        }
      }
      lines.push(line);
      address += size;
    }
    if (changed) program.replace(index, { ...block, lines });
  });
  return rewritten;
}

function failureDiagnostic(
  failure: EncodeFailure,
  where: string,
  file: string,
): Diagnostic {
  switch (failure.kind) {
    case 'unresolved':
      return {
        id: DiagnosticIds.UnresolvedLabel,
        severity: 'error',
        message: `Unresolved label "${failure.label}" (${where})`,
        file,
      };
    case 'range':
      return {
        id: DiagnosticIds.BranchOutOfRange,
        severity: 'error',
        message: `Branch to "${failure.label}" out of range: displacement ${failure.displacement} (${where})`,
        file,
      };
    case 'invalid':
      return {
        id: DiagnosticIds.EncodeError,
        severity: 'error',
        message: `${failure.message} (${where})`,
        file,
      };
  }
}

/**
 * Result of linking: emitted bytes with trace and symbols, plus the final label addresses.
 */
export interface LinkedProgram {
  map: EmittedByteMap;
  symbols: SymbolEntry[];
  resolution: Resolution;
}

/**
 * Resolve, relax long branches to a fixed point, then encode every block.
 *
 * Relaxation mutates `program` (blocks are replaced, never patched in place).
 */
export function linkProgram(
  program: Program,
  diagnostics: Diagnostic[],
  file: string,
): LinkedProgram | undefined {
  let resolution = resolveLabels(program, diagnostics, file);
  while (resolution !== undefined && relaxBranches(program, resolution) > 0) {
    resolution = resolveLabels(program, diagnostics, file);
  }
  if (resolution === undefined) return undefined;
  const labels = resolution.labels;

  const bytes = new Map<number, number>();
  const asmTrace: EmittedAsmTraceEntry[] = [];
  const symbols: SymbolEntry[] = [];
  const errorsBefore = diagnostics.length;

  program.blocks.forEach((block, index) => {
    const scope = scopeOf(block, index);
    let address = resolution.blockAddresses[index] ?? program.base;
    if (block.comment !== undefined) asmTrace.push({ kind: 'comment', offset: address, text: block.comment });
    if (block.label !== undefined) {
      asmTrace.push({ kind: 'label', offset: address, name: block.label });
      symbols.push(
        block.kind === 'data'
          ? { kind: 'data', name: block.label, address, size: block.bytes.length }
          : { kind: 'label', name: block.label, address },
      );
    }

    if (block.kind === 'data') {
      const out = Uint8Array.from(block.bytes);
      for (const r of block.relocations ?? []) {
        const target = labels.get(r.label);
        if (target === undefined) {
          diagnostics.push(
            failureDiagnostic({ kind: 'unresolved', label: r.label }, `data ${scope}`, file),
          );
          continue;
        }
        if (r.part === 'hi') out[r.offset] = (target >> 8) & 0xff;
        else out[r.offset] = target & 0xff;
        if (r.part === 'word') out[r.offset + 1] = (target >> 8) & 0xff;
      }
      out.forEach((b, i) => bytes.set(address + i, b));
      for (let i = 0; i < out.length; i += 4) {
        const chunk = Array.from(out.subarray(i, i + 4));
        asmTrace.push({
          kind: 'instruction',
          offset: address + i,
          text: `.byte ${chunk.map((b) => `$${b.toString(16).toUpperCase().padStart(2, '0')}`).join(',')}`,
          bytes: chunk,
        });
      }
      return;
    }

    const lookup = (name: string): number | undefined => labels.get(qualify(name, scope));
    block.lines.forEach((line, lineIndex) => {
      for (const name of line.labels ?? []) {
        asmTrace.push({ kind: 'label', offset: address, name });
        if (!name.startsWith('@')) symbols.push({ kind: 'label', name, address });
      }
      const encoded = encodeInstruction(line.instruction, address, lookup);
      if (!(encoded instanceof Uint8Array)) {
        diagnostics.push(
          failureDiagnostic(encoded, `${scope}, instruction ${lineIndex}`, file),
        );
        address += instructionSize(line.instruction);
        return;
      }
      encoded.forEach((b, i) => bytes.set(address + i, b));
      asmTrace.push({
        kind: 'instruction',
        offset: address,
        text: formatInstruction(line.instruction),
        bytes: Array.from(encoded),
      });
      address += encoded.length;
    });
  });

  if (diagnostics.length > errorsBefore) return undefined;

  const start = program.base;
  const end = start + program.totalSize();
  return {
    map: { bytes, writtenRange: { start, end }, asmTrace },
    symbols,
    resolution,
  };
}
