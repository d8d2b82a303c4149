import { PRG_BASE } from '../runtime/constants.js';
import { toHexByte, toHexWord } from './hex.js';
import { getWrittenRange, getWrittenSegments } from './range.js';
import type { EmittedByteMap, ListingArtifact, SymbolEntry, WriteListingOptions } from './types.js';
import { INES_HEADER_SIZE } from './writeNes.js';

function printable(n: number): string {
  return n >= 0x20 && n <= 0x7e ? String.fromCharCode(n) : '.';
}

function symbolAddress(s: SymbolEntry): number {
  return s.kind === 'constant' ? s.value : s.address;
}

function formatSymbol(s: SymbolEntry): string {
  const name = s.name.padEnd(24, ' ');
  if (s.kind === 'constant') return `${name} = $${toHexWord(s.value)}`;
  const size = s.size !== undefined ? `  ${s.size} byte(s)` : '';
  return `${name} $${toHexWord(s.address)}  ${s.kind}${size}`;
}

/**
 * Create a `.lst` artifact: a byte dump with CPU addresses and ROM file offsets, then the
 * symbol table in address order.
 */
export function writeListing(
  map: EmittedByteMap,
  symbols: SymbolEntry[],
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const perLine = opts?.bytesPerLine ?? 16;
  const { start, end } = getWrittenRange(map);

  const lines = [
    '; nesbake listing',
    `; range: $${toHexWord(start)}..$${toHexWord(end)} (end exclusive), ${end - start} byte(s)`,
    ';',
    '; addr  file    bytes',
  ];
  for (const segment of getWrittenSegments(map)) {
    for (let addr = segment.start; addr < segment.end; addr += perLine) {
      const count = Math.min(perLine, segment.end - addr);
      const bytes = Array.from({ length: count }, (_, i) => map.bytes.get(addr + i) ?? 0);
      const fileOffset = INES_HEADER_SIZE + addr - PRG_BASE;
      const hex = bytes.map(toHexByte).join(' ').padEnd(perLine * 3 - 1, ' ');
      lines.push(
        `${toHexWord(addr)}  ${fileOffset.toString(16).toUpperCase().padStart(6, '0')}  ${hex}  |${bytes.map(printable).join('')}|`,
      );
    }
  }

  lines.push('', '; symbols');
  const sorted = [...symbols].sort(
    (a, b) => symbolAddress(a) - symbolAddress(b) || a.name.localeCompare(b.name),
  );
  for (const s of sorted) lines.push(`; ${formatSymbol(s)}`);

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
