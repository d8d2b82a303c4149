import { toHexByte, toHexWord } from './hex.js';
import { getWrittenRange } from './range.js';
import type { AsmArtifact, EmittedByteMap, SymbolEntry, WriteAsmOptions } from './types.js';

/**
 * Create an `.asm` artifact from the resolver's trace, in emission order.
 *
 * Constant symbols come first as `NAME = $XXXX`. Global labels end in `:`; block-local `@`
 * labels are indented one level less than code.
 */
export function writeAsm(
  map: EmittedByteMap,
  symbols: SymbolEntry[],
  opts?: WriteAsmOptions,
): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const { start, end } = getWrittenRange(map);
  const lines = ['; nesbake assembly trace', `; range: $${toHexWord(start)}..$${toHexWord(end)}`, ''];

  const constants = symbols.flatMap((s) => (s.kind === 'constant' ? [`${s.name} = $${toHexWord(s.value)}`] : []));
  if (constants.length > 0) lines.push(...constants, '');

  const trace = map.asmTrace ?? [];
  if (trace.length === 0) lines.push('; no trace');
  for (const entry of trace) {
    switch (entry.kind) {
      case 'comment':
        lines.push('', `; ${entry.text}`);
        break;
      case 'label':
        lines.push(entry.name.startsWith('@') ? `  ${entry.name}:` : `${entry.name}:`);
        break;
      case 'instruction': {
        const bytes = entry.bytes.map(toHexByte).join(' ');
        lines.push(`    ${entry.text.padEnd(24, ' ')}; ${toHexWord(entry.offset)}  ${bytes}`);
        break;
      }
    }
  }

  const globals = symbols.filter((s) => s.kind !== 'constant').length;
  lines.push('', `; ${globals} global symbol(s)`);
  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
