import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

const TILE_SEGMENT = 'CHARS';

function parseValue(token: string): number | undefined {
  let value: number;
  if (/^\$[0-9A-Fa-f]+$/.test(token)) value = Number.parseInt(token.slice(1), 16);
  else if (/^%[01]+$/.test(token)) value = Number.parseInt(token.slice(1), 2);
  else if (/^[0-9]+$/.test(token)) value = Number.parseInt(token, 10);
  else return undefined;
  return value <= 0xff ? value : undefined;
}

/**
 * Extract tile bytes from an assembler source: every `.byte` directive inside
 * `.segment "CHARS"`. Other segments and directives are skipped.
 */
export function parseChrSource(
  text: string,
  file: string,
  diagnostics: Diagnostic[],
): Uint8Array | undefined {
  const out: number[] = [];
  let segment: string | undefined;
  let sawSegment = false;
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').replace(/;.*$/, '').trim();
    if (line === '') continue;

    const seg = /^\.segment\s+"([^"]*)"/i.exec(line);
    if (seg !== null) {
      segment = seg[1];
      if (segment === TILE_SEGMENT) sawSegment = true;
      continue;
    }
    if (segment !== TILE_SEGMENT) continue;

    const directive = /^\.byte\s+(.*)$/i.exec(line);
    if (directive === null) continue;
    for (const raw of (directive[1] ?? '').split(',')) {
      const token = raw.trim();
      const value = parseValue(token);
      if (value === undefined) {
        diagnostics.push({
          id: DiagnosticIds.TileDataError,
          severity: 'error',
          message: `Line ${i + 1}: bad .byte value "${token}"`,
          file,
        });
        return undefined;
      }
      out.push(value);
    }
  }

  if (!sawSegment) {
    diagnostics.push({
      id: DiagnosticIds.TileDataError,
      severity: 'error',
      message: `No "${TILE_SEGMENT}" segment`,
      file,
    });
    return undefined;
  }
  return Uint8Array.from(out);
}

/**
 * Tile data from a file's contents: assembler source for `.s`/`.asm`, raw bytes otherwise.
 */
export function loadChr(
  path: string,
  contents: Uint8Array,
  diagnostics: Diagnostic[],
): Uint8Array | undefined {
  if (/\.(s|asm)$/i.test(path)) {
    return parseChrSource(new TextDecoder().decode(contents), path, diagnostics);
  }
  return contents;
}
