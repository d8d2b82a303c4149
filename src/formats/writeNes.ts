import { CHR_BANK_SIZE, PRG_BANK_SIZE, PRG_BASE, VECTOR_TABLE_SIZE } from '../runtime/constants.js';
import type { EmittedByteMap, NesArtifact, RomLayout } from './types.js';

export const INES_HEADER_SIZE = 16;
const INES_MAGIC = [0x4e, 0x45, 0x53, 0x1a];
const FLAG6_VERTICAL_MIRRORING = 0x01;

/** Number of 8 KiB CHR banks needed for `chr`; an empty blob still gets one zeroed bank. */
export function chrBankCount(chr: Uint8Array): number {
  return Math.max(1, Math.ceil(chr.length / CHR_BANK_SIZE));
}

/**
 * Serialize an iNES (mapper 0) image: header, zero-filled PRG banks with the vector table in the
 * last six bytes, then CHR banks.
 *
 * Throws if a byte falls outside the PRG area below the vectors; the assembler checks fit first.
 */
export function writeNes(map: EmittedByteMap, layout: RomLayout): NesArtifact {
  const prgSize = layout.prgBanks * PRG_BANK_SIZE;
  const chrBanks = chrBankCount(layout.chr);
  const out = new Uint8Array(INES_HEADER_SIZE + prgSize + chrBanks * CHR_BANK_SIZE);

  out.set(INES_MAGIC, 0);
  out[4] = layout.prgBanks;
  out[5] = chrBanks;
  out[6] = layout.mirroring === 'vertical' ? FLAG6_VERTICAL_MIRRORING : 0;

  const vectorOffset = prgSize - VECTOR_TABLE_SIZE;
  for (const [addr, byte] of map.bytes) {
    const offset = addr - PRG_BASE;
    if (offset < 0 || offset >= vectorOffset) {
      throw new RangeError(`byte at $${addr.toString(16)} lies outside the PRG area`);
    }
    out[INES_HEADER_SIZE + offset] = byte;
  }

  const { nmi, reset, irq } = layout.vectors;
  [nmi, reset, irq].forEach((target, i) => {
    const at = INES_HEADER_SIZE + vectorOffset + i * 2;
    out[at] = target & 0xff;
    out[at + 1] = (target >> 8) & 0xff;
  });

  out.set(layout.chr, INES_HEADER_SIZE + prgSize);
  return { kind: 'nes', bytes: out };
}
