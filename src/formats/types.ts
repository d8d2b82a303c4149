/**
 * Half-open address range in the 6502 16-bit address space.
 */
export interface AddressRange {
  /** Inclusive start address. */
  start: number;
  /** Exclusive end address. */
  end: number;
}

/**
 * Address->byte map for all emitted program bytes.
 */
export interface EmittedByteMap {
  /**
   * Address -> byte (0..255), at CPU addresses ($8000 upward).
   */
  bytes: Map<number, number>;
  writtenRange?: AddressRange;
  /**
   * Optional deterministic trace of emitted instructions and data.
   *
   * This is used by the `.asm` writer to produce human-inspectable output without a disassembler.
   */
  asmTrace?: EmittedAsmTraceEntry[];
}

/**
 * Trace entry for generated assembly output.
 *
 * `offset` is absolute in the 16-bit CPU address space.
 */
export type EmittedAsmTraceEntry =
  | { kind: 'comment'; offset: number; text: string }
  | { kind: 'label'; offset: number; name: string }
  | { kind: 'instruction'; offset: number; text: string; bytes: number[] };

/**
 * A symbol entry for listings: a named runtime location, or a label or data block in PRG.
 */
export type SymbolEntry =
  | {
      kind: 'constant';
      name: string;
      value: number;
    }
  | {
      kind: 'label' | 'data';
      name: string;
      address: number;
      size?: number;
    };

export type Mirroring = 'horizontal' | 'vertical';

/**
 * Layout parameters for the iNES image.
 */
export interface RomLayout {
  /** Number of 16 KiB PRG banks (1 or 2). */
  prgBanks: 1 | 2;
  mirroring: Mirroring;
  /** Raw tile data; padded to whole 8 KiB CHR banks. */
  chr: Uint8Array;
  /** Interrupt vector targets. */
  vectors: { nmi: number; reset: number; irq: number };
}

/**
 * Options for listing writing.
 *
 * The listing format is a deterministic byte dump plus a symbol table.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Number of bytes shown per listing line.
   */
  bytesPerLine?: number;
}

/**
 * Options for `.asm` source emission.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory iNES ROM artifact.
 */
export interface NesArtifact {
  kind: 'nes';
  path?: string;
  bytes: Uint8Array;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * In-memory `.asm` artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the translator.
 */
export type Artifact = NesArtifact | ListingArtifact | AsmArtifact;

/**
 * Format writers used by the pipeline to turn emitted bytes/symbols into artifacts.
 */
export interface FormatWriters {
  writeNes(map: EmittedByteMap, layout: RomLayout): NesArtifact;
  writeListing?(
    map: EmittedByteMap,
    symbols: SymbolEntry[],
    opts?: WriteListingOptions,
  ): ListingArtifact;
  writeAsm?(map: EmittedByteMap, symbols: SymbolEntry[], opts?: WriteAsmOptions): AsmArtifact;
}
