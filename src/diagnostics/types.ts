/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A translator diagnostic (error/warning/info) with an optional bytecode position.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `NB100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** Byte offset of the offending instruction in the entry procedure body, when known. */
  offset?: number;
}

/**
 * Known diagnostic IDs.
 *
 * The hundreds digit groups IDs by category; see `diagnosticCategory`.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'NB000',

  /** Failed to read an input file from disk. */
  IoReadFailed: 'NB001',

  /** Unexpected exception inside a pipeline stage. */
  Internal: 'NB002',

  /** Program module document is malformed. */
  ModuleFormat: 'NB010',

  /** Tile data could not be read or parsed. */
  TileDataError: 'NB011',

  /** Truncated body, unknown opcode or malformed operand. */
  DecodeError: 'NB100',

  /** Metadata token missing from the token table. */
  UnresolvedToken: 'NB101',

  /** Recognized opcode or idiom with no translation rule. */
  UnsupportedInstruction: 'NB200',

  /** Library call whose arity does not match any declared overload. */
  CallShapeMismatch: 'NB201',

  /** Constant that does not fit the width it is used at. */
  ConstantOutOfRange: 'NB202',

  /** Reference to a label that is never defined. */
  UnresolvedLabel: 'NB300',

  /** Label defined more than once. */
  DuplicateLabel: 'NB301',

  /** Relative branch outside -128..127 that cannot be relaxed. */
  BranchOutOfRange: 'NB302',

  /** Addressing mode or operand the 6502 cannot encode. */
  EncodeError: 'NB303',

  /** Call target with no runtime subroutine. */
  NotFound: 'NB400',

  /** Program does not fit the ROM banks. */
  RomLayout: 'NB500',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Coarse classification used by tooling to tell bad input apart from missing features.
 */
export type DiagnosticCategory = 'input' | 'unsupported' | 'link' | 'config' | 'internal';

export function diagnosticCategory(id: DiagnosticId): DiagnosticCategory {
  switch (id) {
    case DiagnosticIds.Unknown:
    case DiagnosticIds.Internal:
      return 'internal';
    case DiagnosticIds.IoReadFailed:
    case DiagnosticIds.ModuleFormat:
    case DiagnosticIds.TileDataError:
    case DiagnosticIds.DecodeError:
    case DiagnosticIds.UnresolvedToken:
      return 'input';
    case DiagnosticIds.UnsupportedInstruction:
    case DiagnosticIds.CallShapeMismatch:
    case DiagnosticIds.ConstantOutOfRange:
      return 'unsupported';
    case DiagnosticIds.UnresolvedLabel:
    case DiagnosticIds.DuplicateLabel:
    case DiagnosticIds.BranchOutOfRange:
    case DiagnosticIds.EncodeError:
      return 'link';
    case DiagnosticIds.NotFound:
    case DiagnosticIds.RomLayout:
      return 'config';
  }
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
