import type { FieldToken, MethodToken, TypeToken } from '../frontend/module.js';

/** Operand encodings in the opcode table. */
export type OperandKind =
  | 'none'
  | 'i8'
  | 'i32'
  | 'i64'
  | 'r4'
  | 'r8'
  | 'br8'
  | 'br32'
  | 'var8'
  | 'var16'
  | 'tok'
  | 'str'
  | 'switch';

/**
 * Decoded operand. Branch operands carry the absolute target offset, tokens their resolved entry.
 */
export type BytecodeOperand =
  | { kind: 'none' }
  | { kind: 'int'; value: number }
  | { kind: 'long'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'branch'; target: number }
  | { kind: 'variable'; index: number }
  | { kind: 'string'; value: string }
  | { kind: 'symbol'; token: number; entry: MethodToken | FieldToken | TypeToken }
  | { kind: 'switch'; targets: number[] };

export interface StructuredInstruction {
  /** Byte offset of the opcode in the body. */
  readonly offset: number;
  /** Encoded size including operand. */
  readonly size: number;
  readonly opcode: string;
  readonly operand: BytecodeOperand;
}

/** `IL_003a` style position used in labels and messages. */
export function formatOffset(offset: number): string {
  return `IL_${offset.toString(16).padStart(4, '0')}`;
}
