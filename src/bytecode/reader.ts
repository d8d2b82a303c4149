import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { TokenTable } from '../frontend/module.js';
import type { BytecodeOperand, OperandKind, StructuredInstruction } from './instruction.js';
import { formatOffset } from './instruction.js';
import opcodeTable from './opcodes.json' with { type: 'json' };

/** First byte of a two-byte opcode. */
export const EXTENDED_PREFIX = 0xfe;

const OPERAND_KINDS: readonly OperandKind[] = [
  'none',
  'i8',
  'i32',
  'i64',
  'r4',
  'r8',
  'br8',
  'br32',
  'var8',
  'var16',
  'tok',
  'str',
  'switch',
];

function isOperandKind(value: string): value is OperandKind {
  return OPERAND_KINDS.some((k) => k === value);
}

interface OpcodeInfo {
  name: string;
  operand: OperandKind;
}

// Key: opcode byte, or 0xFE00 | second byte for extended opcodes.
const opcodes = new Map<number, OpcodeInfo>();
{
  const entries: Record<string, string[]> = opcodeTable;
  for (const [key, [name, operand]] of Object.entries(entries)) {
    if (name === undefined || operand === undefined || !isOperandKind(operand)) {
      throw new Error(`opcodes.json: bad entry "${key}"`);
    }
    opcodes.set(Number.parseInt(key, 16), { name, operand });
  }
}

class DecodeFailure extends Error {
  constructor(
    readonly id: typeof DiagnosticIds.DecodeError | typeof DiagnosticIds.UnresolvedToken,
    message: string,
    readonly offset: number,
  ) {
    super(message);
  }
}

function hex32(token: number): string {
  return `0x${token.toString(16).toUpperCase().padStart(8, '0')}`;
}

function decodeOne(
  view: DataView,
  offset: number,
  tokens: TokenTable,
): StructuredInstruction {
  const truncated = (): DecodeFailure =>
    new DecodeFailure(DiagnosticIds.DecodeError, 'Truncated instruction', offset);
  const first = view.getUint8(offset);
  let pos = offset + 1;
  let key = first;
  if (first === EXTENDED_PREFIX) {
    if (pos >= view.byteLength) throw truncated();
    key = (EXTENDED_PREFIX << 8) | view.getUint8(pos);
    pos++;
  }
  const info = opcodes.get(key);
  if (info === undefined) {
    const text = key > 0xff ? key.toString(16).toUpperCase() : key.toString(16).toUpperCase().padStart(2, '0');
    throw new DecodeFailure(DiagnosticIds.DecodeError, `Unknown opcode 0x${text}`, offset);
  }

  const need = (n: number): number => {
    if (pos + n > view.byteLength) throw truncated();
    const at = pos;
    pos += n;
    return at;
  };
  const token = (): number => view.getUint32(need(4), true);

  let operand: BytecodeOperand;
  switch (info.operand) {
    case 'none':
      operand = { kind: 'none' };
      break;
    case 'i8':
      operand = { kind: 'int', value: view.getInt8(need(1)) };
      break;
    case 'i32':
      operand = { kind: 'int', value: view.getInt32(need(4), true) };
      break;
    case 'i64':
      operand = { kind: 'long', value: view.getBigInt64(need(8), true) };
      break;
    case 'r4':
      operand = { kind: 'float', value: view.getFloat32(need(4), true) };
      break;
    case 'r8':
      operand = { kind: 'float', value: view.getFloat64(need(8), true) };
      break;
    case 'br8': {
      const delta = view.getInt8(need(1));
      operand = { kind: 'branch', target: pos + delta };
      break;
    }
    case 'br32': {
      const delta = view.getInt32(need(4), true);
      operand = { kind: 'branch', target: pos + delta };
      break;
    }
    case 'var8':
      operand = { kind: 'variable', index: view.getUint8(need(1)) };
      break;
    case 'var16':
      operand = { kind: 'variable', index: view.getUint16(need(2), true) };
      break;
    case 'tok': {
      const t = token();
      const entry = tokens.get(t);
      if (entry === undefined || entry.kind === 'string') {
        throw new DecodeFailure(DiagnosticIds.UnresolvedToken, `Unresolved token ${hex32(t)}`, offset);
      }
      operand = { kind: 'symbol', token: t, entry };
      break;
    }
    case 'str': {
      const t = token();
      const entry = tokens.get(t);
      if (entry === undefined || entry.kind !== 'string') {
        throw new DecodeFailure(DiagnosticIds.UnresolvedToken, `Unresolved string token ${hex32(t)}`, offset);
      }
      operand = { kind: 'string', value: entry.value };
      break;
    }
    case 'switch': {
      const count = view.getUint32(need(4), true);
      need(count * 4);
      const base = pos;
      const targets: number[] = [];
      for (let i = 0; i < count; i++) {
        targets.push(base + view.getInt32(base - count * 4 + i * 4, true));
      }
      operand = { kind: 'switch', targets };
      break;
    }
  }
  return { offset, size: pos - offset, opcode: info.name, operand };
}

/**
 * Decode a method body into structured instructions.
 *
 * Pure: the same bytes and token table always give the same list. On the first malformed
 * instruction a diagnostic is reported and `undefined` returned.
 */
export function decodeBody(
  code: Uint8Array,
  tokens: TokenTable,
  diagnostics: Diagnostic[],
  file: string,
): StructuredInstruction[] | undefined {
  const view = new DataView(code.buffer, code.byteOffset, code.byteLength);
  const out: StructuredInstruction[] = [];
  let offset = 0;
  try {
    while (offset < code.length) {
      const ins = decodeOne(view, offset, tokens);
      out.push(ins);
      offset += ins.size;
    }
  } catch (err) {
    if (!(err instanceof DecodeFailure)) throw err;
    diagnostics.push({
      id: err.id,
      severity: 'error',
      message: `${err.message} at ${formatOffset(err.offset)}`,
      file,
      offset: err.offset,
    });
    return undefined;
  }
  return out;
}
