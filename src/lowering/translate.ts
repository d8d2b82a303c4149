import type { StructuredInstruction } from '../bytecode/instruction.js';
import { formatOffset } from '../bytecode/instruction.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { MethodToken } from '../frontend/module.js';
import { abs, aby, acc, hi, imm, imp, lo, longRel, rel, zp } from '../m6502/asm.js';
import type { Instruction } from '../m6502/instruction.js';
import type { BranchMnemonic, Mnemonic } from '../m6502/isa.js';
import type { CodeBlock, DataBlock, LabelMark } from '../program/block.js';
import { at, code, data } from '../program/block.js';
import type { ArgWidth } from '../runtime/capabilities.js';
import { LIBRARY_OWNER, lookupCapability } from '../runtime/capabilities.js';
import { hasSubroutine } from '../runtime/catalog.js';
import { BSS_START, TEMP } from '../runtime/constants.js';
import { MAIN_LABEL } from '../runtime/startup.js';
import type { ByteRange, Literal, LocalSlot, PendingArray, StackEntry } from './stack.js';
import { byteRange, describeEntry, entryWidth } from './stack.js';

export interface TranslateInput {
  /** Entry procedure name, used in the block comment. */
  entryName: string;
  instructions: readonly StructuredInstruction[];
  /** Local variable type names; without them slots are created on first store. */
  locals?: readonly string[];
}

/**
 * User code plus everything the layout needs to know about it.
 */
export interface TranslateResult {
  main: CodeBlock;
  /** Byte-array literals, in first-use order. */
  arrays: DataBlock[];
  /** NUL-terminated string literals, in first-use order. */
  strings: DataBlock[];
  /** Runtime entry points the code calls. */
  usedRoutines: Set<string>;
  /** RAM bytes taken by locals. */
  localBytes: number;
}

class TranslateFailure extends Error {
  constructor(
    readonly id: DiagnosticId,
    message: string,
  ) {
    super(message);
  }
}

function fail(id: DiagnosticId, message: string): never {
  throw new TranslateFailure(id, message);
}

function unsupported(message: string): never {
  return fail(DiagnosticIds.UnsupportedInstruction, message);
}

type LocalKind = 'byte' | 'sbyte' | 'word' | 'alias';

const LOCAL_TYPES: Record<string, LocalKind> = {
  Byte: 'byte',
  SByte: 'sbyte',
  Boolean: 'byte',
  Char: 'word',
  Int16: 'word',
  UInt16: 'word',
  Int32: 'word',
  UInt32: 'word',
  'Byte[]': 'alias',
  String: 'alias',
};

const BYTE_ELEMENT_TYPES = new Set(['Byte', 'SByte', 'Boolean']);

function shortTypeName(name: string): string {
  return name.replace(/^System\./, '');
}

type Condition = 'eq' | 'ne' | 'lt' | 'ge' | 'gt' | 'le';

const COMPARE_BRANCHES: Record<string, Condition> = {
  beq: 'eq',
  'bne.un': 'ne',
  blt: 'lt',
  'blt.un': 'lt',
  bge: 'ge',
  'bge.un': 'ge',
  bgt: 'gt',
  'bgt.un': 'gt',
  ble: 'le',
  'ble.un': 'le',
};

const MIRRORED: Record<Condition, Condition> = {
  eq: 'eq',
  ne: 'ne',
  lt: 'gt',
  gt: 'lt',
  le: 'ge',
  ge: 'le',
};

const BRANCH_FOR: Record<'eq' | 'ne' | 'lt' | 'ge', BranchMnemonic> = {
  eq: 'BEQ',
  ne: 'BNE',
  lt: 'BCC',
  ge: 'BCS',
};

// After SBC with N corrected for overflow.
const SIGNED_BRANCH_FOR: Record<'eq' | 'ne' | 'lt' | 'ge', BranchMnemonic> = {
  eq: 'BEQ',
  ne: 'BNE',
  lt: 'BMI',
  ge: 'BPL',
};

type BinaryOp = 'add' | 'sub' | 'mul' | 'div' | 'div.un' | 'rem' | 'rem.un' | 'and' | 'or' | 'xor' | 'shl' | 'shr' | 'shr.un';

const BINARY_OPS = new Set<string>([
  'add',
  'sub',
  'mul',
  'div',
  'div.un',
  'rem',
  'rem.un',
  'and',
  'or',
  'xor',
  'shl',
  'shr',
  'shr.un',
]);

function isBinaryOp(op: string): op is BinaryOp {
  return BINARY_OPS.has(op);
}

const BYTE_OPS: Partial<Record<BinaryOp, { setup?: Mnemonic; op: Mnemonic }>> = {
  add: { setup: 'CLC', op: 'ADC' },
  sub: { setup: 'SEC', op: 'SBC' },
  and: { op: 'AND' },
  or: { op: 'ORA' },
  xor: { op: 'EOR' },
};

const COMMUTATIVE = new Set<BinaryOp>(['add', 'mul', 'and', 'or', 'xor']);

function foldBinary(op: BinaryOp, a: number, b: number): number {
  switch (op) {
    case 'add':
      return (a + b) | 0;
    case 'sub':
      return (a - b) | 0;
    case 'mul':
      return Math.imul(a, b);
    case 'div':
    case 'rem':
    case 'div.un':
    case 'rem.un': {
      if (b === 0) return fail(DiagnosticIds.ConstantOutOfRange, 'Division by zero in constant expression');
      const unsigned = op.endsWith('.un');
      const x = unsigned ? a >>> 0 : a;
      const y = unsigned ? b >>> 0 : b;
      const result = op.startsWith('div') ? Math.trunc(x / y) : x % y;
      return result | 0;
    }
    case 'and':
      return a & b;
    case 'or':
      return a | b;
    case 'xor':
      return a ^ b;
    case 'shl':
      return a << (b & 31);
    case 'shr':
      return a >> (b & 31);
    case 'shr.un':
      return (a >>> (b & 31)) | 0;
  }
}

/** Range of a byte operation's result, from its operands' ranges. */
function resultRange(op: BinaryOp, a: ByteRange, b: ByteRange): ByteRange {
  switch (op) {
    case 'and':
      if (a === 'u8' || b === 'u8') return 'u8';
      return a === 's8' && b === 's8' ? 's8' : 'wrapped';
    case 'or':
    case 'xor':
      return a === b ? a : 'wrapped';
    default:
      return 'wrapped';
  }
}

function compareConstants(cond: Condition, a: number, b: number): boolean {
  switch (cond) {
    case 'eq':
      return a === b;
    case 'ne':
      return a !== b;
    case 'lt':
      return a < b;
    case 'ge':
      return a >= b;
    case 'gt':
      return a > b;
    case 'le':
      return a <= b;
  }
}

function ilLabel(offset: number): string {
  return `@${formatOffset(offset)}`;
}

/**
 * Translate the entry procedure into a `main` block and its literal data.
 *
 * Stops at the first instruction that cannot be translated; nothing partial is returned.
 */
export function translateEntry(
  input: TranslateInput,
  diagnostics: Diagnostic[],
  file: string,
): TranslateResult | undefined {
  const items: Array<Instruction | LabelMark> = [];
  const stack: StackEntry[] = [];
  const usedRoutines = new Set<string>();
  const arrays: DataBlock[] = [];
  const strings: DataBlock[] = [];
  const stringLiterals = new Map<string, Literal>();
  let haltCount = 0;
  let signedCount = 0;

  const emit = (...ins: Instruction[]): void => {
    items.push(...ins);
  };
  const jsr = (name: string): void => {
    usedRoutines.add(name);
    emit(abs('JSR', name));
  };

  // Locals.
  const slots: LocalSlot[] = [];
  let nextLocal = BSS_START;
  const allocate = (width: 1 | 2): number => {
    const address = nextLocal;
    nextLocal += width;
    return address;
  };
  const makeSlot = (index: number, kind: LocalKind): LocalSlot => {
    if (kind === 'alias') return { kind, index };
    if (kind === 'word') return { kind, index, address: allocate(2) };
    return { kind: 'byte', index, address: allocate(1), signed: kind === 'sbyte' };
  };
  if (input.locals !== undefined) {
    input.locals.forEach((typeName, index) => {
      const kind = LOCAL_TYPES[shortTypeName(typeName)];
      slots.push(kind === undefined ? { kind: 'unsupported', index, typeName } : makeSlot(index, kind));
    });
  }
  const slotFor = (index: number, stored?: StackEntry): LocalSlot => {
    const existing = slots[index];
    if (existing !== undefined) return existing;
    if (input.locals !== undefined) {
      return fail(DiagnosticIds.DecodeError, `Local ${index} is not declared`);
    }
    let kind: LocalKind = 'byte';
    if (stored !== undefined) {
      if (stored.kind === 'address' || stored.kind === 'array') kind = 'alias';
      else if (entryWidth(stored) === 2) kind = 'word';
      else if (byteRange(stored) === 's8') kind = 'sbyte';
    }
    const slot = makeSlot(index, kind);
    slots[index] = slot;
    return slot;
  };

  // Literals.
  const stringLiteral = (value: string): Literal => {
    const existing = stringLiterals.get(value);
    if (existing !== undefined) return existing;
    const text = new TextEncoder().encode(value);
    const bytes = new Uint8Array(text.length + 1);
    bytes.set(text);
    const literal: Literal = { label: `string_${strings.length}`, length: text.length, bytes: text };
    strings.push(data(literal.label, bytes));
    stringLiterals.set(value, literal);
    return literal;
  };
  const bindArray = (ref: PendingArray): Literal => {
    if (ref.literal !== undefined) return ref.literal;
    const literal: Literal = { label: `bytes_${arrays.length}`, length: ref.length, bytes: ref.bytes };
    arrays.push(data(literal.label, ref.bytes));
    ref.literal = literal;
    return literal;
  };
  const literalOf = (entry: StackEntry): Literal | undefined => {
    if (entry.kind === 'address') return entry.literal;
    if (entry.kind === 'array') return bindArray(entry.ref);
    return undefined;
  };

  // Stack access.
  const take = (n: number): StackEntry[] => {
    if (stack.length < n) return fail(DiagnosticIds.DecodeError, 'Evaluation stack underflow');
    return stack.splice(stack.length - n, n);
  };
  const takeOne = (): StackEntry => {
    const entry = stack.pop();
    return entry ?? fail(DiagnosticIds.DecodeError, 'Evaluation stack underflow');
  };
  const peek = (depth = 0): StackEntry | undefined => stack[stack.length - 1 - depth];
  const requireEmpty = (what: string): void => {
    if (stack.length > 0) {
      unsupported(`${what} with ${stack.length} value(s) left on the evaluation stack`);
    }
  };

  // Materialization.
  const requireWidenable = (entry: StackEntry): void => {
    const range = byteRange(entry);
    if (entry.kind !== 'const' && range !== undefined && range !== 'u8') {
      unsupported(`${describeEntry(entry)} widened to a word`);
    }
  };
  const loadA = (entry: StackEntry): void => {
    switch (entry.kind) {
      case 'const':
        emit(imm('LDA', entry.value & 0xff));
        return;
      case 'local':
        emit(abs('LDA', entry.slot.address));
        return;
      case 'value':
        if (entry.where === 'stack') jsr(entry.width === 1 ? 'popa' : 'popax');
        return;
      default:
        unsupported(`${describeEntry(entry)} used as a byte`);
    }
  };
  const loadAX = (entry: StackEntry): void => {
    requireWidenable(entry);
    switch (entry.kind) {
      case 'const': {
        const value = entry.value & 0xffff;
        emit(imm('LDX', value >> 8), imm('LDA', value & 0xff));
        return;
      }
      case 'address':
      case 'array': {
        const literal = literalOf(entry);
        if (literal === undefined) return;
        emit(imm('LDA', lo(literal.label)), imm('LDX', hi(literal.label)));
        return;
      }
      case 'local':
        emit(abs('LDA', entry.slot.address));
        emit(entry.slot.kind === 'byte' ? imm('LDX', 0x00) : abs('LDX', entry.slot.address + 1));
        return;
      case 'value':
        if (entry.where === 'stack') jsr(entry.width === 1 ? 'popa' : 'popax');
        if (entry.width === 1) emit(imm('LDX', 0x00));
        return;
      case 'field':
        unsupported(`${describeEntry(entry)} used as a value`);
    }
  };
  const pushArg = (entry: StackEntry, width: ArgWidth): void => {
    if (entry.kind === 'value' && entry.where === 'stack') {
      if ((width === 'byte') !== (entry.width === 1)) {
        unsupported(`${describeEntry(entry)} already on the software stack has the wrong width`);
      }
      return;
    }
    if (width === 'byte') {
      loadA(entry);
      jsr('pusha');
      return;
    }
    requireWidenable(entry);
    if (entry.kind === 'value' && entry.width === 1) {
      jsr('pusha0');
      return;
    }
    if (entry.kind === 'local' && entry.slot.kind === 'byte') {
      emit(abs('LDA', entry.slot.address));
      jsr('pusha0');
      return;
    }
    loadAX(entry);
    jsr('pushax');
  };
  const passLast = (entry: StackEntry, width: ArgWidth): void => {
    if (width === 'byte') loadA(entry);
    else loadAX(entry);
  };

  /**
   * Before emitting code for the top `keep` entries, move what that code could clobber
   * (the A/X value, local reads) below them onto the software stack, together with
   * everything under it so the software stack keeps evaluation order.
   */
  const settle = (keep: number): void => {
    const end = stack.length - keep;
    let last = -1;
    for (let i = 0; i < end; i++) {
      const entry = stack[i];
      if (entry?.kind === 'local' || (entry?.kind === 'value' && entry.where === 'reg')) last = i;
    }
    for (let i = 0; i <= last; i++) {
      const entry = stack[i];
      if (entry === undefined || (entry.kind === 'value' && entry.where === 'stack')) continue;
      if (entry.kind === 'field') unsupported(`${describeEntry(entry)} cannot be kept across code`);
      if (entry.kind === 'value') {
        jsr(entry.width === 1 ? 'pusha' : 'pushax');
        stack[i] =
          entry.width === 1
            ? { kind: 'value', width: 1, where: 'stack', range: entry.range }
            : { kind: 'value', width: 2, where: 'stack' };
        continue;
      }
      const range = byteRange(entry);
      pushArg(entry, range === undefined ? 'word' : 'byte');
      stack[i] =
        range === undefined
          ? { kind: 'value', width: 2, where: 'stack' }
          : { kind: 'value', width: 1, where: 'stack', range };
    }
  };
  const discard = (entry: StackEntry): void => {
    if (entry.kind === 'value' && entry.where === 'stack') jsr(entry.width === 1 ? 'popa' : 'incsp2');
  };

  const byteOperand = (entry: StackEntry): boolean =>
    (entry.kind === 'const' && entry.value >= -128 && entry.value <= 0xff) ||
    (entry.kind === 'local' && entry.slot.kind === 'byte');
  const operandWith = (mnemonic: Mnemonic, entry: StackEntry): Instruction => {
    if (entry.kind === 'const') return imm(mnemonic, entry.value & 0xff);
    if (entry.kind === 'local') return abs(mnemonic, entry.slot.address);
    return unsupported(`${describeEntry(entry)} as a ${mnemonic} operand`);
  };
  const requireByte = (entry: StackEntry, what: string): void => {
    if (entryWidth(entry) !== 1) unsupported(`${what} on a ${describeEntry(entry)} (only byte arithmetic is translated)`);
  };

  // Calls.
  const checkArg = (entry: StackEntry, width: ArgWidth, name: string, index: number): void => {
    if (entry.kind === 'field') {
      fail(DiagnosticIds.CallShapeMismatch, `Argument ${index} of ${name}: ${describeEntry(entry)} is not a value`);
    }
    if (width === 'byte') {
      if (entry.kind === 'const' && (entry.value < -128 || entry.value > 0xff)) {
        fail(DiagnosticIds.ConstantOutOfRange, `Argument ${index} of ${name}: ${entry.value} does not fit in a byte`);
      }
      if (entry.kind === 'address' || entry.kind === 'array') {
        fail(DiagnosticIds.CallShapeMismatch, `Argument ${index} of ${name} expects a byte, got ${describeEntry(entry)}`);
      }
      return;
    }
    if (entry.kind === 'const' && (entry.value < -32768 || entry.value > 0xffff)) {
      fail(DiagnosticIds.ConstantOutOfRange, `Argument ${index} of ${name}: ${entry.value} does not fit in a word`);
    }
  };

  const callLibrary = (method: MethodToken): void => {
    const found = lookupCapability(method.name, method.params);
    if (found.kind === 'unknown') {
      return fail(DiagnosticIds.NotFound, `Unknown library call ${method.owner}.${method.name}`);
    }
    if (found.kind === 'arity') {
      return fail(
        DiagnosticIds.CallShapeMismatch,
        `${method.name} takes ${found.expected.join(' or ')} argument(s), called with ${method.params}`,
      );
    }
    const capability = found.capability;
    const arity = capability.params.length;
    if (stack.length < arity) fail(DiagnosticIds.DecodeError, `Evaluation stack underflow calling ${method.name}`);

    if (capability.fold !== undefined) {
      const [x, y] = stack.slice(stack.length - 2);
      if (x?.kind === 'const' && y?.kind === 'const') {
        take(2);
        stack.push({ kind: 'const', value: capability.fold.base | ((y.value & 0xff) << 5) | (x.value & 0xff) });
        return;
      }
    }
    if (!hasSubroutine(method.name)) {
      fail(DiagnosticIds.NotFound, `${method.name} has no runtime implementation`);
    }

    const params: ArgWidth[] = [...capability.params];
    if (capability.implicitLength) {
      const pointer = peek();
      const literal = pointer === undefined ? undefined : literalOf(pointer);
      if (literal === undefined) {
        fail(DiagnosticIds.CallShapeMismatch, `${method.name} needs a literal whose length is known`);
      } else {
        stack.push({ kind: 'const', value: literal.length });
        params.push('word');
      }
    }

    settle(params.length);
    const args = take(params.length);
    args.forEach((arg, i) => checkArg(arg, params[i] ?? 'byte', method.name, i));
    // A call result behind constant arguments is parked in TEMP while those are pushed.
    const regIndex = args.findIndex((a) => a.kind === 'value' && a.where === 'reg');
    const reg = args[regIndex];
    const park =
      reg?.kind === 'value' &&
      args.slice(0, regIndex).some((a) => a.kind !== 'value' || a.where !== 'stack');
    if (park) {
      emit(zp('STA', TEMP));
      if (reg.width === 2) emit(zp('STX', TEMP + 1));
    }
    args.forEach((arg, i) => {
      const width = params[i] ?? 'byte';
      if (park && i === regIndex && arg.kind === 'value') {
        emit(zp('LDA', TEMP));
        if (arg.width === 2) emit(zp('LDX', TEMP + 1));
      }
      if (i < args.length - 1) pushArg(arg, width);
      else passLast(arg, width);
    });
    jsr(method.name);
    if (capability.returns !== 'void') {
      stack.push(
        capability.returns === 'byte'
          ? { kind: 'value', width: 1, where: 'reg', range: 'u8' }
          : { kind: 'value', width: 2, where: 'reg' },
      );
    }
  };

  const initializeArray = (): void => {
    const [array, field] = take(2);
    if (array?.kind !== 'array' || field?.kind !== 'field') {
      return unsupported('InitializeArray expects an array and a field token');
    }
    if (array.ref.literal !== undefined) unsupported('InitializeArray on an array already in use');
    if (field.data === undefined) unsupported(`Field ${field.name} has no initial data`);
    const source = field.data ?? new Uint8Array();
    if (source.length < array.ref.length) {
      unsupported(`Field ${field.name} holds ${source.length} byte(s), array needs ${array.ref.length}`);
    }
    array.ref.bytes.set(source.subarray(0, array.ref.length));
  };

  const call = (ins: StructuredInstruction): void => {
    if (ins.operand.kind !== 'symbol' || ins.operand.entry.kind !== 'method') {
      return fail(DiagnosticIds.DecodeError, `${ins.opcode} without a method token`);
    }
    const method = ins.operand.entry;
    if (method.name === 'InitializeArray' && method.owner.endsWith('RuntimeHelpers')) {
      initializeArray();
      return;
    }
    if (method.owner !== LIBRARY_OWNER) {
      unsupported(`Call to ${method.owner}.${method.name}`);
    }
    callLibrary(method);
  };

  // Locals.
  const loadLocal = (index: number): void => {
    const slot = slotFor(index);
    switch (slot.kind) {
      case 'byte':
      case 'word':
        stack.push({ kind: 'local', slot });
        return;
      case 'alias':
        if (slot.literal === undefined) unsupported(`Local ${index} read before it is assigned`);
        else stack.push({ kind: 'address', literal: slot.literal });
        return;
      case 'unsupported':
        unsupported(`Local ${index} of type ${slot.typeName}`);
    }
  };
  const storeLocal = (index: number): void => {
    const top = peek();
    if (top === undefined) return fail(DiagnosticIds.DecodeError, 'Evaluation stack underflow');
    const slot = slotFor(index, top);
    switch (slot.kind) {
      case 'unsupported':
        return unsupported(`Local ${index} of type ${slot.typeName}`);
      case 'alias': {
        const literal = literalOf(top);
        if (literal === undefined) return unsupported(`${describeEntry(top)} stored into array local ${index}`);
        if (slot.literal !== undefined && slot.literal.label !== literal.label) {
          unsupported(`Array local ${index} reassigned`);
        }
        slot.literal = literal;
        take(1);
        return;
      }
      case 'byte': {
        settle(1);
        const value = takeOne();
        if (value.kind === 'const' && (value.value < -128 || value.value > 0xff)) {
          fail(DiagnosticIds.ConstantOutOfRange, `${value.value} does not fit in byte local ${index}`);
        }
        loadA(value);
        emit(abs('STA', slot.address));
        return;
      }
      case 'word': {
        settle(1);
        loadAX(takeOne());
        emit(abs('STA', slot.address), abs('STX', slot.address + 1));
        return;
      }
    }
  };

  // Arithmetic.
  const binary = (op: BinaryOp): void => {
    let [l, r] = stack.slice(stack.length - 2);
    if (l === undefined || r === undefined) return fail(DiagnosticIds.DecodeError, 'Evaluation stack underflow');
    if (l.kind === 'const' && r.kind === 'const') {
      take(2);
      stack.push({ kind: 'const', value: foldBinary(op, l.value, r.value) });
      return;
    }
    if (!byteOperand(r) && byteOperand(l) && COMMUTATIVE.has(op)) [l, r] = [r, l];
    requireByte(l, op);

    if (op === 'shl' || op === 'shr' || op === 'shr.un' || op === 'mul') {
      let shifts = r.kind === 'const' ? r.value : -1;
      if (op === 'mul') shifts = r.kind === 'const' && r.value > 0 ? Math.log2(r.value) : -1;
      if (!Number.isInteger(shifts) || shifts < 0 || shifts > 7) {
        return unsupported(`${op} by ${describeEntry(r)}`);
      }
      const operand = byteRange(l) ?? 'wrapped';
      const toLeft = op === 'shl' || op === 'mul';
      if (!toLeft && operand !== 'u8') return unsupported(`${op} of a ${describeEntry(l)}`);
      settle(2);
      take(2);
      loadA(l);
      for (let i = 0; i < shifts; i++) emit(acc(toLeft ? 'ASL' : 'LSR'));
      stack.push({ kind: 'value', width: 1, where: 'reg', range: toLeft && shifts > 0 ? 'wrapped' : operand });
      return;
    }

    const form = BYTE_OPS[op];
    if (form === undefined) return unsupported(`${op} on ${describeEntry(l)}`);
    if (!byteOperand(r)) return unsupported(`${op} with ${describeEntry(r)} as right operand`);
    const range = resultRange(op, byteRange(l) ?? 'wrapped', byteRange(r) ?? 'wrapped');
    settle(2);
    take(2);
    loadA(l);
    if (form.setup !== undefined) emit(imp(form.setup));
    emit(operandWith(form.op, r));
    stack.push({ kind: 'value', width: 1, where: 'reg', range });
  };

  const unary = (op: 'not' | 'neg'): void => {
    const top = peek();
    if (top === undefined) return fail(DiagnosticIds.DecodeError, 'Evaluation stack underflow');
    if (top.kind === 'const') {
      take(1);
      stack.push({ kind: 'const', value: op === 'not' ? ~top.value : -top.value | 0 });
      return;
    }
    requireByte(top, op);
    // The complement of a sign-extended byte is still one.
    const range: ByteRange = op === 'not' && byteRange(top) === 's8' ? 's8' : 'wrapped';
    settle(1);
    loadA(takeOne());
    emit(imm('EOR', 0xff));
    if (op === 'neg') emit(imp('CLC'), imm('ADC', 0x01));
    stack.push({ kind: 'value', width: 1, where: 'reg', range });
  };

  const convert = (target: string): void => {
    const top = takeOne();
    if (target === 'r4' || target === 'r8' || target === 'r.un') {
      return unsupported(`Conversion to floating point`);
    }
    if (top.kind === 'const') {
      let value = top.value;
      if (target === 'u1') value &= 0xff;
      else if (target === 'i1') value = ((value & 0xff) ^ 0x80) - 0x80;
      else if (target === 'u2') value &= 0xffff;
      else if (target === 'i2') value = ((value & 0xffff) ^ 0x8000) - 0x8000;
      stack.push({ kind: 'const', value });
      return;
    }
    if (target !== 'u1' && target !== 'i1') {
      stack.push(top);
      return;
    }
    const range: ByteRange = target === 'u1' ? 'u8' : 's8';
    if (top.kind === 'value') {
      if (top.where === 'stack' && top.width === 2) unsupported('Narrowing a word on the software stack');
      stack.push({ kind: 'value', width: 1, where: top.where, range });
      return;
    }
    if (top.kind === 'local') {
      // Little-endian: the low byte lives at the slot address.
      const { index, address } = top.slot;
      stack.push({ kind: 'local', slot: { kind: 'byte', index, address, signed: range === 's8' } });
      return;
    }
    stack.push(top);
  };

  // Arrays.
  const loadElement = (signed: boolean): void => {
    const [array, index] = stack.slice(stack.length - 2);
    if (array === undefined || index === undefined) return fail(DiagnosticIds.DecodeError, 'Evaluation stack underflow');
    const literal = literalOf(array);
    if (literal === undefined) return unsupported(`Element load from ${describeEntry(array)}`);
    if (index.kind === 'const' && literal.bytes !== undefined) {
      const value = literal.bytes[index.value];
      if (value === undefined) {
        return fail(DiagnosticIds.ConstantOutOfRange, `Index ${index.value} outside ${literal.label}[${literal.length}]`);
      }
      take(2);
      stack.push({ kind: 'const', value: signed ? (value ^ 0x80) - 0x80 : value });
      return;
    }
    settle(2);
    take(2);
    switch (index.kind) {
      case 'const':
        emit(imm('LDY', index.value & 0xff));
        break;
      case 'local':
        emit(abs('LDY', index.slot.address));
        break;
      case 'value':
        loadA(index);
        emit(imp('TAY'));
        break;
      default:
        unsupported(`${describeEntry(index)} as an array index`);
    }
    emit(aby('LDA', literal.label));
    stack.push({ kind: 'value', width: 1, where: 'reg', range: signed ? 's8' : 'u8' });
  };

  const storeElement = (): void => {
    const [array, index, value] = take(3);
    if (array?.kind !== 'array' || array.ref.literal !== undefined) {
      return unsupported('Element store outside an array initializer');
    }
    if (index?.kind !== 'const' || value?.kind !== 'const') {
      return unsupported('Element store with a non-constant index or value');
    }
    if (index.value < 0 || index.value >= array.ref.length) {
      return fail(DiagnosticIds.ConstantOutOfRange, `Index ${index.value} outside array[${array.ref.length}]`);
    }
    array.ref.bytes[index.value] = value.value & 0xff;
  };

  // Branches.
  const conditional = (sense: boolean, target: string): void => {
    const cond = takeOne();
    requireEmpty('Conditional branch');
    if (byteRange(cond) === 'wrapped') unsupported(`Branch on a ${describeEntry(cond)}`);
    switch (cond.kind) {
      case 'const':
        if ((cond.value !== 0) === sense) emit(abs('JMP', target));
        return;
      case 'address':
      case 'array':
      case 'field':
        if (sense) emit(abs('JMP', target));
        return;
      case 'local':
        emit(abs('LDA', cond.slot.address));
        if (cond.slot.kind === 'word') emit(abs('ORA', cond.slot.address + 1));
        break;
      case 'value':
        loadA(cond);
        if (cond.width === 1) emit(imm('CMP', 0x00));
        else emit(zp('STX', TEMP), zp('ORA', TEMP));
        break;
    }
    emit(longRel(sense ? 'BNE' : 'BEQ', target));
  };

  // SEC; SBC operand; then N holds the signed less-than once corrected for overflow.
  const signedCompare = (subtract: Instruction): void => {
    const label = `@sgn${signedCount++}`;
    emit(imp('SEC'), subtract, rel('BVC', label), imm('EOR', 0x80));
    items.push(at(label));
  };

  const compareBranch = (condition: Condition, unsigned: boolean, target: string): void => {
    let [l, r] = take(2);
    if (l === undefined || r === undefined) return;
    requireEmpty('Compare branch');
    let cond = condition;
    if (l.kind === 'const' && r.kind === 'const') {
      const a = unsigned ? l.value >>> 0 : l.value;
      const b = unsigned ? r.value >>> 0 : r.value;
      if (compareConstants(cond, a, b)) emit(abs('JMP', target));
      return;
    }
    if (l.kind === 'const' || (!byteOperand(r) && byteOperand(l))) {
      [l, r] = [r, l];
      cond = MIRRORED[cond];
    }
    requireByte(l, 'Comparison');
    const range = byteRange(l);
    if (range === undefined || range === 'wrapped') return unsupported(`Comparison of a ${describeEntry(l)}`);
    const signed = range === 's8';
    // Equality does not depend on how the operands are read.
    const ordered = cond !== 'eq' && cond !== 'ne';
    if (signed && unsigned && ordered) return unsupported(`Unsigned ordering of a signed byte (${describeEntry(l)})`);

    if (r.kind === 'const') {
      const min = signed ? -128 : 0;
      const max = signed ? 127 : 0xff;
      let c = unsigned && ordered ? r.value >>> 0 : r.value;
      if (c < min || c > max) {
        // Every byte in range gives the same answer.
        discard(l);
        if (compareConstants(cond, 0, c)) emit(abs('JMP', target));
        return;
      }
      if (cond === 'gt' || cond === 'le') {
        if (c === max) {
          discard(l);
          if (cond === 'le') emit(abs('JMP', target));
          return;
        }
        c += 1;
        cond = cond === 'gt' ? 'ge' : 'lt';
      }
      loadA(l);
      if (signed && ordered) signedCompare(imm('SBC', c & 0xff));
      else emit(imm('CMP', c & 0xff));
    } else {
      if (r.kind !== 'local' || r.slot.kind !== 'byte') return unsupported(`Comparison against ${describeEntry(r)}`);
      if (r.slot.signed !== signed) {
        return unsupported(`Comparison of ${describeEntry(l)} with local ${r.slot.index}: signedness differs`);
      }
      if (cond === 'gt' || cond === 'le') return unsupported(`${condition} comparison against a local`);
      loadA(l);
      if (signed && ordered) signedCompare(abs('SBC', r.slot.address));
      else emit(operandWith('CMP', r));
    }
    emit(longRel((signed ? SIGNED_BRANCH_FOR : BRANCH_FOR)[cond], target));
  };

  const halt = (): void => {
    const label = `@halt${haltCount++}`;
    items.push(at(label));
    emit(abs('JMP', label));
  };

  // Branch targets get labels; each must start an instruction.
  const instructions = input.instructions;
  const last = instructions[instructions.length - 1];
  const end = last === undefined ? 0 : last.offset + last.size;
  const starts = new Set(instructions.map((ins) => ins.offset));
  const targets = new Set<number>();
  let current: StructuredInstruction | undefined;

  try {
    for (const ins of instructions) {
      current = ins;
      const operand = ins.operand;
      if (operand.kind === 'branch') {
        if (!starts.has(operand.target) && operand.target !== end) {
          fail(DiagnosticIds.DecodeError, `Branch target ${formatOffset(operand.target)} is not an instruction`);
        }
        targets.add(operand.target);
      }
    }

    let terminated = false;
    for (const ins of instructions) {
      current = ins;
      if (targets.has(ins.offset)) {
        requireEmpty(`Branch target ${formatOffset(ins.offset)}`);
        items.push(at(ilLabel(ins.offset)));
      }
      terminated = false;
      const op = ins.opcode.replace(/\.s$/, '');
      const operand = ins.operand;

      const shortLocal = /^(ld|st)loc\.([0-3])$/.exec(op);
      if (shortLocal !== null) {
        const index = Number(shortLocal[2]);
        if (shortLocal[1] === 'ld') loadLocal(index);
        else storeLocal(index);
        continue;
      }
      const shortConst = /^ldc\.i4\.(m1|[0-8])$/.exec(op);
      if (shortConst !== null) {
        stack.push({ kind: 'const', value: shortConst[1] === 'm1' ? -1 : Number(shortConst[1]) });
        continue;
      }
      const conv = /^conv\.(?:ovf\.)?(i1|i2|i4|i8|u1|u2|u4|u8|i|u|r4|r8|r\.un)(?:\.un)?$/.exec(op);
      if (conv !== null) {
        convert(conv[1] ?? '');
        continue;
      }
      if (isBinaryOp(op)) {
        binary(op);
        continue;
      }
      const compare = COMPARE_BRANCHES[op];
      if (compare !== undefined) {
        if (operand.kind !== 'branch') fail(DiagnosticIds.DecodeError, `${ins.opcode} without a branch target`);
        compareBranch(compare, op.endsWith('.un'), ilLabel(operand.target));
        continue;
      }

      switch (op) {
        case 'nop':
          break;
        case 'ldc.i4':
          if (operand.kind === 'int') stack.push({ kind: 'const', value: operand.value });
          break;
        case 'ldc.i8':
          if (operand.kind === 'long') {
            if (operand.value < -0x80000000n || operand.value > 0xffffffffn) {
              fail(DiagnosticIds.ConstantOutOfRange, `Constant ${operand.value} is wider than 32 bits`);
            }
            stack.push({ kind: 'const', value: Number(operand.value) });
          }
          break;
        case 'ldnull':
          stack.push({ kind: 'const', value: 0 });
          break;
        case 'ldstr':
          if (operand.kind === 'string') stack.push({ kind: 'address', literal: stringLiteral(operand.value) });
          break;
        case 'ldloc':
          if (operand.kind === 'variable') loadLocal(operand.index);
          break;
        case 'stloc':
          if (operand.kind === 'variable') storeLocal(operand.index);
          break;
        case 'dup': {
          const top = peek();
          if (top === undefined) fail(DiagnosticIds.DecodeError, 'Evaluation stack underflow');
          else if (top.kind === 'value') unsupported(`dup of a ${describeEntry(top)}`);
          else stack.push(top);
          break;
        }
        case 'pop':
          discard(takeOne());
          break;
        case 'not':
        case 'neg':
          unary(op);
          break;
        case 'newarr': {
          const length = takeOne();
          if (operand.kind !== 'symbol' || !BYTE_ELEMENT_TYPES.has(shortTypeName(operand.entry.name))) {
            unsupported(`Array of ${operand.kind === 'symbol' ? operand.entry.name : 'unknown type'}`);
          } else if (length.kind !== 'const' || length.value < 0) {
            unsupported(`Array length ${describeEntry(length)}`);
          } else {
            stack.push({ kind: 'array', ref: { length: length.value, bytes: new Uint8Array(length.value) } });
          }
          break;
        }
        case 'ldtoken':
          if (operand.kind === 'symbol' && operand.entry.kind === 'field') {
            const { name, data: blob } = operand.entry;
            stack.push(blob === undefined ? { kind: 'field', name } : { kind: 'field', name, data: blob });
          } else {
            unsupported('ldtoken of a non-field token');
          }
          break;
        case 'ldlen': {
          const array = takeOne();
          if (array.kind === 'array') stack.push({ kind: 'const', value: array.ref.length });
          else if (array.kind === 'address') stack.push({ kind: 'const', value: array.literal.length });
          else unsupported(`ldlen of ${describeEntry(array)}`);
          break;
        }
        case 'ldelem.u1':
        case 'ldelem.i1':
          loadElement(op === 'ldelem.i1');
          break;
        case 'stelem.i1':
          storeElement();
          break;
        case 'call':
        case 'callvirt':
          call(ins);
          break;
        case 'br':
          requireEmpty('Branch');
          if (operand.kind === 'branch') emit(abs('JMP', ilLabel(operand.target)));
          terminated = true;
          break;
        case 'brtrue':
        case 'brfalse':
          if (operand.kind === 'branch') conditional(op === 'brtrue', ilLabel(operand.target));
          break;
        case 'ret':
          stack.length = 0;
          halt();
          terminated = true;
          break;
        default:
          unsupported(`Unsupported instruction ${ins.opcode}`);
      }
    }

    current = undefined;
    if (targets.has(end)) {
      items.push(at(ilLabel(end)));
      terminated = false;
    }
    if (!terminated) halt();
  } catch (err) {
    if (!(err instanceof TranslateFailure)) throw err;
    diagnostics.push({
      id: err.id,
      severity: 'error',
      message: current === undefined ? err.message : `${err.message} at ${formatOffset(current.offset)}`,
      file,
      ...(current !== undefined ? { offset: current.offset } : {}),
    });
    return undefined;
  }

  const localBytes = nextLocal - BSS_START;
  return {
    main: code(MAIN_LABEL, items, input.entryName),
    arrays,
    strings,
    usedRoutines,
    localBytes,
  };
}
