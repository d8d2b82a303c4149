import opcodeTable from './opcodes.json' with { type: 'json' };

export const MNEMONICS = [
  'ADC', 'AND', 'ASL', 'BCC', 'BCS', 'BEQ', 'BIT', 'BMI', 'BNE', 'BPL', 'BRK', 'BVC', 'BVS', 'CLC',
  'CLD', 'CLI', 'CLV', 'CMP', 'CPX', 'CPY', 'DEC', 'DEX', 'DEY', 'EOR', 'INC', 'INX', 'INY', 'JMP',
  'JSR', 'LDA', 'LDX', 'LDY', 'LSR', 'NOP', 'ORA', 'PHA', 'PHP', 'PLA', 'PLP', 'ROL', 'ROR', 'RTI',
  'RTS', 'SBC', 'SEC', 'SED', 'SEI', 'STA', 'STX', 'STY', 'TAX', 'TAY', 'TSX', 'TXA', 'TXS', 'TYA',
] as const;

export type Mnemonic = (typeof MNEMONICS)[number];

/**
 * 6502 addressing modes.
 *
 * `zpx`/`zpy`: zero page indexed; `abx`/`aby`: absolute indexed;
 * `izx`: `(zp,X)`; `izy`: `(zp),Y`; `rel`: signed 8-bit branch displacement.
 */
export const ADDRESS_MODES = [
  'imp', 'acc', 'imm', 'zp', 'zpx', 'zpy', 'abs', 'abx', 'aby', 'ind', 'izx', 'izy', 'rel',
] as const;

export type AddressMode = (typeof ADDRESS_MODES)[number];

/** Conditional branches, keyed by the branch taken on the opposite condition. */
export const INVERTED_BRANCH = {
  BCC: 'BCS',
  BCS: 'BCC',
  BEQ: 'BNE',
  BNE: 'BEQ',
  BMI: 'BPL',
  BPL: 'BMI',
  BVC: 'BVS',
  BVS: 'BVC',
} as const satisfies Partial<Record<Mnemonic, Mnemonic>>;

export type BranchMnemonic = keyof typeof INVERTED_BRANCH;

export function isMnemonic(name: string): name is Mnemonic {
  return MNEMONICS.some((m) => m === name);
}

export function isAddressMode(name: string): name is AddressMode {
  return ADDRESS_MODES.some((m) => m === name);
}

export function isBranchMnemonic(m: Mnemonic): m is BranchMnemonic {
  return m in INVERTED_BRANCH;
}

export function modeSize(mode: AddressMode): 1 | 2 | 3 {
  switch (mode) {
    case 'imp':
    case 'acc':
      return 1;
    case 'imm':
    case 'zp':
    case 'zpx':
    case 'zpy':
    case 'izx':
    case 'izy':
    case 'rel':
      return 2;
    case 'abs':
    case 'abx':
    case 'aby':
    case 'ind':
      return 3;
  }
}

function buildOpcodeMap(): Map<string, number> {
  const map = new Map<string, number>();
  for (const [mnemonic, modes] of Object.entries(opcodeTable)) {
    if (!isMnemonic(mnemonic)) throw new Error(`opcodes.json: unknown mnemonic "${mnemonic}"`);
    const forms: Record<string, string> = modes;
    for (const [mode, hex] of Object.entries(forms)) {
      if (!isAddressMode(mode)) throw new Error(`opcodes.json: unknown mode "${mode}"`);
      map.set(`${mnemonic} ${mode}`, parseInt(hex, 16));
    }
  }
  return map;
}

const OPCODES = buildOpcodeMap();

/**
 * Opcode byte for a mnemonic/mode pair, or `undefined` if the CPU has no such form.
 */
export function opcodeFor(mnemonic: Mnemonic, mode: AddressMode): number | undefined {
  return OPCODES.get(`${mnemonic} ${mode}`);
}
