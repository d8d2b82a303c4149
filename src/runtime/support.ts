import { abs, abx, aby, acc, hi, imm, imp, izy, lo, rel, zp, zpx } from '../m6502/asm.js';
import type { Block } from '../program/block.js';
import { at, code } from '../program/block.js';
import {
  BSS_START,
  CONDES,
  JOYPAD1,
  OAM_BUF,
  PAD_BUF,
  TEMP,
  ptr1,
  ptr2,
  sp,
  tmp1,
} from './constants.js';
import type { BuildContext, Routine } from './routine.js';
import { routine } from './routine.js';

/** Label of the destructor-table walker emitted after all literal data. */
export const DESTRUCTOR_TABLE = '__DESTRUCTOR_TABLE__';

const donelib = (): Block =>
  code('donelib', [
    imm('LDY', 0x00),
    rel('BEQ', '@1'),
    imm('LDA', lo(DESTRUCTOR_TABLE)),
    imm('LDX', hi(DESTRUCTOR_TABLE)),
    abs('JMP', CONDES),
    at('@1'),
    imp('RTS'),
  ]);

// Copies the initialized-data image into RAM at $0300. X and tmp1 count up from the
// negated length.
const copydata = (): Block =>
  code('copydata', [
    imm('LDA', lo(DESTRUCTOR_TABLE)),
    zp('STA', ptr1),
    imm('LDA', hi(DESTRUCTOR_TABLE)),
    zp('STA', ptr1 + 1),
    imm('LDA', 0x00),
    zp('STA', ptr2),
    imm('LDA', 0x03),
    zp('STA', ptr2 + 1),
    imm('LDX', 0xda),
    imm('LDA', 0xff),
    zp('STA', tmp1),
    imm('LDY', 0x00),
    at('@1'),
    imp('INX'),
    rel('BEQ', '@3'),
    at('@2'),
    izy('LDA', ptr1),
    izy('STA', ptr2),
    imp('INY'),
    rel('BNE', '@1'),
    zp('INC', ptr1 + 1),
    zp('INC', ptr2 + 1),
    rel('BNE', '@1'),
    at('@3'),
    zp('INC', tmp1),
    rel('BNE', '@2'),
    imp('RTS'),
  ]);

const popax = (): Block =>
  code('popax', [
    imm('LDY', 0x01),
    izy('LDA', sp),
    imp('TAX'),
    imp('DEY'),
    izy('LDA', sp),
  ]);

const incsp2 = (): Block =>
  code('incsp2', [
    zp('INC', sp),
    rel('BEQ', '@1'),
    zp('INC', sp),
    rel('BEQ', '@2'),
    imp('RTS'),
    at('@1'),
    zp('INC', sp),
    at('@2'),
    zp('INC', sp + 1),
    imp('RTS'),
  ]);

const popa = (): Block =>
  code('popa', [
    imm('LDY', 0x00),
    izy('LDA', sp),
    zp('INC', sp),
    rel('BEQ', '@1'),
    imp('RTS'),
    at('@1'),
    zp('INC', sp + 1),
    imp('RTS'),
  ]);

const pusha0sp = (): Block =>
  code('pusha0sp', [
    imm('LDY', 0x00),
    at('pushaysp'),
    izy('LDA', sp),
    at('pusha'),
    zp('LDY', sp),
    rel('BEQ', '@1'),
    zp('DEC', sp),
    imm('LDY', 0x00),
    izy('STA', sp),
    imp('RTS'),
    at('@1'),
    zp('DEC', sp + 1),
    zp('DEC', sp),
    izy('STA', sp),
    imp('RTS'),
  ]);

// Pushes A/X as a word, high byte at the higher address.
const push0 = (): Block =>
  code('push0', [
    imm('LDA', 0x00),
    at('pusha0'),
    imm('LDX', 0x00),
    at('pushax'),
    imp('PHA'),
    zp('LDA', sp),
    imp('SEC'),
    imm('SBC', 0x02),
    zp('STA', sp),
    rel('BCS', '@1'),
    zp('DEC', sp + 1),
    at('@1'),
    imm('LDY', 0x01),
    imp('TXA'),
    izy('STA', sp),
    imp('PLA'),
    imp('DEY'),
    izy('STA', sp),
    imp('RTS'),
  ]);

/**
 * Clears the locals segment. Only the byte count of the current program varies.
 */
const zerobss = (ctx: BuildContext): Block =>
  code('zerobss', [
    imm('LDA', BSS_START & 0xff),
    zp('STA', ptr1),
    imm('LDA', BSS_START >> 8),
    zp('STA', ptr1 + 1),
    imm('LDA', 0x00),
    imp('TAY'),
    imm('LDX', 0x00),
    rel('BEQ', '@3'),
    at('@1'),
    izy('STA', ptr1),
    imp('INY'),
    rel('BNE', '@1'),
    zp('INC', ptr1 + 1),
    imp('DEX'),
    rel('BNE', '@1'),
    at('@3'),
    imm('CPY', ctx.localBytes & 0xff),
    rel('BEQ', '@4'),
    izy('STA', ptr1),
    imp('INY'),
    rel('BNE', '@3'),
    at('@4'),
    imp('RTS'),
  ]);

// pad_poll(port): reads the pad three times and keeps a value seen twice.
const pad_poll = (): Block =>
  code('pad_poll', [
    imp('TAY'),
    imm('LDX', 0x00),
    at('@port'),
    imm('LDA', 0x01),
    abs('STA', JOYPAD1),
    imm('LDA', 0x00),
    abs('STA', JOYPAD1),
    imm('LDA', 0x08),
    zp('STA', TEMP),
    at('@bit'),
    aby('LDA', JOYPAD1),
    acc('LSR'),
    zpx('ROR', TEMP + 1),
    zp('DEC', TEMP),
    rel('BNE', '@bit'),
    imp('INX'),
    imm('CPX', 0x03),
    rel('BNE', '@port'),
    zp('LDA', TEMP + 1),
    zp('CMP', TEMP + 2),
    rel('BEQ', '@done'),
    zp('CMP', TEMP + 3),
    rel('BEQ', '@done'),
    zp('LDA', TEMP + 2),
    at('@done'),
    aby('STA', PAD_BUF),
    imp('TAX'),
    aby('EOR', PAD_BUF + 2),
    aby('AND', PAD_BUF),
    aby('STA', PAD_BUF + 4),
    imp('TXA'),
    aby('STA', PAD_BUF + 2),
    imm('LDX', 0x00),
    imp('RTS'),
  ]);

// oam_spr(x, y, chr, attr, id): four bytes come off the soft stack; returns id + 4.
const oam_spr = (): Block =>
  code('oam_spr', [
    imp('TAX'),
    imm('LDY', 0x00),
    izy('LDA', sp),
    imp('INY'),
    abx('STA', OAM_BUF + 2),
    izy('LDA', sp),
    imp('INY'),
    abx('STA', OAM_BUF + 1),
    izy('LDA', sp),
    imp('INY'),
    abx('STA', OAM_BUF),
    izy('LDA', sp),
    abx('STA', OAM_BUF + 3),
    zp('LDA', sp),
    imp('CLC'),
    imm('ADC', 0x04),
    zp('STA', sp),
    rel('BCC', '@1'),
    zp('INC', sp + 1),
    at('@1'),
    imp('TXA'),
    imp('CLC'),
    imm('ADC', 0x04),
    imm('LDX', 0x00),
    imp('RTS'),
  ]);

const destructorTable = (): Block =>
  code(DESTRUCTOR_TABLE, [
    abs('STA', 0x030e),
    abs('STX', 0x030f),
    abs('STA', 0x0315),
    abs('STX', 0x0316),
    at('@1'),
    imp('DEY'),
    aby('LDA', 0xffff),
    abs('STA', 0x031f),
    imp('DEY'),
    aby('LDA', 0xffff),
    abs('STA', 0x031e),
    abs('STY', 0x0321),
    abs('JSR', 0xffff),
    imm('LDY', 0xff),
    rel('BNE', '@1'),
    imp('RTS'),
  ]);

/** Runtime helpers placed after user code, then the on-demand and trailing routines. */
export const supportRoutines: readonly Routine[] = [
  routine('donelib', 'support', [DESTRUCTOR_TABLE], donelib),
  routine('copydata', 'support', [DESTRUCTOR_TABLE], copydata),
  routine('popax', 'support', ['incsp2'], popax),
  routine('incsp2', 'support', [], incsp2),
  routine('popa', 'support', [], popa),
  routine('pusha0sp', 'support', [], pusha0sp),
  routine('push0', 'support', [], push0),
  routine('zerobss', 'support', [], zerobss),
  routine('pad_poll', 'optional', [], pad_poll),
  routine('oam_spr', 'optional', [], oam_spr),
  routine(DESTRUCTOR_TABLE, 'trailer', [], destructorTable),
];
