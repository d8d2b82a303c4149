import { abs, abx, hi, imm, imp, izy, lo, rel, zp, zpx } from '../m6502/asm.js';
import type { Block } from '../program/block.js';
import { at, code } from '../program/block.js';
import type { Routine } from './routine.js';
import { routine } from './routine.js';
import {
  DMC_FREQ,
  NAME_UPD_ENABLE,
  NES_PRG_BANKS,
  NMI_CALLBACK,
  PAL_BG_PTR,
  PAL_BUF,
  PAL_SPR_PTR,
  PAL_UPDATE,
  PPU_ADDR,
  PPU_CTRL,
  PPU_CTRL_VAR,
  PPU_DATA,
  PPU_FRAMECNT,
  PPU_MASK,
  PPU_MASK_VAR,
  PPU_OAM_ADDR,
  PPU_OAM_DMA,
  PPU_SCROLL,
  PPU_STATUS,
  SCROLL_X,
  SCROLL_Y,
  STARTUP,
  VRAM_UPDATE,
  ZP_START,
  sp,
} from './constants.js';

/** Reset entry point: the CPU starts here. */
export const RESET_LABEL = 'start';
export const NMI_LABEL = 'nmi';
export const IRQ_LABEL = 'irq';
/** User code entry; the startup sequence jumps here when initialization is done. */
export const MAIN_LABEL = 'main';

const start = (): Block =>
  code(RESET_LABEL, [
    imp('SEI'),
    imm('LDX', 0xff),
    imp('TXS'),
    imp('INX'),
    abs('STX', PPU_MASK),
    abs('STX', DMC_FREQ),
    abs('STX', PPU_CTRL),
  ]);

const initPPU = (): Block =>
  code('initPPU', [
    abs('BIT', PPU_STATUS),
    at('@1'),
    abs('BIT', PPU_STATUS),
    rel('BPL', '@1'),
    at('@2'),
    abs('BIT', PPU_STATUS),
    rel('BPL', '@2'),
    imm('LDA', 0x40),
    abs('STA', PPU_FRAMECNT),
  ]);

const clearPalette = (): Block =>
  code('clearPalette', [
    imm('LDA', 0x3f),
    abs('STA', PPU_ADDR),
    abs('STX', PPU_ADDR),
    imm('LDA', 0x0f),
    imm('LDX', 0x20),
    at('@1'),
    abs('STA', PPU_DATA),
    imp('DEX'),
    rel('BNE', '@1'),
  ]);

const clearVRAM = (): Block =>
  code('clearVRAM', [
    imp('TXA'),
    imm('LDY', 0x20),
    abs('STY', PPU_ADDR),
    abs('STA', PPU_ADDR),
    imm('LDY', 0x10),
    at('@1'),
    abs('STA', PPU_DATA),
    imp('INX'),
    rel('BNE', '@1'),
    imp('DEY'),
    rel('BNE', '@1'),
  ]);

// Zeroes all 2 KiB of RAM, then runs the library and C runtime initializers.
const clearRAM = (): Block =>
  code('clearRAM', [
    imp('TXA'),
    at('@1'),
    zpx('STA', 0x00),
    abx('STA', 0x0100),
    abx('STA', 0x0200),
    abx('STA', 0x0300),
    abx('STA', 0x0400),
    abx('STA', 0x0500),
    abx('STA', 0x0600),
    abx('STA', 0x0700),
    imp('INX'),
    rel('BNE', '@1'),
    imm('LDA', 0x04),
    abs('JSR', 'pal_bright'),
    abs('JSR', 'pal_clear'),
    abs('JSR', 'oam_clear'),
    abs('JSR', 'zerobss'),
    abs('JSR', 'copydata'),
    imm('LDA', 0x00),
    zp('STA', sp),
    imm('LDA', 0x08),
    zp('STA', sp + 1),
    abs('JSR', 'initlib'),
    imm('LDA', 0x4c),
    zp('STA', NMI_CALLBACK),
    imm('LDA', lo('HandyRTS')),
    zp('STA', NMI_CALLBACK + 1),
    imm('LDA', hi('HandyRTS')),
    zp('STA', NMI_CALLBACK + 2),
    imm('LDA', 0x80),
    zp('STA', PPU_CTRL_VAR),
    abs('STA', PPU_CTRL),
    imm('LDA', 0x06),
    zp('STA', PPU_MASK_VAR),
  ]);

const waitSync3 = (): Block =>
  code('waitSync3', [
    zp('LDA', STARTUP),
    at('@1'),
    zp('CMP', STARTUP),
    rel('BEQ', '@1'),
  ]);

// Busy-waits a fixed cycle count; the PPU status bit afterwards tells PAL from NTSC.
const detectNTSC = (): Block =>
  code('detectNTSC', [
    imm('LDX', 0x34),
    imm('LDY', 0x18),
    at('@1'),
    imp('DEX'),
    rel('BNE', '@1'),
    imp('DEY'),
    rel('BNE', '@1'),
    abs('LDA', PPU_STATUS),
    imm('AND', 0x80),
    zp('STA', ZP_START),
    abs('JSR', 'ppu_off'),
    imm('LDA', 0x00),
    abs('STA', PPU_SCROLL),
    abs('STA', PPU_SCROLL),
    abs('STA', PPU_OAM_ADDR),
    abs('JMP', MAIN_LABEL),
  ]);

const nmi = (): Block =>
  code(NMI_LABEL, [
    imp('PHA'),
    imp('TXA'),
    imp('PHA'),
    imp('TYA'),
    imp('PHA'),
    zp('LDA', PPU_MASK_VAR),
    imm('AND', 0x18),
    rel('BNE', 'doUpdate'),
    abs('JMP', 'skipAll'),
  ]);

const doUpdate = (): Block =>
  code('doUpdate', [
    imm('LDA', 0x02),
    abs('STA', PPU_OAM_DMA),
    zp('LDA', PAL_UPDATE),
    rel('BNE', 'updPal'),
    abs('JMP', 'updVRAM'),
  ]);

// Sends all 32 palette entries through the brightness tables; entry 0 is mirrored into
// the first slot of every group.
function updPal(): Block {
  const items = [
    imm('LDX', 0x00),
    zp('STX', PAL_UPDATE),
    imm('LDA', 0x3f),
    abs('STA', PPU_ADDR),
    abs('STX', PPU_ADDR),
    abs('LDY', PAL_BUF),
    izy('LDA', PAL_BG_PTR),
    abs('STA', PPU_DATA),
    imp('TAX'),
  ];
  const send = (index: number, table: number) => [
    abs('LDY', PAL_BUF + index),
    izy('LDA', table),
    abs('STA', PPU_DATA),
  ];
  for (let i = 1; i <= 3; i++) items.push(...send(i, PAL_BG_PTR));
  for (let group = 1; group <= 3; group++) {
    items.push(abs('STX', PPU_DATA));
    for (let i = 1; i <= 3; i++) items.push(...send(group * 4 + i, PAL_BG_PTR));
  }
  for (let group = 1; group <= 4; group++) {
    items.push(abs('STX', PPU_DATA));
    for (let i = 1; i <= 3; i++) items.push(...send(12 + group * 4 + i, PAL_SPR_PTR));
  }
  return code('updPal', items);
}

const updVRAM = (): Block =>
  code('updVRAM', [
    zp('LDA', VRAM_UPDATE),
    rel('BEQ', 'skipUpd'),
    imm('LDA', 0x00),
    zp('STA', VRAM_UPDATE),
    zp('LDA', NAME_UPD_ENABLE),
    rel('BEQ', 'skipUpd'),
    abs('JSR', 'flush_vram_update_nmi'),
  ]);

const skipUpd = (): Block =>
  code('skipUpd', [
    imm('LDA', 0x00),
    abs('STA', PPU_ADDR),
    abs('STA', PPU_ADDR),
    zp('LDA', SCROLL_X),
    abs('STA', PPU_SCROLL),
    zp('LDA', SCROLL_Y),
    abs('STA', PPU_SCROLL),
    zp('LDA', PPU_CTRL_VAR),
    abs('STA', PPU_CTRL),
  ]);

const skipAll = (): Block =>
  code('skipAll', [
    zp('LDA', PPU_MASK_VAR),
    abs('STA', PPU_MASK),
    zp('INC', STARTUP),
    zp('INC', NES_PRG_BANKS),
    zp('LDA', NES_PRG_BANKS),
    imm('CMP', 0x06),
    rel('BNE', 'skipNtsc'),
    imm('LDA', 0x00),
    zp('STA', NES_PRG_BANKS),
  ]);

const skipNtsc = (): Block =>
  code('skipNtsc', [
    abs('JSR', NMI_CALLBACK),
    imp('PLA'),
    imp('TAY'),
    imp('PLA'),
    imp('TAX'),
    imp('PLA'),
    imp('RTI'),
  ]);

const irq = (): Block =>
  code(IRQ_LABEL, [
    imp('PHA'),
    imp('TXA'),
    imp('PHA'),
    imp('TYA'),
    imp('PHA'),
    imm('LDA', 0xff),
    abs('JMP', 'skipNtsc'),
  ]);

/**
 * Reset, initialization and interrupt blocks, in image order.
 */
export const startupRoutines: readonly Routine[] = [
  routine(RESET_LABEL, 'library', [], start),
  routine('initPPU', 'library', [], initPPU),
  routine('clearPalette', 'library', [], clearPalette),
  routine('clearVRAM', 'library', [], clearVRAM),
  routine(
    'clearRAM',
    'library',
    ['pal_bright', 'pal_clear', 'oam_clear', 'zerobss', 'copydata', 'initlib', 'nmi_set_callback'],
    clearRAM,
  ),
  routine('waitSync3', 'library', [], waitSync3),
  routine('detectNTSC', 'library', ['ppu_off'], detectNTSC),
  routine(NMI_LABEL, 'library', ['doUpdate', 'skipAll'], nmi),
  routine('doUpdate', 'library', ['updPal', 'updVRAM'], doUpdate),
  routine('updPal', 'library', ['updVRAM'], updPal),
  routine('updVRAM', 'library', ['skipUpd', 'flush_vram_update'], updVRAM),
  routine('skipUpd', 'library', ['skipAll'], skipUpd),
  routine('skipAll', 'library', ['skipNtsc'], skipAll),
  routine('skipNtsc', 'library', [], skipNtsc),
  routine(IRQ_LABEL, 'library', ['skipNtsc'], irq),
];
