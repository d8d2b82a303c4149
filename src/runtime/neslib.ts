import { parseHexBytes } from '../bytes.js';
import { abs, abx, acc, imm, imp, izy, rel, zp } from '../m6502/asm.js';
import type { Block, Relocation } from '../program/block.js';
import { at, code, data } from '../program/block.js';
import {
  CONDES,
  NAME_UPD_ADR,
  NAME_UPD_ENABLE,
  NES_PRG_BANKS,
  NMI_CALLBACK,
  OAM_BUF,
  PAL_BG_PTR,
  PAL_BUF,
  PAL_SPR_PTR,
  PAL_UPDATE,
  PPU_ADDR,
  PPU_CTRL,
  PPU_CTRL_VAR,
  PPU_DATA,
  PPU_MASK_VAR,
  SCROLL_X,
  SCROLL_Y,
  STARTUP,
  TEMP,
  VRAM_UPDATE,
  ZP_START,
} from './constants.js';
import palettes from './palettes.json' with { type: 'json' };
import type { Routine } from './routine.js';
import { routine } from './routine.js';

const nmi_set_callback = (): Block =>
  code('nmi_set_callback', [
    zp('STA', NMI_CALLBACK + 1),
    zp('STX', NMI_CALLBACK + 2),
    at('HandyRTS'),
    imp('RTS'),
  ]);

const pal_all = (): Block =>
  code('pal_all', [
    zp('STA', TEMP),
    zp('STX', TEMP + 1),
    imm('LDX', 0x00),
    imm('LDA', 0x20),
  ]);

// Copies A entries from (TEMP) into the palette buffer at X.
const pal_copy = (): Block =>
  code('pal_copy', [
    zp('STA', TEMP + 2),
    imm('LDY', 0x00),
    at('@0'),
    izy('LDA', TEMP),
    abx('STA', PAL_BUF),
    imp('INX'),
    imp('INY'),
    zp('DEC', TEMP + 2),
    rel('BNE', '@0'),
    zp('INC', PAL_UPDATE),
    imp('RTS'),
  ]);

const pal_bg = (): Block =>
  code('pal_bg', [
    zp('STA', TEMP),
    zp('STX', TEMP + 1),
    imm('LDX', 0x00),
    imm('LDA', 0x10),
    rel('BNE', 'pal_copy'),
  ]);

const pal_spr = (): Block =>
  code('pal_spr', [
    zp('STA', TEMP),
    zp('STX', TEMP + 1),
    imm('LDX', 0x10),
    imp('TXA'),
    rel('BNE', 'pal_copy'),
  ]);

const pal_col = (): Block =>
  code('pal_col', [
    zp('STA', TEMP),
    abs('JSR', 'popa'),
    imm('AND', 0x1f),
    imp('TAX'),
    zp('LDA', TEMP),
    abx('STA', PAL_BUF),
    zp('INC', PAL_UPDATE),
    imp('RTS'),
  ]);

const pal_clear = (): Block =>
  code('pal_clear', [
    imm('LDA', 0x0f),
    imm('LDX', 0x00),
    at('@1'),
    abx('STA', PAL_BUF),
    imp('INX'),
    imm('CPX', 0x20),
    rel('BNE', '@1'),
    zp('STX', PAL_UPDATE),
    imp('RTS'),
  ]);

const brightness = (name: string, pointer: number) => (): Block =>
  code(name, [
    imp('TAX'),
    abx('LDA', 'palBrightTableL'),
    zp('STA', pointer),
    abx('LDA', 'palBrightTableH'),
    zp('STA', pointer + 1),
    zp('STA', PAL_UPDATE),
    imp('RTS'),
  ]);

const pal_bright = (): Block =>
  code('pal_bright', [abs('JSR', 'pal_spr_bright'), imp('TXA'), abs('JMP', 'pal_bg_bright')]);

const ppu_off = (): Block =>
  code('ppu_off', [
    zp('LDA', PPU_MASK_VAR),
    imm('AND', 0xe7),
    zp('STA', PPU_MASK_VAR),
    abs('JMP', 'ppu_wait_nmi'),
  ]);

const ppu_on_all = (): Block =>
  code('ppu_on_all', [zp('LDA', PPU_MASK_VAR), imm('ORA', 0x18)]);

const ppu_onoff = (): Block =>
  code('ppu_onoff', [zp('STA', PPU_MASK_VAR), abs('JMP', 'ppu_wait_nmi')]);

const ppu_on = (name: string, bits: number) => (): Block =>
  code(name, [zp('LDA', PPU_MASK_VAR), imm('ORA', bits), rel('BNE', 'ppu_onoff')]);

const ppu_mask = (): Block => code('ppu_mask', [zp('STA', PPU_MASK_VAR), imp('RTS')]);

// Getters returning a zero-page byte, zero-extended into A/X.
const readByte = (name: string, address: number) => (): Block =>
  code(name, [zp('LDA', address), imm('LDX', 0x00), imp('RTS')]);

const set_ppu_ctrl_var = (): Block =>
  code('set_ppu_ctrl_var', [zp('STA', PPU_CTRL_VAR), imp('RTS')]);

const oam_clear = (): Block =>
  code('oam_clear', [
    imm('LDX', 0x00),
    imm('LDA', 0xff),
    at('@1'),
    abx('STA', OAM_BUF),
    imp('INX'),
    imp('INX'),
    imp('INX'),
    imp('INX'),
    rel('BNE', '@1'),
    imp('RTS'),
  ]);

const oam_size = (): Block =>
  code('oam_size', [
    acc('ASL'),
    acc('ASL'),
    acc('ASL'),
    acc('ASL'),
    acc('ASL'),
    imm('AND', 0x20),
    zp('STA', TEMP),
    zp('LDA', PPU_CTRL_VAR),
    imm('AND', 0xdf),
    zp('ORA', TEMP),
    zp('STA', PPU_CTRL_VAR),
    imp('RTS'),
  ]);

const oam_hide_rest = (): Block =>
  code('oam_hide_rest', [
    imp('TAX'),
    imm('LDA', 0xf0),
    at('@1'),
    abx('STA', OAM_BUF),
    imp('INX'),
    imp('INX'),
    imp('INX'),
    imp('INX'),
    rel('BNE', '@1'),
    imp('RTS'),
  ]);

// On PAL the frame counter skips every sixth frame; wait one more there.
const ppu_wait_frame = (): Block =>
  code('ppu_wait_frame', [
    imm('LDA', 0x01),
    zp('STA', VRAM_UPDATE),
    zp('LDA', STARTUP),
    at('@1'),
    zp('CMP', STARTUP),
    rel('BEQ', '@1'),
    zp('LDA', ZP_START),
    rel('BEQ', '@3'),
    at('@2'),
    zp('LDA', NES_PRG_BANKS),
    imm('CMP', 0x05),
    rel('BEQ', '@2'),
    at('@3'),
    imp('RTS'),
  ]);

const ppu_wait_nmi = (): Block =>
  code('ppu_wait_nmi', [
    imm('LDA', 0x01),
    zp('STA', VRAM_UPDATE),
    zp('LDA', STARTUP),
    at('@1'),
    zp('CMP', STARTUP),
    rel('BEQ', '@1'),
    imp('RTS'),
  ]);

// scroll(x, y): y >= 240 selects the lower nametable.
const scroll = (): Block =>
  code('scroll', [
    zp('STA', TEMP),
    imp('TXA'),
    rel('BNE', '@1'),
    zp('LDA', TEMP),
    imm('CMP', 0xf0),
    rel('BCS', '@1'),
    zp('STA', SCROLL_Y),
    imm('LDA', 0x00),
    zp('STA', TEMP),
    rel('BEQ', '@2'),
    at('@1'),
    imp('SEC'),
    zp('LDA', TEMP),
    imm('SBC', 0xf0),
    zp('STA', SCROLL_Y),
    imm('LDA', 0x02),
    zp('STA', TEMP),
    at('@2'),
    abs('JSR', 'popax'),
    zp('STA', SCROLL_X),
    imp('TXA'),
    imm('AND', 0x01),
    zp('ORA', TEMP),
    zp('STA', TEMP),
    zp('LDA', PPU_CTRL_VAR),
    imm('AND', 0xfc),
    zp('ORA', TEMP),
    zp('STA', PPU_CTRL_VAR),
    imp('RTS'),
  ]);

const bank = (name: string, shifts: number, mask: number) => (): Block =>
  code(name, [
    imm('AND', 0x01),
    ...Array.from({ length: shifts }, () => acc('ASL')),
    zp('STA', TEMP),
    zp('LDA', PPU_CTRL_VAR),
    imm('AND', mask),
    zp('ORA', TEMP),
    zp('STA', PPU_CTRL_VAR),
    imp('RTS'),
  ]);

const vram_write = (): Block =>
  code('vram_write', [
    zp('STA', TEMP),
    zp('STX', TEMP + 1),
    abs('JSR', 'popax'),
    zp('STA', TEMP + 2),
    zp('STX', TEMP + 3),
    imm('LDY', 0x00),
    at('@1'),
    izy('LDA', TEMP + 2),
    abs('STA', PPU_DATA),
    zp('INC', TEMP + 2),
    rel('BNE', '@2'),
    zp('INC', TEMP + 3),
    at('@2'),
    zp('LDA', TEMP),
    rel('BNE', '@3'),
    zp('DEC', TEMP + 1),
    at('@3'),
    zp('DEC', TEMP),
    zp('LDA', TEMP),
    zp('ORA', TEMP + 1),
    rel('BNE', '@1'),
    imp('RTS'),
  ]);

const set_vram_update = (): Block =>
  code('set_vram_update', [
    zp('STA', NAME_UPD_ADR),
    zp('STX', NAME_UPD_ADR + 1),
    zp('ORA', NAME_UPD_ADR + 1),
    zp('STA', NAME_UPD_ENABLE),
    imp('RTS'),
  ]);

// Update buffer entries: [hi, lo, byte] single writes, [hi|flags, lo, len, bytes...] runs,
// terminated by $FF. Bit 7 of the flags selects vertical increment.
const flush_vram_update = (): Block =>
  code('flush_vram_update', [
    zp('STA', NAME_UPD_ADR),
    zp('STX', NAME_UPD_ADR + 1),
    at('flush_vram_update_nmi'),
    imm('LDY', 0x00),
    at('updName'),
    izy('LDA', NAME_UPD_ADR),
    imp('INY'),
    imm('CMP', 0x40),
    rel('BCS', '@updNotSingle'),
    abs('STA', PPU_ADDR),
    izy('LDA', NAME_UPD_ADR),
    imp('INY'),
    abs('STA', PPU_ADDR),
    izy('LDA', NAME_UPD_ADR),
    imp('INY'),
    abs('STA', PPU_DATA),
    abs('JMP', 'updName'),
    at('@updNotSingle'),
    imp('TAX'),
    zp('LDA', PPU_CTRL_VAR),
    imm('CPX', 0x80),
    rel('BCC', '@updHorzSeq'),
    imm('CPX', 0xff),
    rel('BEQ', '@updDone'),
    imm('ORA', 0x04),
    rel('BNE', '@updNameSeq'),
    at('@updHorzSeq'),
    imm('AND', 0xfb),
    at('@updNameSeq'),
    abs('STA', PPU_CTRL),
    imp('TXA'),
    imm('AND', 0x3f),
    abs('STA', PPU_ADDR),
    izy('LDA', NAME_UPD_ADR),
    imp('INY'),
    abs('STA', PPU_ADDR),
    izy('LDA', NAME_UPD_ADR),
    imp('INY'),
    imp('TAX'),
    at('@updNameLoop'),
    izy('LDA', NAME_UPD_ADR),
    imp('INY'),
    abs('STA', PPU_DATA),
    imp('DEX'),
    rel('BNE', '@updNameLoop'),
    zp('LDA', PPU_CTRL_VAR),
    abs('STA', PPU_CTRL),
    abs('JMP', 'updName'),
    at('@updDone'),
    imp('RTS'),
  ]);

const vram_adr = (): Block =>
  code('vram_adr', [abs('STX', PPU_ADDR), abs('STA', PPU_ADDR), imp('RTS')]);

const vram_put = (): Block => code('vram_put', [abs('STA', PPU_DATA), imp('RTS')]);

// vram_fill(n, len): the high byte of len counts whole pages.
const vram_fill = (): Block =>
  code('vram_fill', [
    zp('STA', TEMP + 2),
    zp('STX', TEMP + 3),
    abs('JSR', 'popa'),
    zp('LDX', TEMP + 3),
    rel('BEQ', '@2'),
    imm('LDX', 0x00),
    at('@1'),
    abs('STA', PPU_DATA),
    imp('DEX'),
    rel('BNE', '@1'),
    zp('DEC', TEMP + 3),
    rel('BNE', '@1'),
    at('@2'),
    zp('LDX', TEMP + 2),
    rel('BEQ', '@4'),
    at('@3'),
    abs('STA', PPU_DATA),
    imp('DEX'),
    rel('BNE', '@3'),
    at('@4'),
    imp('RTS'),
  ]);

const vram_inc = (): Block =>
  code('vram_inc', [
    imm('ORA', 0x00),
    rel('BEQ', '@1'),
    imm('LDA', 0x04),
    at('@1'),
    zp('STA', TEMP),
    zp('LDA', PPU_CTRL_VAR),
    imm('AND', 0xfb),
    zp('ORA', TEMP),
    zp('STA', PPU_CTRL_VAR),
    abs('STA', PPU_CTRL),
    imp('RTS'),
  ]);

const delay = (): Block =>
  code('delay', [
    imp('TAX'),
    at('@1'),
    abs('JSR', 'ppu_wait_nmi'),
    imp('DEX'),
    rel('BNE', '@1'),
    imp('RTS'),
  ]);

function brightnessTables(): Block[] {
  const tables = palettes.brightness.map((row, index) => {
    const bytes = parseHexBytes(row);
    if (bytes === undefined) throw new Error(`palettes.json: bad hex in table ${index}`);
    return data(`palBrightTable${index}`, bytes);
  });
  const pointers = (part: 'lo' | 'hi'): Relocation[] =>
    tables.map((_, index) => ({ offset: index, label: `palBrightTable${index}`, part }));
  return [
    data('palBrightTableL', new Uint8Array(tables.length), pointers('lo')),
    data('palBrightTableH', new Uint8Array(tables.length), pointers('hi')),
    ...tables,
  ];
}

// Constructor table walk; the table is empty so the call is skipped.
const initlib = (): Block =>
  code('initlib', [
    imm('LDY', 0x00),
    rel('BEQ', '@1'),
    imm('LDA', 0x00),
    imm('LDX', 0x85),
    abs('JMP', CONDES),
    at('@1'),
    imp('RTS'),
  ]);

/**
 * neslib routines in image order, starting right after the interrupt handlers.
 */
export const neslibRoutines: readonly Routine[] = [
  routine('nmi_set_callback', 'library', [], nmi_set_callback),
  routine('pal_all', 'library', ['pal_copy'], pal_all),
  routine('pal_copy', 'library', [], pal_copy),
  routine('pal_bg', 'library', ['pal_copy'], pal_bg),
  routine('pal_spr', 'library', ['pal_copy'], pal_spr),
  routine('pal_col', 'library', ['popa'], pal_col),
  routine('pal_clear', 'library', [], pal_clear),
  routine('pal_spr_bright', 'library', ['palBrightTables'], brightness('pal_spr_bright', PAL_SPR_PTR)),
  routine('pal_bg_bright', 'library', ['palBrightTables'], brightness('pal_bg_bright', PAL_BG_PTR)),
  routine('pal_bright', 'library', ['pal_spr_bright', 'pal_bg_bright'], pal_bright),
  routine('ppu_off', 'library', ['ppu_wait_nmi'], ppu_off),
  routine('ppu_on_all', 'library', ['ppu_onoff'], ppu_on_all),
  routine('ppu_onoff', 'library', ['ppu_wait_nmi'], ppu_onoff),
  routine('ppu_on_bg', 'library', ['ppu_onoff'], ppu_on('ppu_on_bg', 0x08)),
  routine('ppu_on_spr', 'library', ['ppu_onoff'], ppu_on('ppu_on_spr', 0x10)),
  routine('ppu_mask', 'library', [], ppu_mask),
  routine('ppu_system', 'library', [], readByte('ppu_system', ZP_START)),
  routine('get_ppu_ctrl_var', 'library', [], readByte('get_ppu_ctrl_var', PPU_CTRL_VAR)),
  routine('set_ppu_ctrl_var', 'library', [], set_ppu_ctrl_var),
  routine('oam_clear', 'library', [], oam_clear),
  routine('oam_size', 'library', [], oam_size),
  routine('oam_hide_rest', 'library', [], oam_hide_rest),
  routine('ppu_wait_frame', 'library', [], ppu_wait_frame),
  routine('ppu_wait_nmi', 'library', [], ppu_wait_nmi),
  routine('scroll', 'library', ['popax'], scroll),
  routine('bank_spr', 'library', [], bank('bank_spr', 3, 0xf7)),
  routine('bank_bg', 'library', [], bank('bank_bg', 4, 0xef)),
  routine('vram_write', 'library', ['popax'], vram_write),
  routine('set_vram_update', 'library', [], set_vram_update),
  routine('flush_vram_update', 'library', [], flush_vram_update),
  routine('vram_adr', 'library', [], vram_adr),
  routine('vram_put', 'library', [], vram_put),
  routine('vram_fill', 'library', ['popa'], vram_fill),
  routine('vram_inc', 'library', [], vram_inc),
  routine('nesclock', 'library', [], readByte('nesclock', STARTUP)),
  routine('delay', 'library', ['ppu_wait_nmi'], delay),
  routine('palBrightTables', 'library', [], brightnessTables),
  routine('initlib', 'library', [], initlib),
];
