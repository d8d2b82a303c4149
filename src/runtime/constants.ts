// Zero page used by the runtime.
export const ZP_START = 0x00;
export const STARTUP = 0x01;
export const NES_PRG_BANKS = 0x02;
export const VRAM_UPDATE = 0x03;
export const NAME_UPD_ADR = 0x04;
export const NAME_UPD_ENABLE = 0x06;
export const PAL_UPDATE = 0x07;
export const PAL_BG_PTR = 0x08;
export const PAL_SPR_PTR = 0x0a;
export const SCROLL_X = 0x0c;
export const SCROLL_Y = 0x0d;
export const PPU_CTRL_VAR = 0x10;
export const PPU_MASK_VAR = 0x12;
/** `JMP` opcode plus target of the NMI user callback. */
export const NMI_CALLBACK = 0x14;
export const TEMP = 0x17;
export const PAD_BUF = 0x3c;

// cc65 software stack and scratch pointers.
export const sp = 0x22;
export const ptr1 = 0x2a;
export const ptr2 = 0x2c;
export const tmp1 = 0x32;

// RAM.
export const PAL_BUF = 0x01c0;
export const OAM_BUF = 0x0200;
export const CONDES = 0x0300;
/** First byte of the zero-initialized segment that holds locals. */
export const BSS_START = 0x0325;

// PPU registers.
export const PPU_CTRL = 0x2000;
export const PPU_MASK = 0x2001;
export const PPU_STATUS = 0x2002;
export const PPU_OAM_ADDR = 0x2003;
export const PPU_SCROLL = 0x2005;
export const PPU_ADDR = 0x2006;
export const PPU_DATA = 0x2007;

// APU and I/O.
export const DMC_FREQ = 0x4010;
export const PPU_OAM_DMA = 0x4014;
export const JOYPAD1 = 0x4016;
export const PPU_FRAMECNT = 0x4017;

/** Runtime locations named in the listing and the assembly trace. */
export const RUNTIME_LOCATIONS: Readonly<Record<string, number>> = {
  STARTUP,
  NES_PRG_BANKS,
  VRAM_UPDATE,
  NAME_UPD_ADR,
  NAME_UPD_ENABLE,
  PAL_UPDATE,
  PAL_BG_PTR,
  PAL_SPR_PTR,
  SCROLL_X,
  SCROLL_Y,
  PPU_CTRL_VAR,
  PPU_MASK_VAR,
  NMI_CALLBACK,
  TEMP,
  sp,
  ptr1,
  ptr2,
  tmp1,
  PAD_BUF,
  PAL_BUF,
  OAM_BUF,
  CONDES,
  BSS_START,
  PPU_CTRL,
  PPU_MASK,
  PPU_STATUS,
  PPU_OAM_ADDR,
  PPU_SCROLL,
  PPU_ADDR,
  PPU_DATA,
  DMC_FREQ,
  PPU_OAM_DMA,
  JOYPAD1,
  PPU_FRAMECNT,
};

/** CPU address of the first PRG byte. */
export const PRG_BASE = 0x8000;
export const PRG_BANK_SIZE = 0x4000;
export const CHR_BANK_SIZE = 0x2000;
export const VECTOR_TABLE_SIZE = 6;

