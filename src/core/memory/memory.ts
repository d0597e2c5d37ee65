import type { Byte, Word } from '@core/cpu/types';
import { EmulatorFault, hex } from '@core/errors';
import font from './font.json';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;
export const FONT_BASE = font.base;
export const FONT_GLYPH_HEIGHT = font.glyphHeight;

export const fontGlyphAddress = (digit: number): Word => FONT_BASE + (digit & 0xF) * FONT_GLYPH_HEIGHT;

export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    let addr = FONT_BASE;
    for (const glyph of font.glyphs) {
      this.ram.set(glyph, addr);
      addr += FONT_GLYPH_HEIGHT;
    }
  }

  readByte(addr: Word): Byte {
    this.check(addr, 1);
    return this.ram[addr];
  }

  writeByte(addr: Word, value: Byte): void {
    this.check(addr, 1);
    this.ram[addr] = value & 0xFF;
  }

  // Instruction words are stored big-endian
  readWord(addr: Word): Word {
    this.check(addr, 2);
    return (this.ram[addr] << 8) | this.ram[addr + 1];
  }

  readBlock(addr: Word, length: number): Uint8Array {
    if (length === 0) return new Uint8Array(0);
    this.check(addr, length);
    return this.ram.slice(addr, addr + length);
  }

  load(bytes: Uint8Array, offset: Word = PROGRAM_START): void {
    if (bytes.length === 0) return;
    this.check(offset, bytes.length);
    this.ram.set(bytes, offset);
  }

  snapshot(): Uint8Array {
    return this.ram.slice();
  }

  private check(addr: Word, length: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr + length > MEMORY_SIZE) {
      const last = addr + length - 1;
      const range = length > 1 ? `0x${hex(addr, 3)}..0x${hex(last, 3)}` : `0x${hex(addr, 3)}`;
      throw new EmulatorFault('AddressOutOfRange', `memory access ${range} outside 0x000..0xFFF`);
    }
  }
}
