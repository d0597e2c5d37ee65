import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Memory, MAX_PROGRAM_SIZE, fontGlyphAddress } from '@core/memory/memory';
import { EmulatorFault } from '@core/errors';

describe('Memory', () => {
  it('installs the hex font at address 0', () => {
    const mem = new Memory();
    expect(Array.from(mem.readBlock(0x000, 5))).toEqual([0xF0, 0x90, 0x90, 0x90, 0xF0]);
    expect(fontGlyphAddress(0xA)).toBe(50);
    expect(Array.from(mem.readBlock(fontGlyphAddress(0xA), 5))).toEqual([0xF0, 0x90, 0xF0, 0x90, 0x90]);
    expect(Array.from(mem.readBlock(fontGlyphAddress(0xF), 5))).toEqual([0xF0, 0x80, 0xF0, 0x80, 0x80]);
  });

  it('only uses the low nibble for glyph addresses', () => {
    expect(fontGlyphAddress(0x1B)).toBe(fontGlyphAddress(0xB));
  });

  it('leaves 3584 bytes for programs', () => {
    expect(MAX_PROGRAM_SIZE).toBe(3584);
  });

  it('writes then reads back any byte at any address', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xFFF }), fc.integer({ min: 0, max: 0xFF }), (addr, value) => {
        const mem = new Memory();
        mem.writeByte(addr, value);
        return mem.readByte(addr) === value;
      }),
      { numRuns: 300 },
    );
  });

  it('keeps only the low 8 bits on write', () => {
    const mem = new Memory();
    mem.writeByte(0x300, 0x1AB);
    expect(mem.readByte(0x300)).toBe(0xAB);
  });

  it('reads words big-endian', () => {
    const mem = new Memory();
    mem.load(Uint8Array.from([0x12, 0x34]), 0x400);
    expect(mem.readWord(0x400)).toBe(0x1234);
  });

  it('faults outside 0x000..0xFFF', () => {
    const mem = new Memory();
    expect(() => mem.readByte(0x1000)).toThrowError(EmulatorFault);
    expect(() => mem.writeByte(-1, 0)).toThrowError(/outside 0x000\.\.0xFFF/);
    // the second byte of a word at 0xFFF lies past the end
    expect(() => mem.readWord(0xFFF)).toThrowError('memory access 0xFFF..0x1000 outside 0x000..0xFFF');
    expect(() => mem.load(new Uint8Array(2), 0xFFF)).toThrowError(EmulatorFault);
  });

  it('reads an empty block anywhere', () => {
    expect(new Memory().readBlock(0x2000, 0).length).toBe(0);
  });

  it('returns a copy from snapshot()', () => {
    const mem = new Memory();
    const snap = mem.snapshot();
    snap[0x500] = 7;
    expect(mem.readByte(0x500)).toBe(0);
  });
});
