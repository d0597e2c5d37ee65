import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Display } from '@core/display/display';

const lit = (d: Display) => Array.from(d.frameBuffer()).reduce((a, b) => a + b, 0);

describe('Display', () => {
  it('draws MSB as the leftmost pixel', () => {
    const d = new Display();
    expect(d.drawSprite(0, 0, [0x80])).toBe(false);
    expect(d.isSet(0, 0)).toBe(true);
    expect(d.isSet(1, 0)).toBe(false);
    expect(lit(d)).toBe(1);
  });

  it('reports a collision when a lit pixel is erased', () => {
    const d = new Display();
    d.drawSprite(10, 5, [0xFF]);
    expect(d.drawSprite(17, 5, [0x80])).toBe(true);
    expect(d.isSet(17, 5)).toBe(false);
    expect(lit(d)).toBe(7);
  });

  it('wraps each pixel across both edges', () => {
    const d = new Display();
    d.drawSprite(62, 31, [0xF0, 0xF0]);
    expect(d.isSet(62, 31)).toBe(true);
    expect(d.isSet(63, 31)).toBe(true);
    expect(d.isSet(0, 31)).toBe(true);
    expect(d.isSet(1, 31)).toBe(true);
    expect(d.isSet(62, 0)).toBe(true);
    expect(d.isSet(1, 0)).toBe(true);
    expect(lit(d)).toBe(8);
  });

  it('takes the origin modulo the grid size', () => {
    const d = new Display();
    d.drawSprite(64 + 3, 32 + 2, [0x80]);
    expect(d.isSet(3, 2)).toBe(true);
  });

  it('drawing the same sprite twice collides and leaves the grid blank', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 255 }),
        fc.integer({ min: 0, max: 255 }),
        fc.array(fc.integer({ min: 0, max: 255 }), { minLength: 1, maxLength: 15 }),
        (x, y, rows) => {
          const d = new Display();
          expect(d.drawSprite(x, y, rows)).toBe(false);
          expect(d.drawSprite(x, y, rows)).toBe(rows.some((r) => r !== 0));
          expect(lit(d)).toBe(0);
        },
      ),
      { numRuns: 200 },
    );
  });

  it('XOR drawing is self-inverse over existing content', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 63 }),
        fc.integer({ min: 0, max: 31 }),
        fc.array(fc.integer({ min: 0, max: 255 }), { minLength: 1, maxLength: 15 }),
        (x, y, rows) => {
          const d = new Display();
          d.drawSprite(5, 5, [0x3C, 0x42, 0x81]);
          const before = d.frameBuffer();
          d.drawSprite(x, y, rows);
          d.drawSprite(x, y, rows);
          expect(Array.from(d.frameBuffer())).toEqual(Array.from(before));
        },
      ),
      { numRuns: 100 },
    );
  });

  it('clears every pixel and bumps the revision', () => {
    const d = new Display();
    d.drawSprite(0, 0, [0xFF, 0xFF]);
    const rev = d.revision;
    d.clear();
    expect(lit(d)).toBe(0);
    expect(d.revision).toBe(rev + 1);
  });
});
