import { describe, it, expect } from 'vitest';
import { Keypad } from '@core/input/keypad';
import { DEFAULT_KEYMAP, KeyHold, keyForName } from '@host/node/keymap';

describe('keymap', () => {
  it('maps the AZERTY block onto the hex keypad', () => {
    const rows = ['1234', 'azer', 'qsdf', 'wxcv'].map((row) => [...row].map((ch) => keyForName(ch)));
    expect(rows).toEqual([
      [0x1, 0x2, 0x3, 0xC],
      [0x4, 0x5, 0x6, 0xD],
      [0x7, 0x8, 0x9, 0xE],
      [0xA, 0x0, 0xB, 0xF],
    ]);
    expect(Object.keys(DEFAULT_KEYMAP)).toHaveLength(16);
  });

  it('ignores case and unmapped keys', () => {
    expect(keyForName('Z')).toBe(0x5);
    expect(keyForName('p')).toBeNull();
  });
});

describe('KeyHold', () => {
  it('releases a key after the hold expires', () => {
    const pad = new Keypad();
    const hold = new KeyHold(pad, 2);
    hold.press(0x5);
    expect(pad.isPressed(0x5)).toBe(true);
    hold.onFrame();
    expect(pad.isPressed(0x5)).toBe(true);
    hold.onFrame();
    expect(pad.isPressed(0x5)).toBe(false);
    expect(hold.held()).toEqual([]);
  });

  it('extends the hold on repeated presses', () => {
    const pad = new Keypad();
    const hold = new KeyHold(pad, 2);
    hold.press(0xA);
    hold.onFrame();
    hold.press(0xA);
    hold.onFrame();
    expect(pad.isPressed(0xA)).toBe(true);
    expect(hold.held()).toEqual([0xA]);
  });

  it('rejects a non-positive hold', () => {
    expect(() => new KeyHold(new Keypad(), 0)).toThrowError(RangeError);
  });
});
