import { describe, it, expect } from 'vitest';
import { Keypad } from '@core/input/keypad';

describe('Keypad', () => {
  it('tracks pressed keys as a mask', () => {
    const k = new Keypad();
    k.setPressed(0x0);
    k.setPressed(0xF);
    expect(k.pressedMask()).toBe(0x8001);
    k.setReleased(0x0);
    expect(k.isPressed(0x0)).toBe(false);
    expect(k.isPressed(0xF)).toBe(true);
    k.releaseAll();
    expect(k.pressedMask()).toBe(0);
  });

  it('reads keys by their low nibble', () => {
    const k = new Keypad();
    k.setPressed(0x3);
    expect(k.isPressed(0x13)).toBe(true);
  });

  it('rejects keys outside 0..15', () => {
    expect(() => new Keypad().setPressed(16)).toThrowError(RangeError);
  });

  it('completes a key wait only with a press made after arming', () => {
    const k = new Keypad();
    k.setPressed(0x5);
    k.armKeyWait();
    expect(k.waitForAnyPress()).toBeNull();
    // still held: no new transition
    k.setPressed(0x5);
    expect(k.waitForAnyPress()).toBeNull();
    k.setReleased(0x5);
    k.setPressed(0x5);
    expect(k.waitForAnyPress()).toBe(0x5);
    expect(k.waitForAnyPress()).toBeNull();
  });
});
