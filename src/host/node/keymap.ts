import type { Keypad } from '@core/input/keypad';

// Physical layout (AZERTY rows)  ->  keypad
//   1 2 3 4                          1 2 3 C
//   a z e r                          4 5 6 D
//   q s d f                          7 8 9 E
//   w x c v                          A 0 B F
export const DEFAULT_KEYMAP: Readonly<Record<string, number>> = Object.freeze({
  '1': 0x1, '2': 0x2, '3': 0x3, '4': 0xC,
  a: 0x4, z: 0x5, e: 0x6, r: 0xD,
  q: 0x7, s: 0x8, d: 0x9, f: 0xE,
  w: 0xA, x: 0x0, c: 0xB, v: 0xF,
});

export function keyForName(name: string, keymap: Readonly<Record<string, number>> = DEFAULT_KEYMAP): number | null {
  const key = keymap[name.toLowerCase()];
  return key === undefined ? null : key;
}

/**
 * Terminals report key presses (and auto-repeats) but never releases, so a key is held
 * for `holdFrames` frame-ready signals after its latest press event.
 */
export class KeyHold {
  private remaining = new Map<number, number>();

  constructor(private keypad: Keypad, private holdFrames = 6) {
    if (!Number.isInteger(holdFrames) || holdFrames < 1) {
      throw new RangeError(`holdFrames must be a positive integer, got ${holdFrames}`);
    }
  }

  press(key: number): void {
    this.keypad.setPressed(key, true);
    this.remaining.set(key, this.holdFrames);
  }

  onFrame(): void {
    for (const [key, left] of this.remaining) {
      if (left <= 1) {
        this.remaining.delete(key);
        this.keypad.setReleased(key);
      } else {
        this.remaining.set(key, left - 1);
      }
    }
  }

  held(): number[] {
    return [...this.remaining.keys()].sort((a, b) => a - b);
  }
}
