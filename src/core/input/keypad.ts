export const KEY_COUNT = 16;

const checkKey = (key: number): void => {
  if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) {
    throw new RangeError(`keypad key out of range: ${key} (expected 0x0..0xF)`);
  }
};

// 16-key hex keypad. Each update is a single byte store, so writes from input
// handlers between scheduler passes are never observed half-applied.
export class Keypad {
  private keys = new Uint8Array(KEY_COUNT);
  // Most recent released->pressed transition since the last armKeyWait()
  private latchedPress: number | null = null;

  setPressed(key: number, pressed = true): void {
    checkKey(key);
    const was = this.keys[key] === 1;
    this.keys[key] = pressed ? 1 : 0;
    if (pressed && !was) this.latchedPress = key;
  }

  setReleased(key: number): void {
    this.setPressed(key, false);
  }

  isPressed(key: number): boolean {
    return this.keys[key & 0xF] === 1;
  }

  // Bit n set when key n is held
  pressedMask(): number {
    let mask = 0;
    for (let k = 0; k < KEY_COUNT; k++) if (this.keys[k]) mask |= 1 << k;
    return mask;
  }

  releaseAll(): void {
    this.keys.fill(0);
  }

  // Start a key wait: only presses made from now on complete it
  armKeyWait(): void {
    this.latchedPress = null;
  }

  // Non-blocking: the key pressed since armKeyWait(), or null
  waitForAnyPress(): number | null {
    const key = this.latchedPress;
    this.latchedPress = null;
    return key;
  }
}
