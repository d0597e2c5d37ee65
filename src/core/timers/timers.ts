import type { Byte } from '@core/cpu/types';

export const TIMER_RATE_HZ = 60;

const clampByte = (value: number): Byte => Math.max(0, Math.min(0xFF, Math.trunc(value)));

export class Timers {
  private delay: Byte = 0;
  private sound: Byte = 0;

  // Called once per 1/60 s; a timer at zero stays at zero
  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }

  getDelay(): Byte { return this.delay; }
  setDelay(value: number): void { this.delay = clampByte(value); }

  getSound(): Byte { return this.sound; }
  setSound(value: number): void { this.sound = clampByte(value); }

  isBeeping(): boolean { return this.sound > 0; }
}
