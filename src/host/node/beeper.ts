import type { AudioSink } from '@core/system/scheduler';
import type { TextSink } from './terminal';

const BELL = '\x07';

// A terminal can only ring its bell, so the tone is one bell per beep and the
// frequency is kept for display.
export class TerminalBeeper implements AudioSink {
  private active = false;
  lastFrequencyHz: number | null = null;
  bells = 0;

  constructor(private out: TextSink) {}

  get isActive(): boolean { return this.active; }

  beep(frequencyHz: number): void {
    this.lastFrequencyHz = frequencyHz;
    if (this.active) return;
    this.active = true;
    this.bells++;
    this.out.write(BELL);
  }

  silence(): void {
    this.active = false;
  }
}
