import { EmulatorFault, formatFault, hex } from '@core/errors';
import type { DisplayView } from '@core/display/display';
import { TIMER_RATE_HZ } from '@core/timers/timers';
import { DEFAULT_CONFIG, readEnvFlag, resolveConfig, type EngineConfig } from './config';
import type { Chip8System } from './system';

export type SchedulerState = 'running' | 'waitingForKey' | 'halted';

export interface FrameReady {
  frame: number; // 1 for the first signalled frame
  display: DisplayView;
  delayTimer: number;
  soundTimer: number;
  beeping: boolean;
}

export interface AudioSink {
  beep(frequencyHz: number): void;
  silence(): void;
}

export interface SchedulerHooks {
  onFrame?: (frame: FrameReady) => void;
  audio?: AudioSink;
  onHalt?: (fault: EmulatorFault) => void;
}

export interface SchedulerOptions {
  // Log state transitions; defaults to TRACE_SCHED=1
  trace?: boolean;
}

export interface SchedulerStats {
  steps: number;
  ticks: number;
  frames: number;
  droppedFrames: number;
  elapsedMs: number;
}

const US_PER_SECOND = 1_000_000;
// Float error tolerated when folding advance() durations into whole microseconds
const CARRY_EPSILON_US = 1e-6;

// Events fired since the current one-second base
interface Cadence {
  rate: number;
  count: number;
}

type EventKind = 'instruction' | 'timer' | 'frame';

/**
 * Drives a Chip8System at three independent rates: instructions, the fixed 60 Hz timers,
 * and frame-ready signals. Deadlines are exact (event n of a cadence is due at n/rate
 * seconds), so coarse or fine advance() calls produce the same event counts. Overdue
 * instructions and timer ticks always run; frames are signalled once per boundary.
 */
export class Scheduler {
  private current: SchedulerState = 'running';
  private haltFault: EmulatorFault | null = null;
  private elapsedUs = 0; // whole microseconds since the current base
  private carryUs = 0; // fraction of a microsecond not yet counted
  private baseSeconds = 0;
  private readonly instr: Cadence;
  private readonly timer: Cadence = { rate: TIMER_RATE_HZ, count: 0 };
  private readonly frame: Cadence;
  private totals = { steps: 0, ticks: 0, frames: 0, droppedFrames: 0 };
  private beeping = false;
  private eventMs = 0; // simulated time of the event being run
  private trace: boolean;
  readonly config: EngineConfig;

  constructor(
    private system: Chip8System,
    config: EngineConfig = DEFAULT_CONFIG,
    private hooks: SchedulerHooks = {},
    opts: SchedulerOptions = {},
  ) {
    this.config = resolveConfig(config);
    this.instr = { rate: this.config.instructionRateHz, count: 0 };
    this.frame = { rate: this.config.frameRateHz, count: 0 };
    this.trace = opts.trace ?? readEnvFlag('TRACE_SCHED');
  }

  get state(): SchedulerState { return this.current; }

  get fault(): EmulatorFault | null { return this.haltFault; }

  stats(): SchedulerStats {
    return { ...this.totals, elapsedMs: this.baseSeconds * 1000 + this.elapsedUs / 1000 };
  }

  /**
   * Moves simulated time forward and runs every event that became due, in time order.
   * Ties at the same instant run instruction, then timer, then frame.
   */
  advance(elapsedMs: number): SchedulerState {
    if (!Number.isFinite(elapsedMs) || elapsedMs < 0) {
      throw new RangeError(`advance() needs a non-negative duration, got ${elapsedMs}`);
    }
    if (this.isHalted()) return this.current;
    const totalUs = this.carryUs + elapsedMs * 1000;
    const wholeUs = Math.floor(totalUs + CARRY_EPSILON_US);
    this.carryUs = totalUs - wholeUs;
    this.elapsedUs += wholeUs;

    for (let next = this.nextDue(); next !== null && !this.isHalted(); next = this.nextDue()) {
      const cadence = this.cadenceOf(next);
      this.eventMs = this.baseSeconds * 1000 + ((cadence.count + 1) * 1000) / cadence.rate;
      switch (next) {
        case 'instruction': this.runInstruction(); break;
        case 'timer': this.runTimerTick(); break;
        case 'frame': this.runFrame(); break;
      }
    }
    this.rebase();
    return this.current;
  }

  private isHalted(): boolean {
    return this.current === 'halted';
  }

  private cadenceOf(kind: EventKind): Cadence {
    switch (kind) {
      case 'instruction': return this.instr;
      case 'timer': return this.timer;
      case 'frame': return this.frame;
    }
  }

  private isDue(c: Cadence): boolean {
    return (c.count + 1) * US_PER_SECOND <= this.elapsedUs * c.rate;
  }

  // a's next deadline strictly before b's
  private earlier(a: Cadence, b: Cadence): boolean {
    return (a.count + 1) * b.rate < (b.count + 1) * a.rate;
  }

  private nextDue(): EventKind | null {
    let best: EventKind | null = null;
    let bestCadence: Cadence | null = null;
    const candidates: [EventKind, Cadence][] = [['instruction', this.instr], ['timer', this.timer], ['frame', this.frame]];
    for (const [kind, cadence] of candidates) {
      if (!this.isDue(cadence)) continue;
      if (bestCadence === null || this.earlier(cadence, bestCadence)) {
        best = kind;
        bestCadence = cadence;
      }
    }
    return best;
  }

  private runInstruction(): void {
    this.instr.count++;
    try {
      if (this.current === 'waitingForKey') {
        const key = this.system.keypad.waitForAnyPress();
        if (key === null) return;
        this.system.resumeWithKey(key);
        this.transition('running', `key 0x${hex(key, 1)}`);
        return;
      }
      const outcome = this.system.stepInstruction();
      this.totals.steps++;
      if (outcome.kind === 'waitingForKey') {
        this.system.keypad.armKeyWait();
        this.transition('waitingForKey', `V${hex(outcome.register, 1)} at ${hex(outcome.pc, 4)}`);
      }
    } catch (e) {
      if (!(e instanceof EmulatorFault)) throw e;
      this.halt(e);
    }
  }

  private runTimerTick(): void {
    this.timer.count++;
    this.system.tickTimers();
    this.totals.ticks++;
  }

  private runFrame(): void {
    this.frame.count++;
    if (this.config.dropLateFrames && this.isDue(this.frame)) {
      // A newer frame boundary has already passed; present that one instead
      this.totals.droppedFrames++;
      return;
    }
    this.totals.frames++;
    const timers = this.system.timers;
    const sound = timers.getSound();
    this.hooks.onFrame?.({
      frame: this.totals.frames,
      display: this.system.display,
      delayTimer: timers.getDelay(),
      soundTimer: sound,
      beeping: sound > 0,
    });
    if (sound > 0) {
      this.beeping = true;
      this.hooks.audio?.beep(this.config.beepFrequencyHz);
    } else if (this.beeping) {
      this.beeping = false;
      this.hooks.audio?.silence();
    }
  }

  private halt(fault: EmulatorFault): void {
    this.haltFault = fault;
    this.transition('halted', formatFault(fault));
    if (this.beeping) {
      this.beeping = false;
      this.hooks.audio?.silence();
    }
    this.hooks.onHalt?.(fault);
  }

  private transition(to: SchedulerState, detail: string): void {
    if (this.trace) {
      // eslint-disable-next-line no-console
      console.log(`[sched] ${this.current} -> ${to} (${detail}) t=${this.eventMs.toFixed(3)}ms`);
    }
    this.current = to;
  }

  // Every cadence fires exactly `rate` events per second, so whole seconds can be folded away
  private rebase(): void {
    while (
      this.elapsedUs >= US_PER_SECOND &&
      this.instr.count >= this.instr.rate &&
      this.timer.count >= this.timer.rate &&
      this.frame.count >= this.frame.rate
    ) {
      this.elapsedUs -= US_PER_SECOND;
      this.instr.count -= this.instr.rate;
      this.timer.count -= this.timer.rate;
      this.frame.count -= this.frame.rate;
      this.baseSeconds++;
    }
  }
}
