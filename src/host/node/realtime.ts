import type { Scheduler, SchedulerState } from '@core/system/scheduler';

export interface RealtimeOptions {
  intervalMs?: number;
  now?: () => number;
  // Cap on simulated time per wake-up, so a suspended process does not replay minutes at once
  maxCatchUpMs?: number;
}

/**
 * Feeds wall-clock time into a Scheduler from a timer. start() resolves with the final
 * state once the scheduler halts or stop() is called; a scheduler error rejects it.
 */
export class RealtimeLoop {
  private handle: ReturnType<typeof setInterval> | null = null;
  private last = 0;
  private settle: ((state: SchedulerState) => void) | null = null;
  private fail: ((err: unknown) => void) | null = null;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly maxCatchUpMs: number;

  constructor(private scheduler: Scheduler, opts: RealtimeOptions = {}) {
    this.intervalMs = opts.intervalMs ?? 1;
    this.now = opts.now ?? (() => performance.now());
    this.maxCatchUpMs = opts.maxCatchUpMs ?? 250;
  }

  get running(): boolean { return this.handle !== null; }

  start(): Promise<SchedulerState> {
    if (this.handle !== null) throw new Error('realtime loop already running');
    return new Promise<SchedulerState>((resolve, reject) => {
      this.settle = resolve;
      this.fail = reject;
      this.last = this.now();
      this.handle = setInterval(() => this.tick(), this.intervalMs);
    });
  }

  stop(): void {
    this.finish();
  }

  private tick(): void {
    const t = this.now();
    const delta = Math.min(Math.max(0, t - this.last), this.maxCatchUpMs);
    this.last = t;
    try {
      if (this.scheduler.advance(delta) === 'halted') this.finish();
    } catch (e) {
      this.clear();
      const fail = this.fail;
      this.settle = null;
      this.fail = null;
      fail?.(e);
    }
  }

  private clear(): void {
    if (this.handle !== null) {
      clearInterval(this.handle);
      this.handle = null;
    }
  }

  private finish(): void {
    this.clear();
    const settle = this.settle;
    this.settle = null;
    this.fail = null;
    settle?.(this.scheduler.state);
  }
}
