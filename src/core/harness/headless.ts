import type { RandomByte } from '@core/cpu/cpu';
import type { EmulatorFault } from '@core/errors';
import { resolveConfig, type EngineConfig } from '@core/system/config';
import { Scheduler, type FrameReady, type SchedulerState } from '@core/system/scheduler';
import { Chip8System } from '@core/system/system';
import { crc32 } from '@utils/crc32';

export interface KeyEvent {
  atMs: number;
  key: number;
  pressed: boolean;
}

export interface RunOptions {
  seconds: number;
  config?: Partial<EngineConfig>;
  random?: RandomByte;
  keys?: KeyEvent[];
  sliceMs?: number; // simulated time per advance() call
  onFrame?: (frame: FrameReady) => void;
}

export interface RunResult {
  reason: 'fault' | 'timeout';
  state: SchedulerState;
  steps: number;
  ticks: number;
  frames: number;
  droppedFrames: number;
  elapsedMs: number;
  fault?: EmulatorFault;
  framebuffer: Uint8Array;
  frameCrc: number;
  system: Chip8System;
}

// Runs a program image for a fixed amount of simulated time, no host I/O involved
export function runProgram(image: Uint8Array, opts: RunOptions): RunResult {
  const config = resolveConfig(opts.config ?? {});
  const system = new Chip8System(image, { random: opts.random });
  const scheduler = new Scheduler(system, config, { onFrame: opts.onFrame });
  const sliceMs = opts.sliceMs ?? 1;
  if (!(sliceMs > 0)) throw new RangeError(`sliceMs must be positive, got ${sliceMs}`);
  const pending = [...(opts.keys ?? [])].sort((a, b) => a.atMs - b.atMs);
  const totalMs = opts.seconds * 1000;

  // Slices end early at the next key event so input lands at its exact time
  let now = 0;
  while (now < totalMs && scheduler.state !== 'halted') {
    while (pending.length > 0 && pending[0].atMs <= now) {
      const ev = pending[0];
      pending.shift();
      system.keypad.setPressed(ev.key, ev.pressed);
    }
    const nextEvent = pending.length > 0 ? pending[0].atMs : Number.POSITIVE_INFINITY;
    const end = Math.min(now + sliceMs, totalMs, nextEvent);
    scheduler.advance(end - now);
    now = end;
  }

  const stats = scheduler.stats();
  const framebuffer = system.display.frameBuffer();
  return {
    reason: scheduler.state === 'halted' ? 'fault' : 'timeout',
    state: scheduler.state,
    steps: stats.steps,
    ticks: stats.ticks,
    frames: stats.frames,
    droppedFrames: stats.droppedFrames,
    elapsedMs: stats.elapsedMs,
    fault: scheduler.fault ?? undefined,
    framebuffer,
    frameCrc: crc32(framebuffer),
    system,
  };
}
