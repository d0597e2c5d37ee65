#!/usr/bin/env tsx
import fs from 'node:fs';
import { formatFault, isEmulatorFault } from '@core/errors';
import { loadProgramFile } from '@core/rom/rom';
import { ConfigError, configFromEnv, resolveConfig, type EngineConfig } from '@core/system/config';
import { Scheduler } from '@core/system/scheduler';
import { Chip8System } from '@core/system/system';
import { UsageError, USAGE, parseCliArgs, type CliArgs } from './args';
import { TerminalBeeper } from './beeper';
import { DEFAULT_KEYMAP, KeyHold, keyForName } from './keymap';
import { RealtimeLoop } from './realtime';
import { TerminalRenderer } from './terminal';

const ESCAPE = '\x1b';
const CTRL_C = '\x03';

function readVersion(): string {
  const raw = fs.readFileSync(new URL('../../../package.json', import.meta.url), 'utf8');
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  return '0.0.0';
}

async function main(): Promise<number> {
  let args: CliArgs;
  let config: EngineConfig;
  try {
    args = parseCliArgs(process.argv.slice(2));
    config = resolveConfig(configFromEnv(), args.config);
  } catch (e) {
    if (e instanceof UsageError || e instanceof ConfigError) {
      console.error(`[cli] ${e.message}\n`);
      console.error(USAGE);
      return 2;
    }
    throw e;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.version) {
    console.log(readVersion());
    return 0;
  }
  if (args.romPath === null) return 2;

  const system = new Chip8System(loadProgramFile(args.romPath));
  const renderer = new TerminalRenderer(process.stdout, config.gradientColoring);
  const beeper = new TerminalBeeper(process.stdout);
  const hold = new KeyHold(system.keypad, args.keyHoldFrames);
  const scheduler = new Scheduler(system, config, {
    audio: beeper,
    onFrame: (frame) => {
      hold.onFrame();
      renderer.present(frame);
    },
  });
  const loop = new RealtimeLoop(scheduler);

  const stdin = process.stdin;
  const onData = (chunk: Buffer) => {
    const text = chunk.toString('utf8');
    if (text === ESCAPE || text.includes(CTRL_C)) {
      loop.stop();
      return;
    }
    for (const ch of text) {
      const key = keyForName(ch, DEFAULT_KEYMAP);
      if (key !== null) hold.press(key);
    }
  };
  if (stdin.isTTY) stdin.setRawMode(true);
  stdin.on('data', onData);
  stdin.resume();

  renderer.begin();
  try {
    await loop.start();
  } finally {
    renderer.end();
    beeper.silence();
    stdin.off('data', onData);
    if (stdin.isTTY) stdin.setRawMode(false);
    stdin.pause();
  }

  const fault = scheduler.fault;
  if (fault !== null) {
    console.error(`[cli] halted: ${formatFault(fault)}`);
    return 1;
  }
  const stats = scheduler.stats();
  console.log(`[cli] stopped after ${(stats.elapsedMs / 1000).toFixed(1)}s: ${stats.steps} instructions, ${stats.frames} frames`);
  return 0;
}

main().then(
  (code) => process.exit(code),
  (e) => {
    // Faults raised before the scheduler starts, e.g. an oversized ROM
    if (isEmulatorFault(e)) console.error(`[cli] ${formatFault(e)}`);
    else console.error(e);
    process.exit(1);
  },
);
