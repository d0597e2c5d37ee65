import { parseNumber, type EngineConfig } from '@core/system/config';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  romPath: string | null;
  // Only the options given on the command line; defaults and env are layered by the caller
  config: Partial<EngineConfig>;
  keyHoldFrames?: number;
  help: boolean;
  version: boolean;
}

export const USAGE = `Usage:
  chip8 [options] <rom>

Options:
  -c, --clock-rate <hz>     instructions per second (default 1000)
  -f, --framerate <hz>      frames per second (default 60)
  -v, --frequency <hz>      beep frequency (default 553)
  -g, --gradient-colors     cycle the pixel colour through a hue gradient
      --drop-late-frames    signal only the newest of several overdue frames
      --key-hold <frames>   frames a key stays down after a key press (default 6)
  -h, --help                show this help
  -V, --version             print the version

Keys (AZERTY):  1 2 3 4 / a z e r / q s d f / w x c v   Escape quits

Environment:
  CHIP8_CLOCK_RATE, CHIP8_FRAMERATE, CHIP8_BEEP_FREQUENCY, CHIP8_GRADIENT,
  CHIP8_DROP_LATE_FRAMES, TRACE_CPU, TRACE_SCHED
`;

const VALUE_FLAGS: Record<string, 'instructionRateHz' | 'frameRateHz' | 'beepFrequencyHz' | 'keyHoldFrames'> = {
  '-c': 'instructionRateHz',
  '--clock-rate': 'instructionRateHz',
  '-f': 'frameRateHz',
  '--framerate': 'frameRateHz',
  '-v': 'beepFrequencyHz',
  '--frequency': 'beepFrequencyHz',
  '--key-hold': 'keyHoldFrames',
};

function number(flag: string, raw: string): number {
  try {
    return parseNumber(flag, raw);
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

// argv without the node/script prefix. Accepts "--flag value" and "--flag=value".
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { romPath: null, config: {}, help: false, version: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let flag = arg;
    let inline: string | undefined;
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq > 0) {
      flag = arg.slice(0, eq);
      inline = arg.slice(eq + 1);
    }

    const target = VALUE_FLAGS[flag];
    if (target !== undefined) {
      let raw = inline;
      if (raw === undefined) {
        if (i + 1 >= argv.length) throw new UsageError(`${flag} needs a value`);
        raw = argv[++i];
      }
      const n = number(flag, raw);
      if (target === 'keyHoldFrames') out.keyHoldFrames = n;
      else out.config[target] = n;
      continue;
    }

    switch (flag) {
      case '-g':
      case '--gradient-colors':
        out.config.gradientColoring = true;
        break;
      case '--drop-late-frames':
        out.config.dropLateFrames = true;
        break;
      case '-h':
      case '--help':
        out.help = true;
        break;
      case '-V':
      case '--version':
        out.version = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') throw new UsageError(`unknown option ${arg}`);
        if (out.romPath !== null) throw new UsageError(`unexpected argument ${arg}`);
        out.romPath = arg;
    }
  }
  if (out.romPath === null && !out.help && !out.version) throw new UsageError('missing ROM path');
  return out;
}
