export interface EngineConfig {
  instructionRateHz: number; // positive integer
  frameRateHz: number; // positive integer
  beepFrequencyHz: number; // positive, passed to the audio sink untouched
  gradientColoring: boolean; // renderer hint only
  dropLateFrames: boolean; // signal only the newest of several overdue frames
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  instructionRateHz: 1000,
  frameRateHz: 60,
  beepFrequencyHz: 553.0,
  gradientColoring: false,
  dropLateFrames: false,
});

export class ConfigError extends Error {
  constructor(readonly option: string, message: string) {
    super(`${option}: ${message}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const ENV_NAMES = {
  instructionRateHz: 'CHIP8_CLOCK_RATE',
  frameRateHz: 'CHIP8_FRAMERATE',
  beepFrequencyHz: 'CHIP8_BEEP_FREQUENCY',
  gradientColoring: 'CHIP8_GRADIENT',
  dropLateFrames: 'CHIP8_DROP_LATE_FRAMES',
} as const satisfies Record<keyof EngineConfig, string>;

export function parseNumber(option: string, raw: string): number {
  const s = raw.trim();
  const n = s.length > 0 ? Number(s) : NaN;
  if (!Number.isFinite(n)) throw new ConfigError(option, `expected a number, got "${raw}"`);
  return n;
}

export function parseBoolean(option: string, raw: string): boolean {
  const s = raw.trim().toLowerCase();
  if (s === '1' || s === 'true' || s === 'yes' || s === 'on') return true;
  if (s === '0' || s === 'false' || s === 'no' || s === 'off' || s === '') return false;
  throw new ConfigError(option, `expected a boolean, got "${raw}"`);
}

// Set when the variable is "1"/"true"/"yes"/"on"; malformed values read as off
export function readEnvFlag(name: string, env: Env = process.env): boolean {
  const raw = env[name];
  if (raw === undefined) return false;
  const s = raw.trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'on';
}

export function configFromEnv(env: Env = process.env): Partial<EngineConfig> {
  const out: Partial<EngineConfig> = {};
  const clock = env[ENV_NAMES.instructionRateHz];
  if (clock !== undefined) out.instructionRateHz = parseNumber(ENV_NAMES.instructionRateHz, clock);
  const fps = env[ENV_NAMES.frameRateHz];
  if (fps !== undefined) out.frameRateHz = parseNumber(ENV_NAMES.frameRateHz, fps);
  const beep = env[ENV_NAMES.beepFrequencyHz];
  if (beep !== undefined) out.beepFrequencyHz = parseNumber(ENV_NAMES.beepFrequencyHz, beep);
  const gradient = env[ENV_NAMES.gradientColoring];
  if (gradient !== undefined) out.gradientColoring = parseBoolean(ENV_NAMES.gradientColoring, gradient);
  const drop = env[ENV_NAMES.dropLateFrames];
  if (drop !== undefined) out.dropLateFrames = parseBoolean(ENV_NAMES.dropLateFrames, drop);
  return out;
}

const positiveInteger = (option: keyof EngineConfig, value: number): number => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(option, `must be a positive integer, got ${value}`);
  }
  return value;
};

// Later layers win: defaults, then each override in order
export function resolveConfig(...layers: Partial<EngineConfig>[]): EngineConfig {
  const merged = layers.reduce<EngineConfig>((acc, layer) => ({
    instructionRateHz: layer.instructionRateHz ?? acc.instructionRateHz,
    frameRateHz: layer.frameRateHz ?? acc.frameRateHz,
    beepFrequencyHz: layer.beepFrequencyHz ?? acc.beepFrequencyHz,
    gradientColoring: layer.gradientColoring ?? acc.gradientColoring,
    dropLateFrames: layer.dropLateFrames ?? acc.dropLateFrames,
  }), { ...DEFAULT_CONFIG });
  positiveInteger('instructionRateHz', merged.instructionRateHz);
  positiveInteger('frameRateHz', merged.frameRateHz);
  if (!Number.isFinite(merged.beepFrequencyHz) || merged.beepFrequencyHz <= 0) {
    throw new ConfigError('beepFrequencyHz', `must be a positive number, got ${merged.beepFrequencyHz}`);
  }
  return merged;
}
