import { describe, it, expect } from 'vitest';
import { UsageError, parseCliArgs } from '@host/node/args';

describe('parseCliArgs', () => {
  it('collects short and long options', () => {
    const args = parseCliArgs(['-c', '700', '--framerate=30', '-v', '440', '-g', 'game.ch8']);
    expect(args.romPath).toBe('game.ch8');
    expect(args.config).toEqual({
      instructionRateHz: 700,
      frameRateHz: 30,
      beepFrequencyHz: 440,
      gradientColoring: true,
    });
  });

  it('leaves unspecified options out', () => {
    expect(parseCliArgs(['rom.ch8']).config).toEqual({});
  });

  it('reads --drop-late-frames and --key-hold', () => {
    const args = parseCliArgs(['--drop-late-frames', '--key-hold', '4', 'rom.ch8']);
    expect(args.config.dropLateFrames).toBe(true);
    expect(args.keyHoldFrames).toBe(4);
  });

  it('does not need a ROM for --help or --version', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
    expect(parseCliArgs(['-V']).version).toBe(true);
  });

  it.each([
    [[], 'missing ROM path'],
    [['-x', 'rom.ch8'], 'unknown option -x'],
    [['rom.ch8', '-c'], '-c needs a value'],
    [['-c', 'abc', 'rom.ch8'], '-c: expected a number, got "abc"'],
    [['a.ch8', 'b.ch8'], 'unexpected argument b.ch8'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrowError(UsageError);
    expect(() => parseCliArgs(argv)).toThrowError(message);
  });
});
