import { describe, it, expect } from 'vitest';
import { Display, type DisplayView } from '@core/display/display';
import type { FrameReady } from '@core/system/scheduler';
import { CURSOR_HOME, TerminalRenderer, renderFrameText } from '@host/node/terminal';

function tinyView(width: number, height: number, lit: Array<[number, number]>): DisplayView {
  const on = new Set(lit.map(([x, y]) => `${x},${y}`));
  return {
    width,
    height,
    revision: 0,
    isSet: (x, y) => on.has(`${x},${y}`),
    frameBuffer: () => new Uint8Array(width * height),
  };
}

class Collect {
  chunks: string[] = [];
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

const frameOf = (display: DisplayView, frame: number): FrameReady => ({
  frame, display, delayTimer: 0, soundTimer: 0, beeping: false,
});

describe('terminal renderer', () => {
  it('packs two pixel rows into one line of half blocks', () => {
    const text = renderFrameText(tinyView(2, 2, [[0, 0]]), [1, 2, 3], [4, 5, 6]);
    expect(text).toBe('\x1b[38;2;1;2;3m\x1b[48;2;4;5;6m▀\x1b[38;2;4;5;6m▀\x1b[0m');
  });

  it('treats the row below an odd last row as unlit', () => {
    const text = renderFrameText(tinyView(1, 3, [[0, 1], [0, 2]]), [9, 9, 9], [0, 0, 0]);
    expect(text.split('\n')).toEqual([
      '\x1b[38;2;0;0;0m\x1b[48;2;9;9;9m▀\x1b[0m',
      '\x1b[38;2;9;9;9m\x1b[48;2;0;0;0m▀\x1b[0m',
    ]);
  });

  it('renders the full display as 16 lines', () => {
    expect(renderFrameText(new Display(), [255, 205, 230]).split('\n')).toHaveLength(16);
  });

  it('skips frames whose display did not change', () => {
    const out = new Collect();
    const d = new Display();
    const r = new TerminalRenderer(out, false);
    r.present(frameOf(d, 1));
    r.present(frameOf(d, 2));
    expect(out.chunks).toHaveLength(1);
    expect(out.chunks[0].startsWith(CURSOR_HOME)).toBe(true);
    d.drawSprite(0, 0, [0x80]);
    r.present(frameOf(d, 3));
    expect(out.chunks).toHaveLength(2);
  });

  it('redraws every frame in gradient mode', () => {
    const out = new Collect();
    const d = new Display();
    const r = new TerminalRenderer(out, true);
    r.present(frameOf(d, 1));
    r.present(frameOf(d, 2));
    expect(out.chunks).toHaveLength(2);
  });
});
