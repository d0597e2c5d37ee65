import type { DisplayView } from '@core/display/display';
import type { FrameReady } from '@core/system/scheduler';
import { BG_COLOR, PixelColorizer, type Rgb } from './palette';

export interface TextSink {
  write(chunk: string): unknown;
}

const ESC = '\x1b[';
export const HIDE_CURSOR = `${ESC}?25l`;
export const SHOW_CURSOR = `${ESC}?25h`;
export const CLEAR_SCREEN = `${ESC}2J`;
export const CURSOR_HOME = `${ESC}H`;
export const RESET_ATTRS = `${ESC}0m`;

const fgCode = ([r, g, b]: Rgb) => `${ESC}38;2;${r};${g};${b}m`;
const bgCode = ([r, g, b]: Rgb) => `${ESC}48;2;${r};${g};${b}m`;

// Upper half block: foreground paints the top pixel, background the bottom one
const HALF_BLOCK = '▀';

/**
 * Text for one frame: each character cell covers two pixel rows.
 * Colour escapes are only emitted when the colour changes along a line.
 */
export function renderFrameText(view: DisplayView, on: Rgb, off: Rgb = BG_COLOR): string {
  const lines: string[] = [];
  for (let y = 0; y < view.height; y += 2) {
    let line = '';
    let lastFg: Rgb | null = null;
    let lastBg: Rgb | null = null;
    for (let x = 0; x < view.width; x++) {
      const top = view.isSet(x, y) ? on : off;
      const bottom = y + 1 < view.height && view.isSet(x, y + 1) ? on : off;
      if (top !== lastFg) { line += fgCode(top); lastFg = top; }
      if (bottom !== lastBg) { line += bgCode(bottom); lastBg = bottom; }
      line += HALF_BLOCK;
    }
    lines.push(line + RESET_ATTRS);
  }
  return lines.join('\n');
}

export class TerminalRenderer {
  private colorizer: PixelColorizer;
  private lastRevision = -1;

  constructor(private out: TextSink, private gradient: boolean) {
    this.colorizer = new PixelColorizer(gradient);
  }

  begin(): void {
    this.out.write(HIDE_CURSOR + CLEAR_SCREEN);
  }

  end(): void {
    this.out.write(RESET_ATTRS + SHOW_CURSOR + '\n');
  }

  // Unchanged frames are skipped unless the colour cycles every frame
  present(frame: FrameReady): void {
    if (!this.gradient && frame.display.revision === this.lastRevision) return;
    this.lastRevision = frame.display.revision;
    this.out.write(CURSOR_HOME + renderFrameText(frame.display, this.colorizer.next()));
  }
}
