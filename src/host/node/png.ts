import fs from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { PNG } from 'pngjs';
import type { DisplayView } from '@core/display/display';
import { BG_COLOR, PIXEL_COLOR, type Rgb } from './palette';

export function displayToPng(view: DisplayView, scale = 8, fg: Rgb = PIXEL_COLOR, bg: Rgb = BG_COLOR): PNG {
  if (!Number.isInteger(scale) || scale < 1) throw new RangeError(`scale must be a positive integer, got ${scale}`);
  const W = view.width * scale, H = view.height * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < view.height; y++) {
    for (let x = 0; x < view.width; x++) {
      const [r, g, b] = view.isSet(x, y) ? fg : bg;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + x * scale + dx) << 2;
          png.data[o + 0] = r;
          png.data[o + 1] = g;
          png.data[o + 2] = b;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return png;
}

export async function writePng(outPath: string, png: PNG): Promise<void> {
  await writeEncoded(outPath, png.pack());
}

// Streams already-encoded bytes to disk; fails on an error from either side
export async function writeEncoded(outPath: string, encoded: Readable): Promise<void> {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    encoded.on('error', (e) => {
      stream.destroy();
      reject(e);
    });
    encoded.pipe(stream);
  });
}
