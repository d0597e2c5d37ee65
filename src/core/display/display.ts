export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;
export const SPRITE_WIDTH = 8;

// What renderers get to see: no way to mutate pixels through it
export interface DisplayView {
  readonly width: number;
  readonly height: number;
  readonly revision: number;
  isSet(x: number, y: number): boolean;
  frameBuffer(): Uint8Array;
}

export class Display implements DisplayView {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  private rev = 0;

  get revision(): number { return this.rev; }

  clear(): void {
    this.pixels.fill(0);
    this.rev++;
  }

  /**
   * XORs an 8-pixel-wide sprite onto the grid, one byte per row (MSB is the leftmost pixel).
   * The origin is taken modulo the grid size and every pixel wraps on its own.
   * Returns true when any lit pixel was turned off.
   */
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    const x0 = x % DISPLAY_WIDTH;
    const y0 = y % DISPLAY_HEIGHT;
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row] & 0xFF;
      if (bits === 0) continue;
      const py = (y0 + row) % DISPLAY_HEIGHT;
      for (let col = 0; col < SPRITE_WIDTH; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const idx = py * DISPLAY_WIDTH + ((x0 + col) % DISPLAY_WIDTH);
        if (this.pixels[idx] === 1) collision = true;
        this.pixels[idx] ^= 1;
      }
    }
    this.rev++;
    return collision;
  }

  isSet(x: number, y: number): boolean {
    return this.pixels[(y % DISPLAY_HEIGHT) * DISPLAY_WIDTH + (x % DISPLAY_WIDTH)] === 1;
  }

  // Copy of the grid, one byte (0/1) per pixel, row-major
  frameBuffer(): Uint8Array {
    return this.pixels.slice();
  }
}
