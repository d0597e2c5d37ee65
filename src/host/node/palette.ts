export type Rgb = [number, number, number];

export const BG_COLOR: Rgb = [74, 74, 74];
export const PIXEL_COLOR: Rgb = [255, 205, 230];

// Gradient mode: hue advances one degree per rendered frame
export const GRADIENT_SATURATION = 0.2;
export const GRADIENT_VALUE = 1.0;

export function rgbFromHsv(hue: number, saturation: number, value: number): Rgb {
  const h = ((hue % 360) + 360) % 360;
  const c = value * saturation;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = value - c;
  let rgb: Rgb;
  if (h < 60) rgb = [c, x, 0];
  else if (h < 120) rgb = [x, c, 0];
  else if (h < 180) rgb = [0, c, x];
  else if (h < 240) rgb = [0, x, c];
  else if (h < 300) rgb = [x, 0, c];
  else rgb = [c, 0, x];
  return [
    Math.round((rgb[0] + m) * 255),
    Math.round((rgb[1] + m) * 255),
    Math.round((rgb[2] + m) * 255),
  ];
}

export class PixelColorizer {
  private hue = 0;

  constructor(private gradient: boolean) {}

  // Colour for the next rendered frame
  next(): Rgb {
    if (!this.gradient) return PIXEL_COLOR;
    this.hue = (this.hue + 1) % 360;
    return rgbFromHsv(this.hue, GRADIENT_SATURATION, GRADIENT_VALUE);
  }
}
