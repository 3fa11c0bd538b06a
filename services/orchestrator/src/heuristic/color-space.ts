export interface Hsv {
  /** 0..180, half-degrees. */
  h: number;
  s: number;
  v: number;
}

export interface HueRange {
  name: string;
  hue: [number, number];
  minSaturation: number;
  minValue: number;
}

// Overlapping ranges are intentional; fractions are summed and clamped by the caller.
export const BORDER_HUE_RANGES: readonly HueRange[] = [
  { name: "blue", hue: [90, 130], minSaturation: 30, minValue: 30 },
  { name: "deep-blue", hue: [100, 140], minSaturation: 50, minValue: 50 },
  { name: "cyan", hue: [75, 105], minSaturation: 30, minValue: 30 },
  { name: "red", hue: [0, 10], minSaturation: 50, minValue: 50 },
  { name: "red-wrap", hue: [170, 180], minSaturation: 50, minValue: 50 },
  { name: "green", hue: [35, 85], minSaturation: 50, minValue: 50 },
  { name: "yellow", hue: [15, 45], minSaturation: 50, minValue: 50 },
  { name: "magenta", hue: [125, 175], minSaturation: 50, minValue: 50 },
  { name: "orange", hue: [5, 25], minSaturation: 50, minValue: 50 },
];

export function rgbToHsv(r: number, g: number, b: number): Hsv {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;

  const s = max === 0 ? 0 : Math.round((255 * delta) / max);
  if (delta === 0) {
    return { h: 0, s, v: max };
  }

  let degrees: number;
  if (max === r) {
    degrees = (60 * (g - b)) / delta;
  } else if (max === g) {
    degrees = 120 + (60 * (b - r)) / delta;
  } else {
    degrees = 240 + (60 * (r - g)) / delta;
  }
  if (degrees < 0) {
    degrees += 360;
  }
  return { h: Math.round(degrees / 2), s, v: max };
}

export function inHueRange(hsv: Hsv, range: HueRange): boolean {
  return (
    hsv.h >= range.hue[0] &&
    hsv.h <= range.hue[1] &&
    hsv.s >= range.minSaturation &&
    hsv.v >= range.minValue
  );
}

export function luminance(r: number, g: number, b: number): number {
  return 0.299 * r + 0.587 * g + 0.114 * b;
}
