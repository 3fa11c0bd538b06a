import type { HeuristicSettings } from "../config.js";
import type { HeuristicSignal, HueMatch, RgbRaster } from "../types.js";
import { BORDER_HUE_RANGES, inHueRange, luminance, rgbToHsv } from "./color-space.js";

const round4 = (value: number) => Math.round(value * 10000) / 10000;
const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

export interface BandMask {
  indices: Uint32Array;
  thickness: number;
}

export function isConsistentRaster(raster: RgbRaster | null | undefined): raster is RgbRaster {
  return (
    raster !== null &&
    raster !== undefined &&
    Number.isInteger(raster.width) &&
    Number.isInteger(raster.height) &&
    raster.width > 0 &&
    raster.height > 0 &&
    raster.data.length === raster.width * raster.height * 3
  );
}

/**
 * Pixels near the image perimeter, excluding the centred rectangle that
 * usually holds the product.
 */
export function borderBand(width: number, height: number, settings: HeuristicSettings): BandMask {
  const shortest = Math.min(width, height);
  const thickness = Math.min(
    Math.ceil(shortest / 2),
    Math.max(settings.minBandPixels, Math.round(shortest * settings.bandThicknessRatio)),
  );

  const centerWidth = Math.floor(width * settings.centerExclusionRatio);
  const centerHeight = Math.floor(height * settings.centerExclusionRatio);
  const centerLeft = Math.floor((width - centerWidth) / 2);
  const centerTop = Math.floor((height - centerHeight) / 2);

  const indices: number[] = [];
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const nearEdge = x < thickness || y < thickness || x >= width - thickness || y >= height - thickness;
      if (!nearEdge) {
        continue;
      }
      const inCenter =
        x >= centerLeft && x < centerLeft + centerWidth && y >= centerTop && y < centerTop + centerHeight;
      if (!inCenter) {
        indices.push(y * width + x);
      }
    }
  }
  return { indices: Uint32Array.from(indices), thickness };
}

function matchHues(raster: RgbRaster, band: Uint32Array, settings: HeuristicSettings): HueMatch[] {
  const counts = new Array<number>(BORDER_HUE_RANGES.length).fill(0);
  for (const pixel of band) {
    const offset = pixel * 3;
    const hsv = rgbToHsv(raster.data[offset], raster.data[offset + 1], raster.data[offset + 2]);
    BORDER_HUE_RANGES.forEach((range, index) => {
      if (inHueRange(hsv, range)) {
        counts[index] += 1;
      }
    });
  }

  const matches: HueMatch[] = [];
  BORDER_HUE_RANGES.forEach((range, index) => {
    const fraction = counts[index] / band.length;
    if (fraction > settings.hueFractionFloor && fraction < settings.hueFractionCeiling) {
      matches.push({ name: range.name, fraction: round4(fraction) });
    }
  });
  return matches;
}

function luminancePlane(raster: RgbRaster): Float32Array {
  const plane = new Float32Array(raster.width * raster.height);
  for (let i = 0; i < plane.length; i += 1) {
    const offset = i * 3;
    plane[i] = luminance(raster.data[offset], raster.data[offset + 1], raster.data[offset + 2]);
  }
  return plane;
}

export function sobelMagnitude(plane: Float32Array, width: number, height: number, x: number, y: number): number {
  if (x <= 0 || y <= 0 || x >= width - 1 || y >= height - 1) {
    return 0;
  }
  const at = (dx: number, dy: number) => plane[(y + dy) * width + (x + dx)];
  const gx = at(1, -1) + 2 * at(1, 0) + at(1, 1) - at(-1, -1) - 2 * at(-1, 0) - at(-1, 1);
  const gy = at(-1, 1) + 2 * at(0, 1) + at(1, 1) - at(-1, -1) - 2 * at(0, -1) - at(1, -1);
  return Math.hypot(gx, gy);
}

function edgeRatio(raster: RgbRaster, band: Uint32Array, settings: HeuristicSettings): number {
  const plane = luminancePlane(raster);
  let edges = 0;
  for (const pixel of band) {
    const x = pixel % raster.width;
    const y = Math.floor(pixel / raster.width);
    if (sobelMagnitude(plane, raster.width, raster.height, x, y) >= settings.edgeMagnitudeThreshold) {
      edges += 1;
    }
  }
  return edges / band.length;
}

function describe(matches: HueMatch[], edges: number): string {
  const hues = matches.length
    ? `border hues ${matches.map((match) => `${match.name} ${(match.fraction * 100).toFixed(1)}%`).join(", ")}`
    : "no border hue";
  return `${hues}; edge ratio ${edges.toFixed(3)}`;
}

export function detectBorder(raster: RgbRaster | null, settings: HeuristicSettings): HeuristicSignal {
  if (!isConsistentRaster(raster)) {
    return { hasBorder: false, confidence: 0, explanation: "decode-failed", matchedHues: [], edgeRatio: 0 };
  }

  const band = borderBand(raster.width, raster.height, settings);
  if (band.indices.length === 0) {
    return { hasBorder: false, confidence: 0, explanation: "empty-band", matchedHues: [], edgeRatio: 0 };
  }

  const matches = matchHues(raster, band.indices, settings);
  const edges = round4(edgeRatio(raster, band.indices, settings));
  const colorScore = matches.reduce((sum, match) => sum + match.fraction, 0);
  const confidence = round4(clamp01(settings.colorWeight * colorScore + settings.edgeWeight * edges));

  return {
    hasBorder: confidence > settings.decisionThreshold,
    confidence,
    explanation: describe(matches, edges),
    matchedHues: matches,
    edgeRatio: edges,
  };
}
