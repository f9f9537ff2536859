import { crop, gaussianBlur, histogram, type Raster } from "./image.js";

export interface PieceSize {
  width: number;
  height: number;
}

const BLUR_RADIUS = 1.5;
const BAND_TOP = 0.2;
const BAND_BOTTOM = 0.85;
const DARK_SHARE = 0.3;
// Holes never sit in the leftmost third, where the piece starts
const LEFT_EXCLUSION = 0.33;
const MIN_EVIDENCE = 5;

function darkThreshold(band: Raster): number {
  const bins = histogram(band);
  const target = band.width * band.height * DARK_SHARE;
  let acc = 0;
  for (let value = 0; value < bins.length; value++) {
    acc += bins[value] ?? 0;
    if (acc >= target) return value;
  }
  return 128;
}

function darkColumnCounts(band: Raster, threshold: number): number[] {
  const counts = new Array<number>(band.width).fill(0);
  for (let y = 0; y < band.height; y++) {
    for (let x = 0; x < band.width; x++) {
      if ((band.data[y * band.width + x] ?? 255) < threshold) {
        counts[x] = (counts[x] ?? 0) + 1;
      }
    }
  }
  return counts;
}

function smooth(counts: readonly number[], window: number): number[] {
  return counts.map((_, i) => {
    const from = Math.max(0, i - window);
    const to = Math.min(counts.length, i + window + 1);
    let sum = 0;
    for (let j = from; j < to; j++) sum += counts[j] ?? 0;
    return sum / (to - from);
  });
}

/**
 * Locates a dark puzzle hole without the piece's texture.
 *
 * Blurs a grayscale copy, keeps the 20%..85% height band, marks the darkest
 * ~30% of it, and finds the column hump with the most dark pixels. Returns the
 * left edge of a piece-wide box centred on that hump, or null when the
 * evidence is too thin.
 */
export function detectHoleX(
  background: Raster,
  piece: PieceSize,
  options: { minX?: number | undefined; maxX?: number | undefined } = {},
): number | null {
  const { width: pw, height: ph } = piece;
  if (pw <= 0 || ph <= 0) return null;

  const blurred = gaussianBlur(background, BLUR_RADIUS);
  const { width, height } = blurred;
  const top = Math.max(0, Math.floor(height * BAND_TOP));
  const bottom = Math.min(height, Math.floor(height * BAND_BOTTOM));
  if (bottom <= top) return null;

  const band = crop(blurred, 0, top, width, bottom - top);
  const counts = darkColumnCounts(band, darkThreshold(band));
  const smoothed = smooth(counts, Math.max(5, Math.floor(pw / 10)));

  const xStart = Math.max(Math.max(0, Math.trunc(options.minX ?? 0)), Math.floor(width * LEFT_EXCLUSION));
  const xEnd = Math.min(width - 1, Math.trunc(options.maxX ?? width - 1));
  if (xStart > xEnd) return null;

  let first = xStart;
  for (let i = xStart + 1; i <= xEnd; i++) {
    if ((smoothed[i] ?? 0) > (smoothed[first] ?? 0)) first = i;
  }
  const peak = smoothed[first] ?? 0;
  if (peak < MIN_EVIDENCE) return null;

  // A plateau of equal maxima is centred rather than taken at its left end
  let last = first;
  while (last + 1 <= xEnd && smoothed[last + 1] === peak) last++;
  const centre = Math.floor((first + last) / 2);

  const left = Math.trunc(centre - pw / 2);
  return Math.max(0, Math.min(width - pw, left));
}
