import { alphaMask, findEdges, toRgb, type Raster } from "./image.js";
import { detectHoleX } from "./hole.js";

export interface MatchResult {
  offsetX: number;
  offsetY: number;
  /** Lower is better. */
  score: number;
  /** How far the winner beats the runner-up, in [0, 1]. */
  confidence: number;
  method: "template" | "hole";
}

export interface MatchOptions {
  minConfidence?: number;
  /** Inclusive search window for the left edge of the piece. */
  minX?: number;
  maxX?: number;
}

export const DEFAULT_MIN_CONFIDENCE = 0.15;
const FALLBACK_CONFIDENCE_FLOOR = 0.2;
const EDGE_WEIGHT = 0.7;
const COLOR_WEIGHT = 0.3;

interface Prepared {
  bgEdges: Uint8Array;
  bgRgb: Uint8Array;
  pieceEdges: Uint8Array;
  pieceRgb: Uint8Array;
  mask: Uint8Array | null;
}

function prepare(background: Raster, piece: Raster): Prepared {
  return {
    bgEdges: findEdges(background).data,
    bgRgb: toRgb(background).data,
    pieceEdges: findEdges(piece).data,
    pieceRgb: toRgb(piece).data,
    mask: alphaMask(piece)?.data ?? null,
  };
}

// Sum of absolute edge differences over the piece interior, weighted by alpha when present
function edgeScore(p: Prepared, bgWidth: number, pw: number, ph: number, x: number, y: number): number {
  let total = 0;
  for (let py = 1; py < ph - 1; py++) {
    const bgRow = (y + py) * bgWidth + x;
    const pieceRow = py * pw;
    for (let px = 1; px < pw - 1; px++) {
      const diff = Math.abs((p.bgEdges[bgRow + px] ?? 0) - (p.pieceEdges[pieceRow + px] ?? 0));
      total += p.mask ? Math.floor((diff * (p.mask[pieceRow + px] ?? 0)) / 255) : diff;
    }
  }
  return total;
}

// Mean over R, G and B of the mean absolute difference
function colorScore(p: Prepared, bgWidth: number, pw: number, ph: number, x: number, y: number): number {
  let total = 0;
  for (let py = 0; py < ph; py++) {
    const bgRow = ((y + py) * bgWidth + x) * 3;
    const pieceRow = py * pw * 3;
    for (let i = 0; i < pw * 3; i++) {
      total += Math.abs((p.bgRgb[bgRow + i] ?? 0) - (p.pieceRgb[pieceRow + i] ?? 0));
    }
  }
  return total / (pw * ph * 3);
}

function confidenceOf(best: number, second: number): number {
  if (second <= 0 || !Number.isFinite(second)) return 1;
  return Math.max(0, Math.min(1, 1 - best / second));
}

/**
 * Exhaustive template search for the piece inside the background.
 *
 * Every top-left position with x in [minX, maxX] and any valid y is scored as
 * 0.7 * edge difference + 0.3 * colour difference. A flat score landscape gives
 * low confidence; below `minConfidence` the dark-hole detector takes over.
 * Returns null when the piece does not fit, the window is empty, or neither
 * strategy finds a position.
 */
export function findSliderOffset(
  background: Raster,
  piece: Raster,
  options: MatchOptions = {},
): MatchResult | null {
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  const { width: bgWidth, height: bgHeight } = background;
  const { width: pw, height: ph } = piece;

  if (pw <= 0 || ph <= 0 || pw > bgWidth || ph > bgHeight) return null;

  const xStart = Math.max(0, Math.trunc(options.minX ?? 0));
  const xEnd = Math.min(bgWidth - pw, Math.trunc(options.maxX ?? bgWidth - pw));
  if (xStart > xEnd) return null;

  const prepared = prepare(background, piece);
  let bestX = xStart;
  let bestY = 0;
  let best = Number.POSITIVE_INFINITY;
  let second = Number.POSITIVE_INFINITY;

  for (let y = 0; y <= bgHeight - ph; y++) {
    for (let x = xStart; x <= xEnd; x++) {
      const score =
        EDGE_WEIGHT * edgeScore(prepared, bgWidth, pw, ph, x, y) +
        COLOR_WEIGHT * colorScore(prepared, bgWidth, pw, ph, x, y);
      if (score < best) {
        second = best;
        best = score;
        bestX = x;
        bestY = y;
      } else if (score < second) {
        second = score;
      }
    }
  }

  const confidence = confidenceOf(best, second);
  if (confidence >= minConfidence) {
    return { offsetX: bestX, offsetY: bestY, score: best, confidence, method: "template" };
  }

  const holeX = detectHoleX(
    background,
    { width: pw, height: ph },
    { minX: options.minX, maxX: options.maxX },
  );
  if (holeX === null) return null;
  return {
    offsetX: holeX,
    offsetY: bestY,
    score: best,
    confidence: Math.max(minConfidence, FALLBACK_CONFIDENCE_FLOOR),
    method: "hole",
  };
}
