import type { FrameDriver, PageDriver, Point, Pointer } from "../browser/driver.js";
import { toErrorMessage } from "../framework/errors.js";
import { noopLogger, type PrefixLogger } from "../framework/logging.js";
import { realPacing, type Pacing } from "../utils/pacing.js";

export interface DragPoint {
  x: number;
  y: number;
  delayMs: number;
}

export const DRAG_STEPS = { min: 18, max: 28 } as const;
export const DRAG_JITTER = { x: 1.2, y: 0.8 } as const;
const STEP_DELAY_MS = { min: 10, max: 30 } as const;

// Smoothstep: slow start, fast middle, slow finish
function ease(t: number): number {
  return t * t * (3 - 2 * t);
}

function between(random: () => number, low: number, high: number): number {
  return low + (high - low) * random();
}

/** Intermediate pointer positions after the press, ending near `end`. */
export function buildDragPath(start: Point, end: Point, random: () => number): DragPoint[] {
  const steps = DRAG_STEPS.min + Math.floor(random() * (DRAG_STEPS.max - DRAG_STEPS.min + 1));
  const path: DragPoint[] = [];
  for (let step = 1; step <= steps; step++) {
    const progress = ease(step / steps);
    path.push({
      x: start.x + (end.x - start.x) * progress + between(random, -DRAG_JITTER.x, DRAG_JITTER.x),
      y: start.y + (end.y - start.y) * progress + between(random, -DRAG_JITTER.y, DRAG_JITTER.y),
      delayMs: between(random, STEP_DELAY_MS.min, STEP_DELAY_MS.max),
    });
  }
  return path;
}

/** Press at `start`, walk the eased path, release. Coordinates are page-global. */
export async function humanDrag(
  pointer: Pointer,
  start: Point,
  end: Point,
  pacing: Pacing = realPacing,
): Promise<DragPoint[]> {
  const path = buildDragPath(start, end, pacing.random);
  await pointer.move(start.x, start.y);
  await pointer.down();
  for (const point of path) {
    await pointer.move(point.x, point.y);
    await pacing.sleep(point.delayMs);
  }
  await pointer.up();
  return path;
}

/**
 * Page-global position of the `<iframe>` whose content frame has the target's URL.
 * The main document, or a frame whose element cannot be found, maps to the origin.
 */
export async function frameOffset(
  page: PageDriver,
  frame: FrameDriver,
  log: PrefixLogger = noopLogger,
): Promise<Point> {
  const target = frame.url().trim();
  if (frame === page.mainFrame() || !target) return { x: 0, y: 0 };

  for (const element of await page.iframeElements()) {
    try {
      if ((await element.contentUrl())?.trim() !== target) continue;
      const box = await element.boundingBox();
      if (box) return { x: box.x, y: box.y };
    } catch (error) {
      log.warn("Could not read iframe element", { error: toErrorMessage(error) });
    }
  }
  log.warn("No iframe element for captcha frame, using page coordinates", { url: target });
  return { x: 0, y: 0 };
}

/** Offsets to try around the match, clamped to [minX, maxX], first occurrence kept. */
export function candidateOffsets(
  base: number,
  deltas: readonly number[],
  minX: number,
  maxX: number,
): number[] {
  const floor = Math.max(0, Math.ceil(minX));
  const ceiling = Math.max(floor, Math.floor(maxX));
  const seen = new Set<number>();
  for (const delta of deltas) {
    seen.add(Math.max(floor, Math.min(ceiling, Math.trunc(base + delta))));
  }
  return [...seen];
}
