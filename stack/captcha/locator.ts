import type { FrameDriver, PageDriver } from "../browser/driver.js";
import { toErrorMessage } from "../framework/errors.js";
import { noopLogger, type PrefixLogger } from "../framework/logging.js";
import { titleLooksLikeCaptcha, type CaptchaSignatures } from "./signatures.js";

/** One frame of the page as seen at capture time. */
export interface FrameSnapshot {
  index: number;
  isMain: boolean;
  url: string;
  name: string;
  /** null when reading the title threw. */
  title: string | null;
  /** Marker selectors present in the DOM, visible or not. */
  presence: ReadonlySet<string>;
  /** false when a DOM query threw; presence is then incomplete. */
  domReadable: boolean;
  frame: FrameDriver;
}

export interface FrameCandidate {
  url: string;
  name: string;
  score: number;
  presence: ReadonlySet<string>;
  snapshot: FrameSnapshot;
}

export type FrameSelection =
  | { found: true; frame: FrameSnapshot; score: number; via: "score" | "url" | "title" }
  | { found: false; bestScore: number };

function markerSelectors(signatures: CaptchaSignatures): string[] {
  const selectors = signatures.markers.map((marker) => marker.selector);
  for (const live of signatures.liveMarkers) {
    if (!selectors.includes(live)) selectors.push(live);
  }
  return selectors;
}

async function readTitle(frame: FrameDriver): Promise<string | null> {
  try {
    return await frame.title();
  } catch {
    return null;
  }
}

async function snapshotFrame(
  frame: FrameDriver,
  index: number,
  isMain: boolean,
  selectors: readonly string[],
  log: PrefixLogger,
): Promise<FrameSnapshot> {
  const presence = new Set<string>();
  let domReadable = true;
  try {
    for (const selector of selectors) {
      if ((await frame.locate(selector).count()) > 0) presence.add(selector);
    }
  } catch (error) {
    domReadable = false;
    log.warn("Frame DOM not readable", { index, error: toErrorMessage(error) });
  }
  return {
    index,
    isMain,
    url: frame.url(),
    name: frame.name(),
    title: await readTitle(frame),
    presence,
    domReadable,
    frame,
  };
}

/** Snapshot of every frame, main document first. Frames that throw are skipped. */
export async function captureFrameTree(
  page: PageDriver,
  signatures: CaptchaSignatures,
  log: PrefixLogger = noopLogger,
): Promise<FrameSnapshot[]> {
  const selectors = markerSelectors(signatures);
  const main = page.mainFrame();
  const tree: FrameSnapshot[] = [];
  for (const [index, frame] of page.frames().entries()) {
    try {
      tree.push(await snapshotFrame(frame, index, frame === main, selectors, log));
    } catch (error) {
      log.warn("Skipping frame", { index, error: toErrorMessage(error) });
    }
  }
  return tree;
}

export function scoreFrame(snapshot: FrameSnapshot, signatures: CaptchaSignatures): number {
  let score = 0;
  for (const { fragment, weight } of signatures.urlWeights) {
    if (snapshot.url.includes(fragment)) score += weight;
  }
  for (const { name, weight } of signatures.nameWeights) {
    if (snapshot.name === name) score += weight;
  }
  for (const { selector, weight } of signatures.markers) {
    if (snapshot.presence.has(selector)) score += weight;
  }
  return score;
}

export function scoreFrames(
  tree: readonly FrameSnapshot[],
  signatures: CaptchaSignatures,
): FrameCandidate[] {
  return tree.map((snapshot) => ({
    url: snapshot.url,
    name: snapshot.name,
    score: scoreFrame(snapshot, signatures),
    presence: snapshot.presence,
    snapshot,
  }));
}

function matchesFallbackUrl(snapshot: FrameSnapshot, signatures: CaptchaSignatures): boolean {
  const lower = snapshot.url.toLowerCase();
  return signatures.fallbackUrlFragments.some((fragment) => lower.includes(fragment.toLowerCase()));
}

/**
 * Picks the frame hosting the live widget.
 *
 * The highest score wins (first frame on ties) once it reaches the threshold.
 * Below that, a captcha-looking URL with a captcha title, an empty title or an
 * unreadable one is accepted, and finally any frame whose title carries the
 * strict title fragment.
 */
export function selectCaptchaFrame(
  tree: readonly FrameSnapshot[],
  signatures: CaptchaSignatures,
): FrameSelection {
  let best: FrameCandidate | null = null;
  for (const candidate of scoreFrames(tree, signatures)) {
    if (!best || candidate.score > best.score) best = candidate;
  }
  if (best && best.score >= signatures.threshold) {
    return { found: true, frame: best.snapshot, score: best.score, via: "score" };
  }
  const bestScore = best?.score ?? 0;

  const byUrl = tree.find(
    (snapshot) =>
      matchesFallbackUrl(snapshot, signatures) &&
      (snapshot.title === null ||
        snapshot.title === "" ||
        titleLooksLikeCaptcha(snapshot.title, signatures)),
  );
  if (byUrl) return { found: true, frame: byUrl, score: bestScore, via: "url" };

  const byTitle = tree.find((snapshot) =>
    (snapshot.title ?? "").includes(signatures.strictTitleFragment),
  );
  if (byTitle) return { found: true, frame: byTitle, score: bestScore, via: "title" };

  return { found: false, bestScore };
}

export async function findCaptchaFrame(
  page: PageDriver,
  signatures: CaptchaSignatures,
  log: PrefixLogger = noopLogger,
): Promise<FrameSelection> {
  const tree = await captureFrameTree(page, signatures, log);
  const selection = selectCaptchaFrame(tree, signatures);
  if (selection.found) {
    log.log("Captcha frame selected", {
      via: selection.via,
      score: selection.score,
      name: selection.frame.name,
      url: selection.frame.url,
    });
  } else {
    log.log("No captcha frame", { frames: tree.length, bestScore: selection.bestScore });
  }
  return selection;
}

function looksLikeCaptchaFrame(snapshot: FrameSnapshot, signatures: CaptchaSignatures): boolean {
  const lower = snapshot.url.toLowerCase();
  return (
    signatures.captchaUrlFragments.some((fragment) => lower.includes(fragment)) ||
    (snapshot.title ?? "").includes(signatures.strictTitleFragment)
  );
}

/**
 * True while any captcha-looking frame still carries a live slider marker.
 * Checks the whole tree: the widget may re-initialise into a new frame after a drag.
 */
export function captchaStillPresent(
  tree: readonly FrameSnapshot[],
  signatures: CaptchaSignatures,
): boolean {
  return tree.some(
    (snapshot) =>
      looksLikeCaptchaFrame(snapshot, signatures) &&
      signatures.liveMarkers.some((marker) => snapshot.presence.has(marker)),
  );
}

/** The popup frame has loaded, as opposed to only the static template frame. */
export function hasLiveCaptchaFrame(
  tree: readonly FrameSnapshot[],
  signatures: CaptchaSignatures,
): boolean {
  const fragment = signatures.liveUrlFragment.toLowerCase();
  return tree.some((snapshot) => snapshot.url.toLowerCase().includes(fragment));
}

export function anyCaptchaTitle(
  tree: readonly FrameSnapshot[],
  signatures: CaptchaSignatures,
): FrameSnapshot | undefined {
  return tree.find(
    (snapshot) => snapshot.title !== null && titleLooksLikeCaptcha(snapshot.title, signatures),
  );
}
