import type { Box, ElementDriver, FrameDriver, PageDriver } from "../browser/driver.js";
import { isTargetClosed, toErrorMessage } from "../framework/errors.js";
import { noopDumper, type Dumper } from "../framework/dump.js";
import { noopLogger, type PrefixLogger } from "../framework/logging.js";
import { realPacing, uniform, type Pacing } from "../utils/pacing.js";
import { decodeImage } from "./decode.js";
import { candidateOffsets, frameOffset, humanDrag } from "./drag.js";
import type { Raster } from "./image.js";
import {
  anyCaptchaTitle,
  captchaStillPresent,
  captureFrameTree,
  findCaptchaFrame,
  hasLiveCaptchaFrame,
} from "./locator.js";
import { findSliderOffset, type MatchResult } from "./matcher.js";
import type { CaptchaSignatures } from "./signatures.js";

export interface CaptchaSelectors {
  container: string;
  background: string;
  piece: string;
  slider: string;
  /** Tried for the slider on the last element check only. */
  sliderAlternates: readonly string[];
}

export interface SolverOptions {
  selectors: CaptchaSelectors;
  signatures: CaptchaSignatures;
  minConfidence: number;
  maxAttempts: number;
  maxResubmits: number;
  dragDeltas: readonly number[];
}

export type CaptchaState =
  | "not_checked"
  | "no_captcha"
  | "captcha_present"
  | "solving"
  | "solved"
  | "failed";

export type AttemptFailure =
  | "elements_missing"
  | "screenshot_failed"
  | "decode_failed"
  | "geometry_missing"
  | "no_match"
  | "not_cleared"
  | "error";

export type AttemptResult =
  | { ok: true; match: MatchResult; usedOffset: number }
  | { ok: false; reason: AttemptFailure };

export type SolveOutcome =
  | { solved: true; state: "no_captcha" | "solved"; attempts: number; resubmits: number }
  | { solved: false; state: "failed"; attempts: number; resubmits: number; reason: string };

export interface SolverDeps {
  page: PageDriver;
  options: SolverOptions;
  pacing?: Pacing;
  log?: PrefixLogger;
  dumper?: Dumper;
  decode?: (bytes: Uint8Array) => Promise<Raster>;
}

const DETECT_CHECKS = 3;
const DETECT_WAIT_MS = 3000;
const DETECT_RETRY_MS = 1000;
const SETTLE_MS = 1000;
const ELEMENT_CHECKS = 3;
const ELEMENT_RETRY_MS = 500;
const ELEMENT_WAIT_MS = 5000;
const VERIFY_DELAY_MS = 350;
const ATTEMPT_BACKOFF_MS = { min: 800, max: 1400 } as const;
const RESUBMIT_COOLDOWN_MS = { min: 20_000, max: 40_000 } as const;

interface CaptchaElements {
  background: ElementDriver;
  piece: ElementDriver;
  slider: ElementDriver;
}

function centre(box: Box): { x: number; y: number } {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

/**
 * Detect, locate, match, drag and verify a slider captcha, with bounded
 * attempts and escalation to resubmitting the outer form.
 *
 * NOT_CHECKED → NO_CAPTCHA | CAPTCHA_PRESENT → SOLVING → SOLVED | FAILED
 */
export class CaptchaSolver {
  private stateValue: CaptchaState = "not_checked";
  private readonly page: PageDriver;
  private readonly options: SolverOptions;
  private readonly pacing: Pacing;
  private readonly log: PrefixLogger;
  private readonly dumper: Dumper;
  private readonly decode: (bytes: Uint8Array) => Promise<Raster>;

  constructor(deps: SolverDeps) {
    this.page = deps.page;
    this.options = deps.options;
    this.pacing = deps.pacing ?? realPacing;
    this.log = deps.log ?? noopLogger;
    this.dumper = deps.dumper ?? noopDumper;
    this.decode = deps.decode ?? decodeImage;
  }

  get state(): CaptchaState {
    return this.stateValue;
  }

  /** The captcha frame when one is found, else the main document. */
  private async resolveRoot(): Promise<{ root: FrameDriver; inFrame: boolean }> {
    const selection = await findCaptchaFrame(this.page, this.options.signatures, this.log);
    if (selection.found && !selection.frame.isMain) {
      return { root: selection.frame.frame, inFrame: true };
    }
    return { root: this.page.mainFrame(), inFrame: false };
  }

  private async containerPresent(): Promise<boolean> {
    const { root } = await this.resolveRoot();
    const container = root.locate(this.options.selectors.container);
    try {
      await container.waitFor("attached", DETECT_WAIT_MS);
    } catch (error) {
      this.log.log("Captcha container not attached yet", { error: toErrorMessage(error) });
    }
    return (await container.count()) > 0;
  }

  /** Element polling first, then page and frame titles. */
  async detect(): Promise<boolean> {
    for (let check = 1; check <= DETECT_CHECKS; check++) {
      try {
        if (await this.containerPresent()) {
          this.log.log("Captcha container found", { check });
          this.stateValue = "captcha_present";
          return true;
        }
      } catch (error) {
        if (isTargetClosed(error)) throw error;
        this.log.log("Captcha check failed", { check, error: toErrorMessage(error) });
      }
      if (check < DETECT_CHECKS) await this.pacing.sleep(DETECT_RETRY_MS);
    }

    const tree = await captureFrameTree(this.page, this.options.signatures, this.log);
    const titled = anyCaptchaTitle(tree, this.options.signatures);
    if (titled) {
      this.log.log("Captcha title found", { title: titled.title ?? "", url: titled.url });
      this.stateValue = "captcha_present";
      return true;
    }

    this.log.log("No captcha after all checks");
    this.stateValue = "no_captcha";
    await this.dumper.page(this.page, "captcha_not_visible");
    return false;
  }

  async solveIfNeeded(): Promise<SolveOutcome> {
    if (!(await this.detect())) {
      return { solved: true, state: "no_captcha", attempts: 0, resubmits: 0 };
    }

    const { maxAttempts } = this.options;
    this.stateValue = "solving";
    let last: AttemptFailure = "error";
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.log.log("Solving captcha", { attempt: `${attempt.toString()}/${maxAttempts.toString()}` });
      const result = await this.attempt();
      if (result.ok) {
        this.log.success("Captcha solved", { attempt, offset: result.usedOffset });
        this.stateValue = "solved";
        return { solved: true, state: "solved", attempts: attempt, resubmits: 0 };
      }
      last = result.reason;
      if (attempt < maxAttempts) {
        await this.pacing.sleep(uniform(this.pacing, ATTEMPT_BACKOFF_MS.min, ATTEMPT_BACKOFF_MS.max));
      }
    }

    this.log.error("Captcha not solved", { attempts: maxAttempts, reason: last });
    this.stateValue = "failed";
    return { solved: false, state: "failed", attempts: maxAttempts, resubmits: 0, reason: last };
  }

  private async countAll(elements: CaptchaElements): Promise<[number, number, number]> {
    return [
      await elements.background.count(),
      await elements.piece.count(),
      await elements.slider.count(),
    ];
  }

  private async alternateSlider(root: FrameDriver): Promise<ElementDriver | null> {
    for (const selector of this.options.selectors.sliderAlternates) {
      if (selector === this.options.selectors.slider) continue;
      const candidate = root.locate(selector);
      try {
        if ((await candidate.count()) > 0) {
          this.log.log("Slider found by alternate selector", { selector });
          return candidate;
        }
      } catch (error) {
        this.log.warn("Alternate slider check failed", { selector, error: toErrorMessage(error) });
      }
    }
    return null;
  }

  // Elements attach asynchronously; a few quick count checks, then one long wait
  private async awaitElements(root: FrameDriver): Promise<CaptchaElements | null> {
    const { selectors } = this.options;
    const elements: CaptchaElements = {
      background: root.locate(selectors.background),
      piece: root.locate(selectors.piece),
      slider: root.locate(selectors.slider),
    };

    for (let check = 1; check <= ELEMENT_CHECKS; check++) {
      try {
        const [bg, piece, initialSlider] = await this.countAll(elements);
        let slider = initialSlider;
        this.log.log("Captcha elements", { check, bg, piece, slider });
        if (slider === 0 && check === ELEMENT_CHECKS) {
          const alternate = await this.alternateSlider(root);
          if (alternate) {
            elements.slider = alternate;
            slider = 1;
          }
        }
        if (bg > 0 && piece > 0 && slider > 0) return elements;
      } catch (error) {
        if (isTargetClosed(error)) throw error;
        this.log.warn("Element check failed", { check, error: toErrorMessage(error) });
      }
      if (check < ELEMENT_CHECKS) await this.pacing.sleep(ELEMENT_RETRY_MS);
    }

    try {
      await elements.background.waitFor("attached", ELEMENT_WAIT_MS);
      await elements.piece.waitFor("attached", ELEMENT_WAIT_MS);
      await elements.slider.waitFor("attached", ELEMENT_WAIT_MS);
      return elements;
    } catch (error) {
      if (isTargetClosed(error)) throw error;
      this.log.warn("Captcha elements never attached", { error: toErrorMessage(error) });
      return null;
    }
  }

  private async capture(
    elements: CaptchaElements,
  ): Promise<{ ok: true; background: Raster; piece: Raster } | { ok: false; reason: AttemptFailure }> {
    let bgBytes: Buffer;
    let pieceBytes: Buffer;
    try {
      bgBytes = await elements.background.screenshot();
      pieceBytes = await elements.piece.screenshot();
    } catch (error) {
      if (isTargetClosed(error)) throw error;
      this.log.warn("Element screenshot failed", { error: toErrorMessage(error) });
      return { ok: false, reason: "screenshot_failed" };
    }
    await this.dumper.image("captcha_bg", bgBytes);
    await this.dumper.image("captcha_piece", pieceBytes);

    try {
      return {
        ok: true,
        background: await this.decode(bgBytes),
        piece: await this.decode(pieceBytes),
      };
    } catch (error) {
      this.log.warn("Screenshot decode failed", { error: toErrorMessage(error) });
      return { ok: false, reason: "decode_failed" };
    }
  }

  /**
   * One locate → match → drag → verify pass. Drags a few candidates around the
   * matched offset and stops at the first one after which no captcha-looking
   * frame still shows the slider.
   */
  async attempt(): Promise<AttemptResult> {
    try {
      return await this.runAttempt();
    } catch (error) {
      if (isTargetClosed(error)) throw error;
      this.log.warn("Captcha attempt failed", { error: toErrorMessage(error) });
      return { ok: false, reason: "error" };
    }
  }

  private async runAttempt(): Promise<AttemptResult> {
    const { root, inFrame } = await this.resolveRoot();
    await this.pacing.sleep(SETTLE_MS);

    const elements = await this.awaitElements(root);
    if (!elements) {
      await this.dumper.page(this.page, "captcha_elements_not_found");
      return { ok: false, reason: "elements_missing" };
    }

    const images = await this.capture(elements);
    if (!images.ok) return images;

    const sliderBox = await elements.slider.boundingBox();
    const bgBox = await elements.background.boundingBox();
    if (!sliderBox || !bgBox) {
      this.log.warn("Captcha element has no box", { slider: Boolean(sliderBox), bg: Boolean(bgBox) });
      return { ok: false, reason: "geometry_missing" };
    }

    const pieceWidth = images.piece.width;
    // Never probe left of where the slider rests
    const minX = Math.floor(Math.max(0, sliderBox.x - bgBox.x));
    const maxX = Math.floor(bgBox.width - pieceWidth);
    const match = findSliderOffset(images.background, images.piece, {
      minConfidence: this.options.minConfidence,
      minX,
      maxX,
    });
    if (!match) {
      this.log.warn("No offset found", { minX, maxX });
      await this.dumper.page(this.page, "captcha_no_match");
      return { ok: false, reason: "no_match" };
    }
    this.log.log("Offset found", {
      offset: match.offsetX,
      confidence: match.confidence.toFixed(2),
      method: match.method,
    });

    const offset = inFrame ? await frameOffset(this.page, root, this.log) : { x: 0, y: 0 };
    const handle = centre(sliderBox);
    const start = { x: handle.x + offset.x, y: handle.y + offset.y };

    const candidates = candidateOffsets(match.offsetX, this.options.dragDeltas, minX, maxX);
    for (const [index, used] of candidates.entries()) {
      const target = { x: bgBox.x + used + pieceWidth / 2 + offset.x, y: start.y };
      this.log.log("Dragging", { candidate: index + 1, offset: used });
      await humanDrag(this.page.pointer, start, target, this.pacing);
      await this.pacing.sleep(VERIFY_DELAY_MS);

      const tree = await captureFrameTree(this.page, this.options.signatures, this.log);
      if (!captchaStillPresent(tree, this.options.signatures)) {
        return { ok: true, match, usedOffset: used };
      }
    }
    return { ok: false, reason: "not_cleared" };
  }

  /**
   * Runs up to `maxResubmits` solve rounds. Between rounds, when only the
   * template frame ever appeared, waits 20-40s and resubmits the outer form.
   * A live popup that could not be solved ends the escalation.
   */
  async solveWithEscalation(resubmit: () => Promise<void>): Promise<SolveOutcome> {
    const rounds = Math.max(1, this.options.maxResubmits);
    let attempts = 0;
    let outcome: SolveOutcome | null = null;

    for (let round = 1; round <= rounds; round++) {
      const result = await this.solveIfNeeded();
      attempts += result.attempts;
      const resubmits = round - 1;
      if (result.solved) return { ...result, attempts, resubmits };
      outcome = { ...result, attempts, resubmits };

      const tree = await captureFrameTree(this.page, this.options.signatures, this.log);
      if (hasLiveCaptchaFrame(tree, this.options.signatures)) {
        this.log.warn("Live captcha frame present but not solved");
        break;
      }
      if (round === rounds) break;

      const cooldown = uniform(this.pacing, RESUBMIT_COOLDOWN_MS.min, RESUBMIT_COOLDOWN_MS.max);
      this.log.log("Captcha popup never loaded, resubmitting", {
        waitSec: (cooldown / 1000).toFixed(1),
        round: `${round.toString()}/${rounds.toString()}`,
      });
      await this.pacing.sleep(cooldown);
      try {
        await resubmit();
      } catch (error) {
        if (isTargetClosed(error)) throw error;
        this.log.warn("Resubmit failed", { error: toErrorMessage(error) });
        break;
      }
    }

    return (
      outcome ?? { solved: false, state: "failed", attempts, resubmits: 0, reason: "not_attempted" }
    );
  }
}
