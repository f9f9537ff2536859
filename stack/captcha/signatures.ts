export interface WeightedFragment {
  fragment: string;
  weight: number;
}

export interface WeightedName {
  name: string;
  weight: number;
}

export interface WeightedMarker {
  selector: string;
  weight: number;
}

/**
 * What the live slider widget looks like in the frame tree. The decoy
 * template frame shares the title but not the popup URL or the slider DOM.
 */
export interface CaptchaSignatures {
  urlWeights: readonly WeightedFragment[];
  /** Exact frame names. */
  nameWeights: readonly WeightedName[];
  markers: readonly WeightedMarker[];
  threshold: number;
  /** Case-insensitive URL fragments for the first fallback. */
  fallbackUrlFragments: readonly string[];
  /** Title fragments for the first fallback; matched case-insensitively. */
  titleFragments: readonly string[];
  /** Title fragment for the last fallback; matched exactly. */
  strictTitleFragment: string;
  /** URL fragment of the popup frame that hosts the interactive widget. */
  liveUrlFragment: string;
  /** URL fragments of frames worth re-checking after a drag. */
  captchaUrlFragments: readonly string[];
  /** Any one of these in a captcha-like frame means the widget is still up. */
  liveMarkers: readonly string[];
}

export const TENCENT_SIGNATURES: CaptchaSignatures = {
  urlWeights: [
    { fragment: "cap_union_new_show", weight: 50 },
    { fragment: "turing.captcha", weight: 10 },
  ],
  nameWeights: [{ name: "tcaptcha_iframe", weight: 40 }],
  markers: [
    { selector: "#slideBgWrap", weight: 40 },
    { selector: "#slideBg", weight: 15 },
    { selector: "#slideBlock", weight: 20 },
    { selector: "#tcaptcha_drag_thumb", weight: 20 },
    { selector: "#tcaptcha_drag_button", weight: 10 },
    { selector: "[id*='drag'], [class*='drag']", weight: 5 },
  ],
  threshold: 30,
  fallbackUrlFragments: ["turing.captcha", "captcha"],
  titleFragments: ["验证码", "captcha"],
  strictTitleFragment: "验证码",
  liveUrlFragment: "cap_union_new_show",
  captchaUrlFragments: ["cap_union_new_show", "turing.captcha"],
  liveMarkers: ["#tcaptcha_drag_thumb", "#tcaptcha_drag_button", "#slideBlock", "#slideBgWrap"],
};

export function titleLooksLikeCaptcha(title: string, signatures: CaptchaSignatures): boolean {
  const lower = title.toLowerCase();
  return signatures.titleFragments.some((fragment) => lower.includes(fragment.toLowerCase()));
}
