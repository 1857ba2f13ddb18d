import type {
  BoundingBox,
  CtaAppearance,
  ExtractorOptions,
  OcrFrameRecord,
  OcrMarkers,
  OcrTextElement,
  TextMoment,
  TextPosition,
  TextSize,
  VideoMetadata,
} from "../types";
import { CTA_KEYWORDS } from "../vocabulary";
import { clamp, earliest, matchesKeyword, round2, truncateText } from "../utils";
import { CTA_LIMITS, HOOK_LIMITS, WindowedExtractor, addDensity, emptyDensity } from "./windows";

const DEFAULT_CONFIDENCE = 0.5;

/**
 * Text overlays: every region in the hook window becomes a text moment,
 * regions in the CTA window are kept only when they read as a call to action.
 * Frame timestamps come from the frame filename (`frame_0004_t2.00.jpg`).
 */
export class OcrExtractor extends WindowedExtractor<readonly OcrFrameRecord[], OcrMarkers> {
  constructor(metadata: VideoMetadata, opts: ExtractorOptions = {}) {
    super(metadata, "filename_embedded", opts);
  }

  extract(frames: readonly OcrFrameRecord[]): OcrMarkers {
    const density = emptyDensity();
    const textMoments: TextMoment[] = [];
    const ctaAppearances: CtaAppearance[] = [];

    for (const frame of frames) {
      const time = this.timeOf(frame.frame);
      if (time === null) continue;
      const elements = frame.text_elements ?? [];
      const height = frame.height && frame.height > 0 ? frame.height : this.frameHeight;

      if (this.windows.inHook(time)) {
        for (const el of elements) {
          const moment = textMoment(el, time, height);
          if (!moment) continue;
          textMoments.push(moment);
          addDensity(density, this.windows.hookSecond(time), 1);
        }
      }

      if (this.windows.inCta(time)) {
        for (const el of elements) {
          const cta = ctaAppearance(el, time);
          if (cta) ctaAppearances.push(cta);
        }
      }
    }

    return {
      source: "ocr",
      hook_window: {
        density_progression: density,
        text_moments: earliest(textMoments, HOOK_LIMITS.text_moments),
      },
      cta_window: {
        time_range: this.windows.timeRange,
        cta_appearances: earliest(ctaAppearances, CTA_LIMITS.cta_appearances),
      },
    };
  }
}

export function isCallToAction(el: OcrTextElement): boolean {
  return el.category === "call_to_action" || matchesKeyword(el.text ?? "", CTA_KEYWORDS);
}

function textMoment(el: OcrTextElement, time: number, frameHeight: number): TextMoment | null {
  const text = truncateText(el.text ?? "");
  if (!text) return null;
  return {
    time,
    text,
    size: classifyTextSize(el.bbox),
    position: classifyTextPosition(el.bbox, frameHeight),
    confidence: confidenceOf(el),
    ...(isCallToAction(el) ? { is_cta: true } : {}),
  };
}

function ctaAppearance(el: OcrTextElement, time: number): CtaAppearance | null {
  const text = truncateText(el.text ?? "");
  if (!text || !isCallToAction(el)) return null;
  return {
    time,
    text,
    type: el.category === "overlay_text" ? "text_overlay" : "caption",
    size: classifyTextSize(el.bbox),
    confidence: confidenceOf(el),
  };
}

function confidenceOf(el: OcrTextElement): number {
  const c = el.confidence;
  return round2(clamp(typeof c === "number" && Number.isFinite(c) ? c : DEFAULT_CONFIDENCE, 0, 1));
}

/** Area in px²: >10000 L, >1000 M, else S. No usable box reads as M. */
export function classifyTextSize(bbox: BoundingBox | undefined): TextSize {
  if (!bbox) return "M";
  const { x1 = 0, y1 = 0, x2 = 0, y2 = 0 } = bbox;
  const area = Math.abs(x2 - x1) * Math.abs(y2 - y1);
  if (!Number.isFinite(area)) return "M";
  if (area > 10000) return "L";
  if (area > 1000) return "M";
  return "S";
}

/** Vertical thirds of the frame by box center. */
export function classifyTextPosition(bbox: BoundingBox | undefined, frameHeight: number): TextPosition {
  const y1 = bbox?.y1;
  const y2 = bbox?.y2;
  if (y1 === undefined || y2 === undefined) return "center";
  const center = (y1 + y2) / 2;
  if (!Number.isFinite(center)) return "center";
  if (center < frameHeight / 3) return "top";
  if (center > (2 * frameHeight) / 3) return "bottom";
  return "center";
}
