import type {
  EmotionSequence,
  ExtractorOptions,
  GestureMoment,
  GestureSync,
  PoseMarkers,
  PoseTimelineData,
  VideoMetadata,
} from "../types";
import { canonicalEmotion, canonicalGesture } from "../vocabulary";
import { byTime, clamp, earliest, round2 } from "../utils";
import { CTA_LIMITS, HOOK_LIMITS, WindowedExtractor } from "./windows";

const DEFAULT_CONFIDENCE = 0.8;

/**
 * Facial expressions and hand/body gestures from the pose timeline, sampled
 * at the extraction frame rate. Labels are canonicalized before they land in
 * the markers.
 */
export class PoseExtractor extends WindowedExtractor<PoseTimelineData, PoseMarkers> {
  constructor(metadata: VideoMetadata, opts: ExtractorOptions = {}) {
    super(metadata, "frame_index_extraction_fps", opts);
  }

  extract(data: PoseTimelineData): PoseMarkers {
    const emotions: EmotionSequence = ["neutral", "neutral", "neutral", "neutral", "neutral"];

    const expressions = byTime(
      data.expressions.flatMap((e) => {
        const time = this.timeOf(e.frame);
        return time === null || e.expression === undefined ? [] : [{ time, expression: e.expression }];
      })
    );
    // last observation within a second wins
    for (const { time, expression } of expressions) {
      if (!this.windows.inHook(time)) continue;
      const second = this.windows.hookSecond(time);
      if (second !== null) emotions[second] = canonicalEmotion(expression);
    }

    const gestureMoments: GestureMoment[] = [];
    const gestureSync: GestureSync[] = [];
    for (const g of data.gestures) {
      const time = this.timeOf(g.frame);
      if (time === null) continue;
      const gesture = canonicalGesture(g.gesture);
      const c = g.confidence;
      const confidence = round2(clamp(typeof c === "number" && Number.isFinite(c) ? c : DEFAULT_CONFIDENCE, 0, 1));

      if (this.windows.inHook(time)) {
        gestureMoments.push({ time, gesture, confidence, ...(g.target ? { target: g.target } : {}) });
      }
      if (this.windows.inCta(time) && gesture !== "unknown") {
        gestureSync.push({ time, gesture, aligns_with_cta: true, confidence });
      }
    }

    return {
      source: "pose",
      hook_window: {
        emotion_sequence: emotions,
        gesture_moments: earliest(gestureMoments, HOOK_LIMITS.gesture_moments),
      },
      cta_window: {
        time_range: this.windows.timeRange,
        gesture_sync: earliest(gestureSync, CTA_LIMITS.gesture_sync),
      },
    };
  }
}
