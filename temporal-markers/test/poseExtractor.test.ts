import { describe, it, expect } from "vitest";
import { PoseExtractor } from "../src/extractors/poseExtractor";
import type { PoseTimelineData, VideoMetadata } from "../src/types";

const metadata: VideoMetadata = { fps: 30, extraction_fps: 2, duration: 10, frame_count: 300 };

describe("PoseExtractor", () => {
  it("builds the per-second emotion sequence", () => {
    const out = new PoseExtractor(metadata).extract({
      expressions: [
        { frame: 0, expression: "smiling" },
        { frame: 2, expression: "surprised" },
        { frame: 4, expression: "Joy" },
        { frame: 6, expression: "sad" },
        { frame: 8, expression: "neutral" },
      ],
      gestures: [],
    });
    expect(out.source).toBe("pose");
    expect(out.hook_window.emotion_sequence).toEqual(["happy", "surprise", "happy", "sad", "neutral"]);
  });

  it("lets the last expression within a second win", () => {
    const out = new PoseExtractor(metadata).extract({
      expressions: [
        { frame: 3, expression: "angry" },
        { frame: 2, expression: "happy" },
        { frame: 5 },
      ],
      gestures: [],
    });
    expect(out.hook_window.emotion_sequence).toEqual(["neutral", "angry", "neutral", "neutral", "neutral"]);
  });

  it("defaults to a neutral sequence", () => {
    const out = new PoseExtractor(metadata).extract({ expressions: [], gestures: [] });
    expect(out.hook_window.emotion_sequence).toEqual(["neutral", "neutral", "neutral", "neutral", "neutral"]);
  });

  it("splits gestures between the hook and closing windows", () => {
    const data: PoseTimelineData = {
      expressions: [],
      gestures: [
        { frame: 3, gesture: "Pointing_Up", confidence: 0.95, target: "text" },
        { frame: 4, gesture: "moonwalk" },
        { frame: 18, gesture: "thumbs_up" },
        { frame: 19, gesture: "moonwalk" },
      ],
    };
    const out = new PoseExtractor(metadata).extract(data);

    expect(out.hook_window.gesture_moments).toEqual([
      { time: 1.5, gesture: "pointing", confidence: 0.95, target: "text" },
      { time: 2, gesture: "unknown", confidence: 0.8 },
    ]);
    expect(out.cta_window.gesture_sync).toEqual([
      { time: 9, gesture: "approval", aligns_with_cta: true, confidence: 0.8 },
    ]);
  });

  it("caps gesture moments at the earliest eight", () => {
    const out = new PoseExtractor(metadata).extract({
      expressions: [],
      gestures: Array.from({ length: 10 }, (_, i) => ({ frame: 9 - i, gesture: "wave" })),
    });
    expect(out.hook_window.gesture_moments.map((g) => g.time)).toEqual([0, 0.5, 1, 1.5, 2, 2.5, 3, 3.5]);
  });
});
