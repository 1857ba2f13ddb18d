import { describe, it, expect } from "vitest";
import { ObjectExtractor } from "../src/extractors/objectExtractor";
import type { ObjectTrackingData, VideoMetadata } from "../src/types";

const metadata: VideoMetadata = { fps: 30, extraction_fps: 2, duration: 10, frame_count: 300 };

const tracking: ObjectTrackingData = {
  tracks: [
    {
      track_id: 1,
      detections: [
        { frame: 30, class: "Person", confidence: 0.9 },
        { frame: 60, class: "person", confidence: 0.8 },
        { frame: 270, class: "person", confidence: 0.85 },
      ],
    },
    { track_id: 2, detections: [{ frame: 30, class: "phone", confidence: 0.7 }] },
  ],
};

describe("ObjectExtractor", () => {
  it("groups detections by time in the hook window", () => {
    const out = new ObjectExtractor(metadata).extract(tracking);

    expect(out.source).toBe("object");
    expect(out.hook_window.object_appearances).toEqual([
      { time: 1, objects: ["person", "phone"], confidence: [0.9, 0.7] },
      { time: 2, objects: ["person"], confidence: [0.8] },
    ]);
    expect(out.hook_window.density_progression).toEqual([0, 2, 1, 0, 0]);
  });

  it("records focus objects in the closing window", () => {
    const out = new ObjectExtractor(metadata).extract(tracking);
    expect(out.cta_window.object_focus).toEqual([{ time: 9, object: "person", confidence: 0.85 }]);
  });

  it("keeps the five most confident labels per appearance", () => {
    const labels = ["cup", "lamp", "chair", "book", "plant", "clock", "cup"];
    const out = new ObjectExtractor(metadata).extract({
      tracks: labels.map((label, i) => ({
        track_id: i,
        detections: [{ frame: 0, class: label, confidence: 0.3 + i * 0.1 }],
      })),
    });
    const [appearance] = out.hook_window.object_appearances;

    expect(appearance.objects).toEqual(["cup", "clock", "plant", "book", "chair"]);
    expect(appearance.confidence).toEqual([0.9, 0.8, 0.7, 0.6, 0.5]);
    // density counts every unique label, not only the kept ones
    expect(out.hook_window.density_progression).toEqual([6, 0, 0, 0, 0]);
  });

  it("defaults missing labels and confidences", () => {
    const out = new ObjectExtractor(metadata).extract({
      tracks: [{ detections: [{ frame: 15 }, { frame: "bad" }] }],
    });
    expect(out.hook_window.object_appearances).toEqual([{ time: 0.5, objects: ["unknown"], confidence: [0.5] }]);
  });

  it("ignores tracks without detections", () => {
    const out = new ObjectExtractor(metadata).extract({ tracks: [{ track_id: 3 }] });
    expect(out.hook_window.object_appearances).toEqual([]);
    expect(out.cta_window.object_focus).toEqual([]);
  });

  it("accepts another timestamp encoding", () => {
    const out = new ObjectExtractor(metadata, { timestampSource: "already_seconds" }).extract({
      tracks: [{ detections: [{ frame: "1.5", class: "hand", confidence: 0.66 }] }],
    });
    expect(out.hook_window.object_appearances).toEqual([{ time: 1.5, objects: ["hand"], confidence: [0.66] }]);
  });
});
