import { vi } from "vitest";
import type { TemporalMarkerDocument, VideoMetadata } from "../src/types";

export const metadata: VideoMetadata = { fps: 30, extraction_fps: 2, duration: 10, frame_count: 300 };

export const fixedClock = () => new Date("2026-01-01T00:00:00.000Z");

export function quietLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** A small document that passes validation for a 10s video. */
export function sampleDocument(): TemporalMarkerDocument {
  return {
    hook_window: {
      density_progression: [0, 2, 2, 0, 0],
      text_moments: [{ time: 2, text: "WAIT FOR IT", size: "L", position: "top", confidence: 0.5 }],
      emotion_sequence: ["happy", "surprise", "happy", "sad", "neutral"],
      gesture_moments: [{ time: 1.5, gesture: "pointing", confidence: 0.95, target: "text" }],
      object_appearances: [{ time: 1, objects: ["person", "phone"], confidence: [0.9, 0.7] }],
    },
    cta_window: {
      time_range: "8.5-10.0s",
      cta_appearances: [{ time: 9, text: "Follow for more", type: "caption", size: "L", confidence: 0.92 }],
      gesture_sync: [{ time: 9, gesture: "approval", aligns_with_cta: true, confidence: 0.8 }],
      object_focus: [{ time: 9, object: "person", confidence: 0.85 }],
    },
    metadata: {
      video_id: "vid123",
      duration: 10,
      extraction_fps: 2,
      generated_at: "2026-01-01T00:00:00.000Z",
      schema_version: "1.0",
    },
  };
}
