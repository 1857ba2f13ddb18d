import { afterEach, beforeEach, describe, it, expect } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { TemporalMarkerPipeline, summarizeMarkers } from "../src/pipeline";
import { serializedSize } from "../src/utils";
import { fixedClock, quietLogger, sampleDocument } from "./documents";

const baseDir = path.join(__dirname, "../fixtures/analyzer");

describe("TemporalMarkerPipeline", () => {
  it("extracts markers from all three analyzers", () => {
    const pipeline = new TemporalMarkerPipeline("vid123", { baseDir, cacheDir: null, now: fixedClock, logger: quietLogger() });
    const result = pipeline.extract();

    const expected = sampleDocument();
    expected.hook_window.object_appearances = [
      { time: 1, objects: ["person", "phone"], confidence: [0.9, 0.7] },
      { time: 2, objects: ["person"], confidence: [0.8] },
    ];
    expect(result.document).toEqual(expected);
    expect(result.warnings).toEqual([]);
    expect(result.withinTarget).toBe(true);
  });

  it("works from partial outputs and default metadata", () => {
    const logger = quietLogger();
    const pipeline = new TemporalMarkerPipeline("vid456", { baseDir, cacheDir: null, now: fixedClock, logger });
    const { document } = pipeline.extract();

    expect(document.hook_window).toEqual({
      density_progression: [1, 0, 0, 0, 0],
      text_moments: [],
      emotion_sequence: ["neutral", "happy", "neutral", "neutral", "neutral"],
      gesture_moments: [{ time: 1, gesture: "pointing", confidence: 0.7 }],
      object_appearances: [{ time: 0.5, objects: ["product"], confidence: [0.6] }],
    });
    expect(document.cta_window).toEqual({
      time_range: "51.0-60.0s",
      cta_appearances: [],
      gesture_sync: [{ time: 52, gesture: "open_hand", aligns_with_cta: true, confidence: 0.9 }],
      object_focus: [{ time: 52, object: "product", confidence: 0.9 }],
    });
    expect(document.metadata.duration).toBe(60);
    expect(logger.warn).toHaveBeenCalledWith("Could not determine video metadata for vid456, using defaults");
    expect(logger.warn).toHaveBeenCalledWith("No OCR analysis found for vid456");
  });

  it("produces an empty document when nothing was analyzed", () => {
    const pipeline = new TemporalMarkerPipeline("missing", { baseDir, cacheDir: null, now: fixedClock, logger: quietLogger() });
    const { document } = pipeline.extract();

    expect(document.hook_window.text_moments).toEqual([]);
    expect(document.cta_window.object_focus).toEqual([]);
    expect(document.metadata.video_id).toBe("missing");
  });

  describe("with a cache", () => {
    let cacheDir: string;

    beforeEach(() => {
      cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "pipeline-cache-"));
    });

    afterEach(() => {
      fs.rmSync(cacheDir, { recursive: true, force: true });
    });

    it("writes markers once and reuses them", () => {
      const opts = { baseDir, cacheDir, now: fixedClock, logger: quietLogger() };
      const first = new TemporalMarkerPipeline("vid123", opts).markers();
      const cached = path.join(cacheDir, "vid123_temporal_markers.json");

      expect(fs.existsSync(cached)).toBe(true);
      const later = new TemporalMarkerPipeline("vid123", { ...opts, now: () => new Date("2030-01-01T00:00:00.000Z") });
      expect(later.markers()).toEqual(first);
    });
  });
});

describe("summarizeMarkers", () => {
  it("counts what the document holds", () => {
    const doc = sampleDocument();
    expect(summarizeMarkers(doc)).toEqual({
      video_id: "vid123",
      duration: 10,
      hook_window: {
        text_moments: 1,
        density_avg: 0.8,
        emotions: ["happy", "surprise", "happy", "sad", "neutral"],
        gesture_count: 1,
        object_appearances: 1,
      },
      cta_window: {
        time_range: "8.5-10.0s",
        cta_count: 1,
        gesture_sync_count: 1,
        object_focus_count: 1,
      },
      size_kb: serializedSize(doc) / 1024,
    });
  });
});
