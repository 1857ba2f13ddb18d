import { describe, it, expect } from "vitest";
import { reduceToFit } from "../src/sizeSafety";
import type { TemporalMarkerDocument } from "../src/types";
import { serializedSize } from "../src/utils";
import { quietLogger, sampleDocument } from "./documents";

function oversized(): TemporalMarkerDocument {
  const doc = sampleDocument();
  doc.hook_window.text_moments = Array.from({ length: 2000 }, () => ({
    time: 1,
    text: "x".repeat(50),
    size: "L" as const,
    position: "center" as const,
    confidence: 0.5,
  }));
  return doc;
}

describe("reduceToFit", () => {
  it("returns a document that already fits untouched", () => {
    const doc = sampleDocument();
    const result = reduceToFit(doc, 50 * 1024, quietLogger());

    expect(result.document).toBe(doc);
    expect(result.stepsApplied).toEqual([]);
    expect(result.withinTarget).toBe(true);
    expect(result.sizeBytes).toBe(serializedSize(doc));
  });

  it("stops at the first step that fits", () => {
    const doc = oversized();
    const logger = quietLogger();
    const result = reduceToFit(doc, 50 * 1024, logger);

    expect(result.originalBytes).toBeGreaterThan(220 * 1024);
    expect(result.sizeBytes).toBeLessThanOrEqual(50 * 1024);
    expect(result.withinTarget).toBe(true);
    expect(result.stepsApplied).toEqual(["truncate_text_moments"]);
    expect(result.document.hook_window.text_moments).toHaveLength(10);
    // the input is not modified
    expect(doc.hook_window.text_moments).toHaveLength(2000);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it("falls through to aggressive truncation for a 220KB document", () => {
    const doc = sampleDocument();
    doc.hook_window.text_moments = oversized().hook_window.text_moments.slice(0, 1050);
    doc.hook_window.object_appearances = Array.from({ length: 2000 }, () => ({
      time: 1,
      objects: ["person"],
      confidence: [0.9],
    }));
    const result = reduceToFit(doc, 50 * 1024, quietLogger());
    const { hook_window: hook, cta_window: cta } = result.document;

    expect(result.originalBytes).toBeGreaterThan(220 * 1024);
    expect(result.stepsApplied[result.stepsApplied.length - 1]).toBe("aggressive_truncation");
    expect(result.withinTarget).toBe(true);
    expect(result.sizeBytes).toBeLessThanOrEqual(50 * 1024);
    expect(hook.text_moments.length).toBeLessThanOrEqual(5);
    expect(hook.gesture_moments.length).toBeLessThanOrEqual(3);
    expect(hook.object_appearances).toHaveLength(5);
    expect(cta.cta_appearances.length).toBeLessThanOrEqual(3);
    expect(cta.gesture_sync).toBeUndefined();
  });

  it("strips optional fields once truncation is not enough", () => {
    const doc = sampleDocument();
    doc.hook_window.text_moments.push({ time: 3, text: "Like this", size: "M", position: "bottom", confidence: 0.7, is_cta: true });
    const result = reduceToFit(doc, serializedSize(doc) - 1, quietLogger());

    expect(result.stepsApplied).toEqual([
      "truncate_text_moments",
      "truncate_gesture_moments",
      "truncate_cta_appearances",
      "strip_optional_fields",
    ]);
    expect(result.document.hook_window.text_moments).toEqual([
      { time: 2, text: "WAIT FOR IT", size: "L" },
      { time: 3, text: "Like this", size: "M", is_cta: true },
    ]);
    expect(result.document.hook_window.gesture_moments).toEqual([{ time: 1.5, gesture: "pointing" }]);
    expect(result.document.cta_window.cta_appearances).toEqual([
      { time: 9, text: "Follow for more", type: "caption", size: "L" },
    ]);
    expect(result.document.cta_window.gesture_sync).toEqual([{ time: 9, gesture: "approval", aligns_with_cta: true }]);
    expect(result.document.cta_window.object_focus).toEqual([{ time: 9, object: "person" }]);
  });

  it("reports when the target cannot be met", () => {
    const logger = quietLogger();
    const result = reduceToFit(oversized(), 100, logger);

    expect(result.withinTarget).toBe(false);
    expect(result.stepsApplied).toHaveLength(5);
    expect(result.stepsApplied[4]).toBe("aggressive_truncation");
    expect(result.document.hook_window.text_moments).toHaveLength(5);
    expect(result.document.cta_window.gesture_sync).toBeUndefined();
    expect(result.sizeBytes).toBe(serializedSize(result.document));
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("is idempotent on its own output", () => {
    const first = reduceToFit(oversized(), 50 * 1024, quietLogger());
    const second = reduceToFit(first.document, 50 * 1024, quietLogger());

    expect(second.document).toBe(first.document);
    expect(second.sizeBytes).toBe(first.sizeBytes);
    expect(second.stepsApplied).toEqual([]);
  });
});
