import { describe, it, expect } from "vitest";
import path from "path";
import { TemporalMarkerPipeline } from "../src/pipeline";
import { canonicalSerialize, hash } from "../src/utils";
import { fixedClock, quietLogger } from "./documents";

describe("marker extraction (20-run hash)", () => {
  const baseDir = path.join(__dirname, "../fixtures/analyzer");

  it("produces identical hashes across 20 runs", () => {
    const hashes = new Set<string>();
    for (let i = 0; i < 20; i++) {
      const pipeline = new TemporalMarkerPipeline("vid123", { baseDir, cacheDir: null, now: fixedClock, logger: quietLogger() });
      hashes.add(hash(canonicalSerialize(pipeline.extract().document)));
    }
    expect(hashes.size).toBe(1);
  });
});
