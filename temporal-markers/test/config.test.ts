import { afterEach, beforeEach, describe, it, expect } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { DEFAULT_MARKER_CONFIG, loadMarkerConfig, saveMarkerConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("marker config", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "marker-config-"));
    file = path.join(dir, "config", "temporal_markers.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (content: string) => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };

  it("falls back to defaults when the file is missing", () => {
    expect(loadMarkerConfig(file)).toEqual(DEFAULT_MARKER_CONFIG);
  });

  it("reads the file and fills unset format options", () => {
    write(JSON.stringify({ enable_temporal_markers: false, rollout_percentage: 25, format_options: { compact_mode: true } }));
    expect(loadMarkerConfig(file)).toEqual({
      enabled: false,
      percentage: 25,
      formatOptions: { ...DEFAULT_MARKER_CONFIG.formatOptions, compact: true },
    });
  });

  it("lets the environment override the file", () => {
    write(JSON.stringify({ enable_temporal_markers: false, rollout_percentage: 25 }));
    const config = loadMarkerConfig(file, { ENABLE_TEMPORAL_MARKERS: "1", TEMPORAL_ROLLOUT_PERCENTAGE: "40" });
    expect(config.enabled).toBe(true);
    expect(config.percentage).toBe(40);
  });

  it("rejects malformed JSON", () => {
    write("{ not json");
    expect(() => loadMarkerConfig(file)).toThrow(ConfigError);
  });

  it("rejects out-of-range values with details", () => {
    write(JSON.stringify({ enable_temporal_markers: true, rollout_percentage: 150 }));
    expect(() => loadMarkerConfig(file)).toThrow("/rollout_percentage must be <= 100");
  });

  it("rejects unusable environment values", () => {
    expect(() => loadMarkerConfig(file, { ENABLE_TEMPORAL_MARKERS: "maybe" })).toThrow(
      "/enable_temporal_markers must be boolean"
    );
    expect(() => loadMarkerConfig(file, { TEMPORAL_ROLLOUT_PERCENTAGE: "lots" })).toThrow(ConfigError);
  });

  it("round-trips through save", () => {
    const config = { ...DEFAULT_MARKER_CONFIG, percentage: 10 };
    saveMarkerConfig(file, config);

    expect(loadMarkerConfig(file)).toEqual(config);
    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({
      enable_temporal_markers: true,
      rollout_percentage: 10,
      format_options: {
        include_density: true,
        include_emotions: true,
        include_gestures: true,
        include_objects: true,
        include_cta: true,
        compact_mode: false,
      },
    });
  });
});
