#!/usr/bin/env node
import path from "path";
import { DEFAULT_CONFIG_PATH, loadMarkerConfig } from "../config";
import type { ConfigEnv } from "../config";
import { TemporalMarkerError } from "../errors";
import { TemporalMarkerPipeline, summarizeMarkers } from "../pipeline";
import { formatMarkers } from "../promptFormatter";
import { canonicalSerialize, hash } from "../utils";

export function main(args: string[], env: ConfigEnv = process.env): number {
  const positional = args.filter((a) => !a.startsWith("--"));
  const [videoId, baseDir = "."] = positional;
  if (!videoId) {
    console.error("Usage: node dist/cli/extract-markers.js <video_id> [base_dir] [--compact] [--no-cache]");
    return 1;
  }

  const config = loadMarkerConfig(path.join(baseDir, DEFAULT_CONFIG_PATH), env);
  const pipeline = new TemporalMarkerPipeline(videoId, {
    baseDir,
    cacheDir: args.includes("--no-cache") ? null : undefined,
  });
  const doc = pipeline.markers();
  const summary = summarizeMarkers(doc);
  const compact = args.includes("--compact") || config.formatOptions.compact;

  console.log("HASH:", hash(canonicalSerialize(doc)));
  console.log(`Hook window: ${summary.hook_window.text_moments} text, ${summary.hook_window.gesture_count} gestures, avg density ${summary.hook_window.density_avg.toFixed(1)}`);
  console.log(`Emotions: ${summary.hook_window.emotions.join(", ")}`);
  console.log(`CTA window (${summary.cta_window.time_range}): ${summary.cta_window.cta_count} CTAs, ${summary.cta_window.gesture_sync_count} synced gestures`);
  console.log(`Total size: ${summary.size_kb.toFixed(1)}KB`);
  console.log();
  console.log(formatMarkers(doc, { ...config.formatOptions, compact }).text);
  return 0;
}

export function run(argv: string[], env: ConfigEnv = process.env): number {
  try {
    return main(argv, env);
  } catch (err) {
    if (!(err instanceof TemporalMarkerError)) throw err;
    console.error(err.message);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
