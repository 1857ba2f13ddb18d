import type { RolloutConfig } from "./types";
import { hash } from "./utils";

/** Stable bucket in [0, 100) from the first 32 bits of sha256(videoId). */
export function rolloutBucket(videoId: string): number {
  return parseInt(hash(videoId).slice(0, 8), 16) % 100;
}

/**
 * Canary gate: a video is included when its bucket is strictly below the
 * configured percentage, so 0 admits nothing and 100 admits everything.
 */
export function shouldIncludeMarkers(videoId: string, config: RolloutConfig): boolean {
  if (!config.enabled) return false;
  if (!Number.isFinite(config.percentage)) return false;
  return rolloutBucket(videoId) < config.percentage;
}
