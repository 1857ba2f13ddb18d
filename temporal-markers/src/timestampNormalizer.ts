import { InvalidMetadataError } from "./errors";
import type { TimestampSource, VideoMetadata } from "./types";
import { toFiniteNumber } from "./utils";

const TIMESTAMP_TOKEN = /t(\d+\.?\d*)/;
const FRAME_TOKEN = /frame_(\d+)/;
const BOUNDS_TOLERANCE = 0.1;

/**
 * Converts the timestamp encodings used by the individual analyzers into
 * float seconds relative to one video's metadata.
 *
 * - `frame_index_original_fps`: frame number at the source frame rate
 * - `frame_index_extraction_fps`: frame number at the sampling frame rate
 * - `filename_embedded`: `frame_0015_t0.50.jpg`; falls back to the frame number at extraction fps
 * - `range_string`: `"15-16s"`, start of the range
 * - `already_seconds`: numeric seconds
 *
 * Unparseable input yields `null`; callers skip that observation.
 */
export class TimestampNormalizer {
  readonly fps: number;
  readonly extractionFps: number;
  readonly frameCount: number;
  readonly duration: number;

  constructor(metadata: VideoMetadata) {
    if (!Number.isFinite(metadata.fps) || metadata.fps <= 0) {
      throw new InvalidMetadataError(`Invalid FPS: ${metadata.fps}`);
    }
    if (!Number.isFinite(metadata.extraction_fps) || metadata.extraction_fps <= 0) {
      throw new InvalidMetadataError(`Invalid extraction FPS: ${metadata.extraction_fps}`);
    }
    if (!Number.isFinite(metadata.duration) || metadata.duration < 0) {
      throw new InvalidMetadataError(`Invalid duration: ${metadata.duration}`);
    }
    this.fps = metadata.fps;
    this.extractionFps = metadata.extraction_fps;
    this.frameCount = Number.isFinite(metadata.frame_count) ? Math.max(0, Math.trunc(metadata.frame_count)) : 0;
    this.duration = metadata.duration;
  }

  normalize(value: unknown, source: TimestampSource): number | null {
    switch (source) {
      case "frame_index_original_fps":
        return this.divide(value, this.fps);
      case "frame_index_extraction_fps":
        return this.divide(value, this.extractionFps);
      case "filename_embedded":
        return this.parseFilename(value);
      case "range_string":
        return parseRangeStart(value);
      case "already_seconds":
        return toFiniteNumber(value);
    }
  }

  normalizeBatch(values: readonly unknown[], source: TimestampSource): (number | null)[] {
    return values.map((v) => this.normalize(v, source));
  }

  /** Within the video, allowing 0.1s of rounding slack at either end. */
  validate(seconds: number | null): boolean {
    if (seconds === null || !Number.isFinite(seconds)) return false;
    if (seconds < -BOUNDS_TOLERANCE) return false;
    if (this.duration > 0 && seconds > this.duration + BOUNDS_TOLERANCE) return false;
    return true;
  }

  private divide(value: unknown, rate: number): number | null {
    const n = toFiniteNumber(value);
    return n === null ? null : n / rate;
  }

  private parseFilename(value: unknown): number | null {
    if (typeof value !== "string" && typeof value !== "number") return null;
    const name = String(value);
    const ts = TIMESTAMP_TOKEN.exec(name);
    if (ts) return toFiniteNumber(ts[1]);
    const frame = FRAME_TOKEN.exec(name);
    if (frame) return this.divide(frame[1], this.extractionFps);
    return null;
  }
}

function parseRangeStart(value: unknown): number | null {
  if (typeof value !== "string") return toFiniteNumber(value);
  const [start] = value.trim().replace(/s$/i, "").split("-");
  return toFiniteNumber(start);
}

/** `"12.8-15.0s"` */
export function formatRange(start: number, end: number): string {
  return `${start.toFixed(1)}-${end.toFixed(1)}s`;
}
