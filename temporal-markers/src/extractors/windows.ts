import { TimestampNormalizer, formatRange } from "../timestampNormalizer";
import type { DensityProgression, ExtractorOptions, TimestampSource, VideoMetadata } from "../types";
import { round2 } from "../utils";

export const HOOK_SECONDS = 5;
export const DEFAULT_CTA_FRACTION = 0.15;
export const DEFAULT_FRAME_HEIGHT = 1920;
export const DENSITY_CAP = 10;

export const HOOK_LIMITS = {
  text_moments: 10,
  gesture_moments: 8,
  object_appearances: 5,
} as const;

export const CTA_LIMITS = {
  cta_appearances: 8,
  gesture_sync: 5,
  object_focus: 5,
} as const;

export const emptyDensity = (): DensityProgression => [0, 0, 0, 0, 0];

/** Hook window is [0, 5]; the CTA window is the final `ctaFraction` of the video. */
export class MarkerWindows {
  readonly ctaStart: number;
  readonly ctaEnd: number;
  readonly timeRange: string;

  constructor(duration: number, ctaFraction: number = DEFAULT_CTA_FRACTION) {
    this.ctaEnd = duration;
    this.ctaStart = Math.max(0, duration * (1 - ctaFraction));
    this.timeRange = formatRange(this.ctaStart, this.ctaEnd);
  }

  inHook(t: number): boolean {
    return t >= 0 && t <= HOOK_SECONDS;
  }

  inCta(t: number): boolean {
    return t >= this.ctaStart && t <= this.ctaEnd;
  }

  /** Density slot for `t`, or null past the last whole second. */
  hookSecond(t: number): number | null {
    const i = Math.floor(t);
    return i >= 0 && i < HOOK_SECONDS ? i : null;
  }
}

export function addDensity(density: DensityProgression, second: number | null, count: number): void {
  if (second !== null) density[second] += count;
}

/**
 * Shared plumbing for the per-source extractors: one normalizer and one
 * window definition per video.
 */
export abstract class WindowedExtractor<TInput, TResult> {
  protected readonly normalizer: TimestampNormalizer;
  protected readonly windows: MarkerWindows;
  protected readonly timestampSource: TimestampSource;
  protected readonly frameHeight: number;

  protected constructor(metadata: VideoMetadata, defaultSource: TimestampSource, opts: ExtractorOptions) {
    this.normalizer = new TimestampNormalizer(metadata);
    this.windows = new MarkerWindows(metadata.duration, opts.ctaFraction ?? DEFAULT_CTA_FRACTION);
    this.timestampSource = opts.timestampSource ?? defaultSource;
    this.frameHeight = opts.frameHeight ?? DEFAULT_FRAME_HEIGHT;
  }

  abstract extract(input: TInput): TResult;

  /** Normalized, bounds-checked, rounded seconds; null means skip the observation. */
  protected timeOf(value: unknown): number | null {
    const t = this.normalizer.normalize(value, this.timestampSource);
    if (t === null || !this.normalizer.validate(t)) return null;
    return round2(t);
  }
}
