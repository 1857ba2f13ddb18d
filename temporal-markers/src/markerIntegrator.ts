import { DENSITY_CAP, MarkerWindows, emptyDensity } from "./extractors/windows";
import { SOFT_TARGET_BYTES, reduceToFit } from "./sizeSafety";
import type {
  DensityProgression,
  IntegrationInput,
  Logger,
  MarkerMetadata,
  ReduceResult,
  TemporalMarkerDocument,
  VideoMetadata,
} from "./types";
import { validateMarkerDocument } from "./validator";

export const SCHEMA_VERSION = "1.0";

export type IntegratorOptions = {
  ctaFraction?: number;
  targetBytes?: number;   // default 50KB
  maxBytes?: number;      // validator ceiling, default targetBytes
  now?: () => Date;
  logger?: Logger;
};

export type IntegrationResult = ReduceResult & { warnings: string[] };

/**
 * Fuses the per-source markers into one document. Each field has exactly one
 * owning source, except density which is summed across sources and capped.
 * A missing source leaves its fields empty.
 */
export class MarkerIntegrator {
  private readonly windows: MarkerWindows;
  private readonly targetBytes: number;
  private readonly maxBytes: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly metadata: VideoMetadata, opts: IntegratorOptions = {}) {
    this.windows = new MarkerWindows(metadata.duration, opts.ctaFraction);
    this.targetBytes = opts.targetBytes ?? SOFT_TARGET_BYTES;
    this.maxBytes = opts.maxBytes ?? this.targetBytes;
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? console;
  }

  integrate(videoId: string, input: IntegrationInput): IntegrationResult {
    const { ocr, object, pose } = input;

    const unified: TemporalMarkerDocument = {
      hook_window: {
        density_progression: sumDensity(
          ocr?.hook_window.density_progression,
          object?.hook_window.density_progression
        ),
        text_moments: ocr?.hook_window.text_moments ?? [],
        // replaced wholesale by the pose source, never blended
        emotion_sequence: pose?.hook_window.emotion_sequence ?? ["neutral", "neutral", "neutral", "neutral", "neutral"],
        gesture_moments: pose?.hook_window.gesture_moments ?? [],
        object_appearances: object?.hook_window.object_appearances ?? [],
      },
      cta_window: {
        time_range: this.windows.timeRange,
        cta_appearances: ocr?.cta_window.cta_appearances ?? [],
        gesture_sync: pose?.cta_window.gesture_sync ?? [],
        object_focus: object?.cta_window.object_focus ?? [],
      },
      metadata: this.documentMetadata(videoId),
    };

    const reduced = reduceToFit(unified, this.targetBytes, this.logger);
    const warnings = validateMarkerDocument(reduced.document, { maxBytes: this.maxBytes });
    if (warnings.length) {
      this.logger.warn(`Validation warnings in unified markers for ${videoId}: ${warnings.join("; ")}`);
    }
    return { ...reduced, warnings };
  }

  private documentMetadata(videoId: string): MarkerMetadata {
    return {
      video_id: videoId,
      duration: this.metadata.duration,
      extraction_fps: this.metadata.extraction_fps,
      generated_at: this.now().toISOString(),
      schema_version: SCHEMA_VERSION,
    };
  }
}

export function sumDensity(...sources: (DensityProgression | undefined)[]): DensityProgression {
  const out = emptyDensity();
  for (const d of sources) {
    if (!d) continue;
    for (let i = 0; i < out.length; i++) out[i] += d[i];
  }
  return [
    Math.min(out[0], DENSITY_CAP),
    Math.min(out[1], DENSITY_CAP),
    Math.min(out[2], DENSITY_CAP),
    Math.min(out[3], DENSITY_CAP),
    Math.min(out[4], DENSITY_CAP),
  ];
}
