import path from "path";
import {
  DEFAULT_VIDEO_METADATA,
  loadObjectTracking,
  loadOcrFrames,
  loadPoseTimeline,
  loadVideoMetadata,
} from "./adapters/analyzerOutputs";
import { ObjectExtractor } from "./extractors/objectExtractor";
import { OcrExtractor } from "./extractors/ocrExtractor";
import { PoseExtractor } from "./extractors/poseExtractor";
import { MarkerCache } from "./markerCache";
import { MarkerIntegrator } from "./markerIntegrator";
import type { IntegrationResult } from "./markerIntegrator";
import type { ExtractorOptions, Logger, MarkerSummary, TemporalMarkerDocument, VideoMetadata } from "./types";
import { serializedSize } from "./utils";

export type PipelineOptions = ExtractorOptions & {
  baseDir?: string;           // default "."
  cacheDir?: string | null;   // default <baseDir>/temporal_markers; null disables caching
  targetBytes?: number;
  now?: () => Date;
  logger?: Logger;
};

/**
 * One video's marker run: metadata and analyzer outputs from `baseDir`,
 * per-source extraction, fusion and size reduction. Missing sources only
 * thin the document.
 */
export class TemporalMarkerPipeline {
  readonly baseDir: string;
  private readonly cache: MarkerCache | null;
  private readonly logger: Logger;

  constructor(readonly videoId: string, private readonly opts: PipelineOptions = {}) {
    this.baseDir = opts.baseDir ?? ".";
    this.logger = opts.logger ?? console;
    const cacheDir = opts.cacheDir === undefined ? path.join(this.baseDir, "temporal_markers") : opts.cacheDir;
    this.cache = cacheDir === null ? null : new MarkerCache(cacheDir, this.logger);
  }

  /** Cached document when one is valid, otherwise a fresh extraction written back to the cache. */
  markers(): TemporalMarkerDocument {
    if (!this.cache) return this.extract().document;
    return this.cache.getOrCompute(this.videoId, () => this.extract().document);
  }

  extract(): IntegrationResult {
    const started = Date.now();
    this.logger.info(`Starting temporal marker extraction for video ${this.videoId}`);

    const metadata = this.videoMetadata();
    const extractorOpts: ExtractorOptions = {
      ctaFraction: this.opts.ctaFraction,
      frameHeight: this.opts.frameHeight,
    };

    const ocrFrames = loadOcrFrames(this.baseDir, this.videoId, this.logger);
    const tracking = loadObjectTracking(this.baseDir, this.videoId, this.logger);
    const pose = loadPoseTimeline(this.baseDir, this.videoId, this.logger);
    if (!ocrFrames) this.logger.warn(`No OCR analysis found for ${this.videoId}`);
    if (!tracking) this.logger.warn(`No object tracking found for ${this.videoId}`);
    if (!pose) this.logger.warn(`No pose analysis found for ${this.videoId}`);

    const integrator = new MarkerIntegrator(metadata, {
      ctaFraction: this.opts.ctaFraction,
      targetBytes: this.opts.targetBytes,
      now: this.opts.now,
      logger: this.logger,
    });
    const result = integrator.integrate(this.videoId, {
      ocr: ocrFrames && new OcrExtractor(metadata, extractorOpts).extract(ocrFrames),
      object: tracking && new ObjectExtractor(metadata, extractorOpts).extract(tracking),
      pose: pose && new PoseExtractor(metadata, extractorOpts).extract(pose),
    });

    const seconds = (Date.now() - started) / 1000;
    this.logger.info(
      `Extraction complete in ${seconds.toFixed(2)}s, size: ${(result.sizeBytes / 1024).toFixed(1)}KB`
    );
    return result;
  }

  private videoMetadata(): VideoMetadata {
    const found = loadVideoMetadata(this.baseDir, this.videoId, this.logger);
    if (found) return found;
    this.logger.warn(`Could not determine video metadata for ${this.videoId}, using defaults`);
    return DEFAULT_VIDEO_METADATA;
  }
}

export function summarizeMarkers(doc: TemporalMarkerDocument): MarkerSummary {
  const hook = doc.hook_window;
  const cta = doc.cta_window;
  return {
    video_id: doc.metadata.video_id,
    duration: doc.metadata.duration,
    hook_window: {
      text_moments: hook.text_moments.length,
      density_avg: hook.density_progression.reduce((a, b) => a + b, 0) / hook.density_progression.length,
      emotions: [...hook.emotion_sequence],
      gesture_count: hook.gesture_moments.length,
      object_appearances: hook.object_appearances.length,
    },
    cta_window: {
      time_range: cta.time_range,
      cta_count: cta.cta_appearances.length,
      gesture_sync_count: cta.gesture_sync?.length ?? 0,
      object_focus_count: cta.object_focus.length,
    },
    size_kb: serializedSize(doc) / 1024,
  };
}
