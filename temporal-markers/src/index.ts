export * from "./types";
export * from "./errors";
export { TimestampNormalizer, formatRange } from "./timestampNormalizer";
export { canonicalEmotion, canonicalGesture, CTA_KEYWORDS, EARLY_CTA_KEYWORDS, FOCUS_OBJECTS } from "./vocabulary";
export {
  CTA_LIMITS,
  DENSITY_CAP,
  HOOK_LIMITS,
  HOOK_SECONDS,
  MarkerWindows,
} from "./extractors/windows";
export { OcrExtractor, classifyTextPosition, classifyTextSize, isCallToAction } from "./extractors/ocrExtractor";
export { ObjectExtractor } from "./extractors/objectExtractor";
export { PoseExtractor } from "./extractors/poseExtractor";
export { MarkerIntegrator, SCHEMA_VERSION, sumDensity } from "./markerIntegrator";
export type { IntegrationResult, IntegratorOptions } from "./markerIntegrator";
export { HARD_CEILING_BYTES, SOFT_TARGET_BYTES, reduceToFit } from "./sizeSafety";
export { DEFAULT_MAX_MARKER_BYTES, isMarkerDocument, validateMarkerDocument } from "./validator";
export { rolloutBucket, shouldIncludeMarkers } from "./rollout";
export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_FORMAT_OPTIONS,
  DEFAULT_MARKER_CONFIG,
  loadMarkerConfig,
  saveMarkerConfig,
} from "./config";
export type { ConfigEnv, MarkerConfigFile } from "./config";
export { deriveInsights, formatMarkers } from "./promptFormatter";
export { buildContextWithMarkers, estimatePromptSize } from "./promptContext";
export type { PromptSizeEstimate } from "./promptContext";
export { MarkerCache } from "./markerCache";
export {
  DEFAULT_VIDEO_METADATA,
  loadObjectTracking,
  loadOcrFrames,
  loadPoseTimeline,
  loadVideoMetadata,
  timelineFromFrameAnalyses,
  tracksFromObjectAnnotations,
} from "./adapters/analyzerOutputs";
export type { FrameAnalysis, ObjectAnnotation } from "./adapters/analyzerOutputs";
export { TemporalMarkerPipeline, summarizeMarkers } from "./pipeline";
export type { PipelineOptions } from "./pipeline";
export { canonicalSerialize, hash } from "./utils";
