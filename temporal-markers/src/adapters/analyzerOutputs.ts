/**
 * Readers for the analyzer outputs a video-processing run leaves on disk.
 * Each loader tries its conventional locations in order and returns null when
 * the source is absent or unusable; single malformed observations are dropped.
 */

import fs from "fs";
import path from "path";
import {
  CreativeAnalysisFileSchema,
  ExpressionObservationSchema,
  FrameAnalysisSchema,
  GestureObservationSchema,
  HumanAnalysisFileSchema,
  ObjectAnnotationSchema,
  ObjectDetectionSchema,
  ObjectTrackSchema,
  OcrFrameRecordSchema,
  TrackingFileSchema,
  VideoMetadataFileSchema,
} from "../schema";
import type {
  ExpressionObservation,
  GestureObservation,
  Logger,
  ObjectDetection,
  ObjectTrack,
  ObjectTrackingData,
  OcrFrameRecord,
  PoseTimelineData,
  VideoMetadata,
} from "../types";
import { compileGuard } from "../validator";

export type ObjectAnnotation = {
  trackId?: string;
  confidence?: number;
  entity?: { entityId?: string };
  frames?: { frame: number | string; confidence?: number }[];
};

export type FrameAnalysis = {
  frame: number | string;
  faces?: { expression?: string }[];
  action_recognition?: { primary_action?: string; action_confidence?: number };
  hands?: unknown[];
};

type CreativeAnalysisFile = { frame_details: unknown[] };
type TrackingFile = { tracks?: unknown[]; objectAnnotations?: unknown[] };
type ObjectTrackRecord = { track_id?: string | number; detections?: unknown[] };
type HumanAnalysisFile = {
  timeline?: { expressions?: unknown[]; gestures?: unknown[] };
  frame_analyses?: unknown[];
};

const isMetadataFile = compileGuard<Partial<VideoMetadata>>(VideoMetadataFileSchema);
const isCreativeAnalysisFile = compileGuard<CreativeAnalysisFile>(CreativeAnalysisFileSchema);
const isOcrFrameRecord = compileGuard<OcrFrameRecord>(OcrFrameRecordSchema);
const isTrackingFile = compileGuard<TrackingFile>(TrackingFileSchema);
const isObjectTrackRecord = compileGuard<ObjectTrackRecord>(ObjectTrackSchema);
const isObjectDetection = compileGuard<ObjectDetection>(ObjectDetectionSchema);
const isObjectAnnotation = compileGuard<ObjectAnnotation>(ObjectAnnotationSchema);
const isHumanAnalysisFile = compileGuard<HumanAnalysisFile>(HumanAnalysisFileSchema);
const isExpressionObservation = compileGuard<ExpressionObservation>(ExpressionObservationSchema);
const isGestureObservation = compileGuard<GestureObservation>(GestureObservationSchema);
const isFrameAnalysis = compileGuard<FrameAnalysis>(FrameAnalysisSchema);

export const DEFAULT_VIDEO_METADATA: VideoMetadata = {
  fps: 30,
  extraction_fps: 2,
  duration: 60,
  frame_count: 1800,
};

export function analyzerPaths(baseDir: string, videoId: string) {
  const p = (...parts: string[]) => path.join(baseDir, ...parts);
  return {
    metadata: [p("frame_outputs", videoId, "metadata.json")],
    ocr: [
      p("creative_analysis_outputs", videoId, `${videoId}_creative_analysis.json`),
      p("downloads", "analysis", videoId, "creative_analysis.json"),
    ],
    objects: [
      p("downloads", "videos", `${videoId}_tracking.json`),
      p("downloads", "analysis", videoId, "object_tracking.json"),
      p("temp", "tracking", `${videoId}_tracking.json`),
    ],
    pose: [
      p("enhanced_human_analysis_outputs", videoId, `${videoId}_enhanced_human_analysis.json`),
      p("downloads", "analysis", videoId, "enhanced_human_analysis.json"),
    ],
  };
}

/** First candidate whose JSON parses and satisfies `convert`. */
function loadFirst<T>(candidates: readonly string[], logger: Logger, convert: (data: unknown, file: string) => T | null): T | null {
  for (const file of candidates) {
    if (!fs.existsSync(file)) continue;
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (err) {
      logger.error(`Error reading ${file}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    const out = convert(data, file);
    if (out !== null) return out;
  }
  return null;
}

export function loadVideoMetadata(baseDir: string, videoId: string, logger: Logger = console): VideoMetadata | null {
  return loadFirst(analyzerPaths(baseDir, videoId).metadata, logger, (data, file) => {
    if (!isMetadataFile(data)) {
      logger.error(`Invalid frame metadata ${file}: ${isMetadataFile.errors().join("; ")}`);
      return null;
    }
    return { ...DEFAULT_VIDEO_METADATA, ...data };
  });
}

export function loadOcrFrames(baseDir: string, videoId: string, logger: Logger = console): OcrFrameRecord[] | null {
  return loadFirst(analyzerPaths(baseDir, videoId).ocr, logger, (data, file) => {
    if (!isCreativeAnalysisFile(data)) {
      logger.warn(`No frame_details in ${file}`);
      return null;
    }
    return data.frame_details.filter(isOcrFrameRecord);
  });
}

export function loadObjectTracking(baseDir: string, videoId: string, logger: Logger = console): ObjectTrackingData | null {
  return loadFirst(analyzerPaths(baseDir, videoId).objects, logger, (data, file) => {
    if (isTrackingFile(data) && data.tracks) {
      return { tracks: data.tracks.filter(isObjectTrackRecord).map(toObjectTrack) };
    }
    if (isTrackingFile(data) && data.objectAnnotations) {
      return { tracks: tracksFromObjectAnnotations(data.objectAnnotations.filter(isObjectAnnotation)) };
    }
    logger.warn(`No tracks or objectAnnotations in ${file}`);
    return null;
  });
}

export function loadPoseTimeline(baseDir: string, videoId: string, logger: Logger = console): PoseTimelineData | null {
  return loadFirst(analyzerPaths(baseDir, videoId).pose, logger, (data, file) => {
    if (isHumanAnalysisFile(data) && data.timeline) {
      return {
        expressions: (data.timeline.expressions ?? []).filter(isExpressionObservation),
        gestures: (data.timeline.gestures ?? []).filter(isGestureObservation),
      };
    }
    if (isHumanAnalysisFile(data) && data.frame_analyses) {
      return timelineFromFrameAnalyses(data.frame_analyses.filter(isFrameAnalysis));
    }
    logger.warn(`No timeline or frame_analyses in ${file}`);
    return null;
  });
}

function toObjectTrack(record: ObjectTrackRecord): ObjectTrack {
  return {
    track_id: record.track_id,
    detections: (record.detections ?? []).filter(isObjectDetection),
  };
}

/** `{trackId, entity.entityId, frames[]}` annotations to per-track detections. */
export function tracksFromObjectAnnotations(annotations: readonly ObjectAnnotation[]): ObjectTrack[] {
  return annotations
    .map((a) => ({
      track_id: (a.trackId ?? "").replace("object_", ""),
      detections: (a.frames ?? []).map((f) => ({
        frame: f.frame,
        class: a.entity?.entityId ?? "unknown",
        confidence: f.confidence ?? a.confidence ?? 0.5,
      })),
    }))
    .filter((t) => t.detections.length > 0);
}

const ACTION_GESTURES = new Map([
  ["pointing", "pointing"],
  ["dancing", "wave"],
]);

/**
 * Per-frame human analysis to a pose timeline: the primary face's
 * expression, a gesture for recognised actions, and `open_hand` wherever
 * hands were detected.
 */
export function timelineFromFrameAnalyses(frames: readonly FrameAnalysis[]): PoseTimelineData {
  const expressions: ExpressionObservation[] = [];
  const gestures: GestureObservation[] = [];

  for (const f of frames) {
    const expression = (f.faces ?? []).find((x) => x.expression !== undefined)?.expression;
    if (expression !== undefined) expressions.push({ frame: f.frame, expression });

    const action = f.action_recognition?.primary_action;
    const gesture = action ? ACTION_GESTURES.get(action) : undefined;
    if (gesture) {
      gestures.push({ frame: f.frame, gesture, confidence: f.action_recognition?.action_confidence ?? 0.8 });
    }

    if (f.hands?.length) gestures.push({ frame: f.frame, gesture: "open_hand", confidence: 0.9 });
  }

  return { expressions, gestures };
}
