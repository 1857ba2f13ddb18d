import { EMOTIONS, GESTURES } from "./types";

const hookTime = { type: "number", minimum: 0, maximum: 5 } as const;
const time = { type: "number", minimum: 0 } as const;
const confidence = { type: "number", minimum: 0, maximum: 1 } as const;
const markerText = { type: "string", minLength: 1, maxLength: 50 } as const;
const size = { type: "string", enum: ["S", "M", "L"] } as const;
const gesture = { type: "string", enum: GESTURES } as const;

export const MarkerDocumentSchema = {
  type: "object",
  properties: {
    hook_window: {
      type: "object",
      properties: {
        density_progression: {
          type: "array",
          items: { type: "integer", minimum: 0, maximum: 10 },
          minItems: 5,
          maxItems: 5,
        },
        text_moments: {
          type: "array",
          items: {
            type: "object",
            properties: {
              time: hookTime,
              text: markerText,
              size,
              position: { type: "string", enum: ["top", "center", "bottom"] },
              confidence,
              is_cta: { type: "boolean" },
            },
            required: ["time", "text", "size"],
            additionalProperties: false,
          },
        },
        emotion_sequence: {
          type: "array",
          items: { type: "string", enum: EMOTIONS },
          minItems: 5,
          maxItems: 5,
        },
        gesture_moments: {
          type: "array",
          items: {
            type: "object",
            properties: {
              time: hookTime,
              gesture,
              confidence,
              target: { type: "string" },
            },
            required: ["time", "gesture"],
            additionalProperties: false,
          },
        },
        object_appearances: {
          type: "array",
          items: {
            type: "object",
            properties: {
              time: hookTime,
              objects: { type: "array", items: { type: "string" } },
              confidence: { type: "array", items: confidence },
            },
            required: ["time", "objects"],
            additionalProperties: false,
          },
        },
      },
      required: ["density_progression", "text_moments", "emotion_sequence", "gesture_moments", "object_appearances"],
      additionalProperties: false,
    },
    cta_window: {
      type: "object",
      properties: {
        time_range: { type: "string", pattern: "^\\d+(\\.\\d+)?-\\d+(\\.\\d+)?s$" },
        cta_appearances: {
          type: "array",
          items: {
            type: "object",
            properties: {
              time,
              text: markerText,
              type: { type: "string", enum: ["text_overlay", "caption"] },
              size,
              confidence,
            },
            required: ["time", "text", "type"],
            additionalProperties: false,
          },
        },
        gesture_sync: {
          type: "array",
          items: {
            type: "object",
            properties: {
              time,
              gesture,
              aligns_with_cta: { type: "boolean" },
              confidence,
            },
            required: ["time", "gesture"],
            additionalProperties: false,
          },
        },
        object_focus: {
          type: "array",
          items: {
            type: "object",
            properties: { time, object: { type: "string" }, confidence },
            required: ["time", "object"],
            additionalProperties: false,
          },
        },
      },
      required: ["time_range", "cta_appearances", "object_focus"],
      additionalProperties: false,
    },
    metadata: {
      type: "object",
      properties: {
        video_id: { type: "string", minLength: 1 },
        duration: { type: "number", minimum: 0 },
        extraction_fps: { type: "number", exclusiveMinimum: 0 },
        generated_at: { type: "string" },
        schema_version: { type: "string" },
      },
      required: ["video_id", "duration", "extraction_fps", "generated_at", "schema_version"],
      additionalProperties: false,
    },
  },
  required: ["hook_window", "cta_window", "metadata"],
  additionalProperties: false,
} as const;

const flag = { type: "boolean" } as const;

export const MarkerConfigFileSchema = {
  type: "object",
  properties: {
    enable_temporal_markers: flag,
    rollout_percentage: { type: "number", minimum: 0, maximum: 100 },
    format_options: {
      type: "object",
      properties: {
        include_density: flag,
        include_emotions: flag,
        include_gestures: flag,
        include_objects: flag,
        include_cta: flag,
        compact_mode: flag,
      },
      additionalProperties: false,
    },
  },
  required: ["enable_temporal_markers", "rollout_percentage"],
  additionalProperties: false,
} as const;

// ---- raw analyzer outputs: loose on extra keys, strict on the ones we read ----

const frameRef = { type: ["number", "string"] } as const;
const num = { type: "number" } as const;
const str = { type: "string" } as const;
const objectList = { type: "array", items: { type: "object" } } as const;

export const VideoMetadataFileSchema = {
  type: "object",
  properties: {
    fps: { type: "number", exclusiveMinimum: 0 },
    extraction_fps: { type: "number", exclusiveMinimum: 0 },
    duration: { type: "number", minimum: 0 },
    frame_count: { type: "number", minimum: 0 },
  },
} as const;

export const OcrFrameRecordSchema = {
  type: "object",
  properties: {
    frame: frameRef,
    height: num,
    text_elements: {
      type: "array",
      items: {
        type: "object",
        properties: {
          text: str,
          confidence: num,
          category: str,
          bbox: {
            type: "object",
            properties: { x1: num, y1: num, x2: num, y2: num },
          },
        },
      },
    },
  },
  required: ["frame"],
} as const;

export const CreativeAnalysisFileSchema = {
  type: "object",
  properties: { frame_details: objectList },
  required: ["frame_details"],
} as const;

export const ObjectDetectionSchema = {
  type: "object",
  properties: { frame: frameRef, class: str, confidence: num },
  required: ["frame"],
} as const;

export const ObjectTrackSchema = {
  type: "object",
  properties: { track_id: frameRef, detections: objectList },
} as const;

export const ObjectAnnotationSchema = {
  type: "object",
  properties: {
    trackId: str,
    confidence: num,
    entity: { type: "object", properties: { entityId: str } },
    frames: {
      type: "array",
      items: {
        type: "object",
        properties: { frame: frameRef, confidence: num },
        required: ["frame"],
      },
    },
  },
} as const;

export const TrackingFileSchema = {
  type: "object",
  properties: { tracks: objectList, objectAnnotations: objectList },
} as const;

export const ExpressionObservationSchema = {
  type: "object",
  properties: { frame: frameRef, expression: str },
  required: ["frame"],
} as const;

export const GestureObservationSchema = {
  type: "object",
  properties: { frame: frameRef, gesture: str, confidence: num, target: str },
  required: ["frame"],
} as const;

export const FrameAnalysisSchema = {
  type: "object",
  properties: {
    frame: frameRef,
    faces: { type: "array", items: { type: "object", properties: { expression: str } } },
    action_recognition: {
      type: "object",
      properties: { primary_action: str, action_confidence: num },
    },
    hands: { type: "array" },
  },
  required: ["frame"],
} as const;

export const HumanAnalysisFileSchema = {
  type: "object",
  properties: {
    timeline: {
      type: "object",
      properties: { expressions: objectList, gestures: objectList },
    },
    frame_analyses: objectList,
  },
} as const;
