export type VideoMetadata = {
  fps: number;
  extraction_fps: number;
  frame_count: number;
  duration: number;
};

export type TimestampSource =
  | "frame_index_original_fps"
  | "frame_index_extraction_fps"
  | "filename_embedded"
  | "range_string"
  | "already_seconds";

export type Logger = Pick<Console, "info" | "warn" | "error">;

// ---- canonical vocabulary ----

export const GESTURES = [
  "pointing",
  "wave",
  "approval",
  "peace",
  "open_hand",
  "clap",
  "hands_up",
  "fist",
  "heart",
  "crossed_arms",
  "unknown",
] as const;
export type Gesture = (typeof GESTURES)[number];

export const EMOTIONS = ["happy", "surprise", "neutral", "sad", "angry", "fear", "unknown"] as const;
export type Emotion = (typeof EMOTIONS)[number];

export type TextSize = "S" | "M" | "L";
export type TextPosition = "top" | "center" | "bottom";
export type CtaType = "text_overlay" | "caption";

// ---- raw analyzer outputs (as read from disk) ----

export type BoundingBox = {
  x1?: number;
  y1?: number;
  x2?: number;
  y2?: number;
};

export type OcrTextElement = {
  text?: string;
  confidence?: number;
  bbox?: BoundingBox;
  category?: string;
};

export type OcrFrameRecord = {
  frame: string | number;
  text_elements?: OcrTextElement[];
  height?: number;
};

export type ObjectDetection = {
  frame: number | string;
  class?: string;
  confidence?: number;
};

export type ObjectTrack = {
  track_id?: string | number;
  detections?: ObjectDetection[];
};

export type ObjectTrackingData = {
  tracks: ObjectTrack[];
};

export type ExpressionObservation = {
  frame: number | string;
  expression?: string;
};

export type GestureObservation = {
  frame: number | string;
  gesture?: string;
  confidence?: number;
  target?: string;
};

export type PoseTimelineData = {
  expressions: ExpressionObservation[];
  gestures: GestureObservation[];
};

// ---- marker entities ----

export type TextMoment = {
  time: number;
  text: string;
  size: TextSize;
  position?: TextPosition;
  confidence?: number;
  is_cta?: boolean;
};

export type GestureMoment = {
  time: number;
  gesture: Gesture;
  confidence?: number;
  target?: string;
};

export type ObjectAppearance = {
  time: number;
  objects: string[];
  confidence?: number[];
};

export type CtaAppearance = {
  time: number;
  text: string;
  type: CtaType;
  size?: TextSize;
  confidence?: number;
};

export type GestureSync = {
  time: number;
  gesture: Gesture;
  aligns_with_cta?: boolean;
  confidence?: number;
};

export type ObjectFocus = {
  time: number;
  object: string;
  confidence?: number;
};

export type DensityProgression = [number, number, number, number, number];
export type EmotionSequence = [Emotion, Emotion, Emotion, Emotion, Emotion];

export type HookWindow = {
  density_progression: DensityProgression;
  text_moments: TextMoment[];
  emotion_sequence: EmotionSequence;
  gesture_moments: GestureMoment[];
  object_appearances: ObjectAppearance[];
};

export type CtaWindow = {
  time_range: string;
  cta_appearances: CtaAppearance[];
  /** Dropped entirely by the last reduction step. */
  gesture_sync?: GestureSync[];
  object_focus: ObjectFocus[];
};

export type MarkerMetadata = {
  video_id: string;
  duration: number;
  extraction_fps: number;
  generated_at: string;
  schema_version: string;
};

export type TemporalMarkerDocument = {
  hook_window: HookWindow;
  cta_window: CtaWindow;
  metadata: MarkerMetadata;
};

// ---- per-source extractor results ----

export type OcrMarkers = {
  source: "ocr";
  hook_window: { density_progression: DensityProgression; text_moments: TextMoment[] };
  cta_window: { time_range: string; cta_appearances: CtaAppearance[] };
};

export type ObjectMarkers = {
  source: "object";
  hook_window: { density_progression: DensityProgression; object_appearances: ObjectAppearance[] };
  cta_window: { time_range: string; object_focus: ObjectFocus[] };
};

export type PoseMarkers = {
  source: "pose";
  hook_window: { emotion_sequence: EmotionSequence; gesture_moments: GestureMoment[] };
  cta_window: { time_range: string; gesture_sync: GestureSync[] };
};

export type SourceMarkers = OcrMarkers | ObjectMarkers | PoseMarkers;

export type IntegrationInput = {
  ocr?: OcrMarkers | null;
  object?: ObjectMarkers | null;
  pose?: PoseMarkers | null;
};

// ---- options ----

export type ExtractorOptions = {
  ctaFraction?: number;      // default 0.15
  frameHeight?: number;      // default 1920, used for position thirds
  timestampSource?: TimestampSource; // default depends on the extractor
};

export type ReductionStep =
  | "truncate_text_moments"
  | "truncate_gesture_moments"
  | "truncate_cta_appearances"
  | "strip_optional_fields"
  | "aggressive_truncation";

export type ReduceResult = {
  document: TemporalMarkerDocument;
  originalBytes: number;
  sizeBytes: number;
  withinTarget: boolean;
  stepsApplied: ReductionStep[];
};

export type FormatOptions = {
  includeDensity: boolean;
  includeEmotions: boolean;
  includeGestures: boolean;
  includeObjects: boolean;
  includeCta: boolean;
  compact: boolean;
};

export type RolloutConfig = {
  enabled: boolean;
  percentage: number;
};

export type MarkerConfig = RolloutConfig & {
  formatOptions: FormatOptions;
};

export type FormattedMarkers = {
  text: string;
  insights: string[];
};

export type MarkerSummary = {
  video_id: string;
  duration: number;
  hook_window: {
    text_moments: number;
    density_avg: number;
    emotions: Emotion[];
    gesture_count: number;
    object_appearances: number;
  };
  cta_window: {
    time_range: string;
    cta_count: number;
    gesture_sync_count: number;
    object_focus_count: number;
  };
  size_kb: number;
};
