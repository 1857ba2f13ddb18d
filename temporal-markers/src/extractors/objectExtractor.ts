import type {
  ExtractorOptions,
  ObjectAppearance,
  ObjectFocus,
  ObjectMarkers,
  ObjectTrackingData,
  VideoMetadata,
} from "../types";
import { FOCUS_OBJECTS } from "../vocabulary";
import { clamp, cmpNum, earliest, round2 } from "../utils";
import { CTA_LIMITS, HOOK_LIMITS, WindowedExtractor, addDensity, emptyDensity } from "./windows";

const DEFAULT_CONFIDENCE = 0.5;
const MAX_OBJECTS_PER_APPEARANCE = 5;

type Sighting = { object: string; confidence: number };

/**
 * Object tracks regrouped by timestamp. Detections carry frame indices at the
 * source frame rate.
 */
export class ObjectExtractor extends WindowedExtractor<ObjectTrackingData, ObjectMarkers> {
  constructor(metadata: VideoMetadata, opts: ExtractorOptions = {}) {
    super(metadata, "frame_index_original_fps", opts);
  }

  extract(data: ObjectTrackingData): ObjectMarkers {
    const byTime = new Map<number, Sighting[]>();
    for (const track of data.tracks) {
      for (const det of track.detections ?? []) {
        const time = this.timeOf(det.frame);
        if (time === null) continue;
        const sighting = {
          object: (det.class ?? "").trim().toLowerCase() || "unknown",
          confidence: round2(clamp(finiteOr(det.confidence, DEFAULT_CONFIDENCE), 0, 1)),
        };
        const bucket = byTime.get(time);
        if (bucket) bucket.push(sighting);
        else byTime.set(time, [sighting]);
      }
    }

    const density = emptyDensity();
    const appearances: ObjectAppearance[] = [];
    const focus: ObjectFocus[] = [];
    const times = [...byTime.keys()].sort(cmpNum);

    for (const time of times) {
      const sightings = byTime.get(time) ?? [];

      if (this.windows.inHook(time)) {
        const unique = mostConfidentPerLabel(sightings);
        appearances.push({
          time,
          objects: unique.slice(0, MAX_OBJECTS_PER_APPEARANCE).map((s) => s.object),
          confidence: unique.slice(0, MAX_OBJECTS_PER_APPEARANCE).map((s) => s.confidence),
        });
        addDensity(density, this.windows.hookSecond(time), unique.length);
      }

      if (this.windows.inCta(time)) {
        for (const s of sightings) {
          if (isFocusObject(s.object)) focus.push({ time, object: s.object, confidence: s.confidence });
        }
      }
    }

    return {
      source: "object",
      hook_window: {
        density_progression: density,
        object_appearances: earliest(appearances, HOOK_LIMITS.object_appearances),
      },
      cta_window: {
        time_range: this.windows.timeRange,
        object_focus: earliest(focus, CTA_LIMITS.object_focus),
      },
    };
  }
}

const FOCUS_LABELS: ReadonlySet<string> = new Set<string>(FOCUS_OBJECTS);

function isFocusObject(label: string): boolean {
  return FOCUS_LABELS.has(label);
}

function finiteOr(n: number | undefined, fallback: number): number {
  return typeof n === "number" && Number.isFinite(n) ? n : fallback;
}

// One entry per label at its best confidence, most confident first; ties keep first-seen order.
function mostConfidentPerLabel(sightings: readonly Sighting[]): Sighting[] {
  const best = new Map<string, Sighting>();
  for (const s of sightings) {
    const prev = best.get(s.object);
    if (!prev || s.confidence > prev.confidence) best.set(s.object, s);
  }
  return [...best.values()]
    .map((s, index) => ({ s, index }))
    .sort((a, b) => cmpNum(b.s.confidence, a.s.confidence) || a.index - b.index)
    .map(({ s }) => s);
}
