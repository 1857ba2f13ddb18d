import vocabulary from "./data/vocabulary.json";
import { EMOTIONS, GESTURES } from "./types";
import type { Emotion, Gesture } from "./types";

const GESTURE_LABELS: ReadonlySet<string> = new Set<string>(GESTURES);
const EMOTION_LABELS: ReadonlySet<string> = new Set<string>(EMOTIONS);

const isGesture = (s: string): s is Gesture => GESTURE_LABELS.has(s);
const isEmotion = (s: string): s is Emotion => EMOTION_LABELS.has(s);

function buildLookup<T extends string>(
  synonyms: Record<string, string>,
  guard: (s: string) => s is T
): Map<string, T> {
  const out = new Map<string, T>();
  for (const [raw, canonical] of Object.entries(synonyms)) {
    if (!guard(canonical)) throw new Error(`vocabulary maps "${raw}" to non-canonical "${canonical}"`);
    out.set(raw, canonical);
  }
  return out;
}

const GESTURE_LOOKUP = buildLookup(vocabulary.gestures, isGesture);
const EMOTION_LOOKUP = buildLookup(vocabulary.emotions, isEmotion);

const key = (raw: unknown) => (typeof raw === "string" ? raw.trim().toLowerCase() : "");

/** Case- and whitespace-insensitive; anything unmapped is "unknown". */
export function canonicalGesture(raw: unknown): Gesture {
  return GESTURE_LOOKUP.get(key(raw)) ?? "unknown";
}

export function canonicalEmotion(raw: unknown): Emotion {
  return EMOTION_LOOKUP.get(key(raw)) ?? "unknown";
}

export const CTA_KEYWORDS = [
  "follow",
  "like",
  "subscribe",
  "comment",
  "share",
  "click",
  "tap",
  "link",
  "bio",
  "save",
  "check",
  "swipe",
  "dm",
] as const;

/** Broader set the formatter uses to spot an early call-to-action in the hook. */
export const EARLY_CTA_KEYWORDS = ["follow", "like", "subscribe", "buy", "get", "click", "tap"] as const;

export const FOCUS_OBJECTS = ["person", "hand", "product"] as const;
