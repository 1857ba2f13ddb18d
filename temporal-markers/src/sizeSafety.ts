import type {
  CtaAppearance,
  GestureMoment,
  GestureSync,
  Logger,
  ObjectAppearance,
  ObjectFocus,
  ReduceResult,
  ReductionStep,
  TemporalMarkerDocument,
  TextMoment,
} from "./types";
import { serializedSize } from "./utils";

export const SOFT_TARGET_BYTES = 50 * 1024;
export const HARD_CEILING_BYTES = 180 * 1024;

const kb = (bytes: number) => `${(bytes / 1024).toFixed(1)}KB`;

// Optional fields dropped per entity: confidence, position, target.

const stripTextMoment = (m: TextMoment): TextMoment => ({
  time: m.time,
  text: m.text,
  size: m.size,
  ...(m.is_cta ? { is_cta: true } : {}),
});

const stripGestureMoment = (m: GestureMoment): GestureMoment => ({ time: m.time, gesture: m.gesture });

const stripObjectAppearance = (m: ObjectAppearance): ObjectAppearance => ({ time: m.time, objects: m.objects });

const stripCtaAppearance = (m: CtaAppearance): CtaAppearance => ({
  time: m.time,
  text: m.text,
  type: m.type,
  ...(m.size ? { size: m.size } : {}),
});

const stripGestureSync = (m: GestureSync): GestureSync => ({
  time: m.time,
  gesture: m.gesture,
  ...(m.aligns_with_cta ? { aligns_with_cta: true } : {}),
});

const stripObjectFocus = (m: ObjectFocus): ObjectFocus => ({ time: m.time, object: m.object });

type Step = (doc: TemporalMarkerDocument) => void;

/** Applied in order until the document fits; each is idempotent and never adds data. */
const STEPS: [ReductionStep, Step][] = [
  ["truncate_text_moments", (d) => { d.hook_window.text_moments = d.hook_window.text_moments.slice(0, 10); }],
  ["truncate_gesture_moments", (d) => { d.hook_window.gesture_moments = d.hook_window.gesture_moments.slice(0, 8); }],
  ["truncate_cta_appearances", (d) => { d.cta_window.cta_appearances = d.cta_window.cta_appearances.slice(0, 8); }],
  [
    "strip_optional_fields",
    (d) => {
      const h = d.hook_window;
      const c = d.cta_window;
      h.text_moments = h.text_moments.map(stripTextMoment);
      h.gesture_moments = h.gesture_moments.map(stripGestureMoment);
      h.object_appearances = h.object_appearances.map(stripObjectAppearance);
      c.cta_appearances = c.cta_appearances.map(stripCtaAppearance);
      if (c.gesture_sync) c.gesture_sync = c.gesture_sync.map(stripGestureSync);
      c.object_focus = c.object_focus.map(stripObjectFocus);
    },
  ],
  [
    "aggressive_truncation",
    (d) => {
      const h = d.hook_window;
      h.text_moments = h.text_moments.slice(0, 5);
      h.gesture_moments = h.gesture_moments.slice(0, 3);
      h.object_appearances = h.object_appearances.slice(0, 5);
      d.cta_window.cta_appearances = d.cta_window.cta_appearances.slice(0, 3);
      delete d.cta_window.gesture_sync;
    },
  ],
];

/**
 * Progressive, lossy size reduction. Returns the input untouched when it
 * already fits; otherwise a reduced copy. When every step has run and the
 * document is still over target, the maximally reduced copy is returned with
 * `withinTarget: false`.
 */
export function reduceToFit(
  doc: TemporalMarkerDocument,
  targetBytes: number = SOFT_TARGET_BYTES,
  logger: Logger = console
): ReduceResult {
  const originalBytes = serializedSize(doc);
  if (originalBytes <= targetBytes) {
    return { document: doc, originalBytes, sizeBytes: originalBytes, withinTarget: true, stepsApplied: [] };
  }

  logger.warn(`Markers size ${kb(originalBytes)} exceeds ${kb(targetBytes)} target, reducing`);
  const reduced = structuredClone(doc);
  const stepsApplied: ReductionStep[] = [];
  let sizeBytes = originalBytes;

  for (const [name, step] of STEPS) {
    step(reduced);
    stepsApplied.push(name);
    sizeBytes = serializedSize(reduced);
    if (sizeBytes <= targetBytes) {
      logger.info(`Reduced markers to ${kb(sizeBytes)} after ${name}`);
      return { document: reduced, originalBytes, sizeBytes, withinTarget: true, stepsApplied };
    }
  }

  logger.warn(`Could not reduce markers below ${kb(targetBytes)}; returning ${kb(sizeBytes)}`);
  return { document: reduced, originalBytes, sizeBytes, withinTarget: false, stepsApplied };
}
