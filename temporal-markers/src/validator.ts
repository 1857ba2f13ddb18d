import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import { MarkerDocumentSchema } from "./schema";
import type { TemporalMarkerDocument } from "./types";
import { serializedSize } from "./utils";

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });

/** Type guard whose `errors()` describes the most recent rejection. */
export type Guard<T> = ((data: unknown) => data is T) & { errors: () => string[] };

export function compileGuard<T>(schema: SchemaObject): Guard<T> {
  const validate = ajv.compile<T>(schema);
  const guard = (data: unknown): data is T => validate(data);
  return Object.assign(guard, { errors: () => schemaErrors(validate) });
}

function schemaErrors(fn: ValidateFunction): string[] {
  return (fn.errors || []).map((e) => `${e.instancePath} ${e.message ?? ""}`.trim());
}

export const isMarkerDocument = compileGuard<TemporalMarkerDocument>(MarkerDocumentSchema);

export const DEFAULT_MAX_MARKER_BYTES = 50 * 1024;

const RANGE = /^(\d+(?:\.\d+)?)-(\d+(?:\.\d+)?)s$/;

/**
 * Structural and size checks. Returns warnings; never throws.
 */
export function validateMarkerDocument(
  doc: unknown,
  opts: { maxBytes?: number } = {}
): string[] {
  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_MARKER_BYTES;
  const warnings: string[] = [];

  if (isMarkerDocument(doc)) {
    warnings.push(...orderingWarnings(doc), ...ctaRangeWarnings(doc));
  } else {
    warnings.push(...isMarkerDocument.errors());
  }

  let bytes: number;
  try {
    bytes = serializedSize(doc);
  } catch (err) {
    warnings.push(`Markers are not serializable: ${err instanceof Error ? err.message : String(err)}`);
    return warnings;
  }
  if (bytes > maxBytes) {
    warnings.push(`Markers size ${(bytes / 1024).toFixed(1)}KB exceeds limit of ${(maxBytes / 1024).toFixed(1)}KB`);
  }
  return warnings;
}

function orderingWarnings(doc: TemporalMarkerDocument): string[] {
  const lists: [string, readonly { time: number }[]][] = [
    ["/hook_window/text_moments", doc.hook_window.text_moments],
    ["/hook_window/gesture_moments", doc.hook_window.gesture_moments],
    ["/hook_window/object_appearances", doc.hook_window.object_appearances],
    ["/cta_window/cta_appearances", doc.cta_window.cta_appearances],
    ["/cta_window/gesture_sync", doc.cta_window.gesture_sync ?? []],
    ["/cta_window/object_focus", doc.cta_window.object_focus],
  ];
  return lists
    .filter(([, items]) => items.some((item, i) => i > 0 && item.time < items[i - 1].time))
    .map(([path]) => `${path} is not sorted by time`);
}

function ctaRangeWarnings(doc: TemporalMarkerDocument): string[] {
  const m = RANGE.exec(doc.cta_window.time_range);
  if (!m) return [`/cta_window/time_range is not a range: ${doc.cta_window.time_range}`];
  const start = Number(m[1]);
  const end = Number(m[2]);
  const out: string[] = [];
  const check = (path: string, items: readonly { time: number }[]) => {
    items.forEach((item, i) => {
      // time_range is printed to one decimal; allow that much slack
      if (item.time < start - 0.05 || item.time > end + 0.05) {
        out.push(`${path}/${i} time ${item.time} is outside CTA window ${doc.cta_window.time_range}`);
      }
    });
  };
  check("/cta_window/cta_appearances", doc.cta_window.cta_appearances);
  check("/cta_window/gesture_sync", doc.cta_window.gesture_sync ?? []);
  check("/cta_window/object_focus", doc.cta_window.object_focus);
  return out;
}
