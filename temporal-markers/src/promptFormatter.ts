import { DEFAULT_FORMAT_OPTIONS } from "./config";
import type { CtaWindow, FormatOptions, FormattedMarkers, HookWindow, TemporalMarkerDocument } from "./types";
import { CTA_KEYWORDS, EARLY_CTA_KEYWORDS } from "./vocabulary";
import { matchesKeyword } from "./utils";

type ListCaps = {
  text: number;
  gestures: number;
  ctas: number;
  sync: number;
  focus: number;
};

const FULL_CAPS: ListCaps = { text: 10, gestures: 8, ctas: 8, sync: 5, focus: 5 };
const COMPACT_CAPS: ListCaps = { text: 5, gestures: 3, ctas: 3, sync: 2, focus: 3 };

const secs = (t: number) => `${t.toFixed(2)}s`;

/**
 * Renders the marker document as a prompt block plus the insight lines
 * derived from it. Compact mode shortens listings; the document is not touched.
 */
export function formatMarkers(doc: TemporalMarkerDocument, options: Partial<FormatOptions> = {}): FormattedMarkers {
  const opts: FormatOptions = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const caps = opts.compact ? COMPACT_CAPS : FULL_CAPS;
  const insights = deriveInsights(doc);

  const lines = [
    "TEMPORAL PATTERN DATA:",
    "This data captures WHEN events happen in the video and their patterns over time.",
    "",
    ...hookSection(doc.hook_window, opts, caps),
    "",
    ...ctaSection(doc.cta_window, opts, caps),
    "",
    "KEY TEMPORAL INSIGHTS:",
    ...insights.map((i) => `- ${i}`),
  ];

  return { text: lines.join("\n"), insights };
}

function hookSection(hook: HookWindow, opts: FormatOptions, caps: ListCaps): string[] {
  const lines = ["=== FIRST 5 SECONDS (Hook Window) ==="];

  if (opts.includeDensity) {
    const density = hook.density_progression;
    if (opts.compact) {
      lines.push(`Activity Density: [${density.join(", ")}]`);
    } else {
      lines.push("Activity Density by Second:");
      density.forEach((d, i) => lines.push(`  Second ${i}: ${"█".repeat(Math.max(0, Math.trunc(d)))} (${d} events)`));
    }
  }

  if (hook.text_moments.length) {
    lines.push("", "Text Overlays:");
    for (const m of hook.text_moments.slice(0, caps.text)) {
      const detail = opts.compact ? "" : ` (size: ${m.size}, pos: ${m.position ?? "center"})`;
      lines.push(`  ${secs(m.time)}: "${m.text}"${detail}`);
    }
  }

  if (opts.includeEmotions) {
    const emotions = hook.emotion_sequence;
    lines.push("", `Emotion Flow: ${emotions.join(" → ")} (${emotionChanges(emotions)} changes)`);
  }

  if (opts.includeGestures && hook.gesture_moments.length) {
    lines.push("", `Key Gestures: ${hook.gesture_moments.length} detected`);
    for (const g of hook.gesture_moments.slice(0, caps.gestures)) {
      lines.push(`  ${secs(g.time)}: ${g.gesture}${g.target ? ` at ${g.target}` : ""}`);
    }
  }

  if (opts.includeObjects && hook.object_appearances.length) {
    const unique = new Set(hook.object_appearances.flatMap((a) => a.objects));
    lines.push("", `Objects Shown: ${[...unique].sort().join(", ")}`);
  }

  return lines;
}

function ctaSection(cta: CtaWindow, opts: FormatOptions, caps: ListCaps): string[] {
  const lines = [`=== CTA WINDOW (${cta.time_range}) ===`];

  if (opts.includeCta && cta.cta_appearances.length) {
    lines.push("", `Call-to-Actions: ${cta.cta_appearances.length} detected`);
    for (const c of cta.cta_appearances.slice(0, caps.ctas)) {
      const detail = opts.compact ? "" : ` (type: ${c.type})`;
      lines.push(`  ${secs(c.time)}: "${c.text}"${detail}`);
    }
  }

  const sync = cta.gesture_sync ?? [];
  if (opts.includeGestures && sync.length) {
    lines.push("", `Gesture-CTA Sync: ${sync.length} aligned gestures`);
    for (const s of sync.slice(0, caps.sync)) lines.push(`  ${secs(s.time)}: ${s.gesture} gesture`);
  }

  if (opts.includeObjects && cta.object_focus.length) {
    const unique = [...new Set(cta.object_focus.map((f) => f.object))];
    lines.push("", `Focus Objects: ${unique.slice(0, caps.focus).join(", ")}`);
  }

  return lines;
}

function emotionChanges(emotions: readonly string[]): number {
  return emotions.filter((e, i) => i > 0 && e !== emotions[i - 1]).length;
}

/**
 * Fixed-threshold heuristics over the document. Average hook density above 3
 * is high, 2 through 3 moderate, below 1 low.
 */
export function deriveInsights(doc: TemporalMarkerDocument): string[] {
  const hook = doc.hook_window;
  const cta = doc.cta_window;
  const insights: string[] = [];

  const density = hook.density_progression;
  const avg = density.reduce((a, b) => a + b, 0) / density.length;
  if (avg > 3) insights.push("HIGH HOOK DENSITY: First 5s packed with activity");
  else if (avg >= 2) insights.push("MODERATE HOOK DENSITY: Good activity level in opening");
  else if (avg < 1) insights.push("LOW HOOK DENSITY: Minimal activity in first 5s");

  if (hook.text_moments.some((m) => m.is_cta || matchesKeyword(m.text, EARLY_CTA_KEYWORDS))) {
    insights.push("EARLY CTA: Call-to-action in first 5 seconds");
  }

  const placed = cta.cta_appearances.find((c) => matchesKeyword(c.text, CTA_KEYWORDS));
  if (placed) insights.push(`PLACED CTA: Call-to-action in closing window at ${secs(placed.time)}`);

  const distinct = new Set(hook.emotion_sequence.filter((e) => e !== "unknown")).size;
  if (distinct >= 3) insights.push(`EMOTIONAL JOURNEY: ${distinct} distinct emotions in first 5s`);

  if (cta.cta_appearances.length > 2) {
    insights.push(`MULTIPLE CTAS: ${cta.cta_appearances.length} CTAs in closing`);
  }

  if (cta.gesture_sync?.length) insights.push("GESTURE-CTA SYNC: Physical gestures aligned with CTAs");

  if (!insights.length) insights.push("No significant temporal patterns detected");
  return insights;
}
