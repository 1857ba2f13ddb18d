import { formatMarkers } from "./promptFormatter";
import { shouldIncludeMarkers } from "./rollout";
import { HARD_CEILING_BYTES } from "./sizeSafety";
import type { MarkerConfig, TemporalMarkerDocument } from "./types";

export type PromptSizeEstimate = {
  totalChars: number;
  sizeKb: number;
  warnings: string[];
};

const LARGE_PROMPT_BYTES = 150 * 1024;

const renderContext = (existing: string | Record<string, unknown>) =>
  typeof existing === "string" ? existing : `CONTEXT DATA:\n${JSON.stringify(existing, null, 2)}`;

/**
 * Existing prompt context with the marker block appended when the rollout
 * gate admits `videoId`. Without a document, or outside the rollout, the
 * context is returned as rendered.
 */
export function buildContextWithMarkers(
  existing: string | Record<string, unknown>,
  doc: TemporalMarkerDocument | null,
  videoId: string,
  config: MarkerConfig,
  compact?: boolean
): string {
  const context = renderContext(existing);
  if (!doc || !shouldIncludeMarkers(videoId, config)) return context;
  const { text } = formatMarkers(doc, { ...config.formatOptions, ...(compact === undefined ? {} : { compact }) });
  return `${context}\n\n${text}`;
}

export function estimatePromptSize(context: string, prompt: string): PromptSizeEstimate {
  const totalChars = context.length + prompt.length;
  const sizeKb = totalChars / 1024;
  const warnings: string[] = [];
  if (totalChars > HARD_CEILING_BYTES) warnings.push("Prompt exceeds 180KB - may cause API errors");
  else if (totalChars > LARGE_PROMPT_BYTES) warnings.push("Prompt is large (>150KB) - consider compact mode");
  return { totalChars, sizeKb, warnings };
}
