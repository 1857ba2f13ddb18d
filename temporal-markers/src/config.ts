import fs from "fs";
import path from "path";
import { ConfigError } from "./errors";
import { MarkerConfigFileSchema } from "./schema";
import type { FormatOptions, MarkerConfig } from "./types";
import { compileGuard } from "./validator";

export const DEFAULT_CONFIG_PATH = "config/temporal_markers.json";

export type MarkerConfigFile = {
  enable_temporal_markers: boolean;
  rollout_percentage: number;
  format_options?: {
    include_density?: boolean;
    include_emotions?: boolean;
    include_gestures?: boolean;
    include_objects?: boolean;
    include_cta?: boolean;
    compact_mode?: boolean;
  };
};

export type ConfigEnv = Record<string, string | undefined>;

const isMarkerConfigFile = compileGuard<MarkerConfigFile>(MarkerConfigFileSchema);

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = {
  includeDensity: true,
  includeEmotions: true,
  includeGestures: true,
  includeObjects: true,
  includeCta: true,
  compact: false,
};

export const DEFAULT_MARKER_CONFIG: MarkerConfig = {
  enabled: true,
  percentage: 100,
  formatOptions: DEFAULT_FORMAT_OPTIONS,
};

/**
 * Reads the marker configuration file, then applies ENABLE_TEMPORAL_MARKERS
 * and TEMPORAL_ROLLOUT_PERCENTAGE from `env`. A missing file means defaults.
 */
export function loadMarkerConfig(filePath: string = DEFAULT_CONFIG_PATH, env: ConfigEnv = {}): MarkerConfig {
  const abs = path.resolve(filePath);
  let raw: Record<string, unknown> = toFile(DEFAULT_MARKER_CONFIG);

  if (fs.existsSync(abs)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(abs, "utf8"));
    } catch (err) {
      throw new ConfigError(`Unreadable marker config ${abs}`, [err instanceof Error ? err.message : String(err)]);
    }
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigError(`Marker config ${abs} must be a JSON object`);
    }
    raw = { ...raw, ...parsed };
  }

  const enabled = env.ENABLE_TEMPORAL_MARKERS;
  if (enabled !== undefined) raw.enable_temporal_markers = parseFlag(enabled);
  const percentage = env.TEMPORAL_ROLLOUT_PERCENTAGE;
  if (percentage !== undefined) raw.rollout_percentage = percentage.trim() === "" ? NaN : Number(percentage);

  if (!isMarkerConfigFile(raw)) {
    throw new ConfigError(`Invalid marker config ${abs}`, isMarkerConfigFile.errors());
  }
  return fromFile(raw);
}

export function saveMarkerConfig(filePath: string, config: MarkerConfig): void {
  const abs = path.resolve(filePath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, JSON.stringify(toFile(config), null, 2) + "\n", "utf8");
}

function parseFlag(value: string): boolean | string {
  const v = value.trim().toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return value; // left for the schema to reject
}

function fromFile(file: MarkerConfigFile): MarkerConfig {
  const f = file.format_options ?? {};
  const d = DEFAULT_FORMAT_OPTIONS;
  return {
    enabled: file.enable_temporal_markers,
    percentage: file.rollout_percentage,
    formatOptions: {
      includeDensity: f.include_density ?? d.includeDensity,
      includeEmotions: f.include_emotions ?? d.includeEmotions,
      includeGestures: f.include_gestures ?? d.includeGestures,
      includeObjects: f.include_objects ?? d.includeObjects,
      includeCta: f.include_cta ?? d.includeCta,
      compact: f.compact_mode ?? d.compact,
    },
  };
}

function toFile(config: MarkerConfig): MarkerConfigFile {
  const o = config.formatOptions;
  return {
    enable_temporal_markers: config.enabled,
    rollout_percentage: config.percentage,
    format_options: {
      include_density: o.includeDensity,
      include_emotions: o.includeEmotions,
      include_gestures: o.includeGestures,
      include_objects: o.includeObjects,
      include_cta: o.includeCta,
      compact_mode: o.compact,
    },
  };
}
