import fs from "fs";
import path from "path";
import type { Logger, TemporalMarkerDocument } from "./types";
import { isMarkerDocument } from "./validator";

/**
 * File-backed marker cache, one JSON file per video. The cache is an
 * artifact only: a missing, unreadable or off-schema entry is recomputed.
 */
export class MarkerCache {
  private readonly dir: string;

  constructor(dir: string, private readonly logger: Logger = console) {
    this.dir = path.resolve(dir);
  }

  fileFor(videoId: string) {
    return path.join(this.dir, `${videoId.replace(/[^A-Za-z0-9_.-]/g, "_")}_temporal_markers.json`);
  }

  get(videoId: string): TemporalMarkerDocument | undefined {
    const file = this.fileFor(videoId);
    if (!fs.existsSync(file)) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (err) {
      this.logger.warn(`Ignoring unreadable marker cache ${file}: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
    if (!isMarkerDocument(parsed)) {
      this.logger.warn(`Ignoring invalid marker cache ${file}: ${isMarkerDocument.errors().join("; ")}`);
      return undefined;
    }
    if (parsed.metadata.video_id !== videoId) {
      this.logger.warn(`Ignoring marker cache ${file}: written for video ${parsed.metadata.video_id}`);
      return undefined;
    }
    return parsed;
  }

  set(videoId: string, doc: TemporalMarkerDocument): string {
    const file = this.fileFor(videoId);
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(file, JSON.stringify(doc, null, 2), "utf8");
    return file;
  }

  getOrCompute(videoId: string, compute: () => TemporalMarkerDocument): TemporalMarkerDocument {
    const cached = this.get(videoId);
    if (cached) return cached;
    const doc = compute();
    this.set(videoId, doc);
    return doc;
  }
}
