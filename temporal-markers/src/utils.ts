import { createHash } from "crypto";

export const MAX_TEXT_LENGTH = 50;

export const hash = (s: string) => createHash("sha256").update(s).digest("hex");
export const cmpNum = (a: number, b: number) => (a < b ? -1 : a > b ? 1 : 0);
export const round2 = (x: number) => Math.round(x * 100) / 100;

export function clamp(n: number, lo: number, hi: number) {
  return Math.max(lo, Math.min(hi, n));
}

/** UTF-8 byte length of the compact JSON form. */
export function serializedSize(o: unknown): number {
  return Buffer.byteLength(JSON.stringify(o), "utf8");
}

/** Stable ascending sort by `time`; equal times keep input order. */
export function byTime<T extends { time: number }>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => cmpNum(a.item.time, b.item.time) || a.index - b.index)
    .map(({ item }) => item);
}

/** Earliest `limit` entries, ascending by time. */
export function earliest<T extends { time: number }>(items: readonly T[], limit: number): T[] {
  return byTime(items).slice(0, limit);
}

/** Collapse whitespace and cap at MAX_TEXT_LENGTH code points with a trailing ellipsis. */
export function truncateText(text: string): string {
  const t = text.trim().split(/\s+/).filter(Boolean).join(" ");
  const chars = Array.from(t);
  return chars.length > MAX_TEXT_LENGTH ? chars.slice(0, MAX_TEXT_LENGTH - 3).join("") + "..." : t;
}

/** Finite number from a number or numeric string; null for anything else. */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Whole-word, case-insensitive keyword match. */
export function matchesKeyword(text: string, keywords: readonly string[]): boolean {
  const t = text.toLowerCase();
  return keywords.some((k) => new RegExp(`\\b${k}\\b`).test(t));
}

/** Canonical JSON (sorted keys) for stable hashing. */
export function canonicalSerialize(o: unknown): string {
  const seen = new WeakSet<object>();
  const sortKeys = (v: unknown): unknown => {
    if (v && typeof v === "object") {
      if (seen.has(v)) return null;
      seen.add(v);
      if (Array.isArray(v)) return v.map(sortKeys);
      const out: Record<string, unknown> = {};
      for (const [k, child] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        out[k] = sortKeys(child);
      }
      return out;
    }
    return v;
  };
  return JSON.stringify(sortKeys(o));
}
