import { DEFAULT_BLEND_WEIGHTS } from "./config.js";
import type { BlendWeights, MemvaultConfig } from "./types.js";

export type RankingConfig = Pick<MemvaultConfig, "rankWeights" | "blendWeights" | "recencyWindowDays">;

/** Metadata fields the composite score reads; anything non-numeric counts as neutral. */
export interface RankableMetadata {
  importance?: unknown;
  reliability?: unknown;
  frequency?: unknown;
  priority?: unknown;
  createdAt?: unknown;
}

export type PriorityTag = "critical" | "pinned" | "reinforced" | "normal" | "archived";

export const PRIORITY_SCORES: Readonly<Record<PriorityTag, number>> = {
  critical: 1.0,
  pinned: 0.85,
  reinforced: 0.7,
  normal: 0.5,
  archived: 0.1,
};

const NEUTRAL = 0.5;
const DAY_MS = 86_400_000;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function scalarOrNeutral(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? clamp01(value) : NEUTRAL;
}

function isPriorityTag(value: string): value is PriorityTag {
  return Object.prototype.hasOwnProperty.call(PRIORITY_SCORES, value);
}

/** Unknown or missing tags score like `normal`. */
export function resolvePriorityScore(tag: unknown): number {
  if (typeof tag !== "string") return PRIORITY_SCORES.normal;
  const normalized = tag.trim().toLowerCase();
  return isPriorityTag(normalized) ? PRIORITY_SCORES[normalized] : PRIORITY_SCORES.normal;
}

export function blendRelevance(
  semantic: number,
  keyword: number,
  weights: BlendWeights = DEFAULT_BLEND_WEIGHTS,
): number {
  const s = clamp01(Number.isFinite(semantic) ? semantic : 0);
  const k = clamp01(Number.isFinite(keyword) ? keyword : 0);
  const ws = Math.max(0, weights.semantic);
  const wk = Math.max(0, weights.keyword);
  const total = ws + wk;
  if (total <= 0) return roundScore(s);
  return roundScore(clamp01((s * ws + k * wk) / total));
}

/**
 * Fraction of case-folded, whitespace-split query tokens that occur as
 * substrings of the candidate text.
 */
export function keywordOverlapScore(query: string, text: string): number {
  const tokens = query.toLowerCase().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0 || text.length === 0) return 0;
  const haystack = text.toLowerCase();
  const matched = tokens.filter((t) => haystack.includes(t)).length;
  return matched / tokens.length;
}

const HAS_ZONE = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

function parseTimestamp(value: string): number {
  // Date-time strings without a zone are read as UTC.
  const iso = value.includes("T") && !HAS_ZONE.test(value) ? `${value}Z` : value;
  return Date.parse(iso);
}

export function recencyScore(createdAt: unknown, windowDays: number, now: number = Date.now()): number {
  if (typeof createdAt !== "string" || createdAt.length === 0) return NEUTRAL;
  const parsed = parseTimestamp(createdAt);
  if (Number.isNaN(parsed)) return NEUTRAL;
  const ageDays = Math.max((now - parsed) / DAY_MS, 0);
  const window = Math.max(windowDays, 1);
  return clamp01(1 - ageDays / window);
}

export function buildRankScore(
  relevance: number,
  metadata: RankableMetadata,
  config: RankingConfig,
  now: number = Date.now(),
): number {
  const w = config.rankWeights;
  const total =
    clamp01(Number.isFinite(relevance) ? relevance : 0) * w.relevance +
    scalarOrNeutral(metadata.importance) * w.importance +
    scalarOrNeutral(metadata.reliability) * w.reliability +
    recencyScore(metadata.createdAt, config.recencyWindowDays, now) * w.recency +
    scalarOrNeutral(metadata.frequency) * w.frequency +
    resolvePriorityScore(metadata.priority) * w.priority;
  return roundScore(clamp01(total));
}
