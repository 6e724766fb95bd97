import type { LearningCategory } from "./types.js";
import { LEARNING_CATEGORIES } from "./types.js";

/** Comparison form: trimmed, whitespace collapsed, case-folded. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

export function stripNul(text: string): string {
  return text.replace(/\u0000/g, "");
}

export function isBlank(text: string | undefined | null): boolean {
  return !text || text.trim().length === 0;
}

export function isLearningCategory(value: string): value is LearningCategory {
  return LEARNING_CATEGORIES.some((c) => c === value);
}

export function learningKey(workspaceId: string, modelName: string, category: string): string {
  return `${workspaceId || "global"}::${modelName}::${category}`;
}

export function epochSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}

export function preview(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
