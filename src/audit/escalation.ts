import type { EventMetadata, MetadataValue } from "../types.js";

export const ESCALATION_KEYWORDS = ["danger", "critical", "delete"] as const;

/** Dates render as ISO-8601; an invalid date renders as "Invalid Date". */
export function renderValue(value: MetadataValue): string {
  if (!(value instanceof Date)) return String(value);
  return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
}

function mentionsKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return ESCALATION_KEYWORDS.some(k => lower.includes(k));
}

/**
 * An event escalates when its name, or any rendered metadata value, contains
 * one of the escalation keywords (case-insensitive substring match).
 */
export function classifyEscalation(name: string, metadata?: EventMetadata): boolean {
  if (mentionsKeyword(name)) return true;
  if (!metadata) return false;
  return Object.values(metadata).some(v => mentionsKeyword(renderValue(v)));
}
