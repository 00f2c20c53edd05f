import type { EventMetadata } from "../types.js";
import type { EventRecord } from "../audit/eventRecord.js";
import { renderValue } from "../audit/escalation.js";

const DASH = "-";

export function renderMetadata(metadata?: EventMetadata): string {
  const pairs = metadata ? Object.entries(metadata) : [];
  if (!pairs.length) return "none";
  return pairs.map(([k, v]) => `${k}: ${renderValue(v)}`).join(", ");
}

/**
 * `<iso-ts> <name> <metadata> | role:<r> staffID:<s> context:<c> escalate:<YES|NO>`
 */
export function renderRecord(record: EventRecord): string {
  const ts = new Date(record.timestamp).toISOString();
  const audit = [
    `role:${record.role ?? DASH}`,
    `staffID:${record.staffID ?? DASH}`,
    `context:${record.context ?? DASH}`,
    `escalate:${record.escalate ? "YES" : "NO"}`
  ].join(" ");
  return `${ts} ${record.name} ${renderMetadata(record.metadata)} | ${audit}`;
}

export function render(records: readonly EventRecord[]): string {
  return records.map(renderRecord).join("\n");
}
