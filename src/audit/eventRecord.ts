import type { EventMetadata } from "../types.js";
import type { AuditFields } from "./auditContext.js";

export type EventRecord = {
  readonly id: string;
  /** ms epoch; non-decreasing per recorder */
  readonly timestamp: number;
  readonly name: string;
  readonly metadata?: EventMetadata;
  readonly role?: string;
  readonly staffID?: string;
  readonly context?: string;
  readonly escalate: boolean;
};

export type EventRecordInit = {
  id: string;
  timestamp: number;
  name: string;
  metadata?: EventMetadata;
  audit: AuditFields;
  escalate: boolean;
};

/** Builds a frozen record. Metadata is copied so later caller edits don't leak in. */
export function createEventRecord(init: EventRecordInit): EventRecord {
  const record: EventRecord = {
    id: init.id,
    timestamp: init.timestamp,
    name: init.name,
    ...(init.metadata ? { metadata: Object.freeze({ ...init.metadata }) } : {}),
    role: init.audit.role,
    staffID: init.audit.staffID,
    context: init.audit.context,
    escalate: init.escalate
  };
  return Object.freeze(record);
}
