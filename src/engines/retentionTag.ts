import { AuditedEngine } from "./auditedEngine.js";
import type { EngineOptions } from "./auditedEngine.js";

export type RetentionTag = "new" | "active" | "at_risk" | "lapsed";

export class RetentionTagEngine extends AuditedEngine {
  constructor(opts: EngineOptions = {}) {
    super("RetentionTagEngine", 30, opts);
  }

  // Stub: every owner is "active" until a real model lands.
  tagFor(ownerId: string): RetentionTag {
    const tag: RetentionTag = "active";
    this.log("retention_tag_evaluated", { ownerID: ownerId, tag });
    return tag;
  }

  refreshTags(ownerIds: readonly string[]): Map<string, RetentionTag> {
    this.log("retention_refresh_started", { owners: ownerIds.length });
    return new Map(ownerIds.map(id => [id, this.tagFor(id)]));
  }

  statusMessage() {
    return "Retention tag engine is operational.";
  }
}
