import { AuditedEngine } from "./auditedEngine.js";
import type { EngineOptions } from "./auditedEngine.js";
import { errorMessage } from "../logging/logger.js";
import { renderRecord } from "../diagnostics/render.js";
import type { Clock } from "../util/clock.js";
import { SystemClock } from "../util/clock.js";

export type SyncState = "idle" | "syncing" | "failed";

export type SyncTrigger = "manual" | "retry";

export type SyncStatus = {
  state: SyncState;
  lastSyncAt?: number;
  lastError?: string;
  consecutiveErrors: number;
  stale: boolean;
  riskScore: number;
  retryScheduled: boolean;
};

export type SyncEngineOptions = EngineOptions & {
  /** A sync older than this is overdue. Default 8h. */
  staleAfterMs?: number;
  /** Delay before the automatic retry. Default 60s. */
  retryDelayMs?: number;
  /** Consecutive errors that schedule an automatic retry. Default 3. */
  retryAfterErrors?: number;
};

export class SyncEngine extends AuditedEngine {
  private state: SyncState = "idle";
  private lastSyncAt?: number;
  private lastError?: string;
  private consecutiveErrors = 0;
  private stale = false;
  private badgeTokens: string[] = [];
  private retryTimer?: NodeJS.Timeout;
  private clock: Clock;
  private staleAfterMs: number;
  private retryDelayMs: number;
  private retryAfterErrors: number;

  constructor(opts: SyncEngineOptions = {}) {
    super("SyncEngine", 50, opts);
    this.clock = opts.clock ?? new SystemClock();
    this.staleAfterMs = opts.staleAfterMs ?? 8 * 3600_000;
    this.retryDelayMs = opts.retryDelayMs ?? 60_000;
    this.retryAfterErrors = opts.retryAfterErrors ?? 3;
  }

  async triggerManualSync(): Promise<SyncStatus> {
    this.runSync("manual");
    return this.status();
  }

  reportError(error: unknown) {
    const message = errorMessage(error);
    this.state = "failed";
    this.lastError = message;
    this.consecutiveErrors++;
    this.log("sync_error", { error: message, consecutiveErrors: this.consecutiveErrors });
    this.addBadge("error");
    if (this.consecutiveErrors >= this.retryAfterErrors) this.scheduleRetry();
    this.checkStaleSync();
  }

  /** Flags the engine overdue once the last sync is older than the threshold; clears it after a fresh sync. */
  checkStaleSync(): boolean {
    const last = this.lastSyncAt;
    const overdue = last !== undefined && this.clock.now() - last > this.staleAfterMs;
    if (overdue && !this.stale) {
      this.stale = true;
      this.addBadge("stale");
      this.log("sync_stale", { lastSyncAt: new Date(last) });
    } else if (!overdue && this.stale) {
      this.stale = false;
      this.removeBadge("stale");
    }
    return this.stale;
  }

  /** 2 for an outstanding error, 1 for staleness, 1 for an error streak. */
  riskScore(): number {
    let score = 0;
    if (this.lastError !== undefined) score += 2;
    if (this.stale) score += 1;
    if (this.consecutiveErrors > 0) score += 1;
    return score;
  }

  badges(): string[] {
    return [...this.badgeTokens];
  }

  /** Cancels a pending automatic retry. */
  stop(): boolean {
    if (!this.retryTimer) return false;
    clearTimeout(this.retryTimer);
    this.retryTimer = undefined;
    return true;
  }

  status(): SyncStatus {
    return {
      state: this.state,
      lastSyncAt: this.lastSyncAt,
      lastError: this.lastError,
      consecutiveErrors: this.consecutiveErrors,
      stale: this.stale,
      riskScore: this.riskScore(),
      retryScheduled: this.retryTimer !== undefined
    };
  }

  /** Sync state plus the rendered audit log, pretty-printed. */
  exportJSON(): string {
    return JSON.stringify(
      {
        lastSyncAt: this.lastSyncAt !== undefined ? new Date(this.lastSyncAt).toISOString() : null,
        state: this.state,
        stale: this.stale,
        riskScore: this.riskScore(),
        lastError: this.lastError ?? null,
        badges: this.badges(),
        auditLog: this.recentEvents().map(renderRecord)
      },
      null,
      2
    );
  }

  override diagnostics() {
    return {
      ...super.diagnostics(),
      syncState: this.state,
      stale: String(this.stale),
      riskScore: String(this.riskScore())
    };
  }

  statusMessage() {
    if (this.state === "failed") {
      const suffix = this.retryTimer ? " Retrying automatically." : "";
      return `Sync engine is degraded: ${this.lastError ?? "unknown error"}.${suffix}`;
    }
    if (this.stale) return "Sync engine is overdue.";
    return "Sync engine is operational.";
  }

  // Nothing to push or pull yet; a completed pass resets the error streak.
  private runSync(trigger: SyncTrigger) {
    this.stop();
    this.state = "syncing";
    this.log("sync_started", { trigger });
    this.addBadge(trigger);
    const done = this.log("sync_completed", { trigger });
    this.state = "idle";
    this.lastSyncAt = done.timestamp;
    this.lastError = undefined;
    this.consecutiveErrors = 0;
    this.addBadge("success");
    this.checkStaleSync();
  }

  private scheduleRetry() {
    this.stop();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      this.runSync("retry");
    }, this.retryDelayMs);
    this.retryTimer.unref();
    this.log("sync_retry_scheduled", { delayMs: this.retryDelayMs });
  }

  private addBadge(token: string) {
    if (this.badgeTokens.includes(token)) return;
    this.log("badge_added", { token });
    this.badgeTokens.push(token);
  }

  private removeBadge(token: string) {
    if (!this.badgeTokens.includes(token)) return;
    this.log("badge_removed", { token });
    this.badgeTokens = this.badgeTokens.filter(t => t !== token);
  }
}
