import type { EventMetadata } from "../types.js";
import { AuditContext, session as defaultSession } from "../audit/auditContext.js";
import type { SessionStore } from "../audit/auditContext.js";
import type { EventRecord } from "../audit/eventRecord.js";
import type { AnalyticsDelivery } from "../delivery/delivery.js";
import { NullDelivery } from "../delivery/delivery.js";
import type { AuditSettings } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import type { MeterRegistry } from "../core/registry.js";
import type { Clock } from "../util/clock.js";
import { EventRecorder } from "../recorder/eventRecorder.js";

export type EngineOptions = {
  delivery?: AnalyticsDelivery;
  session?: SessionStore;
  /** Overrides the engine's default buffer size. */
  capacity?: number;
  logger?: Logger;
  meter?: MeterRegistry;
  clock?: Clock;
  retries?: number;
};

/** Engine options derived from validated settings; explicit `base` values win. */
export function engineOptionsFromSettings(settings: AuditSettings, base: EngineOptions = {}): EngineOptions {
  return {
    ...base,
    capacity: base.capacity ?? settings.bufferCapacity,
    retries: base.retries ?? settings.deliveryRetries,
    delivery: base.delivery ?? new NullDelivery({ verbose: settings.verbose })
  };
}

/** Shared plumbing for the engine stubs: one recorder per engine instance. */
export abstract class AuditedEngine {
  protected readonly recorder: EventRecorder;

  protected constructor(readonly name: string, defaultCapacity: number, opts: EngineOptions = {}) {
    this.recorder = new EventRecorder({
      capacity: opts.capacity ?? defaultCapacity,
      context: new AuditContext(name, opts.session ?? defaultSession),
      delivery: opts.delivery,
      logger: opts.logger,
      meter: opts.meter,
      clock: opts.clock,
      retries: opts.retries
    });
  }

  abstract statusMessage(): string;

  /** The engine's recorder, for diagnostics aggregation and shutdown. */
  get events(): EventRecorder {
    return this.recorder;
  }

  recentEvents(): EventRecord[] {
    return this.recorder.snapshot();
  }

  diagnostics(): Record<string, string> {
    const d = this.recorder.diagnostics();
    return {
      recentEventCount: String(d.buffered),
      escalatedEventCount: String(d.escalated),
      bufferCapacity: String(d.capacity),
      verbose: String(d.verbose),
      failedDeliveries: String(d.failedDeliveries)
    };
  }

  flush(): Promise<void> {
    return this.recorder.flush();
  }

  protected log(name: string, metadata?: EventMetadata): EventRecord {
    return this.recorder.record(name, metadata);
  }
}
