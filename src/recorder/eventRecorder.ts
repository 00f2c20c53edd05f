import { randomUUID } from "node:crypto";
import type { EventMetadata } from "../types.js";
import type { AuditContextSource } from "../audit/auditContext.js";
import { AuditContext } from "../audit/auditContext.js";
import { classifyEscalation } from "../audit/escalation.js";
import { createEventRecord } from "../audit/eventRecord.js";
import type { EventRecord } from "../audit/eventRecord.js";
import { BoundedBuffer } from "../buffer/boundedBuffer.js";
import type { AnalyticsDelivery } from "../delivery/delivery.js";
import { NullDelivery } from "../delivery/delivery.js";
import { DeliveryQueue } from "../delivery/deliveryQueue.js";
import type { DeadLetter } from "../delivery/deliveryQueue.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { ConsoleSink } from "../logging/sinks.js";
import type { MeterRegistry } from "../core/registry.js";
import type { Counter, Gauge } from "../core/metric.js";
import type { Clock } from "../util/clock.js";
import { MonotonicClock } from "../util/clock.js";
import type { BackoffStrategy } from "../util/backoff.js";

export type EventRecorderOptions = {
  capacity: number;
  /** A component name, or a full context source. */
  context: string | AuditContextSource;
  delivery?: AnalyticsDelivery;
  clock?: Clock;
  idGenerator?: () => string;
  /** Fallback channel for delivery failures. */
  logger?: Logger;
  meter?: MeterRegistry;
  retries?: number;
  backoff?: BackoffStrategy;
};

export type RecorderDiagnostics = {
  component: string;
  capacity: number;
  buffered: number;
  escalated: number;
  evicted: number;
  verbose: boolean;
  pendingDeliveries: number;
  deliveredCount: number;
  failedDeliveries: number;
  abandonedDeliveries: number;
};

type RecorderMetrics = {
  recorded: Counter;
  escalated: Counter;
  evicted: Counter;
  deliveryFailures: Counter;
  bufferSize: Gauge;
};

function recorderMetrics(meter: MeterRegistry): RecorderMetrics {
  const labels = ["context"];
  return {
    recorded: meter.counter("audit_events_recorded_total", "Events appended to an audit buffer", labels),
    escalated: meter.counter("audit_events_escalated_total", "Recorded events flagged for escalation", labels),
    evicted: meter.counter("audit_events_evicted_total", "Events pushed out of a full audit buffer", labels),
    deliveryFailures: meter.counter("audit_delivery_failures_total", "Records the delivery sink rejected", labels),
    bufferSize: meter.gauge("audit_buffer_size", "Records currently held in an audit buffer", labels)
  };
}

/**
 * Records operational events into a bounded audit buffer and forwards them to
 * a delivery sink. The buffer append is synchronous and completes before
 * `record()` returns; delivery happens afterwards on a per-recorder queue.
 */
export class EventRecorder {
  readonly capacity: number;
  private context: AuditContextSource;
  private buffer: BoundedBuffer<EventRecord>;
  private delivery: AnalyticsDelivery;
  private queue: DeliveryQueue;
  private clock: Clock;
  private nextId: () => string;
  private evicted = 0;
  private metrics?: RecorderMetrics;

  constructor(opts: EventRecorderOptions) {
    this.capacity = opts.capacity;
    this.buffer = new BoundedBuffer(opts.capacity);
    this.context = typeof opts.context === "string" ? new AuditContext(opts.context) : opts.context;
    this.delivery = opts.delivery ?? new NullDelivery();
    this.clock = new MonotonicClock(opts.clock);
    this.nextId = opts.idGenerator ?? randomUUID;
    if (opts.meter) this.metrics = recorderMetrics(opts.meter);

    const logger = opts.logger ?? createLogger({ name: "audit", level: "warn", sinks: [new ConsoleSink()] });
    this.queue = new DeliveryQueue(this.delivery, {
      retries: opts.retries,
      backoff: opts.backoff,
      logger: logger.child({ component: this.component }),
      onFailure: (record) => this.metrics?.deliveryFailures.inc({ context: record.context ?? "" })
    });
  }

  get component(): string {
    return this.context.snapshot().context ?? "unknown";
  }

  /** Never throws because of the sink; an empty name is recorded as-is. */
  record(name: string, metadata?: EventMetadata): EventRecord {
    const record = createEventRecord({
      id: this.nextId(),
      timestamp: this.clock.now(),
      name,
      metadata,
      audit: this.context.snapshot(),
      escalate: classifyEscalation(name, metadata)
    });

    const evicted = this.buffer.push(record);
    if (evicted) this.evicted++;
    this.observe(record, evicted !== undefined);

    this.queue.enqueue(record);
    return record;
  }

  /** Oldest first; an independent copy. */
  snapshot(): EventRecord[] {
    return this.buffer.toArray();
  }

  escalations(): EventRecord[] {
    return this.buffer.toArray().filter(r => r.escalate);
  }

  /** Resolves when every record handed to delivery so far has settled. */
  flush(): Promise<void> {
    return this.queue.drain();
  }

  /** Abandons queued deliveries; recording into the buffer keeps working. */
  close(): number {
    return this.queue.close();
  }

  deadLetters(): DeadLetter[] {
    return this.queue.deadLetters();
  }

  diagnostics(): RecorderDiagnostics {
    const records = this.buffer.toArray();
    const stats = this.queue.stats();
    return {
      component: this.component,
      capacity: this.capacity,
      buffered: records.length,
      escalated: records.filter(r => r.escalate).length,
      evicted: this.evicted,
      verbose: this.delivery.verbose ?? false,
      pendingDeliveries: stats.pending,
      deliveredCount: stats.delivered,
      failedDeliveries: stats.failed,
      abandonedDeliveries: stats.abandoned
    };
  }

  private observe(record: EventRecord, evicted: boolean) {
    if (!this.metrics) return;
    const labels = { context: record.context ?? "" };
    this.metrics.recorded.inc(labels);
    if (record.escalate) this.metrics.escalated.inc(labels);
    if (evicted) this.metrics.evicted.inc(labels);
    this.metrics.bufferSize.set(labels, this.buffer.size);
  }
}
