import type { EventRecord } from "../audit/eventRecord.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";
import type { LineWriter } from "../logging/sinks.js";
import type { EventBus } from "../events/eventBus.js";
import { renderRecord, renderMetadata } from "../diagnostics/render.js";

/**
 * Where recorded events go after they are buffered. Implementations may be
 * slow or fail; the recorder's delivery queue absorbs both.
 */
export interface AnalyticsDelivery {
  /** Verbose sinks echo every record; reported in diagnostics. */
  readonly verbose?: boolean;
  deliver(record: EventRecord): void | Promise<void>;
}

export type NullDeliveryOptions = {
  verbose?: boolean;
  target?: LineWriter;
};

/** Reference sink: prints the diagnostic line when verbose, otherwise does nothing. */
export class NullDelivery implements AnalyticsDelivery {
  readonly verbose: boolean;
  private target: LineWriter;

  constructor(opts: NullDeliveryOptions = {}) {
    this.verbose = opts.verbose ?? false;
    this.target = opts.target ?? process.stdout;
  }

  deliver(record: EventRecord) {
    if (!this.verbose) return;
    this.target.write(renderRecord(record) + "\n");
  }
}

/** Writes each record to a structured logger; escalations go out at warn. */
export class LoggerDelivery implements AnalyticsDelivery {
  readonly verbose = false;

  constructor(private logger: Logger) {}

  deliver(record: EventRecord) {
    const ctx = {
      id: record.id,
      timestamp: new Date(record.timestamp).toISOString(),
      metadata: renderMetadata(record.metadata),
      role: record.role,
      staffID: record.staffID,
      context: record.context,
      escalate: record.escalate
    };
    if (record.escalate) this.logger.warn(record.name, ctx);
    else this.logger.info(record.name, ctx);
  }
}

export const ESCALATED_TOPIC = "audit.escalated";

/** Publishes on `audit.<context>`, and also on `audit.escalated` for escalations. */
export class BusDelivery implements AnalyticsDelivery {
  readonly verbose = false;

  constructor(private bus: EventBus<EventRecord>) {}

  deliver(record: EventRecord) {
    this.bus.publish(`audit.${record.context ?? "unknown"}`, record);
    if (record.escalate) this.bus.publish(ESCALATED_TOPIC, record);
  }
}

/**
 * Delivers to every sink in order. A failing sink doesn't stop the rest;
 * failures are rethrown together afterwards.
 */
export class FanoutDelivery implements AnalyticsDelivery {
  readonly verbose: boolean;

  constructor(private sinks: AnalyticsDelivery[]) {
    this.verbose = sinks.some(s => s.verbose === true);
  }

  async deliver(record: EventRecord) {
    const errors: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        await sink.deliver(record);
      } catch (e) {
        errors.push(e);
      }
    }
    if (errors.length) {
      throw new AggregateError(errors, `${errors.length} of ${this.sinks.length} sinks failed: ${errors.map(errorMessage).join("; ")}`);
    }
  }
}
