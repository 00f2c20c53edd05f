import type { EventRecord } from "../audit/eventRecord.js";
import type { AnalyticsDelivery } from "./delivery.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";
import { BoundedBuffer } from "../buffer/boundedBuffer.js";
import type { BackoffStrategy } from "../util/backoff.js";
import { exponentialBackoff } from "../util/backoff.js";
import { sleep } from "../util/time.js";

export type DeliveryQueueOptions = {
  /** Extra attempts after the first failure. Default 0. */
  retries?: number;
  backoff?: BackoffStrategy;
  deadLetterLimit?: number;
  logger?: Logger;
  onFailure?: (record: EventRecord, error: unknown) => void;
};

export type DeadLetter = {
  record: EventRecord;
  error: string;
  attempts: number;
};

export type DeliveryStats = {
  pending: number;
  delivered: number;
  failed: number;
  abandoned: number;
  /** Fallback log writes that threw. */
  logFailures: number;
};

/**
 * Hands records to a sink one at a time, in enqueue order, on its own async
 * loop. Failures are retried, then logged and parked as dead letters; they
 * never surface to whoever enqueued the record.
 */
export class DeliveryQueue {
  private queue: EventRecord[] = [];
  private running = false;
  private inFlight = false;
  private closed = false;
  private dead: BoundedBuffer<DeadLetter>;
  private idleWaiters: Array<() => void> = [];
  private delivered = 0;
  private failed = 0;
  private abandoned = 0;
  private logFailures = 0;

  constructor(private delivery: AnalyticsDelivery, private opts: DeliveryQueueOptions = {}) {
    this.dead = new BoundedBuffer(opts.deadLetterLimit ?? 100);
  }

  /** False when the queue is closed and the record was dropped. */
  enqueue(record: EventRecord): boolean {
    if (this.closed) {
      this.abandoned++;
      this.note("debug", "audit.delivery.dropped", { id: record.id, name: record.name });
      return false;
    }
    this.queue.push(record);
    this.runLoop();
    return true;
  }

  /** Resolves once nothing is queued or in flight. */
  drain(): Promise<void> {
    if (!this.running) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /** Stops accepting records and drops the queued ones; the in-flight one finishes. */
  close(): number {
    this.closed = true;
    const dropped = this.queue.length;
    this.queue = [];
    this.abandoned += dropped;
    if (dropped) this.note("warn", "audit.delivery.abandoned", { count: dropped });
    return dropped;
  }

  deadLetters() {
    return this.dead.toArray();
  }

  stats(): DeliveryStats {
    return {
      pending: this.queue.length + (this.inFlight ? 1 : 0),
      delivered: this.delivered,
      failed: this.failed,
      abandoned: this.abandoned,
      logFailures: this.logFailures
    };
  }

  private runLoop() {
    if (this.running) return;
    this.running = true;
    void this.loop();
  }

  private async loop() {
    try {
      let record = this.queue.shift();
      while (record) {
        this.inFlight = true;
        try {
          await this.deliverWithRetry(record);
        } catch (e) {
          // Only reached when the retry plumbing itself fails (a throwing backoff).
          this.park(record, e, 0);
        }
        this.inFlight = false;
        record = this.queue.shift();
      }
    } finally {
      this.inFlight = false;
      this.running = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const w of waiters) w();
    }
  }

  private async deliverWithRetry(record: EventRecord) {
    const maxAttempts = 1 + Math.max(0, this.opts.retries ?? 0);
    const backoff = this.opts.backoff ?? exponentialBackoff(50);
    for (let attempt = 1; ; attempt++) {
      try {
        await this.delivery.deliver(record);
        this.delivered++;
        return;
      } catch (e) {
        if (attempt < maxAttempts && !this.closed) {
          this.note("debug", "audit.delivery.retry", { id: record.id, attempt, error: errorMessage(e) });
          await sleep(backoff(attempt));
          continue;
        }
        this.fail(record, e, attempt);
        return;
      }
    }
  }

  private fail(record: EventRecord, error: unknown, attempts: number) {
    this.park(record, error, attempts);
    this.note("warn", "audit.delivery.failed", {
      id: record.id,
      name: record.name,
      context: record.context,
      attempts,
      error: errorMessage(error)
    });
    try {
      this.opts.onFailure?.(record, error);
    } catch (hookErr) {
      this.note("error", "audit.delivery.hook.error", { error: errorMessage(hookErr) });
    }
  }

  private park(record: EventRecord, error: unknown, attempts: number) {
    this.failed++;
    this.dead.push({ record, error: errorMessage(error), attempts });
  }

  /** Fallback logging; a broken sink is counted, never rethrown into the loop. */
  private note(level: "debug" | "warn" | "error", msg: string, ctx: Record<string, unknown>) {
    const logger = this.opts.logger;
    if (!logger) return;
    try {
      logger[level](msg, ctx);
    } catch {
      this.logFailures++;
    }
  }
}
