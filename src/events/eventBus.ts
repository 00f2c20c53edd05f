import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";

export type BusEvent<T> = { topic: string; data: T };
export type Handler<T> = (event: BusEvent<T>) => void;

/**
 * Synchronous in-process pub/sub. Patterns are exact topics or `prefix.*`.
 * A throwing handler is logged and does not stop the remaining handlers.
 */
export class EventBus<T = unknown> {
  private subs: { pattern: string; handler: Handler<T> }[] = [];

  constructor(private logger?: Logger) {}

  subscribe(pattern: string, handler: Handler<T>) {
    const sub = { pattern, handler };
    this.subs.push(sub);
    return () => {
      const idx = this.subs.indexOf(sub);
      if (idx >= 0) this.subs.splice(idx, 1);
    };
  }

  /** Returns how many handlers matched. */
  publish(topic: string, data: T): number {
    let matched = 0;
    for (const s of this.subs.slice()) {
      if (!matches(s.pattern, topic)) continue;
      matched++;
      try {
        s.handler({ topic, data });
      } catch (e) {
        this.logger?.warn("bus.handler.error", { topic, pattern: s.pattern, error: errorMessage(e) });
      }
    }
    return matched;
  }
}

function matches(pattern: string, topic: string): boolean {
  if (pattern === topic) return true;
  if (pattern.endsWith(".*")) {
    const base = pattern.slice(0, -2);
    return topic.startsWith(base + ".");
  }
  return false;
}
