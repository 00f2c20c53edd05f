import { Counter, Gauge } from "./metric.js";
import type { CounterSnapshot, GaugeSnapshot } from "./metric.js";

export interface MetricSnapshot {
  counters: CounterSnapshot[];
  gauges: GaugeSnapshot[];
}

export class MeterRegistry {
  private counters = new Map<string, Counter>();
  private gauges = new Map<string, Gauge>();

  /** Same name and label keys return the same instance. */
  counter(name: string, help?: string, labelKeys: string[] = []): Counter {
    const key = `${name}:${labelKeys.join(",")}`;
    let c = this.counters.get(key);
    if (!c) {
      c = new Counter(name, help, labelKeys);
      this.counters.set(key, c);
    }
    return c;
  }

  gauge(name: string, help?: string, labelKeys: string[] = []): Gauge {
    const key = `${name}:${labelKeys.join(",")}`;
    let g = this.gauges.get(key);
    if (!g) {
      g = new Gauge(name, help, labelKeys);
      this.gauges.set(key, g);
    }
    return g;
  }

  snapshot(): MetricSnapshot {
    return {
      counters: Array.from(this.counters.values()).map(c => c.snapshot()),
      gauges: Array.from(this.gauges.values()).map(g => g.snapshot())
    };
  }

  reset() {
    this.counters.clear();
    this.gauges.clear();
  }
}
