import type { Config } from "../config/config.js";
import type { MeterRegistry, MetricSnapshot } from "../core/registry.js";
import type { EventRecorder, RecorderDiagnostics } from "../recorder/eventRecorder.js";
import type { EventRecord } from "../audit/eventRecord.js";
import { render } from "./render.js";

export type DiagnosticsDeps = {
  recorders: EventRecorder[];
  config?: Config;
  meter?: MeterRegistry;
};

export type DiagnosticsSnapshot = {
  time: string;
  uptimeSec: number;
  configHash?: string;
  recorders: RecorderDiagnostics[];
  totals: { buffered: number; escalated: number; pendingDeliveries: number; failedDeliveries: number };
  metrics?: MetricSnapshot;
};

export class Diagnostics {
  constructor(private deps: DiagnosticsDeps) {}

  snapshot(): DiagnosticsSnapshot {
    const recorders = this.deps.recorders.map(r => r.diagnostics());
    return {
      time: new Date().toISOString(),
      uptimeSec: process.uptime(),
      configHash: this.deps.config && hashObject(this.deps.config.all()),
      recorders,
      totals: {
        buffered: sum(recorders, r => r.buffered),
        escalated: sum(recorders, r => r.escalated),
        pendingDeliveries: sum(recorders, r => r.pendingDeliveries),
        failedDeliveries: sum(recorders, r => r.failedDeliveries)
      },
      metrics: this.deps.meter?.snapshot()
    };
  }

  /** Every buffered record across recorders, merged oldest first. */
  timeline(): EventRecord[] {
    return this.deps.recorders
      .flatMap(r => r.snapshot())
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  /** Audit export: one rendered line per buffered record. */
  exportText(): string {
    return render(this.timeline());
  }
}

function sum<T>(items: T[], pick: (item: T) => number): number {
  return items.reduce((acc, item) => acc + pick(item), 0);
}

function hashObject(obj: unknown): string {
  const json = JSON.stringify(obj);
  let h = 0x811c9dc5;
  for (let i = 0; i < json.length; i++) {
    h ^= json.charCodeAt(i);
    h = (h + ((h << 1) + (h << 4) + (h << 7) + (h << 8) + (h << 24))) >>> 0;
  }
  return h.toString(16);
}
