import { describe, it, expect } from "vitest";
import { createAuditRuntime } from "../runtime.js";
import { SessionStore } from "../audit/auditContext.js";
import { RingBufferSink } from "../logging/sinks.js";
import { prometheusText } from "../exporters/prometheus.js";
import type { AuditSettings } from "../config/config.js";

const settings: AuditSettings = {
  verbose: false,
  deliveryRetries: 0,
  shutdownTimeoutMs: 50,
  logLevel: "debug"
};

describe("createAuditRuntime", () => {
  it("wires every engine into diagnostics and shutdown", async () => {
    const sink = new RingBufferSink(50);
    const session = new SessionStore().login({ role: "owner", staffID: "staff-1" });
    const rt = createAuditRuntime({ settings, sinks: [sink], session });

    expect(sink.find("audit.runtime.ready")[0].context?.components).toEqual([
      "ChurnPredictionEngine",
      "CriticalAlertEngine",
      "RetentionTagEngine",
      "NotificationEngine",
      "SyncEngine"
    ]);

    await rt.engines.churn.predictChurn("cust-1");
    rt.engines.sync.reportError("critical: disk full");
    rt.engines.retention.tagFor("o-1");

    const snap = rt.diagnostics.snapshot();
    expect(snap.recorders.map(r => r.capacity)).toEqual([20, 50, 30, 30, 50]);
    // sync_error plus its "error" badge
    expect(snap.totals).toMatchObject({ buffered: 4, escalated: 1 });
    expect(rt.diagnostics.timeline().every(r => r.role === "owner")).toBe(true);
    expect(prometheusText(rt.meter.snapshot())).toContain('audit_events_escalated_total{context="SyncEngine"} 1\n');

    const outcomes = await rt.shutdown.execute();
    expect(outcomes.map(o => o.name)).toEqual([
      "sync.retry.cancel",
      "audit.flush:ChurnPredictionEngine",
      "audit.flush:CriticalAlertEngine",
      "audit.flush:RetentionTagEngine",
      "audit.flush:NotificationEngine",
      "audit.flush:SyncEngine"
    ]);
    expect(outcomes.every(o => !o.timedOut && o.error === undefined)).toBe(true);
  });

  it("buffer capacity from settings overrides every engine", () => {
    const rt = createAuditRuntime({ settings: { ...settings, bufferCapacity: 3 }, sinks: [] });
    expect(rt.diagnostics.snapshot().recorders.map(r => r.capacity)).toEqual([3, 3, 3, 3, 3]);
  });
});
