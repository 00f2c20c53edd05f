import { describe, it, expect } from "vitest";
import { Diagnostics } from "../diagnostics/diagnostics.js";
import { EventRecorder } from "../recorder/eventRecorder.js";
import { Config } from "../config/config.js";
import { MeterRegistry } from "../core/registry.js";
import type { Clock } from "../util/clock.js";

function fixedClock(...ticks: number[]): Clock {
  let i = 0;
  return { now: () => ticks[Math.min(i++, ticks.length - 1)] };
}

describe("Diagnostics", () => {
  it("aggregates recorder diagnostics", () => {
    const meter = new MeterRegistry();
    const sync = new EventRecorder({ capacity: 5, context: "SyncEngine", meter, clock: fixedClock(10, 30) });
    const alerts = new EventRecorder({ capacity: 5, context: "CriticalAlertEngine", meter, clock: fixedClock(20) });
    sync.record("sync_started");
    alerts.record("alert_raised", { severity: "critical" });
    sync.record("sync_completed");

    const diag = new Diagnostics({ recorders: [sync, alerts], config: new Config().merge({ A: 1 }), meter });
    const snap = diag.snapshot();
    expect(snap.recorders.map(r => r.component)).toEqual(["SyncEngine", "CriticalAlertEngine"]);
    expect(snap.totals).toMatchObject({ buffered: 3, escalated: 1 });
    expect(snap.configHash).toMatch(/^[0-9a-f]+$/);
    expect(snap.metrics?.counters.length).toBeGreaterThan(0);
  });

  it("merges every recorder into one timeline", () => {
    const sync = new EventRecorder({ capacity: 5, context: "SyncEngine", clock: fixedClock(10, 30) });
    const alerts = new EventRecorder({ capacity: 5, context: "CriticalAlertEngine", clock: fixedClock(20) });
    sync.record("sync_started");
    alerts.record("alert_raised");
    sync.record("sync_completed");

    const diag = new Diagnostics({ recorders: [sync, alerts] });
    expect(diag.timeline().map(r => r.name)).toEqual(["sync_started", "alert_raised", "sync_completed"]);
    expect(diag.exportText().split("\n")[1]).toBe(
      "1970-01-01T00:00:00.020Z alert_raised none | role:- staffID:- context:CriticalAlertEngine escalate:NO"
    );
  });
});
