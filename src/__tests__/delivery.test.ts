import { describe, it, expect } from "vitest";
import { NullDelivery, LoggerDelivery, BusDelivery, FanoutDelivery, ESCALATED_TOPIC } from "../delivery/delivery.js";
import type { AnalyticsDelivery } from "../delivery/delivery.js";
import { createEventRecord } from "../audit/eventRecord.js";
import type { EventRecord } from "../audit/eventRecord.js";
import { EventBus } from "../events/eventBus.js";
import { createLogger } from "../logging/logger.js";
import { RingBufferSink } from "../logging/sinks.js";

const critical = createEventRecord({
  id: "r1",
  timestamp: 0,
  name: "sync_error",
  metadata: { error: "Critical failure" },
  audit: { role: "manager", staffID: "s-1", context: "SyncEngine" },
  escalate: true
});

const routine = createEventRecord({
  id: "r2",
  timestamp: 0,
  name: "sync_started",
  audit: { context: "SyncEngine" },
  escalate: false
});

describe("NullDelivery", () => {
  it("writes the diagnostic line when verbose", () => {
    const lines: string[] = [];
    const d = new NullDelivery({ verbose: true, target: { write: (c: string) => lines.push(c) } });
    d.deliver(critical);
    expect(lines).toEqual([
      "1970-01-01T00:00:00.000Z sync_error error: Critical failure | role:manager staffID:s-1 context:SyncEngine escalate:YES\n"
    ]);
  });

  it("stays silent otherwise", () => {
    const lines: string[] = [];
    const d = new NullDelivery({ target: { write: (c: string) => lines.push(c) } });
    d.deliver(critical);
    expect(lines).toEqual([]);
    expect(d.verbose).toBe(false);
  });
});

describe("LoggerDelivery", () => {
  it("logs escalations at warn and the rest at info", () => {
    const sink = new RingBufferSink(5);
    const d = new LoggerDelivery(createLogger({ sinks: [sink], level: "info" }));
    d.deliver(critical);
    d.deliver(routine);
    const [first, second] = sink.entries();
    expect(first.level).toBe("warn");
    expect(first.msg).toBe("sync_error");
    expect(first.context).toEqual({
      id: "r1",
      timestamp: "1970-01-01T00:00:00.000Z",
      metadata: "error: Critical failure",
      role: "manager",
      staffID: "s-1",
      context: "SyncEngine",
      escalate: true
    });
    expect(second.level).toBe("info");
    expect(second.context?.metadata).toBe("none");
  });
});

describe("BusDelivery", () => {
  it("publishes per context and on the escalation topic", () => {
    const bus = new EventBus<EventRecord>();
    const all: string[] = [];
    const escalated: string[] = [];
    bus.subscribe("audit.*", (e) => all.push(e.topic));
    bus.subscribe(ESCALATED_TOPIC, (e) => escalated.push(e.data.id));
    const d = new BusDelivery(bus);
    d.deliver(critical);
    d.deliver(routine);
    expect(all).toEqual(["audit.SyncEngine", "audit.escalated", "audit.SyncEngine"]);
    expect(escalated).toEqual(["r1"]);
  });
});

describe("FanoutDelivery", () => {
  it("keeps delivering past a failing sink, then reports", async () => {
    const seen: string[] = [];
    const failing: AnalyticsDelivery = { deliver: () => { throw new Error("boom"); } };
    const collecting: AnalyticsDelivery = { verbose: true, deliver: (r) => { seen.push(r.id); } };
    const fanout = new FanoutDelivery([failing, collecting]);
    await expect(fanout.deliver(critical)).rejects.toThrow("1 of 2 sinks failed: boom");
    expect(seen).toEqual(["r1"]);
    expect(fanout.verbose).toBe(true);
  });

  it("resolves when every sink succeeds", async () => {
    const fanout = new FanoutDelivery([{ deliver: () => {} }, { deliver: async () => {} }]);
    await expect(fanout.deliver(routine)).resolves.toBeUndefined();
    expect(fanout.verbose).toBe(false);
  });
});
