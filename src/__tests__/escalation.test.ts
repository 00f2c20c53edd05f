import { describe, it, expect } from "vitest";
import { classifyEscalation, renderValue } from "../audit/escalation.js";

describe("classifyEscalation", () => {
  it("flags keywords in the event name, any case", () => {
    expect(classifyEscalation("delete_customer")).toBe(true);
    expect(classifyEscalation("DANGER_zone_entered")).toBe(true);
    expect(classifyEscalation("Critical")).toBe(true);
  });

  it("matches substrings", () => {
    expect(classifyEscalation("undeleted_records")).toBe(true);
  });

  it("flags keywords in metadata values", () => {
    expect(classifyEscalation("sync_error", { error: "Critical failure" })).toBe(true);
  });

  it("ignores metadata keys", () => {
    expect(classifyEscalation("cleanup", { delete: "no" })).toBe(false);
  });

  it("leaves ordinary events alone", () => {
    expect(classifyEscalation("normal_event", { note: "all good" })).toBe(false);
    expect(classifyEscalation("normal_event")).toBe(false);
    expect(classifyEscalation("", { count: 3, ok: true, at: new Date(0) })).toBe(false);
  });
});

describe("renderValue", () => {
  it("renders dates as ISO and everything else with String()", () => {
    expect(renderValue(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
    expect(renderValue(12n)).toBe("12");
    expect(renderValue(false)).toBe("false");
  });

  it("renders an invalid date without throwing", () => {
    expect(renderValue(new Date("nope"))).toBe("Invalid Date");
    expect(classifyEscalation("e", { at: new Date(Number.NaN) })).toBe(false);
  });
});
