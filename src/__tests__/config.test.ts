import { describe, it, expect } from "vitest";
import { Config, ConfigError, auditSettingsFromEnv, loadAuditSettings } from "../config/config.js";

describe("Config", () => {
  it("merge and freeze", () => {
    const c = new Config();
    c.merge({ A: 1 });
    expect(c.get("A")).toBe(1);
    c.freeze();
    expect(() => c.merge({ B: 2 })).toThrow(/frozen/);
  });

  it("loads only the requested env keys", () => {
    const c = new Config().loadEnv(["LOG_LEVEL", "MISSING"], { LOG_LEVEL: "debug", OTHER: "x" });
    expect(c.all()).toEqual({ LOG_LEVEL: "debug" });
  });
});

describe("audit settings", () => {
  it("applies defaults", () => {
    expect(auditSettingsFromEnv({})).toEqual({
      bufferCapacity: undefined,
      verbose: false,
      deliveryRetries: 0,
      shutdownTimeoutMs: 5000,
      logLevel: "info"
    });
  });

  it("coerces env strings", () => {
    expect(auditSettingsFromEnv({
      AUDIT_BUFFER_CAPACITY: "40",
      AUDIT_VERBOSE: "1",
      AUDIT_DELIVERY_RETRIES: "2",
      AUDIT_SHUTDOWN_TIMEOUT: "250ms",
      LOG_LEVEL: "warn"
    })).toEqual({
      bufferCapacity: 40,
      verbose: true,
      deliveryRetries: 2,
      shutdownTimeoutMs: 250,
      logLevel: "warn"
    });
  });

  it("accepts typed values merged in code", () => {
    const settings = loadAuditSettings(new Config().merge({ AUDIT_BUFFER_CAPACITY: 20, AUDIT_VERBOSE: true }));
    expect(settings.bufferCapacity).toBe(20);
    expect(settings.verbose).toBe(true);
  });

  it("lists every invalid key", () => {
    let caught: unknown;
    try {
      auditSettingsFromEnv({ AUDIT_BUFFER_CAPACITY: "0", AUDIT_SHUTDOWN_TIMEOUT: "soon", LOG_LEVEL: "loud" });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map(i => i.split(":")[0])).toEqual(["AUDIT_BUFFER_CAPACITY", "AUDIT_SHUTDOWN_TIMEOUT", "LOG_LEVEL"]);
  });
});
