import { AuditedEngine } from "./auditedEngine.js";
import type { EngineOptions } from "./auditedEngine.js";

export type AlertSeverity = "info" | "warning" | "critical";

export type Alert = {
  id: string;
  severity: AlertSeverity;
  message: string;
};

export class CriticalAlertEngine extends AuditedEngine {
  private active = new Map<string, Alert>();

  constructor(opts: EngineOptions = {}) {
    super("CriticalAlertEngine", 50, opts);
  }

  raise(alert: Alert) {
    this.log("alert_raised", { alertID: alert.id, severity: alert.severity, message: alert.message });
    this.active.set(alert.id, { ...alert });
  }

  acknowledge(alertId: string): boolean {
    if (!this.active.has(alertId)) {
      this.log("alert_unknown", { alertID: alertId });
      return false;
    }
    this.log("alert_acknowledged", { alertID: alertId });
    this.active.delete(alertId);
    return true;
  }

  activeAlerts(): Alert[] {
    return Array.from(this.active.values(), a => ({ ...a }));
  }

  override diagnostics() {
    return { ...super.diagnostics(), activeAlertCount: String(this.active.size) };
  }

  statusMessage() {
    return "Critical alert engine is operational.";
  }
}
