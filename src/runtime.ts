import type { AuditSettings } from "./config/config.js";
import { auditSettingsFromEnv } from "./config/config.js";
import type { SessionStore } from "./audit/auditContext.js";
import type { AnalyticsDelivery } from "./delivery/delivery.js";
import type { Logger } from "./logging/logger.js";
import { createLogger } from "./logging/logger.js";
import type { LogSink } from "./logging/sinks.js";
import { ConsoleSink } from "./logging/sinks.js";
import { MeterRegistry } from "./core/registry.js";
import { Diagnostics } from "./diagnostics/diagnostics.js";
import { ShutdownManager } from "./shutdown/shutdown.js";
import { engineOptionsFromSettings } from "./engines/auditedEngine.js";
import { ChurnPredictionEngine } from "./engines/churnPrediction.js";
import { CriticalAlertEngine } from "./engines/criticalAlert.js";
import { RetentionTagEngine } from "./engines/retentionTag.js";
import { NotificationEngine } from "./engines/notification.js";
import { SyncEngine } from "./engines/sync.js";

export type AuditRuntimeOptions = {
  settings?: AuditSettings;
  sinks?: LogSink[];
  delivery?: AnalyticsDelivery;
  session?: SessionStore;
};

export type AuditRuntime = {
  settings: AuditSettings;
  logger: Logger;
  meter: MeterRegistry;
  engines: {
    churn: ChurnPredictionEngine;
    alerts: CriticalAlertEngine;
    retention: RetentionTagEngine;
    notifications: NotificationEngine;
    sync: SyncEngine;
  };
  diagnostics: Diagnostics;
  shutdown: ShutdownManager;
};

/** Wires the five engines to one logger, meter, diagnostics view and shutdown sequence. */
export function createAuditRuntime(opts: AuditRuntimeOptions = {}): AuditRuntime {
  const settings = opts.settings ?? auditSettingsFromEnv();
  const logger = createLogger({ name: "audit", level: settings.logLevel, sinks: opts.sinks ?? [new ConsoleSink()] });
  const meter = new MeterRegistry();
  const engineOpts = engineOptionsFromSettings(settings, {
    delivery: opts.delivery,
    session: opts.session,
    logger,
    meter
  });

  const engines = {
    churn: new ChurnPredictionEngine(engineOpts),
    alerts: new CriticalAlertEngine(engineOpts),
    retention: new RetentionTagEngine(engineOpts),
    notifications: new NotificationEngine(engineOpts),
    sync: new SyncEngine(engineOpts)
  };
  const recorders = Object.values(engines).map(e => e.events);

  const shutdown = new ShutdownManager(logger, settings.shutdownTimeoutMs);
  shutdown.register({ name: "sync.retry.cancel", fn: () => { engines.sync.stop(); } });
  for (const r of recorders) shutdown.registerRecorder(r);

  logger.debug("audit.runtime.ready", { components: recorders.map(r => r.component) });
  return { settings, logger, meter, engines, diagnostics: new Diagnostics({ recorders, meter }), shutdown };
}
