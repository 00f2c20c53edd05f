export type { LogLevel, LogEntry, MetadataValue, EventMetadata } from "./types.js";
export { LOG_LEVELS } from "./types.js";

export { BoundedBuffer } from "./buffer/boundedBuffer.js";

export { AuditContext, SessionStore, session } from "./audit/auditContext.js";
export type { AuditFields, AuditContextSource, SessionIdentity } from "./audit/auditContext.js";
export { classifyEscalation, renderValue, ESCALATION_KEYWORDS } from "./audit/escalation.js";
export { createEventRecord } from "./audit/eventRecord.js";
export type { EventRecord, EventRecordInit } from "./audit/eventRecord.js";

export { NullDelivery, LoggerDelivery, BusDelivery, FanoutDelivery, ESCALATED_TOPIC } from "./delivery/delivery.js";
export type { AnalyticsDelivery, NullDeliveryOptions } from "./delivery/delivery.js";
export { DeliveryQueue } from "./delivery/deliveryQueue.js";
export type { DeliveryQueueOptions, DeadLetter, DeliveryStats } from "./delivery/deliveryQueue.js";

export { EventRecorder } from "./recorder/eventRecorder.js";
export type { EventRecorderOptions, RecorderDiagnostics } from "./recorder/eventRecorder.js";

export { render, renderRecord, renderMetadata } from "./diagnostics/render.js";
export { Diagnostics } from "./diagnostics/diagnostics.js";
export type { DiagnosticsDeps, DiagnosticsSnapshot } from "./diagnostics/diagnostics.js";

export { Logger, createLogger, silentLogger, errorMessage } from "./logging/logger.js";
export type { LoggerOptions, Redactor } from "./logging/logger.js";
export { ConsoleSink, JSONLSink, RingBufferSink } from "./logging/sinks.js";
export type { LogSink, LineWriter } from "./logging/sinks.js";

export { EventBus } from "./events/eventBus.js";
export type { BusEvent, Handler } from "./events/eventBus.js";

export { MeterRegistry } from "./core/registry.js";
export type { MetricSnapshot } from "./core/registry.js";
export { Counter, Gauge } from "./core/metric.js";
export { prometheusText } from "./exporters/prometheus.js";

export { Config, ConfigError, AuditSettingsSchema, AUDIT_ENV_KEYS, loadAuditSettings, auditSettingsFromEnv } from "./config/config.js";
export type { AuditSettings } from "./config/config.js";

export { ShutdownManager } from "./shutdown/shutdown.js";
export type { ShutdownPhase, PhaseOutcome } from "./shutdown/shutdown.js";

export { SystemClock, MonotonicClock } from "./util/clock.js";
export type { Clock } from "./util/clock.js";
export { ms } from "./util/time.js";
export { exponentialBackoff, jittered } from "./util/backoff.js";
export type { BackoffStrategy } from "./util/backoff.js";

export { AuditedEngine, engineOptionsFromSettings } from "./engines/auditedEngine.js";
export type { EngineOptions } from "./engines/auditedEngine.js";
export { ChurnPredictionEngine } from "./engines/churnPrediction.js";
export type { ChurnPredictor, ChurnPredictionOptions } from "./engines/churnPrediction.js";
export { CriticalAlertEngine } from "./engines/criticalAlert.js";
export type { Alert, AlertSeverity } from "./engines/criticalAlert.js";
export { RetentionTagEngine } from "./engines/retentionTag.js";
export type { RetentionTag } from "./engines/retentionTag.js";
export { NotificationEngine } from "./engines/notification.js";
export type { NotificationKind, ScheduledNotification } from "./engines/notification.js";
export { SyncEngine } from "./engines/sync.js";
export type { SyncState, SyncStatus, SyncTrigger, SyncEngineOptions } from "./engines/sync.js";

export { createAuditRuntime } from "./runtime.js";
export type { AuditRuntime, AuditRuntimeOptions } from "./runtime.js";
