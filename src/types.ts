export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogEntry = {
  ts: string;
  level: LogLevel;
  msg: string;
  logger?: string;
  context?: Record<string, unknown>;
};

/** Values a caller may attach to an event; each renders to a string. */
export type MetadataValue = string | number | boolean | bigint | Date;

export type EventMetadata = Readonly<Record<string, MetadataValue>>;
