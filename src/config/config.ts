import { z } from "zod";
import { LOG_LEVELS } from "../types.js";
import { isDuration, ms } from "../util/time.js";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super("Invalid configuration: " + issues.join("; "));
    this.name = "ConfigError";
  }
}

export class Config {
  private data: Record<string, unknown> = {};
  private frozen = false;

  loadEnv(keys: readonly string[], env: NodeJS.ProcessEnv = process.env) {
    this.assertNotFrozen();
    for (const k of keys) {
      if (env[k] !== undefined) this.data[k] = env[k];
    }
    return this;
  }

  merge(obj: Record<string, unknown>) {
    this.assertNotFrozen();
    Object.assign(this.data, obj);
    return this;
  }

  get(key: string): unknown {
    return this.data[key];
  }

  all(): Record<string, unknown> {
    return { ...this.data };
  }

  /** Validates the current values; throws ConfigError listing every bad key. */
  parse<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const res = schema.safeParse(this.all());
    if (!res.success) {
      throw new ConfigError(res.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`));
    }
    return res.data;
  }

  freeze() {
    this.frozen = true;
    return this;
  }

  isFrozen() { return this.frozen; }

  private assertNotFrozen() {
    if (this.frozen) throw new Error("Config is frozen");
  }
}

const flag = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform(v => v === "true" || v === "1")
]);

const duration = z.string().refine(isDuration, "expected a duration like 250ms, 5s, 2m or 1h").transform(ms);

export const AuditSettingsSchema = z.object({
  AUDIT_BUFFER_CAPACITY: z.coerce.number().int().min(1).optional(),
  AUDIT_VERBOSE: flag.default(false),
  AUDIT_DELIVERY_RETRIES: z.coerce.number().int().min(0).default(0),
  AUDIT_SHUTDOWN_TIMEOUT: duration.default("5s"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

export const AUDIT_ENV_KEYS = Object.keys(AuditSettingsSchema.shape);

export type AuditSettings = {
  /** Overrides every engine's own buffer size when set. */
  bufferCapacity?: number;
  verbose: boolean;
  deliveryRetries: number;
  shutdownTimeoutMs: number;
  logLevel: z.output<typeof AuditSettingsSchema>["LOG_LEVEL"];
};

export function loadAuditSettings(config: Config): AuditSettings {
  const raw = config.parse(AuditSettingsSchema);
  return {
    bufferCapacity: raw.AUDIT_BUFFER_CAPACITY,
    verbose: raw.AUDIT_VERBOSE,
    deliveryRetries: raw.AUDIT_DELIVERY_RETRIES,
    shutdownTimeoutMs: raw.AUDIT_SHUTDOWN_TIMEOUT,
    logLevel: raw.LOG_LEVEL
  };
}

/** Env → validated settings in one step. */
export function auditSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): AuditSettings {
  return loadAuditSettings(new Config().loadEnv(AUDIT_ENV_KEYS, env).freeze());
}
