/**
 * Configuration system for the operations dashboard backend.
 * Loads configuration from JSON files and environment variables.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { isLogLevel, logger } from "./logger.js";

// ══════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA
// ══════════════════════════════════════════════════════════════════════

const SystemConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535),
    host: z.string().min(1),
  }),

  realtime: z.object({
    pathPrefix: z.string().startsWith("/"),
    idleTimeoutMs: z.number().int().positive(),     // Heartbeat after this much client silence
    maxQueuedFrames: z.number().int().positive(),   // Per-connection outbound queue bound
    invalidateOnEvent: z.boolean(),                 // Drop cached snapshot on snapshot-changing events
  }),

  metrics: z.object({
    ttlMs: z.number().int().positive(),
    maxStaleMs: z.number().int().positive(),
  }),

  supabase: z.object({
    url: z.string().url().nullable(),
    serviceKey: z.string().nullable(),
    timeoutMs: z.number().int().positive(),
  }),

  ingest: z.object({
    token: z.string().min(1).nullable(),
    maxBodyBytes: z.number().int().positive(),
  }),

  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]),
    format: z.enum(["pretty", "json"]),
  }),
});

export type SystemConfig = z.infer<typeof SystemConfigSchema>;

// ══════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ══════════════════════════════════════════════════════════════════════

export const DEFAULT_CONFIG: SystemConfig = {
  server: {
    port: 8060,
    host: "0.0.0.0",
  },
  realtime: {
    pathPrefix: "/api/v1/ws",
    idleTimeoutMs: 30000,
    maxQueuedFrames: 256,
    invalidateOnEvent: true,
  },
  metrics: {
    ttlMs: 5000,
    maxStaleMs: 600000,
  },
  supabase: {
    url: null,
    serviceKey: null,
    timeoutMs: 5000,
  },
  ingest: {
    token: null,
    maxBodyBytes: 64 * 1024,
  },
  logging: {
    level: "info",
    format: "pretty",
  },
};

// ══════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADER
// ══════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge `source` over `target`. Arrays and scalars replace, objects merge.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }
    const existing = output[key];
    output[key] = isPlainObject(value) && isPlainObject(existing) ? deepMerge(existing, value) : value;
  }

  return output;
}

function parseIntEnv(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

export class ConfigManager {
  private config: SystemConfig;
  private readonly configPath: string;
  private readonly env: Env;

  constructor(configPath?: string, env: Env = process.env) {
    this.env = env;
    this.configPath = configPath ?? env.CONFIG_PATH ?? join(process.cwd(), "config", "default.json");
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file and environment variables.
   */
  private loadConfig(): SystemConfig {
    let fileConfig: Record<string, unknown> = {};

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.configPath, "utf-8"));
      if (!isPlainObject(parsed)) {
        throw new ConfigError(`Configuration file ${this.configPath} must contain a JSON object`);
      }
      fileConfig = parsed;
      logger.info("Configuration loaded from file", { path: this.configPath });
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.warn("Configuration file not found, using defaults", { path: this.configPath });
      } else {
        throw new ConfigError(`Failed to read configuration file ${this.configPath}`, { cause: error });
      }
    }

    const result = SystemConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, fileConfig));
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
    }

    const config = result.data;
    this.applyEnvOverrides(config);
    return config;
  }

  /**
   * Apply environment variable overrides.
   */
  private applyEnvOverrides(config: SystemConfig): void {
    const env = this.env;

    const port = parseIntEnv(env, "PORT");
    if (port !== undefined) {
      config.server.port = port;
    }
    if (env.HOST) {
      config.server.host = env.HOST;
    }

    const ttlMs = parseIntEnv(env, "METRICS_TTL_MS");
    if (ttlMs !== undefined) {
      config.metrics.ttlMs = ttlMs;
    }
    const idleTimeoutMs = parseIntEnv(env, "WS_IDLE_TIMEOUT_MS");
    if (idleTimeoutMs !== undefined) {
      config.realtime.idleTimeoutMs = idleTimeoutMs;
    }
    const maxQueuedFrames = parseIntEnv(env, "WS_MAX_QUEUED_FRAMES");
    if (maxQueuedFrames !== undefined) {
      config.realtime.maxQueuedFrames = maxQueuedFrames;
    }

    if (env.SUPABASE_URL) {
      config.supabase.url = env.SUPABASE_URL;
    }
    if (env.SUPABASE_SERVICE_KEY) {
      config.supabase.serviceKey = env.SUPABASE_SERVICE_KEY;
    }
    if (env.INGEST_TOKEN) {
      config.ingest.token = env.INGEST_TOKEN;
    }

    if (env.LOG_LEVEL) {
      const level = env.LOG_LEVEL.toLowerCase();
      if (isLogLevel(level)) {
        config.logging.level = level;
      }
    }
    if (env.LOG_FORMAT === "json" || env.LOG_FORMAT === "pretty") {
      config.logging.format = env.LOG_FORMAT;
    }
  }

  /**
   * Get the current configuration.
   */
  getConfig(): SystemConfig {
    return structuredClone(this.config);
  }

  /**
   * Reload configuration from file.
   */
  reload(): void {
    this.config = this.loadConfig();
    logger.info("Configuration reloaded");
  }
}

let configManager: ConfigManager | null = null;

// Convenience function to get config
export function getConfig(): SystemConfig {
  configManager ??= new ConfigManager();
  return configManager.getConfig();
}
