import * as v from "valibot";
import { LOG_LEVELS } from "./logger.ts";
import type * as m from "mongodb";

/**
 * Validation schema for {@link SessionScopedConfig}
 *
 * Driver options (`session.options`, `transaction.options`) are passed through
 * to MongoDB untouched, only their container shape is checked.
 */
export const SessionScopedConfigSchema = v.object({
  /** Logging settings */
  logging: v.optional(v.object({
    /** Minimum level written to the console (default: "warn") */
    level: v.optional(v.picklist(LOG_LEVELS)),
  })),

  /** OpenTelemetry settings */
  telemetry: v.optional(v.object({
    /** Whether executions open spans (default: true) */
    enabled: v.optional(v.boolean()),
    tracerName: v.optional(v.pipe(v.string(), v.minLength(1))),
    tracerVersion: v.optional(v.string()),
  })),

  /** Defaults for sessions opened by the MongoDB session source */
  session: v.optional(v.object({
    options: v.optional(v.record(v.string(), v.unknown())),
  })),

  /** Defaults for transactional gateways */
  transaction: v.optional(v.object({
    options: v.optional(v.record(v.string(), v.unknown())),
  })),
});

/**
 * Configuration for session-scoped execution
 */
export type SessionScopedConfig = {
  logging?: {
    level?: typeof LOG_LEVELS[number];
  };
  telemetry?: {
    enabled?: boolean;
    tracerName?: string;
    tracerVersion?: string;
  };
  session?: {
    options?: m.ClientSessionOptions;
  };
  transaction?: {
    options?: m.TransactionOptions;
  };
};

/**
 * Defines a configuration with type safety
 *
 * @example
 * ```typescript
 * import { defineConfig, setRuntimeConfig } from "mongo-session-scoped";
 *
 * setRuntimeConfig(defineConfig({
 *   logging: { level: "debug" },
 *   transaction: { options: { readConcern: { level: "snapshot" } } },
 * }));
 * ```
 */
export function defineConfig(config: SessionScopedConfig): SessionScopedConfig {
  return config;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: SessionScopedConfig = {
  logging: {
    level: "warn",
  },
  telemetry: {
    enabled: true,
    tracerName: "mongo-session-scoped",
    tracerVersion: "0.1.0",
  },
  session: {
    options: {},
  },
  transaction: {
    options: {},
  },
};
