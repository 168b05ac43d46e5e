/**
 * @fileoverview Runtime configuration management
 *
 * Holds the process-wide configuration read by every gateway created without
 * explicit overrides. Values set here are validated and merged with
 * {@link DEFAULT_CONFIG}. Environment overrides are applied when the module loads.
 *
 * @module
 */

import * as v from "valibot";
import {
  DEFAULT_CONFIG,
  type SessionScopedConfig,
  SessionScopedConfigSchema,
} from "./config.ts";
import { InvalidArgumentError } from "./errors.ts";
import { createConsoleLogger, LOG_LEVELS, type Logger, type LogLevel } from "./logger.ts";

let currentConfig: SessionScopedConfig = mergeConfig(
  DEFAULT_CONFIG,
  loadConfigFromEnv(),
);

function mergeConfig(
  base: SessionScopedConfig,
  override: SessionScopedConfig,
): SessionScopedConfig {
  return {
    logging: { ...base.logging, ...override.logging },
    telemetry: { ...base.telemetry, ...override.telemetry },
    session: {
      options: { ...base.session?.options, ...override.session?.options },
    },
    transaction: {
      options: {
        ...base.transaction?.options,
        ...override.transaction?.options,
      },
    },
  };
}

/**
 * Sets the runtime configuration
 *
 * Only the values you want to override need to be given.
 *
 * @throws {InvalidArgumentError} when the configuration does not match the schema
 *
 * @example
 * ```typescript
 * import { setRuntimeConfig } from "mongo-session-scoped";
 *
 * setRuntimeConfig({ logging: { level: "debug" } });
 * ```
 */
export function setRuntimeConfig(config: SessionScopedConfig): void {
  const result = v.safeParse(SessionScopedConfigSchema, config);
  if (!result.success) {
    const issues = result.issues.map((issue) =>
      `${v.getDotPath(issue) ?? "root"}: ${issue.message}`
    );
    throw new InvalidArgumentError(
      "config",
      `Invalid configuration: ${issues.join("; ")}`,
    );
  }

  currentConfig = mergeConfig(DEFAULT_CONFIG, config);
}

/**
 * Gets the current runtime configuration, merged with defaults
 */
export function getRuntimeConfig(): SessionScopedConfig {
  return currentConfig;
}

/**
 * Resets the runtime configuration to defaults and environment overrides
 *
 * Useful for testing purposes.
 */
export function resetRuntimeConfig(): void {
  currentConfig = mergeConfig(DEFAULT_CONFIG, loadConfigFromEnv());
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads configuration overrides from environment variables
 *
 * - `MONGO_SESSION_SCOPED_LOG_LEVEL`: one of the log levels
 * - `OTEL_SDK_DISABLED`: `"true"` disables spans
 *
 * Unknown log levels are ignored.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): SessionScopedConfig {
  const config: SessionScopedConfig = {};

  const level = env.MONGO_SESSION_SCOPED_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.logging = { level };
  }

  if (env.OTEL_SDK_DISABLED === "true") {
    config.telemetry = { enabled: false };
  }

  return config;
}

/**
 * Creates the default logger for the current configuration
 */
export function getRuntimeLogger(): Logger {
  return createConsoleLogger(currentConfig.logging?.level);
}
