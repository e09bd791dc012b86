/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  optionalEnvPath,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export discipline profile module
export * from "./discipline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Directory for log files; unset disables file logging */
  readonly logDir?: string;
  /** Target number of subtopics per discipline */
  readonly targetSubtopics: number;
  /** Built-in discipline profile slug */
  readonly discipline: string;
  /** Path to a TopicRecord collection to assemble */
  readonly inputPath?: string;
}

function loadConfig(): AppConfig {
  const logDir = optionalEnvPath("LOG_DIR");
  const inputPath = optionalEnvPath("CURRICULUM_INPUT");
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "curriculum-assembler"),
    ...(logDir !== undefined ? { logDir } : {}),
    targetSubtopics: optionalEnvInt("CURRICULUM_TARGET", 1000, 1),
    discipline: optionalEnv("CURRICULUM_DISCIPLINE", "physics"),
    ...(inputPath !== undefined ? { inputPath } : {}),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate that all configuration values are usable.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * The configured log level, narrowed. Call after validateConfig().
 */
export function configuredLogLevel(): LogLevel {
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}
