/**
 * Application configuration for the CLI commands.
 *
 * Environment settings (where output goes, how much is logged) live here;
 * what gets generated is the generator configuration in ./generator.
 */

import type { LogLevel } from "../logging/logger.js";
import { optionalEnv, optionalEnvBool, optionalEnvChoice, type EnvSource } from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

export * from "./generator/index.js";

export const ENVIRONMENTS = ["development", "production", "test"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** NODE_ENV */
  readonly env: Environment;
  /** DEBUG; lowers the log level to debug */
  readonly debug: boolean;
  /** LOG_LEVEL */
  readonly logLevel: LogLevel;
  /** APP_NAME */
  readonly appName: string;
  /** OUTPUT_DIR: CSV files, manifests and logs/ */
  readonly outputDir: string;
  /** LOG_TO_FILE: also append to <outputDir>/logs/generator.log */
  readonly logToFile: boolean;
}

/**
 * Read and validate the application configuration.
 *
 * @throws ConfigError on the first invalid variable
 */
export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const debug = optionalEnvBool(env, "DEBUG", false);
  const logLevel = optionalEnvChoice(env, "LOG_LEVEL", LOG_LEVELS, "info");

  return Object.freeze({
    env: optionalEnvChoice(env, "NODE_ENV", ENVIRONMENTS, "development"),
    debug,
    logLevel: debug ? "debug" : logLevel,
    appName: optionalEnv(env, "APP_NAME", "compression-grammar"),
    outputDir: optionalEnv(env, "OUTPUT_DIR", "output"),
    logToFile: optionalEnvBool(env, "LOG_TO_FILE", true),
  });
}
