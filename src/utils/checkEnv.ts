/**
 * @file checkEnv.ts
 * @description Environment validation utilities
 */

import {
  PoolEnvConfig,
  defaultConfig,
  positiveIntegerVars,
  nonNegativeIntegerVars,
} from "../config/env";
import { Logger, isLogLevel } from "./logger";

type NumericVar =
  | "POOL_MAX_CONCURRENCY"
  | "POOL_POLL_INTERVAL"
  | "HTTP_TIMEOUT"
  | "HTTP_MAX_RETRIES"
  | "HTTP_RETRY_DELAY";

/**
 * @function readInteger
 * @description Reads an integer variable, falling back to its default when unset
 */
function readInteger(
  env: NodeJS.ProcessEnv,
  name: NumericVar,
  problems: string[]
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return defaultConfig[name];
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value)) {
    problems.push(`${name} must be an integer (got "${raw}")`);
    return defaultConfig[name];
  }
  if (positiveIntegerVars.includes(name) && value <= 0) {
    problems.push(`${name} must be greater than 0 (got ${value})`);
  }
  if (nonNegativeIntegerVars.includes(name) && value < 0) {
    problems.push(`${name} must not be negative (got ${value})`);
  }
  return value;
}

/**
 * @function validateEnv
 * @description Validates environment variables and returns a complete config
 * @throws {Error} If any variable holds an invalid value
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): PoolEnvConfig {
  const problems: string[] = [];

  const logLevel = (env.LOG_LEVEL || defaultConfig.LOG_LEVEL).toLowerCase();
  if (!isLogLevel(logLevel)) {
    problems.push(`LOG_LEVEL must be one of error, warn, info, debug (got "${env.LOG_LEVEL}")`);
  }

  const config: PoolEnvConfig = {
    LOG_LEVEL: logLevel,
    POOL_MAX_CONCURRENCY: readInteger(env, "POOL_MAX_CONCURRENCY", problems),
    POOL_POLL_INTERVAL: readInteger(env, "POOL_POLL_INTERVAL", problems),
    HTTP_TIMEOUT: readInteger(env, "HTTP_TIMEOUT", problems),
    HTTP_MAX_RETRIES: readInteger(env, "HTTP_MAX_RETRIES", problems),
    HTTP_RETRY_DELAY: readInteger(env, "HTTP_RETRY_DELAY", problems),
    HTTP_USER_AGENT: env.HTTP_USER_AGENT || defaultConfig.HTTP_USER_AGENT,
  };

  if (problems.length > 0) {
    const errorMessage = `Invalid environment configuration: ${problems.join("; ")}`;
    Logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  Logger.debug("Environment configuration:", config);
  return config;
}

/**
 * @function getEnvConfig
 * @description Gets the validated environment configuration
 */
export function getEnvConfig(): PoolEnvConfig {
  return validateEnv();
}
