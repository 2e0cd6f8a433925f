/**
 * @file env.ts
 * @description Environment configuration and defaults
 */

import dotenv from "dotenv";

dotenv.config();

export interface PoolEnvConfig {
  LOG_LEVEL: string;
  POOL_MAX_CONCURRENCY: number;
  POOL_POLL_INTERVAL: number;
  HTTP_TIMEOUT: number;
  HTTP_MAX_RETRIES: number;
  HTTP_RETRY_DELAY: number;
  HTTP_USER_AGENT: string;
}

/**
 * @constant defaultConfig
 * @description Default configuration values
 */
export const defaultConfig: PoolEnvConfig = {
  LOG_LEVEL: "info",
  POOL_MAX_CONCURRENCY: 5,
  POOL_POLL_INTERVAL: 100,
  HTTP_TIMEOUT: 50000,
  HTTP_MAX_RETRIES: 1,
  HTTP_RETRY_DELAY: 1000,
  HTTP_USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/71.0.3578.98 Safari/537.36",
};

/**
 * @constant positiveIntegerVars
 * @description Numeric variables that must be greater than zero
 */
export const positiveIntegerVars: (keyof PoolEnvConfig)[] = [
  "POOL_MAX_CONCURRENCY",
  "POOL_POLL_INTERVAL",
  "HTTP_TIMEOUT",
];

/**
 * @constant nonNegativeIntegerVars
 * @description Numeric variables where zero is allowed
 */
export const nonNegativeIntegerVars: (keyof PoolEnvConfig)[] = [
  "HTTP_MAX_RETRIES",
  "HTTP_RETRY_DELAY",
];
