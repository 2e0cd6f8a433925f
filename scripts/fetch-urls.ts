/**
 * Script to fetch a list of URLs through the request pool.
 * Usage: ts-node scripts/fetch-urls.ts <url> [url...]
 * Concurrency, timeouts and retries come from the environment (see .env).
 */

import "dotenv/config";
import { RequestPool } from "../src/core/requestPool";
import { HttpClient } from "../src/clients/httpClient";
import { validateEnv } from "../src/utils/checkEnv";
import { Logger, isLogLevel } from "../src/utils/logger";

/**
 * Builds the pool from the validated environment, submits one GET per URL
 * and waits for all of them to settle
 * @param {string[]} urls - Endpoints to fetch
 * @returns {Promise<number>} Number of failed requests
 */
async function fetchAll(urls: string[]): Promise<number> {
  const config = validateEnv();
  if (isLogLevel(config.LOG_LEVEL)) {
    Logger.setLevel(config.LOG_LEVEL);
  }

  const transport = new HttpClient({
    timeoutMs: config.HTTP_TIMEOUT,
    maxRetries: config.HTTP_MAX_RETRIES,
    retryDelayMs: config.HTTP_RETRY_DELAY,
    userAgent: config.HTTP_USER_AGENT,
  });
  const pool = new RequestPool(transport, {
    maxConcurrency: config.POOL_MAX_CONCURRENCY,
    pollIntervalMs: config.POOL_POLL_INTERVAL,
  });

  pool.addCompletionListener((status) => {
    Logger.info(
      `Finished: ${status.completed} completed, ${status.failed} failed, ${status.cancelled} cancelled`
    );
  });

  for (const url of urls) {
    pool.submitGet(
      url,
      (task) => {
        const elapsed =
          task.startedAt && task.completedAt
            ? task.completedAt.getTime() - task.startedAt.getTime()
            : 0;
        Logger.info(
          `${task.url} -> ${task.result?.statusCode} (${task.result?.body.length ?? 0} bytes, ${elapsed}ms)`
        );
      },
      (task, error) => {
        Logger.error(`${task.url} failed: ${error.message}`);
      }
    );
  }

  try {
    await pool.waitForAll();
    return pool.getStatus().failed;
  } finally {
    pool.dispose();
  }
}

const urls = process.argv.slice(2);
if (urls.length === 0) {
  console.error("Usage: fetch-urls <url> [url...]");
  process.exit(1);
}

fetchAll(urls)
  .then((failed) => {
    process.exit(failed > 0 ? 1 : 0);
  })
  .catch((error) => {
    console.error("Unexpected error:", error);
    process.exit(1);
  });
