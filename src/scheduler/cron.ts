import cron, { ScheduledTask } from 'node-cron';
import { Config } from '../config';
import { logger } from '../utils/logger';
import { Sleep, sleep as defaultSleep } from '../utils/sleep';

export interface RetryPolicy {
  retries: number;
  retryDelayMs: number;
  sleep?: Sleep;
}

/**
 * Runs the task, retrying a failed attempt up to `retries` more times.
 * The last error is rethrown when every attempt fails.
 */
export async function runWithRetries<T>(
  task: () => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  const attempts = policy.retries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await task();
    } catch (error) {
      if (attempt >= attempts) {
        throw error;
      }
      logger.warn(`Scan attempt ${attempt}/${attempts} failed, retrying`, {
        retryInMs: policy.retryDelayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(policy.retryDelayMs);
    }
  }
}

/**
 * Wraps a task so a tick that fires while the previous run is still
 * going is skipped instead of overlapping it.
 */
export function createScheduledRun(
  task: () => Promise<unknown>,
  policy: RetryPolicy
): () => Promise<void> {
  let running = false;

  return async () => {
    if (running) {
      logger.warn('Previous scan still running, skipping this tick');
      return;
    }

    running = true;
    const startedAt = utcNowIso();
    try {
      await runWithRetries(task, policy);
    } catch (error) {
      logger.error('Scheduled scan failed after all retries', error, { startedAt });
    } finally {
      running = false;
    }
  };
}

function utcNowIso(): string {
  return new Date().toISOString();
}

export function startScheduler(config: Config, task: () => Promise<unknown>): ScheduledTask {
  const { expression, timezone, retries, retryDelayMs } = config.schedule;
  const run = createScheduledRun(task, { retries, retryDelayMs });

  logger.info('Scheduler started', { expression, timezone, retries, retryDelayMs });

  return cron.schedule(expression, () => {
    run().catch((error: unknown) => {
      logger.error('Scheduled tick crashed', error);
    });
  }, { timezone });
}
