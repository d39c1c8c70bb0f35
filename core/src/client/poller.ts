import { setTimeout as defaultSleep } from 'timers/promises';
import { errorMessage, JobNotFoundError, PollingError } from '../errors';
import type { JobStatusView } from '../projection';
import { isTerminal } from '../types';

export type StatusFetcher = () => Promise<JobStatusView | null>;

export interface PollOptions {
  /** Named in the error when the job turns out not to exist */
  jobId?: string;
  /** First wait between polls */
  intervalMs?: number;
  backoffFactor?: number;
  maxIntervalMs?: number;
  /** Consecutive failed fetches tolerated before giving up */
  maxRetries?: number;
  /** Overall deadline; unset polls until the job ends */
  maxWaitMs?: number;
  onUpdate?: (status: JobStatusView) => void;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
}

/**
 * Poll a job's status until it is done or failed.
 *
 * Successful polls keep the base interval. Each failed fetch doubles the
 * wait (by `backoffFactor`) up to `maxIntervalMs`; a success resets it.
 * With `maxWaitMs`, a job still running past the deadline is a
 * `PollingError`: nothing may be driving it any more.
 */
export async function pollUntilTerminal(
  fetchStatus: StatusFetcher,
  options: PollOptions = {}
): Promise<JobStatusView> {
  const {
    intervalMs = 200,
    backoffFactor = 2,
    maxIntervalMs = 5000,
    maxRetries = 5,
    jobId = 'unknown',
    maxWaitMs,
    onUpdate,
    sleep = defaultSleep,
    now = Date.now
  } = options;

  const startedAt = now();
  let failures = 0;
  let attempts = 0;
  let delay = intervalMs;

  for (;;) {
    attempts++;
    let status: JobStatusView | null;
    try {
      status = await fetchStatus();
    } catch (error) {
      failures++;
      if (failures > maxRetries) {
        throw new PollingError(
          `Status polling failed after ${failures} consecutive errors: ${errorMessage(error)}`,
          attempts,
          error
        );
      }
      await sleep(delay);
      delay = Math.min(delay * backoffFactor, maxIntervalMs);
      continue;
    }

    if (status === null) {
      throw new JobNotFoundError(jobId);
    }

    failures = 0;
    delay = intervalMs;
    onUpdate?.(status);
    if (isTerminal(status.status)) {
      return status;
    }
    if (maxWaitMs !== undefined && now() - startedAt >= maxWaitMs) {
      throw new PollingError(
        `Job ${jobId} is still ${status.status} at stage ${status.stage} after ${maxWaitMs}ms`,
        attempts
      );
    }
    await sleep(delay);
  }
}
