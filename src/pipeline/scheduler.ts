import path from 'node:path';
import { describeError } from '../lib/errors';
import { defaultLogger, type Logger } from '../lib/log';
import type { Ledger } from './ledger';
import { KeyedMutex, Semaphore } from './pool';
import { safeEmit, silentReporter, type ProgressReporter } from './progress';
import type { DownloadJob, ProgressEvent, RunSummary } from './types';
import type { Worker } from './worker';

export type RunOptions = {
  concurrency: number;
  worker: Worker;
  ledger: Ledger;
  reporter?: ProgressReporter;
  /** When false every job is downloaded again, whatever the ledger says. */
  skipExisting?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
};

export function emptySummary(): RunSummary {
  return { succeeded: 0, failed: 0, skipped: 0, cancelled: 0, errors: [] };
}

/**
 * Drive every job through the worker with at most `concurrency` active at
 * once and never two active for the same target path.
 *
 * Pulling the next job waits for a free slot, so a lazy job source is only
 * read as fast as downloads finish. A job whose path is already claimed by
 * an earlier one is set aside without a slot and takes one only once that
 * path is free. One job failing never stops the others; aborting `signal`
 * stops reading jobs, lets in-flight work wind down, and counts admitted
 * jobs that did not finish as cancelled.
 */
export async function run(
  jobs: Iterable<DownloadJob> | AsyncIterable<DownloadJob>,
  {
    concurrency,
    worker,
    ledger,
    reporter = silentReporter,
    skipExisting = true,
    signal,
    logger = defaultLogger,
  }: RunOptions,
): Promise<RunSummary> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  const slots = new Semaphore(concurrency);
  const paths = new KeyedMutex();
  const summary = emptySummary();
  const inFlight = new Set<Promise<void>>();
  // admitted jobs per resolved target path, released when each one settles
  const claims = new Map<string, number>();
  // ledger writes happen one at a time, in completion order
  let ledgerWrites: Promise<void> = Promise.resolve();

  const emit = (event: ProgressEvent) => safeEmit(reporter, event, logger);

  const skip = (job: DownloadJob) => {
    job.status = 'skipped';
    summary.skipped += 1;
    emit({ jobId: job.descriptor.id, kind: 'skipped' });
  };

  const cancel = (job: DownloadJob) => {
    job.status = 'cancelled';
    job.lastError = 'cancelled';
    summary.cancelled += 1;
  };

  const fail = (job: DownloadJob, reason: string) => {
    job.status = 'failed';
    job.lastError = reason;
    summary.failed += 1;
    summary.errors.push({ descriptor: job.descriptor, reason });
  };

  const isDone = async (job: DownloadJob) => {
    if (!skipExisting) return false;
    try {
      return await ledger.has(job.descriptor.targetPath);
    } catch (e) {
      logger.warn(`ledger lookup failed for ${job.descriptor.targetPath}: ${describeError(e)}`);
      return false;
    }
  };

  const record = (job: DownloadJob, size: number, sha256: string) => {
    const write = ledgerWrites.then(() =>
      ledger.record({
        trackId: job.descriptor.id,
        targetPath: path.resolve(job.descriptor.targetPath),
        completedAt: new Date().toISOString(),
        size,
        sha256,
      }),
    );
    ledgerWrites = write.catch(() => undefined);
    return write;
  };

  const claim = (key: string) => claims.set(key, (claims.get(key) ?? 0) + 1);

  const unclaim = (key: string) => {
    const left = (claims.get(key) ?? 1) - 1;
    if (left > 0) claims.set(key, left);
    else claims.delete(key);
  };

  /** `heldSlot` is null for a job set aside behind another one for its path. */
  async function runJob(job: DownloadJob, key: string, heldSlot: (() => void) | null) {
    const releasePath = await paths.acquire(key);
    let releaseSlot = heldSlot;
    try {
      if (signal?.aborted) {
        cancel(job);
        return;
      }
      // an earlier job for the same path may have just finished it
      if (await isDone(job)) {
        skip(job);
        return;
      }
      if (!releaseSlot) {
        releaseSlot = await slots.acquire();
        if (signal?.aborted) {
          cancel(job);
          return;
        }
      }
      job.status = 'active';
      const result = await worker.execute(job, { signal, emit });
      job.attempt = result.attempts;
      if (result.ok) {
        try {
          await record(job, result.output.size, result.output.sha256);
          job.status = 'succeeded';
          summary.succeeded += 1;
        } catch (e) {
          fail(job, `ledger write failed: ${describeError(e)}`);
        }
      } else if (result.cancelled) {
        cancel(job);
      } else {
        fail(job, describeError(result.error));
      }
    } catch (e) {
      fail(job, describeError(e));
    } finally {
      releaseSlot?.();
      releasePath();
      unclaim(key);
    }
  }

  const track = (task: Promise<void>) => {
    inFlight.add(task);
    void task.finally(() => inFlight.delete(task));
  };

  try {
    for await (const job of jobs) {
      if (signal?.aborted) break;
      const key = path.resolve(job.descriptor.targetPath);
      if (claims.has(key)) {
        claim(key);
        track(runJob(job, key, null));
        continue;
      }
      if (await isDone(job)) {
        skip(job);
        continue;
      }
      const releaseSlot = await slots.acquire();
      if (signal?.aborted) {
        releaseSlot();
        break;
      }
      claim(key);
      track(runJob(job, key, releaseSlot));
    }
  } finally {
    // a job source that throws still lets started downloads finish cleanly
    await Promise.all(inFlight);
    await ledgerWrites;
  }
  return summary;
}
