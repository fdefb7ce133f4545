import { randomBytes } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { AudioQuality, AudioSource } from '../lib/audioSource';
import type { FetchFn } from '../lib/catalog';
import {
  CancelledError,
  FetchError,
  StorageError,
  describeError,
  isClassified,
  storageErrorFrom,
} from '../lib/errors';
import { transcode } from '../lib/ffmpeg';
import { defaultLogger, type Logger } from '../lib/log';
import { spawnRunner, type Runner } from '../lib/proc';
import { DEFAULT_RETRY, withRetry, type RetryPolicy } from '../lib/retry';
import { checksumFile } from './ledger';
import type { DownloadJob, ProgressEvent, TrackDescriptor, WorkerOutput, WorkerResult } from './types';

export const PROGRESS_EVERY_BYTES = 256 * 1024;

export type WorkerDeps = {
  audio: AudioSource;
  quality: AudioQuality;
  runner?: Runner;
  ffmpeg?: string;
  retry?: RetryPolicy;
  /** Used to download cover art; omit to skip artwork. */
  fetchFn?: FetchFn;
  logger?: Logger;
  progressEveryBytes?: number;
};

export type ExecuteContext = {
  signal?: AbortSignal;
  emit: (event: ProgressEvent) => void;
};

export interface Worker {
  execute(job: DownloadJob, ctx: ExecuteContext): Promise<WorkerResult>;
}

/** Temp artifacts for one attempt, all beside the target so the final rename stays on one filesystem. */
export function tempPaths(descriptor: TrackDescriptor, nonce: string) {
  const base = `${descriptor.targetPath}.${nonce}`;
  return {
    part: `${base}.part`,
    output: `${base}.tmp.${descriptor.format}`,
    cover: `${base}.cover.jpg`,
  };
}

function asStorageOr(err: unknown, fallback: (e: unknown) => Error): Error {
  const mapped = storageErrorFrom(err);
  if (mapped instanceof StorageError) return mapped;
  if (isClassified(err)) return err;
  return fallback(err);
}

function countingStream(every: number, onBytes: (total: number) => void): Transform {
  let total = 0;
  let lastReported = 0;
  return new Transform({
    transform(chunk: Buffer, _enc, cb) {
      total += chunk.length;
      if (total - lastReported >= every) {
        lastReported = total;
        onBytes(total);
      }
      cb(null, chunk);
    },
    flush(cb) {
      if (total !== lastReported) onBytes(total);
      cb();
    },
  });
}

/**
 * Builds the fetch-and-transcode worker. Each attempt streams the encoded
 * audio into a `.part` file, transcodes it into a temp output and renames
 * that over `targetPath`; temp files are removed whatever the outcome.
 */
export function createWorker(deps: WorkerDeps): Worker {
  const runner = deps.runner ?? spawnRunner;
  const logger = deps.logger ?? defaultLogger;
  const policy = deps.retry ?? DEFAULT_RETRY;
  const every = deps.progressEveryBytes ?? PROGRESS_EVERY_BYTES;

  async function downloadCover(url: string, dest: string, signal?: AbortSignal) {
    if (!deps.fetchFn) return null;
    try {
      const res = await deps.fetchFn(url, { signal });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      await fs.writeFile(dest, Buffer.from(await res.arrayBuffer()));
      return dest;
    } catch (e) {
      logger.debug(`cover art skipped (${url}): ${describeError(e)}`);
      return null;
    }
  }

  async function attempt(
    descriptor: TrackDescriptor,
    ctx: ExecuteContext,
  ): Promise<WorkerOutput> {
    const { signal, emit } = ctx;
    const tmp = tempPaths(descriptor, randomBytes(4).toString('hex'));
    try {
      const source = await deps.audio.fetch(descriptor, { signal });
      try {
        await fs.mkdir(path.dirname(descriptor.targetPath), { recursive: true });
      } catch (e) {
        source.destroy();
        throw asStorageOr(e, (x) => (x instanceof Error ? x : new Error(String(x))));
      }
      const counter = countingStream(every, (bytes) =>
        emit({ jobId: descriptor.id, kind: 'bytesWritten', bytes }),
      );
      try {
        await pipeline(source, counter, createWriteStream(tmp.part), { signal });
      } catch (e) {
        if (signal?.aborted) throw new CancelledError();
        throw asStorageOr(e, (x) => new FetchError('Transient', describeError(x)));
      }
      const received = (await fs.stat(tmp.part)).size;
      if (received === 0) throw new FetchError('Transient', 'audio stream was empty');

      const coverPath =
        descriptor.format === 'mp3' && descriptor.tags?.coverUrl
          ? await downloadCover(descriptor.tags.coverUrl, tmp.cover, signal)
          : null;

      const size = await transcode(
        {
          inputPath: tmp.part,
          outputPath: tmp.output,
          format: descriptor.format,
          quality: deps.quality,
          tags: descriptor.tags,
          coverPath,
        },
        { runner, ffmpeg: deps.ffmpeg, signal },
      );
      const sha256 = await checksumFile(tmp.output);

      if (signal?.aborted) throw new CancelledError();
      try {
        await fs.rename(tmp.output, descriptor.targetPath);
      } catch (e) {
        throw asStorageOr(e, (x) => (x instanceof Error ? x : new Error(String(x))));
      }
      return { size, sha256 };
    } finally {
      await Promise.all(
        [tmp.part, tmp.output, tmp.cover].map((p) => fs.rm(p, { force: true })),
      );
    }
  }

  return {
    async execute(job, ctx) {
      const { descriptor } = job;
      let attempts = 0;
      try {
        const output = await withRetry(() => attempt(descriptor, ctx), {
          policy,
          signal: ctx.signal,
          onAttempt: (n) => {
            attempts = n;
            ctx.emit({ jobId: descriptor.id, kind: 'started', attempt: n });
          },
        });
        ctx.emit({ jobId: descriptor.id, kind: 'succeeded' });
        return { ok: true, attempts, output };
      } catch (error) {
        const cancelled = error instanceof CancelledError || !!ctx.signal?.aborted;
        const reason = cancelled ? 'cancelled' : describeError(error);
        ctx.emit({ jobId: descriptor.id, kind: 'failed', reason });
        return { ok: false, attempts, error: cancelled ? new CancelledError() : error, cancelled };
      }
    },
  };
}
