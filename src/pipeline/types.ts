import type { AudioFormat } from '../lib/env';

export type ItemKind = 'track' | 'episode';

export type TrackTags = Readonly<{
  title: string;
  artists: readonly string[];
  album?: string;
  year?: string;
  discNumber?: number;
  trackNumber?: number;
  coverUrl?: string;
}>;

/** Immutable description of one downloadable item and where it should end up. */
export type TrackDescriptor = Readonly<{
  id: string;
  kind: ItemKind;
  displayName: string;
  durationSeconds: number;
  /** Absolute path of the finished file. */
  targetPath: string;
  format: AudioFormat;
  tags?: TrackTags;
}>;

export type JobStatus = 'pending' | 'active' | 'succeeded' | 'failed' | 'skipped' | 'cancelled';

/** A descriptor plus run state. Only the scheduler writes to a job. */
export type DownloadJob = {
  readonly descriptor: TrackDescriptor;
  status: JobStatus;
  attempt: number;
  lastError?: string;
};

export function createJob(descriptor: TrackDescriptor): DownloadJob {
  return { descriptor, status: 'pending', attempt: 0 };
}

export type LedgerEntry = Readonly<{
  trackId: string;
  targetPath: string;
  /** ISO-8601 timestamp. */
  completedAt: string;
  size: number;
  sha256: string;
}>;

export type ProgressEvent =
  | { jobId: string; kind: 'started'; attempt: number }
  | { jobId: string; kind: 'bytesWritten'; bytes: number }
  | { jobId: string; kind: 'succeeded' }
  | { jobId: string; kind: 'failed'; reason: string }
  | { jobId: string; kind: 'skipped' };

export type WorkerOutput = { size: number; sha256: string };

export type WorkerResult =
  | { ok: true; attempts: number; output: WorkerOutput }
  | { ok: false; attempts: number; error: unknown; cancelled: boolean };

export type RunSummary = {
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
  errors: { descriptor: TrackDescriptor; reason: string }[];
};
