import fs from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { exitCodeError } from '../src/lib/audioSource';
import { FetchError, TranscodeError } from '../src/lib/errors';
import { silentLogger } from '../src/lib/log';
import { checksumFile } from '../src/pipeline/ledger';
import { captureReporter } from '../src/pipeline/progress';
import { createJob } from '../src/pipeline/types';
import { createWorker, tempPaths, type WorkerDeps } from '../src/pipeline/worker';
import { descriptor, exists, fakeAudio, fakeFetch, fakeFfmpeg, makeTmp, mkRes } from './helpers';

const fast = { attempts: 3, backoffMs: 1, maxBackoffMs: 1 };

function setup(deps: Partial<WorkerDeps> & Pick<WorkerDeps, 'audio'>) {
  const runner = fakeFfmpeg();
  const worker = createWorker({ quality: 'high', runner, retry: fast, logger: silentLogger, ...deps });
  const cap = captureReporter();
  return { worker, runner, cap, ctx: { emit: cap.onEvent } };
}

describe('tempPaths', () => {
  test('all temp files sit beside the target', () => {
    const d = descriptor('t1', '/music', { format: 'wav', targetPath: '/music/A - B.wav' });
    expect(tempPaths(d, 'abcd')).toEqual({
      part: '/music/A - B.wav.abcd.part',
      output: '/music/A - B.wav.abcd.tmp.wav',
      cover: '/music/A - B.wav.abcd.cover.jpg',
    });
  });
});

describe('worker', () => {
  test('fetches, transcodes and renames into place', async () => {
    const dir = path.join(await makeTmp('tunegrab-worker-'), 'Album');
    const d = descriptor('t1', dir);
    const { worker, cap, ctx } = setup({ audio: fakeAudio(() => Buffer.from('raw-audio')) });

    const result = await worker.execute(createJob(d), ctx);

    expect(await fs.readFile(d.targetPath, 'utf8')).toBe('ENC:raw-audio');
    expect(result).toEqual({
      ok: true,
      attempts: 1,
      output: { size: 'ENC:raw-audio'.length, sha256: await checksumFile(d.targetPath) },
    });
    expect(await fs.readdir(dir)).toEqual(['Artist - t1.mp3']);
    expect(cap.events).toEqual([
      { jobId: 't1', kind: 'started', attempt: 1 },
      { jobId: 't1', kind: 'bytesWritten', bytes: 9 },
      { jobId: 't1', kind: 'succeeded' },
    ]);
  });

  test('transient fetch failures are retried', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const audio = fakeAudio((_d, call) => (call < 3 ? new FetchError('Transient', 'reset') : Buffer.from('ok')));
    const { worker, cap, ctx } = setup({ audio });
    const result = await worker.execute(createJob(descriptor('t1', dir)), ctx);
    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(3);
    expect(cap.ofKind('started').map((e) => e.attempt)).toEqual([1, 2, 3]);
  });

  test('permanent fetch failures are not retried', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const audio = fakeAudio(() => new FetchError('NotFound', 'item unavailable'));
    const { worker, cap, ctx } = setup({ audio });
    const result = await worker.execute(createJob(descriptor('t1', dir)), ctx);
    expect(result).toMatchObject({ ok: false, attempts: 1, cancelled: false });
    expect(audio.calls).toEqual(['t1']);
    expect(cap.ofKind('failed')).toEqual([
      { jobId: 't1', kind: 'failed', reason: 'FetchError.NotFound: item unavailable' },
    ]);
  });

  test('a stream helper that cannot start is reported without retry', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const startFailure = exitCodeError(null, '', new Error('spawn librespot-stream ENOENT'));
    const audio = fakeAudio(
      () =>
        new Readable({
          read() {
            this.destroy(startFailure);
          },
        }),
    );
    const { worker, runner, cap, ctx } = setup({ audio });
    const result = await worker.execute(createJob(descriptor('t1', dir)), ctx);
    expect(result).toMatchObject({ ok: false, attempts: 1, cancelled: false });
    if (!result.ok) expect(result.error).toBe(startFailure);
    expect(audio.calls).toEqual(['t1']);
    expect(runner.calls).toEqual([]);
    expect(cap.ofKind('failed')).toEqual([
      {
        jobId: 't1',
        kind: 'failed',
        reason: 'stream helper failed to start: spawn librespot-stream ENOENT',
      },
    ]);
  });

  test('a failed fetch does not create the target directory', async () => {
    const dir = path.join(await makeTmp('tunegrab-worker-'), 'Playlist');
    const audio = fakeAudio(() => new FetchError('NotFound', 'item unavailable'));
    const { worker, ctx } = setup({ audio });
    const result = await worker.execute(createJob(descriptor('t1', dir)), ctx);
    expect(result.ok).toBe(false);
    expect(await exists(dir)).toBe(false);
  });

  test('an empty stream is a transient failure', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const { worker, runner, cap, ctx } = setup({ audio: fakeAudio(() => Buffer.alloc(0)) });
    const result = await worker.execute(createJob(descriptor('t1', dir)), ctx);
    expect(result).toMatchObject({ ok: false, attempts: 3 });
    expect(runner.calls).toEqual([]);
    expect(cap.ofKind('failed')[0]?.reason).toBe('FetchError.Transient: audio stream was empty');
    expect(await fs.readdir(dir)).toEqual([]);
  });

  test('transcoder failure leaves nothing behind', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const runner = fakeFfmpeg({ exitCode: 1 });
    const { worker, ctx } = setup({ audio: fakeAudio(() => Buffer.from('raw')), runner });
    const result = await worker.execute(createJob(descriptor('t1', dir)), ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(TranscodeError);
    expect(runner.calls).toHaveLength(3);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  test('cover art is embedded into mp3 when it can be fetched', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const d = descriptor('t1', dir, {
      tags: { title: 't1', artists: ['Artist'], coverUrl: 'https://img.test/cover.jpg' },
    });
    const fetchFn = fakeFetch([['img.test', () => mkRes(200, 'jpeg-bytes')]]);
    const { worker, runner, ctx } = setup({ audio: fakeAudio(() => Buffer.from('raw')), fetchFn });
    await worker.execute(createJob(d), ctx);
    const args = runner.calls[0];
    expect(args).toContain('attached_pic');
    expect(args[4].endsWith('.cover.jpg')).toBe(true);
    expect(fetchFn.urls).toEqual(['https://img.test/cover.jpg']);
    expect(await fs.readdir(dir)).toEqual(['Artist - t1.mp3']);
  });

  test('missing cover art does not fail the item', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const d = descriptor('t1', dir, {
      tags: { title: 't1', artists: ['Artist'], coverUrl: 'https://img.test/cover.jpg' },
    });
    const { worker, runner, ctx } = setup({
      audio: fakeAudio(() => Buffer.from('raw')),
      fetchFn: fakeFetch([]),
    });
    const result = await worker.execute(createJob(d), ctx);
    expect(result.ok).toBe(true);
    expect(runner.calls[0]).not.toContain('attached_pic');
  });

  test('already cancelled: nothing is fetched', async () => {
    const dir = await makeTmp('tunegrab-worker-');
    const audio = fakeAudio(() => Buffer.from('raw'));
    const { worker, cap } = setup({ audio });
    const controller = new AbortController();
    controller.abort();
    const result = await worker.execute(createJob(descriptor('t1', dir)), {
      signal: controller.signal,
      emit: cap.onEvent,
    });
    expect(result).toMatchObject({ ok: false, attempts: 0, cancelled: true });
    expect(audio.calls).toEqual([]);
    expect(cap.events).toEqual([{ jobId: 't1', kind: 'failed', reason: 'cancelled' }]);
  });
});
