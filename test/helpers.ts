import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import type { AudioSource } from '../src/lib/audioSource';
import type { Runner } from '../src/lib/proc';
import type { Ledger } from '../src/pipeline/ledger';
import type { LedgerEntry, TrackDescriptor } from '../src/pipeline/types';

export async function makeTmp(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function exists(p: string): Promise<boolean> {
  return fs
    .stat(p)
    .then(() => true)
    .catch(() => false);
}

export function descriptor(
  id: string,
  dir: string,
  overrides: Partial<TrackDescriptor> = {},
): TrackDescriptor {
  return {
    id,
    kind: 'track',
    displayName: `Artist - ${id}`,
    durationSeconds: 180,
    targetPath: path.join(dir, `Artist - ${id}.mp3`),
    format: 'mp3',
    ...overrides,
  };
}

/**
 * Audio source whose behaviour per call is decided by `behaviour`:
 * a Buffer is streamed, an Error is thrown.
 */
export function fakeAudio(
  behaviour: (d: TrackDescriptor, call: number) => Buffer | Error | Readable,
): AudioSource & { calls: string[] } {
  const calls: string[] = [];
  const source: AudioSource = {
    async fetch(d) {
      calls.push(d.id);
      const r = behaviour(d, calls.filter((c) => c === d.id).length);
      if (r instanceof Error) throw r;
      if (r instanceof Readable) return r;
      return Readable.from([r], { objectMode: false });
    },
  };
  return Object.assign(source, { calls });
}

/**
 * Stand-in for ffmpeg: copies the `-i` input to the last argument with an
 * "ENC:" prefix, or exits with `exitCode` when one is given.
 */
export function fakeFfmpeg(
  opts: { exitCode?: number; empty?: boolean } = {},
): Runner & { calls: string[][] } {
  const calls: string[][] = [];
  const runner: Runner = async (_cmd, args) => {
    calls.push(args);
    if (opts.exitCode) return { code: opts.exitCode, stdout: '', stderr: 'Invalid data found' };
    const input = args[args.indexOf('-i') + 1];
    const output = args[args.length - 1];
    const data = await fs.readFile(input);
    await fs.writeFile(output, opts.empty ? '' : Buffer.concat([Buffer.from('ENC:'), data]));
    return { code: 0, stdout: '', stderr: '' };
  };
  return Object.assign(runner, { calls });
}

/** Ledger that trusts its own records; lets scheduler tests skip the filesystem. */
export class FakeLedger implements Ledger {
  readonly done = new Set<string>();
  readonly records: LedgerEntry[] = [];

  async has(targetPath: string): Promise<boolean> {
    return this.done.has(path.resolve(targetPath));
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.records.push(entry);
    this.done.add(path.resolve(entry.targetPath));
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type FakeResponse = {
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
  text: () => Promise<string>;
  arrayBuffer: () => Promise<ArrayBufferLike>;
};

export function mkRes(status: number, body: unknown): FakeResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
    arrayBuffer: async () => new TextEncoder().encode(JSON.stringify(body)).buffer,
  };
}

/**
 * Build a fetch stand-in from a route table. Keys are matched as substrings
 * of the requested URL, first match wins; unknown URLs get a 404.
 */
export function fakeFetch(
  routes: [string, (url: string) => FakeResponse][],
): typeof fetch & { urls: string[] } {
  const urls: string[] = [];
  const impl = async (input: string | URL | Request): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    urls.push(url);
    const hit = routes.find(([key]) => url.includes(key));
    const res = hit ? hit[1](url) : mkRes(404, { error: `unknown url ${url}` });
    return res as unknown as Response;
  };
  const fn: typeof fetch & { urls: string[] } = Object.assign(impl, { urls });
  return fn;
}
