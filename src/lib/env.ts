import os from 'node:os';
import path from 'node:path';
// Load environment variables from .env (via dotenv) before anything reads them.
import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

export type AudioFormat = 'wav' | 'mp3';

export const AUDIO_FORMATS: readonly AudioFormat[] = ['wav', 'mp3'];

export function isAudioFormat(v: string): v is AudioFormat {
  return AUDIO_FORMATS.some((f) => f === v);
}

/** Expand a leading `~` to the home directory and make the path absolute. */
export function resolveUserPath(input: string): string {
  if (!input) return input;
  if (input.startsWith('~')) {
    const home = os.homedir() || process.env.HOME || '';
    const tail = input.slice(1);
    return path.resolve(path.join(home, tail.startsWith('/') ? tail.slice(1) : tail));
  }
  return path.resolve(input);
}

export type EnvSettings = {
  root: string;
  rootPodcast: string;
  format: AudioFormat;
  concurrency: number;
  streamCmd: string;
  streamArgs: string;
  ffmpeg: string;
  userToken: string;
  credentialsFile: string;
  ledgerPath: string | null;
};

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number((raw || '').trim());
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/** Settings taken from the environment, with defaults for everything unset. */
export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const fmt = (env.TUNEGRAB_FORMAT || '').trim().toLowerCase();
  return {
    root: resolveUserPath(env.TUNEGRAB_ROOT || '~/tunegrab/songs'),
    rootPodcast: resolveUserPath(env.TUNEGRAB_ROOT_PODCAST || '~/tunegrab/podcasts'),
    format: isAudioFormat(fmt) ? fmt : 'mp3',
    concurrency: positiveInt(env.TUNEGRAB_CONCURRENCY, 2),
    streamCmd: (env.TUNEGRAB_STREAM_CMD || 'librespot-stream').trim(),
    streamArgs: env.TUNEGRAB_STREAM_ARGS || '--{kind} {id} --quality {quality}',
    ffmpeg: (env.TUNEGRAB_FFMPEG || 'ffmpeg').trim(),
    userToken: (env.SPOTIFY_USER_TOKEN || '').trim(),
    credentialsFile: resolveUserPath(env.TUNEGRAB_CREDENTIALS_FILE || './credentials.json'),
    ledgerPath: env.TUNEGRAB_LEDGER ? resolveUserPath(env.TUNEGRAB_LEDGER) : null,
  };
}
