import fs from 'node:fs/promises';
import type { AudioQuality } from './audioSource';
import type { AudioFormat } from './env';
import { TranscodeError } from './errors';
import type { Runner } from './proc';
import type { TrackTags } from '../pipeline/types';

export function bitrateFor(quality: AudioQuality): string {
  return quality === 'very_high' ? '320k' : '160k';
}

export function buildMetaArgs(tags: TrackTags | undefined): string[] {
  if (!tags) return [];
  const pairs: [string, string | number | undefined][] = [
    ['title', tags.title],
    ['artist', tags.artists.join(', ')],
    ['album', tags.album],
    ['date', tags.year],
    ['disc', tags.discNumber],
    ['track', tags.trackNumber],
  ];
  const metaArgs: string[] = [];
  for (const [k, v] of pairs) {
    if (v === undefined || v === '') continue;
    metaArgs.push('-metadata', `${k}=${v}`);
  }
  return metaArgs;
}

export type TranscodeInput = {
  inputPath: string;
  outputPath: string;
  format: AudioFormat;
  quality: AudioQuality;
  tags?: TrackTags;
  /** Front cover image; only embedded into mp3 output. */
  coverPath?: string | null;
};

export function buildTranscodeArgs({
  inputPath,
  outputPath,
  format,
  quality,
  tags,
  coverPath,
}: TranscodeInput): string[] {
  const metaArgs = buildMetaArgs(tags);
  if (format === 'wav') {
    return [
      '-y',
      '-i',
      inputPath,
      '-map',
      '0:a',
      '-c:a',
      'pcm_s16le',
      ...metaArgs,
      '-f',
      'wav',
      outputPath,
    ];
  }
  if (coverPath) {
    return [
      '-y',
      '-i',
      inputPath,
      '-i',
      coverPath,
      '-map',
      '0:a',
      '-map',
      '1:v',
      '-c:a',
      'libmp3lame',
      '-b:a',
      bitrateFor(quality),
      '-c:v',
      'mjpeg',
      '-disposition:v',
      'attached_pic',
      '-metadata:s:v',
      'title=Cover',
      '-metadata:s:v',
      'comment=Cover (front)',
      ...metaArgs,
      '-id3v2_version',
      '3',
      '-f',
      'mp3',
      outputPath,
    ];
  }
  return [
    '-y',
    '-i',
    inputPath,
    '-map',
    '0:a',
    '-c:a',
    'libmp3lame',
    '-b:a',
    bitrateFor(quality),
    ...metaArgs,
    '-id3v2_version',
    '3',
    '-f',
    'mp3',
    outputPath,
  ];
}

/**
 * Run ffmpeg for one item. Succeeds only when the process exits 0 and the
 * output exists with a non-zero size; returns that size.
 */
export async function transcode(
  input: TranscodeInput,
  { runner, ffmpeg = 'ffmpeg', signal }: { runner: Runner; ffmpeg?: string; signal?: AbortSignal },
): Promise<number> {
  const args = buildTranscodeArgs(input);
  const res = await runner(ffmpeg, args, { signal });
  if (res.code !== 0) {
    const tail = (res.stderr || res.stdout).trim().split('\n').slice(-2).join(' ');
    throw new TranscodeError('ProcessFailed', `ffmpeg exited with ${res.code}${tail ? `: ${tail}` : ''}`);
  }
  const size = await fs
    .stat(input.outputPath)
    .then((s) => s.size)
    .catch(() => 0);
  if (size === 0) throw new TranscodeError('Truncated', `ffmpeg produced no output for ${input.outputPath}`);
  return size;
}
