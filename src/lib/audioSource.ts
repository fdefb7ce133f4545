import type { Readable } from 'node:stream';
import { FetchError, HelperStartError } from './errors';
import { spawnStream } from './proc';
import type { TrackDescriptor } from '../pipeline/types';

export type AudioQuality = 'high' | 'very_high';

/**
 * Supplies the raw encoded audio for one catalog item. Implementations
 * reject (or destroy the returned stream) with a FetchError.
 */
export interface AudioSource {
  fetch(descriptor: TrackDescriptor, opts?: { signal?: AbortSignal }): Promise<Readable>;
}

/** Exit codes the stream helper uses to report permanent conditions. */
export const EXIT_NOT_FOUND = 2;
export const EXIT_UNAUTHORIZED = 3;

/** Fill `{kind}`, `{id}` and `{quality}` placeholders, one argv entry per word. */
export function expandArgsTemplate(
  template: string,
  values: { kind: string; id: string; quality: AudioQuality },
): string[] {
  return template
    .split(/\s+/)
    .filter(Boolean)
    .map((part) =>
      part.replace(/\{(kind|id|quality)\}/g, (_m, key: 'kind' | 'id' | 'quality') => values[key]),
    );
}

export function exitCodeError(code: number | null, stderr: string, spawnError?: Error): Error {
  if (spawnError) {
    // a missing helper will not start working on a retry
    return new HelperStartError(`stream helper failed to start: ${spawnError.message}`);
  }
  const tail = stderr.split('\n').slice(-3).join(' ').trim();
  const detail = tail ? `: ${tail}` : '';
  if (code === EXIT_NOT_FOUND) return new FetchError('NotFound', `item unavailable${detail}`);
  if (code === EXIT_UNAUTHORIZED) return new FetchError('Unauthorized', `not allowed${detail}`);
  return new FetchError('Transient', `stream helper exited with ${code ?? 'signal'}${detail}`);
}

/**
 * AudioSource backed by an external helper that writes the encoded stream
 * for one item to stdout, e.g. `librespot-stream --track <id> --quality very_high`.
 */
export function commandAudioSource({
  cmd,
  argsTemplate,
  quality,
  killGraceMs,
}: {
  cmd: string;
  argsTemplate: string;
  quality: AudioQuality;
  killGraceMs?: number;
}): AudioSource {
  return {
    async fetch(descriptor, opts) {
      const args = expandArgsTemplate(argsTemplate, {
        kind: descriptor.kind,
        id: descriptor.id,
        quality,
      });
      return spawnStream(cmd, args, {
        signal: opts?.signal,
        killGraceMs,
        onExitError: exitCodeError,
      });
    },
  };
}
