import path from 'node:path';
import { parseSpotifyUrl, sanitizeName, type CatalogClient } from './catalog';
import type { AudioFormat } from './env';
import { ResolutionError } from './errors';
import { defaultLogger, type Logger } from './log';
import { DEFAULT_RETRY, withRetry, type RetryPolicy } from './retry';
import type { Session } from './session';
import type { TrackDescriptor } from '../pipeline/types';

export type Source =
  | { kind: 'url'; url: string }
  | { kind: 'liked' }
  | { kind: 'playlist'; id: string; name?: string }
  | { kind: 'search'; query: string; limit?: number };

export type ResolveConfig = {
  root: string;
  rootPodcast: string;
  format: AudioFormat;
  logger?: Logger;
  /** Stops paging and any retry backoff; resolution then rejects with CancelledError. */
  signal?: AbortSignal;
};

type ApiArtist = { id?: string; name?: string | null };
type ApiImage = { url?: string };
type ApiAlbum = {
  id?: string;
  name?: string;
  release_date?: string;
  images?: ApiImage[];
  artists?: ApiArtist[];
};
export type ApiTrack = {
  id?: string | null;
  name?: string | null;
  type?: string;
  duration_ms?: number;
  is_playable?: boolean;
  disc_number?: number;
  track_number?: number;
  artists?: ApiArtist[];
  album?: ApiAlbum;
};
type ApiEpisode = { id?: string; name?: string; duration_ms?: number; show?: { name?: string } };
type ApiPlaylist = { id?: string; name?: string; owner?: { display_name?: string } };

export const LIKED_SONGS_DIR = 'Liked Songs';
/** The tracks endpoint accepts at most this many ids per request. */
export const TRACK_BATCH = 50;

function artistNames(artists: ApiArtist[] | undefined): string[] {
  return (artists || []).map((a) => (a?.name || '').trim()).filter(Boolean);
}

/** "First Artist - Title", the name the file gets on disk (before sanitising). */
function songName(t: ApiTrack): string {
  const first = artistNames(t.artists)[0] || 'Unknown';
  return `${first} - ${(t.name || '').trim() || 'Unknown'}`;
}

export function trackDescriptor(t: ApiTrack, dir: string, format: AudioFormat): TrackDescriptor {
  const id = t.id || '';
  const artists = artistNames(t.artists);
  const name = songName(t);
  const year = (t.album?.release_date || '').split('-')[0];
  return {
    id,
    kind: 'track',
    displayName: name,
    durationSeconds: Math.max(0, Math.round((t.duration_ms || 0) / 1000)),
    targetPath: path.join(dir, `${sanitizeName(artists[0] || 'Unknown')} - ${sanitizeName(t.name)}.${format}`),
    format,
    tags: {
      title: (t.name || '').trim(),
      artists,
      album: t.album?.name || undefined,
      year: year || undefined,
      discNumber: t.disc_number,
      trackNumber: t.track_number,
      coverUrl: t.album?.images?.[0]?.url,
    },
  };
}

export function episodeDescriptor(
  e: ApiEpisode,
  rootPodcast: string,
  format: AudioFormat,
): TrackDescriptor {
  const show = (e.show?.name || '').trim() || 'Unknown';
  const name = (e.name || '').trim() || 'Unknown';
  return {
    id: e.id || '',
    kind: 'episode',
    displayName: `${show} - ${name}`,
    durationSeconds: Math.max(0, Math.round((e.duration_ms || 0) / 1000)),
    targetPath: path.join(rootPodcast, `${sanitizeName(show)} - ${sanitizeName(name)}.${format}`),
    format,
    tags: { title: name, artists: [show], album: show },
  };
}

async function* batches<T>(source: AsyncIterable<T>, size: number): AsyncGenerator<T[]> {
  let batch: T[] = [];
  for await (const item of source) {
    batch.push(item);
    if (batch.length >= size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) yield batch;
}

/**
 * Look up full track metadata (with market relinking) for a stream of ids,
 * TRACK_BATCH at a time, and turn each playable track into a descriptor.
 */
async function* describeTracks(
  api: CatalogClient,
  ids: AsyncIterable<string>,
  dir: string,
  cfg: ResolveConfig,
): AsyncGenerator<TrackDescriptor> {
  const logger = cfg.logger ?? defaultLogger;
  for await (const batch of batches(ids, TRACK_BATCH)) {
    const res = await api.getJson<{ tracks?: (ApiTrack | null)[] }>(
      `/tracks?ids=${batch.join(',')}&market=from_token`,
      { signal: cfg.signal },
    );
    const tracks = res.tracks || [];
    for (let i = 0; i < batch.length; i++) {
      const t = tracks[i];
      if (!t || !t.id) {
        logger.warn(`Skip: track ${batch[i]} does not exist anymore.`);
        continue;
      }
      if (t.is_playable === false) {
        logger.warn(`Skip: ${songName(t)} is unavailable.`);
        continue;
      }
      yield trackDescriptor(t, dir, cfg.format);
    }
  }
}

async function* single<T>(value: T): AsyncGenerator<T> {
  yield value;
}

async function* playlistTrackIds(
  api: CatalogClient,
  id: string,
  signal?: AbortSignal,
): AsyncGenerator<string> {
  const tracks = api.items<{ track?: ApiTrack | null }>(`/playlists/${id}/tracks`, 100, signal);
  for await (const item of tracks) {
    const t = item?.track;
    // local files and podcast entries carry no playable track id
    if (!t || !t.id || (t.type && t.type !== 'track')) continue;
    yield t.id;
  }
}

async function* likedTrackIds(api: CatalogClient, signal?: AbortSignal): AsyncGenerator<string> {
  for await (const item of api.items<{ track?: ApiTrack | null }>('/me/tracks', 50, signal)) {
    if (item?.track?.id) yield item.track.id;
  }
}

async function* albumTrackIds(
  api: CatalogClient,
  id: string,
  signal?: AbortSignal,
): AsyncGenerator<string> {
  for await (const t of api.items<ApiTrack>(`/albums/${id}/tracks`, 50, signal)) {
    if (t?.id) yield t.id;
  }
}

async function playlistName(api: CatalogClient, id: string, signal?: AbortSignal): Promise<string> {
  const res = await api.getJson<{ name?: string }>(
    `/playlists/${id}?fields=name,owner(display_name)&market=from_token`,
    { signal },
  );
  return (res.name || '').trim();
}

/**
 * Turn a source into an ordered, lazily produced sequence of descriptors.
 * Playlist and album order is preserved; catalog failures surface as
 * ResolutionError from the iterator.
 */
export async function* resolve(
  session: Session,
  source: Source,
  cfg: ResolveConfig,
): AsyncGenerator<TrackDescriptor> {
  const { api } = session;
  const { signal } = cfg;
  switch (source.kind) {
    case 'liked':
      yield* describeTracks(api, likedTrackIds(api, signal), path.join(cfg.root, LIKED_SONGS_DIR), cfg);
      return;
    case 'playlist': {
      const name = source.name ?? (await playlistName(api, source.id, signal));
      const dir = path.join(cfg.root, sanitizeName(name));
      yield* describeTracks(api, playlistTrackIds(api, source.id, signal), dir, cfg);
      return;
    }
    case 'search': {
      const found = await searchCatalog(session, source.query, source.limit ?? 1, signal);
      const first = found.tracks[0];
      if (!first?.id) throw new ResolutionError('NotFound', `No results for "${source.query}"`);
      yield* describeTracks(api, single(first.id), cfg.root, cfg);
      return;
    }
    case 'url': {
      const { type, id } = parseSpotifyUrl(source.url);
      if (type === 'track') {
        yield* describeTracks(api, single(id), cfg.root, cfg);
      } else if (type === 'album') {
        const album = await api.getJson<ApiAlbum>(`/albums/${id}`, { signal });
        const artist = artistNames(album.artists)[0] || 'Unknown';
        const dir = path.join(cfg.root, `${sanitizeName(artist)} - ${sanitizeName(album.name)}`);
        yield* describeTracks(api, albumTrackIds(api, id, signal), dir, cfg);
      } else if (type === 'playlist') {
        yield* resolve(session, { kind: 'playlist', id }, cfg);
      } else {
        const ep = await api.getJson<ApiEpisode>(`/episodes/${id}?market=from_token`, { signal });
        yield episodeDescriptor({ ...ep, id: ep.id || id }, cfg.rootPodcast, cfg.format);
      }
      return;
    }
  }
}

/**
 * Resolve everything up front, retrying the whole resolution when the
 * catalog reports a transient failure.
 */
export async function resolveAll(
  session: Session,
  source: Source,
  cfg: ResolveConfig,
  policy: RetryPolicy = DEFAULT_RETRY,
): Promise<TrackDescriptor[]> {
  return withRetry(
    async () => {
      const out: TrackDescriptor[] = [];
      for await (const d of resolve(session, source, cfg)) out.push(d);
      return out;
    },
    { policy, signal: cfg.signal },
  );
}

export type SearchResults = {
  tracks: ApiTrack[];
  albums: (ApiAlbum & { id?: string })[];
  playlists: ApiPlaylist[];
};

export async function searchCatalog(
  session: Session,
  query: string,
  limit = 10,
  signal?: AbortSignal,
): Promise<SearchResults> {
  const q = encodeURIComponent(query);
  const res = await session.api.getJson<{
    tracks?: { items?: (ApiTrack | null)[] };
    albums?: { items?: (ApiAlbum | null)[] };
    playlists?: { items?: (ApiPlaylist | null)[] };
  }>(`/search?q=${q}&type=track,album,playlist&limit=${limit}&offset=0`, { signal });
  const keep = <T>(xs: (T | null)[] | undefined): T[] =>
    (xs || []).filter((x): x is T => x !== null && x !== undefined);
  return {
    tracks: keep(res.tracks?.items),
    albums: keep(res.albums?.items),
    playlists: keep(res.playlists?.items),
  };
}

export async function listUserPlaylists(
  session: Session,
  signal?: AbortSignal,
): Promise<{ id: string; name: string }[]> {
  const out: { id: string; name: string }[] = [];
  for await (const p of session.api.items<ApiPlaylist | null>('/me/playlists', 50, signal)) {
    if (p?.id) out.push({ id: p.id, name: (p.name || '').trim() });
  }
  return out;
}
