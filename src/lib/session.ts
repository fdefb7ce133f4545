import fs from 'node:fs/promises';
import { CatalogClient, type FetchFn } from './catalog';
import { AuthError, ResolutionError } from './errors';
import type { AudioQuality, AudioSource } from './audioSource';

export type Credentials = { token: string } | { credentialsFile: string };

/**
 * An authenticated session. Passed explicitly to the resolver and worker;
 * nothing in the codebase keeps a logged-in client in module state.
 */
export interface Session {
  readonly token: string;
  readonly userId: string;
  readonly quality: AudioQuality;
  readonly api: CatalogClient;
  readonly audio: AudioSource;
}

export type SessionDeps = {
  fetchFn?: FetchFn;
  /** Builds the audio source once the account's quality tier is known. */
  audio: (quality: AudioQuality) => AudioSource;
};

async function tokenFromFile(file: string): Promise<string> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new AuthError(`Cannot read credentials file ${file}: ${detail}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new AuthError(`Credentials file ${file} is not valid JSON`);
  }
  if (typeof json === 'object' && json !== null) {
    const token =
      'token' in json ? json.token : 'access_token' in json ? json.access_token : undefined;
    if (typeof token === 'string' && token.trim()) return token.trim();
  }
  throw new AuthError(`Credentials file ${file} has no "token" field`);
}

/**
 * Validate credentials against the catalog and produce a Session.
 * Premium accounts get the very_high (320k) tier, everyone else high (160k).
 */
export async function authenticate(credentials: Credentials, deps: SessionDeps): Promise<Session> {
  const token =
    'token' in credentials ? credentials.token.trim() : await tokenFromFile(credentials.credentialsFile);
  if (!token) throw new AuthError('Empty access token');

  const api = new CatalogClient(token, deps.fetchFn);
  let me: { id?: string; product?: string };
  try {
    me = await api.getJson<{ id?: string; product?: string }>('/me');
  } catch (e) {
    if (e instanceof ResolutionError && e.kind === 'Unauthorized') {
      throw new AuthError('Failed to login. Check that your access token is valid.');
    }
    throw e;
  }
  const quality: AudioQuality = me.product === 'premium' ? 'very_high' : 'high';
  return {
    token,
    userId: me.id || '',
    quality,
    api,
    audio: deps.audio(quality),
  };
}

/**
 * Pick credentials the way the CLI does: a cached credentials file wins,
 * then SPOTIFY_USER_TOKEN.
 */
export async function credentialsFromEnvironment(settings: {
  credentialsFile: string;
  userToken: string;
}): Promise<Credentials> {
  const hasFile = await fs
    .stat(settings.credentialsFile)
    .then((s) => s.isFile())
    .catch(() => false);
  if (hasFile) return { credentialsFile: settings.credentialsFile };
  if (settings.userToken) return { token: settings.userToken };
  throw new AuthError(
    `No credentials: write {"token": "..."} to ${settings.credentialsFile} or set SPOTIFY_USER_TOKEN`,
  );
}
