import { CancelledError, ResolutionError, httpErrorKind } from './errors';

export const API_BASE = 'https://api.spotify.com/v1';

export type FetchFn = typeof fetch;

export type CatalogItemType = 'track' | 'album' | 'playlist' | 'episode';

const ITEM_TYPES: readonly CatalogItemType[] = ['track', 'album', 'playlist', 'episode'];

function isItemType(v: string): v is CatalogItemType {
  return ITEM_TYPES.some((t) => t === v);
}

const ID_RE = /^[0-9a-zA-Z]{22}$/;

/**
 * Parse an open.spotify.com link or a `spotify:<type>:<id>` URI.
 * Query strings such as `?si=...` are ignored.
 */
export function parseSpotifyUrl(url: string): { type: CatalogItemType; id: string } {
  const raw = url.trim();
  const uri = /^spotify:([a-z]+):([^:?]+)$/.exec(raw);
  let type: string;
  let id: string;
  if (uri) {
    type = uri[1];
    id = uri[2];
  } else {
    let u: URL;
    try {
      u = new URL(/^https?:\/\//i.test(raw) ? raw : `https://${raw}`);
    } catch {
      throw new ResolutionError('NotFound', `URL(${url}) does not match any pattern`);
    }
    if (!/^(?:www\.)?open\.spotify\.com$/.test(u.hostname)) {
      throw new ResolutionError('NotFound', 'Provide an open.spotify.com link or spotify: URI');
    }
    // localised links look like /intl-de/track/<id>
    const parts = u.pathname.split('/').filter((p) => p && !p.startsWith('intl-'));
    if (parts.length < 2) throw new ResolutionError('NotFound', `Unrecognised URL: ${url}`);
    type = parts[0];
    id = parts[1];
  }
  if (!isItemType(type)) throw new ResolutionError('NotFound', `Unsupported link type: ${type}`);
  if (!ID_RE.test(id)) throw new ResolutionError('NotFound', `Malformed ${type} id: ${id}`);
  return { type, id };
}

/**
 * Strip characters that are not allowed (or are awkward) in file names.
 * `|` becomes `-` so "A | B" stays readable.
 */
export function sanitizeName(s: string | null | undefined): string {
  if (!s) return 'Unknown';
  const cleaned = s
    .replace(/\p{Cc}/gu, '')
    .replace(/[\\/:*?'<>"]/g, '')
    .replace(/\|/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || 'Unknown';
}

export type Page<T> = {
  items: T[];
  next?: string | null;
};

/**
 * Thin Web API client bound to one bearer token. Every failure is a
 * ResolutionError whose kind follows the HTTP status.
 */
export class CatalogClient {
  constructor(
    private readonly token: string,
    private readonly fetchFn: FetchFn = fetch,
    private readonly base = API_BASE,
  ) {}

  private url(pathOrUrl: string): string {
    return pathOrUrl.startsWith('http') ? pathOrUrl : `${this.base}${pathOrUrl}`;
  }

  async getJson<T>(pathOrUrl: string, opts: { signal?: AbortSignal } = {}): Promise<T> {
    const { signal } = opts;
    if (signal?.aborted) throw new CancelledError();
    let res: Response;
    try {
      res = await this.fetchFn(this.url(pathOrUrl), {
        headers: { Authorization: `Bearer ${this.token}` },
        signal,
      });
    } catch (e) {
      if (signal?.aborted) throw new CancelledError();
      const detail = e instanceof Error ? e.message : String(e);
      throw new ResolutionError('Transient', `network error: ${detail}`);
    }
    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new ResolutionError(httpErrorKind(res.status), `API error ${res.status}: ${txt}`);
    }
    return (await res.json()) as T;
  }

  /**
   * Walk an offset-paginated collection, yielding items page by page.
   * Stops on a short page or an explicit `next: null`.
   */
  async *items<T>(path: string, limit = 50, signal?: AbortSignal): AsyncGenerator<T> {
    const sep = path.includes('?') ? '&' : '?';
    for (let offset = 0; ; offset += limit) {
      const page = await this.getJson<Page<T>>(`${path}${sep}limit=${limit}&offset=${offset}`, {
        signal,
      });
      const items = page.items || [];
      for (const it of items) yield it;
      if (items.length < limit || page.next === null) return;
    }
  }
}
