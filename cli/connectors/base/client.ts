/**
 * HTTP client for the GitHub REST API.
 * Non-2xx responses come back as ApiFailure values instead of throwing.
 */

import type { ApiResult, ClientConfig, PageLinks, QueryParams } from './types.js';

export const GITHUB_ACCEPT = 'application/vnd.github.v3+json';

export interface GitHubClient {
  get<T>(path: string, query?: QueryParams): Promise<ApiResult<T>>;
}

/** Parse an RFC 8288 `Link` header, e.g. `<https://…?page=2>; rel="next"`. */
export function parseLinkHeader(header: string | null): PageLinks {
  const links: PageLinks = {};
  if (!header) return links;

  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/.exec(part.trim());
    if (!match) continue;
    for (const rel of match[2].split(/\s+/)) {
      links[rel] = match[1];
    }
  }
  return links;
}

export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const base = path.startsWith('http') ? path : `${baseUrl.replace(/\/+$/, '')}${path}`;
  if (!query || Object.keys(query).length === 0) return base;

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    params.set(key, String(value));
  }
  return `${base}${base.includes('?') ? '&' : '?'}${params.toString()}`;
}

export function createClient(config: ClientConfig): GitHubClient {
  const { baseUrl, token, extraHeaders = {} } = config;

  async function get<T>(path: string, query?: QueryParams): Promise<ApiResult<T>> {
    const url = buildUrl(baseUrl, path, query);

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `token ${token}`,
          Accept: GITHUB_ACCEPT,
          ...extraHeaders,
        },
      });
    } catch (err) {
      return { ok: false, status: 0, body: err instanceof Error ? err.message : String(err) };
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      return { ok: false, status: res.status, body };
    }

    let data: T;
    try {
      // Body is trusted as T; responses are not schema-checked.
      data = (await res.json()) as T;
    } catch (err) {
      return { ok: false, status: res.status, body: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
    }
    return { ok: true, status: res.status, data, links: parseLinkHeader(res.headers.get('Link')) };
  }

  return { get };
}
