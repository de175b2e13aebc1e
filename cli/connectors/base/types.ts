/**
 * Shared types for the GitHub connector base modules.
 */

/** Configuration for createClient(). */
export interface ClientConfig {
  baseUrl: string;
  /** Personal access token, sent as `Authorization: token <token>`. */
  token: string;
  /** Extra static headers merged into every request. */
  extraHeaders?: Record<string, string>;
}

/** Query parameters appended to a request URL. */
export type QueryParams = Record<string, string | number>;

/** Parsed `Link` header: rel name → absolute URL. */
export type PageLinks = Partial<Record<string, string>>;

export interface ApiSuccess<T> {
  ok: true;
  status: number;
  data: T;
  links: PageLinks;
}

export interface ApiFailure {
  ok: false;
  /** HTTP status, or 0 when the request never got a response. */
  status: number;
  body: string;
}

export type ApiResult<T> = ApiSuccess<T> | ApiFailure;

/** Why a paginated fetch stopped. */
export type StopReason =
  | 'page-cap'
  | 'item-cap'
  | 'empty-page'
  | 'no-next-link'
  | 'http-error';
