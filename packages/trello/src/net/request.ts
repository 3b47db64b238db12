/**
 * @fileoverview Request and response envelopes shared by the client and transports.
 * @packageDocumentation
 */

import { ApiError } from '@trellis/errors';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Query parameters. `undefined` and `null` values are dropped.
 */
export type RequestParams = Record<string, string | number | boolean | undefined | null>;

/**
 * One HTTP call, fully built. Instances are frozen; policies derive new ones.
 */
export interface TrelloRequest {
  readonly verb: HttpVerb;
  /** Absolute URL including the query string */
  readonly uri: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Serialized as JSON when present */
  readonly body?: Readonly<Record<string, unknown>>;
}

const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json',
  'Content-Type': 'application/json',
};

/**
 * Build a request against the API base.
 *
 * @example
 * ```typescript
 * buildRequest('GET', 'https://api.trello.com/1', 'boards/b1', { fields: 'name' });
 * // uri: 'https://api.trello.com/1/boards/b1?fields=name'
 * ```
 */
export function buildRequest(
  verb: HttpVerb,
  baseUrl: string,
  path: string,
  params?: RequestParams,
  body?: Record<string, unknown>,
): TrelloRequest {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${normalizedPath}`);
  appendParams(url, params);

  return Object.freeze({
    verb,
    uri: url.toString(),
    headers: Object.freeze({ ...DEFAULT_HEADERS }),
    ...(body === undefined ? {} : { body: Object.freeze({ ...body }) }),
  });
}

/**
 * Copy of a request with extra query parameters.
 */
export function withParams(request: TrelloRequest, params: RequestParams): TrelloRequest {
  const url = new URL(request.uri);
  appendParams(url, params);
  return Object.freeze({ ...request, uri: url.toString() });
}

/**
 * Copy of a request with extra headers.
 */
export function withHeaders(request: TrelloRequest, headers: Record<string, string>): TrelloRequest {
  return Object.freeze({ ...request, headers: Object.freeze({ ...request.headers, ...headers }) });
}

function appendParams(url: URL, params?: RequestParams): void {
  if (!params) return;
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      url.searchParams.set(key, String(value));
    }
  }
}

/**
 * Raw response as produced by a transport. Body decoding is lazy.
 */
export class TrelloResponse {
  private decoded?: { value: JsonValue };

  constructor(
    readonly status: number,
    readonly headers: Readonly<Record<string, string>>,
    readonly body: string,
  ) {}

  /** True for 2xx */
  get isSuccess(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  /**
   * Header value by case-insensitive name.
   */
  header(name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(this.headers)) {
      if (key.toLowerCase() === wanted) return value;
    }
    return undefined;
  }

  /**
   * Decoded body. An empty body decodes to `null`.
   * @throws ApiError when the body is not JSON
   */
  json(): JsonValue {
    if (!this.decoded) {
      this.decoded = { value: this.parse() };
    }
    return this.decoded.value;
  }

  /**
   * Delay suggested by `Retry-After`, in seconds or as an HTTP date.
   */
  get retryAfterMs(): number | undefined {
    const value = this.header('retry-after');
    if (!value) return undefined;

    const seconds = parseInt(value, 10);
    if (!isNaN(seconds)) {
      return seconds * 1000;
    }

    const date = new Date(value);
    if (!isNaN(date.getTime())) {
      return Math.max(0, date.getTime() - Date.now());
    }

    return undefined;
  }

  private parse(): JsonValue {
    if (this.body.trim() === '') return null;
    try {
      const value: JsonValue = JSON.parse(this.body);
      return value;
    } catch (error) {
      throw new ApiError(this.status, 'Malformed JSON in Trello response', this.body, {
        cause: error,
      });
    }
  }
}

/**
 * Narrow a decoded value to a JSON object.
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
