/**
 * @fileoverview axios-backed transport.
 * @packageDocumentation
 */

import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { TransportError } from '@trellis/errors';
import { TrelloResponse, type TrelloRequest } from './request.js';
import { DEFAULT_TIMEOUT_MS, type Transport, type TransportOptions } from './transport.js';

export interface AxiosTransportOptions extends TransportOptions {
  /** Replaces axios' network adapter, e.g. to serve responses in-process */
  adapter?: AxiosAdapter;
}

/**
 * Transport built on axios. Every status is returned as a response; only
 * failures without a response are raised.
 */
export class AxiosTransport implements Transport {
  readonly name = 'axios';
  private readonly http: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    this.http = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      responseType: 'text',
      // Keep the body as text; decoding belongs to TrelloResponse.
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async send(request: TrelloRequest): Promise<TrelloResponse> {
    try {
      const response = await this.http.request<unknown>({
        method: request.verb,
        url: request.uri,
        headers: { ...request.headers },
        data: request.body === undefined ? undefined : JSON.stringify(request.body),
      });

      return new TrelloResponse(
        response.status,
        normalizeHeaders(response.headers),
        bodyText(response.data),
      );
    } catch (error) {
      throw toTransportError(error);
    }
  }
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  return typeof data === 'string' ? data : JSON.stringify(data);
}

function normalizeHeaders(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return result;
}

/**
 * Classify an axios failure that carries no response.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;

  if (isAxiosError(error)) {
    switch (error.code) {
      case 'ECONNABORTED':
      case 'ETIMEDOUT':
        return new TransportError(error.message, 'timeout', error);
      case 'ENOTFOUND':
      case 'ECONNREFUSED':
      case 'ECONNRESET':
      case 'EAI_AGAIN':
      case 'ERR_NETWORK':
        return new TransportError(error.message, 'network', error);
      default:
        return new TransportError(error.message, 'unknown', error);
    }
  }

  const message = error instanceof Error ? error.message : 'Unknown transport failure';
  return new TransportError(message, 'unknown', error);
}
