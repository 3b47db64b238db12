/**
 * @fileoverview Transport built on the runtime's global `fetch`.
 * @packageDocumentation
 */

import { TransportError } from '@trellis/errors';
import { TrelloResponse, type TrelloRequest } from './request.js';
import { DEFAULT_TIMEOUT_MS, type Transport, type TransportOptions } from './transport.js';

export interface FetchTransportOptions extends TransportOptions {
  /** Defaults to `globalThis.fetch` */
  fetch?: typeof globalThis.fetch;
}

const NETWORK_CODES = new Set(['ENOTFOUND', 'ECONNREFUSED', 'ECONNRESET', 'EAI_AGAIN']);

export class FetchTransport implements Transport {
  readonly name = 'fetch';
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(request: TrelloRequest): Promise<TrelloResponse> {
    try {
      const response = await this.fetchFn(request.uri, {
        method: request.verb,
        headers: { ...request.headers },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return new TrelloResponse(response.status, headers, await response.text());
    } catch (error) {
      throw toTransportError(error);
    }
  }
}

function causeCode(error: Error): string | undefined {
  const cause = error.cause;
  if (cause !== null && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Classify a rejected `fetch`. Node reports network failures as a
 * `TypeError` whose cause carries the system error code.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  if (!(error instanceof Error)) {
    return new TransportError('Unknown transport failure', 'unknown', error);
  }

  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return new TransportError(error.message, 'timeout', error);
  }

  const code = causeCode(error);
  if ((code !== undefined && NETWORK_CODES.has(code)) || error instanceof TypeError) {
    return new TransportError(code ? `${error.message} (${code})` : error.message, 'network', error);
  }

  return new TransportError(error.message, 'unknown', error);
}
