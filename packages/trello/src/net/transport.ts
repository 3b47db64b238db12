/**
 * @fileoverview Transport contract and the registry that picks an implementation.
 * @packageDocumentation
 */

import { ConfigurationError } from '@trellis/errors';
import type { ILogger } from '@trellis/logger';
import type { TrelloRequest, TrelloResponse } from './request.js';

/** Default per-request timeout. */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Sends one request and returns the raw response. Implementations never
 * throw on an HTTP status; network failures surface as `TransportError`.
 */
export interface Transport {
  readonly name: string;
  send(request: TrelloRequest): Promise<TrelloResponse>;
}

export interface TransportOptions {
  timeoutMs?: number;
}

/**
 * A transport that may or may not be usable in this process.
 * `load` rejects when its underlying dependency is unavailable.
 */
export interface TransportCandidate {
  readonly name: string;
  load(options: TransportOptions): Promise<Transport>;
}

/** Order in which the built-in transports are tried. */
export const HTTP_CLIENT_PRIORITY = ['axios', 'fetch'] as const;

export type HttpClientName = (typeof HTTP_CLIENT_PRIORITY)[number];

/**
 * Ordered set of transport candidates.
 *
 * @example
 * ```typescript
 * const registry = createDefaultRegistry();
 * const transport = await registry.select(); // axios when installed, else fetch
 * ```
 */
export class TransportRegistry {
  private readonly candidates: readonly TransportCandidate[];

  constructor(candidates: readonly TransportCandidate[], private readonly logger?: ILogger) {
    this.candidates = [...candidates];
  }

  /** Candidate names in priority order */
  get names(): string[] {
    return this.candidates.map((candidate) => candidate.name);
  }

  /**
   * Load a transport by name.
   * @throws ConfigurationError for unknown names or a dependency that fails to load
   */
  async resolve(name: string, options: TransportOptions = {}): Promise<Transport> {
    const candidate = this.candidates.find((entry) => entry.name === name);
    if (!candidate) {
      throw new ConfigurationError(
        `Unsupported HTTP client: ${name}. Supported clients are ${this.names.join(', ')}`,
        { httpClient: name },
      );
    }

    try {
      return await candidate.load(options);
    } catch (error) {
      throw new ConfigurationError(`Trello tried to use ${name}, but it could not be loaded`, {
        httpClient: name,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Load the first candidate, in priority order, whose dependency is available.
   * @throws ConfigurationError when none is
   */
  async select(options: TransportOptions = {}): Promise<Transport> {
    const failures: Record<string, string> = {};

    for (const candidate of this.candidates) {
      try {
        const transport = await candidate.load(options);
        this.logger?.debug('HTTP transport selected', { transport: candidate.name });
        return transport;
      } catch (error) {
        failures[candidate.name] = error instanceof Error ? error.message : String(error);
        this.logger?.debug('HTTP transport unavailable, trying next', {
          transport: candidate.name,
          reason: failures[candidate.name],
        });
      }
    }

    throw new ConfigurationError(
      `Trello requires one of these HTTP clients: ${this.names.join(', ') || '(none registered)'}`,
      { failures },
    );
  }
}

/**
 * Registry of the built-in transports, loaded lazily so a missing optional
 * dependency only removes its candidate.
 */
export function createDefaultRegistry(logger?: ILogger): TransportRegistry {
  return new TransportRegistry(
    [
      {
        name: 'axios',
        async load(options) {
          const { AxiosTransport } = await import('./axios-transport.js');
          return new AxiosTransport(options);
        },
      },
      {
        name: 'fetch',
        async load(options) {
          if (typeof globalThis.fetch !== 'function') {
            throw new Error('global fetch is not available in this runtime');
          }
          const { FetchTransport } = await import('./fetch-transport.js');
          return new FetchTransport(options);
        },
      },
    ],
    logger,
  );
}
