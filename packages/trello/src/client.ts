import { ConfigurationError, TransportError, ValidationError, fromStatusCode } from '@trellis/errors';
import { createLogger, type ILogger } from '@trellis/logger';
import { authPolicyFor, type AuthPolicy } from './authorization.js';
import { Configuration, type ConfigurationOptions } from './configuration.js';
import type { Entity, EntityClass } from './entity.js';
import {
  buildRequest,
  isJsonObject,
  type HttpVerb,
  type JsonValue,
  type RequestParams,
  type TrelloResponse,
} from './net/request.js';
import {
  createDefaultRegistry,
  type HttpClientName,
  type Transport,
  type TransportRegistry,
} from './net/transport.js';

/**
 * @fileoverview Trello REST API client.
 * @packageDocumentation
 */

/** Base URL for the Trello API */
export const API_BASE = 'https://api.trello.com/1';

const WRITE_VERBS: ReadonlySet<HttpVerb> = new Set(['POST', 'PUT', 'DELETE']);

export interface ClientOptions {
  configuration?: Configuration | ConfigurationOptions;
  /** Transport to use. Takes precedence over `httpClient`. */
  transport?: Transport;
  /** Name of a registered transport. Without one the registry is probed in priority order. */
  httpClient?: HttpClientName;
  /** Defaults to the built-in axios and fetch transports */
  registry?: TransportRegistry;
  /** Defaults to {@link API_BASE} */
  baseUrl?: string;
  /** Per-request timeout for registry-built transports */
  timeoutMs?: number;
  logger?: ILogger;
}

/**
 * Trello API client. Owns one configuration, the auth policy derived from it
 * and the transport requests go through.
 *
 * @example
 * ```typescript
 * const client = new Client({
 *   configuration: Configuration.fromEnv(),
 *   transport: new AxiosTransport({ timeoutMs: 10000 }),
 * });
 *
 * const board = await client.find(Board, 'b1');
 * const cards = await board.cards;
 * ```
 */
export class Client {
  readonly baseUrl: string;
  private currentConfiguration: Configuration;
  private policy: AuthPolicy;
  private transportPromise?: Promise<Transport>;
  private readonly registry: TransportRegistry;
  private readonly httpClient?: HttpClientName;
  private readonly timeoutMs?: number;
  private readonly logger: ILogger;

  constructor(options: ClientOptions = {}) {
    this.logger = options.logger ?? createLogger({ component: 'trello-client' });
    this.baseUrl = options.baseUrl ?? API_BASE;
    this.currentConfiguration = toConfiguration(options.configuration);
    this.policy = authPolicyFor(this.currentConfiguration);
    this.registry = options.registry ?? createDefaultRegistry(this.logger);
    this.httpClient = options.httpClient;
    this.timeoutMs = options.timeoutMs;

    if (options.transport) {
      this.transportPromise = Promise.resolve(options.transport);
    }
  }

  get configuration(): Configuration {
    return this.currentConfiguration;
  }

  get authPolicy(): AuthPolicy {
    return this.policy;
  }

  /**
   * Replace the given configuration fields and re-derive the auth policy.
   * The resolved transport is kept. Not meant to be called while requests
   * are in flight.
   */
  configure(options: ConfigurationOptions): this {
    this.currentConfiguration = this.currentConfiguration.with(options);
    this.policy = authPolicyFor(this.currentConfiguration);
    return this;
  }

  /**
   * The transport requests go through, resolved on first use. A failed
   * resolution is not memoized.
   *
   * @throws ConfigurationError when no transport can be loaded
   */
  transport(): Promise<Transport> {
    if (!this.transportPromise) {
      const options = { timeoutMs: this.timeoutMs };
      const pending = this.httpClient
        ? this.registry.resolve(this.httpClient, options)
        : this.registry.select(options);

      this.transportPromise = pending.catch((error: unknown) => {
        this.transportPromise = undefined;
        throw error;
      });
    }
    return this.transportPromise;
  }

  // =========================================================================
  // HTTP Methods
  // =========================================================================

  get(path: string, params?: RequestParams): Promise<JsonValue> {
    return this.request('GET', path, params);
  }

  post(path: string, body?: Record<string, unknown>, params?: RequestParams): Promise<JsonValue> {
    return this.request('POST', path, params, body);
  }

  put(path: string, body?: Record<string, unknown>, params?: RequestParams): Promise<JsonValue> {
    return this.request('PUT', path, params, body);
  }

  delete(path: string, params?: RequestParams): Promise<JsonValue> {
    return this.request('DELETE', path, params);
  }

  /**
   * Build, authorize and send one request, then decode its body.
   *
   * @throws ConfigurationError before sending when the credentials cannot authorize the verb
   * @throws InvalidAccessTokenError on 401
   * @throws NotFoundError on 404
   * @throws RateLimitError on 429
   * @throws ApiError on any other non-2xx status
   * @throws TransportError when no response arrives
   */
  async request(
    verb: HttpVerb,
    path: string,
    params?: RequestParams,
    body?: Record<string, unknown>,
  ): Promise<JsonValue> {
    const resource = `${verb} ${path.startsWith('/') ? path : `/${path}`}`;

    if (WRITE_VERBS.has(verb) && !this.policy.canWrite) {
      throw new ConfigurationError(
        `Trello requires an OAuth access token or a member token to ${resource}`,
        { auth: this.policy.kind },
      );
    }

    const request = this.policy.authorize(buildRequest(verb, this.baseUrl, path, params, body));
    const transport = await this.transport();
    const started = performance.now();

    let response: TrelloResponse;
    try {
      response = await transport.send(request);
    } catch (error) {
      this.logger.warn('Trello request failed', {
        http: { method: verb, url: request.uri, transport: transport.name },
        durationMs: Math.round(performance.now() - started),
        error,
      });
      throw error instanceof TransportError
        ? error
        : new TransportError(error instanceof Error ? error.message : String(error), 'unknown', error);
    }

    const http = {
      method: verb,
      url: request.uri,
      statusCode: response.status,
      transport: transport.name,
    };
    const durationMs = Math.round(performance.now() - started);

    if (!response.isSuccess) {
      const error = fromStatusCode(response.status, resource, response.body, response.retryAfterMs);
      this.logger.warn('Trello request failed', { http, durationMs, error });
      throw error;
    }

    this.logger.debug('Trello request completed', { http, durationMs });
    return response.json();
  }

  // =========================================================================
  // Entities
  // =========================================================================

  /**
   * Fetch one entity by id.
   */
  async find<T extends Entity>(type: EntityClass<T>, id: string, params?: RequestParams): Promise<T> {
    const json = await this.get(`/${type.definition.path}/${encodeURIComponent(id)}`, params);
    return this.materialize(type, json);
  }

  /**
   * Fetch a collection, preserving the server's order.
   */
  async findMany<T extends Entity>(
    type: EntityClass<T>,
    path: string,
    params?: RequestParams,
  ): Promise<T[]> {
    return this.materializeMany(type, await this.get(path, params));
  }

  /**
   * Create an entity from attributes and save it.
   */
  async create<T extends Entity & { save(): Promise<unknown> }>(
    type: EntityClass<T>,
    attributes: Record<string, unknown>,
  ): Promise<T> {
    const entity = new type(this, attributes);
    await entity.save();
    return entity;
  }

  /**
   * Map a decoded JSON object to an entity.
   * @throws ValidationError when the payload is not an object
   */
  materialize<T extends Entity>(type: EntityClass<T>, json: JsonValue): T {
    if (!isJsonObject(json)) {
      throw new ValidationError(`Expected a ${type.definition.name} object from Trello`, {
        payload: [describe(json)],
      });
    }
    return new type(this).load(json);
  }

  /**
   * Map a decoded JSON array to entities, in order.
   * @throws ValidationError when the payload is not an array of objects
   */
  materializeMany<T extends Entity>(type: EntityClass<T>, json: JsonValue): T[] {
    if (!Array.isArray(json)) {
      throw new ValidationError(`Expected a list of ${type.definition.name} objects from Trello`, {
        payload: [describe(json)],
      });
    }
    return json.map((item) => this.materialize(type, item));
  }
}

function toConfiguration(value?: Configuration | ConfigurationOptions): Configuration {
  if (value instanceof Configuration) return value;
  return new Configuration(value);
}

function describe(json: JsonValue): string {
  if (json === null) return 'received null';
  return `received ${Array.isArray(json) ? 'array' : typeof json}`;
}
