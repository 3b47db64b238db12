import OAuth from 'oauth-1.0a';
import { createHmac } from 'crypto';
import { ConfigurationError } from '@trellis/errors';
import type { Configuration } from './configuration.js';
import { withHeaders, withParams, type TrelloRequest } from './net/request.js';

/**
 * @fileoverview Strategies that turn a built request into an authorized one.
 * @packageDocumentation
 */

/**
 * Signs or decorates outgoing requests.
 */
export interface AuthPolicy {
  readonly kind: 'oauth' | 'basic' | 'none';
  /** Whether the credentials can authorize POST, PUT and DELETE */
  readonly canWrite: boolean;
  /**
   * @throws ConfigurationError when the policy cannot authorize anything
   */
  authorize(request: TrelloRequest): TrelloRequest;
}

/**
 * Application key plus member token, sent as `key` and `token` query parameters.
 * Without a token only public reads succeed.
 */
export class BasicAuthPolicy implements AuthPolicy {
  readonly kind = 'basic';

  constructor(
    private readonly developerPublicKey: string,
    private readonly memberToken?: string,
  ) {}

  get canWrite(): boolean {
    return this.memberToken !== undefined;
  }

  authorize(request: TrelloRequest): TrelloRequest {
    return withParams(request, { key: this.developerPublicKey, token: this.memberToken });
  }
}

export interface OAuthCredentials {
  consumerKey: string;
  consumerSecret: string;
  token?: string;
  tokenSecret?: string;
}

/**
 * OAuth 1.0a, HMAC-SHA1. The signature covers the method, the URL and its
 * query parameters; JSON bodies are not part of the base string.
 */
export class OAuthPolicy implements AuthPolicy {
  readonly kind = 'oauth';
  private readonly oauth: OAuth;
  private readonly token?: OAuth.Token;

  constructor(credentials: OAuthCredentials) {
    this.oauth = new OAuth({
      consumer: {
        key: credentials.consumerKey,
        secret: credentials.consumerSecret,
      },
      signature_method: 'HMAC-SHA1',
      hash_function(baseString: string, key: string) {
        return createHmac('sha1', key).update(baseString).digest('base64');
      },
    });

    if (credentials.token !== undefined && credentials.tokenSecret !== undefined) {
      this.token = { key: credentials.token, secret: credentials.tokenSecret };
    }
  }

  get canWrite(): boolean {
    return this.token !== undefined;
  }

  authorize(request: TrelloRequest): TrelloRequest {
    const data = this.oauth.authorize({ url: request.uri, method: request.verb }, this.token);
    return withHeaders(request, { ...this.oauth.toHeader(data) });
  }
}

/**
 * Stand-in when no credentials are configured: fails before anything is sent.
 */
export class NullAuthPolicy implements AuthPolicy {
  readonly kind = 'none';
  readonly canWrite = false;

  authorize(_request: TrelloRequest): TrelloRequest {
    throw new ConfigurationError(
      'Trello has not been configured to make authorized requests. ' +
        'Provide an OAuth consumer key and secret, or a developer public key.',
    );
  }
}

/**
 * Pick the policy the configuration supports: OAuth when an access token or
 * the consumer pair is present, basic when a developer public key is,
 * otherwise none.
 *
 * @throws ConfigurationError when an OAuth token is given without the consumer pair
 */
export function authPolicyFor(configuration: Configuration): AuthPolicy {
  const { consumerKey, consumerSecret, oauthToken, oauthTokenSecret } = configuration;

  if (oauthToken !== undefined || configuration.hasConsumer) {
    if (consumerKey === undefined || consumerSecret === undefined) {
      throw new ConfigurationError(
        'An OAuth token was configured without a consumer key and consumer secret',
      );
    }
    return new OAuthPolicy({
      consumerKey,
      consumerSecret,
      token: oauthToken,
      tokenSecret: oauthTokenSecret,
    });
  }

  if (configuration.developerPublicKey !== undefined) {
    return new BasicAuthPolicy(configuration.developerPublicKey, configuration.memberToken);
  }

  return new NullAuthPolicy();
}
