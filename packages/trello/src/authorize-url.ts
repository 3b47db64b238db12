import { ConfigurationError } from '@trellis/errors';
import type { Configuration } from './configuration.js';

const AUTHORIZE_URL = 'https://trello.com/1/authorize';
const PUBLIC_KEY_URL = 'https://trello.com/app-key';

export interface AuthorizeUrlOptions {
  /** Application key; falls back to the developer public key, then the consumer key */
  key?: string;
  /** Application name shown on the consent page */
  name?: string;
  scope?: string;
  /** e.g. `1hour`, `30days`, `never` */
  expiration?: string;
  responseType?: 'token' | 'fragment';
  /** `postMessage` or `fragment` */
  callbackMethod?: string;
  /** Defaults to the configured return URL */
  returnUrl?: string;
}

/**
 * Page where a developer looks up their public key.
 */
export function publicKeyUrl(): string {
  return PUBLIC_KEY_URL;
}

/**
 * URL of the consent page that grants a member token to an application.
 *
 * @throws ConfigurationError when no application key is available
 *
 * @example
 * ```typescript
 * authorizeUrl(new Configuration({ developerPublicKey: 'app-key' }), { scope: 'read' });
 * // https://trello.com/1/authorize?key=app-key&name=Trellis&scope=read&expiration=never&response_type=token
 * ```
 */
export function authorizeUrl(
  configuration: Configuration,
  options: AuthorizeUrlOptions = {},
): string {
  const key = options.key ?? configuration.developerPublicKey ?? configuration.consumerKey;
  if (key === undefined) {
    throw new ConfigurationError(
      'Please configure your Trello public key before building an authorize URL. ' +
        `Look it up at ${PUBLIC_KEY_URL}`,
    );
  }

  const url = new URL(AUTHORIZE_URL);
  url.searchParams.set('key', key);
  url.searchParams.set('name', options.name ?? 'Trellis');
  url.searchParams.set('scope', options.scope ?? 'read,write,account');
  url.searchParams.set('expiration', options.expiration ?? 'never');
  url.searchParams.set('response_type', options.responseType ?? 'token');

  if (options.callbackMethod) {
    url.searchParams.set('callback_method', options.callbackMethod);
  }
  const returnUrl = options.returnUrl ?? configuration.returnUrl;
  if (returnUrl) {
    url.searchParams.set('return_url', returnUrl);
  }

  return url.toString();
}
