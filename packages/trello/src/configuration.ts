import { z } from 'zod';
import { ConfigurationError } from '@trellis/errors';

/**
 * @fileoverview Credentials and callback settings for a client.
 * @packageDocumentation
 */

const credential = z.string().min(1, 'must not be empty').optional();

export const configurationSchema = z
  .object({
    /** OAuth consumer key (same value as the developer public key) */
    consumerKey: credential,
    consumerSecret: credential,
    /** OAuth access token */
    oauthToken: credential,
    oauthTokenSecret: credential,
    /** Application key used for basic (key + token) auth */
    developerPublicKey: credential,
    developerPublicKeySecret: credential,
    /** Member token paired with the developer public key */
    memberToken: credential,
    /** OAuth callback URL */
    callback: z.string().url().optional(),
    /** Where Trello sends the user after authorizing */
    returnUrl: z.string().url().optional(),
  })
  .strict();

export type ConfigurationOptions = z.input<typeof configurationSchema>;

type Settings = z.output<typeof configurationSchema>;

/** Environment variable for each configuration field. */
const ENV_VARIABLES: Record<keyof Settings, string> = {
  consumerKey: 'TRELLO_CONSUMER_KEY',
  consumerSecret: 'TRELLO_CONSUMER_SECRET',
  oauthToken: 'TRELLO_OAUTH_TOKEN',
  oauthTokenSecret: 'TRELLO_OAUTH_TOKEN_SECRET',
  developerPublicKey: 'TRELLO_DEVELOPER_PUBLIC_KEY',
  developerPublicKeySecret: 'TRELLO_DEVELOPER_PUBLIC_KEY_SECRET',
  memberToken: 'TRELLO_MEMBER_TOKEN',
  callback: 'TRELLO_CALLBACK_URL',
  returnUrl: 'TRELLO_RETURN_URL',
};

/**
 * Immutable client configuration. Each `Client` owns one; there is no
 * process-wide instance.
 *
 * @example
 * ```typescript
 * const configuration = new Configuration({
 *   consumerKey: process.env.TRELLO_CONSUMER_KEY,
 *   consumerSecret: process.env.TRELLO_CONSUMER_SECRET,
 *   oauthToken: process.env.TRELLO_OAUTH_TOKEN,
 *   oauthTokenSecret: process.env.TRELLO_OAUTH_TOKEN_SECRET,
 * });
 * ```
 */
export class Configuration {
  readonly consumerKey?: string;
  readonly consumerSecret?: string;
  readonly oauthToken?: string;
  readonly oauthTokenSecret?: string;
  readonly developerPublicKey?: string;
  readonly developerPublicKeySecret?: string;
  readonly memberToken?: string;
  readonly callback?: string;
  readonly returnUrl?: string;

  /**
   * @throws ConfigurationError when a field is empty, malformed or unknown
   */
  constructor(options: ConfigurationOptions = {}) {
    const result = configurationSchema.safeParse(options);
    if (!result.success) {
      const problems = result.error.issues.map(
        (issue) => `${issue.path.join('.') || 'configuration'}: ${issue.message}`,
      );
      throw new ConfigurationError(`Invalid Trello configuration (${problems.join('; ')})`, {
        problems,
      });
    }

    const settings = result.data;
    this.consumerKey = settings.consumerKey;
    this.consumerSecret = settings.consumerSecret;
    this.oauthToken = settings.oauthToken;
    this.oauthTokenSecret = settings.oauthTokenSecret;
    this.developerPublicKey = settings.developerPublicKey;
    this.developerPublicKeySecret = settings.developerPublicKeySecret;
    this.memberToken = settings.memberToken;
    this.callback = settings.callback;
    this.returnUrl = settings.returnUrl;
    Object.freeze(this);
  }

  /**
   * Read the `TRELLO_*` environment variables. Empty values count as unset.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Configuration {
    const options: ConfigurationOptions = {};
    for (const field of Object.keys(ENV_VARIABLES)) {
      if (!isField(field)) continue;
      const value = env[ENV_VARIABLES[field]];
      if (value) {
        options[field] = value;
      }
    }
    return new Configuration(options);
  }

  /**
   * New configuration with the given fields replaced.
   */
  with(options: ConfigurationOptions): Configuration {
    return new Configuration({ ...this.toOptions(), ...options });
  }

  /** Consumer key and secret are both present */
  get hasConsumer(): boolean {
    return this.consumerKey !== undefined && this.consumerSecret !== undefined;
  }

  /** An OAuth access token and its secret are both present */
  get hasAccessToken(): boolean {
    return this.oauthToken !== undefined && this.oauthTokenSecret !== undefined;
  }

  /** Nothing that could authorize a request is present */
  get isEmpty(): boolean {
    return (
      this.consumerKey === undefined &&
      this.oauthToken === undefined &&
      this.developerPublicKey === undefined
    );
  }

  toOptions(): ConfigurationOptions {
    return {
      consumerKey: this.consumerKey,
      consumerSecret: this.consumerSecret,
      oauthToken: this.oauthToken,
      oauthTokenSecret: this.oauthTokenSecret,
      developerPublicKey: this.developerPublicKey,
      developerPublicKeySecret: this.developerPublicKeySecret,
      memberToken: this.memberToken,
      callback: this.callback,
      returnUrl: this.returnUrl,
    };
  }
}

function isField(name: string): name is keyof Settings {
  return Object.hasOwn(ENV_VARIABLES, name);
}
