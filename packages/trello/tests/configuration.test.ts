/**
 * @fileoverview Tests for client configuration
 */

import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@trellis/errors';
import { Configuration } from '../src/configuration.js';

describe('Configuration', () => {
  it('should start empty', () => {
    const configuration = new Configuration();

    expect(configuration.isEmpty).toBe(true);
    expect(configuration.hasConsumer).toBe(false);
    expect(configuration.hasAccessToken).toBe(false);
  });

  it('should keep the given credentials', () => {
    const configuration = new Configuration({
      consumerKey: 'test-consumer',
      consumerSecret: 'test-consumer-secret',
      oauthToken: 'test-token',
      oauthTokenSecret: 'test-token-secret',
    });

    expect(configuration.consumerKey).toBe('test-consumer');
    expect(configuration.hasConsumer).toBe(true);
    expect(configuration.hasAccessToken).toBe(true);
    expect(configuration.isEmpty).toBe(false);
  });

  it('should be immutable', () => {
    const configuration = new Configuration({ developerPublicKey: 'test-key' });
    expect(Object.isFrozen(configuration)).toBe(true);
  });

  it('should reject empty credentials', () => {
    expect(() => new Configuration({ consumerKey: '' })).toThrow(ConfigurationError);
    expect(() => new Configuration({ consumerKey: '' })).toThrow(
      'Invalid Trello configuration (consumerKey: must not be empty)',
    );
  });

  it('should reject malformed callback URLs', () => {
    expect(() => new Configuration({ callback: 'not a url' })).toThrow(/callback: Invalid url/);
  });

  it('should reject unknown fields', () => {
    const options: Record<string, string> = { consumerKy: 'test-consumer' };
    expect(() => new Configuration(options)).toThrow(/Unrecognized key/);
  });

  describe('with', () => {
    it('should return a new configuration with fields replaced', () => {
      const original = new Configuration({ developerPublicKey: 'test-key' });
      const updated = original.with({ memberToken: 'test-token' });

      expect(updated).not.toBe(original);
      expect(updated.developerPublicKey).toBe('test-key');
      expect(updated.memberToken).toBe('test-token');
      expect(original.memberToken).toBeUndefined();
    });
  });

  describe('fromEnv', () => {
    it('should read TRELLO_* variables and skip empty ones', () => {
      const configuration = Configuration.fromEnv({
        TRELLO_DEVELOPER_PUBLIC_KEY: 'test-key',
        TRELLO_MEMBER_TOKEN: 'test-token',
        TRELLO_CONSUMER_KEY: '',
        TRELLO_RETURN_URL: 'https://example.com/done',
        UNRELATED: 'ignored',
      });

      expect(configuration.toOptions()).toEqual({
        consumerKey: undefined,
        consumerSecret: undefined,
        oauthToken: undefined,
        oauthTokenSecret: undefined,
        developerPublicKey: 'test-key',
        developerPublicKeySecret: undefined,
        memberToken: 'test-token',
        callback: undefined,
        returnUrl: 'https://example.com/done',
      });
    });
  });
});
