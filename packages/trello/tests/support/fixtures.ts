import { Client } from '../../src/client.js';
import type { ConfigurationOptions } from '../../src/configuration.js';
import { FakeTransport } from './fake-transport.js';
import { RecordingLogger } from './recording-logger.js';

export const OAUTH_CREDENTIALS: ConfigurationOptions = {
  consumerKey: 'test-consumer',
  consumerSecret: 'test-consumer-secret',
  oauthToken: 'test-token',
  oauthTokenSecret: 'test-token-secret',
};

export const BASIC_CREDENTIALS: ConfigurationOptions = {
  developerPublicKey: 'test-key',
  memberToken: 'test-member-token',
};

export interface TestClient {
  client: Client;
  transport: FakeTransport;
  logger: RecordingLogger;
}

/**
 * Client wired to a fake transport and a recording logger.
 */
export function createTestClient(configuration: ConfigurationOptions = OAUTH_CREDENTIALS): TestClient {
  const transport = new FakeTransport();
  const logger = new RecordingLogger();
  const client = new Client({ configuration, transport, logger });
  return { client, transport, logger };
}
