/**
 * @fileoverview End-to-end flows through the public API against a fake transport
 */

import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@trellis/errors';
import { Board, Card, Client, Configuration } from '../src/index.js';
import { FakeTransport } from './support/fake-transport.js';
import { RecordingLogger } from './support/recording-logger.js';

describe('scenarios', () => {
  it('should browse a board and its cards over OAuth with one request each', async () => {
    const transport = new FakeTransport().replyJson(
      { id: 'b1', name: 'Demo' },
      [{ id: 'c1', name: 'Task' }],
    );
    const client = new Client({
      configuration: new Configuration({
        consumerKey: 'test-consumer',
        consumerSecret: 'test-consumer-secret',
        oauthToken: 'test-token',
        oauthTokenSecret: 'test-token-secret',
      }),
      transport,
      logger: new RecordingLogger(),
    });

    const board = await client.find(Board, 'b1');
    const cards = await board.cards;
    const again = await board.cards;

    expect(board.name).toBe('Demo');
    expect(cards.map((card) => card.id)).toEqual(['c1']);
    expect(cards[0]?.name).toBe('Task');
    expect(again).toBe(cards);
    expect(transport.calls).toEqual([
      'GET /1/boards/b1',
      'GET /1/boards/b1/cards?filter=open',
    ]);
    expect(transport.requests[0]?.headers['Authorization']).toMatch(/^OAuth /);
  });

  it('should rename a card and save only the name', async () => {
    const transport = new FakeTransport().replyJson(
      { id: 'c1', name: 'Task', idList: 'l1' },
      { id: 'c1', name: 'Renamed', idList: 'l1' },
    );
    const client = new Client({
      configuration: { developerPublicKey: 'test-key', memberToken: 'test-token' },
      transport,
      logger: new RecordingLogger(),
    });

    const card = await client.find(Card, 'c1');
    card.name = 'Renamed';
    await card.save();

    expect(transport.requests[1]?.verb).toBe('PUT');
    expect(transport.requests[1]?.body).toEqual({ name: 'Renamed' });
    expect(card.isDirty).toBe(false);
  });

  it('should refuse to write with read-only credentials before any request', async () => {
    const transport = new FakeTransport();
    const client = new Client({
      configuration: { developerPublicKey: 'test-key' },
      transport,
      logger: new RecordingLogger(),
    });

    await expect(client.create(Card, { name: 'Task', idList: 'l1' })).rejects.toThrow(
      ConfigurationError,
    );
    expect(transport.requests).toHaveLength(0);
  });
});
