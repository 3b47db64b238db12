import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Board } from './board.js';
import { Card } from './card.js';
import { List } from './list.js';
import { Member } from './member.js';

export const actionSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    date: z.string(),
    idMemberCreator: z.string(),
    data: z.record(z.unknown()),
  })
  .partial();

export type ActionAttributes = z.infer<typeof actionSchema>;

/**
 * Something that happened on Trello, e.g. `createCard` or `commentCard`.
 * Comments are actions of type `commentCard` whose text is `data.text`.
 */
export class Action extends BasicData<ActionAttributes> {
  static readonly definition = defineEntity({
    name: 'Action',
    path: 'actions',
    schema: actionSchema,
  });

  static readonly associations = {
    board: hasOne('board', () => Board, { optional: true }),
    card: hasOne('card', () => Card, { optional: true }),
    list: hasOne('list', () => List, { optional: true }),
    memberCreator: hasOne('memberCreator', () => Member, {
      via: 'idMemberCreator',
      optional: true,
    }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Action.definition, client, attributes);
  }

  get type(): string | undefined {
    return this.get('type');
  }

  get date(): Date | undefined {
    const value = this.get('date');
    return value ? new Date(value) : undefined;
  }

  get data(): Record<string, unknown> {
    return this.get('data') ?? {};
  }

  /** Comment text, for `commentCard` actions */
  get text(): string | undefined {
    const text = this.read('data.text');
    return typeof text === 'string' ? text : undefined;
  }

  get board(): AssociationProxy<Board | undefined> {
    return Action.associations.board.of(this);
  }

  get card(): AssociationProxy<Card | undefined> {
    return Action.associations.card.of(this);
  }

  get list(): AssociationProxy<List | undefined> {
    return Action.associations.list.of(this);
  }

  get memberCreator(): AssociationProxy<Member | undefined> {
    return Action.associations.memberCreator.of(this);
  }

  /**
   * Change the text of a comment.
   */
  async editText(text: string): Promise<this> {
    const id = this.requireId('edit');
    const json = await this.client.put(`/actions/${id}`, { text });
    return this.load(this.expectObject(json));
  }
}
