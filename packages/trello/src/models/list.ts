import { ValidationError } from '@trellis/errors';
import { z } from 'zod';
import { hasMany, hasOne } from '../associations/association.js';
import type { AssociationProxy, MultiAssociation } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Action } from './action.js';
import { Board } from './board.js';
import { Card } from './card.js';

export const listSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    closed: z.boolean(),
    idBoard: z.string(),
    pos: z.union([z.number(), z.enum(['top', 'bottom'])]),
    subscribed: z.boolean().nullable(),
  })
  .partial();

export type ListAttributes = z.infer<typeof listSchema>;

/**
 * A list (column) on a board.
 */
export class List extends BasicData<ListAttributes> {
  static readonly definition = defineEntity({ name: 'List', path: 'lists', schema: listSchema });

  static readonly associations = {
    board: hasOne('board', () => Board, { via: 'idBoard' }),
    cards: hasMany('cards', () => Card, { params: { filter: 'open' } }),
    actions: hasMany('actions', () => Action),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(List.definition, client, attributes);
  }

  get name(): string | undefined {
    return this.get('name');
  }

  set name(value: string | undefined) {
    this.set('name', value);
  }

  get isClosed(): boolean {
    return this.get('closed') === true;
  }

  get boardId(): string | undefined {
    return this.get('idBoard');
  }

  set boardId(value: string | undefined) {
    this.set('idBoard', value);
  }

  get position(): number | 'top' | 'bottom' | undefined {
    return this.get('pos');
  }

  set position(value: number | 'top' | 'bottom' | undefined) {
    this.set('pos', value);
  }

  get board(): AssociationProxy<Board> {
    return List.associations.board.of(this);
  }

  get cards(): MultiAssociation<Card> {
    return List.associations.cards.of(this);
  }

  get actions(): MultiAssociation<Action> {
    return List.associations.actions.of(this);
  }

  /** Archive the list */
  close(): Promise<this> {
    return this.update({ closed: true });
  }

  /**
   * Archive every card on the list.
   */
  async archiveAllCards(): Promise<void> {
    const id = this.requireId('archive the cards of');
    await this.client.post(`/lists/${id}/archiveAllCards`);
    this.cards.reset();
  }

  /**
   * Move every card to another list, possibly on another board.
   *
   * @throws ValidationError when the target list has no board id
   */
  async moveAllCards(target: List): Promise<void> {
    const id = this.requireId('move the cards of');
    const idList = target.requireId('move cards to');
    const idBoard = target.boardId;
    if (idBoard === undefined) {
      throw new ValidationError(`List ${idList} has no board id`, { idBoard: ['is required'] });
    }

    await this.client.post(`/lists/${id}/moveAllCards`, { idBoard, idList });
    this.cards.reset();
    target.cards.reset();
  }
}
