import { ValidationError } from '@trellis/errors';
import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { isJsonObject } from '../net/request.js';
import { Board } from './board.js';
import { Card } from './card.js';

const checkItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  state: z.enum(['complete', 'incomplete']),
  pos: z.number().optional(),
});

export type CheckItem = z.infer<typeof checkItemSchema>;

export const checklistSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    idBoard: z.string(),
    idCard: z.string(),
    pos: z.union([z.number(), z.enum(['top', 'bottom'])]),
    checkItems: z.array(checkItemSchema),
  })
  .partial();

export type ChecklistAttributes = z.infer<typeof checklistSchema>;

/**
 * A checklist on a card.
 */
export class Checklist extends BasicData<ChecklistAttributes> {
  static readonly definition = defineEntity({
    name: 'Checklist',
    path: 'checklists',
    schema: checklistSchema,
  });

  static readonly associations = {
    board: hasOne('board', () => Board, { via: 'idBoard' }),
    card: hasOne('card', () => Card, { via: 'idCard' }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Checklist.definition, client, attributes);
  }

  get name(): string | undefined {
    return this.get('name');
  }

  set name(value: string | undefined) {
    this.set('name', value);
  }

  get cardId(): string | undefined {
    return this.get('idCard');
  }

  set cardId(value: string | undefined) {
    this.set('idCard', value);
  }

  get items(): CheckItem[] {
    return this.get('checkItems') ?? [];
  }

  get board(): AssociationProxy<Board> {
    return Checklist.associations.board.of(this);
  }

  get card(): AssociationProxy<Card> {
    return Checklist.associations.card.of(this);
  }

  /**
   * Add an item. The local item list follows without becoming dirty.
   */
  async addItem(
    name: string,
    checked = false,
    position: number | 'top' | 'bottom' = 'bottom',
  ): Promise<CheckItem> {
    const id = this.requireId('add items to');
    const json = await this.client.post(`/checklists/${id}/checkItems`, {
      name,
      checked,
      pos: position,
    });

    const parsed = checkItemSchema.safeParse(isJsonObject(json) ? json : {});
    if (!parsed.success) {
      throw new ValidationError('Invalid check item in Trello response', {
        checkItem: parsed.error.issues.map((issue) => issue.message),
      });
    }
    this.sync('checkItems', [...this.items, parsed.data]);
    return parsed.data;
  }

  async deleteItem(itemId: string): Promise<void> {
    const id = this.requireId('delete items from');
    await this.client.delete(`/checklists/${id}/checkItems/${itemId}`);
    this.sync('checkItems', this.items.filter((item) => item.id !== itemId));
  }
}
