import { z } from 'zod';
import { hasMany, hasOne } from '../associations/association.js';
import type { AssociationProxy, MultiAssociation } from '../associations/proxy.js';
import { BasicData, idOf } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Action } from './action.js';
import { Card } from './card.js';
import { Checklist } from './checklist.js';
import { CustomField } from './custom-field.js';
import { Label } from './label.js';
import { List } from './list.js';
import { Member } from './member.js';
import { Organization } from './organization.js';

export const boardSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    desc: z.string().nullable(),
    closed: z.boolean(),
    starred: z.boolean(),
    pinned: z.boolean(),
    idOrganization: z.string().nullable(),
    url: z.string(),
    shortUrl: z.string(),
    prefs: z.record(z.unknown()),
    labelNames: z.record(z.string()),
    dateLastActivity: z.string().nullable(),
  })
  .partial();

export type BoardAttributes = z.infer<typeof boardSchema>;

export type BoardMemberType = 'admin' | 'normal' | 'observer';

/**
 * A Trello board.
 *
 * @example
 * ```typescript
 * const board = await client.find(Board, 'b1');
 * for (const card of await board.cards) {
 *   console.log(card.name);
 * }
 * const archived = await board.cards.where({ filter: 'closed' });
 * ```
 */
export class Board extends BasicData<BoardAttributes> {
  static readonly definition = defineEntity({ name: 'Board', path: 'boards', schema: boardSchema });

  static readonly associations = {
    cards: hasMany('cards', () => Card, { params: { filter: 'open' } }),
    lists: hasMany('lists', () => List, { params: { filter: 'open' } }),
    members: hasMany('members', () => Member),
    labels: hasMany('labels', () => Label),
    checklists: hasMany('checklists', () => Checklist),
    customFields: hasMany('customFields', () => CustomField),
    actions: hasMany('actions', () => Action),
    organization: hasOne('organization', () => Organization, {
      via: 'idOrganization',
      optional: true,
    }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Board.definition, client, attributes);
  }

  get name(): string | undefined {
    return this.get('name');
  }

  set name(value: string | undefined) {
    this.set('name', value);
  }

  get description(): string | null | undefined {
    return this.get('desc');
  }

  set description(value: string | null | undefined) {
    this.set('desc', value);
  }

  get isClosed(): boolean {
    return this.get('closed') === true;
  }

  get isStarred(): boolean {
    return this.get('starred') === true;
  }

  get organizationId(): string | null | undefined {
    return this.get('idOrganization');
  }

  set organizationId(value: string | null | undefined) {
    this.set('idOrganization', value);
  }

  get url(): string | undefined {
    return this.get('url');
  }

  get prefs(): Record<string, unknown> | undefined {
    return this.get('prefs');
  }

  get lastActivityAt(): Date | undefined {
    const value = this.get('dateLastActivity');
    return value ? new Date(value) : undefined;
  }

  get cards(): MultiAssociation<Card> {
    return Board.associations.cards.of(this);
  }

  get lists(): MultiAssociation<List> {
    return Board.associations.lists.of(this);
  }

  get members(): MultiAssociation<Member> {
    return Board.associations.members.of(this);
  }

  get labels(): MultiAssociation<Label> {
    return Board.associations.labels.of(this);
  }

  get checklists(): MultiAssociation<Checklist> {
    return Board.associations.checklists.of(this);
  }

  get customFields(): MultiAssociation<CustomField> {
    return Board.associations.customFields.of(this);
  }

  get actions(): MultiAssociation<Action> {
    return Board.associations.actions.of(this);
  }

  get organization(): AssociationProxy<Organization | undefined> {
    return Board.associations.organization.of(this);
  }

  /** Archive the board */
  close(): Promise<this> {
    return this.update({ closed: true });
  }

  /** Restore an archived board */
  reopen(): Promise<this> {
    return this.update({ closed: false });
  }

  /**
   * Add a member, or change their role on the board.
   */
  async addMember(member: Member | string, type: BoardMemberType = 'normal'): Promise<void> {
    const id = this.requireId('add a member to');
    await this.client.put(`/boards/${id}/members/${idOf(member, 'add')}`, { type });
  }

  async removeMember(member: Member | string): Promise<void> {
    const id = this.requireId('remove a member from');
    await this.client.delete(`/boards/${id}/members/${idOf(member, 'remove')}`);
  }
}

