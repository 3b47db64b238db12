import { z } from 'zod';
import { hasMany, hasOne } from '../associations/association.js';
import type { AssociationProxy, MultiAssociation } from '../associations/proxy.js';
import { BasicData, idOf } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Action } from './action.js';
import { Attachment } from './attachment.js';
import { Board } from './board.js';
import { Checklist } from './checklist.js';
import type { CustomField } from './custom-field.js';
import { CustomFieldItem, customFieldItemBody, type CustomFieldValue } from './custom-field-item.js';
import { Label } from './label.js';
import { List } from './list.js';
import { Member } from './member.js';

export const cardSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    desc: z.string().nullable(),
    closed: z.boolean(),
    idList: z.string(),
    idBoard: z.string(),
    idMembers: z.array(z.string()),
    idLabels: z.array(z.string()),
    idChecklists: z.array(z.string()),
    idShort: z.number().int(),
    pos: z.union([z.number(), z.enum(['top', 'bottom'])]),
    due: z.string().nullable(),
    dueComplete: z.boolean(),
    url: z.string(),
    shortUrl: z.string(),
    shortLink: z.string(),
    dateLastActivity: z.string().nullable(),
  })
  .partial();

export type CardAttributes = z.infer<typeof cardSchema>;

/**
 * A card on a list.
 *
 * Membership and label operations go straight to their own endpoints and do
 * not touch `idMembers` or `idLabels` locally; call `refresh()` to see them.
 */
export class Card extends BasicData<CardAttributes> {
  static readonly definition = defineEntity({ name: 'Card', path: 'cards', schema: cardSchema });

  static readonly associations = {
    list: hasOne('list', () => List, { via: 'idList' }),
    board: hasOne('board', () => Board, { via: 'idBoard' }),
    members: hasMany('members', () => Member),
    labels: hasMany('labels', () => Label),
    checklists: hasMany('checklists', () => Checklist),
    attachments: hasMany('attachments', () => Attachment),
    customFieldItems: hasMany('customFieldItems', () => CustomFieldItem),
    actions: hasMany('actions', () => Action),
    comments: hasMany('comments', () => Action, {
      path: 'actions',
      params: { filter: 'commentCard' },
    }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Card.definition, client, attributes);
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

  get listId(): string | undefined {
    return this.get('idList');
  }

  set listId(value: string | undefined) {
    this.set('idList', value);
  }

  get boardId(): string | undefined {
    return this.get('idBoard');
  }

  set boardId(value: string | undefined) {
    this.set('idBoard', value);
  }

  get memberIds(): string[] {
    return this.get('idMembers') ?? [];
  }

  get labelIds(): string[] {
    return this.get('idLabels') ?? [];
  }

  get position(): number | 'top' | 'bottom' | undefined {
    return this.get('pos');
  }

  set position(value: number | 'top' | 'bottom' | undefined) {
    this.set('pos', value);
  }

  get due(): Date | undefined {
    const value = this.get('due');
    return value ? new Date(value) : undefined;
  }

  set due(value: Date | undefined) {
    this.set('due', value === undefined ? null : value.toISOString());
  }

  get isDueComplete(): boolean {
    return this.get('dueComplete') === true;
  }

  get url(): string | undefined {
    return this.get('url');
  }

  get list(): AssociationProxy<List> {
    return Card.associations.list.of(this);
  }

  get board(): AssociationProxy<Board> {
    return Card.associations.board.of(this);
  }

  get members(): MultiAssociation<Member> {
    return Card.associations.members.of(this);
  }

  get labels(): MultiAssociation<Label> {
    return Card.associations.labels.of(this);
  }

  get checklists(): MultiAssociation<Checklist> {
    return Card.associations.checklists.of(this);
  }

  get attachments(): MultiAssociation<Attachment> {
    return Card.associations.attachments.of(this);
  }

  /** Values of the board's custom fields that are set on this card */
  get customFieldItems(): MultiAssociation<CustomFieldItem> {
    return Card.associations.customFieldItems.of(this);
  }

  get actions(): MultiAssociation<Action> {
    return Card.associations.actions.of(this);
  }

  get comments(): MultiAssociation<Action> {
    return Card.associations.comments.of(this);
  }

  /**
   * Move to another list on the same board.
   */
  moveToList(list: List | string): Promise<this> {
    const idList = idOf(list, 'move a card to');
    this.set('idList', idList);
    return this.save();
  }

  /**
   * Move to another board, optionally onto a given list there.
   */
  moveToBoard(board: Board | string, list?: List | string): Promise<this> {
    this.set('idBoard', idOf(board, 'move a card to'));
    if (list !== undefined) {
      this.set('idList', idOf(list, 'move a card to'));
    }
    return this.save();
  }

  /**
   * Post a comment. Returns the created comment action.
   */
  async addComment(text: string): Promise<Action> {
    const id = this.requireId('comment on');
    const json = await this.client.post(`/cards/${id}/actions/comments`, { text });
    this.comments.reset();
    return this.client.materialize(Action, json);
  }

  async addLabel(label: Label | string): Promise<void> {
    const id = this.requireId('add labels to');
    await this.client.post(`/cards/${id}/idLabels`, { value: idOf(label, 'apply') });
    this.labels.reset();
  }

  async removeLabel(label: Label | string): Promise<void> {
    const id = this.requireId('remove labels from');
    await this.client.delete(`/cards/${id}/idLabels/${idOf(label, 'remove')}`);
    this.labels.reset();
  }

  async addMember(member: Member | string): Promise<void> {
    const id = this.requireId('add members to');
    await this.client.post(`/cards/${id}/idMembers`, { value: idOf(member, 'assign') });
    this.members.reset();
  }

  async removeMember(member: Member | string): Promise<void> {
    const id = this.requireId('remove members from');
    await this.client.delete(`/cards/${id}/idMembers/${idOf(member, 'unassign')}`);
    this.members.reset();
  }

  /**
   * Attach a link. Returns the created attachment.
   */
  async addAttachment(attachment: {
    url: string;
    name?: string;
    mimeType?: string;
  }): Promise<Attachment> {
    const id = this.requireId('attach to');
    const body: Record<string, unknown> = { url: attachment.url };
    if (attachment.name !== undefined) body['name'] = attachment.name;
    if (attachment.mimeType !== undefined) body['mimeType'] = attachment.mimeType;

    const json = await this.client.post(`/cards/${id}/attachments`, body);
    this.attachments.reset();
    return this.client.materialize(Attachment, json);
  }

  async removeAttachment(attachment: Attachment | string): Promise<void> {
    const id = this.requireId('remove attachments from');
    await this.client.delete(`/cards/${id}/attachments/${idOf(attachment, 'remove')}`);
    this.attachments.reset();
  }

  /**
   * Set or clear the value of a custom field on this card.
   *
   * @example
   * ```typescript
   * await card.setCustomField(estimate, { number: 3 });
   * await card.setCustomField(estimate, null);
   * ```
   */
  async setCustomField(field: CustomField | string, value: CustomFieldValue): Promise<void> {
    const id = this.requireId('set custom fields on');
    const fieldId = idOf(field, 'set');
    await this.client.put(`/cards/${id}/customField/${fieldId}/item`, customFieldItemBody(value));
    this.customFieldItems.reset();
  }

  /** Archive the card */
  close(): Promise<this> {
    return this.update({ closed: true });
  }
}
