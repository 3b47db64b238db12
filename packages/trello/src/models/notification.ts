import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Board } from './board.js';
import { Card } from './card.js';
import { Member } from './member.js';

export const notificationSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    date: z.string(),
    unread: z.boolean(),
    idMemberCreator: z.string().nullable(),
    data: z.record(z.unknown()),
  })
  .partial();

export type NotificationAttributes = z.infer<typeof notificationSchema>;

export class Notification extends BasicData<NotificationAttributes> {
  static readonly definition = defineEntity({
    name: 'Notification',
    path: 'notifications',
    schema: notificationSchema,
  });

  static readonly associations = {
    board: hasOne('board', () => Board, { optional: true }),
    card: hasOne('card', () => Card, { optional: true }),
    memberCreator: hasOne('memberCreator', () => Member, {
      via: 'idMemberCreator',
      optional: true,
    }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Notification.definition, client, attributes);
  }

  get type(): string | undefined {
    return this.get('type');
  }

  get isUnread(): boolean {
    return this.get('unread') === true;
  }

  get date(): Date | undefined {
    const value = this.get('date');
    return value ? new Date(value) : undefined;
  }

  get data(): Record<string, unknown> {
    return this.get('data') ?? {};
  }

  get board(): AssociationProxy<Board | undefined> {
    return Notification.associations.board.of(this);
  }

  get card(): AssociationProxy<Card | undefined> {
    return Notification.associations.card.of(this);
  }

  get memberCreator(): AssociationProxy<Member | undefined> {
    return Notification.associations.memberCreator.of(this);
  }

  markAsRead(): Promise<this> {
    return this.update({ unread: false });
  }
}
