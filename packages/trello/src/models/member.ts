import { z } from 'zod';
import { hasMany } from '../associations/association.js';
import type { MultiAssociation } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Action } from './action.js';
import { Board } from './board.js';
import { Card } from './card.js';
import { Notification } from './notification.js';
import { Organization } from './organization.js';

export const memberSchema = z
  .object({
    id: z.string(),
    username: z.string(),
    fullName: z.string(),
    initials: z.string(),
    avatarHash: z.string().nullable(),
    avatarUrl: z.string().nullable(),
    bio: z.string().nullable(),
    email: z.string().nullable(),
    url: z.string(),
    idBoards: z.array(z.string()),
    idOrganizations: z.array(z.string()),
  })
  .partial();

export type MemberAttributes = z.infer<typeof memberSchema>;

/**
 * A Trello user.
 */
export class Member extends BasicData<MemberAttributes> {
  static readonly definition = defineEntity({
    name: 'Member',
    path: 'members',
    schema: memberSchema,
  });

  static readonly associations = {
    boards: hasMany('boards', () => Board, { params: { filter: 'open' } }),
    cards: hasMany('cards', () => Card, { params: { filter: 'open' } }),
    organizations: hasMany('organizations', () => Organization),
    notifications: hasMany('notifications', () => Notification),
    actions: hasMany('actions', () => Action),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Member.definition, client, attributes);
  }

  /**
   * The member the client's credentials belong to.
   */
  static me(client: Client): Promise<Member> {
    return client.find(Member, 'me');
  }

  get username(): string | undefined {
    return this.get('username');
  }

  get fullName(): string | undefined {
    return this.get('fullName');
  }

  set fullName(value: string | undefined) {
    this.set('fullName', value);
  }

  get initials(): string | undefined {
    return this.get('initials');
  }

  get bio(): string | null | undefined {
    return this.get('bio');
  }

  set bio(value: string | null | undefined) {
    this.set('bio', value);
  }

  get email(): string | null | undefined {
    return this.get('email');
  }

  get url(): string | undefined {
    return this.get('url');
  }

  /** 170px avatar, when the member has one */
  get avatarUrl(): string | undefined {
    const url = this.get('avatarUrl');
    return url ? `${url}/170.png` : undefined;
  }

  get boards(): MultiAssociation<Board> {
    return Member.associations.boards.of(this);
  }

  get cards(): MultiAssociation<Card> {
    return Member.associations.cards.of(this);
  }

  get organizations(): MultiAssociation<Organization> {
    return Member.associations.organizations.of(this);
  }

  get notifications(): MultiAssociation<Notification> {
    return Member.associations.notifications.of(this);
  }

  get actions(): MultiAssociation<Action> {
    return Member.associations.actions.of(this);
  }
}
