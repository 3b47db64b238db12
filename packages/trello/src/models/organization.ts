import { z } from 'zod';
import { hasMany } from '../associations/association.js';
import type { MultiAssociation } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Action } from './action.js';
import { Board } from './board.js';
import { Member } from './member.js';

export const organizationSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    displayName: z.string(),
    desc: z.string().nullable(),
    url: z.string(),
    website: z.string().nullable(),
    logoHash: z.string().nullable(),
  })
  .partial();

export type OrganizationAttributes = z.infer<typeof organizationSchema>;

/**
 * A Workspace (called an organization by the API).
 */
export class Organization extends BasicData<OrganizationAttributes> {
  static readonly definition = defineEntity({
    name: 'Organization',
    path: 'organizations',
    schema: organizationSchema,
  });

  static readonly associations = {
    boards: hasMany('boards', () => Board, { params: { filter: 'all' } }),
    members: hasMany('members', () => Member, { params: { filter: 'all' } }),
    actions: hasMany('actions', () => Action),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Organization.definition, client, attributes);
  }

  /** Short name used in URLs */
  get name(): string | undefined {
    return this.get('name');
  }

  get displayName(): string | undefined {
    return this.get('displayName');
  }

  set displayName(value: string | undefined) {
    this.set('displayName', value);
  }

  get description(): string | null | undefined {
    return this.get('desc');
  }

  set description(value: string | null | undefined) {
    this.set('desc', value);
  }

  get website(): string | null | undefined {
    return this.get('website');
  }

  get url(): string | undefined {
    return this.get('url');
  }

  get boards(): MultiAssociation<Board> {
    return Organization.associations.boards.of(this);
  }

  get members(): MultiAssociation<Member> {
    return Organization.associations.members.of(this);
  }

  get actions(): MultiAssociation<Action> {
    return Organization.associations.actions.of(this);
  }
}
