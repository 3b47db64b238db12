import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Member } from './member.js';

const permissionSchema = z.object({
  idModel: z.string(),
  modelType: z.string(),
  read: z.boolean(),
  write: z.boolean(),
});

export type TokenPermission = z.infer<typeof permissionSchema>;

export const tokenSchema = z
  .object({
    id: z.string(),
    identifier: z.string(),
    idMember: z.string(),
    dateCreated: z.string(),
    dateExpires: z.string().nullable(),
    permissions: z.array(permissionSchema),
  })
  .partial();

export type TokenAttributes = z.infer<typeof tokenSchema>;

/**
 * A member token. Look one up by its token string:
 * `client.find(Token, memberToken)`.
 */
export class Token extends BasicData<TokenAttributes> {
  static readonly definition = defineEntity({ name: 'Token', path: 'tokens', schema: tokenSchema });

  static readonly associations = {
    member: hasOne('member', () => Member, { via: 'idMember' }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Token.definition, client, attributes);
  }

  /** Name of the application the token was issued to */
  get identifier(): string | undefined {
    return this.get('identifier');
  }

  get createdAt(): Date | undefined {
    const value = this.get('dateCreated');
    return value ? new Date(value) : undefined;
  }

  /** `undefined` for tokens that never expire */
  get expiresAt(): Date | undefined {
    const value = this.get('dateExpires');
    return value ? new Date(value) : undefined;
  }

  get permissions(): TokenPermission[] {
    return this.get('permissions') ?? [];
  }

  get member(): AssociationProxy<Member> {
    return Token.associations.member.of(this);
  }
}
