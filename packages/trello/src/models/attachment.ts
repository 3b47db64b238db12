import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Member } from './member.js';

export const attachmentSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    url: z.string(),
    bytes: z.number().int().nullable(),
    date: z.string(),
    mimeType: z.string().nullable(),
    isUpload: z.boolean(),
    idMember: z.string(),
  })
  .partial();

export type AttachmentAttributes = z.infer<typeof attachmentSchema>;

/**
 * A file or link attached to a card. Attachments have no resource of their
 * own; add and remove them through `Card#addAttachment` and
 * `Card#removeAttachment`.
 */
export class Attachment extends BasicData<AttachmentAttributes> {
  static readonly definition = defineEntity({
    name: 'Attachment',
    path: 'attachments',
    schema: attachmentSchema,
  });

  static readonly associations = {
    member: hasOne('member', () => Member, { via: 'idMember' }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Attachment.definition, client, attributes);
  }

  get name(): string | undefined {
    return this.get('name');
  }

  get url(): string | undefined {
    return this.get('url');
  }

  get bytes(): number | null | undefined {
    return this.get('bytes');
  }

  get mimeType(): string | null | undefined {
    return this.get('mimeType');
  }

  /** Uploaded file rather than a link */
  get isUpload(): boolean {
    return this.get('isUpload') === true;
  }

  get attachedAt(): Date | undefined {
    const value = this.get('date');
    return value ? new Date(value) : undefined;
  }

  /** Who attached it */
  get member(): AssociationProxy<Member> {
    return Attachment.associations.member.of(this);
  }
}
