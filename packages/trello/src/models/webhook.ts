import { z } from 'zod';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';

export const webhookSchema = z
  .object({
    id: z.string(),
    description: z.string(),
    idModel: z.string(),
    callbackURL: z.string().url(),
    active: z.boolean(),
    consecutiveFailures: z.number().int(),
    firstConsecutiveFailDate: z.string().nullable(),
  })
  .partial();

export type WebhookAttributes = z.infer<typeof webhookSchema>;

/**
 * Callback registration for changes on a model (board, card, member...).
 *
 * @example
 * ```typescript
 * const webhook = await client.create(Webhook, {
 *   description: 'sync',
 *   idModel: board.id,
 *   callbackURL: 'https://hooks.example.com/trello',
 * });
 * await webhook.deactivate();
 * ```
 */
export class Webhook extends BasicData<WebhookAttributes> {
  static readonly definition = defineEntity({
    name: 'Webhook',
    path: 'webhooks',
    schema: webhookSchema,
  });

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Webhook.definition, client, attributes);
  }

  get description(): string | undefined {
    return this.get('description');
  }

  set description(value: string | undefined) {
    this.set('description', value);
  }

  get modelId(): string | undefined {
    return this.get('idModel');
  }

  set modelId(value: string | undefined) {
    this.set('idModel', value);
  }

  get callbackUrl(): string | undefined {
    return this.get('callbackURL');
  }

  set callbackUrl(value: string | undefined) {
    this.set('callbackURL', value);
  }

  get isActive(): boolean {
    return this.get('active') === true;
  }

  activate(): Promise<this> {
    return this.update({ active: true });
  }

  deactivate(): Promise<this> {
    return this.update({ active: false });
  }
}
