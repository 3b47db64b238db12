import { ValidationError } from '@trellis/errors';
import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { isJsonObject } from '../net/request.js';
import { Board } from './board.js';

export const CUSTOM_FIELD_TYPES = ['text', 'number', 'date', 'checkbox', 'list'] as const;

export type CustomFieldType = (typeof CUSTOM_FIELD_TYPES)[number];

const customFieldOptionSchema = z.object({
  id: z.string(),
  idCustomField: z.string().optional(),
  value: z.object({ text: z.string() }),
  color: z.string().optional(),
  pos: z.number().optional(),
});

export type CustomFieldOption = z.infer<typeof customFieldOptionSchema>;

export const customFieldSchema = z
  .object({
    id: z.string(),
    idModel: z.string(),
    modelType: z.literal('board'),
    name: z.string(),
    type: z.enum(CUSTOM_FIELD_TYPES),
    pos: z.union([z.number(), z.enum(['top', 'bottom'])]),
    display: z.object({ cardFront: z.boolean() }).partial(),
    options: z.array(customFieldOptionSchema),
  })
  .partial();

export type CustomFieldAttributes = z.infer<typeof customFieldSchema>;

/**
 * A custom field defined on a board. Values live on cards as
 * `CustomFieldItem`s.
 *
 * @example
 * ```typescript
 * const field = await client.create(CustomField, {
 *   idModel: board.id,
 *   modelType: 'board',
 *   name: 'Priority',
 *   type: 'list',
 * });
 * const high = await field.addOption('High', 'red');
 * await card.setCustomField(field, { option: high.id });
 * ```
 */
export class CustomField extends BasicData<CustomFieldAttributes> {
  static readonly definition = defineEntity({
    name: 'CustomField',
    path: 'customFields',
    schema: customFieldSchema,
  });

  static readonly associations = {
    board: hasOne('board', () => Board, { via: 'idModel' }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(CustomField.definition, client, attributes);
  }

  get name(): string | undefined {
    return this.get('name');
  }

  set name(value: string | undefined) {
    this.set('name', value);
  }

  get type(): CustomFieldType | undefined {
    return this.get('type');
  }

  /** Choices of a `list` field */
  get options(): CustomFieldOption[] {
    return this.get('options') ?? [];
  }

  get showsOnCardFront(): boolean {
    return this.get('display')?.cardFront === true;
  }

  get board(): AssociationProxy<Board> {
    return CustomField.associations.board.of(this);
  }

  /** Option with the given label, if any */
  option(text: string): CustomFieldOption | undefined {
    return this.options.find((option) => option.value.text === text);
  }

  /**
   * Add a choice to a `list` field. The local options follow without
   * becoming dirty.
   */
  async addOption(
    text: string,
    color = 'none',
    position: number | 'top' | 'bottom' = 'bottom',
  ): Promise<CustomFieldOption> {
    const id = this.requireId('add options to');
    const json = await this.client.post(`/customFields/${id}/options`, {
      value: { text },
      color,
      pos: position,
    });

    const parsed = customFieldOptionSchema.safeParse(isJsonObject(json) ? json : {});
    if (!parsed.success) {
      throw new ValidationError('Invalid custom field option in Trello response', {
        option: parsed.error.issues.map((issue) => issue.message),
      });
    }
    this.sync('options', [...this.options, parsed.data]);
    return parsed.data;
  }

  async deleteOption(optionId: string): Promise<void> {
    const id = this.requireId('delete options from');
    await this.client.delete(`/customFields/${id}/options/${optionId}`);
    this.sync('options', this.options.filter((option) => option.id !== optionId));
  }
}
