import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Card } from './card.js';
import { CustomField } from './custom-field.js';

export const customFieldItemSchema = z
  .object({
    id: z.string(),
    idCustomField: z.string(),
    idModel: z.string(),
    modelType: z.literal('card'),
    // Trello sends every scalar as a string
    value: z
      .object({ text: z.string(), number: z.string(), date: z.string(), checked: z.string() })
      .partial()
      .nullable(),
    idValue: z.string().nullable(),
  })
  .partial();

export type CustomFieldItemAttributes = z.infer<typeof customFieldItemSchema>;

/**
 * New value for a card's custom field. `null` clears it.
 */
export type CustomFieldValue =
  | { text: string }
  | { number: number }
  | { date: Date }
  | { checked: boolean }
  | { option: string }
  | null;

/**
 * Request body that sets a custom field to `value`.
 */
export function customFieldItemBody(value: CustomFieldValue): Record<string, unknown> {
  if (value === null) return { value: '' };
  if ('option' in value) return { idValue: value.option };
  if ('text' in value) return { value: { text: value.text } };
  if ('number' in value) return { value: { number: String(value.number) } };
  if ('date' in value) return { value: { date: value.date.toISOString() } };
  return { value: { checked: String(value.checked) } };
}

/**
 * The value of one custom field on one card. Only set fields have an item.
 */
export class CustomFieldItem extends BasicData<CustomFieldItemAttributes> {
  static readonly definition = defineEntity({
    name: 'CustomFieldItem',
    path: 'customFieldItems',
    schema: customFieldItemSchema,
  });

  static readonly associations = {
    customField: hasOne('customField', () => CustomField, { via: 'idCustomField' }),
    card: hasOne('card', () => Card, { via: 'idModel' }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(CustomFieldItem.definition, client, attributes);
  }

  get customFieldId(): string | undefined {
    return this.get('idCustomField');
  }

  get text(): string | undefined {
    return this.get('value')?.text;
  }

  get number(): number | undefined {
    const value = this.get('value')?.number;
    return value === undefined ? undefined : Number(value);
  }

  get date(): Date | undefined {
    const value = this.get('value')?.date;
    return value === undefined ? undefined : new Date(value);
  }

  get isChecked(): boolean {
    return this.get('value')?.checked === 'true';
  }

  /** Id of the chosen option of a `list` field */
  get optionId(): string | undefined {
    return this.get('idValue') ?? undefined;
  }

  get customField(): AssociationProxy<CustomField> {
    return CustomFieldItem.associations.customField.of(this);
  }

  get card(): AssociationProxy<Card> {
    return CustomFieldItem.associations.card.of(this);
  }
}
