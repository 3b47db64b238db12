import { z } from 'zod';
import { hasOne } from '../associations/association.js';
import type { AssociationProxy } from '../associations/proxy.js';
import { BasicData } from '../basic-data.js';
import type { Client } from '../client.js';
import { defineEntity } from '../entity.js';
import { Board } from './board.js';

export const LABEL_COLORS = [
  'green',
  'yellow',
  'orange',
  'red',
  'purple',
  'blue',
  'sky',
  'lime',
  'pink',
  'black',
] as const;

export type LabelColor = (typeof LABEL_COLORS)[number];

export const labelSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    // Also shades such as `green_dark`
    color: z.string().nullable(),
    idBoard: z.string(),
  })
  .partial();

export type LabelAttributes = z.infer<typeof labelSchema>;

/**
 * A board label. A label without a color is hidden on the card front.
 */
export class Label extends BasicData<LabelAttributes> {
  static readonly definition = defineEntity({ name: 'Label', path: 'labels', schema: labelSchema });

  static readonly associations = {
    board: hasOne('board', () => Board, { via: 'idBoard' }),
  };

  constructor(client: Client, attributes?: Record<string, unknown>) {
    super(Label.definition, client, attributes);
  }

  get name(): string | undefined {
    return this.get('name');
  }

  set name(value: string | undefined) {
    this.set('name', value);
  }

  get color(): string | null | undefined {
    return this.get('color');
  }

  set color(value: LabelColor | null | undefined) {
    this.set('color', value);
  }

  get boardId(): string | undefined {
    return this.get('idBoard');
  }

  set boardId(value: string | undefined) {
    this.set('idBoard', value);
  }

  get board(): AssociationProxy<Board> {
    return Label.associations.board.of(this);
  }
}
