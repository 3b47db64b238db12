import type { z } from 'zod';
import type { Client } from './client.js';

/**
 * Attributes every entity has. The rest is declared by each entity's schema.
 */
export interface EntityAttributes {
  id?: string;
}

/**
 * Static description of an entity type.
 */
export interface EntityDefinition<A extends EntityAttributes = EntityAttributes> {
  /** Type name used in messages, e.g. `Card` */
  readonly name: string;
  /** Resource segment under the API root, e.g. `cards` */
  readonly path: string;
  /** Legal attributes. Unknown keys are stripped on load. */
  readonly schema: z.ZodType<A, z.ZodTypeDef, unknown>;
}

/**
 * What the client and the association layer need from an entity instance.
 */
export interface Entity {
  readonly client: Client;
  readonly definition: EntityDefinition;
  readonly id: string | undefined;
  /** Attribute value by name or dotted path */
  read(path: string): unknown;
  load(json: Record<string, unknown>): this;
}

/**
 * Constructor side of an entity type.
 */
export interface EntityClass<T extends Entity> {
  new (client: Client, attributes?: Record<string, unknown>): T;
  readonly definition: EntityDefinition;
}

/**
 * Declare an entity type. Keeps the attribute type inferred from the schema.
 *
 * @example
 * ```typescript
 * const labelDefinition = defineEntity({
 *   name: 'Label',
 *   path: 'labels',
 *   schema: z.object({ id: z.string(), name: z.string(), color: z.string().nullable() }).partial(),
 * });
 * ```
 */
export function defineEntity<A extends EntityAttributes>(
  definition: EntityDefinition<A>,
): EntityDefinition<A> {
  return Object.freeze({ ...definition });
}
