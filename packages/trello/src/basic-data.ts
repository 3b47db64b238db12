import { isDeepStrictEqual } from 'util';
import { NotSavedError, ValidationError } from '@trellis/errors';
import type { z } from 'zod';
import type { Client } from './client.js';
import type { Entity, EntityAttributes, EntityDefinition } from './entity.js';
import { isJsonObject, type JsonValue, type RequestParams } from './net/request.js';

/**
 * @fileoverview Attribute-backed base class for every Trello entity.
 * @packageDocumentation
 */

/**
 * One API resource as a mutable attribute map with a baseline snapshot.
 *
 * The baseline is the state last loaded from or saved to Trello. Dirty
 * fields are computed by comparing current attributes against it, so
 * writing a value back to its original makes the field clean again.
 *
 * @example
 * ```typescript
 * const card = await client.find(Card, 'c1');
 * card.name = 'Renamed';
 * card.changes(); // { name: 'Renamed' }
 * await card.save(); // PUT /cards/c1 { name: 'Renamed' }
 * ```
 */
export abstract class BasicData<A extends EntityAttributes> implements Entity {
  private current: A;
  private baseline: A;

  protected constructor(
    readonly definition: EntityDefinition<A>,
    readonly client: Client,
    attributes: Record<string, unknown> = {},
  ) {
    const parsed = this.parse(attributes);
    this.current = parsed;
    // With an id the attributes describe a stored record; without one they are unsaved, hence dirty.
    this.baseline = parsed.id === undefined ? this.parse({}) : structuredClone(parsed);
  }

  get id(): string | undefined {
    return this.current.id;
  }

  /** Path of this entity's resource, e.g. `/cards/c1` */
  protected get resourcePath(): string {
    const id = this.id;
    return id === undefined
      ? `/${this.definition.path}`
      : `/${this.definition.path}/${encodeURIComponent(id)}`;
  }

  /**
   * Replace all attributes with a server payload and reset the baseline.
   *
   * @throws ValidationError when the payload does not fit the schema or carries a different id
   */
  load(json: Record<string, unknown>): this {
    const parsed = this.parse(json);
    const id = this.id;

    if (id !== undefined) {
      if (parsed.id !== undefined && parsed.id !== id) {
        throw new ValidationError(`${this.definition.name} ${id} cannot become ${parsed.id}`, {
          id: ['cannot be reassigned'],
        });
      }
      parsed.id = id;
    }

    this.current = parsed;
    this.baseline = structuredClone(parsed);
    return this;
  }

  /**
   * Current value of an attribute. Arrays and objects are copies; write
   * changes back with `set`.
   */
  get<K extends keyof A>(name: K): A[K] {
    return structuredClone(this.current[name]);
  }

  /**
   * Write an attribute.
   *
   * @throws ValidationError when changing an assigned id
   */
  set<K extends keyof A>(name: K, value: A[K]): this {
    if (name === 'id' && this.id !== undefined && value !== this.id) {
      throw new ValidationError(`The id of ${this.definition.name} ${this.id} cannot be changed`, {
        id: ['cannot be reassigned'],
      });
    }

    const next = { ...this.current };
    next[name] = structuredClone(value);
    this.current = next;
    return this;
  }

  /**
   * Record a value the server already holds: writes the attribute and its
   * baseline, leaving other dirty fields untouched.
   */
  protected sync<K extends keyof A>(name: K, value: A[K]): void {
    const current = { ...this.current };
    const baseline = { ...this.baseline };
    current[name] = structuredClone(value);
    baseline[name] = structuredClone(value);
    this.current = current;
    this.baseline = baseline;
  }

  /**
   * Write several attributes. Validated against the schema as a whole.
   */
  assign(attributes: Partial<A>): this {
    const merged = this.parse(structuredClone({ ...this.current, ...attributes }));
    if (this.id !== undefined && merged.id !== this.id) {
      throw new ValidationError(`The id of ${this.definition.name} ${this.id} cannot be changed`, {
        id: ['cannot be reassigned'],
      });
    }
    this.current = merged;
    return this;
  }

  /**
   * Value at a dotted path, e.g. `prefs.background`.
   */
  read(path: string): unknown {
    let value: unknown = this.current;
    for (const segment of path.split('.')) {
      if (value === null || typeof value !== 'object' || !Object.hasOwn(value, segment)) {
        return undefined;
      }
      value = Reflect.get(value, segment);
    }
    return structuredClone(value);
  }

  /** Names of the attributes that differ from the baseline */
  get dirtyFields(): string[] {
    const current = attributeMap(this.current);
    const baseline = attributeMap(this.baseline);
    const names = new Set([...current.keys(), ...baseline.keys()]);

    return [...names].filter((name) => !isDeepStrictEqual(current.get(name), baseline.get(name)));
  }

  get isDirty(): boolean {
    return this.dirtyFields.length > 0;
  }

  /** Whether the entity has a server id */
  get isSaved(): boolean {
    return this.id !== undefined;
  }

  /**
   * Dirty attributes and their current values. A cleared attribute maps to `null`.
   * The id is never part of an update.
   */
  changes(): Record<string, unknown> {
    const current = attributeMap(this.current);
    return Object.fromEntries(
      this.dirtyFields
        .filter((name) => name !== 'id')
        .map((name) => [name, structuredClone(current.get(name)) ?? null]),
    );
  }

  /**
   * Create the entity when it has no id, otherwise send its dirty attributes.
   * A saved entity with nothing dirty is left alone.
   */
  async save(): Promise<this> {
    if (this.id === undefined) {
      const created = await this.client.post(`/${this.definition.path}`, this.createBody());
      return this.load(this.expectObject(created));
    }

    const changes = this.changes();
    if (Object.keys(changes).length === 0) {
      return this;
    }

    const updated = await this.client.put(this.resourcePath, changes);
    if (isJsonObject(updated)) {
      return this.load(updated);
    }
    this.baseline = structuredClone(this.current);
    return this;
  }

  /**
   * Write attributes and save them in one step.
   */
  update(attributes: Partial<A>): Promise<this> {
    return this.assign(attributes).save();
  }

  /**
   * Delete the entity on Trello. Local attributes are left as they are.
   */
  async delete(): Promise<void> {
    this.requireId('delete');
    await this.client.delete(this.resourcePath);
  }

  /**
   * Reload every attribute from Trello.
   */
  async refresh(params?: RequestParams): Promise<this> {
    this.requireId('refresh');
    const json = await this.client.get(this.resourcePath, params);
    return this.load(this.expectObject(json));
  }

  /**
   * Same concrete type and same id. An entity without an id only equals itself.
   */
  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof BasicData) || other.constructor !== this.constructor) return false;
    return this.id !== undefined && other.id === this.id;
  }

  toJSON(): A {
    return structuredClone(this.current);
  }

  /**
   * Attributes sent when creating: every attribute that is set.
   */
  protected createBody(): Record<string, unknown> {
    return Object.fromEntries(attributeMap(this.current));
  }

  /**
   * Id for an operation that needs one.
   * @throws NotSavedError when there is none
   */
  protected requireId(operation: string): string {
    const id = this.id;
    if (id === undefined) {
      throw new NotSavedError(this.definition.name, operation);
    }
    return id;
  }

  protected expectObject(json: JsonValue): Record<string, unknown> {
    if (!isJsonObject(json)) {
      throw new ValidationError(`Expected a ${this.definition.name} object from Trello`, {
        payload: [json === null ? 'received null' : `received ${Array.isArray(json) ? 'array' : typeof json}`],
      });
    }
    return json;
  }

  private parse(attributes: Record<string, unknown>): A {
    const result = this.definition.schema.safeParse(attributes);
    if (!result.success) {
      throw new ValidationError(
        `Invalid ${this.definition.name} attributes`,
        fieldErrors(result.error),
      );
    }
    return result.data;
  }
}

/**
 * Id of an entity, or the id itself when given as a string.
 * @throws NotSavedError for an entity without one
 */
export function idOf(entity: Entity | string, operation: string): string {
  if (typeof entity === 'string') return entity;
  if (entity.id === undefined) {
    throw new NotSavedError(entity.definition.name, operation);
  }
  return entity.id;
}

function attributeMap(attributes: object): Map<string, unknown> {
  return new Map<string, unknown>(
    Object.entries(attributes).filter(([, value]) => value !== undefined),
  );
}

function fieldErrors(error: z.ZodError): Record<string, string[]> {
  const errors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.join('.') || '_';
    (errors[field] ??= []).push(issue.message);
  }
  return errors;
}
