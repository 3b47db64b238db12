import type { Client } from '../client.js';
import type { Entity, EntityClass } from '../entity.js';
import { isJsonObject, type JsonValue, type RequestParams } from '../net/request.js';

/**
 * Fetch a single related entity. An empty answer (`null`, `{}` or `[]`)
 * resolves to `undefined`; deciding whether that is an error is up to the caller.
 */
export async function fetchOne<T extends Entity>(
  client: Client,
  target: EntityClass<T>,
  path: string,
  params?: RequestParams,
): Promise<T | undefined> {
  const json = await client.get(path, params);
  if (isEmpty(json)) {
    return undefined;
  }
  return client.materialize(target, json);
}

/**
 * Fetch a related collection in server order.
 */
export async function fetchMany<T extends Entity>(
  client: Client,
  target: EntityClass<T>,
  path: string,
  params?: RequestParams,
): Promise<T[]> {
  return client.materializeMany(target, await client.get(path, params));
}

function isEmpty(json: JsonValue): boolean {
  if (json === null) return true;
  if (Array.isArray(json)) return json.length === 0;
  return isJsonObject(json) && Object.keys(json).length === 0;
}
