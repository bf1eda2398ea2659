/**
 * JSON tree helpers
 *
 * SCIM attribute names are case-insensitive (RFC 7643 Section 2.1), so every
 * lookup here matches keys case-insensitively while writes keep the casing
 * already present in the document.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from '../types/json';

/**
 * zod schema accepting any JSON value
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the actual key stored in `obj` for an attribute name.
 * An exact match wins over a case-insensitive one.
 */
export function findKey(obj: JsonObject, name: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(obj, name)) {
    return name;
  }
  const lower = name.toLowerCase();
  return Object.keys(obj).find((key) => key.toLowerCase() === lower);
}

export function getField(obj: JsonObject, name: string): JsonValue | undefined {
  const key = findKey(obj, name);
  return key === undefined ? undefined : obj[key];
}

/**
 * Set a field, reusing the existing key's casing when present.
 */
export function setField(obj: JsonObject, name: string, value: JsonValue): void {
  obj[findKey(obj, name) ?? name] = value;
}

/**
 * Delete a field. Returns true if something was removed.
 */
export function removeField(obj: JsonObject, name: string): boolean {
  const key = findKey(obj, name);
  if (key === undefined) {
    return false;
  }
  delete obj[key];
  return true;
}

/**
 * Deep structural equality. Object key order is ignored; array order is not.
 */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) {
    return true;
  }
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((v, i) => jsonEquals(v, b[i]));
  }
  if (isJsonObject(a)) {
    if (!isJsonObject(b)) {
      return false;
    }
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) {
      return false;
    }
    return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && jsonEquals(a[key], b[key]));
  }
  return false;
}

/**
 * Unassigned attributes, the null value and empty arrays are equivalent in
 * state (RFC 7643 Section 2.5). Arrays holding only such values count as empty.
 */
export function isEmptyValue(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isEmptyValue);
  }
  return false;
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Merge `value` into `target[name]`.
 *
 * - null and empty arrays leave the target untouched
 * - object into object merges recursively
 * - array into array appends the values not already present
 * - anything else overwrites
 */
export function mergeField(target: JsonObject, name: string, value: JsonValue): void {
  if (value === null || (Array.isArray(value) && value.length === 0)) {
    return;
  }

  const existing = getField(target, name);
  if (isJsonObject(existing) && isJsonObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      mergeField(existing, key, child);
    }
    return;
  }
  if (Array.isArray(existing) && Array.isArray(value)) {
    for (const item of value) {
      if (!existing.some((current) => jsonEquals(current, item))) {
        existing.push(cloneJson(item));
      }
    }
    return;
  }

  setField(target, name, cloneJson(value));
}

/**
 * True if attributes qualified with `urn` live at the top level of `doc`:
 * either a configured core schema or the first entry of `doc.schemas`.
 */
export function isCoreSchemaUrn(
  doc: JsonObject,
  urn: string,
  coreSchemaUrns: readonly string[]
): boolean {
  const lower = urn.toLowerCase();
  if (coreSchemaUrns.some((core) => core.toLowerCase() === lower)) {
    return true;
  }
  const schemas = getField(doc, 'schemas');
  if (!Array.isArray(schemas)) {
    return false;
  }
  const [primary] = schemas;
  return typeof primary === 'string' && primary.toLowerCase() === lower;
}

/**
 * The object holding attributes qualified with `urn`, for reading.
 * An extension object stored under the URN wins over a core schema match.
 */
export function schemaRootForRead(
  doc: JsonObject,
  urn: string,
  coreSchemaUrns: readonly string[]
): JsonObject | undefined {
  const extension = getField(doc, urn);
  if (isJsonObject(extension)) {
    return extension;
  }
  return isCoreSchemaUrn(doc, urn, coreSchemaUrns) ? doc : undefined;
}
