/**
 * JSON document model
 *
 * Resources are handled as plain JSON trees. Objects keep insertion order;
 * attribute names are looked up case-insensitively (see utils/scim-json).
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];
