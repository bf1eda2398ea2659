/**
 * JSON Tree Helper and dateTime Tests
 */

import { describe, it, expect } from 'vitest';
import {
  JsonValueSchema,
  findKey,
  isCoreSchemaUrn,
  isEmptyValue,
  jsonEquals,
  mergeField,
  removeField,
  schemaRootForRead,
  setField,
} from '../utils/scim-json';
import { compareDateTimes, formatDateTime, isDateTime, parseDateTime } from '../utils/scim-datetime';
import type { JsonObject, JsonValue } from '../types/json';
import { SCIM_SCHEMAS } from '../types/scim';

describe('JSON tree helpers', () => {
  describe('field access', () => {
    it('should prefer an exact key over a case-insensitive match', () => {
      expect(findKey({ UserName: 'a', userName: 'b' }, 'userName')).toBe('userName');
      expect(findKey({ UserName: 'a' }, 'USERNAME')).toBe('UserName');
      expect(findKey({ UserName: 'a' }, 'nickName')).toBeUndefined();
    });

    it('should keep the stored key casing on write', () => {
      const node: JsonObject = { UserName: 'a' };
      setField(node, 'username', 'b');
      expect(node).toEqual({ UserName: 'b' });
    });

    it('should report whether a field was removed', () => {
      const node: JsonObject = { UserName: 'a' };
      expect(removeField(node, 'username')).toBe(true);
      expect(removeField(node, 'username')).toBe(false);
      expect(node).toEqual({});
    });
  });

  it('should compare objects regardless of key order', () => {
    expect(jsonEquals({ a: 1, b: [1, { c: null }] }, { b: [1, { c: null }], a: 1 })).toBe(true);
    expect(jsonEquals([1, 2], [2, 1])).toBe(false);
    expect(jsonEquals({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(jsonEquals(1, '1')).toBe(false);
  });

  it.each<[JsonValue | undefined, boolean]>([
    [undefined, true],
    [null, true],
    [[], true],
    [[null, []], true],
    ['', false],
    [{}, false],
    [[0], false],
  ])('isEmptyValue(%j) should be %s', (value, expected) => {
    expect(isEmptyValue(value)).toBe(expected);
  });

  describe('mergeField', () => {
    it('should merge objects recursively and append new array values', () => {
      const node: JsonObject = { name: { givenName: 'Barbara' }, roles: ['admin'] };
      mergeField(node, 'name', { familyName: 'Jensen' });
      mergeField(node, 'roles', ['admin', 'auditor']);

      expect(node).toEqual({ name: { givenName: 'Barbara', familyName: 'Jensen' }, roles: ['admin', 'auditor'] });
    });

    it('should ignore null and empty arrays', () => {
      const node: JsonObject = { title: 'Tour Guide' };
      mergeField(node, 'title', null);
      mergeField(node, 'roles', []);
      expect(node).toEqual({ title: 'Tour Guide' });
    });

    it('should store a copy of the value', () => {
      const value: JsonObject = { givenName: 'Barbara' };
      const node: JsonObject = {};
      mergeField(node, 'name', value);
      value.givenName = 'changed';

      expect(node).toEqual({ name: { givenName: 'Barbara' } });
    });
  });

  describe('schema roots', () => {
    const doc: JsonObject = {
      schemas: ['urn:example:core:Device'],
      [SCIM_SCHEMAS.ENTERPRISE_USER]: { employeeNumber: '1' },
    };

    it('should treat configured URNs and the first listed schema as core', () => {
      expect(isCoreSchemaUrn(doc, SCIM_SCHEMAS.USER, [SCIM_SCHEMAS.USER])).toBe(true);
      expect(isCoreSchemaUrn(doc, 'URN:EXAMPLE:CORE:DEVICE', [])).toBe(true);
      expect(isCoreSchemaUrn(doc, SCIM_SCHEMAS.ENTERPRISE_USER, [])).toBe(false);
    });

    it('should find the object holding attributes of a schema', () => {
      expect(schemaRootForRead(doc, SCIM_SCHEMAS.ENTERPRISE_USER, [])).toEqual({ employeeNumber: '1' });
      expect(schemaRootForRead(doc, 'urn:example:core:Device', [])).toBe(doc);
      expect(schemaRootForRead(doc, 'urn:example:other', [])).toBeUndefined();
    });
  });

  it('should validate JSON values with zod', () => {
    expect(JsonValueSchema.safeParse({ a: [1, 'b', null, { c: true }] }).success).toBe(true);
    expect(JsonValueSchema.safeParse({ a: () => 1 }).success).toBe(false);
  });
});

describe('dateTime values', () => {
  it.each([
    ['2024-03-01T12:00:00Z', Date.UTC(2024, 2, 1, 12)],
    ['2024-03-01T21:00:00+09:00', Date.UTC(2024, 2, 1, 12)],
    ['2024-03-01T07:00:00-0500', Date.UTC(2024, 2, 1, 12)],
    ['2024-03-01T12:00:00.1234567z', Date.UTC(2024, 2, 1, 12, 0, 0, 123)],
  ])('should parse %s', (text, expected) => {
    expect(parseDateTime(text)).toBe(expected);
  });

  it.each(['2024-03-01', '2024-03-01T12:00:00', 'bjensen', '2024-13-45T99:00:00Z'])(
    'should reject %s',
    (text) => {
      expect(isDateTime(text)).toBe(false);
    }
  );

  it.each([
    ['2024-03-01T12:00:00.0001Z', '2024-03-01T12:00:00.0009Z', -1],
    ['2024-03-01T12:00:00.12345Z', '2024-03-01T12:00:00.1234Z', 1],
    ['2024-03-01T12:00:00.5Z', '2024-03-01T12:00:00.500000Z', 0],
    ['2024-03-01T12:00:01Z', '2024-03-01T12:00:00.9999Z', 1],
  ])('should order %s against %s as %d', (a, b, expected) => {
    expect(compareDateTimes(a, b)).toBe(expected);
  });

  it('should not order values that are not dateTimes', () => {
    expect(compareDateTimes('2024-03-01T12:00:00Z', 'bjensen')).toBeUndefined();
  });

  it('should format dates in UTC', () => {
    expect(formatDateTime(new Date(Date.UTC(2024, 2, 1, 12)))).toBe('2024-03-01T12:00:00.000Z');
  });
});
