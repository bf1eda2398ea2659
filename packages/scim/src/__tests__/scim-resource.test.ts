/**
 * Generic SCIM Resource Tests
 */

import { describe, it, expect } from 'vitest';
import { GenericScimResource } from '../utils/scim-resource';
import { ScimParser } from '../utils/scim-parser';
import { Paths } from '../utils/scim-path';
import type { JsonObject } from '../types/json';
import { SCIM_SCHEMAS } from '../types/scim';

function createUser(): JsonObject {
  return {
    schemas: [SCIM_SCHEMAS.USER],
    userName: 'bjensen',
    name: { givenName: 'Barbara', familyName: 'Jensen' },
    emails: [
      { value: 'bjensen@example.com', type: 'work' },
      { value: 'babs@example.org', type: 'home' },
    ],
    meta: { lastModified: '2024-03-01T12:00:00+09:00' },
  };
}

describe('GenericScimResource', () => {
  it('should read single values', () => {
    const resource = new GenericScimResource(createUser());
    expect(resource.getValue('name.givenName')).toBe('Barbara');
    expect(resource.getStringValue('userName')).toBe('bjensen');
    expect(resource.getValue('nickName')).toBeUndefined();
  });

  it('should flatten multi-valued attributes', () => {
    const resource = new GenericScimResource(createUser());
    expect(resource.getStringValues('emails.value')).toEqual(['bjensen@example.com', 'babs@example.org']);
    expect(resource.getValues('emails')).toHaveLength(2);
  });

  it('should read dateTime values as dates', () => {
    const resource = new GenericScimResource(createUser());
    expect(resource.getDateValue('meta.lastModified')?.toISOString()).toBe('2024-03-01T03:00:00.000Z');
    expect(resource.getDateValue('userName')).toBeUndefined();
  });

  it('should replace values', () => {
    const resource = new GenericScimResource(createUser());
    resource.replaceValue('emails[type eq "work"].value', 'work@example.com').replaceValue('title', 'Tour Guide');

    expect(resource.getStringValues('emails.value')).toEqual(['work@example.com', 'babs@example.org']);
    expect(resource.getStringValue('title')).toBe('Tour Guide');
  });

  it('should remove a value replaced with null', () => {
    const resource = new GenericScimResource(createUser());
    resource.replaceValue('name.familyName', null);
    expect(resource.getValue('name')).toEqual({ givenName: 'Barbara' });
  });

  it('should add values to multi-valued attributes', () => {
    const resource = new GenericScimResource(createUser());
    resource.addValues('emails', [{ value: 'other@example.com', type: 'other' }]).addValues('roles', []);

    expect(resource.getStringValues('emails.type')).toEqual(['work', 'home', 'other']);
    expect(resource.getValue('roles')).toBeUndefined();
  });

  it('should report whether a removal found anything', () => {
    const resource = new GenericScimResource(createUser());
    expect(resource.removeValues('emails[type eq "home"]')).toBe(true);
    expect(resource.removeValues('emails[type eq "home"]')).toBe(false);
    expect(resource.getStringValues('emails.type')).toEqual(['work']);
  });

  it('should maintain schemas for extension attributes', () => {
    const resource = new GenericScimResource(createUser());
    resource.replaceValue(`${SCIM_SCHEMAS.ENTERPRISE_USER}:employeeNumber`, '701984');

    expect(resource.getSchemaUrns()).toEqual([SCIM_SCHEMAS.USER, SCIM_SCHEMAS.ENTERPRISE_USER]);
    expect(resource.getValue(Paths.root(SCIM_SCHEMAS.ENTERPRISE_USER))).toEqual({ employeeNumber: '701984' });
  });

  it('should use the given parser', () => {
    const resource = new GenericScimResource(
      { 'urn:example:ext:Counters': { '#logins': 3 } },
      { parser: new ScimParser({ extendedAttributeNameCharacters: ['#'] }) }
    );
    expect(resource.getValue('urn:example:ext:Counters:#logins')).toBe(3);
  });

  it('should hand out its tree and accept a new one', () => {
    const resource = new GenericScimResource();
    expect(resource.getObjectNode()).toEqual({});

    resource.setObjectNode(createUser());
    expect(resource.getStringValue('userName')).toBe('bjensen');
  });

  it('should serialize a copy of its tree', () => {
    const node = createUser();
    const json = new GenericScimResource(node).toJSON();

    expect(json).toEqual(node);
    expect(json).not.toBe(node);
  });
});
