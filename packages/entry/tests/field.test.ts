/**
 * Field value semantics: immutability, equality and text form
 */

import { describe, it, expect } from 'vitest';
import { Field, attributeField, bodyField, parseField, resourceField } from '../src';

describe('Field', () => {
  it('should be frozen', () => {
    const field = resourceField('a', 'b');
    expect(Object.isFrozen(field)).toBe(true);
    expect(Object.isFrozen(field.keys)).toBe(true);
  });

  it('should not share the key array it was built from', () => {
    const keys = ['a'];
    const field = new Field('resource', keys);
    keys.push('b');
    expect(field.keys).toEqual(['a']);
  });

  it('should compare by kind and keys', () => {
    expect(resourceField('a').equals(resourceField('a'))).toBe(true);
    expect(resourceField('a').equals(attributeField('a'))).toBe(false);
    expect(resourceField('a').equals(resourceField('a', 'b'))).toBe(false);
  });

  it('should expose the last key', () => {
    expect(bodyField('a', 'b').lastKey()).toBe('b');
    expect(bodyField().lastKey()).toBeUndefined();
  });

  it('should leave the receiver intact when deriving fields', () => {
    const field = resourceField('a', 'b');
    field.parent();
    field.child('c');
    expect(field.keys).toEqual(['a', 'b']);
  });
});

describe('Field text form', () => {
  it('should render plain keys with dots', () => {
    expect(resourceField().toString()).toBe('resource');
    expect(resourceField('a', 'b').toString()).toBe('resource.a.b');
  });

  it('should bracket keys holding delimiters', () => {
    expect(resourceField('k8s.pod.name').toString()).toBe("resource['k8s.pod.name']");
    expect(attributeField("it's").toString()).toBe(`attributes["it's"]`);
    expect(bodyField('').toString()).toBe("body['']");
    expect(bodyField('a', 'b[0]').toString()).toBe("body.a['b[0]']");
  });

  it('should serialize to its text form in JSON', () => {
    expect(JSON.stringify({ field: resourceField('host', 'k8s.pod') })).toBe(
      `{"field":"resource.host['k8s.pod']"}`
    );
  });

  it('should re-parse to an equal field', () => {
    const field = attributeField('http', 'k8s.pod', "it's", '');
    expect(parseField(field.toString()).equals(field)).toBe(true);
  });
});
