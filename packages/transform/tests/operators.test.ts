/**
 * Operator Tests
 */

import { describe, it, expect } from 'vitest';
import { Entry, attributeField, bodyField } from '@logpipe/entry';
import { createOperator, validatePipelineConfig, OperatorError, type Operator } from '../src';

function operator(config: Record<string, unknown>, index = 0): Operator {
  const [parsed] = validatePipelineConfig({ operators: [config] }).operators;
  return createOperator(parsed, index);
}

function errorOf(op: Operator, entry: Entry): OperatorError {
  const result = op.apply(entry);
  if (result.ok || !(result.error instanceof OperatorError)) {
    throw new Error('expected an OperatorError');
  }
  return result.error;
}

describe('createOperator', () => {
  it('should default the id to type and position', () => {
    expect(operator({ type: 'remove', field: 'body' }, 3).id).toBe('remove_3');
    expect(operator({ type: 'remove', field: 'body', id: 'strip' }, 3).id).toBe('strip');
  });
});

describe('add', () => {
  it('should set the configured value', () => {
    const entry = new Entry();
    expect(operator({ type: 'add', field: 'attributes.env', value: 'prod' }).apply(entry)).toEqual({
      ok: true,
    });
    expect(entry.attributes).toEqual({ env: 'prod' });
  });

  it('should give every entry its own copy of the value', () => {
    const add = operator({ type: 'add', field: 'attributes.meta', value: { tags: ['a'] } });
    const first = new Entry();
    const second = new Entry();

    add.apply(first);
    attributeField('meta', 'tags').set(first, 'changed');
    add.apply(second);

    expect(second.attributes).toEqual({ meta: { tags: ['a'] } });
  });

  it('should fail when the path is blocked', () => {
    const error = errorOf(
      operator({ type: 'add', field: 'body.key', value: 1 }),
      new Entry({ body: 'plain text' })
    );
    expect(error.message).toBe(
      'add body.key: cannot traverse body: root holds a non-mapping value'
    );
    expect(error.operatorId).toBe('add_0');
  });
});

describe('remove', () => {
  it('should delete the field', () => {
    const entry = new Entry({ resource: { host: 'node-a', region: 'eu' } });
    operator({ type: 'remove', field: 'resource.host' }).apply(entry);
    expect(entry.resource).toEqual({ region: 'eu' });
  });

  it('should succeed when the field is missing', () => {
    const entry = new Entry({ resource: { region: 'eu' } });
    expect(operator({ type: 'remove', field: 'resource.host' }).apply(entry)).toEqual({ ok: true });
    expect(entry.resource).toEqual({ region: 'eu' });
  });
});

describe('move', () => {
  it('should move a value between roots', () => {
    const entry = new Entry({ body: { message: 'hi', other: 1 } });
    operator({ type: 'move', from: 'body.message', to: 'attributes.message' }).apply(entry);

    expect(entry.body).toEqual({ other: 1 });
    expect(entry.attributes).toEqual({ message: 'hi' });
  });

  it('should fail when the source is missing', () => {
    const error = errorOf(
      operator({ type: 'move', from: 'body.message', to: 'attributes.message' }),
      new Entry({ body: {} })
    );
    expect(error.message).toBe('move: field does not exist: body.message');
  });

  it('should restore the source when the write fails', () => {
    const entry = new Entry({ body: { message: 'hi' }, resource: { a: 1 } });
    const error = errorOf(operator({ type: 'move', from: 'body.message', to: 'resource' }), entry);

    expect(error.message).toBe(
      'move body.message to resource: cannot set resource root to a non-mapping value'
    );
    expect(entry.body).toEqual({ message: 'hi' });
    expect(entry.resource).toEqual({ a: 1 });
  });
});

describe('copy', () => {
  it('should copy a value and keep the source', () => {
    const entry = new Entry({ resource: { 'host.name': 'node-a' } });
    operator({ type: 'copy', from: "resource['host.name']", to: 'attributes.host' }).apply(entry);

    expect(entry.resource).toEqual({ 'host.name': 'node-a' });
    expect(entry.attributes).toEqual({ host: 'node-a' });
  });

  it('should copy deeply', () => {
    const entry = new Entry({ body: { meta: { a: 1 } } });
    operator({ type: 'copy', from: 'body.meta', to: 'attributes.meta' }).apply(entry);
    attributeField('meta', 'a').set(entry, 2);

    expect(entry.body).toEqual({ meta: { a: 1 } });
    expect(entry.attributes).toEqual({ meta: { a: 2 } });
  });

  it('should fail when the source is missing', () => {
    const error = errorOf(
      operator({ type: 'copy', from: 'body.meta', to: 'attributes.meta' }),
      new Entry()
    );
    expect(error.message).toBe('copy: field does not exist: body.meta');
  });
});

describe('retain', () => {
  it('should keep only the listed fields of the named roots', () => {
    const entry = new Entry({
      resource: { 'service.name': 'api', 'host.name': 'node-a' },
      attributes: { keep: 1, drop: 2 },
      body: 'text',
    });
    operator({
      type: 'retain',
      fields: ["resource['service.name']", 'attributes.keep'],
    }).apply(entry);

    expect(entry.resource).toEqual({ 'service.name': 'api' });
    expect(entry.attributes).toEqual({ keep: 1 });
    expect(entry.body).toBe('text');
  });

  it('should keep nested fields under their parents', () => {
    const entry = new Entry({ attributes: { http: { method: 'GET', url: '/x' }, other: true } });
    operator({ type: 'retain', fields: ['attributes.http.method'] }).apply(entry);
    expect(entry.attributes).toEqual({ http: { method: 'GET' } });
  });

  it('should keep a whole root when the root itself is listed', () => {
    const entry = new Entry({ attributes: { a: 1, b: 2 } });
    operator({ type: 'retain', fields: ['attributes', 'attributes.a'] }).apply(entry);
    expect(entry.attributes).toEqual({ a: 1, b: 2 });
  });

  it('should clear a root when none of its listed fields exist', () => {
    const entry = new Entry({ resource: { a: 1 } });
    operator({ type: 'retain', fields: ['resource.missing'] }).apply(entry);
    expect(entry.resource).toBeUndefined();
  });
});

describe('flatten', () => {
  it('should lift nested keys into the parent', () => {
    const entry = new Entry({ body: { nested: { a: 1, b: { c: 2 } }, top: 0 } });
    operator({ type: 'flatten', field: 'body.nested' }).apply(entry);
    expect(entry.body).toEqual({ top: 0, a: 1, b: { c: 2 } });
  });

  it('should fail on a non-mapping field', () => {
    const entry = new Entry({ body: { nested: 'x' } });
    const error = errorOf(operator({ type: 'flatten', field: 'body.nested' }), entry);

    expect(error.message).toBe('flatten: field is not a mapping: body.nested');
    expect(bodyField('nested').get(entry)).toEqual({ found: true, value: 'x' });
  });

  it('should fail on a missing field', () => {
    const error = errorOf(operator({ type: 'flatten', field: 'body.nested' }), new Entry());
    expect(error.message).toBe('flatten: field does not exist: body.nested');
  });
});
