/**
 * Entry - one telemetry event flowing through the pipeline
 *
 * Created once per ingested event, mutated in place by each operator in
 * turn and handed to the exporter at the end. An entry is owned by one
 * stage at a time and is never mutated concurrently.
 */

import type { Field } from './field';
import type { FieldLookup, FieldResult } from './mutator';
import { cloneValue, putKey, type Value, type ValueMap } from './value';

export interface EntryInit {
  timestamp?: Date;
  observedTimestamp?: Date;
  body?: Value;
  resource?: ValueMap;
  attributes?: ValueMap;
}

export class Entry {
  timestamp: Date;
  observedTimestamp: Date;
  body: Value | undefined;
  resource: ValueMap | undefined;
  attributes: ValueMap | undefined;

  constructor(init: EntryInit = {}) {
    const now = new Date();
    this.timestamp = init.timestamp ?? now;
    this.observedTimestamp = init.observedTimestamp ?? now;
    this.body = init.body;
    this.resource = init.resource;
    this.attributes = init.attributes;
  }

  get(field: Field): FieldLookup {
    return field.get(this);
  }

  set(field: Field, value: Value): FieldResult {
    return field.set(this, value);
  }

  delete(field: Field): FieldLookup {
    return field.delete(this);
  }

  merge(field: Field, values: ValueMap): void {
    field.merge(this, values);
  }

  addAttribute(key: string, value: Value): void {
    this.attributes ??= {};
    putKey(this.attributes, key, value);
  }

  addResourceKey(key: string, value: Value): void {
    this.resource ??= {};
    putKey(this.resource, key, value);
  }

  /**
   * Deep copy; the copy shares no mutable state with this entry.
   */
  copy(): Entry {
    return new Entry({
      timestamp: new Date(this.timestamp.getTime()),
      observedTimestamp: new Date(this.observedTimestamp.getTime()),
      body: this.body === undefined ? undefined : cloneValue(this.body),
      resource: this.resource === undefined ? undefined : cloneValue(this.resource),
      attributes: this.attributes === undefined ? undefined : cloneValue(this.attributes),
    });
  }
}
