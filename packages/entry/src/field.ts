/**
 * Field - an immutable address into one of an entry's sub-trees
 *
 * A field is a root kind plus an ordered list of keys. Fields are parsed
 * once from configuration and then shared by every entry an operator
 * sees, so instances are frozen and every method is free of side effects
 * on the field itself.
 *
 * @packageDocumentation
 */

import type { Entry } from './entry';
import {
  deleteValue,
  getValue,
  mergeValues,
  setValue,
  type FieldLookup,
  type FieldResult,
  type RootSlot,
} from './mutator';
import { formatSegment } from './parser';
import { isValueMap, type Value, type ValueMap } from './value';

/**
 * Root kinds, in the order they are tried when a path names none explicitly
 */
export const ROOT_KINDS = ['resource', 'attributes', 'body'] as const;

export type RootKind = (typeof ROOT_KINDS)[number];

export function isRootKind(value: string): value is RootKind {
  return ROOT_KINDS.some((kind) => kind === value);
}

/**
 * How a root kind reads and replaces its sub-tree on an entry
 */
interface RootAccessor {
  read(entry: Entry): Value | undefined;
  write(entry: Entry, value: Value | undefined): boolean;
}

const ROOT_ACCESSORS: Record<RootKind, RootAccessor> = {
  resource: {
    read: (entry) => entry.resource,
    write: (entry, value) => {
      if (value !== undefined && !isValueMap(value)) {
        return false;
      }
      entry.resource = value;
      return true;
    },
  },
  attributes: {
    read: (entry) => entry.attributes,
    write: (entry, value) => {
      if (value !== undefined && !isValueMap(value)) {
        return false;
      }
      entry.attributes = value;
      return true;
    },
  },
  body: {
    read: (entry) => entry.body,
    write: (entry, value) => {
      entry.body = value;
      return true;
    },
  },
};

function rootSlot(kind: RootKind, entry: Entry): RootSlot {
  const accessor = ROOT_ACCESSORS[kind];
  return {
    name: kind,
    read: () => accessor.read(entry),
    write: (value) => accessor.write(entry, value),
  };
}

export class Field<K extends RootKind = RootKind> {
  readonly kind: K;
  readonly keys: readonly string[];

  constructor(kind: K, keys: readonly string[] = []) {
    this.kind = kind;
    this.keys = Object.freeze([...keys]);
    Object.freeze(this);
  }

  isRoot(): boolean {
    return this.keys.length === 0;
  }

  /**
   * Last key segment, `undefined` for a root field
   */
  lastKey(): string | undefined {
    return this.keys[this.keys.length - 1];
  }

  /**
   * Field with the last key removed. A root field is its own parent.
   */
  parent(): Field<K> {
    if (this.isRoot()) {
      return this;
    }
    return new Field(this.kind, this.keys.slice(0, -1));
  }

  child(key: string): Field<K> {
    return new Field(this.kind, [...this.keys, key]);
  }

  equals(other: Field): boolean {
    return (
      this.kind === other.kind &&
      this.keys.length === other.keys.length &&
      this.keys.every((key, i) => key === other.keys[i])
    );
  }

  get(entry: Entry): FieldLookup {
    return getValue(rootSlot(this.kind, entry), this.keys);
  }

  /**
   * Write a value, creating missing intermediate mappings.
   *
   * A mapping written over a mapping is merged one level deep.
   */
  set(entry: Entry, value: Value): FieldResult {
    return setValue(rootSlot(this.kind, entry), this.keys, value);
  }

  /**
   * Remove the value; on a root field, clear the whole sub-tree.
   */
  delete(entry: Entry): FieldLookup {
    return deleteValue(rootSlot(this.kind, entry), this.keys);
  }

  /**
   * Best-effort merge. A path blocked by a non-mapping value is left as is.
   */
  merge(entry: Entry, values: ValueMap): void {
    mergeValues(rootSlot(this.kind, entry), this.keys, values);
  }

  toString(): string {
    return this.kind + this.keys.map(formatSegment).join('');
  }

  toJSON(): string {
    return this.toString();
  }
}

export type ResourceField = Field<'resource'>;
export type AttributeField = Field<'attributes'>;
export type BodyField = Field<'body'>;

export function resourceField(...keys: string[]): ResourceField {
  return new Field('resource', keys);
}

export function attributeField(...keys: string[]): AttributeField {
  return new Field('attributes', keys);
}

export function bodyField(...keys: string[]): BodyField {
  return new Field('body', keys);
}

export function rootField<K extends RootKind>(kind: K): Field<K> {
  return new Field(kind);
}
