/**
 * Tree mutator
 *
 * Get, set, delete and merge against one entry sub-tree, addressed by a
 * list of keys. The sub-tree is reached through a `RootSlot`, so the same
 * algorithm serves the resource, attributes and body roots.
 */

import { FieldWriteError } from './errors';
import { getKey, hasKey, isValueMap, mergeInto, putKey, type Value, type ValueMap } from './value';

/**
 * Read/write handle on one entry sub-tree
 */
export interface RootSlot {
  /** Sub-tree name used in error messages */
  readonly name: string;

  /** Current sub-tree, `undefined` when uninitialized */
  read(): Value | undefined;

  /**
   * Replace the sub-tree.
   *
   * Returns false, leaving the sub-tree untouched, when the root cannot
   * hold the value (mapping-typed roots only take mappings).
   */
  write(value: Value | undefined): boolean;
}

/**
 * Lookup result: a stored value, or a clean "not found" with no payload
 */
export type FieldLookup = { found: true; value: Value } | { found: false };

export type FieldResult = { ok: true } | { ok: false; error: FieldWriteError };

type ContainerResult = { ok: true; container: ValueMap } | { ok: false; error: FieldWriteError };

const NOT_FOUND: FieldLookup = Object.freeze({ found: false });
const OK: FieldResult = Object.freeze({ ok: true });

/**
 * Walk to the mapping holding `keys`, without creating anything.
 */
function findContainer(slot: RootSlot, keys: readonly string[]): ValueMap | undefined {
  let current = slot.read();
  for (const key of keys) {
    if (!isValueMap(current)) {
      return undefined;
    }
    current = getKey(current, key);
  }
  return isValueMap(current) ? current : undefined;
}

/**
 * Walk to the mapping holding `keys`, creating empty mappings for
 * missing segments. An existing non-mapping value on the way blocks
 * the path; it is never overwritten.
 */
function ensureContainer(slot: RootSlot, keys: readonly string[]): ContainerResult {
  let root = slot.read();
  if (root === undefined) {
    root = {};
    slot.write(root);
  }
  if (!isValueMap(root)) {
    return {
      ok: false,
      error: new FieldWriteError(
        'E_FIELD_PATH_BLOCKED',
        `cannot traverse ${slot.name}: root holds a non-mapping value`,
        keys
      ),
    };
  }

  let container = root;
  for (let i = 0; i < keys.length; i++) {
    const key = keys[i];
    const next = getKey(container, key);
    if (next === undefined) {
      const created: ValueMap = {};
      putKey(container, key, created);
      container = created;
      continue;
    }
    if (!isValueMap(next)) {
      const blockedAt = keys.slice(0, i + 1);
      return {
        ok: false,
        error: new FieldWriteError(
          'E_FIELD_PATH_BLOCKED',
          `cannot traverse ${slot.name}: non-mapping value at [${blockedAt.join(', ')}]`,
          keys
        ),
      };
    }
    container = next;
  }
  return { ok: true, container };
}

/**
 * Mapping onto mapping merges one level; anything else replaces.
 * Incoming mappings are always copied, never aliased.
 */
function writeAt(container: ValueMap, key: string, value: Value): void {
  const current = getKey(container, key);
  if (isValueMap(value)) {
    if (isValueMap(current)) {
      mergeInto(current, value);
      return;
    }
    const copy: ValueMap = {};
    mergeInto(copy, value);
    putKey(container, key, copy);
    return;
  }
  putKey(container, key, value);
}

export function getValue(slot: RootSlot, keys: readonly string[]): FieldLookup {
  if (keys.length === 0) {
    const root = slot.read();
    return root === undefined ? NOT_FOUND : { found: true, value: root };
  }
  const container = findContainer(slot, keys.slice(0, -1));
  const last = keys[keys.length - 1];
  if (container === undefined || !hasKey(container, last)) {
    return NOT_FOUND;
  }
  return { found: true, value: container[last] };
}

export function setValue(slot: RootSlot, keys: readonly string[], value: Value): FieldResult {
  if (keys.length === 0) {
    const root = slot.read();
    if (isValueMap(root) && isValueMap(value)) {
      mergeInto(root, value);
      return OK;
    }
    const next = isValueMap(value) ? { ...value } : value;
    if (!slot.write(next)) {
      return {
        ok: false,
        error: new FieldWriteError(
          'E_FIELD_ROOT_REPLACE',
          `cannot set ${slot.name} root to a non-mapping value`,
          keys
        ),
      };
    }
    return OK;
  }

  const parent = ensureContainer(slot, keys.slice(0, -1));
  if (!parent.ok) {
    return parent;
  }
  writeAt(parent.container, keys[keys.length - 1], value);
  return OK;
}

export function deleteValue(slot: RootSlot, keys: readonly string[]): FieldLookup {
  if (keys.length === 0) {
    const root = slot.read();
    if (root === undefined) {
      return NOT_FOUND;
    }
    slot.write(undefined);
    return { found: true, value: root };
  }
  const container = findContainer(slot, keys.slice(0, -1));
  const last = keys[keys.length - 1];
  if (container === undefined || !hasKey(container, last)) {
    return NOT_FOUND;
  }
  const removed = container[last];
  delete container[last];
  return { found: true, value: removed };
}

/**
 * Merge `values` into the mapping at `keys`, installing a copy when the
 * target is absent or not a mapping. Returns false when a non-mapping
 * intermediate blocks the path; the tree is then left as it was.
 */
export function mergeValues(slot: RootSlot, keys: readonly string[], values: ValueMap): boolean {
  if (keys.length === 0) {
    const root = slot.read();
    if (isValueMap(root)) {
      mergeInto(root, values);
      return true;
    }
    return slot.write({ ...values });
  }

  const parent = ensureContainer(slot, keys.slice(0, -1));
  if (!parent.ok) {
    return false;
  }
  writeAt(parent.container, keys[keys.length - 1], values);
  return true;
}
