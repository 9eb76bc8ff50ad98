/**
 * Entry value model
 *
 * Values stored in an entry's body, resource and attributes trees.
 * Closed over the JSON shapes so every traversal can branch on a
 * plain-object test instead of a runtime type assertion.
 */

/**
 * Scalar leaf value
 */
export type ValuePrimitive = string | number | boolean | null;

/**
 * Any value that may appear inside an entry tree
 */
export type Value = ValuePrimitive | Value[] | ValueMap;

/**
 * Mapping of string keys to values
 */
export type ValueMap = { [key: string]: Value };

/**
 * Check if a value is a mapping (plain object, not an array or class instance)
 *
 * A plain object has prototype of Object.prototype or null.
 */
export function isValueMap(value: Value | undefined): value is ValueMap {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Own-property lookup; inherited members such as `toString` are never keys.
 */
export function getKey(map: ValueMap, key: string): Value | undefined {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
}

export function hasKey(map: ValueMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * Write a key as an own enumerable property.
 *
 * `__proto__` goes through defineProperty so it lands as data rather
 * than replacing the prototype of the map.
 */
export function putKey(map: ValueMap, key: string, value: Value): void {
  if (key === '__proto__') {
    Object.defineProperty(map, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
    return;
  }
  map[key] = value;
}

/**
 * One-level merge: incoming keys overwrite, existing-only keys are kept.
 */
export function mergeInto(target: ValueMap, incoming: ValueMap): void {
  for (const [key, value] of Object.entries(incoming)) {
    putKey(target, key, value);
  }
}

/**
 * Deep copy of a value tree
 */
export function cloneValue<T extends Value>(value: T): T;
export function cloneValue(value: Value): Value {
  if (Array.isArray(value)) {
    return value.map((item) => cloneValue(item));
  }
  if (isValueMap(value)) {
    const copy: ValueMap = {};
    for (const [key, item] of Object.entries(value)) {
      putKey(copy, key, cloneValue(item));
    }
    return copy;
  }
  return value;
}
