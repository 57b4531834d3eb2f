import type { Identifier, ResolvedConfig } from './types';

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Checks whether a path segment is a valid, existing array index.
 *
 * Guarantees:
 * 1. Numeric-only indexing
 *    - Sequence path segments must be numbers.
 *    - Prevents treating array object properties (e.g. "length", "map")
 *      as traversable path segments.
 *
 * 2. Property existence (not value inspection)
 *    - Checks whether the index exists on the array, regardless of the stored
 *      value, so `undefined` elements are still "present".
 *
 * 3. Own-property only
 *    - Uses `Object.hasOwn(arr, key)` rather than `key in arr`, which would
 *      consult the prototype chain.
 *
 * @param arr
 *   Array instance to check.
 * @param key
 *   Candidate path segment.
 * @returns
 *   `true` if `key` is a number and that index exists as an own property on
 *   `arr`. When `true`, TypeScript narrows `key` to `number`.
 */
export function hasArrayIndex<T>(
  arr: readonly T[],
  key: string | number
): key is number {
  return typeof key === 'number' && Object.hasOwn(arr, key);
}

/**
 * Determines whether a value is a "plain object" (a map in tree terms).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either `Object.prototype` (object literals and
 *    `JSON.parse` output) or `null` (`Object.create(null)`).
 *
 * Arrays, Dates, Maps, class instances and other host objects are therefore
 * scalars to the walker: they are never descended into and never pruned.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful
 *   check. Compile-time hint only.
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<string, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Checks whether a value can serve as an identifier.
 *
 * Accepted:
 * - non-empty strings
 * - finite numbers, integers only within the safe integer range
 *
 * Everything else is rejected, including `""`, `NaN`, `Infinity` and
 * `2 ** 53`. An empty string never addresses an element.
 */
export function isIdentifier(value: unknown): value is Identifier {
  if (typeof value === 'string') return value.length > 0;
  return typeof value === 'number' && Number.isFinite(value) && !isUnsafeInteger(value);
}

/**
 * Integers beyond `Number.MAX_SAFE_INTEGER` in magnitude. Parsing rounds
 * them, so distinct identifiers in the source text can compare equal.
 */
export function isUnsafeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && !Number.isSafeInteger(value);
}

/**
 * Distinguishes an already resolved configuration from raw user input.
 *
 * `resolveConfig` freezes its output; parsed JSON is never frozen, so a
 * document that merely spells `"resolved": true` is still validated.
 */
export function isResolvedConfig(value: unknown): value is ResolvedConfig {
  return isPlainObject(value) && Object.isFrozen(value) && value.resolved === true;
}
