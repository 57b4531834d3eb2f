import { hasArrayIndex, isArray, isPlainObject } from '../guards';
import type { PathSegment, TreePath } from '../types';

export const TRAVERSE_MISSING = Symbol('orphan-sweep.traverse.missing');

/**
 * Performs a single, guarded traversal step into a container value.
 *
 * Traversal rules:
 * 1. Arrays: the segment must be a numeric index that exists on the array.
 * 2. Objects: the segment must be an own property key.
 * 3. Everything else: not traversable.
 *
 * @param current
 *   The current container value to traverse into.
 * @param key
 *   The next path segment (array index or object key).
 * @returns
 *   The value at `current[key]`, or `TRAVERSE_MISSING` if the step is invalid.
 */
export function traverseStep(
  current: unknown,
  key: PathSegment
): unknown | typeof TRAVERSE_MISSING {
  // 1. Arrays
  if (isArray(current)) {
    if (!hasArrayIndex(current, key)) return TRAVERSE_MISSING;
    return current[key];
  }

  // 2. Objects
  if (isPlainObject(current)) {
    if (typeof key !== 'string' || !Object.hasOwn(current, key)) {
      return TRAVERSE_MISSING;
    }
    return current[key];
  }

  // 3. Not traversable
  return TRAVERSE_MISSING;
}

/**
 * Formats a path as a human-readable dotted string.
 *
 * Example:
 * - `["items", 1, "id"]` -> `"items.1.id"`
 * - `[]`                 -> `"<root>"`
 */
export function formatPathForDisplay(path: TreePath): string {
  if (path.length === 0) return '<root>';
  return path.join('.');
}
