import type { TreePath } from '../types';

/**
 * Canonical path keys
 * -------------------
 * Removal planning and removal application must agree on a comparable key
 * for a logical {@link TreePath} (e.g. `["items", 0, "id"]`) so that
 * removals can be grouped per pool sequence in a `Map`.
 *
 * `JSON.stringify` is used as the encoding. It keeps `"0"` (a map key) and
 * `0` (a sequence index) apart, which a dotted join would not. Paths built by
 * the walker only ever contain strings and array indices, so the non-finite
 * number edge cases of JSON never arise.
 */

/**
 * Produces the canonical key used for Map/Set lookups.
 *
 * @param path
 *   The logical path to stringify.
 * @returns
 *   A stable string key for indexing.
 */
export function stringifyPropertyPath(path: TreePath): string {
  return JSON.stringify(path);
}
