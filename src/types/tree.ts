/**
 * A single step from a container to one of its children.
 * - `string` segments address map keys (e.g. `"items"`, `"name"`)
 * - `number` segments address sequence indices (e.g. `0`, `1`)
 */
export type PathSegment = string | number;

/**
 * The address of a node: the ordered segments from the root to the node.
 * The empty path addresses the root itself.
 */
export type TreePath = readonly PathSegment[];

/**
 * A key-value container as produced by `JSON.parse` (a plain object).
 */
export type TreeMap = Record<string, unknown>;

/**
 * An ordered container as produced by `JSON.parse` (an array).
 */
export type TreeSequence = readonly unknown[];

/**
 * The closed set of node kinds the walker distinguishes.
 *
 * Everything that is neither a plain object nor an array (strings, numbers,
 * booleans, `null`, and any foreign value a caller may have put into the
 * tree) is treated as an opaque scalar.
 */
export type TreeNode =
  | { readonly kind: 'map'; readonly value: TreeMap }
  | { readonly kind: 'sequence'; readonly value: TreeSequence }
  | { readonly kind: 'scalar'; readonly value: unknown };

export type TreeNodeKind = TreeNode['kind'];

/**
 * The value of a pool element's identifier field.
 *
 * Opaque and compared with strict equality, so `1` and `"1"` are different
 * identifiers.
 */
export type Identifier = string | number;
