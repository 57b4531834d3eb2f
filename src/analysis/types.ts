import type {
  Diagnostic,
  Identifier,
  ResolvedPool,
  TreeMap,
  TreePath
} from '../types';

/**
 * One element of a pool sequence, as found in the input.
 */
export type PoolEntry = {
  readonly pool: string;
  readonly identifier: Identifier;

  /**
   * Path of the element (`sequencePath` followed by `index`).
   */
  readonly path: TreePath;
  readonly sequencePath: TreePath;
  readonly index: number;

  /**
   * The element itself (shared with the input tree, never mutated).
   */
  readonly value: TreeMap;
};

/**
 * A vertex of the reference graph: everything one identifier of one pool
 * stands for.
 *
 * Normally a single entry. Under `duplicateIdentifier: 'merge'` all entries
 * sharing the identifier are collected here and share one fate.
 */
export type PoolNode = {
  readonly pool: string;
  readonly identifier: Identifier;
  readonly entries: PoolEntry[];
};

/**
 * Identifier index of one pool declaration.
 */
export type PoolIndex = {
  readonly pool: ResolvedPool;

  /**
   * Lookup used by reference resolution (no per-edge scans).
   */
  readonly nodes: Map<Identifier, PoolNode>;

  /**
   * Every indexed entry, in document order.
   */
  readonly entries: PoolEntry[];
};

/**
 * The source side of a reference edge.
 *
 * - `anchor`: the reference sits under an anchor location (configured, the
 *   implicit root, or an unindexed pool element, which can never be removed).
 * - `element`: the reference sits inside a pool element; it only counts once
 *   that element is itself reachable.
 */
export type EdgeOwner =
  | { readonly kind: 'anchor'; readonly anchor: string; readonly path: TreePath }
  | { readonly kind: 'element'; readonly node: PoolNode };

/**
 * A directed `owner -> identifier` relation discovered at a reference field.
 */
export type ReferenceEdge = {
  readonly owner: EdgeOwner;
  readonly identifier: Identifier;

  /**
   * The configured reference field the identifier was read from.
   */
  readonly field: string;

  /**
   * Path of the identifier value itself (e.g.
   * `["importantOtherDict", "useConfigsname", 0, "sourceName"]`).
   */
  readonly path: TreePath;
  readonly targetPools: readonly string[];
};

/**
 * A pool element held in place by an anchor pattern matching the element or
 * a location inside it.
 */
export type AnchorPin = {
  readonly node: PoolNode;
  readonly anchor: string;
  readonly path: TreePath;
};

/**
 * Everything the single analysis pass learns about a tree.
 */
export type TreeAnalysis = {
  readonly pools: ReadonlyMap<string, PoolIndex>;
  readonly edges: readonly ReferenceEdge[];
  readonly pins: readonly AnchorPin[];
  readonly diagnostics: readonly Diagnostic[];
};
