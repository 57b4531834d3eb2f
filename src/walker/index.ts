import type { PathSegment, TreeNode, TreePath } from '../types';
import { isArray, isPlainObject } from '../guards';

/**
 * Returned by a visitor to keep the walker out of the current node's
 * children.
 */
export const SKIP_CHILDREN = Symbol('orphan-sweep.walk.skip-children');

/**
 * Wraps a raw value into the tagged node variant the walker dispatches on.
 *
 * Classification:
 * 1. Arrays -> `sequence`
 * 2. Plain objects (see {@link isPlainObject}) -> `map`
 * 3. Everything else -> `scalar`
 */
export function classifyValue(value: unknown): TreeNode {
  if (isArray(value)) return { kind: 'sequence', value };
  if (isPlainObject(value)) return { kind: 'map', value };
  return { kind: 'scalar', value };
}

/**
 * The position of a node in the containment tree.
 *
 * Locations form a parent-linked chain, so descending one level costs a
 * single allocation regardless of depth. The materialized path is only
 * built on demand (diagnostics, pool entries), which keeps a walk linear in
 * the number of nodes.
 */
export class TreeLocation {
  readonly parent: TreeLocation | undefined;
  readonly segment: PathSegment | undefined;
  readonly depth: number;

  private constructor(
    parent: TreeLocation | undefined,
    segment: PathSegment | undefined
  ) {
    this.parent = parent;
    this.segment = segment;
    this.depth = parent ? parent.depth + 1 : 0;
  }

  static root(): TreeLocation {
    return new TreeLocation(undefined, undefined);
  }

  child(segment: PathSegment): TreeLocation {
    return new TreeLocation(this, segment);
  }

  toPath(): TreePath {
    const segments: PathSegment[] = [];
    let current: TreeLocation = this;
    while (current.parent !== undefined && current.segment !== undefined) {
      segments.push(current.segment);
      current = current.parent;
    }
    return segments.reverse();
  }
}

/**
 * Everything a visitor learns about the node being visited.
 *
 * @template S
 *   Per-branch state. `state` is whatever the parent's visit returned (or the
 *   initial state for the root), which lets visitors thread context such as
 *   "nearest enclosing pool element" down the tree without a side stack.
 */
export type WalkEntry<S> = {
  readonly node: TreeNode;
  readonly location: TreeLocation;
  readonly state: S;
};

/**
 * Called once per node, container before children.
 *
 * @returns
 *   The state handed to the node's children, or {@link SKIP_CHILDREN} to
 *   leave them unvisited.
 */
export type Visitor<S> = (entry: WalkEntry<S>) => S | typeof SKIP_CHILDREN;

type Frame<S> = {
  readonly value: unknown;
  readonly location: TreeLocation;
  readonly state: S;
};

/**
 * Visits every node of `root` exactly once, in pre-order.
 *
 * Order guarantees:
 * - A container is visited before any of its children.
 * - Sequence elements are visited by ascending index.
 * - Map entries are visited in `Object.keys` order (insertion order for
 *   non-integer keys, as produced by `JSON.parse`).
 *
 * Depth:
 * The walk runs on an explicit stack, so nesting depth is bounded by memory
 * rather than by the call stack. The containment tree of parsed JSON is
 * acyclic, so no visited set is kept; a caller that builds a cyclic object
 * graph by hand must stop the descent itself via {@link SKIP_CHILDREN}.
 *
 * The walk is read-only.
 *
 * @param root
 *   The tree to walk.
 * @param visit
 *   Visitor invoked for every node.
 * @param initialState
 *   State handed to the root's visit.
 */
export function walkTree<S>(
  root: unknown,
  visit: Visitor<S>,
  initialState: S
): void {
  const stack: Frame<S>[] = [
    { value: root, location: TreeLocation.root(), state: initialState }
  ];

  let frame = stack.pop();
  while (frame !== undefined) {
    const node = classifyValue(frame.value);
    const childState = visit({
      node,
      location: frame.location,
      state: frame.state
    });

    if (childState !== SKIP_CHILDREN) {
      pushChildren(stack, node, frame.location, childState);
    }

    frame = stack.pop();
  }
}

/**
 * Pushes a container's children in reverse, so they pop in natural order.
 */
function pushChildren<S>(
  stack: Frame<S>[],
  node: TreeNode,
  location: TreeLocation,
  state: S
): void {
  switch (node.kind) {
    case 'sequence':
      for (let index = node.value.length - 1; index >= 0; index--) {
        stack.push({
          value: node.value[index],
          location: location.child(index),
          state
        });
      }
      return;

    case 'map': {
      const keys = Object.keys(node.value);
      for (let index = keys.length - 1; index >= 0; index--) {
        const key = keys[index];
        stack.push({ value: node.value[key], location: location.child(key), state });
      }
      return;
    }

    case 'scalar':
      return;
  }
}
