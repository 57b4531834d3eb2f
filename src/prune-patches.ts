import type { PathSegment, RemovalPatch, TreeMap, TreePath } from './types';
import type { TreeAnalysis } from './analysis';
import type { Reachability } from './reachability';

import { ERROR_PREFIX } from './errors';
import { isArray, isPlainObject } from './guards';
import { TRAVERSE_MISSING, formatPathForDisplay, traverseStep } from './utils/path-utils';
import { stringifyPropertyPath } from './utils/property-path-key';

/**
 * Lists one `delete` patch per indexed pool element that was not marked.
 *
 * Patches are grouped by pool (declaration order) and follow document order
 * within a pool. Elements skipped for lack of an identifier are never
 * indexed and therefore never listed. Under `duplicateIdentifier: 'merge'`
 * every element of an unmarked node is listed.
 */
export function planRemovals(
  analysis: TreeAnalysis,
  reachability: Reachability
): RemovalPatch[] {
  const patches: RemovalPatch[] = [];

  for (const poolIndex of analysis.pools.values()) {
    for (const entry of poolIndex.entries) {
      const node = poolIndex.nodes.get(entry.identifier);
      if (node && reachability.marked.has(node)) continue;

      patches.push({
        operation: 'delete',
        path: entry.path,
        sequencePath: entry.sequencePath,
        index: entry.index,
        pool: entry.pool,
        identifier: entry.identifier
      });
    }
  }

  return patches;
}

type Container = TreeMap | unknown[];

type SequenceRemovals = {
  readonly sequencePath: TreePath;
  readonly indices: Set<number>;
};

/**
 * Applies removal patches without touching the input.
 *
 * Copy-on-write
 * -------------
 * 1. Group patches by pool sequence (canonical path key).
 * 2. Shallow-copy every container on the path from the root to each affected
 *    sequence, once per container, linking each copy into its copied
 *    parent. Originals are read with {@link traverseStep}.
 * 3. Filter each affected sequence copy in place, keeping the relative order
 *    of the survivors.
 *
 * Everything off those paths (including every surviving element) is the
 * input's own value, so an unchanged subtree is reference-equal to its
 * counterpart in the input. Without patches the input itself is returned.
 *
 * Maps are copied with object spread, so a null-prototype map comes back
 * with `Object.prototype`.
 *
 * @param tree - The tree the patches were planned against.
 * @param removals - Output of {@link planRemovals}.
 * @returns The pruned tree.
 * @throws Error when a patch does not address an element of `tree`.
 */
export function applyRemovals<T>(tree: T, removals: readonly RemovalPatch[]): T;
export function applyRemovals(
  tree: unknown,
  removals: readonly RemovalPatch[]
): unknown {
  if (removals.length === 0) return tree;

  // 1. Group by sequence
  const groups = new Map<string, SequenceRemovals>();
  for (const removal of removals) {
    const key = stringifyPropertyPath(removal.sequencePath);
    const group = groups.get(key);
    if (group) {
      group.indices.add(removal.index);
    } else {
      groups.set(key, {
        sequencePath: removal.sequencePath,
        indices: new Set([removal.index])
      });
    }
  }

  // 2. Copy paths
  const copies = new Map<string, Container>();
  const root = copyContainer(copies, [], tree);

  const sequences: Array<{ copy: unknown[]; group: SequenceRemovals }> = [];
  for (const group of groups.values()) {
    let original: unknown = tree;
    let copy: Container = root;

    const path = group.sequencePath;
    for (let depth = 0; depth < path.length; depth++) {
      const segment = path[depth];
      const next = traverseStep(original, segment);
      if (next === TRAVERSE_MISSING) throw missingTarget(path);

      const childCopy = copyContainer(copies, path.slice(0, depth + 1), next);
      linkChild(copy, segment, childCopy);

      original = next;
      copy = childCopy;
    }

    if (!isArray(copy) || !isArray(original)) {
      throw missingTarget(group.sequencePath);
    }
    for (const index of group.indices) {
      if (index >= original.length) {
        throw missingTarget([...group.sequencePath, index]);
      }
    }

    sequences.push({ copy, group });
  }

  // 3. Filter sequences
  for (const { copy, group } of sequences) {
    let write = 0;
    for (let read = 0; read < copy.length; read++) {
      if (group.indices.has(read)) continue;
      copy[write] = copy[read];
      write++;
    }
    copy.length = write;
  }

  return root;
}

/**
 * Returns the copy of the container at `path`, creating it on first use.
 */
function copyContainer(
  copies: Map<string, Container>,
  path: TreePath,
  original: unknown
): Container {
  const key = stringifyPropertyPath(path);
  const existing = copies.get(key);
  if (existing) return existing;

  let copy: Container;
  if (isArray(original)) {
    copy = [...original];
  } else if (isPlainObject(original)) {
    copy = { ...original };
  } else {
    throw missingTarget(path);
  }

  copies.set(key, copy);
  return copy;
}

function linkChild(parent: Container, segment: PathSegment, child: Container): void {
  if (isArray(parent)) {
    if (typeof segment === 'number') parent[segment] = child;
    return;
  }
  if (typeof segment === 'string') parent[segment] = child;
}

function missingTarget(path: TreePath): Error {
  return new Error(
    `${ERROR_PREFIX} Removal target "${formatPathForDisplay(path)}" does not exist in the tree. ` +
      'Removals must be applied to the tree they were planned against.'
  );
}
