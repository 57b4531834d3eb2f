import { describe, expect, test } from 'vitest';

import type { CleanConfig, RemovalPatch, TreePath } from '../types';
import { analyzeTree } from '../analysis';
import { resolveConfig } from '../config-validator';
import { buildReferenceGraph } from '../graph';
import { applyRemovals, planRemovals } from '../prune-patches';
import { computeReachability } from '../reachability';
import { chainConfig, createChainDocument } from './fixtures';

function plan(document: unknown, config: CleanConfig): RemovalPatch[] {
  const analysis = analyzeTree(document, resolveConfig(config));
  return planRemovals(analysis, computeReachability(buildReferenceGraph(analysis)));
}

function removal(sequencePath: TreePath, index: number, identifier = `e${index}`): RemovalPatch {
  return {
    operation: 'delete',
    path: [...sequencePath, index],
    sequencePath,
    index,
    pool: 'pool',
    identifier
  };
}

describe('planRemovals', () => {
  test('lists unmarked elements in document order', () => {
    expect(plan(createChainDocument(), chainConfig)).toStrictEqual([
      {
        operation: 'delete',
        path: ['items', 0],
        sequencePath: ['items'],
        index: 0,
        pool: 'items',
        identifier: 'x'
      },
      {
        operation: 'delete',
        path: ['items', 2],
        sequencePath: ['items'],
        index: 2,
        pool: 'items',
        identifier: 'z'
      },
      {
        operation: 'delete',
        path: ['items', 4],
        sequencePath: ['items'],
        index: 4,
        pool: 'items',
        identifier: 'y'
      }
    ]);
  });

  test('groups removals by pool in declaration order', () => {
    const removals = plan(
      { first: [{ name: 'p' }], second: [{ name: 'q' }] },
      {
        pools: [
          { name: 'second', pathPattern: 'second' },
          { name: 'first', pathPattern: 'first' }
        ],
        referenceFields: []
      }
    );

    expect(removals.map(patch => [patch.pool, patch.identifier])).toStrictEqual([
      ['second', 'q'],
      ['first', 'p']
    ]);
  });

  test('lists every element of an unmarked merged node', () => {
    const removals = plan(
      { items: [{ id: 'a' }, { id: 'b' }, { id: 'a' }], settings: { uses: 'b' } },
      { ...chainConfig, duplicateIdentifier: 'merge' }
    );

    expect(removals.map(patch => patch.path)).toStrictEqual([
      ['items', 0],
      ['items', 2]
    ]);
  });

  test('never lists skipped elements', () => {
    const removals = plan(
      { items: [{ links: [] }, { id: 'a' }] },
      { ...chainConfig, missingIdentifier: 'skip' }
    );

    expect(removals.map(patch => patch.identifier)).toStrictEqual(['a']);
  });
});

describe('applyRemovals', () => {
  test('returns the input itself when there is nothing to remove', () => {
    const tree = { items: [1, 2] };
    expect(applyRemovals(tree, [])).toBe(tree);
  });

  test('copies only the containers on the way to a changed sequence', () => {
    const tree = createChainDocument();
    const pruned = applyRemovals(tree, plan(tree, chainConfig));

    expect(pruned).not.toBe(tree);
    expect(pruned.items).not.toBe(tree.items);
    expect(pruned.settings).toBe(tree.settings);
    expect(pruned.items[0]).toBe(tree.items[1]);
    expect(pruned.items.map(item => item.id)).toStrictEqual(['a', 'b', 'c']);
    expect(tree.items.map(item => item.id)).toStrictEqual(['x', 'a', 'z', 'b', 'y', 'c']);
  });

  test('shares one copy of a common ancestor between sequences', () => {
    const tree = { groups: { left: [1, 2, 3], right: [4, 5] }, other: { n: 1 } };
    const pruned = applyRemovals(tree, [
      removal(['groups', 'left'], 0),
      removal(['groups', 'right'], 1),
      removal(['groups', 'left'], 2)
    ]);

    expect(pruned).toStrictEqual({ groups: { left: [2], right: [4] }, other: { n: 1 } });
    expect(pruned.other).toBe(tree.other);
    expect(tree.groups).toStrictEqual({ left: [1, 2, 3], right: [4, 5] });
  });

  test('prunes a pool that is the root sequence', () => {
    const tree = ['a', 'b', 'c'];
    const pruned = applyRemovals(tree, [removal([], 1)]);

    expect(pruned).toStrictEqual(['a', 'c']);
    expect(tree).toStrictEqual(['a', 'b', 'c']);
  });

  test('returns null-prototype maps with the ordinary prototype', () => {
    const tree: Record<string, unknown> = Object.create(null);
    tree.items = ['a', 'b'];
    const pruned = applyRemovals(tree, [removal(['items'], 0)]);

    expect(Object.getPrototypeOf(pruned)).toBe(Object.prototype);
    expect(pruned.items).toStrictEqual(['b']);
  });

  test.for([
    {
      id: 'Missing Sequence',
      tree: { other: [] },
      patch: removal(['items'], 0),
      message: '[orphan-sweep] Removal target "items" does not exist in the tree.'
    },
    {
      id: 'Index Out Of Range',
      tree: { items: ['a'] },
      patch: removal(['items'], 3),
      message: '[orphan-sweep] Removal target "items.3" does not exist in the tree.'
    },
    {
      id: 'Not A Sequence',
      tree: { items: { 0: 'a' } },
      patch: removal(['items'], 0),
      message: '[orphan-sweep] Removal target "items" does not exist in the tree.'
    }
  ])('[$id] rejects a patch planned against another tree', ({ tree, patch, message }) => {
    expect(() => applyRemovals(tree, [patch])).toThrow(message);
  });
});
