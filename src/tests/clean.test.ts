import { describe, expect, test } from 'vitest';

import type { CleanConfig, Diagnostic, Identifier, RemovalPatch } from '../types';
import type { TestScenario } from './types';
import { clean } from '../clean';
import { resolveConfig } from '../config-validator';
import { isPlainObject } from '../guards';
import {
  canonicalConfig,
  chainConfig,
  createCanonicalDocument,
  createChainDocument
} from './fixtures';
import { resolveScenarioInput } from './test-utils';

type CleanInput = {
  document: unknown;
  config: CleanConfig;
};

type CleanExpected = {
  tree: unknown;
  removed: Array<Pick<RemovalPatch, 'pool' | 'identifier' | 'index'>>;
  diagnostics: Diagnostic[];
};

function runClean({ document, config }: CleanInput): CleanExpected {
  const result = clean(document, config);
  return {
    tree: result.tree,
    removed: result.removed.map(({ pool, identifier, index }) => ({
      pool,
      identifier,
      index
    })),
    diagnostics: [...result.diagnostics]
  };
}

/**
 * Identifiers left in a pool sequence.
 */
function identifiersIn(sequence: unknown, field: string): unknown[] {
  if (!Array.isArray(sequence)) return [];
  return sequence.map(element => (isPlainObject(element) ? element[field] : undefined));
}

describe('clean: reference document', () => {
  test('keeps dict02 and dict03, removes dict01 and leaves the anchor untouched', () => {
    const document = createCanonicalDocument();
    const result = clean(document, canonicalConfig);

    expect(result.tree).toStrictEqual({
      importantListOfDicts: [
        {
          name: 'dict02',
          criticalConfiguration: { linkedImportantDict: [{ name: 'dict03' }] }
        },
        {
          name: 'dict03',
          criticalConfiguration: { linkedImportantDict: [] }
        }
      ],
      importantOtherDict: {
        useConfigsname: [{ sourceName: 'dict02' }, { sourceName: 'dict03' }]
      }
    });
    expect(result.diagnostics).toStrictEqual([]);
    expect(result.removed).toStrictEqual([
      {
        operation: 'delete',
        path: ['importantListOfDicts', 0],
        sequencePath: ['importantListOfDicts'],
        index: 0,
        pool: 'dicts',
        identifier: 'dict01'
      }
    ]);
  });

  test('shares untouched subtrees with the input and never mutates it', () => {
    const document = createCanonicalDocument();
    const result = clean(document, canonicalConfig);

    expect(result.tree).not.toBe(document);
    expect(result.tree.importantOtherDict).toBe(document.importantOtherDict);
    expect(result.tree.importantListOfDicts[0]).toBe(document.importantListOfDicts[1]);
    expect(result.tree.importantListOfDicts[1]).toBe(document.importantListOfDicts[2]);
    expect(document).toStrictEqual(createCanonicalDocument());
  });

  test('marks dict02 and dict03 in breadth-first order', () => {
    const { reachability } = clean(createCanonicalDocument(), canonicalConfig);

    expect(reachability.order.map(node => node.identifier)).toStrictEqual([
      'dict02',
      'dict03'
    ]);
    expect(reachability.identifiers).toStrictEqual(
      new Map([['dicts', new Set(['dict02', 'dict03'])]])
    );
  });
});

describe('clean: properties', () => {
  test('is idempotent: a second run removes nothing and returns its input', () => {
    const first = clean(createChainDocument(), chainConfig);
    const second = clean(first.tree, chainConfig);

    expect(second.removed).toStrictEqual([]);
    expect(second.tree).toBe(first.tree);
  });

  test('keeps exactly the reachable elements (soundness)', () => {
    const result = clean(createChainDocument(), chainConfig);
    const kept = identifiersIn(result.tree.items, 'id');
    const reachable: Identifier[] = result.reachability.order.map(node => node.identifier);

    expect(kept).toStrictEqual(['a', 'b', 'c']);
    expect(new Set(kept)).toStrictEqual(new Set(reachable));
    expect(result.removed.map(removal => removal.identifier)).toStrictEqual(['x', 'z', 'y']);
  });

  test('leaves every location outside the pools unchanged', () => {
    const document = createChainDocument();
    const result = clean(document, chainConfig);

    expect(result.tree.settings).toBe(document.settings);
    expect(Object.keys(result.tree)).toStrictEqual(['settings', 'items']);
  });

  test('removes a cycle that no anchor leads into', () => {
    const result = clean(createChainDocument(), chainConfig);
    const kept = identifiersIn(result.tree.items, 'id');

    expect(kept).not.toContain('x');
    expect(kept).not.toContain('y');
  });

  test('accepts an already resolved configuration', () => {
    const resolved = resolveConfig(chainConfig);
    const result = clean(createChainDocument(), resolved);

    expect(identifiersIn(result.tree.items, 'id')).toStrictEqual(['a', 'b', 'c']);
  });
});

describe('clean: scenarios', () => {
  const itemsPool = { name: 'items', pathPattern: 'items', identifierField: 'id' };

  const scenarios: Array<TestScenario<CleanInput, CleanExpected>> = [
    {
      id: 'Order Preservation',
      description: 'Survivors keep their relative order around removed elements.',
      input: {
        document: {
          use: ['d', 'b'],
          items: [{ id: 'a' }, { id: 'b' }, { id: 'c' }, { id: 'd' }]
        },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { use: ['d', 'b'], items: [{ id: 'b' }, { id: 'd' }] },
        removed: [
          { pool: 'items', identifier: 'a', index: 0 },
          { pool: 'items', identifier: 'c', index: 2 }
        ],
        diagnostics: []
      }
    },
    {
      id: 'Cascade',
      description: 'An element referenced only by an orphan is removed as well.',
      input: {
        document: {
          items: [
            { id: 'a', use: 'b' },
            { id: 'b', use: 'c' },
            { id: 'c' }
          ]
        },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { items: [] },
        removed: [
          { pool: 'items', identifier: 'a', index: 0 },
          { pool: 'items', identifier: 'b', index: 1 },
          { pool: 'items', identifier: 'c', index: 2 }
        ],
        diagnostics: []
      }
    },
    {
      id: 'Self Reference',
      description: 'An element referencing itself is not reachable through that edge.',
      input: {
        document: { items: [{ id: 'a', use: ['a'] }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { items: [] },
        removed: [{ pool: 'items', identifier: 'a', index: 0 }],
        diagnostics: []
      }
    },
    {
      id: 'Dangling Reference',
      description: 'A reference to a missing identifier is reported and ignored.',
      input: {
        document: { use: ['a', 'ghost'], items: [{ id: 'a' }, { id: 'b' }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { use: ['a', 'ghost'], items: [{ id: 'a' }] },
        removed: [{ pool: 'items', identifier: 'b', index: 1 }],
        diagnostics: [
          {
            code: 'dangling-reference',
            severity: 'warning',
            path: ['use', 1],
            field: 'use',
            identifier: 'ghost',
            targetPools: ['items'],
            message:
              'Reference "use" at "use.1" points to "ghost", which is not in pool "items".'
          }
        ]
      }
    },
    {
      id: 'Dangling Inside Orphan',
      description: 'A dangling reference is reported even when its owner is removed.',
      input: {
        document: { items: [{ id: 'a', use: 'ghost' }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { items: [] },
        removed: [{ pool: 'items', identifier: 'a', index: 0 }],
        diagnostics: [
          {
            code: 'dangling-reference',
            severity: 'warning',
            path: ['items', 0, 'use'],
            field: 'use',
            identifier: 'ghost',
            targetPools: ['items'],
            message:
              'Reference "use" at "items.0.use" points to "ghost", which is not in pool "items".'
          }
        ]
      }
    },
    {
      id: 'Strict Identifier Equality',
      description: 'The number 1 does not reference the string "1".',
      input: {
        document: { use: [1], items: [{ id: '1' }, { id: 1 }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { use: [1], items: [{ id: 1 }] },
        removed: [{ pool: 'items', identifier: '1', index: 0 }],
        diagnostics: []
      }
    },
    {
      id: 'Implicit Root Anchor',
      description: 'References outside every pool and anchor count as in use.',
      input: {
        document: { meta: { deep: { use: 'b' } }, items: [{ id: 'a' }, { id: 'b' }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { meta: { deep: { use: 'b' } }, items: [{ id: 'b' }] },
        removed: [{ pool: 'items', identifier: 'a', index: 0 }],
        diagnostics: []
      }
    },
    {
      id: 'No Implicit Root Anchor',
      description: 'Without the root anchor, only configured anchors seed reachability.',
      input: {
        document: {
          meta: { use: 'a' },
          settings: { use: 'b' },
          items: [{ id: 'a' }, { id: 'b' }]
        },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }],
          anchors: ['settings'],
          implicitRootAnchor: false
        }
      },
      expected: {
        tree: {
          meta: { use: 'a' },
          settings: { use: 'b' },
          items: [{ id: 'b' }]
        },
        removed: [{ pool: 'items', identifier: 'a', index: 0 }],
        diagnostics: []
      }
    },
    {
      id: 'Anchor Pins Element',
      description: 'An anchor matching a pool element keeps it and what it references.',
      input: {
        document: {
          items: [
            { id: 'a', use: 'c' },
            { id: 'b' },
            { id: 'c' }
          ]
        },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }],
          anchors: ['items.0']
        }
      },
      expected: {
        tree: { items: [{ id: 'a', use: 'c' }, { id: 'c' }] },
        removed: [{ pool: 'items', identifier: 'b', index: 1 }],
        diagnostics: []
      }
    },
    {
      id: 'Anchor On Pool Sequence',
      description: 'An anchor matching a pool sequence keeps every element in it.',
      input: {
        document: { config: { items: [{ id: 'a' }, { id: 'b' }] } },
        config: {
          pools: [{ name: 'items', pathPattern: 'config.items', identifierField: 'id' }],
          referenceFields: [],
          anchors: ['config.items']
        }
      },
      expected: {
        tree: { config: { items: [{ id: 'a' }, { id: 'b' }] } },
        removed: [],
        diagnostics: []
      }
    },
    {
      id: 'Anchor Above Pool',
      description: 'An anchor above a pool sequence keeps its elements and what they reference.',
      input: {
        document: {
          config: { items: [{ id: 'a', use: 'c' }] },
          items: [{ id: 'b' }, { id: 'c' }]
        },
        config: {
          pools: [
            { name: 'kept', pathPattern: 'config.items', identifierField: 'id' },
            { name: 'loose', pathPattern: 'items', identifierField: 'id' }
          ],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }],
          anchors: ['config']
        }
      },
      expected: {
        tree: {
          config: { items: [{ id: 'a', use: 'c' }] },
          items: [{ id: 'c' }]
        },
        removed: [{ pool: 'loose', identifier: 'b', index: 0 }],
        diagnostics: []
      }
    },
    {
      id: 'Wildcard Pool',
      description: 'A wildcard pool spans several sequences sharing one namespace.',
      input: {
        document: {
          groups: [
            { members: [{ id: 'a' }, { id: 'b', use: 'c' }] },
            { members: [{ id: 'c' }, { id: 'd' }] }
          ],
          use: ['b']
        },
        config: {
          pools: [{ name: 'members', pathPattern: 'groups.*.members', identifierField: 'id' }],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: {
          groups: [{ members: [{ id: 'b', use: 'c' }] }, { members: [{ id: 'c' }] }],
          use: ['b']
        },
        removed: [
          { pool: 'members', identifier: 'a', index: 0 },
          { pool: 'members', identifier: 'd', index: 1 }
        ],
        diagnostics: []
      }
    },
    {
      id: 'Target Pools',
      description: 'A reference only resolves into its target pools.',
      input: {
        document: {
          use: 'a',
          left: [{ id: 'a' }],
          right: [{ id: 'a' }]
        },
        config: {
          pools: [
            { name: 'left', pathPattern: 'left', identifierField: 'id' },
            { name: 'right', pathPattern: 'right', identifierField: 'id' }
          ],
          referenceFields: [{ fieldName: 'use', mode: 'direct', targetPools: ['right'] }]
        }
      },
      expected: {
        tree: { use: 'a', left: [], right: [{ id: 'a' }] },
        removed: [{ pool: 'left', identifier: 'a', index: 0 }],
        diagnostics: []
      }
    },
    {
      id: 'Every Pool By Default',
      description: 'Without target pools an identifier resolves in every pool holding it.',
      input: {
        document: {
          use: 'a',
          left: [{ id: 'a' }],
          right: [{ id: 'a' }, { id: 'b' }]
        },
        config: {
          pools: [
            { name: 'left', pathPattern: 'left', identifierField: 'id' },
            { name: 'right', pathPattern: 'right', identifierField: 'id' }
          ],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { use: 'a', left: [{ id: 'a' }], right: [{ id: 'a' }] },
        removed: [{ pool: 'right', identifier: 'b', index: 1 }],
        diagnostics: []
      }
    },
    {
      id: 'Skip Missing Identifier',
      description: 'An element without identifier is kept and its references count.',
      input: {
        document: { items: [{ use: 'b' }, { id: 'b' }, { id: 'c' }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }],
          missingIdentifier: 'skip'
        }
      },
      expected: {
        tree: { items: [{ use: 'b' }, { id: 'b' }] },
        removed: [{ pool: 'items', identifier: 'c', index: 2 }],
        diagnostics: [
          {
            code: 'missing-identifier',
            severity: 'warning',
            path: ['items', 0],
            pool: 'items',
            identifierField: 'id',
            message:
              'Element "items.0" of pool "items" has no "id" field. It was skipped and is kept as is.'
          }
        ]
      }
    },
    {
      id: 'Merge Duplicates',
      description: 'Elements sharing an identifier are kept together.',
      input: {
        document: {
          use: 'a',
          items: [{ id: 'a', v: 1 }, { id: 'b' }, { id: 'a', v: 2 }]
        },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }],
          duplicateIdentifier: 'merge'
        }
      },
      expected: {
        tree: { use: 'a', items: [{ id: 'a', v: 1 }, { id: 'a', v: 2 }] },
        removed: [{ pool: 'items', identifier: 'b', index: 1 }],
        diagnostics: [
          {
            code: 'duplicate-identifier',
            severity: 'warning',
            path: ['items', 2],
            pool: 'items',
            identifier: 'a',
            firstPath: ['items', 0],
            message:
              'Identifier "a" appears twice in pool "items": "items.0" and "items.2". ' +
              'Both are kept or removed together.'
          }
        ]
      }
    },
    {
      id: 'Pool Not A Sequence',
      description: 'A pool pattern matching a map is reported and nothing is removed there.',
      input: {
        document: { items: { id: 'a' } },
        config: {
          pools: [itemsPool],
          referenceFields: []
        }
      },
      expected: {
        tree: { items: { id: 'a' } },
        removed: [],
        diagnostics: [
          {
            code: 'pool-not-sequence',
            severity: 'warning',
            path: ['items'],
            pool: 'items',
            message:
              'Pool "items" matched "items", which is a map, not a sequence. Nothing was indexed there.'
          }
        ]
      }
    },
    {
      id: 'Missing Pool',
      description: 'A pool pattern that matches nothing leaves the document as is.',
      input: {
        document: { other: [{ id: 'a' }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }]
        }
      },
      expected: {
        tree: { other: [{ id: 'a' }] },
        removed: [],
        diagnostics: []
      }
    },
    {
      id: 'Warning Order',
      description: 'Analysis warnings come before dangling references.',
      input: {
        document: { use: 'ghost', items: [{ id: 'a' }, { id: 'a' }] },
        config: {
          pools: [itemsPool],
          referenceFields: [{ fieldName: 'use', mode: 'direct' }],
          duplicateIdentifier: 'merge'
        }
      },
      expected: {
        tree: { use: 'ghost', items: [] },
        removed: [
          { pool: 'items', identifier: 'a', index: 0 },
          { pool: 'items', identifier: 'a', index: 1 }
        ],
        diagnostics: [
          {
            code: 'duplicate-identifier',
            severity: 'warning',
            path: ['items', 1],
            pool: 'items',
            identifier: 'a',
            firstPath: ['items', 0],
            message:
              'Identifier "a" appears twice in pool "items": "items.0" and "items.1". ' +
              'Both are kept or removed together.'
          },
          {
            code: 'dangling-reference',
            severity: 'warning',
            path: ['use'],
            field: 'use',
            identifier: 'ghost',
            targetPools: ['items'],
            message: 'Reference "use" at "use" points to "ghost", which is not in pool "items".'
          }
        ]
      }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const resolved = resolveScenarioInput(input);
    expect(runClean(resolved)).toStrictEqual(expected);
  });
});
