import { defineConfig } from '../types';

/**
 * The reference document: three pool elements, one of which (`dict01`) is
 * referenced by nobody.
 */
export function createCanonicalDocument() {
  return {
    importantListOfDicts: [
      {
        name: 'dict01',
        criticalConfiguration: { linkedImportantDict: [] }
      },
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
  };
}

export const canonicalConfig = defineConfig({
  pools: [{ name: 'dicts', pathPattern: 'importantListOfDicts' }],
  referenceFields: [
    { fieldName: 'linkedImportantDict', mode: 'nested', nestedIdentifierField: 'name' },
    { fieldName: 'useConfigsname', mode: 'nested', nestedIdentifierField: 'sourceName' }
  ],
  anchors: ['importantOtherDict']
});

/**
 * A chain `a -> b -> c` hanging off the settings anchor, a cycle `x <-> y`
 * with no way in, and an unused `z`.
 */
export function createChainDocument() {
  return {
    settings: { uses: ['a'] },
    items: [
      { id: 'x', links: ['y'] },
      { id: 'a', links: ['b'] },
      { id: 'z', links: [] },
      { id: 'b', links: ['c'] },
      { id: 'y', links: ['x'] },
      { id: 'c' }
    ]
  };
}

export const chainConfig = defineConfig({
  pools: [{ name: 'items', pathPattern: 'items', identifierField: 'id' }],
  referenceFields: [
    { fieldName: 'uses', mode: 'direct' },
    { fieldName: 'links', mode: 'direct' }
  ],
  anchors: ['settings']
});
