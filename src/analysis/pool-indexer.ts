import type {
  Diagnostic,
  Identifier,
  ResolvedConfig,
  ResolvedPool,
  TreeMap,
  TreeNode,
  TreeNodeKind
} from '../types';
import type { TreeLocation } from '../walker';
import type { PoolEntry, PoolIndex, PoolNode } from './types';

import {
  DuplicateIdentifierError,
  MissingIdentifierError,
  type MissingIdentifierReason,
  describeDuplicateIdentifier,
  describeMissingIdentifier
} from '../errors';
import { isIdentifier, isUnsafeInteger } from '../guards';
import { formatPathForDisplay } from '../utils/path-utils';

type IdentifierLookup =
  | { readonly ok: true; readonly identifier: Identifier; readonly value: TreeMap }
  | { readonly ok: false; readonly reason: MissingIdentifierReason };

/**
 * Reads the identifier of a pool element.
 *
 * Only own properties count.
 */
export function readElementIdentifier(
  node: TreeNode,
  identifierField: string
): IdentifierLookup {
  if (node.kind !== 'map') return { ok: false, reason: 'not-a-map' };
  if (!Object.hasOwn(node.value, identifierField)) {
    return { ok: false, reason: 'missing-field' };
  }

  const identifier = node.value[identifierField];
  if (!isIdentifier(identifier)) {
    const reason = isUnsafeInteger(identifier) ? 'unsafe-integer' : 'invalid-value';
    return { ok: false, reason };
  }

  return { ok: true, identifier, value: node.value };
}

/**
 * Builds the per-pool identifier indexes while the tree is walked.
 *
 * Policies
 * --------
 * - Missing identifier: throw {@link MissingIdentifierError}, or under
 *   `missingIdentifier: 'skip'` record a warning and leave the element out
 *   of the index (it is then never removed).
 * - Duplicate identifier: throw {@link DuplicateIdentifierError}, or under
 *   `duplicateIdentifier: 'merge'` record a warning and add the element to
 *   the existing node.
 *
 * Entries are appended in walk order, which is document order, so each pool
 * keeps the relative order of its elements.
 */
export class PoolIndexer {
  private readonly config: ResolvedConfig;
  private readonly diagnostics: Diagnostic[];
  private readonly indexes = new Map<string, PoolIndex>();

  constructor(config: ResolvedConfig, diagnostics: Diagnostic[]) {
    this.config = config;
    this.diagnostics = diagnostics;

    for (const pool of config.pools) {
      this.indexes.set(pool.name, { pool, nodes: new Map(), entries: [] });
    }
  }

  get pools(): ReadonlyMap<string, PoolIndex> {
    return this.indexes;
  }

  /**
   * Indexes one element of a pool sequence.
   *
   * @param pool - The pool whose sequence holds the element.
   * @param node - The element.
   * @param location - The element's location (its last segment is `index`).
   * @param index - Position in the sequence.
   * @returns The graph node the element belongs to, or `undefined` when it
   *          was skipped for lack of an identifier.
   */
  addElement(
    pool: ResolvedPool,
    node: TreeNode,
    location: TreeLocation,
    index: number
  ): PoolNode | undefined {
    const poolIndex = this.indexOf(pool);
    const path = location.toPath();
    const lookup = readElementIdentifier(node, pool.identifierField);

    if (!lookup.ok) {
      if (this.config.missingIdentifier === 'error') {
        throw new MissingIdentifierError(
          pool.name,
          path,
          pool.identifierField,
          lookup.reason
        );
      }

      this.diagnostics.push({
        code: 'missing-identifier',
        severity: 'warning',
        path,
        pool: pool.name,
        identifierField: pool.identifierField,
        message:
          describeMissingIdentifier(pool.name, path, pool.identifierField, lookup.reason) +
          ' It was skipped and is kept as is.'
      });
      return undefined;
    }

    const entry: PoolEntry = {
      pool: pool.name,
      identifier: lookup.identifier,
      path,
      sequencePath: path.slice(0, -1),
      index,
      value: lookup.value
    };
    poolIndex.entries.push(entry);

    const existing = poolIndex.nodes.get(lookup.identifier);
    if (existing) {
      const firstPath = existing.entries[0].path;
      if (this.config.duplicateIdentifier === 'error') {
        throw new DuplicateIdentifierError(
          pool.name,
          lookup.identifier,
          path,
          firstPath
        );
      }

      this.diagnostics.push({
        code: 'duplicate-identifier',
        severity: 'warning',
        path,
        pool: pool.name,
        identifier: lookup.identifier,
        firstPath,
        message:
          describeDuplicateIdentifier(pool.name, lookup.identifier, path, firstPath) +
          ' Both are kept or removed together.'
      });
      existing.entries.push(entry);
      return existing;
    }

    const graphNode: PoolNode = {
      pool: pool.name,
      identifier: lookup.identifier,
      entries: [entry]
    };
    poolIndex.nodes.set(lookup.identifier, graphNode);
    return graphNode;
  }

  /**
   * Records that a pool pattern matched something other than a sequence.
   */
  reportNotSequence(
    pool: ResolvedPool,
    location: TreeLocation,
    kind: Exclude<TreeNodeKind, 'sequence'>
  ): void {
    const path = location.toPath();
    this.diagnostics.push({
      code: 'pool-not-sequence',
      severity: 'warning',
      path,
      pool: pool.name,
      message: `Pool "${pool.name}" matched "${formatPathForDisplay(path)}", which is a ${kind}, not a sequence. Nothing was indexed there.`
    });
  }

  private indexOf(pool: ResolvedPool): PoolIndex {
    const poolIndex = this.indexes.get(pool.name);
    if (!poolIndex) {
      throw new Error(`[orphan-sweep] Pool "${pool.name}" is not part of the configuration.`);
    }
    return poolIndex;
  }
}
