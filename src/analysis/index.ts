import type {
  Diagnostic,
  PathPattern,
  ResolvedConfig,
  ResolvedPool,
  ResolvedReferenceField,
  TreeMap,
  TreePath
} from '../types';
import type { AnchorPin, EdgeOwner, PoolNode, ReferenceEdge, TreeAnalysis } from './types';

import { type MatchState, PatternMatcher } from '../path-pattern';
import { type TreeLocation, type WalkEntry, walkTree } from '../walker';
import { PoolIndexer } from './pool-indexer';
import { readReferences, referencePath } from './reference-extractor';

export type * from './types';
export { readElementIdentifier } from './pool-indexer';
export { readReferences } from './reference-extractor';

/**
 * Label of the implicit top-level anchor.
 */
export const ROOT_ANCHOR = '<root>';

/**
 * Per-branch state threaded down the walk.
 */
type AnalysisState = {
  readonly pools: MatchState;
  readonly anchors: MatchState;

  /**
   * Source of any reference found at or below this node.
   */
  readonly owner: EdgeOwner | undefined;

  /**
   * Nearest enclosing indexed pool element.
   */
  readonly element: PoolNode | undefined;

  /**
   * Whether the node lies inside a pool element, indexed or skipped.
   */
  readonly inElement: boolean;

  /**
   * Set on a pool sequence: its children are pool elements.
   */
  readonly poolSequence: ResolvedPool | undefined;

  /**
   * Nearest configured anchor matched at or above this node, outside every
   * pool element. Elements indexed below it are pinned.
   */
  readonly enclosingAnchor: string | undefined;
};

/**
 * Runs the single analysis pass over a tree: pool indexing and reference
 * extraction fused into one walk.
 *
 * Logic:
 * 1. Advance the pool and anchor matchers by the node's segment.
 * 2. A child of a pool sequence is a pool element: index it. It becomes the
 *    owner of every reference beneath it. An element skipped for lack of an
 *    identifier owns its references as an anchor, since it is never removed.
 *    An element indexed below a configured anchor is pinned by it.
 * 3. An anchor pattern matching here pins the enclosing indexed element, or,
 *    outside every pool element, becomes the owner of references beneath
 *    and pins every element indexed beneath.
 * 4. A pool pattern matching here marks the node as a pool sequence (or
 *    records a `pool-not-sequence` warning).
 * 5. A map holding configured reference fields yields one edge per
 *    identifier, provided the references have an owner.
 *
 * Reference values are validated wherever they occur, owned or not.
 *
 * @param tree - The parsed document.
 * @param config - Resolved configuration.
 * @returns Pool indexes, unresolved edges, anchor pins and the warnings
 *          raised so far.
 * @throws MissingIdentifierError, DuplicateIdentifierError or
 *         InvalidReferenceError under the default policies.
 */
export function analyzeTree(tree: unknown, config: ResolvedConfig): TreeAnalysis {
  const diagnostics: Diagnostic[] = [];
  const edges: ReferenceEdge[] = [];
  const pins: AnchorPin[] = [];

  const indexer = new PoolIndexer(config, diagnostics);
  const poolMatcher = new PatternMatcher<ResolvedPool>(
    config.pools.map(pool => ({ pattern: pool.pattern, value: pool }))
  );
  const anchorMatcher = new PatternMatcher<PathPattern>(
    config.anchors.map(anchor => ({ pattern: anchor, value: anchor }))
  );
  const fieldsByName = new Map<string, ResolvedReferenceField>(
    config.referenceFields.map(field => [field.fieldName, field])
  );

  const initialState: AnalysisState = {
    pools: poolMatcher.root,
    anchors: anchorMatcher.root,
    owner: config.implicitRootAnchor
      ? { kind: 'anchor', anchor: ROOT_ANCHOR, path: [] }
      : undefined,
    element: undefined,
    inElement: false,
    poolSequence: undefined,
    enclosingAnchor: undefined
  };

  const visit = ({ node, location, state }: WalkEntry<AnalysisState>): AnalysisState => {
    const segment = location.segment;
    let { owner, element, inElement, enclosingAnchor } = state;

    // 1. Advance matchers (the root keeps the initial states)
    const pools =
      segment === undefined ? state.pools : poolMatcher.step(state.pools, segment);
    const anchors =
      segment === undefined ? state.anchors : anchorMatcher.step(state.anchors, segment);

    // 2. Pool elements
    if (state.poolSequence && typeof segment === 'number') {
      const poolNode = indexer.addElement(state.poolSequence, node, location, segment);
      if (poolNode && enclosingAnchor !== undefined) {
        pins.push({ node: poolNode, anchor: enclosingAnchor, path: location.toPath() });
      }
      inElement = true;
      enclosingAnchor = undefined;
      element = poolNode;
      owner = poolNode
        ? { kind: 'element', node: poolNode }
        : {
            kind: 'anchor',
            anchor: `unindexed element of pool "${state.poolSequence.name}"`,
            path: location.toPath()
          };
    }

    // 3. Anchors
    for (const anchor of anchorMatcher.matches(anchors)) {
      if (element) {
        pins.push({ node: element, anchor: anchor.source, path: location.toPath() });
      } else if (!inElement) {
        owner = { kind: 'anchor', anchor: anchor.source, path: location.toPath() };
        enclosingAnchor = anchor.source;
      }
    }

    // 4. Pools
    let poolSequence: ResolvedPool | undefined;
    for (const pool of poolMatcher.matches(pools)) {
      if (node.kind === 'sequence') {
        poolSequence = pool;
      } else {
        indexer.reportNotSequence(pool, location, node.kind);
      }
    }

    // 5. References
    if (node.kind === 'map' && fieldsByName.size > 0) {
      collectEdges(node.value, location, owner, fieldsByName, edges);
    }

    return { pools, anchors, owner, element, inElement, poolSequence, enclosingAnchor };
  };

  walkTree(tree, visit, initialState);

  return { pools: indexer.pools, edges, pins, diagnostics };
}

function collectEdges(
  map: TreeMap,
  location: TreeLocation,
  owner: EdgeOwner | undefined,
  fieldsByName: ReadonlyMap<string, ResolvedReferenceField>,
  edges: ReferenceEdge[]
): void {
  let mapPath: TreePath | undefined;

  for (const key of Object.keys(map)) {
    const field = fieldsByName.get(key);
    if (!field) continue;

    const references = readReferences(field, map[key], location);
    if (!owner) continue;

    mapPath ??= location.toPath();
    for (const reference of references) {
      edges.push({
        owner,
        identifier: reference.identifier,
        field: field.fieldName,
        path: referencePath(mapPath, field.fieldName, reference),
        targetPools: field.targetPools
      });
    }
  }
}
