import type { DanglingReferenceWarning, Identifier } from './types';
import type {
  AnchorPin,
  PoolNode,
  ReferenceEdge,
  TreeAnalysis
} from './analysis';

import { formatIdentifier } from './errors';
import { formatPathForDisplay } from './utils/path-utils';

/**
 * Why a node is a seed of the reachability traversal.
 */
export type GraphRoot =
  | {
      readonly kind: 'anchor';
      readonly node: PoolNode;
      readonly anchor: string;
      readonly edge: ReferenceEdge;
    }
  | { readonly kind: 'pinned'; readonly node: PoolNode; readonly pin: AnchorPin };

/**
 * An edge whose owner is a pool element, resolved to one target node.
 */
export type ResolvedEdge = {
  readonly target: PoolNode;
  readonly edge: ReferenceEdge;
};

/**
 * The directed reference graph over pool nodes.
 */
export type ReferenceGraph = {
  /**
   * Seeds in traversal order: targets of anchor-owned edges (document
   * order), then anchor pins (document order).
   */
  readonly roots: readonly GraphRoot[];

  /**
   * Outgoing edges of each pool node, in document order.
   */
  readonly outgoing: ReadonlyMap<PoolNode, readonly ResolvedEdge[]>;

  /**
   * One warning per edge that resolved to no pool element.
   */
  readonly dangling: readonly DanglingReferenceWarning[];
};

/**
 * Resolves the edges of an analysis against the pool indexes.
 *
 * Each edge resolves to the node holding its identifier in every target pool
 * (an identifier may live in several pools). Lookups go through the
 * identifier index.
 *
 * An edge resolving to nothing is dropped and reported, whether or not its
 * owner turns out reachable: a dangling reference usually means a typo in
 * the document.
 */
export function buildReferenceGraph(analysis: TreeAnalysis): ReferenceGraph {
  const anchorRoots: GraphRoot[] = [];
  const outgoing = new Map<PoolNode, ResolvedEdge[]>();
  const dangling: DanglingReferenceWarning[] = [];

  for (const edge of analysis.edges) {
    const targets = resolveTargets(analysis, edge.identifier, edge.targetPools);

    if (targets.length === 0) {
      dangling.push(toDanglingWarning(edge));
      continue;
    }

    const owner = edge.owner;
    for (const target of targets) {
      if (owner.kind === 'anchor') {
        anchorRoots.push({
          kind: 'anchor',
          node: target,
          anchor: owner.anchor,
          edge
        });
        continue;
      }

      const list = outgoing.get(owner.node);
      if (list) {
        list.push({ target, edge });
      } else {
        outgoing.set(owner.node, [{ target, edge }]);
      }
    }
  }

  const pinRoots = analysis.pins.map((pin): GraphRoot => ({
    kind: 'pinned',
    node: pin.node,
    pin
  }));

  return { roots: [...anchorRoots, ...pinRoots], outgoing, dangling };
}

function resolveTargets(
  analysis: TreeAnalysis,
  identifier: Identifier,
  targetPools: readonly string[]
): PoolNode[] {
  const targets: PoolNode[] = [];
  for (const pool of targetPools) {
    const node = analysis.pools.get(pool)?.nodes.get(identifier);
    if (node) targets.push(node);
  }
  return targets;
}

function toDanglingWarning(edge: ReferenceEdge): DanglingReferenceWarning {
  const pools =
    (edge.targetPools.length === 1 ? 'pool ' : 'pools ') +
    edge.targetPools.map(pool => `"${pool}"`).join(', ');
  return {
    code: 'dangling-reference',
    severity: 'warning',
    path: edge.path,
    field: edge.field,
    identifier: edge.identifier,
    targetPools: edge.targetPools,
    message:
      `Reference "${edge.field}" at "${formatPathForDisplay(edge.path)}" points to ` +
      `${formatIdentifier(edge.identifier)}, which is not in ${pools}.`
  };
}
