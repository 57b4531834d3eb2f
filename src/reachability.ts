import type { Identifier, TreePath } from './types';
import type { PoolNode } from './analysis';
import type { ReferenceGraph } from './graph';

/**
 * Traversal state of a pool node.
 *
 * `unvisited -> queued -> marked`. Nodes still `unvisited` when the frontier
 * is empty are orphans.
 */
export type NodeState = 'unvisited' | 'queued' | 'marked';

/**
 * How a node was first reached.
 */
export type MarkReason =
  | {
      readonly kind: 'anchor';
      readonly anchor: string;
      readonly field: string;
      readonly path: TreePath;
    }
  | {
      readonly kind: 'pinned';
      readonly anchor: string;
      readonly path: TreePath;
    }
  | {
      readonly kind: 'reference';
      readonly from: PoolNode;
      readonly field: string;
      readonly path: TreePath;
    };

export type Reachability = {
  /**
   * Marked nodes, in marking order (breadth-first from the seeds).
   */
  readonly order: readonly PoolNode[];
  readonly marked: ReadonlySet<PoolNode>;
  readonly reasons: ReadonlyMap<PoolNode, MarkReason>;

  /**
   * Marked identifiers per pool name.
   */
  readonly identifiers: ReadonlyMap<string, ReadonlySet<Identifier>>;
};

/**
 * Marks every pool node reachable from the graph's roots.
 *
 * Logic:
 * 1. Queue every root in order; the first root reaching a node decides its
 *    reason.
 * 2. Dequeue (head index, no `shift`), mark, and queue each unvisited target
 *    of the node's outgoing edges.
 * 3. Stop when the frontier is empty.
 *
 * Every node is queued at most once, so cycles terminate and the cost is
 * linear in nodes plus edges. A cycle with no root leading into it stays
 * unmarked.
 */
export function computeReachability(graph: ReferenceGraph): Reachability {
  const states = new Map<PoolNode, NodeState>();
  const reasons = new Map<PoolNode, MarkReason>();
  const queue: PoolNode[] = [];

  const enqueue = (node: PoolNode, reason: MarkReason): void => {
    if ((states.get(node) ?? 'unvisited') !== 'unvisited') return;
    states.set(node, 'queued');
    reasons.set(node, reason);
    queue.push(node);
  };

  // 1. Seeds
  for (const root of graph.roots) {
    if (root.kind === 'anchor') {
      enqueue(root.node, {
        kind: 'anchor',
        anchor: root.anchor,
        field: root.edge.field,
        path: root.edge.path
      });
    } else {
      enqueue(root.node, {
        kind: 'pinned',
        anchor: root.pin.anchor,
        path: root.pin.path
      });
    }
  }

  // 2. Breadth-first propagation
  const order: PoolNode[] = [];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    states.set(node, 'marked');
    order.push(node);

    for (const { target, edge } of graph.outgoing.get(node) ?? []) {
      enqueue(target, {
        kind: 'reference',
        from: node,
        field: edge.field,
        path: edge.path
      });
    }
  }

  // 3. Summaries
  const identifiers = new Map<string, Set<Identifier>>();
  for (const node of order) {
    const set = identifiers.get(node.pool);
    if (set) {
      set.add(node.identifier);
    } else {
      identifiers.set(node.pool, new Set([node.identifier]));
    }
  }

  return { order, marked: new Set(order), reasons, identifiers };
}
