import type {
  CleanConfig,
  Diagnostic,
  RemovalPatch,
  ResolvedConfig
} from './types';

import { analyzeTree } from './analysis';
import { resolveConfig } from './config-validator';
import { buildReferenceGraph } from './graph';
import { applyRemovals, planRemovals } from './prune-patches';
import { type Reachability, computeReachability } from './reachability';

export type CleanResult<T> = {
  /**
   * The pruned tree. Shares every untouched subtree with the input; the
   * input itself when nothing was removed.
   */
  readonly tree: T;

  /**
   * Warnings in order: analysis warnings (document order), then dangling
   * references (document order).
   */
  readonly diagnostics: readonly Diagnostic[];

  /**
   * The removed elements.
   */
  readonly removed: readonly RemovalPatch[];

  readonly reachability: Reachability;
};

/**
 * Removes every pool element that is not reachable from an anchor.
 *
 * Pipeline:
 * 1. Resolve the configuration (skipped for a {@link ResolvedConfig}).
 * 2. Analyze the tree in one walk: pool indexes, reference edges, pins.
 * 3. Resolve edges into the reference graph; dangling ones become warnings.
 * 4. Mark reachable pool nodes breadth-first from the roots.
 * 5. Plan and apply removals copy-on-write.
 *
 * The function is pure: the input is never mutated and no state survives
 * the call, so one resolved configuration can be shared across concurrent
 * runs.
 *
 * @example
 * ```ts
 * const { tree, removed } = clean(document, {
 *   pools: [{ name: 'dicts', pathPattern: 'importantListOfDicts' }],
 *   referenceFields: [
 *     { fieldName: 'useConfigsname', mode: 'nested', nestedIdentifierField: 'sourceName' }
 *   ]
 * });
 * ```
 *
 * @throws OrphanSweepError subclasses for invalid configuration and, under
 *         the default policies, for structural problems in the tree. Nothing
 *         is pruned when an error is thrown.
 */
export function clean<T>(tree: T, config: CleanConfig | ResolvedConfig): CleanResult<T> {
  // 1. Configuration
  const resolved = resolveConfig(config);

  // 2. Analysis
  const analysis = analyzeTree(tree, resolved);

  // 3. Graph
  const graph = buildReferenceGraph(analysis);

  // 4. Reachability
  const reachability = computeReachability(graph);

  // 5. Pruning
  const removed = planRemovals(analysis, reachability);

  return {
    tree: applyRemovals(tree, removed),
    diagnostics: [...analysis.diagnostics, ...graph.dangling],
    removed,
    reachability
  };
}
