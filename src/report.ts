import type { Diagnostic, RemovalPatch } from './types';
import type { PoolNode } from './analysis';
import type { MarkReason, Reachability } from './reachability';

import { formatIdentifier } from './errors';
import { formatPathForDisplay } from './utils/path-utils';

/**
 * Report formatting
 * -----------------
 * The core never prints. Everything a run learns is returned as data
 * (`CleanResult`); these helpers turn it into single-line, human-readable
 * text for the command line or a caller's own logger.
 */

export type CleanSummaryContext = {
  readonly removed: readonly RemovalPatch[];
  readonly diagnostics: readonly Diagnostic[];
  readonly reachability: Reachability;
};

export type CleanSummaryOptions = {
  /**
   * Maximum number of removed paths to list in the summary. `0` disables the
   * preview.
   * @default 5
   */
  maxPreviewPaths?: number;
};

/**
 * Formats one diagnostic (e.g.
 * `warning [dangling-reference] Reference "ref" at "a.ref" points to ...`).
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.severity} [${diagnostic.code}] ${diagnostic.message}`;
}

/**
 * Formats a one-line summary of a run with a bounded preview of removed
 * paths.
 *
 * @returns e.g.
 *   `Summary: removed=3 (dicts=2, users=1), kept=4, warnings=0;
 *    preview: "dicts.0" ("a"), "dicts.2" ("c"), … (1 more)`
 */
export function formatCleanSummary(
  context: CleanSummaryContext,
  options: CleanSummaryOptions = {}
): string {
  const { removed, diagnostics, reachability } = context;

  // 1. Counts
  const distribution = formatPoolDistribution(removed);
  const kept = reachability.order.reduce(
    (count, node) => count + node.entries.length,
    0
  );

  const parts = [
    `Summary: removed=${removed.length}${distribution ? ` (${distribution})` : ''}, ` +
      `kept=${kept}, warnings=${diagnostics.length}`
  ];

  // 2. Preview
  const previewLimit = options.maxPreviewPaths ?? 5;
  const preview = formatRemovalPreview(removed, previewLimit);
  if (preview) parts.push(preview);

  return parts.join('; ');
}

/**
 * Aggregates removals by pool (e.g. "dicts=2, users=1"), in order of first
 * appearance.
 */
function formatPoolDistribution(removed: readonly RemovalPatch[]): string | undefined {
  if (removed.length === 0) return undefined;

  const countByPool = new Map<string, number>();
  for (const removal of removed) {
    countByPool.set(removal.pool, (countByPool.get(removal.pool) ?? 0) + 1);
  }

  return Array.from(countByPool.entries())
    .map(([pool, count]) => `${pool}=${count}`)
    .join(', ');
}

function formatRemovalPreview(
  removed: readonly RemovalPatch[],
  limit: number
): string | undefined {
  if (removed.length === 0 || limit <= 0) return undefined;

  const items = removed
    .slice(0, limit)
    .map(
      removal =>
        `"${formatPathForDisplay(removal.path)}" (${formatIdentifier(removal.identifier)})`
    );

  // Truncation indicator
  if (removed.length > limit) {
    items.push(`… (${removed.length - limit} more)`);
  }

  return `preview: ${items.join(', ')}`;
}

/**
 * Explains why a kept node survived.
 *
 * Examples:
 * - `kept dicts "b": referenced by anchor "settings" via "uses" at "settings.uses.0"`
 * - `kept dicts "c": referenced by dicts "b" via "links" at "dicts.1.links.0"`
 * - `kept dicts "d": pinned by anchor "dicts.3" at "dicts.3"`
 */
export function formatMarkReason(node: PoolNode, reason: MarkReason): string {
  const subject = `kept ${describeNode(node)}`;
  const at = `at "${formatPathForDisplay(reason.path)}"`;

  switch (reason.kind) {
    case 'anchor':
      return `${subject}: referenced by anchor "${reason.anchor}" via "${reason.field}" ${at}`;
    case 'pinned':
      return `${subject}: pinned by anchor "${reason.anchor}" ${at}`;
    case 'reference':
      return `${subject}: referenced by ${describeNode(reason.from)} via "${reason.field}" ${at}`;
  }
}

/**
 * One {@link formatMarkReason} line per marked node, in marking order.
 */
export function formatReachability(reachability: Reachability): string[] {
  const lines: string[] = [];
  for (const node of reachability.order) {
    const reason = reachability.reasons.get(node);
    if (reason) lines.push(formatMarkReason(node, reason));
  }
  return lines;
}

function describeNode(node: PoolNode): string {
  return `${node.pool} ${formatIdentifier(node.identifier)}`;
}
