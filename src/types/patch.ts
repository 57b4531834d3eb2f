import type { Identifier, TreePath } from './tree';

/**
 * The mutation primitive describing how the pruned tree differs from the
 * input.
 *
 * Only one operation exists: removing an element from a pool sequence.
 * Nothing is ever inserted, replaced or reordered.
 */
export type PatchOperation = 'delete';

/**
 * An instruction to drop one orphaned pool element.
 */
export type RemovalPatch = {
  operation: PatchOperation;

  /**
   * Path of the removed element (`sequencePath` followed by `index`).
   */
  path: TreePath;

  /**
   * Path of the pool sequence holding the element.
   */
  sequencePath: TreePath;

  /**
   * Position of the element in the input sequence.
   */
  index: number;

  /**
   * Name of the pool the element belongs to.
   */
  pool: string;

  /**
   * The element's identifier.
   */
  identifier: Identifier;
};
