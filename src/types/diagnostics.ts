import type { Identifier, TreePath } from './tree';
import type { Simplify } from './types-helper';

/**
 * Shared shape of every recorded (non-fatal) diagnostic.
 */
type DiagnosticOf<Code extends string> = {
  /**
   * Discriminator.
   */
  code: Code;

  /**
   * Recorded diagnostics never abort a run; fatal conditions are thrown as
   * `OrphanSweepError` subclasses instead.
   */
  severity: 'warning';

  /**
   * Location the diagnostic is about.
   */
  path: TreePath;

  /**
   * Self-contained, human-readable description.
   */
  message: string;
};

/**
 * A reference points to an identifier absent from every targeted pool.
 * The edge is dropped from the graph.
 */
export type DanglingReferenceWarning = Simplify<
  DiagnosticOf<'dangling-reference'> & {
    field: string;
    identifier: Identifier;
    targetPools: readonly string[];
  }
>;

/**
 * A pool element without a usable identifier was skipped
 * (`missingIdentifier: 'skip'`).
 */
export type MissingIdentifierWarning = Simplify<
  DiagnosticOf<'missing-identifier'> & {
    pool: string;
    identifierField: string;
  }
>;

/**
 * Two elements of one pool share an identifier and were merged into one
 * graph node (`duplicateIdentifier: 'merge'`).
 */
export type DuplicateIdentifierWarning = Simplify<
  DiagnosticOf<'duplicate-identifier'> & {
    pool: string;
    identifier: Identifier;
    firstPath: TreePath;
  }
>;

/**
 * A value matched a pool pattern but is not a sequence; nothing was indexed
 * there.
 */
export type PoolShapeWarning = Simplify<
  DiagnosticOf<'pool-not-sequence'> & {
    pool: string;
  }
>;

export type Diagnostic =
  | DanglingReferenceWarning
  | MissingIdentifierWarning
  | DuplicateIdentifierWarning
  | PoolShapeWarning;

export type DiagnosticCode = Diagnostic['code'];
