/**
 * A path pattern as written by users.
 *
 * - Dotted string: `"groups.*.members"`. `*` matches any sequence index; every
 *   other segment is a literal key. Segments may not be empty.
 * - Segment array: `["groups", "*", "members"]`. Use this form for keys that
 *   contain dots. Non-negative integers are literal indices.
 * - The empty array addresses the root.
 */
export type PathPatternInput = string | readonly (string | number)[];

/**
 * A named collection of candidate objects subject to pruning.
 */
export type PoolConfig = {
  /**
   * Unique pool name, referenced by `ReferenceFieldConfig.targetPools`.
   */
  name: string;

  /**
   * Location of the pool sequence. A wildcard pattern may match several
   * sequences; all of them share one identifier namespace.
   */
  pathPattern: PathPatternInput;

  /**
   * Key under which each element carries its identifier.
   * @default 'name'
   */
  identifierField?: string;
};

/**
 * How a reference field's value encodes the identifiers it points to.
 *
 * - `direct`: the value is an identifier, or a sequence of identifiers.
 * - `nested`: the value is a sequence of maps, each carrying the identifier
 *   under `nestedIdentifierField`.
 */
export type ReferenceMode = 'direct' | 'nested';

export type ReferenceFieldConfig = {
  /**
   * Map key that marks a reference wherever it appears in the tree.
   */
  fieldName: string;

  mode: ReferenceMode;

  /**
   * Key holding the identifier inside each map of a `nested` reference.
   * Required for `nested`, rejected for `direct`.
   */
  nestedIdentifierField?: string;

  /**
   * Pools the identifiers may resolve into. Defaults to every declared pool.
   */
  targetPools?: readonly string[];
};

/**
 * What to do with a pool element that carries no usable identifier.
 *
 * - `error`: abort the run with `MissingIdentifierError`.
 * - `skip`: record a warning and leave the element out of the index. Skipped
 *   elements are never removed, and their references count as anchored.
 */
export type MissingIdentifierPolicy = 'error' | 'skip';

/**
 * What to do when two elements of one pool share an identifier.
 *
 * - `error`: abort the run with `DuplicateIdentifierError`.
 * - `merge`: record a warning and treat all elements sharing the identifier
 *   as a single graph node; they are kept or removed together.
 */
export type DuplicateIdentifierPolicy = 'error' | 'merge';

/**
 * User-facing configuration of a cleaning run.
 *
 * @example
 * ```ts
 * defineConfig({
 *   pools: [{ name: 'dicts', pathPattern: 'importantListOfDicts' }],
 *   referenceFields: [
 *     { fieldName: 'linkedImportantDict', mode: 'nested', nestedIdentifierField: 'name' }
 *   ],
 *   anchors: ['importantOtherDict']
 * });
 * ```
 */
export type CleanConfig = {
  pools: readonly PoolConfig[];
  referenceFields: readonly ReferenceFieldConfig[];

  /**
   * Locations that are always in use. Their outgoing references seed the
   * reachability analysis. An anchor that matches a pool element, or a
   * location inside one, pins that element.
   */
  anchors?: readonly PathPatternInput[];

  /**
   * Whether the top-level location acts as an anchor, so that references
   * outside every pool element and configured anchor count as in use.
   * @default true
   */
  implicitRootAnchor?: boolean;

  /** @default 'error' */
  missingIdentifier?: MissingIdentifierPolicy;

  /** @default 'error' */
  duplicateIdentifier?: DuplicateIdentifierPolicy;
};

/**
 * A single step of a compiled path pattern.
 */
export type PatternSegment =
  | { readonly type: 'key'; readonly key: string }
  | { readonly type: 'anyIndex' };

export type PathPattern = {
  /**
   * Display form (`"groups.*.members"`, or `"<root>"` for the empty pattern).
   */
  readonly source: string;
  readonly segments: readonly PatternSegment[];
};

export type ResolvedPool = {
  readonly name: string;
  readonly pattern: PathPattern;
  readonly identifierField: string;
};

export type ResolvedReferenceField = {
  readonly fieldName: string;
  readonly mode: ReferenceMode;
  readonly nestedIdentifierField: string | undefined;
  readonly targetPools: readonly string[];
};

/**
 * Validated, defaulted and frozen configuration, as consumed by the analysis.
 *
 * Produced by `resolveConfig`; the `resolved` brand lets `clean` skip
 * re-validation when a caller reuses one configuration across runs.
 */
export type ResolvedConfig = {
  readonly resolved: true;
  readonly pools: readonly ResolvedPool[];
  readonly referenceFields: readonly ResolvedReferenceField[];
  readonly anchors: readonly PathPattern[];
  readonly implicitRootAnchor: boolean;
  readonly missingIdentifier: MissingIdentifierPolicy;
  readonly duplicateIdentifier: DuplicateIdentifierPolicy;
};

/**
 * Identity helper that type-checks a configuration object literal.
 */
export function defineConfig<T extends CleanConfig>(config: T): T {
  return config;
}
