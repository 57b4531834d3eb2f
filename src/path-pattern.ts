import type {
  PathPattern,
  PathPatternInput,
  PathSegment,
  PatternSegment,
  TreePath
} from './types';
import { ConfigurationError } from './errors';

export const ANY_INDEX_TOKEN = '*';

const CANONICAL_INDEX = /^(0|[1-9]\d*)$/;

/**
 * Compiles a user-written pattern.
 *
 * Accepted forms (see `PathPatternInput`):
 * - dotted string: split on `.`; `*` becomes the any-index wildcard; empty
 *   segments (`"a..b"`, `""`, `".a"`) are rejected.
 * - segment array: strings are literal keys (`"*"` is the wildcard, `""` is
 *   a valid key), numbers must be non-negative integers and match that index.
 *
 * @param input
 *   The pattern as written in the configuration.
 * @param label
 *   Where the pattern comes from (e.g. `pools[0].pathPattern`), used in
 *   error messages.
 * @throws ConfigurationError when the pattern is malformed.
 */
export function parsePathPattern(
  input: PathPatternInput,
  label: string
): PathPattern {
  const segments =
    typeof input === 'string'
      ? parseDottedPattern(input, label)
      : parseSegmentArray(input, label);

  return { source: formatPattern(segments), segments };
}

function parseDottedPattern(input: string, label: string): PatternSegment[] {
  const parts = input.split('.');

  return parts.map((part, position) => {
    if (part.length === 0) {
      throw new ConfigurationError(
        `Malformed path pattern at ${label}: "${input}" has an empty segment at position ${position}. ` +
          'Use the array form for keys that are empty or contain dots.'
      );
    }
    return toPatternSegment(part);
  });
}

function parseSegmentArray(
  input: readonly (string | number)[],
  label: string
): PatternSegment[] {
  return input.map((part, position) => {
    if (typeof part === 'number') {
      if (!Number.isSafeInteger(part) || part < 0) {
        throw new ConfigurationError(
          `Malformed path pattern at ${label}: segment ${position} (${part}) is not a non-negative integer index.`
        );
      }
      return { type: 'key', key: String(part) };
    }
    return toPatternSegment(part);
  });
}

function toPatternSegment(part: string): PatternSegment {
  return part === ANY_INDEX_TOKEN ? { type: 'anyIndex' } : { type: 'key', key: part };
}

/**
 * Display form of a compiled pattern (`"groups.*.members"`, `"<root>"`).
 */
export function formatPattern(segments: readonly PatternSegment[]): string {
  if (segments.length === 0) return '<root>';
  return segments
    .map(segment => (segment.type === 'anyIndex' ? ANY_INDEX_TOKEN : segment.key))
    .join('.');
}

/**
 * Checks a single path segment against a single pattern segment.
 *
 * - `anyIndex` matches sequence indices only.
 * - A literal key matches a map key with the same text, or a sequence index
 *   whose decimal form equals the key (so `"0"` addresses the first element).
 */
export function matchesSegment(
  pattern: PatternSegment,
  segment: PathSegment
): boolean {
  if (pattern.type === 'anyIndex') return typeof segment === 'number';
  return String(segment) === pattern.key;
}

/**
 * Full-path match (same length, every segment matches).
 */
export function matchesPath(pattern: PathPattern, path: TreePath): boolean {
  if (pattern.segments.length !== path.length) return false;
  return pattern.segments.every((segment, index) =>
    matchesSegment(segment, path[index])
  );
}

/**
 * Whether two pattern segments can match the same path segment.
 */
function segmentsIntersect(a: PatternSegment, b: PatternSegment): boolean {
  if (a.type === 'anyIndex' && b.type === 'anyIndex') return true;
  if (a.type === 'key' && b.type === 'key') return a.key === b.key;

  const literal = a.type === 'key' ? a.key : b.type === 'key' ? b.key : '';
  return CANONICAL_INDEX.test(literal);
}

function canMatchIndex(segment: PatternSegment): boolean {
  return segment.type === 'anyIndex' || CANONICAL_INDEX.test(segment.key);
}

/**
 * Checks whether some sequence matched by `inner` can lie inside (or be) a
 * sequence matched by `outer`.
 *
 * Logic:
 * 1. `inner` must be at least as long as `outer`, and the first
 *    `outer.length` segments must be able to match the same path.
 * 2. Same length: both can address the very same sequence.
 * 3. Longer: the next `inner` segment must be able to address an element
 *    index, since the only children of a sequence are its elements.
 */
export function patternCanNestWithin(
  outer: PathPattern,
  inner: PathPattern
): boolean {
  const depth = outer.segments.length;
  if (inner.segments.length < depth) return false;

  for (let index = 0; index < depth; index++) {
    if (!segmentsIntersect(outer.segments[index], inner.segments[index])) {
      return false;
    }
  }

  if (inner.segments.length === depth) return true;
  return canMatchIndex(inner.segments[depth]);
}

/**
 * Incremental match progress of a node: which patterns still match the path
 * from the root down to this node.
 */
export type MatchState = {
  readonly depth: number;
  readonly candidates: readonly number[];
};

const NO_CANDIDATES: readonly number[] = [];

/**
 * Matches a fixed list of patterns against paths as they are walked.
 *
 * Instead of comparing every pattern against every materialized path, each
 * node carries the patterns whose prefix it matches; a child only tests
 * those candidates against its own segment. The cost per node is bounded by
 * the number of patterns, independent of depth.
 *
 * @template T
 *   Payload associated with each pattern (e.g. the pool it declares).
 */
export class PatternMatcher<T> {
  private readonly entries: ReadonlyArray<{ pattern: PathPattern; value: T }>;
  readonly root: MatchState;

  constructor(entries: ReadonlyArray<{ pattern: PathPattern; value: T }>) {
    this.entries = entries;
    this.root = {
      depth: 0,
      candidates: entries.length === 0 ? NO_CANDIDATES : entries.map((_, index) => index)
    };
  }

  /**
   * Progress for the child reached from `state` through `segment`.
   */
  step(state: MatchState, segment: PathSegment): MatchState {
    const depth = state.depth;
    if (state.candidates.length === 0) {
      return { depth: depth + 1, candidates: NO_CANDIDATES };
    }

    const candidates = state.candidates.filter(index => {
      const segments = this.entries[index].pattern.segments;
      return depth < segments.length && matchesSegment(segments[depth], segment);
    });

    return { depth: depth + 1, candidates };
  }

  /**
   * Payloads of all patterns that match the node exactly.
   */
  matches(state: MatchState): T[] {
    const matched: T[] = [];
    for (const index of state.candidates) {
      const entry = this.entries[index];
      if (entry.pattern.segments.length === state.depth) matched.push(entry.value);
    }
    return matched;
  }
}
