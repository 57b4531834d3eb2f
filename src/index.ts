export { clean } from './clean';
export type { CleanResult } from './clean';

export { resolveConfig, DEFAULT_IDENTIFIER_FIELD } from './config-validator';
export { cleanConfigSchema } from './config-schema';
export { validateWithSchema } from './validator';
export { defineConfig } from './types';
export type * from './types';

export {
  ConfigurationError,
  DuplicateIdentifierError,
  InvalidReferenceError,
  MissingIdentifierError,
  OrphanSweepError,
  ParseError
} from './errors';
export type { MissingIdentifierReason, OrphanSweepErrorCode } from './errors';

// Building blocks
export { walkTree, classifyValue, SKIP_CHILDREN, TreeLocation } from './walker';
export type { Visitor, WalkEntry } from './walker';
export {
  parsePathPattern,
  PatternMatcher,
  matchesPath,
  patternCanNestWithin
} from './path-pattern';
export type { MatchState } from './path-pattern';
export { analyzeTree, ROOT_ANCHOR } from './analysis';
export type {
  AnchorPin,
  EdgeOwner,
  PoolEntry,
  PoolIndex,
  PoolNode,
  ReferenceEdge,
  TreeAnalysis
} from './analysis';
export { buildReferenceGraph } from './graph';
export type { GraphRoot, ReferenceGraph, ResolvedEdge } from './graph';
export { computeReachability } from './reachability';
export type { MarkReason, NodeState, Reachability } from './reachability';
export { planRemovals, applyRemovals } from './prune-patches';

export {
  formatDiagnostic,
  formatCleanSummary,
  formatMarkReason,
  formatReachability
} from './report';
export type { CleanSummaryContext, CleanSummaryOptions } from './report';
