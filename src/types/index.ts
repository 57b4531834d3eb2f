export type * from './tree';
export type * from './diagnostics';
export type * from './patch';
export type * from './types-helper';
export type {
  CleanConfig,
  DuplicateIdentifierPolicy,
  MissingIdentifierPolicy,
  PathPattern,
  PathPatternInput,
  PatternSegment,
  PoolConfig,
  ReferenceFieldConfig,
  ReferenceMode,
  ResolvedConfig,
  ResolvedPool,
  ResolvedReferenceField
} from './config';
export { defineConfig } from './config';
