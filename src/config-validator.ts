import type {
  CleanConfig,
  PathPattern,
  ResolvedConfig,
  ResolvedPool,
  ResolvedReferenceField
} from './types';
import { cleanConfigSchema } from './config-schema';
import { ConfigurationError } from './errors';
import { isResolvedConfig } from './guards';
import { parsePathPattern, patternCanNestWithin } from './path-pattern';
import { validateWithSchema } from './validator';

export const DEFAULT_IDENTIFIER_FIELD = 'name';

/**
 * Validates user input and turns it into an immutable {@link ResolvedConfig}.
 *
 * Steps:
 * 1. Structural validation through the Standard Schema adapter
 *    (`cleanConfigSchema`, written with Zod).
 * 2. Pools: unique names, pattern syntax, identifier field default, and no
 *    two pools able to address the same or nested sequences.
 * 3. Reference fields: unique field names, mode/sub-field pairing, declared
 *    target pools (defaulting to all pools).
 * 4. Anchors: pattern syntax.
 *
 * An already resolved configuration is returned as is.
 *
 * @param input - Raw configuration (e.g. parsed from a JSON file).
 * @returns The resolved configuration.
 * @throws ConfigurationError on the first problem found.
 */
export function resolveConfig(input: unknown): ResolvedConfig {
  if (isResolvedConfig(input)) return input;

  // 1. Validate shape
  const config: CleanConfig = validateWithSchema(
    cleanConfigSchema,
    input,
    'clean configuration'
  );

  // 2. Pools
  const pools = resolvePools(config);

  // 3. Reference fields
  const referenceFields = resolveReferenceFields(config, pools);

  // 4. Anchors
  const anchors = (config.anchors ?? []).map((anchor, index) =>
    parsePathPattern(anchor, `anchors[${index}]`)
  );

  return Object.freeze({
    resolved: true,
    pools,
    referenceFields,
    anchors: Object.freeze(anchors),
    implicitRootAnchor: config.implicitRootAnchor ?? true,
    missingIdentifier: config.missingIdentifier ?? 'error',
    duplicateIdentifier: config.duplicateIdentifier ?? 'error'
  });
}

function resolvePools(config: CleanConfig): readonly ResolvedPool[] {
  const seen = new Set<string>();

  const pools = config.pools.map((pool, index): ResolvedPool => {
    if (seen.has(pool.name)) {
      throw new ConfigurationError(
        `Pool name "${pool.name}" is declared more than once (pools[${index}]).`
      );
    }
    seen.add(pool.name);

    return Object.freeze({
      name: pool.name,
      pattern: parsePathPattern(pool.pathPattern, `pools[${index}].pathPattern`),
      identifierField: pool.identifierField ?? DEFAULT_IDENTIFIER_FIELD
    });
  });

  assertPoolsDoNotNest(pools);
  return Object.freeze(pools);
}

/**
 * Rejects pool declarations that could address the same sequence, or a
 * sequence inside another pool's elements.
 *
 * Pruning an outer element would silently discard an inner pool's survivors,
 * and the inner elements' references would keep targets alive from a
 * removed location. Each pool element must therefore belong to exactly one
 * pool and never be contained in another pool element.
 */
function assertPoolsDoNotNest(pools: readonly ResolvedPool[]): void {
  for (const outer of pools) {
    for (const inner of pools) {
      if (outer === inner) continue;
      if (patternCanNestWithin(outer.pattern, inner.pattern)) {
        throw new ConfigurationError(
          `Pool "${inner.name}" (${describePattern(inner.pattern)}) can address a sequence ` +
            `within pool "${outer.name}" (${describePattern(outer.pattern)}). Pools must not overlap or nest.`
        );
      }
    }
  }
}

function resolveReferenceFields(
  config: CleanConfig,
  pools: readonly ResolvedPool[]
): readonly ResolvedReferenceField[] {
  const poolNames = pools.map(pool => pool.name);
  const declared = new Set(poolNames);
  const seen = new Set<string>();

  const fields = config.referenceFields.map(
    (field, index): ResolvedReferenceField => {
      const label = `referenceFields[${index}]`;

      if (seen.has(field.fieldName)) {
        throw new ConfigurationError(
          `Reference field "${field.fieldName}" is declared more than once (${label}).`
        );
      }
      seen.add(field.fieldName);

      if (field.mode === 'nested' && field.nestedIdentifierField === undefined) {
        throw new ConfigurationError(
          `Reference field "${field.fieldName}" (${label}) uses mode "nested" but has no "nestedIdentifierField".`
        );
      }
      if (field.mode === 'direct' && field.nestedIdentifierField !== undefined) {
        throw new ConfigurationError(
          `Reference field "${field.fieldName}" (${label}) uses mode "direct"; "nestedIdentifierField" only applies to mode "nested".`
        );
      }

      const targetPools = field.targetPools ?? poolNames;
      for (const target of targetPools) {
        if (!declared.has(target)) {
          throw new ConfigurationError(
            `Reference field "${field.fieldName}" (${label}) targets undeclared pool "${target}".`
          );
        }
      }

      return Object.freeze({
        fieldName: field.fieldName,
        mode: field.mode,
        nestedIdentifierField: field.nestedIdentifierField,
        targetPools: Object.freeze([...new Set(targetPools)])
      });
    }
  );

  return Object.freeze(fields);
}

function describePattern(pattern: PathPattern): string {
  return `"${pattern.source}"`;
}
