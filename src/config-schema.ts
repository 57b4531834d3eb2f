import { z } from 'zod';

import type { CleanConfig } from './types';

const nonEmptyString = z.string().min(1);

const pathPatternSchema = z.union([
  nonEmptyString,
  z.array(z.union([z.string(), z.number().int().nonnegative()]))
]);

const poolSchema = z
  .object({
    name: nonEmptyString,
    pathPattern: pathPatternSchema,
    identifierField: nonEmptyString.optional()
  })
  .strict();

const referenceFieldSchema = z
  .object({
    fieldName: nonEmptyString,
    mode: z.enum(['direct', 'nested']),
    nestedIdentifierField: nonEmptyString.optional(),
    targetPools: z.array(nonEmptyString).min(1).optional()
  })
  .strict();

/**
 * Structural schema of `CleanConfig`.
 *
 * Only shapes are checked here. Cross-field rules (declared pool names,
 * nested pools, mode/sub-field pairing, pattern syntax) live in
 * `resolveConfig`, which can phrase them in domain terms.
 *
 * Unknown keys are rejected so that a misspelled option does not silently
 * fall back to its default.
 */
export const cleanConfigSchema: z.ZodType<CleanConfig> = z
  .object({
    pools: z.array(poolSchema).min(1),
    referenceFields: z.array(referenceFieldSchema),
    anchors: z.array(pathPatternSchema).optional(),
    implicitRootAnchor: z.boolean().optional(),
    missingIdentifier: z.enum(['error', 'skip']).optional(),
    duplicateIdentifier: z.enum(['error', 'merge']).optional()
  })
  .strict();
