import type { StandardSchemaV1 } from '@standard-schema/spec';

import { ConfigurationError } from './errors';

/**
 * Validates and transforms input using a Standard Schema V1 compliant
 * validator.
 *
 * This function abstracts the validation logic by leveraging the `~standard`
 * property defined by the Standard Schema V1 specification.
 *
 * About `~standard`:
 * - Purpose:
 *   It acts as a universal adapter. The configuration schema is written with
 *   Zod, but nothing here depends on Zod itself, so callers embedding the
 *   cleaner may hand in a schema from Valibot, ArkType, etc. for their own
 *   wrapper formats.
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // 1. Universal Adapter (Result Pattern):
 *   //    - Returns an object ({ value } or { issues }).
 *   //    - Does NOT throw errors.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *
 *   // 2. Library-Specific Internals (Ignored):
 *   //    - Native methods (like .parse) typically throw exceptions.
 *   parse,
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * @template S - The specific schema type.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - The raw, untrusted input.
 * @param subject - What is being validated (used for error reporting).
 * @returns The validated (and potentially transformed) value.
 *
 * @throws ConfigurationError
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise (async validation is not supported).
 * - If validation fails (the first issue is reported with its path).
 */

/**
 * Public Overload:
 * Establishes the strict type contract using generics.
 *
 * Implementation Note - Overloads:
 * The return type `InferOutput<S>` depends on the generic schema. The
 * runtime values handled in the body are `unknown`; separating the signature
 * from the implementation avoids a type assertion on every return statement.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  subject: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  subject: string
) {
  // Fail-safe:
  // Guards against plain objects being handed in as schemas.
  if (!('~standard' in schema)) {
    throw new ConfigurationError(
      `The schema for ${subject} is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot).`
    );
  }

  const result = schema['~standard'].validate(input);

  // Cleaning is strictly synchronous.
  if (result instanceof Promise) {
    throw new ConfigurationError(
      `Async schema validation is not supported for ${subject}.`
    );
  }

  // Handle 'Result Pattern' (see JSDoc).
  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const issuePath = formatIssuePath(firstIssue.path);
    throw new ConfigurationError(
      `Invalid ${subject} at "${issuePath}": ${firstIssue.message}`
    );
  }

  // Some validators only report issues and do not return a decoded `value`.
  if ('value' in result) {
    return result.value;
  }

  return input;
}

/**
 * Joins an issue path into `pools.0.name` form (`<root>` when empty).
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string {
  if (!path || path.length === 0) return '<root>';
  return path
    .map(segment => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');
}
