import stripJsonComments from 'strip-json-comments';

import type { PoolConfig, ReferenceFieldConfig } from '../types';
import { ConfigurationError, ParseError } from '../errors';
import { isArray, isPlainObject } from '../guards';

/**
 * Parses JSON that may carry `//` and `/* *\/` comments and trailing commas.
 *
 * Comments are blanked out (not removed), so positions reported by
 * `JSON.parse` still point into the original text.
 *
 * @param text - File contents.
 * @param source - File name, used in error messages.
 * @throws ParseError when the text is not valid JSON once comments and
 *         trailing commas are gone.
 */
export function parseJsonc(text: string, source: string): unknown {
  const json = stripJsonComments(text, { trailingCommas: true });
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new ParseError(source, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Configuration given on the command line.
 */
export type ConfigFlags = {
  readonly pools: readonly string[];
  readonly identifierField: string | undefined;
  readonly refs: readonly string[];
  readonly anchors: readonly string[];
  readonly rootAnchor: boolean;
  readonly skipMissing: boolean;
  readonly mergeDuplicates: boolean;
};

/**
 * Turns a `--ref` value into a reference field.
 *
 * - `field` -> `direct`
 * - `field.subField` -> `nested` with `nestedIdentifierField: subField`
 *
 * Field names containing dots need a configuration file.
 */
export function parseRefFlag(value: string): ReferenceFieldConfig {
  const parts = value.split('.');
  if (parts.length === 1 && parts[0].length > 0) {
    return { fieldName: parts[0], mode: 'direct' };
  }
  if (parts.length === 2 && parts[0].length > 0 && parts[1].length > 0) {
    return { fieldName: parts[0], mode: 'nested', nestedIdentifierField: parts[1] };
  }
  throw new ConfigurationError(
    `Invalid --ref "${value}": expected "field" or "field.subField".`
  );
}

/**
 * Merges command-line flags into the (unvalidated) file configuration.
 *
 * Logic:
 * 1. Start from the file configuration (an object) or an empty one.
 * 2. Append flag pools (named after their pattern), references and anchors
 *    to the file's lists. A file list of the wrong type is left in place for
 *    the schema to report.
 * 3. Policy and root-anchor flags override the file.
 *
 * The result is validated by `resolveConfig`.
 *
 * @throws ConfigurationError when the file configuration is not an object.
 */
export function mergeConfigFlags(
  fileConfig: unknown,
  flags: ConfigFlags
): Record<string, unknown> {
  // 1. Base
  let merged: Record<string, unknown>;
  if (fileConfig === undefined) {
    merged = {};
  } else if (isPlainObject(fileConfig)) {
    merged = { ...fileConfig };
  } else {
    throw new ConfigurationError('The configuration file must contain a JSON object.');
  }

  // 2. Lists
  const pools = flags.pools.map(
    (pattern): PoolConfig =>
      flags.identifierField === undefined
        ? { name: pattern, pathPattern: pattern }
        : { name: pattern, pathPattern: pattern, identifierField: flags.identifierField }
  );
  appendList(merged, 'pools', pools);
  appendList(merged, 'referenceFields', flags.refs.map(parseRefFlag));
  appendList(merged, 'anchors', flags.anchors);

  // 3. Overrides
  if (!flags.rootAnchor) merged.implicitRootAnchor = false;
  if (flags.skipMissing) merged.missingIdentifier = 'skip';
  if (flags.mergeDuplicates) merged.duplicateIdentifier = 'merge';

  return merged;
}

function appendList(
  target: Record<string, unknown>,
  key: string,
  extra: readonly unknown[]
): void {
  const existing = target[key];

  if (existing === undefined) {
    if (extra.length > 0) target[key] = [...extra];
    return;
  }
  if (isArray(existing)) target[key] = [...existing, ...extra];
}
