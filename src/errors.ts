import type { Identifier, TreePath } from './types';
import { formatPathForDisplay } from './utils/path-utils';

export const ERROR_PREFIX = '[orphan-sweep]';

export type OrphanSweepErrorCode =
  | 'configuration'
  | 'missing-identifier'
  | 'duplicate-identifier'
  | 'invalid-reference'
  | 'parse';

/**
 * Base class of every fatal condition.
 *
 * Zero-tolerance policy
 * ---------------------
 * Configuration and structural errors abort the run before any pruning
 * decision is made. Partial pruning of an inconsistent document could remove
 * entries that are in fact referenced, so there is no "best effort" mode for
 * these conditions; the policies in `CleanConfig` only downgrade the cases
 * that have an unambiguous recovery (skip, merge).
 */
export class OrphanSweepError extends Error {
  readonly code: OrphanSweepErrorCode;

  constructor(code: OrphanSweepErrorCode, message: string) {
    super(`${ERROR_PREFIX} ${message}`);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The configuration is malformed or inconsistent.
 */
export class ConfigurationError extends OrphanSweepError {
  constructor(message: string) {
    super('configuration', message);
  }
}

/**
 * Why a pool element has no usable identifier.
 */
export type MissingIdentifierReason =
  | 'not-a-map'
  | 'missing-field'
  | 'invalid-value'
  | 'unsafe-integer';

/**
 * A pool element lacks a usable identifier.
 */
export class MissingIdentifierError extends OrphanSweepError {
  readonly pool: string;
  readonly path: TreePath;
  readonly identifierField: string;
  readonly reason: MissingIdentifierReason;

  constructor(
    pool: string,
    path: TreePath,
    identifierField: string,
    reason: MissingIdentifierReason
  ) {
    super(
      'missing-identifier',
      describeMissingIdentifier(pool, path, identifierField, reason)
    );
    this.pool = pool;
    this.path = path;
    this.identifierField = identifierField;
    this.reason = reason;
  }
}

/**
 * Two elements of the same pool share an identifier, so a reference to it
 * cannot be resolved unambiguously.
 */
export class DuplicateIdentifierError extends OrphanSweepError {
  readonly pool: string;
  readonly identifier: Identifier;
  readonly path: TreePath;
  readonly firstPath: TreePath;

  constructor(
    pool: string,
    identifier: Identifier,
    path: TreePath,
    firstPath: TreePath
  ) {
    super(
      'duplicate-identifier',
      describeDuplicateIdentifier(pool, identifier, path, firstPath)
    );
    this.pool = pool;
    this.identifier = identifier;
    this.path = path;
    this.firstPath = firstPath;
  }
}

/**
 * A reference field's value cannot be read as identifiers under its mode.
 */
export class InvalidReferenceError extends OrphanSweepError {
  readonly field: string;
  readonly path: TreePath;

  constructor(field: string, path: TreePath, detail: string) {
    super(
      'invalid-reference',
      `Invalid reference "${field}" at "${formatPathForDisplay(path)}": ${detail}`
    );
    this.field = field;
    this.path = path;
  }
}

/**
 * A document or configuration file is not valid JSON (after comments and
 * trailing commas are removed).
 */
export class ParseError extends OrphanSweepError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super('parse', `Cannot parse "${source}": ${detail}`);
    this.source = source;
  }
}

/**
 * Formats an identifier the way it is written in JSON (`"a"`, `1`).
 */
export function formatIdentifier(identifier: Identifier): string {
  return JSON.stringify(identifier);
}

export function describeMissingIdentifier(
  pool: string,
  path: TreePath,
  identifierField: string,
  reason: MissingIdentifierReason
): string {
  const location = `Element "${formatPathForDisplay(path)}" of pool "${pool}"`;
  switch (reason) {
    case 'not-a-map':
      return `${location} is not an object and cannot carry "${identifierField}".`;
    case 'missing-field':
      return `${location} has no "${identifierField}" field.`;
    case 'invalid-value':
      return `${location} has a "${identifierField}" that is not a non-empty string or finite number.`;
    case 'unsafe-integer':
      return (
        `${location} has a numeric "${identifierField}" outside the safe integer range, ` +
        'where distinct values can compare equal. Write it as a string.'
      );
  }
}

export function describeDuplicateIdentifier(
  pool: string,
  identifier: Identifier,
  path: TreePath,
  firstPath: TreePath
): string {
  return (
    `Identifier ${formatIdentifier(identifier)} appears twice in pool "${pool}": ` +
    `"${formatPathForDisplay(firstPath)}" and "${formatPathForDisplay(path)}".`
  );
}
