import type {
  Identifier,
  PathSegment,
  ResolvedReferenceField,
  TreePath
} from '../types';
import type { TreeLocation } from '../walker';

import { InvalidReferenceError } from '../errors';
import { isArray, isIdentifier, isPlainObject, isUnsafeInteger } from '../guards';

/**
 * One identifier read from a reference field.
 */
export type ExtractedReference = {
  readonly identifier: Identifier;

  /**
   * Segments from the field's value down to the identifier:
   * - direct, single value: `[]`
   * - direct, sequence:     `[index]`
   * - nested:               `[index, nestedIdentifierField]`
   */
  readonly segments: readonly PathSegment[];
};

/**
 * Reads the identifiers a reference field points to.
 *
 * Modes
 * -----
 * - `direct`: an identifier, or a sequence of identifiers.
 * - `nested`: a sequence of maps, each holding the identifier under
 *   `nestedIdentifierField`.
 *
 * An empty sequence yields no references. Anything else that does not fit
 * the mode (e.g. `null`, a map in `direct` mode, a map element without the
 * sub-field) is an error: silently ignoring it would let its target look
 * unreferenced and get pruned.
 *
 * @param field - The resolved reference field configuration.
 * @param value - The field's value.
 * @param location - Location of the map holding the field (error reporting).
 * @throws InvalidReferenceError
 */
export function readReferences(
  field: ResolvedReferenceField,
  value: unknown,
  location: TreeLocation
): ExtractedReference[] {
  const fail = (detail: string, segments: readonly PathSegment[] = []): never => {
    throw new InvalidReferenceError(
      field.fieldName,
      [...location.toPath(), field.fieldName, ...segments],
      detail
    );
  };

  if (field.mode === 'direct') {
    if (isIdentifier(value)) return [{ identifier: value, segments: [] }];
    if (!isArray(value)) {
      return fail(
        `expected an identifier or a sequence of identifiers, got ${describeValue(value)}.`
      );
    }

    return value.map((item, index) => {
      if (!isIdentifier(item)) {
        return fail(`expected an identifier, got ${describeValue(item)}.`, [index]);
      }
      return { identifier: item, segments: [index] };
    });
  }

  const subField = field.nestedIdentifierField;
  if (subField === undefined) {
    return fail('mode "nested" requires "nestedIdentifierField".');
  }

  if (!isArray(value)) {
    return fail(`expected a sequence of objects, got ${describeValue(value)}.`);
  }

  return value.map((item, index) => {
    if (!isPlainObject(item)) {
      return fail(`expected an object, got ${describeValue(item)}.`, [index]);
    }
    if (!Object.hasOwn(item, subField)) {
      return fail(`object has no "${subField}" field.`, [index]);
    }

    const identifier = item[subField];
    if (!isIdentifier(identifier)) {
      return fail(
        `expected an identifier, got ${describeValue(identifier)}.`,
        [index, subField]
      );
    }
    return { identifier, segments: [index, subField] };
  });
}

/**
 * Appends extracted segments to the path of the field.
 */
export function referencePath(
  mapPath: TreePath,
  fieldName: string,
  reference: ExtractedReference
): TreePath {
  return [...mapPath, fieldName, ...reference.segments];
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (isArray(value)) return 'a sequence';
  if (isPlainObject(value)) return 'an object';
  if (typeof value === 'string') return value.length === 0 ? 'an empty string' : 'a string';
  if (isUnsafeInteger(value)) return `the number ${value}, outside the safe integer range`;
  if (typeof value === 'number') return `the number ${value}`;
  return `a ${typeof value}`;
}
