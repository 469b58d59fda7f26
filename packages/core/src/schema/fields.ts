import {
  asInteger,
  lookup,
  optional,
  type Cast,
} from '../document/contract.js';
import { getEntry, type MappingNode } from '../types/document.js';
import { SchemaError, addSchemaPathName } from '../errors/schema-error.js';
import { err, ok, type Result } from '../types/result.js';

/**
 * Optional schema keyword: absent or null → undefined, wrong type →
 * WrongType at `.<field>`.
 */
export function optionalField<T>(
  mapping: MappingNode,
  field: string,
  expected: string,
  cast: Cast<T>
): Result<T | undefined, SchemaError> {
  return optional(lookup(mapping, field, expected, cast))
    .mapErr(SchemaError.from)
    .mapErr(addSchemaPathName(field));
}

/** Required schema keyword; a missing value is reported without a path. */
export function requiredField<T>(
  mapping: MappingNode,
  field: string,
  expected: string,
  cast: Cast<T>
): Result<T, SchemaError> {
  return lookup(mapping, field, expected, cast)
    .mapErr(SchemaError.from)
    .mapErr((error) =>
      error.kind.type === 'FieldMissing' ? error : error.withPathName(field)
    );
}

/** Optional non-negative integer keyword, narrowed to a JS number. */
export function optionalCount(
  mapping: MappingNode,
  field: string
): Result<number | undefined, SchemaError> {
  return optionalField(mapping, field, 'integer', asInteger).flatMap(
    (value): Result<number | undefined, SchemaError> => {
      if (value === undefined) return ok(undefined);
      if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
        return err(
          SchemaError.malformed(
            `${field} must be a non-negative integer`
          ).withPathName(field)
        );
      }
      return ok(Number(value));
    }
  );
}

/** Whether the mapping carries a non-null value under `field`. */
export function hasField(mapping: MappingNode, field: string): boolean {
  const value = getEntry(mapping, field);
  return value !== undefined && value.kind !== 'null';
}

