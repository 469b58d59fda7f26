import { asType, strictContents } from '../../document/contract.js';
import type { DocumentNode, MappingNode } from '../../types/document.js';
import { SchemaError } from '../../errors/schema-error.js';
import { ValidationError } from '../../errors/validation-error.js';
import { err, ok, type Result } from '../../types/result.js';
import {
  INTEGER_DOMAIN,
  REAL_DOMAIN,
  exclusive,
  inclusive,
  isValidRange,
  satisfiesLower,
  satisfiesUpper,
  type Limit,
  type NumericConstraints,
  type NumericDomain,
} from '../../util/limits.js';
import { optionalField } from '../fields.js';
import type { IntegerSchema, RealSchema } from '../model.js';

const NUMERIC_KEYS = [
  'type',
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
];

export function compileInteger(
  node: DocumentNode
): Result<IntegerSchema, SchemaError> {
  return compileConstraints(node, INTEGER_DOMAIN).map(
    (constraints): IntegerSchema => ({ kind: 'integer', constraints })
  );
}

export function compileReal(
  node: DocumentNode
): Result<RealSchema, SchemaError> {
  return compileConstraints(node, REAL_DOMAIN).map(
    (constraints): RealSchema => ({ kind: 'real', constraints })
  );
}

export function validateInteger(
  schema: IntegerSchema,
  node: DocumentNode
): Result<void, ValidationError> {
  return validateNumber(schema.constraints, INTEGER_DOMAIN, node);
}

export function validateReal(
  schema: RealSchema,
  node: DocumentNode
): Result<void, ValidationError> {
  return validateNumber(schema.constraints, REAL_DOMAIN, node);
}

function compileConstraints<T extends bigint | number>(
  node: DocumentNode,
  domain: NumericDomain<T>
): Result<NumericConstraints<T>, SchemaError> {
  const contents = strictContents(node, [], NUMERIC_KEYS);
  if (contents.isErr()) return err(SchemaError.from(contents.error));
  return readConstraints(contents.value, domain);
}

/**
 * Read the bound keywords and `multipleOf` of a numeric node and check that
 * they describe a usable range.
 */
function readConstraints<T extends bigint | number>(
  mapping: MappingNode,
  domain: NumericDomain<T>
): Result<NumericConstraints<T>, SchemaError> {
  const read = (field: string) =>
    optionalField(mapping, field, domain.kind, domain.cast);

  const minimum = read('minimum');
  if (minimum.isErr()) return err(minimum.error);
  const exclusiveMinimum = read('exclusiveMinimum');
  if (exclusiveMinimum.isErr()) return err(exclusiveMinimum.error);
  const maximum = read('maximum');
  if (maximum.isErr()) return err(maximum.error);
  const exclusiveMaximum = read('exclusiveMaximum');
  if (exclusiveMaximum.isErr()) return err(exclusiveMaximum.error);
  const multipleOf = read('multipleOf');
  if (multipleOf.isErr()) return err(multipleOf.error);

  const lower = pickLimit(minimum.value, exclusiveMinimum.value);
  if (lower === 'both') {
    return err(
      SchemaError.malformed(
        'minimum and exclusiveMinimum cannot both be specified'
      )
    );
  }

  const upper = pickLimit(maximum.value, exclusiveMaximum.value);
  if (upper === 'both') {
    return err(
      SchemaError.malformed(
        'maximum and exclusiveMaximum cannot both be specified'
      )
    );
  }

  if (multipleOf.value !== undefined && multipleOf.value <= domain.zero) {
    return err(
      SchemaError.malformed('multipleOf must be greater than zero')
        .withPathName('multipleOf')
    );
  }

  if (!isValidRange(domain, lower, upper)) {
    return err(
      SchemaError.malformed(
        'range between the lower and upper limits does not contain any values'
      )
    );
  }

  return ok({ lower, upper, multipleOf: multipleOf.value });
}

function pickLimit<T>(
  inclusiveValue: T | undefined,
  exclusiveValue: T | undefined
): Limit<T> | 'both' | undefined {
  if (inclusiveValue !== undefined && exclusiveValue !== undefined) {
    return 'both';
  }
  if (inclusiveValue !== undefined) return inclusive(inclusiveValue);
  if (exclusiveValue !== undefined) return exclusive(exclusiveValue);
  return undefined;
}

function validateNumber<T extends bigint | number>(
  constraints: NumericConstraints<T>,
  domain: NumericDomain<T>,
  node: DocumentNode
): Result<void, ValidationError> {
  const value = asType(node, domain.kind, domain.accept);
  if (value.isErr()) return err(ValidationError.from(value.error));

  const { lower, upper, multipleOf } = constraints;

  if (lower && !satisfiesLower(lower, value.value)) {
    return err(
      ValidationError.constraint('value violates lower limit constraint')
    );
  }

  if (upper && !satisfiesUpper(upper, value.value)) {
    return err(
      ValidationError.constraint('value violates upper limit constraint')
    );
  }

  if (multipleOf !== undefined && !domain.isMultiple(value.value, multipleOf)) {
    return err(
      ValidationError.constraint(
        'value must be a multiple of the multipleOf field'
      )
    );
  }

  return ok();
}
