import {
  asBool,
  asNode,
  asSequence,
  asType,
  strictContents,
} from '../../document/contract.js';
import {
  documentsEqual,
  type DocumentNode,
  type MappingNode,
} from '../../types/document.js';
import {
  SchemaError,
  addSchemaPathName,
} from '../../errors/schema-error.js';
import {
  ValidationError,
  addPathIndex,
} from '../../errors/validation-error.js';
import { err, ok, type Result } from '../../types/result.js';
import { optionalCount, optionalField } from '../fields.js';
import type { ArraySchema, PropertyType, ValidationScope } from '../model.js';
import {
  compilePropertyType,
  validatePropertyType,
} from '../property-type.js';

const ARRAY_KEYS = [
  'type',
  'items',
  'minItems',
  'maxItems',
  'uniqueItems',
  'contains',
  'minContains',
  'maxContains',
];

export function compileArray(
  node: DocumentNode
): Result<ArraySchema, SchemaError> {
  const contents = strictContents(node, [], ARRAY_KEYS);
  if (contents.isErr()) return err(SchemaError.from(contents.error));
  const mapping = contents.value;

  const minItems = optionalCount(mapping, 'minItems');
  if (minItems.isErr()) return err(minItems.error);
  const maxItems = optionalCount(mapping, 'maxItems');
  if (maxItems.isErr()) return err(maxItems.error);
  const uniqueItems = optionalField(mapping, 'uniqueItems', 'boolean', asBool);
  if (uniqueItems.isErr()) return err(uniqueItems.error);

  if (
    minItems.value !== undefined &&
    maxItems.value !== undefined &&
    minItems.value > maxItems.value
  ) {
    return err(
      SchemaError.malformed('minItems cannot be greater than maxItems')
    );
  }

  const items = compileChild(mapping, 'items');
  if (items.isErr()) return err(items.error);
  const contains = compileChild(mapping, 'contains');
  if (contains.isErr()) return err(contains.error);
  const minContains = optionalCount(mapping, 'minContains');
  if (minContains.isErr()) return err(minContains.error);
  const maxContains = optionalCount(mapping, 'maxContains');
  if (maxContains.isErr()) return err(maxContains.error);

  const containsError = checkContainsCounts(
    contains.value !== undefined,
    minContains.value,
    maxContains.value
  );
  if (containsError) return err(SchemaError.malformed(containsError));

  return ok({
    kind: 'array',
    items: items.value,
    minItems: minItems.value,
    maxItems: maxItems.value,
    uniqueItems: uniqueItems.value ?? false,
    contains: contains.value,
    minContains: minContains.value,
    maxContains: maxContains.value,
  });
}

/** Compile an optional nested schema node; its errors land under `.<field>`. */
function compileChild(
  mapping: MappingNode,
  field: string
): Result<PropertyType | undefined, SchemaError> {
  return optionalField(mapping, field, 'hash', asNode).flatMap(
    (child): Result<PropertyType | undefined, SchemaError> =>
      child === undefined
        ? ok(undefined)
        : compilePropertyType(child).mapErr(addSchemaPathName(field))
  );
}

function checkContainsCounts(
  hasContains: boolean,
  minContains: number | undefined,
  maxContains: number | undefined
): string | undefined {
  const hasMin = minContains !== undefined;
  const hasMax = maxContains !== undefined;

  if (!hasContains) {
    if (hasMin && hasMax) {
      return "minContains and maxContains requires 'contains' to specify a schema to validate against";
    }
    if (hasMin) {
      return "minContains requires 'contains' to specify a schema to validate against";
    }
    if (hasMax) {
      return "maxContains requires 'contains' to specify a schema to validate against";
    }
    return undefined;
  }

  if (
    minContains !== undefined &&
    maxContains !== undefined &&
    minContains > maxContains
  ) {
    return 'minContains cannot be greater than maxContains';
  }
  return undefined;
}

/**
 * Cardinality, uniqueness and `contains` stop at the first failure; `items`
 * failures are collected for every element.
 */
export function validateArray(
  schema: ArraySchema,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const sequence = asType(node, 'array', asSequence);
  if (sequence.isErr()) return err(ValidationError.from(sequence.error));
  const items = sequence.value.items;

  if (schema.minItems !== undefined && items.length < schema.minItems) {
    return err(
      ValidationError.constraint('array contains fewer than minItems items')
    );
  }

  if (schema.maxItems !== undefined && items.length > schema.maxItems) {
    return err(
      ValidationError.constraint('array contains more than maxItems items')
    );
  }

  if (schema.uniqueItems) {
    const duplicate = firstDuplicate(items);
    if (duplicate !== undefined) {
      return err(
        ValidationError.constraint('array contains duplicate key').withPathIndex(
          duplicate
        )
      );
    }
  }

  if (schema.contains) {
    const containsSchema = schema.contains;
    const matched = items.filter((item) =>
      validatePropertyType(containsSchema, scope, item).isOk()
    ).length;

    if (schema.minContains !== undefined) {
      if (matched < schema.minContains) {
        return err(
          ValidationError.constraint(
            "fewer than minContains items validated against schema in 'contains'"
          )
        );
      }
    } else if (matched < 1) {
      return err(
        ValidationError.constraint(
          "at least one item in the array must match the 'contains' schema"
        )
      );
    }

    if (schema.maxContains !== undefined && matched > schema.maxContains) {
      return err(
        ValidationError.constraint(
          "more than maxContains items validated against schema in 'contains'"
        )
      );
    }
  }

  if (schema.items) {
    const itemSchema = schema.items;
    const errors: ValidationError[] = [];
    items.forEach((item, index) => {
      const result = validatePropertyType(itemSchema, scope, item).mapErr(
        addPathIndex(index)
      );
      if (result.isErr()) errors.push(result.error);
    });
    return ValidationError.condense(errors);
  }

  return ok();
}

/** Index of the first element equal to an earlier one. */
function firstDuplicate(items: readonly DocumentNode[]): number | undefined {
  for (let i = 1; i < items.length; i++) {
    const item = items[i];
    if (item === undefined) continue;
    for (let j = 0; j < i; j++) {
      const earlier = items[j];
      if (earlier !== undefined && documentsEqual(earlier, item)) return i;
    }
  }
  return undefined;
}
