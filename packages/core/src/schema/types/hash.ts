import {
  asMapping,
  asNode,
  asType,
  strictContents,
} from '../../document/contract.js';
import type { DocumentNode } from '../../types/document.js';
import {
  SchemaError,
  addSchemaPathName,
} from '../../errors/schema-error.js';
import {
  ValidationError,
  addPathIndex,
} from '../../errors/validation-error.js';
import { err, ok, type Result } from '../../types/result.js';
import { optionalField } from '../fields.js';
import type { HashSchema, ValidationScope } from '../model.js';
import {
  compilePropertyType,
  validatePropertyType,
} from '../property-type.js';

export function compileHash(
  node: DocumentNode
): Result<HashSchema, SchemaError> {
  const contents = strictContents(node, [], ['type', 'items']);
  if (contents.isErr()) return err(SchemaError.from(contents.error));

  const items = optionalField(contents.value, 'items', 'hash', asNode);
  if (items.isErr()) return err(items.error);
  if (items.value === undefined) return ok({ kind: 'hash' });

  return compilePropertyType(items.value)
    .mapErr(addSchemaPathName('items'))
    .map((schema): HashSchema => ({ kind: 'hash', items: schema }));
}

/**
 * Keys are unconstrained; every value is checked against `items` and all
 * failures are reported, each at the entry's position.
 */
export function validateHash(
  schema: HashSchema,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const mapping = asType(node, 'hash', asMapping);
  if (mapping.isErr()) return err(ValidationError.from(mapping.error));

  const itemSchema = schema.items;
  if (!itemSchema) return ok();

  const errors: ValidationError[] = [];
  mapping.value.entries.forEach((entry, index) => {
    const result = validatePropertyType(itemSchema, scope, entry.value).mapErr(
      addPathIndex(index)
    );
    if (result.isErr()) errors.push(result.error);
  });
  return ValidationError.condense(errors);
}
