import {
  asMapping,
  strictContents,
} from '../../document/contract.js';
import type { DocumentNode } from '../../types/document.js';
import {
  SchemaError,
  addSchemaPathName,
} from '../../errors/schema-error.js';
import { ValidationError } from '../../errors/validation-error.js';
import { err, ok, type Result } from '../../types/result.js';
import { requiredField } from '../fields.js';
import type { NotSchema, ValidationScope } from '../model.js';
import {
  compilePropertyType,
  validatePropertyType,
} from '../property-type.js';

export function compileNot(
  node: DocumentNode
): Result<NotSchema, SchemaError> {
  const contents = strictContents(node, ['not'], []);
  if (contents.isErr()) return err(SchemaError.from(contents.error));

  const inner = requiredField(contents.value, 'not', 'hash', asMapping);
  if (inner.isErr()) return err(inner.error);

  return compilePropertyType(inner.value)
    .mapErr(addSchemaPathName('not'))
    .map((schema): NotSchema => ({ kind: 'not', schema }));
}

/** Succeeds exactly when the inner schema fails; its error is dropped. */
export function validateNot(
  schema: NotSchema,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const inner = validatePropertyType(schema.schema, scope, node);
  if (inner.isErr()) return ok();
  return err(
    ValidationError.constraint(
      'validation inversion failed because inner result matched'
    )
  );
}
