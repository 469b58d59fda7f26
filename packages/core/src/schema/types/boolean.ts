import { asBool, asType, strictContents } from '../../document/contract.js';
import type { DocumentNode } from '../../types/document.js';
import { SchemaError } from '../../errors/schema-error.js';
import { ValidationError } from '../../errors/validation-error.js';
import { err, ok, type Result } from '../../types/result.js';
import type { BooleanSchema } from '../model.js';

export function compileBoolean(
  node: DocumentNode
): Result<BooleanSchema, SchemaError> {
  return strictContents(node, [], ['type'])
    .mapErr(SchemaError.from)
    .map((): BooleanSchema => ({ kind: 'boolean' }));
}

export function validateBoolean(
  node: DocumentNode
): Result<void, ValidationError> {
  const value = asType(node, 'boolean', asBool);
  return value.isErr() ? err(ValidationError.from(value.error)) : ok();
}
