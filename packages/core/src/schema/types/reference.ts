import { asString, strictContents } from '../../document/contract.js';
import type { DocumentNode } from '../../types/document.js';
import { SchemaError } from '../../errors/schema-error.js';
import { ValidationError } from '../../errors/validation-error.js';
import { err, type Result } from '../../types/result.js';
import { requiredField } from '../fields.js';
import type { ReferenceSchema, ValidationScope } from '../model.js';
import { validatePropertyType } from '../property-type.js';

export function compileReference(
  node: DocumentNode
): Result<ReferenceSchema, SchemaError> {
  const contents = strictContents(node, ['$ref'], []);
  if (contents.isErr()) return err(SchemaError.from(contents.error));

  return requiredField(contents.value, '$ref', 'string', asString).map(
    (uri): ReferenceSchema => ({ kind: 'reference', uri })
  );
}

/**
 * Resolve the URI against the registry at validation time and delegate to
 * the target's root node. Every hop counts towards `maxReferenceDepth`.
 */
export function validateReference(
  schema: ReferenceSchema,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  if (scope.depth >= scope.options.maxReferenceDepth) {
    return err(ValidationError.constraint('maximum reference depth exceeded'));
  }

  const target = scope.registry.getSchema(schema.uri);
  if (!target) return err(ValidationError.unknownSchema(schema.uri));

  return validatePropertyType(
    target.root,
    { ...scope, depth: scope.depth + 1 },
    node
  );
}
