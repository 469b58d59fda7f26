import type { DocumentNode } from '../../types/document.js';
import { ValidationError } from '../../errors/validation-error.js';
import type { Result } from '../../types/result.js';
import type { CombinatorSchema, ValidationScope } from '../model.js';
import { evaluateBranches } from './combinator.js';

/** Every branch must accept the document; all failures are reported. */
export function validateAllOf(
  schema: CombinatorSchema<'allOf'>,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const { errors } = evaluateBranches(schema.schemas, scope, node);
  return ValidationError.condense(errors);
}
