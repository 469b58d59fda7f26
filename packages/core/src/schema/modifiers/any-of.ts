import type { DocumentNode } from '../../types/document.js';
import { ValidationError } from '../../errors/validation-error.js';
import { ok, type Result } from '../../types/result.js';
import type { CombinatorSchema, ValidationScope } from '../model.js';
import { evaluateBranches } from './combinator.js';

/**
 * At least one branch must accept the document. When none does, the
 * failures of every branch are reported, not just the closest one.
 */
export function validateAnyOf(
  schema: CombinatorSchema<'anyOf'>,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const { matched, errors } = evaluateBranches(schema.schemas, scope, node);
  if (matched.length > 0) return ok();
  return ValidationError.condense(errors);
}
