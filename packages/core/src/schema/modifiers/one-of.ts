import type { DocumentNode } from '../../types/document.js';
import { ValidationError } from '../../errors/validation-error.js';
import { ok, type Result } from '../../types/result.js';
import type { CombinatorSchema, ValidationScope } from '../model.js';
import { evaluateBranches } from './combinator.js';

/**
 * Exactly one branch must accept the document. With no match every branch
 * failure is reported; with several, each matching branch is reported as
 * ambiguous instead.
 */
export function validateOneOf(
  schema: CombinatorSchema<'oneOf'>,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const { matched, errors } = evaluateBranches(schema.schemas, scope, node);

  if (matched.length === 1) return ok();
  if (matched.length === 0) return ValidationError.condense(errors);

  return ValidationError.condense(
    matched.map((index) =>
      ValidationError.constraint(
        'multiple branches validated successfully'
      ).withPathIndex(index)
    )
  );
}
