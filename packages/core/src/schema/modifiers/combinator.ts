import { asSequence, strictContents } from '../../document/contract.js';
import type { DocumentNode } from '../../types/document.js';
import { SchemaError } from '../../errors/schema-error.js';
import type { ValidationError } from '../../errors/validation-error.js';
import { err, ok, type Result } from '../../types/result.js';
import { requiredField } from '../fields.js';
import type {
  CombinatorKind,
  CombinatorSchema,
  PropertyType,
  ValidationScope,
} from '../model.js';
import {
  compilePropertyType,
  validatePropertyType,
} from '../property-type.js';

/**
 * Compile `{<kind>: [node, ...]}`. The keyword must be the only key and its
 * list must not be empty; failing branches are reported at `.<kind>[i]`.
 */
export function compileCombinator<K extends CombinatorKind>(
  kind: K,
  node: DocumentNode
): Result<CombinatorSchema<K>, SchemaError> {
  const contents = strictContents(node, [kind], []);
  if (contents.isErr()) return err(SchemaError.from(contents.error));

  const list = requiredField(contents.value, kind, 'array', asSequence);
  if (list.isErr()) return err(list.error);

  if (list.value.items.length === 0) {
    return err(
      SchemaError.malformed(
        `${kind} modifier requires an array of schemas to validate against`
      ).withPathName(kind)
    );
  }

  const schemas: PropertyType[] = [];
  const errors: SchemaError[] = [];
  list.value.items.forEach((item, index) => {
    const compiled = compilePropertyType(item);
    if (compiled.isErr()) {
      errors.push(compiled.error.withPathIndex(index).withPathName(kind));
    } else {
      schemas.push(compiled.value);
    }
  });

  const condensed = SchemaError.condense(errors);
  if (condensed.isErr()) return err(condensed.error);
  return ok({ kind, schemas });
}

export interface BranchOutcome {
  /** Positions of the branches that accepted the document */
  readonly matched: readonly number[];
  /** Failures of the other branches, each at `[i]` */
  readonly errors: readonly ValidationError[];
}

/** Validate the document against every branch; no branch is skipped. */
export function evaluateBranches(
  schemas: readonly PropertyType[],
  scope: ValidationScope,
  node: DocumentNode
): BranchOutcome {
  const matched: number[] = [];
  const errors: ValidationError[] = [];
  schemas.forEach((schema, index) => {
    const result = validatePropertyType(schema, scope, node);
    if (result.isErr()) {
      errors.push(result.error.withPathIndex(index));
    } else {
      matched.push(index);
    }
  });
  return { matched, errors };
}
