import { asString, asType, strictContents } from '../../document/contract.js';
import type { DocumentNode } from '../../types/document.js';
import { SchemaError } from '../../errors/schema-error.js';
import { ValidationError } from '../../errors/validation-error.js';
import type { StringLengthMode } from '../../types/options.js';
import { err, ok, type Result } from '../../types/result.js';
import { optionalCount, optionalField } from '../fields.js';
import type { StringSchema, ValidationScope } from '../model.js';

export function compileString(
  node: DocumentNode
): Result<StringSchema, SchemaError> {
  const contents = strictContents(
    node,
    [],
    ['type', 'minLength', 'maxLength', 'pattern']
  );
  if (contents.isErr()) return err(SchemaError.from(contents.error));
  const mapping = contents.value;

  const minLength = optionalCount(mapping, 'minLength');
  if (minLength.isErr()) return err(minLength.error);
  const maxLength = optionalCount(mapping, 'maxLength');
  if (maxLength.isErr()) return err(maxLength.error);
  const pattern = optionalField(mapping, 'pattern', 'string', asString).flatMap(
    compilePattern
  );
  if (pattern.isErr()) return err(pattern.error);

  const min = minLength.value;
  const max = maxLength.value;
  if (min !== undefined && max !== undefined && min > max) {
    return err(
      SchemaError.malformed('minLength cannot be greater than maxLength')
    );
  }

  return ok({
    kind: 'string',
    minLength: min,
    maxLength: max,
    pattern: pattern.value,
  });
}

function compilePattern(
  source: string | undefined
): Result<RegExp | undefined, SchemaError> {
  if (source === undefined) return ok(undefined);
  try {
    return ok(new RegExp(source, 'u'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(SchemaError.malformed(reason).withPathName('pattern'));
  }
}

export function stringLength(value: string, mode: StringLengthMode): number {
  return mode === 'utf16' ? value.length : [...value].length;
}

/**
 * Type check, then length and pattern in turn; the first failing check is
 * the one reported.
 */
export function validateString(
  schema: StringSchema,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const value = asType(node, 'string', asString);
  if (value.isErr()) return err(ValidationError.from(value.error));

  const length = stringLength(value.value, scope.options.stringLength);

  if (schema.minLength !== undefined && length < schema.minLength) {
    return err(
      ValidationError.constraint('string length is less than minLength')
    );
  }

  if (schema.maxLength !== undefined && length > schema.maxLength) {
    return err(
      ValidationError.constraint('string length is greater than maxLength')
    );
  }

  if (schema.pattern && !schema.pattern.test(value.value)) {
    return err(
      ValidationError.constraint(
        'supplied value does not match regex pattern for field'
      )
    );
  }

  return ok();
}
