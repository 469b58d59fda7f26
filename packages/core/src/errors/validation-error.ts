import { Breadcrumb } from './breadcrumb.js';
import { ErrorTree } from './error-tree.js';
import type { GenericError } from './generic.js';
import { err, ok, type Result } from '../types/result.js';

export type ValidationErrorKind =
  | {
      readonly type: 'WrongType';
      readonly expected: string;
      readonly actual: string;
    }
  | { readonly type: 'FieldMissing'; readonly field: string }
  | { readonly type: 'ExtraField'; readonly field: string }
  | { readonly type: 'ValidationError'; readonly error: string }
  | { readonly type: 'UnknownSchema'; readonly uri: string }
  | {
      readonly type: 'Multiple';
      readonly errors: readonly ValidationError[];
    };

/**
 * Failure while checking a document against a compiled schema.
 */
export class ValidationError extends ErrorTree<ValidationErrorKind> {
  protected get children(): readonly ValidationError[] | undefined {
    return this.kind.type === 'Multiple' ? this.kind.errors : undefined;
  }

  describe(): string {
    const kind = this.kind;
    switch (kind.type) {
      case 'WrongType':
        return `wrong type, expected ${kind.expected} got ${kind.actual}`;
      case 'FieldMissing':
        return `missing field, '${kind.field}' not found`;
      case 'ExtraField':
        return `field '${kind.field}' is not specified in the schema`;
      case 'ValidationError':
        return `special requirements for field not met: ${kind.error}`;
      case 'UnknownSchema':
        return `schema '${kind.uri}' references was not found`;
      case 'Multiple':
        return `multiple errors were encountered (${kind.errors.length})`;
    }
  }

  static wrongType(expected: string, actual: string): ValidationError {
    return new ValidationError({ type: 'WrongType', expected, actual });
  }

  static fieldMissing(field: string): ValidationError {
    return new ValidationError({ type: 'FieldMissing', field });
  }

  static extraField(field: string): ValidationError {
    return new ValidationError({ type: 'ExtraField', field });
  }

  /** A constraint (length, bound, pattern, inversion...) was violated. */
  static constraint(error: string): ValidationError {
    return new ValidationError({ type: 'ValidationError', error });
  }

  static unknownSchema(uri: string): ValidationError {
    return new ValidationError({ type: 'UnknownSchema', uri });
  }

  static multiple(errors: readonly ValidationError[]): ValidationError {
    return new ValidationError({ type: 'Multiple', errors });
  }

  /**
   * Lift a path-less helper error. The validator never produces a malformed
   * field of its own; one coming from a shared helper is reported as a
   * constraint violation.
   */
  static from(error: GenericError): ValidationError {
    switch (error.type) {
      case 'Multiple':
        return ValidationError.multiple(error.errors.map(ValidationError.from));
      case 'MalformedField':
        return ValidationError.constraint(error.error);
      default:
        return new ValidationError(error, new Breadcrumb());
    }
  }

  /**
   * Aggregate sibling failures: none → ok, one → itself, more → Multiple.
   */
  static condense(
    errors: readonly ValidationError[]
  ): Result<void, ValidationError> {
    if (errors.length === 0) return ok();
    const [first] = errors;
    if (errors.length === 1 && first) return err(first);
    return err(ValidationError.multiple(errors));
  }
}

export function addPathName(
  name: string
): (error: ValidationError) => ValidationError {
  return (error) => error.withPathName(name);
}

export function addPathIndex(
  index: number
): (error: ValidationError) => ValidationError {
  return (error) => error.withPathIndex(index);
}
