import { Breadcrumb } from './breadcrumb.js';
import { ErrorTree } from './error-tree.js';
import type { GenericError } from './generic.js';
import { err, ok, type Result } from '../types/result.js';

export type SchemaErrorKind =
  | {
      readonly type: 'WrongType';
      readonly expected: string;
      readonly actual: string;
    }
  | { readonly type: 'FieldMissing'; readonly field: string }
  | { readonly type: 'ExtraField'; readonly field: string }
  | { readonly type: 'UnknownType'; readonly unknownType: string }
  | { readonly type: 'MalformedField'; readonly error: string }
  | { readonly type: 'UnknownSchema'; readonly uri: string }
  | { readonly type: 'Multiple'; readonly errors: readonly SchemaError[] };

/**
 * Failure while compiling schema documents into a Context.
 */
export class SchemaError extends ErrorTree<SchemaErrorKind> {
  protected get children(): readonly SchemaError[] | undefined {
    return this.kind.type === 'Multiple' ? this.kind.errors : undefined;
  }

  describe(): string {
    const kind = this.kind;
    switch (kind.type) {
      case 'WrongType':
        return `wrong type, expected ${kind.expected} got ${kind.actual}`;
      case 'FieldMissing':
        return `field '${kind.field}' missing`;
      case 'ExtraField':
        return `field '${kind.field}' is not specified in the schema`;
      case 'UnknownType':
        return `unknown type specified: ${kind.unknownType}`;
      case 'MalformedField':
        return `malformed field: ${kind.error}`;
      case 'UnknownSchema':
        return `schema '${kind.uri}' references was not found`;
      case 'Multiple':
        return `multiple errors were encountered (${kind.errors.length})`;
    }
  }

  static wrongType(expected: string, actual: string): SchemaError {
    return new SchemaError({ type: 'WrongType', expected, actual });
  }

  static fieldMissing(field: string): SchemaError {
    return new SchemaError({ type: 'FieldMissing', field });
  }

  static extraField(field: string): SchemaError {
    return new SchemaError({ type: 'ExtraField', field });
  }

  static unknownType(unknownType: string): SchemaError {
    return new SchemaError({ type: 'UnknownType', unknownType });
  }

  static malformed(error: string): SchemaError {
    return new SchemaError({ type: 'MalformedField', error });
  }

  static unknownSchema(uri: string): SchemaError {
    return new SchemaError({ type: 'UnknownSchema', uri });
  }

  static multiple(errors: readonly SchemaError[]): SchemaError {
    return new SchemaError({ type: 'Multiple', errors });
  }

  /** Lift a path-less helper error into the schema error tree. */
  static from(error: GenericError): SchemaError {
    switch (error.type) {
      case 'Multiple':
        return SchemaError.multiple(error.errors.map(SchemaError.from));
      default:
        return new SchemaError(error, new Breadcrumb());
    }
  }

  /**
   * Aggregate sibling failures: none → ok, one → itself, more → Multiple.
   */
  static condense(errors: readonly SchemaError[]): Result<void, SchemaError> {
    if (errors.length === 0) return ok();
    const [first] = errors;
    if (errors.length === 1 && first) return err(first);
    return err(SchemaError.multiple(errors));
  }
}

/** Callback for `mapErr` that prefixes a field name. */
export function addSchemaPathName(
  name: string
): (error: SchemaError) => SchemaError {
  return (error) => error.withPathName(name);
}

/** Callback for `mapErr` that prefixes an element index. */
export function addSchemaPathIndex(
  index: number
): (error: SchemaError) => SchemaError {
  return (error) => error.withPathIndex(index);
}
