/**
 * Errors raised by helpers that serve both the schema compiler and the
 * document validator (structural contract, field lookup, casts). They carry
 * no path; callers convert them into the error tree they are building.
 */
export type GenericError =
  | {
      readonly type: 'WrongType';
      readonly expected: string;
      readonly actual: string;
    }
  | { readonly type: 'FieldMissing'; readonly field: string }
  | { readonly type: 'ExtraField'; readonly field: string }
  | { readonly type: 'MalformedField'; readonly error: string }
  | { readonly type: 'Multiple'; readonly errors: readonly GenericError[] };

export const GenericErrors = {
  wrongType(expected: string, actual: string): GenericError {
    return { type: 'WrongType', expected, actual };
  },
  fieldMissing(field: string): GenericError {
    return { type: 'FieldMissing', field };
  },
  extraField(field: string): GenericError {
    return { type: 'ExtraField', field };
  },
  malformed(error: string): GenericError {
    return { type: 'MalformedField', error };
  },
  /** One error stays as it is; several become a Multiple. */
  condense(errors: readonly GenericError[]): GenericError | undefined {
    if (errors.length === 0) return undefined;
    if (errors.length === 1) return errors[0];
    return { type: 'Multiple', errors };
  },
};
