/**
 * Configuration options for schema validation
 *
 * All options are optional; `resolveOptions()` fills in the defaults.
 */

/** How string lengths are counted for `minLength`/`maxLength` */
export type StringLengthMode = 'codepoints' | 'utf16';

export interface ValidatorOptions {
  /**
   * Maximum number of `$ref` hops followed while validating one document
   * (default: 256). Deeper chains fail with a validation error instead of
   * exhausting the stack.
   */
  maxReferenceDepth?: number;
  /** Unit used for string length constraints (default: 'codepoints') */
  stringLength?: StringLengthMode;
}

export type ResolvedOptions = Required<ValidatorOptions>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  maxReferenceDepth: 256,
  stringLength: 'codepoints',
};

/**
 * Resolves partial user options into complete configuration
 *
 * @throws {Error} When an option value is out of range
 */
export function resolveOptions(
  userOptions: Partial<ValidatorOptions> = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    maxReferenceDepth:
      userOptions.maxReferenceDepth ?? DEFAULT_OPTIONS.maxReferenceDepth,
    stringLength: userOptions.stringLength ?? DEFAULT_OPTIONS.stringLength,
  };

  if (
    !Number.isInteger(resolved.maxReferenceDepth) ||
    resolved.maxReferenceDepth < 0
  ) {
    throw new Error(
      `maxReferenceDepth must be a non-negative integer, got ${resolved.maxReferenceDepth}`
    );
  }

  return resolved;
}
