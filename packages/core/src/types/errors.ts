/**
 * Boundary error hierarchy
 * Thrown (or returned) where the engine meets callers: files, parsing,
 * configuration, and the "assert" flavour of the validation API.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';
import type { SchemaError } from '../errors/schema-error.js';
import type { ValidationError } from '../errors/validation-error.js';

export interface ErrorContext {
  uri?: string; // Schema URI the error relates to
  file?: string; // Input file the error relates to
  line?: number; // 1-based line in the input
  column?: number; // 1-based column in the input
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ContractErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all yaml-contract boundary errors
 */
export abstract class ContractError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ContractErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes the stack
   * - prod: excludes the stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Schema documents did not compile. `report` is the flattened error tree.
 */
export class CompileError extends ContractError {
  public readonly schemaError: SchemaError;

  constructor(schemaError: SchemaError, context?: ErrorContext) {
    super({
      message: schemaError.toString(),
      errorCode: ErrorCode.SCHEMA_COMPILATION_FAILED,
      context,
    });
    this.schemaError = schemaError;
  }

  get report(): string {
    return this.message;
  }
}

/**
 * A document did not satisfy its schema.
 */
export class DocumentError extends ContractError {
  public readonly validationError: ValidationError;

  constructor(validationError: ValidationError, context?: ErrorContext) {
    super({
      message: validationError.toString(),
      errorCode: ErrorCode.DOCUMENT_VALIDATION_FAILED,
      context,
    });
    this.validationError = validationError;
  }

  get report(): string {
    return this.message;
  }
}

/**
 * Document text could not be parsed into a tree.
 */
export class ParseError extends ContractError {
  constructor(params: {
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_FAILED,
      context: params.context,
      cause: params.cause,
    });
  }

  get file(): string | undefined {
    return this.context?.file;
  }
}

/**
 * Invalid invocation or options.
 */
export class ConfigError extends ContractError {
  constructor(
    message: string,
    errorCode: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: ErrorContext
  ) {
    super({ message, errorCode, context });
  }
}

/**
 * An input file could not be read.
 */
export class FileError extends ContractError {
  constructor(file: string, cause: Error) {
    super({
      message: `could not read file ${file}: ${cause.message}`,
      errorCode: ErrorCode.FILE_ERROR,
      context: { file },
      cause,
    });
  }
}

export function isContractError(error: unknown): error is ContractError {
  return error instanceof ContractError;
}
