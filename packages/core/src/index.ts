// @yaml-contract/core entry point
//
// Text-level facades (compileSchemas/validateSource) live in ./api.js; the
// document model, error trees, Context and schema compilers are exported for
// callers that already hold parsed trees.

export * from './api.js';

// Document model and loading
export * from './types/document.js';
export {
  loadDocument,
  loadDocuments,
  fromValue,
  type LoadOptions,
} from './document/loader.js';
export {
  strictContents,
  lookup,
  optional,
  asType,
  type Cast,
} from './document/contract.js';

// Results, options and boundary errors
export * from './types/result.js';
export * from './types/options.js';
export * from './types/errors.js';
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Error trees
export {
  Breadcrumb,
  type BreadcrumbSegment,
  type SegmentLike,
} from './errors/breadcrumb.js';
export { ErrorTree, type ErrorLeaf } from './errors/error-tree.js';
export { GenericErrors, type GenericError } from './errors/generic.js';
export {
  SchemaError,
  type SchemaErrorKind,
} from './errors/schema-error.js';
export {
  ValidationError,
  type ValidationErrorKind,
} from './errors/validation-error.js';

// Schemas and Context
export type * from './schema/model.js';
export {
  compilePropertyType,
  validatePropertyType,
  forEachReference,
  type SchemaPath,
} from './schema/property-type.js';
export { compileSchema } from './schema/schema.js';
export {
  Context,
  validateDocument,
  assertValid,
} from './registry/context.js';
export {
  INTEGER_DOMAIN,
  REAL_DOMAIN,
  inclusive,
  exclusive,
  isValidRange,
  type Limit,
  type NumericDomain,
} from './util/limits.js';
