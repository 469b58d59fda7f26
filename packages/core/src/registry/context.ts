/**
 * Registry of compiled schemas, keyed by URI.
 *
 * Built once from schema documents and never mutated afterwards. `$ref`
 * nodes are resolved against it lazily, each time they are validated, so
 * schemas may reference each other (or themselves) in any declaration order.
 */

import { Breadcrumb } from '../errors/breadcrumb.js';
import { SchemaError } from '../errors/schema-error.js';
import { ValidationError } from '../errors/validation-error.js';
import type { DocumentNode } from '../types/document.js';
import { DocumentError, type ErrorContext } from '../types/errors.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type ValidatorOptions,
} from '../types/options.js';
import {
  err,
  ok,
  partitionResults,
  type Result,
} from '../types/result.js';
import type { Schema, SchemaRegistry } from '../schema/model.js';
import {
  forEachReference,
  validatePropertyType,
} from '../schema/property-type.js';
import { compileSchema } from '../schema/schema.js';

export class Context implements SchemaRegistry {
  private readonly schemas: ReadonlyMap<string, Schema>;
  readonly options: ResolvedOptions;

  private constructor(schemas: Iterable<Schema>, options: ResolvedOptions) {
    const byUri = new Map<string, Schema>();
    // Duplicate URIs: the last definition wins.
    for (const schema of schemas) byUri.set(schema.uri, schema);
    this.schemas = byUri;
    this.options = options;
  }

  static empty(options: ValidatorOptions = {}): Context {
    return new Context([], resolveOptions(options));
  }

  /** Build from already compiled schemas. */
  static fromSchemas(
    schemas: Iterable<Schema>,
    options: ValidatorOptions = {}
  ): Context {
    return new Context(schemas, resolveOptions(options));
  }

  /**
   * Compile every schema document. All documents are attempted and every
   * failure is reported together.
   */
  static fromDocuments(
    documents: readonly DocumentNode[],
    options: ValidatorOptions = {}
  ): Result<Context, SchemaError> {
    const { values: schemas, errors } = partitionResults(
      documents.map((document) => compileSchema(document))
    );

    const condensed = SchemaError.condense(errors);
    if (condensed.isErr()) return err(condensed.error);
    return ok(Context.fromSchemas(schemas, options));
  }

  getSchema(uri: string): Schema | undefined {
    return this.schemas.get(uri);
  }

  get uris(): string[] {
    return [...this.schemas.keys()];
  }

  get size(): number {
    return this.schemas.size;
  }

  /** Validate a document against the schema registered under `uri`. */
  validate(uri: string, document: DocumentNode): Result<void, ValidationError> {
    const schema = this.getSchema(uri);
    if (!schema) return err(ValidationError.unknownSchema(uri));
    return validateDocument(schema, this, document);
  }

  /**
   * Report every `$ref` that names a URI missing from this context. These
   * would otherwise only surface while validating a document that reaches
   * them.
   */
  checkReferences(): Result<void, SchemaError> {
    const errors: SchemaError[] = [];
    for (const schema of this.schemas.values()) {
      forEachReference(schema.root, (uri, path) => {
        if (this.schemas.has(uri)) return;
        errors.push(
          new SchemaError(
            { type: 'UnknownSchema', uri },
            Breadcrumb.fromPath([schema.uri, ...path])
          )
        );
      });
    }
    return SchemaError.condense(errors);
  }
}

export function validateDocument(
  schema: Schema,
  context: Context,
  document: DocumentNode
): Result<void, ValidationError> {
  return validatePropertyType(
    schema.root,
    { registry: context, options: context.options, depth: 0 },
    document
  );
}

/**
 * Throwing variant of `Context.validate` for callers that prefer
 * exceptions.
 *
 * @throws {DocumentError} When the document does not match the schema
 */
export function assertValid(
  context: Context,
  uri: string,
  document: DocumentNode,
  errorContext: ErrorContext = {}
): void {
  const result = context.validate(uri, document);
  if (result.isErr()) {
    throw new DocumentError(result.error, { uri, ...errorContext });
  }
}
