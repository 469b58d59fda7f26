/**
 * Text-level entry points: schema sources in, Context out; document text in,
 * per-document reports out. Parsing and compile failures come back as
 * boundary errors inside a Result.
 */

import { loadDocuments } from './document/loader.js';
import type { ValidationError } from './errors/validation-error.js';
import { Context } from './registry/context.js';
import type { DocumentNode } from './types/document.js';
import { CompileError, ParseError } from './types/errors.js';
import type { ValidatorOptions } from './types/options.js';
import { err, ok, type Result } from './types/result.js';

export interface SchemaSource {
  /** YAML or JSON text, possibly holding several schema documents */
  text: string;
  /** Shown in parse errors */
  filename?: string;
}

export interface CompileOptions extends ValidatorOptions {
  /** Also reject `$ref`s naming URIs absent from the compiled set */
  checkReferences?: boolean;
}

/**
 * Parse and compile schema sources, in order, into one Context.
 * Later definitions of a URI replace earlier ones.
 */
export function compileSchemas(
  sources: readonly (string | SchemaSource)[],
  options: CompileOptions = {}
): Result<Context, CompileError | ParseError> {
  const documents: DocumentNode[] = [];

  for (const source of sources) {
    const { text, filename } =
      typeof source === 'string' ? { text: source, filename: undefined } : source;
    const loaded = loadDocuments(text, { filename });
    if (loaded.isErr()) return err(loaded.error);
    documents.push(...loaded.value);
  }

  const { checkReferences = false, ...validatorOptions } = options;
  const context = Context.fromDocuments(documents, validatorOptions);
  if (context.isErr()) return err(new CompileError(context.error));

  if (checkReferences) {
    const references = context.value.checkReferences();
    if (references.isErr()) return err(new CompileError(references.error));
  }

  return ok(context.value);
}

export interface DocumentFailure {
  /** Position of the document within its stream */
  index: number;
  error: ValidationError;
}

export interface SourceReport {
  /** Number of documents found in the source */
  documents: number;
  failures: DocumentFailure[];
}

/**
 * Validate every document of `text` against the schema at `uri`.
 * A source whose documents all pass has no failures.
 */
export function validateSource(
  context: Context,
  uri: string,
  text: string,
  filename?: string
): Result<SourceReport, ParseError> {
  return loadDocuments(text, { filename }).map((documents) => {
    const failures: DocumentFailure[] = [];
    documents.forEach((document, index) => {
      const result = context.validate(uri, document);
      if (result.isErr()) failures.push({ index, error: result.error });
    });
    return { documents: documents.length, failures };
  });
}

/** Flattened report of every failure, in document order. */
export function formatReport(report: SourceReport): string {
  return report.failures.map((failure) => failure.error.toString()).join('');
}
