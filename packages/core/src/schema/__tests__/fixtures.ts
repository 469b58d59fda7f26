import { loadDocument } from '../../document/loader.js';
import type { DocumentNode } from '../../types/document.js';
import {
  resolveOptions,
  type ValidatorOptions,
} from '../../types/options.js';
import type {
  PropertyType,
  SchemaRegistry,
  ValidationScope,
} from '../model.js';
import {
  compilePropertyType,
  validatePropertyType,
} from '../property-type.js';

export const NO_SCHEMAS: SchemaRegistry = { getSchema: () => undefined };

export function yaml(source: string): DocumentNode {
  const result = loadDocument(source);
  if (result.isErr()) throw result.error;
  return result.value;
}

/** Compile a schema node, failing the test on compile errors. */
export function compiled(source: string | DocumentNode): PropertyType {
  const node = typeof source === 'string' ? yaml(source) : source;
  const result = compilePropertyType(node);
  if (result.isErr()) {
    throw new Error(`schema did not compile:\n${result.error.toString()}`);
  }
  return result.value;
}

/** Flattened compile report; empty when the schema compiles. */
export function compileReport(source: string): string {
  const result = compilePropertyType(yaml(source));
  return result.isErr() ? result.error.toString() : '';
}

export function scopeOf(
  registry: SchemaRegistry = NO_SCHEMAS,
  options: ValidatorOptions = {}
): ValidationScope {
  return { registry, options: resolveOptions(options), depth: 0 };
}

/** Flattened validation report; empty when the document is accepted. */
export function report(
  schema: PropertyType,
  document: string | DocumentNode,
  scope: ValidationScope = scopeOf()
): string {
  const node = typeof document === 'string' ? yaml(document) : document;
  const result = validatePropertyType(schema, scope, node);
  return result.isErr() ? result.error.toString() : '';
}
