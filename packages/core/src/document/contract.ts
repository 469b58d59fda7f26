/**
 * Structural contract and typed field access over mapping nodes.
 *
 * These helpers are shared by the schema compiler (checking schema authoring
 * mappings) and the object validator (checking documents), so they report
 * path-less GenericErrors that each side lifts into its own error tree.
 */

import {
  getEntry,
  keyText,
  typeName,
  type DocumentNode,
  type MappingNode,
  type SequenceNode,
} from '../types/document.js';
import { GenericErrors, type GenericError } from '../errors/generic.js';
import { err, ok, type Result } from '../types/result.js';

/** Narrowing cast used by `asType`/`lookup`; undefined means wrong type. */
export type Cast<T> = (node: DocumentNode) => T | undefined;

export const asString: Cast<string> = (node) =>
  node.kind === 'string' ? node.value : undefined;

export const asInteger: Cast<bigint> = (node) =>
  node.kind === 'integer' ? node.value : undefined;

export const asReal: Cast<number> = (node) =>
  node.kind === 'real' ? node.value : undefined;

/** Reals, and integers widened to reals. */
export const asNumber: Cast<number> = (node) => {
  if (node.kind === 'real') return node.value;
  if (node.kind === 'integer') return Number(node.value);
  return undefined;
};

export const asBool: Cast<boolean> = (node) =>
  node.kind === 'boolean' ? node.value : undefined;

export const asSequence: Cast<SequenceNode> = (node) =>
  node.kind === 'sequence' ? node : undefined;

export const asMapping: Cast<MappingNode> = (node) =>
  node.kind === 'mapping' ? node : undefined;

export const asNode: Cast<DocumentNode> = (node) => node;

/**
 * Cast a node, failing with WrongType naming the expected type.
 */
export function asType<T>(
  node: DocumentNode,
  expected: string,
  cast: Cast<T>
): Result<T, GenericError> {
  const value = cast(node);
  if (value === undefined) {
    return err(GenericErrors.wrongType(expected, typeName(node)));
  }
  return ok(value);
}

/**
 * Look up and cast a field. An absent key and an explicit null are both
 * reported as FieldMissing.
 */
export function lookup<T>(
  mapping: MappingNode,
  field: string,
  expected: string,
  cast: Cast<T>
): Result<T, GenericError> {
  const value = getEntry(mapping, field);
  if (value === undefined || value.kind === 'null') {
    return err(GenericErrors.fieldMissing(field));
  }
  return asType(value, expected, cast);
}

/** Turn FieldMissing into an absent value; keep every other failure. */
export function optional<T>(
  result: Result<T, GenericError>
): Result<T | undefined, GenericError> {
  if (result.isErr() && result.error.type === 'FieldMissing') {
    return ok(undefined);
  }
  return result;
}

/**
 * Check that a mapping carries every required key and nothing outside
 * `required ∪ optional`. All missing keys (in `required` order) and all
 * unexpected keys (in document order) are reported together.
 */
export function strictContents(
  node: DocumentNode,
  required: readonly string[],
  optionalKeys: readonly string[]
): Result<MappingNode, GenericError> {
  if (node.kind !== 'mapping') {
    return err(GenericErrors.wrongType('hash', typeName(node)));
  }

  const present = new Set<string>();
  for (const entry of node.entries) {
    if (entry.key.kind === 'string') present.add(entry.key.value);
  }

  const allowed = new Set([...required, ...optionalKeys]);
  const errors: GenericError[] = [];

  for (const field of required) {
    if (!present.has(field)) errors.push(GenericErrors.fieldMissing(field));
  }

  for (const entry of node.entries) {
    if (entry.key.kind !== 'string' || !allowed.has(entry.key.value)) {
      errors.push(GenericErrors.extraField(keyText(entry.key)));
    }
  }

  const condensed = GenericErrors.condense(errors);
  return condensed ? err(condensed) : ok(node);
}
