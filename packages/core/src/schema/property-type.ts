/**
 * Compile and validate dispatch over the closed `PropertyType` union.
 */

import { asString } from '../document/contract.js';
import { typeName, type DocumentNode } from '../types/document.js';
import { SchemaError } from '../errors/schema-error.js';
import type { ValidationError } from '../errors/validation-error.js';
import { err, type Result } from '../types/result.js';
import { hasField, requiredField } from './fields.js';
import type {
  CombinatorKind,
  PropertyType,
  ValidationScope,
} from './model.js';
import { compileArray, validateArray } from './types/array.js';
import { compileBoolean, validateBoolean } from './types/boolean.js';
import { compileHash, validateHash } from './types/hash.js';
import {
  compileInteger,
  compileReal,
  validateInteger,
  validateReal,
} from './types/numeric.js';
import { compileObject, validateObject } from './types/object.js';
import { compileReference, validateReference } from './types/reference.js';
import { compileString, validateString } from './types/string.js';
import { validateAllOf } from './modifiers/all-of.js';
import { validateAnyOf } from './modifiers/any-of.js';
import { compileCombinator } from './modifiers/combinator.js';
import { compileNot, validateNot } from './modifiers/not.js';
import { validateOneOf } from './modifiers/one-of.js';

const COMBINATORS: readonly CombinatorKind[] = ['oneOf', 'allOf', 'anyOf'];

/**
 * Compile one schema node. `$ref`, `not` and the list combinators are
 * recognised by their keyword; anything else is selected by `type`.
 */
export function compilePropertyType(
  node: DocumentNode
): Result<PropertyType, SchemaError> {
  if (node.kind !== 'mapping') {
    return err(SchemaError.wrongType('hash', typeName(node)));
  }

  if (hasField(node, '$ref')) return compileReference(node);
  if (hasField(node, 'not')) return compileNot(node);
  for (const kind of COMBINATORS) {
    if (hasField(node, kind)) return compileCombinator(kind, node);
  }

  const type = requiredField(node, 'type', 'string', asString);
  if (type.isErr()) return err(type.error);

  switch (type.value) {
    case 'object':
      return compileObject(node);
    case 'string':
      return compileString(node);
    case 'integer':
      return compileInteger(node);
    case 'real':
      return compileReal(node);
    case 'array':
      return compileArray(node);
    case 'hash':
      return compileHash(node);
    case 'boolean':
      return compileBoolean(node);
    default:
      return err(SchemaError.unknownType(type.value));
  }
}

export function validatePropertyType(
  schema: PropertyType,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  switch (schema.kind) {
    case 'object':
      return validateObject(schema, scope, node);
    case 'array':
      return validateArray(schema, scope, node);
    case 'hash':
      return validateHash(schema, scope, node);
    case 'string':
      return validateString(schema, scope, node);
    case 'integer':
      return validateInteger(schema, node);
    case 'real':
      return validateReal(schema, node);
    case 'boolean':
      return validateBoolean(node);
    case 'reference':
      return validateReference(schema, scope, node);
    case 'not':
      return validateNot(schema, scope, node);
    case 'oneOf':
      return validateOneOf(schema, scope, node);
    case 'anyOf':
      return validateAnyOf(schema, scope, node);
    case 'allOf':
      return validateAllOf(schema, scope, node);
  }
}

export type SchemaPath = readonly (string | number)[];

/**
 * Visit every `$ref` under `schema` with its root-to-leaf path, using the
 * same segments compile errors use (`items.<name>`, `oneOf[i]`, ...).
 */
export function forEachReference(
  schema: PropertyType,
  visit: (uri: string, path: SchemaPath) => void,
  path: SchemaPath = []
): void {
  switch (schema.kind) {
    case 'reference':
      visit(schema.uri, path);
      return;
    case 'object':
      for (const [name, field] of schema.items) {
        forEachReference(field, visit, [...path, 'items', name]);
      }
      return;
    case 'array':
      if (schema.items) {
        forEachReference(schema.items, visit, [...path, 'items']);
      }
      if (schema.contains) {
        forEachReference(schema.contains, visit, [...path, 'contains']);
      }
      return;
    case 'hash':
      if (schema.items) {
        forEachReference(schema.items, visit, [...path, 'items']);
      }
      return;
    case 'not':
      forEachReference(schema.schema, visit, [...path, 'not']);
      return;
    case 'oneOf':
    case 'anyOf':
    case 'allOf':
      schema.schemas.forEach((child, index) => {
        forEachReference(child, visit, [...path, schema.kind, index]);
      });
      return;
    case 'string':
    case 'integer':
    case 'real':
    case 'boolean':
      return;
  }
}
