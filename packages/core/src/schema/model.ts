/**
 * Compiled schema nodes.
 *
 * `PropertyType` is a closed tagged union: every node owns its children, and
 * the only way to form a cycle is a `reference`, which names a schema URI and
 * is resolved against the Context each time it is validated.
 */

import type { NumericConstraints } from '../util/limits.js';
import type { ResolvedOptions } from '../types/options.js';

export interface StringSchema {
  readonly kind: 'string';
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: RegExp;
}

export interface IntegerSchema {
  readonly kind: 'integer';
  readonly constraints: NumericConstraints<bigint>;
}

export interface RealSchema {
  readonly kind: 'real';
  readonly constraints: NumericConstraints<number>;
}

export interface BooleanSchema {
  readonly kind: 'boolean';
}

export interface ArraySchema {
  readonly kind: 'array';
  readonly items?: PropertyType;
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly uniqueItems: boolean;
  readonly contains?: PropertyType;
  readonly minContains?: number;
  readonly maxContains?: number;
}

export interface HashSchema {
  readonly kind: 'hash';
  readonly items?: PropertyType;
}

export interface ObjectSchema {
  readonly kind: 'object';
  /** Declared fields, iterated in sorted name order */
  readonly items: ReadonlyMap<string, PropertyType>;
  readonly required: readonly string[];
}

export interface ReferenceSchema {
  readonly kind: 'reference';
  readonly uri: string;
}

export interface NotSchema {
  readonly kind: 'not';
  readonly schema: PropertyType;
}

export type CombinatorKind = 'oneOf' | 'anyOf' | 'allOf';

export interface CombinatorSchema<K extends CombinatorKind = CombinatorKind> {
  readonly kind: K;
  readonly schemas: readonly PropertyType[];
}

export type PropertyType =
  | ObjectSchema
  | ArraySchema
  | HashSchema
  | StringSchema
  | IntegerSchema
  | RealSchema
  | BooleanSchema
  | ReferenceSchema
  | NotSchema
  | CombinatorSchema<'oneOf'>
  | CombinatorSchema<'anyOf'>
  | CombinatorSchema<'allOf'>;

export type PropertyKind = PropertyType['kind'];

/** A named top-level schema. */
export interface Schema {
  readonly uri: string;
  readonly root: PropertyType;
}

/** Read access to compiled schemas by URI. */
export interface SchemaRegistry {
  getSchema(uri: string): Schema | undefined;
}

/**
 * Everything a validator needs besides the schema node and the document:
 * where to resolve references, the resolved options, and how many reference
 * hops led here.
 */
export interface ValidationScope {
  readonly registry: SchemaRegistry;
  readonly options: ResolvedOptions;
  readonly depth: number;
}
