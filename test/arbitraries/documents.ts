/**
 * Fast-check arbitraries for document trees and schema nodes.
 */

import * as fc from 'fast-check';
import type { DocumentNode, MappingEntry } from '@yaml-contract/core';

/** Small pool so generated mappings share and collide on keys. */
export const FIELD_NAMES = [
  'alpha',
  'beta',
  'gamma',
  'delta',
  'epsilon',
  'zeta',
] as const;

export const fieldName = fc.constantFrom(...FIELD_NAMES);

export const stringNode = fc
  .string({ maxLength: 12 })
  .map((value): DocumentNode => ({ kind: 'string', value }));

export const integerNode = fc
  .bigInt({ min: -1000n, max: 1000n })
  .map((value): DocumentNode => ({ kind: 'integer', value }));

export const realNode = fc
  .double({ noNaN: true, noDefaultInfinity: true })
  .map((value): DocumentNode => ({ kind: 'real', value }));

export const booleanNode = fc
  .boolean()
  .map((value): DocumentNode => ({ kind: 'boolean', value }));

export const nullNode = fc.constant<DocumentNode>({ kind: 'null' });

export const scalarNode: fc.Arbitrary<DocumentNode> = fc.oneof(
  stringNode,
  integerNode,
  realNode,
  booleanNode,
  nullNode
);

/** Mapping with distinct string keys drawn from FIELD_NAMES. */
export function mappingOf(
  value: fc.Arbitrary<DocumentNode>
): fc.Arbitrary<DocumentNode> {
  return fc
    .uniqueArray(fc.tuple(fieldName, value), {
      selector: ([key]) => key,
      maxLength: FIELD_NAMES.length,
    })
    .map(
      (pairs): DocumentNode => ({
        kind: 'mapping',
        entries: pairs.map(
          ([key, item]): MappingEntry => ({
            key: { kind: 'string', value: key },
            value: item,
          })
        ),
      })
    );
}

export const documentNode: fc.Arbitrary<DocumentNode> = fc.letrec<{
  node: DocumentNode;
}>((tie) => ({
  node: fc.oneof(
    { maxDepth: 3 },
    scalarNode,
    fc
      .array(tie('node'), { maxLength: 4 })
      .map((items): DocumentNode => ({ kind: 'sequence', items })),
    mappingOf(tie('node'))
  ),
})).node;

/**
 * Leaf schema nodes paired with a document they accept and one they reject.
 */
export interface LeafCase {
  schema: Record<string, unknown>;
  accepted: DocumentNode;
  rejected: DocumentNode;
}

export const leafCase: fc.Arbitrary<LeafCase> = fc.oneof(
  fc.tuple(fc.string(), fc.bigInt()).map(([text, number]): LeafCase => ({
    schema: { type: 'string' },
    accepted: { kind: 'string', value: text },
    rejected: { kind: 'integer', value: number },
  })),
  fc.tuple(fc.bigInt(), fc.boolean()).map(([number, flag]): LeafCase => ({
    schema: { type: 'integer' },
    accepted: { kind: 'integer', value: number },
    rejected: { kind: 'boolean', value: flag },
  })),
  fc.tuple(fc.boolean(), fc.string()).map(([flag, text]): LeafCase => ({
    schema: { type: 'boolean' },
    accepted: { kind: 'boolean', value: flag },
    rejected: { kind: 'string', value: text },
  }))
);
