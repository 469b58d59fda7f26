/**
 * Read-only document tree the engine validates. Produced by the loader from
 * YAML/JSON text (or from plain values); never mutated afterwards.
 */

export interface StringNode {
  readonly kind: 'string';
  readonly value: string;
}

export interface IntegerNode {
  readonly kind: 'integer';
  readonly value: bigint;
}

export interface RealNode {
  readonly kind: 'real';
  readonly value: number;
}

export interface BooleanNode {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface NullNode {
  readonly kind: 'null';
}

export interface SequenceNode {
  readonly kind: 'sequence';
  readonly items: readonly DocumentNode[];
}

export interface MappingEntry {
  readonly key: DocumentNode;
  readonly value: DocumentNode;
}

export interface MappingNode {
  readonly kind: 'mapping';
  readonly entries: readonly MappingEntry[];
}

/** A value the loader could not represent (e.g. a self-referencing alias). */
export interface BadNode {
  readonly kind: 'bad';
}

export type DocumentNode =
  | StringNode
  | IntegerNode
  | RealNode
  | BooleanNode
  | NullNode
  | SequenceNode
  | MappingNode
  | BadNode;

export type DocumentKind = DocumentNode['kind'];

const TYPE_NAMES: Record<DocumentKind, string> = {
  string: 'string',
  integer: 'integer',
  real: 'real',
  boolean: 'boolean',
  null: 'null',
  sequence: 'array',
  mapping: 'hash',
  bad: 'bad_value',
};

/** Name of the node's type as it appears in error messages. */
export function typeName(node: DocumentNode): string {
  return TYPE_NAMES[node.kind];
}

export const NULL_NODE: NullNode = { kind: 'null' };

export function stringNode(value: string): StringNode {
  return { kind: 'string', value };
}

/**
 * Text of a mapping key as used for field matching and error messages.
 * Only string keys can name fields; other scalars render by their value.
 */
export function keyText(node: DocumentNode): string {
  switch (node.kind) {
    case 'string':
      return node.value;
    case 'integer':
    case 'real':
    case 'boolean':
      return String(node.value);
    case 'null':
      return '~';
    default:
      return `<${typeName(node)}>`;
  }
}

/** Value stored under a string key, or undefined when the key is absent. */
export function getEntry(
  mapping: MappingNode,
  field: string
): DocumentNode | undefined {
  for (const entry of mapping.entries) {
    if (entry.key.kind === 'string' && entry.key.value === field) {
      return entry.value;
    }
  }
  return undefined;
}

/**
 * Structural equality. Integers and reals never compare equal to each other;
 * mappings compare entry by entry in order.
 */
export function documentsEqual(a: DocumentNode, b: DocumentNode): boolean {
  switch (a.kind) {
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'integer':
      return b.kind === 'integer' && b.value === a.value;
    case 'real':
      return b.kind === 'real' && Object.is(b.value, a.value);
    case 'boolean':
      return b.kind === 'boolean' && b.value === a.value;
    case 'null':
    case 'bad':
      return b.kind === a.kind;
    case 'sequence':
      return (
        b.kind === 'sequence' &&
        b.items.length === a.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && documentsEqual(item, other);
        })
      );
    case 'mapping':
      return (
        b.kind === 'mapping' &&
        b.entries.length === a.entries.length &&
        a.entries.every((entry, i) => {
          const other = b.entries[i];
          return (
            other !== undefined &&
            documentsEqual(entry.key, other.key) &&
            documentsEqual(entry.value, other.value)
          );
        })
      );
  }
}
