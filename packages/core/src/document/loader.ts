/**
 * YAML/JSON text → DocumentNode trees.
 *
 * Parsing uses the YAML 1.2 core schema with integers kept as bigint, so `10`
 * and `10.0` stay distinguishable as integer and real.
 */

import {
  parseAllDocuments,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  type Document,
} from 'yaml';
import {
  NULL_NODE,
  type DocumentNode,
  type MappingEntry,
} from '../types/document.js';
import { ParseError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export interface LoadOptions {
  /** Used in parse error messages and context */
  filename?: string;
  /** Alias expansions allowed per document (default 100) */
  maxAliasCount?: number;
}

export const DEFAULT_MAX_ALIAS_COUNT = 100;

const BAD_NODE: DocumentNode = { kind: 'bad' };

interface Expansion {
  readonly document: Document;
  /** Aliases currently being expanded, to cut cycles */
  readonly resolving: Set<unknown>;
  readonly maxAliasCount: number;
  aliasCount: number;
}

/**
 * Parse every document of a (possibly multi-document) stream.
 */
export function loadDocuments(
  source: string,
  options: LoadOptions = {}
): Result<DocumentNode[], ParseError> {
  const documents = parseAllDocuments(source, { intAsBigInt: true });
  const where = options.filename ? `${options.filename}: ` : '';
  const out: DocumentNode[] = [];

  for (const document of documents) {
    const [first] = document.errors;
    if (first) {
      const position = first.linePos?.[0];
      return err(
        new ParseError({
          message: `${where}${first.message}`,
          context: {
            file: options.filename,
            line: position?.line,
            column: position?.col,
          },
          cause: first,
        })
      );
    }

    const expansion: Expansion = {
      document,
      resolving: new Set(),
      maxAliasCount: options.maxAliasCount ?? DEFAULT_MAX_ALIAS_COUNT,
      aliasCount: 0,
    };
    const node = fromYamlNode(document.contents, expansion);
    if (expansion.aliasCount > expansion.maxAliasCount) {
      return err(
        new ParseError({
          message:
            `${where}excessive alias count, more than ` +
            `${expansion.maxAliasCount} aliases expanded`,
          context: { file: options.filename },
        })
      );
    }
    out.push(node);
  }

  return ok(out);
}

/**
 * Parse a single document; an empty stream yields a null node and any
 * documents after the first are ignored.
 */
export function loadDocument(
  source: string,
  options: LoadOptions = {}
): Result<DocumentNode, ParseError> {
  return loadDocuments(source, options).map(
    (documents) => documents[0] ?? NULL_NODE
  );
}

/**
 * Aliases are expanded in place. Once more than `maxAliasCount` expansions
 * happen, the rest of the tree is abandoned and the caller reports it.
 */
function fromYamlNode(node: unknown, expansion: Expansion): DocumentNode {
  if (node === null || node === undefined) return NULL_NODE;

  if (isAlias(node)) {
    const { document, resolving } = expansion;
    if (resolving.has(node)) return BAD_NODE;
    expansion.aliasCount += 1;
    if (expansion.aliasCount > expansion.maxAliasCount) return BAD_NODE;
    const target = node.resolve(document);
    if (!target) return BAD_NODE;
    resolving.add(node);
    const resolved = fromYamlNode(target, expansion);
    resolving.delete(node);
    return resolved;
  }

  if (isScalar(node)) {
    const value = node.value;
    // Integers arrive as bigint, so any number here was written as a float.
    return typeof value === 'number'
      ? { kind: 'real', value }
      : fromValue(value);
  }

  if (isSeq(node)) {
    return {
      kind: 'sequence',
      items: node.items.map((item) => fromYamlNode(item, expansion)),
    };
  }

  if (isMap(node)) {
    const entries: MappingEntry[] = node.items.map((pair) => ({
      key: fromYamlNode(pair.key, expansion),
      value: fromYamlNode(pair.value, expansion),
    }));
    return { kind: 'mapping', entries };
  }

  return BAD_NODE;
}

/**
 * Convert a plain JavaScript value (for instance `JSON.parse` output).
 * Integral numbers become integers; all other numbers become reals.
 */
export function fromValue(value: unknown): DocumentNode {
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'number':
      return Number.isSafeInteger(value)
        ? { kind: 'integer', value: BigInt(value) }
        : { kind: 'real', value };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'undefined':
      return NULL_NODE;
    default:
      break;
  }

  if (value === null) return NULL_NODE;

  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value.map((item) => fromValue(item)) };
  }

  if (value instanceof Map) {
    return {
      kind: 'mapping',
      entries: [...value.entries()].map(([key, item]) => ({
        key: fromValue(key),
        value: fromValue(item),
      })),
    };
  }

  if (typeof value === 'object') {
    return {
      kind: 'mapping',
      entries: Object.entries(value).map(([key, item]) => ({
        key: { kind: 'string', value: key },
        value: fromValue(item),
      })),
    };
  }

  return BAD_NODE;
}
