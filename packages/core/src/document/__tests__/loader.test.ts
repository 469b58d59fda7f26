import { describe, it, expect } from 'vitest';
import { fromValue, loadDocument, loadDocuments } from '../loader.js';
import {
  NULL_NODE,
  getEntry,
  type DocumentNode,
  type MappingEntry,
} from '../../types/document.js';
import { ParseError } from '../../types/errors.js';

function entry(key: string, value: DocumentNode): MappingEntry {
  return { key: { kind: 'string', value: key }, value };
}

function load(source: string): DocumentNode {
  const result = loadDocument(source);
  if (result.isErr()) throw result.error;
  return result.value;
}

describe('loadDocuments', () => {
  it('keeps integers and reals apart', () => {
    expect(load('a: 10\nb: 10.0\n')).toEqual({
      kind: 'mapping',
      entries: [
        entry('a', { kind: 'integer', value: 10n }),
        entry('b', { kind: 'real', value: 10 }),
      ],
    });
  });

  it('reads every scalar kind', () => {
    expect(load('[text, -3, 2.5, true, ~, "true"]')).toEqual({
      kind: 'sequence',
      items: [
        { kind: 'string', value: 'text' },
        { kind: 'integer', value: -3n },
        { kind: 'real', value: 2.5 },
        { kind: 'boolean', value: true },
        NULL_NODE,
        { kind: 'string', value: 'true' },
      ],
    });
  });

  it('keeps integers beyond the double range exact', () => {
    expect(load('12345678901234567890')).toEqual({
      kind: 'integer',
      value: 12345678901234567890n,
    });
  });

  it('treats an empty value as null', () => {
    const node = load('a:\n');
    if (node.kind !== 'mapping') throw new Error('expected a mapping');

    expect(getEntry(node, 'a')).toEqual(NULL_NODE);
  });

  it('keeps non-string keys', () => {
    const node = load('1: one\n');
    if (node.kind !== 'mapping') throw new Error('expected a mapping');

    expect(node.entries[0]?.key).toEqual({ kind: 'integer', value: 1n });
  });

  it('resolves aliases', () => {
    const node = load('base: &b {x: 1}\ncopy: *b\n');
    if (node.kind !== 'mapping') throw new Error('expected a mapping');

    expect(getEntry(node, 'copy')).toEqual(getEntry(node, 'base'));
  });

  it('rejects documents whose aliases expand past the limit', () => {
    const levels = ['a0: &a0 [x, x, x, x, x, x, x, x, x, x]'];
    for (let level = 1; level <= 8; level++) {
      const previous = `*a${level - 1}`;
      const items = Array.from({ length: 10 }, () => previous).join(', ');
      levels.push(`a${level}: &a${level} [${items}]`);
    }
    const result = loadDocuments(levels.join('\n'), {
      filename: 'laughs.yaml',
    });

    expect(result.isErr()).toBe(true);
    if (!result.isErr()) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.message).toBe(
      'laughs.yaml: excessive alias count, more than 100 aliases expanded'
    );
    expect(result.error.file).toBe('laughs.yaml');
  });

  it('honours a custom alias limit', () => {
    const source = 'base: &b {x: 1}\none: *b\ntwo: *b\n';

    expect(loadDocuments(source, { maxAliasCount: 2 }).isOk()).toBe(true);
    expect(loadDocuments(source, { maxAliasCount: 1 }).unwrapOr([])).toEqual(
      []
    );
  });

  it('returns every document of a stream', () => {
    const result = loadDocuments('---\na: 1\n---\n- x\n');

    expect(result.isOk()).toBe(true);
    expect(result.unwrap().map((node) => node.kind)).toEqual([
      'mapping',
      'sequence',
    ]);
  });

  it('returns no documents for an empty stream', () => {
    expect(loadDocuments('').unwrap()).toEqual([]);
    expect(load('')).toEqual(NULL_NODE);
  });

  it('reports syntax errors as ParseError', () => {
    const result = loadDocuments('a: [1, 2\n', { filename: 'docs.yaml' });

    expect(result.isErr()).toBe(true);
    if (!result.isErr()) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.file).toBe('docs.yaml');
    expect(result.error.message.startsWith('docs.yaml: ')).toBe(true);
    expect(result.error.context?.line).toBeTypeOf('number');
  });
});

describe('fromValue', () => {
  it('converts plain values', () => {
    const value = { id: 1, ratio: 0.5, tags: ['a'], on: false, gone: null };

    expect(fromValue(value)).toEqual({
      kind: 'mapping',
      entries: [
        entry('id', { kind: 'integer', value: 1n }),
        entry('ratio', { kind: 'real', value: 0.5 }),
        entry('tags', {
          kind: 'sequence',
          items: [{ kind: 'string', value: 'a' }],
        }),
        entry('on', { kind: 'boolean', value: false }),
        entry('gone', NULL_NODE),
      ],
    });
  });

  it('keeps bigint values and Map keys', () => {
    expect(fromValue(new Map([[2n, 'two']]))).toEqual({
      kind: 'mapping',
      entries: [
        {
          key: { kind: 'integer', value: 2n },
          value: { kind: 'string', value: 'two' },
        },
      ],
    });
  });

  it('maps unsupported values to a bad node', () => {
    expect(fromValue(() => 1)).toEqual({ kind: 'bad' });
    expect(fromValue(undefined)).toEqual(NULL_NODE);
  });
});
