import { describe, it, expect } from 'vitest';
import { loadDocuments } from '../../document/loader.js';
import type { DocumentNode } from '../../types/document.js';
import { DocumentError } from '../../types/errors.js';
import { Context, assertValid, validateDocument } from '../context.js';
import { yaml } from '../../schema/__tests__/fixtures.js';

function documents(source: string): DocumentNode[] {
  const result = loadDocuments(source);
  if (result.isErr()) throw result.error;
  return result.value;
}

function contextOf(source: string, maxReferenceDepth?: number): Context {
  const result = Context.fromDocuments(documents(source), {
    maxReferenceDepth,
  });
  if (result.isErr()) throw new Error(result.error.toString());
  return result.value;
}

function reportOf(context: Context, uri: string, document: string): string {
  const result = context.validate(uri, yaml(document));
  return result.isErr() ? result.error.toString() : '';
}

const TREE = `
uri: node
schema:
  type: object
  items:
    value:
      type: integer
    children:
      type: array
      items:
        $ref: node
  required:
    - value
`;

describe('Context', () => {
  it('compiles every schema document', () => {
    const context = contextOf(
      '---\nuri: a\nschema: {type: string}\n---\nuri: b\nschema: {type: integer}'
    );

    expect(context.uris).toEqual(['a', 'b']);
    expect(context.size).toBe(2);
    expect(context.getSchema('b')?.root.kind).toBe('integer');
    expect(context.getSchema('c')).toBeUndefined();
  });

  it('keeps the last definition of a duplicate URI', () => {
    const context = contextOf(
      '---\nuri: a\nschema: {type: string}\n---\nuri: a\nschema: {type: integer}'
    );

    expect(context.size).toBe(1);
    expect(reportOf(context, 'a', '1')).toBe('');
  });

  it('reports the errors of every schema document together', () => {
    const result = Context.fromDocuments(
      documents(
        '---\nuri: a\nschema: {type: date}\n---\nuri: b\n---\nuri: c\nschema: {type: string}\nextra: 1'
      )
    );

    expect(result.isErr() && result.error.toString()).toBe(
      '#.a: unknown type specified: date\n' +
        "#: field 'schema' missing\n" +
        "#: field 'extra' is not specified in the schema\n"
    );
  });

  it('rejects schema documents with a non-string uri', () => {
    const result = Context.fromDocuments(
      documents('uri: [a]\nschema: {type: string}')
    );

    expect(result.isErr() && result.error.toString()).toBe(
      '#.uri: wrong type, expected string got array\n'
    );
  });

  it('reports an unknown URI', () => {
    expect(reportOf(Context.empty(), 'missing', 'a')).toBe(
      "#: schema 'missing' references was not found\n"
    );
  });

  describe('references', () => {
    it('follows self-references through nested documents', () => {
      const context = contextOf(TREE);

      expect(
        reportOf(
          context,
          'node',
          'value: 1\nchildren:\n  - value: 2\n    children:\n      - value: 3'
        )
      ).toBe('');
      expect(
        reportOf(
          context,
          'node',
          'value: 1\nchildren:\n  - value: 2\n    children:\n      - value: x'
        )
      ).toBe(
        '#.children[0].children[0].value: wrong type, expected integer got string\n'
      );
    });

    it('resolves references regardless of declaration order', () => {
      const context = contextOf(
        '---\nuri: outer\nschema: {$ref: inner}\n---\nuri: inner\nschema: {type: boolean}'
      );

      expect(reportOf(context, 'outer', 'true')).toBe('');
      expect(reportOf(context, 'outer', '1')).toBe(
        '#: wrong type, expected boolean got integer\n'
      );
    });

    it('reports dangling references when validating', () => {
      const context = contextOf(
        'uri: a\nschema:\n  type: array\n  items: {$ref: nobody}'
      );

      expect(reportOf(context, 'a', '[1]')).toBe(
        "#[0]: schema 'nobody' references was not found\n"
      );
      expect(reportOf(context, 'a', '[]')).toBe('');
    });

    it('stops a reference loop at the configured depth', () => {
      const context = contextOf('uri: loop\nschema: {$ref: loop}', 3);

      expect(reportOf(context, 'loop', 'a')).toBe(
        '#: special requirements for field not met: maximum reference depth exceeded\n'
      );
    });

    it('counts each hop towards the depth', () => {
      const chain =
        '---\nuri: a\nschema: {$ref: b}\n---\nuri: b\nschema: {$ref: c}\n' +
        '---\nuri: c\nschema: {type: string}';

      expect(reportOf(contextOf(chain, 2), 'a', 'x')).toBe('');
      expect(reportOf(contextOf(chain, 1), 'a', 'x')).toBe(
        '#: special requirements for field not met: maximum reference depth exceeded\n'
      );
    });
  });

  describe('checkReferences', () => {
    it('passes when every reference resolves', () => {
      expect(contextOf(TREE).checkReferences().isOk()).toBe(true);
    });

    it('reports each dangling reference with its schema path', () => {
      const context = contextOf(`
---
uri: owner
schema:
  type: object
  items:
    pet:
      $ref: pet
    home:
      anyOf:
        - $ref: address
        - type: string
---
uri: pet
schema:
  type: string
`);

      expect(context.checkReferences().isErr()).toBe(true);
      const result = context.checkReferences();
      expect(result.isErr() && result.error.toString()).toBe(
        "#.owner.items.home.anyOf[0]: schema 'address' references was not found\n"
      );
    });
  });
});

describe('validateDocument and assertValid', () => {
  const context = contextOf(TREE);

  it('validates against a schema object', () => {
    const schema = context.getSchema('node');
    if (!schema) throw new Error('schema missing');

    expect(validateDocument(schema, context, yaml('value: 1')).isOk()).toBe(
      true
    );
  });

  it('throws a DocumentError carrying the report', () => {
    let thrown: unknown;
    try {
      assertValid(context, 'node', yaml('children: []'), { file: 'a.yaml' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(DocumentError);
    if (!(thrown instanceof DocumentError)) return;
    expect(thrown.report).toBe("#: missing field, 'value' not found\n");
    expect(thrown.context).toEqual({ uri: 'node', file: 'a.yaml' });
  });

  it('does not throw for a valid document', () => {
    expect(() => assertValid(context, 'node', yaml('value: 1'))).not.toThrow();
  });
});
