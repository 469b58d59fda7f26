import { describe, it, expect } from 'vitest';
import {
  CompileError,
  Context,
  ErrorCode,
  ParseError,
  compileSchemas,
  formatReport,
  validateSource,
} from '../index.js';

const PERSON = `
uri: person
schema:
  type: object
  items:
    name:
      type: string
    age:
      type: integer
  required:
    - name
`;

function compile(...sources: string[]): Context {
  const result = compileSchemas(sources);
  if (result.isErr()) throw result.error;
  return result.value;
}

describe('public API surface', () => {
  describe('compileSchemas', () => {
    it('loads schemas from several sources into one context', () => {
      const context = compile(
        PERSON,
        '---\nuri: people\nschema:\n  type: array\n  items: {$ref: person}'
      );

      expect(context.uris).toEqual(['person', 'people']);
    });

    it('lets later sources replace earlier definitions', () => {
      const context = compile(PERSON, 'uri: person\nschema: {type: string}');

      expect(context.getSchema('person')?.root.kind).toBe('string');
    });

    it('returns a CompileError with the flattened report', () => {
      const result = compileSchemas(['uri: bad\nschema: {type: date}']);

      expect(result.isErr()).toBe(true);
      if (!result.isErr()) return;
      expect(result.error).toBeInstanceOf(CompileError);
      expect(result.error.message).toBe(
        '#.bad: unknown type specified: date\n'
      );
    });

    it('returns a ParseError naming the source file', () => {
      const result = compileSchemas([
        { text: 'uri: [unterminated', filename: 'schemas.yaml' },
      ]);

      expect(result.isErr() && result.error).toBeInstanceOf(ParseError);
      expect(result.isErr() && result.error.context?.file).toBe(
        'schemas.yaml'
      );
    });

    it('checks references only when asked', () => {
      const source = 'uri: list\nschema:\n  type: array\n  items: {$ref: item}';

      expect(compileSchemas([source]).isOk()).toBe(true);
      const checked = compileSchemas([source], { checkReferences: true });
      expect(checked.isErr() && checked.error.message).toBe(
        "#.list.items: schema 'item' references was not found\n"
      );
    });

    it('passes validator options to the context', () => {
      const context = compile(PERSON);
      const limited = compileSchemas([PERSON], { maxReferenceDepth: 4 });

      expect(context.options.maxReferenceDepth).toBe(256);
      expect(limited.isOk() && limited.value.options.maxReferenceDepth).toBe(
        4
      );
    });
  });

  describe('validateSource', () => {
    const context = compile(PERSON);

    it('validates every document of a stream', () => {
      const result = validateSource(
        context,
        'person',
        '---\nname: test-user\n---\nage: 3\n---\nname: 5\n'
      );
      if (result.isErr()) throw result.error;

      expect(result.value.documents).toBe(3);
      expect(result.value.failures.map((failure) => failure.index)).toEqual([
        1, 2,
      ]);
      expect(formatReport(result.value)).toBe(
        "#: missing field, 'name' not found\n" +
          '#.name: wrong type, expected string got integer\n'
      );
    });

    it('reports nothing for valid sources', () => {
      const result = validateSource(context, 'person', 'name: test-user');

      expect(result.isOk() && formatReport(result.value)).toBe('');
    });

    it('returns parse failures', () => {
      const result = validateSource(context, 'person', 'name: "open', 'a.yaml');

      expect(result.isErr() && result.error.file).toBe('a.yaml');
      expect(result.isErr() && result.error.errorCode).toBe(
        ErrorCode.PARSE_FAILED
      );
    });
  });
});
