import {
  asMapping,
  asSequence,
  asString,
  asType,
  strictContents,
} from '../../document/contract.js';
import {
  getEntry,
  keyText,
  typeName,
  type DocumentNode,
  type MappingNode,
} from '../../types/document.js';
import {
  SchemaError,
  addSchemaPathName,
} from '../../errors/schema-error.js';
import {
  ValidationError,
  addPathName,
} from '../../errors/validation-error.js';
import { err, ok, type Result } from '../../types/result.js';
import { optionalField, requiredField } from '../fields.js';
import type { ObjectSchema, PropertyType, ValidationScope } from '../model.js';
import {
  compilePropertyType,
  validatePropertyType,
} from '../property-type.js';

export function compileObject(
  node: DocumentNode
): Result<ObjectSchema, SchemaError> {
  const contents = strictContents(node, ['items'], ['type', 'required']);
  if (contents.isErr()) return err(SchemaError.from(contents.error));
  const mapping = contents.value;

  const declared = requiredField(mapping, 'items', 'hash', asMapping);
  if (declared.isErr()) return err(declared.error);

  const items = compileFields(declared.value);
  if (items.isErr()) return err(items.error);

  const required = compileRequired(mapping, items.value);
  if (required.isErr()) return err(required.error);

  return ok({ kind: 'object', items: items.value, required: required.value });
}

/**
 * Compile every declared field, collecting all failures under
 * `.items.<name>`. Fields are kept in sorted name order.
 */
function compileFields(
  declared: MappingNode
): Result<ReadonlyMap<string, PropertyType>, SchemaError> {
  const fields: [string, PropertyType][] = [];
  const errors: SchemaError[] = [];

  for (const entry of declared.entries) {
    if (entry.key.kind !== 'string') {
      errors.push(
        SchemaError.wrongType('string', typeName(entry.key))
          .withPathName(keyText(entry.key))
          .withPathName('items')
      );
      continue;
    }

    const name = entry.key.value;
    const compiled = compilePropertyType(entry.value)
      .mapErr(addSchemaPathName(name))
      .mapErr(addSchemaPathName('items'));

    if (compiled.isErr()) {
      errors.push(compiled.error);
    } else {
      fields.push([name, compiled.value]);
    }
  }

  const condensed = SchemaError.condense(errors);
  if (condensed.isErr()) return err(condensed.error);

  fields.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return ok(new Map(fields));
}

/** Declared fields listed under `required`. */
function compileRequired(
  mapping: MappingNode,
  items: ReadonlyMap<string, PropertyType>
): Result<string[], SchemaError> {
  const list = optionalField(mapping, 'required', 'array', asSequence);
  if (list.isErr()) return err(list.error);
  if (list.value === undefined) return ok([]);

  const names: string[] = [];
  const errors: SchemaError[] = [];

  list.value.items.forEach((item, index) => {
    const name = asType(item, 'string', asString);
    if (name.isErr()) {
      errors.push(
        SchemaError.from(name.error)
          .withPathIndex(index)
          .withPathName('required')
      );
      return;
    }
    // Names not declared under `items` are ignored.
    if (items.has(name.value)) names.push(name.value);
  });

  const condensed = SchemaError.condense(errors);
  if (condensed.isErr()) return err(condensed.error);
  return ok(names);
}

/**
 * The document must be a hash holding every required field and no field
 * outside the declared ones. Each present field is then validated, in
 * sorted name order, and all failures are reported.
 */
export function validateObject(
  schema: ObjectSchema,
  scope: ValidationScope,
  node: DocumentNode
): Result<void, ValidationError> {
  const mapping = asType(node, 'hash', asMapping);
  if (mapping.isErr()) return err(ValidationError.from(mapping.error));

  const optionalNames = [...schema.items.keys()].filter(
    (name) => !schema.required.includes(name)
  );
  const contents = strictContents(
    mapping.value,
    schema.required,
    optionalNames
  );
  if (contents.isErr()) return err(ValidationError.from(contents.error));

  const errors: ValidationError[] = [];
  for (const [name, fieldSchema] of schema.items) {
    const value = getEntry(mapping.value, name);
    if (value === undefined) continue;

    const result = validatePropertyType(fieldSchema, scope, value).mapErr(
      addPathName(name)
    );
    if (result.isErr()) errors.push(result.error);
  }

  return ValidationError.condense(errors);
}
