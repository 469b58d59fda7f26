import { asNode, asString, strictContents } from '../document/contract.js';
import type { DocumentNode } from '../types/document.js';
import { SchemaError, addSchemaPathName } from '../errors/schema-error.js';
import { err, type Result } from '../types/result.js';
import { requiredField } from './fields.js';
import type { Schema } from './model.js';
import { compilePropertyType } from './property-type.js';

/**
 * Compile a schema document `{uri, schema}`. Errors inside the schema node
 * are reported under `.<uri>`.
 */
export function compileSchema(node: DocumentNode): Result<Schema, SchemaError> {
  const contents = strictContents(node, ['uri', 'schema'], []);
  if (contents.isErr()) return err(SchemaError.from(contents.error));

  const uri = requiredField(contents.value, 'uri', 'string', asString);
  if (uri.isErr()) return err(uri.error);

  const root = requiredField(contents.value, 'schema', 'hash', asNode);
  if (root.isErr()) return err(root.error);

  return compilePropertyType(root.value)
    .mapErr(addSchemaPathName(uri.value))
    .map((compiled): Schema => ({ uri: uri.value, root: compiled }));
}
