import { isReference, OpenAPI } from "@openapi-deref/core/openapi";
import {
  collectArray,
  collectRecord,
  ok,
  Result,
} from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { followReference } from "../context/followReference.js";

type SchemaChildKey =
  | "allOf"
  | "oneOf"
  | "anyOf"
  | "not"
  | "items"
  | "properties"
  | "additionalProperties";

/**
 * A schema whose subschemas are all inlined. Every other keyword is kept as
 * authored.
 */
export interface DereferencedSchema extends Omit<OpenAPI.Schema, SchemaChildKey> {
  allOf?: DereferencedSchema[];
  oneOf?: DereferencedSchema[];
  anyOf?: DereferencedSchema[];
  not?: DereferencedSchema;
  items?: DereferencedSchema;
  properties?: Record<string, DereferencedSchema>;
  additionalProperties?: boolean | DereferencedSchema;
}

export const dereferenceSchema = (
  node: OpenAPI.Schema | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<DereferencedSchema, DereferenceError> =>
  isReference(node)
    ? followReference(node, "schemas", ctx, dereferenceInlineSchema)
    : dereferenceInlineSchema(node, ctx);

const dereferenceInlineSchema = (
  schema: OpenAPI.Schema,
  ctx: DereferenceContext
): Result<DereferencedSchema, DereferenceError> => {
  const {
    allOf,
    oneOf,
    anyOf,
    not,
    items,
    properties,
    additionalProperties,
    ...rest
  } = schema;
  const resolve = (child: OpenAPI.Schema | OpenAPI.Reference) =>
    dereferenceSchema(child, ctx);

  const result: DereferencedSchema = { ...rest };

  if (allOf !== undefined) {
    const resolved = collectArray(allOf, resolve);
    if (!resolved.success) return resolved;
    result.allOf = resolved.data;
  }
  if (oneOf !== undefined) {
    const resolved = collectArray(oneOf, resolve);
    if (!resolved.success) return resolved;
    result.oneOf = resolved.data;
  }
  if (anyOf !== undefined) {
    const resolved = collectArray(anyOf, resolve);
    if (!resolved.success) return resolved;
    result.anyOf = resolved.data;
  }
  if (not !== undefined) {
    const resolved = resolve(not);
    if (!resolved.success) return resolved;
    result.not = resolved.data;
  }
  if (items !== undefined) {
    const resolved = resolve(items);
    if (!resolved.success) return resolved;
    result.items = resolved.data;
  }
  if (properties !== undefined) {
    const resolved = collectRecord(properties, resolve);
    if (!resolved.success) return resolved;
    result.properties = resolved.data;
  }
  if (additionalProperties !== undefined) {
    if (typeof additionalProperties === "boolean") {
      result.additionalProperties = additionalProperties;
    } else {
      const resolved = resolve(additionalProperties);
      if (!resolved.success) return resolved;
      result.additionalProperties = resolved.data;
    }
  }

  return ok(result);
};
