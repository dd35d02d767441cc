import { OpenAPI, SchemaContext } from "@openapi-deref/core/openapi";
import { ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import {
  DereferencedSchemaContext,
  dereferenceSchemaContext,
} from "./DereferencedSchemaContext.js";
import {
  DereferencedMediaType,
  dereferenceContent,
} from "./DereferencedMediaType.js";

/**
 * How a parameter or header value is described: by a schema, or by a content
 * map keyed by media type.
 */
export type DereferencedSchemaOrContent =
  | { type: "schema"; context: DereferencedSchemaContext }
  | {
      type: "content";
      content: Readonly<Record<string, DereferencedMediaType>>;
    };

export const dereferenceSchemaOrContent = (
  context: SchemaContext | undefined,
  content: Record<string, OpenAPI.MediaType> | undefined,
  ctx: DereferenceContext
): Result<DereferencedSchemaOrContent | undefined, DereferenceError> => {
  if (context !== undefined) {
    const resolved = dereferenceSchemaContext(context, ctx);
    if (!resolved.success) return resolved;
    const value: DereferencedSchemaOrContent = {
      type: "schema",
      context: resolved.data,
    };
    return ok(value);
  }

  if (content !== undefined) {
    const resolved = dereferenceContent(content, ctx);
    if (!resolved.success) return resolved;
    const value: DereferencedSchemaOrContent = {
      type: "content",
      content: resolved.data,
    };
    return ok(value);
  }

  return ok(undefined);
};
