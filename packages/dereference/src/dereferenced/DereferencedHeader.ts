import {
  headerSchemaContext,
  isReference,
  OpenAPI,
} from "@openapi-deref/core/openapi";
import { ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { followReference } from "../context/followReference.js";
import {
  DereferencedSchemaOrContent,
  dereferenceSchemaOrContent,
} from "./DereferencedSchemaOrContent.js";

export class DereferencedHeader {
  constructor(
    readonly source: OpenAPI.Header,
    readonly schemaOrContent: DereferencedSchemaOrContent | undefined
  ) {}

  get description(): string | undefined {
    return this.source.description;
  }

  get required(): boolean | undefined {
    return this.source.required;
  }

  get deprecated(): boolean | undefined {
    return this.source.deprecated;
  }

  get allowEmptyValue(): boolean | undefined {
    return this.source.allowEmptyValue;
  }
}

const dereferenceInlineHeader = (
  header: OpenAPI.Header,
  ctx: DereferenceContext
): Result<DereferencedHeader, DereferenceError> => {
  const schemaOrContent = dereferenceSchemaOrContent(
    headerSchemaContext(header),
    header.content,
    ctx
  );
  if (!schemaOrContent.success) return schemaOrContent;

  return ok(new DereferencedHeader(header, schemaOrContent.data));
};

export const dereferenceHeader = (
  node: OpenAPI.Header | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<DereferencedHeader, DereferenceError> =>
  isReference(node)
    ? followReference(node, "headers", ctx, dereferenceInlineHeader)
    : dereferenceInlineHeader(node, ctx);
