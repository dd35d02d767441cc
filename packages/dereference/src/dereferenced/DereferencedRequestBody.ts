import { isReference, OpenAPI } from "@openapi-deref/core/openapi";
import { ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { followReference } from "../context/followReference.js";
import {
  DereferencedMediaType,
  dereferenceContent,
} from "./DereferencedMediaType.js";

export class DereferencedRequestBody {
  constructor(
    readonly source: OpenAPI.RequestBody,
    readonly content: Readonly<Record<string, DereferencedMediaType>>
  ) {}

  get description(): string | undefined {
    return this.source.description;
  }

  get required(): boolean | undefined {
    return this.source.required;
  }
}

const dereferenceInlineRequestBody = (
  requestBody: OpenAPI.RequestBody,
  ctx: DereferenceContext
): Result<DereferencedRequestBody, DereferenceError> => {
  const content = dereferenceContent(requestBody.content, ctx);
  if (!content.success) return content;

  return ok(new DereferencedRequestBody(requestBody, content.data));
};

export const dereferenceRequestBody = (
  node: OpenAPI.RequestBody | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<DereferencedRequestBody, DereferenceError> =>
  isReference(node)
    ? followReference(node, "requestBodies", ctx, dereferenceInlineRequestBody)
    : dereferenceInlineRequestBody(node, ctx);
