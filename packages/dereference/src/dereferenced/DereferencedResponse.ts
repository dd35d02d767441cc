import { isReference, OpenAPI } from "@openapi-deref/core/openapi";
import { collectRecord, ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { followReference } from "../context/followReference.js";
import { DereferencedHeader, dereferenceHeader } from "./DereferencedHeader.js";
import {
  DereferencedMediaType,
  dereferenceContent,
} from "./DereferencedMediaType.js";

// Links carry no references of their own
export const dereferenceLink = (
  node: OpenAPI.Link | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<OpenAPI.Link, DereferenceError> =>
  isReference(node)
    ? followReference(node, "links", ctx, (link) => ok(link))
    : ok(node);

export class DereferencedResponse {
  constructor(
    readonly source: OpenAPI.Response,
    readonly headers: Readonly<Record<string, DereferencedHeader>> | undefined,
    readonly content: Readonly<Record<string, DereferencedMediaType>> | undefined,
    readonly links: Readonly<Record<string, OpenAPI.Link>> | undefined
  ) {}

  get description(): string {
    return this.source.description;
  }
}

const dereferenceInlineResponse = (
  response: OpenAPI.Response,
  ctx: DereferenceContext
): Result<DereferencedResponse, DereferenceError> => {
  let headers: Record<string, DereferencedHeader> | undefined;
  if (response.headers !== undefined) {
    const resolved = collectRecord(response.headers, (header) =>
      dereferenceHeader(header, ctx)
    );
    if (!resolved.success) return resolved;
    headers = resolved.data;
  }

  let content: Record<string, DereferencedMediaType> | undefined;
  if (response.content !== undefined) {
    const resolved = dereferenceContent(response.content, ctx);
    if (!resolved.success) return resolved;
    content = resolved.data;
  }

  let links: Record<string, OpenAPI.Link> | undefined;
  if (response.links !== undefined) {
    const resolved = collectRecord(response.links, (link) =>
      dereferenceLink(link, ctx)
    );
    if (!resolved.success) return resolved;
    links = resolved.data;
  }

  return ok(new DereferencedResponse(response, headers, content, links));
};

export const dereferenceResponse = (
  node: OpenAPI.Response | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<DereferencedResponse, DereferenceError> =>
  isReference(node)
    ? followReference(node, "responses", ctx, dereferenceInlineResponse)
    : dereferenceInlineResponse(node, ctx);
