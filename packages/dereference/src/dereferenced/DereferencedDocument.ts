import { OpenAPI } from "@openapi-deref/core/openapi";
import { collectRecord, ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import {
  DereferencedPathItem,
  dereferencePathItemOrReference,
} from "./DereferencedPathItem.js";

export class DereferencedDocument {
  constructor(
    readonly source: OpenAPI.Document,
    readonly paths: Readonly<Record<string, DereferencedPathItem>>
  ) {}

  get openapi(): string {
    return this.source.openapi;
  }

  get info(): OpenAPI.Info {
    return this.source.info;
  }

  get servers(): readonly OpenAPI.Server[] | undefined {
    return this.source.servers;
  }

  get components(): OpenAPI.Components | undefined {
    return this.source.components;
  }

  get security(): readonly OpenAPI.SecurityRequirement[] | undefined {
    return this.source.security;
  }

  get tags(): readonly OpenAPI.Tag[] | undefined {
    return this.source.tags;
  }

  get externalDocs(): OpenAPI.ExternalDocumentation | undefined {
    return this.source.externalDocs;
  }
}

export const dereferenceDocumentPaths = (
  document: OpenAPI.Document,
  ctx: DereferenceContext
): Result<DereferencedDocument, DereferenceError> => {
  const paths = collectRecord(document.paths ?? {}, (pathItem) =>
    dereferencePathItemOrReference(pathItem, ctx)
  );
  if (!paths.success) return paths;

  return ok(new DereferencedDocument(document, paths.data));
};
