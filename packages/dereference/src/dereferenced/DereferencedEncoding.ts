import { OpenAPI, ParameterStyle } from "@openapi-deref/core/openapi";
import { collectRecord, ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { DereferencedHeader, dereferenceHeader } from "./DereferencedHeader.js";

export class DereferencedEncoding {
  constructor(
    readonly source: OpenAPI.Encoding,
    readonly headers: Readonly<Record<string, DereferencedHeader>> | undefined
  ) {}

  get contentTypes(): readonly string[] {
    return this.source.contentTypes;
  }

  get style(): ParameterStyle {
    return this.source.style;
  }

  get explode(): boolean {
    return this.source.explode;
  }

  get allowReserved(): boolean {
    return this.source.allowReserved;
  }

  get vendorExtensions(): Readonly<Record<string, unknown>> | undefined {
    return this.source.vendorExtensions;
  }
}

export const dereferenceEncoding = (
  encoding: OpenAPI.Encoding,
  ctx: DereferenceContext
): Result<DereferencedEncoding, DereferenceError> => {
  if (encoding.headers === undefined) {
    return ok(new DereferencedEncoding(encoding, undefined));
  }

  const headers = collectRecord(encoding.headers, (header) =>
    dereferenceHeader(header, ctx)
  );
  if (!headers.success) return headers;

  return ok(new DereferencedEncoding(encoding, headers.data));
};
