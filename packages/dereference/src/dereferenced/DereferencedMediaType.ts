import { OpenAPI } from "@openapi-deref/core/openapi";
import {
  collectRecord,
  mapOptional,
  ok,
  Result,
} from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { DereferencedSchema, dereferenceSchema } from "./DereferencedSchema.js";
import { deriveExample, dereferenceExamples } from "./DereferencedExample.js";
import {
  DereferencedEncoding,
  dereferenceEncoding,
} from "./DereferencedEncoding.js";

export class DereferencedMediaType {
  readonly example: unknown;

  constructor(
    readonly source: OpenAPI.MediaType,
    readonly schema: DereferencedSchema | undefined,
    readonly examples: Readonly<Record<string, OpenAPI.Example>> | undefined,
    readonly encoding: Readonly<Record<string, DereferencedEncoding>> | undefined
  ) {
    this.example = deriveExample(examples, source.example);
  }
}

export const dereferenceMediaType = (
  mediaType: OpenAPI.MediaType,
  ctx: DereferenceContext
): Result<DereferencedMediaType, DereferenceError> => {
  const schema = mapOptional(mediaType.schema, (node) =>
    dereferenceSchema(node, ctx)
  );
  if (!schema.success) return schema;

  const examples = dereferenceExamples(mediaType.examples, ctx);
  if (!examples.success) return examples;

  const encoding = mapOptional(mediaType.encoding, (entries) =>
    collectRecord(entries, (value) => dereferenceEncoding(value, ctx))
  );
  if (!encoding.success) return encoding;

  return ok(
    new DereferencedMediaType(
      mediaType,
      schema.data,
      examples.data,
      encoding.data
    )
  );
};

/**
 * Dereference a content map (media type name to media type object).
 */
export const dereferenceContent = (
  content: Record<string, OpenAPI.MediaType>,
  ctx: DereferenceContext
): Result<Record<string, DereferencedMediaType>, DereferenceError> =>
  collectRecord(content, (mediaType) => dereferenceMediaType(mediaType, ctx));
