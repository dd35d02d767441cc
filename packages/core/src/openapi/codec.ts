import { z } from "zod";
import { OpenAPI } from "./types.js";
import { isReference } from "./guards.js";
import { defaultExplode } from "./style.js";
import { DEFAULT_ENCODING_STYLE } from "./encoding.js";
import { err, ok, Result } from "../result/result.js";
import { orderedEntries, orderedRecord } from "../record/ordered.js";

export type FieldMap = Record<string, unknown>;

const mapEntries = <T>(
  record: Record<string, T>,
  fn: (value: T) => FieldMap
): Record<string, FieldMap> =>
  orderedRecord(
    orderedEntries(record).map(([key, value]): [string, FieldMap] => [
      key,
      fn(value),
    ])
  );

/**
 * Decode a raw Encoding object field map into the Encoding model.
 */
export const decodeEncoding = (
  raw: unknown
): Result<OpenAPI.Encoding, z.ZodError> => {
  const parsed = OpenAPI.Encoding.safeParse(raw);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
};

/**
 * Encode an Encoding model back to its document form.
 *
 * `style`, `explode` and `allowReserved` are left out when they hold their
 * default values. Vendor extensions are written back under their own keys.
 */
export const encodeEncoding = (encoding: OpenAPI.Encoding): FieldMap => {
  const fields: FieldMap = {};

  if (encoding.contentTypes.length > 0) {
    fields.contentType = encoding.contentTypes.join(", ");
  }
  if (encoding.headers !== undefined) {
    fields.headers = mapEntries(encoding.headers, encodeHeaderOrReference);
  }
  if (encoding.style !== DEFAULT_ENCODING_STYLE) {
    fields.style = encoding.style;
  }
  if (encoding.explode !== defaultExplode(encoding.style)) {
    fields.explode = encoding.explode;
  }
  if (encoding.allowReserved) {
    fields.allowReserved = encoding.allowReserved;
  }
  for (const [key, value] of Object.entries(encoding.vendorExtensions ?? {})) {
    fields[key] = value;
  }

  return fields;
};

export const encodeMediaType = (mediaType: OpenAPI.MediaType): FieldMap => {
  const { encoding, ...rest } = mediaType;
  if (encoding === undefined) return { ...rest };
  return { ...rest, encoding: mapEntries(encoding, encodeEncoding) };
};

const encodeHeaderOrReference = (
  header: OpenAPI.Header | OpenAPI.Reference
): FieldMap => {
  if (isReference(header)) return { $ref: header.$ref };

  const { content, ...rest } = header;
  if (content === undefined) return { ...rest };
  return { ...rest, content: mapEntries(content, encodeMediaType) };
};
