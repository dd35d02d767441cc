import { hasOpenAPITag } from "./tag.js";
import { OpenAPI } from "./types.js";

/**
 * Reference objects are recognized by tag when parsed through the zod model,
 * and by shape otherwise, so hand-built documents can be dereferenced too.
 */
export const isReference = (obj: object): obj is OpenAPI.Reference =>
  hasOpenAPITag(obj, "Reference") ||
  ("$ref" in obj && typeof obj.$ref === "string");
