export * from "./types.js";
export * from "./guards.js";
export * from "./style.js";
export * from "./schemaContext.js";
export * from "./codec.js";
export { OrderedRecord } from "./ordered.js";

export { DEFAULT_ENCODING_STYLE, isVendorExtensionKey } from "./encoding.js";
export type { EncodingFields } from "./encoding.js";

export {
  OpenAPITag,
  hasOpenAPITag,
  getOpenAPITag,
  setOpenAPITag,
} from "./tag.js";
