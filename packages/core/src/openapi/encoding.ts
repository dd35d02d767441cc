import type { OpenAPI } from "./types.js";
import { defaultExplode, defaultStyle, ParameterStyle } from "./style.js";

// Encoding objects take the defaults of a query parameter
export const DEFAULT_ENCODING_STYLE: ParameterStyle = defaultStyle("query");

const VENDOR_EXTENSION_PREFIX = "x-";

export const isVendorExtensionKey = (key: string): boolean =>
  key.startsWith(VENDOR_EXTENSION_PREFIX);

/**
 * Raw Encoding object fields as they appear in a document, after the
 * recognized keys have been type-checked. Unrecognized keys stay in place.
 */
export interface EncodingFields {
  contentType?: string;
  headers?: Record<string, OpenAPI.Header | OpenAPI.Reference>;
  style?: ParameterStyle;
  explode?: boolean;
  allowReserved?: boolean;
  [key: string]: unknown;
}

const parseContentTypes = (contentType: string | undefined): string[] => {
  if (contentType === undefined) return [];
  return contentType
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
};

export const decodeEncodingFields = (
  fields: EncodingFields
): OpenAPI.Encoding => {
  const style = fields.style ?? DEFAULT_ENCODING_STYLE;

  const vendorExtensions: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (isVendorExtensionKey(key)) {
      vendorExtensions[key] = value;
    }
  }

  return {
    contentTypes: parseContentTypes(fields.contentType),
    ...(fields.headers !== undefined ? { headers: fields.headers } : {}),
    style,
    explode: fields.explode ?? defaultExplode(style),
    allowReserved: fields.allowReserved ?? false,
    ...(Object.keys(vendorExtensions).length > 0 ? { vendorExtensions } : {}),
  };
};
