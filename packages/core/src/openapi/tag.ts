import { core, z } from "zod";

export const OpenAPITag = z.enum([
  "Reference",
  "ExternalDocumentation",
  "Schema",
  "MediaType",
  "Example",
  "Encoding",
  "Header",
  "Link",
  "Server",
  "Response",
  "Parameter",
  "RequestBody",
  "SecurityScheme",
  "Operation",
  "PathItem",
  "Components",
  "Tag",
  "Info",
  "Document",
]);

export type OpenAPITag = z.infer<typeof OpenAPITag>;

const tagStorage = new WeakMap<object, OpenAPITag>();

export const TaggedObject = <T extends core.$ZodLooseShape>(
  shape: T,
  tag: OpenAPITag
) => {
  return z.object(shape).transform((value) => {
    tagStorage.set(value, tag);
    return value;
  });
};

export const hasOpenAPITag = (obj: object, tag: OpenAPITag): boolean => {
  return tagStorage.get(obj) === tag;
};

export const getOpenAPITag = (obj: object): OpenAPITag | undefined => {
  return tagStorage.get(obj);
};

// Helper for manually tagging objects (used for recursive types with z.lazy)
export const setOpenAPITag = (obj: object, tag: OpenAPITag): void => {
  tagStorage.set(obj, tag);
};
