import { OpenAPI } from "./types.js";
import { ParameterLocation, ParameterStyle } from "./style.js";

/**
 * The schema-based description of a parameter or header value: a schema,
 * how the value is serialized, and optional examples.
 *
 * A parameter or header carries either a schema context or a `content` map.
 */
export interface SchemaContext {
  location: ParameterLocation;
  schema: OpenAPI.Schema | OpenAPI.Reference;
  style?: ParameterStyle;
  explode?: boolean;
  allowReserved?: boolean;
  example?: unknown;
  examples?: Record<string, OpenAPI.Example | OpenAPI.Reference>;
}

type SchemaContextSource = Pick<
  OpenAPI.Parameter,
  "schema" | "style" | "explode" | "allowReserved" | "example" | "examples"
>;

const toSchemaContext = (
  source: SchemaContextSource,
  location: ParameterLocation
): SchemaContext | undefined => {
  if (source.schema === undefined) return undefined;

  const context: SchemaContext = { location, schema: source.schema };
  if (source.style !== undefined) context.style = source.style;
  if (source.explode !== undefined) context.explode = source.explode;
  if (source.allowReserved !== undefined) {
    context.allowReserved = source.allowReserved;
  }
  if (source.example !== undefined) context.example = source.example;
  if (source.examples !== undefined) context.examples = source.examples;
  return context;
};

export const parameterSchemaContext = (
  parameter: OpenAPI.Parameter
): SchemaContext | undefined => toSchemaContext(parameter, parameter.in);

export const headerSchemaContext = (
  header: OpenAPI.Header
): SchemaContext | undefined => toSchemaContext(header, "header");
