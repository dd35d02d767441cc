import {
  defaultExplode,
  defaultStyle,
  OpenAPI,
  ParameterLocation,
  ParameterStyle,
  SchemaContext,
} from "@openapi-deref/core/openapi";
import { ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { DereferencedSchema, dereferenceSchema } from "./DereferencedSchema.js";
import { deriveExample, dereferenceExamples } from "./DereferencedExample.js";

/**
 * A schema context whose schema and examples are inlined.
 *
 * Serialization fields are read from `source` unchanged.
 */
export class DereferencedSchemaContext {
  /**
   * The first of `examples` if there is one, otherwise the authored `example`.
   */
  readonly example: unknown;

  constructor(
    readonly source: SchemaContext,
    readonly schema: DereferencedSchema,
    readonly examples: Readonly<Record<string, OpenAPI.Example>> | undefined
  ) {
    this.example = deriveExample(examples, source.example);
  }

  get location(): ParameterLocation {
    return this.source.location;
  }

  get style(): ParameterStyle | undefined {
    return this.source.style;
  }

  get explode(): boolean | undefined {
    return this.source.explode;
  }

  get allowReserved(): boolean | undefined {
    return this.source.allowReserved;
  }

  /** The declared style, or the default one for the location. */
  get effectiveStyle(): ParameterStyle {
    return this.style ?? defaultStyle(this.location);
  }

  get effectiveExplode(): boolean {
    return this.explode ?? defaultExplode(this.effectiveStyle);
  }
}

export const dereferenceSchemaContext = (
  context: SchemaContext,
  ctx: DereferenceContext
): Result<DereferencedSchemaContext, DereferenceError> => {
  const schema = dereferenceSchema(context.schema, ctx);
  if (!schema.success) return schema;

  const examples = dereferenceExamples(context.examples, ctx);
  if (!examples.success) return examples;

  return ok(new DereferencedSchemaContext(context, schema.data, examples.data));
};
