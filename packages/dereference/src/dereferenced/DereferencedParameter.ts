import {
  isReference,
  OpenAPI,
  ParameterLocation,
  parameterSchemaContext,
} from "@openapi-deref/core/openapi";
import { ok, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { followReference } from "../context/followReference.js";
import {
  DereferencedSchemaOrContent,
  dereferenceSchemaOrContent,
} from "./DereferencedSchemaOrContent.js";

export class DereferencedParameter {
  constructor(
    readonly source: OpenAPI.Parameter,
    readonly schemaOrContent: DereferencedSchemaOrContent | undefined
  ) {}

  get name(): string {
    return this.source.name;
  }

  get location(): ParameterLocation {
    return this.source.in;
  }

  get description(): string | undefined {
    return this.source.description;
  }

  get required(): boolean | undefined {
    return this.source.required;
  }

  get deprecated(): boolean | undefined {
    return this.source.deprecated;
  }

  get allowEmptyValue(): boolean | undefined {
    return this.source.allowEmptyValue;
  }
}

const dereferenceInlineParameter = (
  parameter: OpenAPI.Parameter,
  ctx: DereferenceContext
): Result<DereferencedParameter, DereferenceError> => {
  const schemaOrContent = dereferenceSchemaOrContent(
    parameterSchemaContext(parameter),
    parameter.content,
    ctx
  );
  if (!schemaOrContent.success) return schemaOrContent;

  return ok(new DereferencedParameter(parameter, schemaOrContent.data));
};

export const dereferenceParameter = (
  node: OpenAPI.Parameter | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<DereferencedParameter, DereferenceError> =>
  isReference(node)
    ? followReference(node, "parameters", ctx, dereferenceInlineParameter)
    : dereferenceInlineParameter(node, ctx);
