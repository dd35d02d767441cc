import { isReference, OpenAPI } from "@openapi-deref/core/openapi";
import { collectArray, err, ok, Result } from "@openapi-deref/core/result";
import {
  cannotResolveRemote,
  DereferenceError,
  invalidReference,
} from "../errors/DereferenceError.js";
import { parseReference } from "../reference/Reference.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import {
  DereferencedParameter,
  dereferenceParameter,
} from "./DereferencedParameter.js";
import {
  DereferencedOperation,
  dereferenceOperation,
} from "./DereferencedOperation.js";

export const httpMethods = [
  "get",
  "put",
  "post",
  "delete",
  "options",
  "head",
  "patch",
  "trace",
] as const;

export type HttpMethod = (typeof httpMethods)[number];

export class DereferencedPathItem {
  constructor(
    readonly source: OpenAPI.PathItem,
    readonly parameters: readonly DereferencedParameter[],
    readonly operations: Readonly<Partial<Record<HttpMethod, DereferencedOperation>>>
  ) {}

  get summary(): string | undefined {
    return this.source.summary;
  }

  get description(): string | undefined {
    return this.source.description;
  }

  get servers(): readonly OpenAPI.Server[] | undefined {
    return this.source.servers;
  }
}

export const dereferencePathItem = (
  pathItem: OpenAPI.PathItem,
  ctx: DereferenceContext
): Result<DereferencedPathItem, DereferenceError> => {
  const parameters = collectArray(pathItem.parameters ?? [], (parameter) =>
    dereferenceParameter(parameter, ctx)
  );
  if (!parameters.success) return parameters;

  const operations: Partial<Record<HttpMethod, DereferencedOperation>> = {};
  for (const method of httpMethods) {
    const operation = pathItem[method];
    if (operation === undefined) continue;

    const resolved = dereferenceOperation(operation, ctx);
    if (!resolved.success) return resolved;
    operations[method] = resolved.data;
  }

  return ok(new DereferencedPathItem(pathItem, parameters.data, operations));
};

/**
 * Path items have no component table in OpenAPI 3.0, so a path item `$ref`
 * can only point at another document.
 */
export const dereferencePathItemOrReference = (
  node: OpenAPI.PathItem | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<DereferencedPathItem, DereferenceError> => {
  if (!isReference(node)) return dereferencePathItem(node, ctx);

  const parsed = parseReference(node.$ref);
  if (!parsed.success) return parsed;
  if (parsed.data.kind === "remote") {
    return err(cannotResolveRemote(parsed.data.locator));
  }
  return err(
    invalidReference(node.$ref, "Path items cannot be referenced from components")
  );
};
