import { z } from "zod";
import type { OpenAPI } from "@openapi-deref/core/openapi";

/**
 * The component tables a local reference can point into.
 */
export const DefinitionCategory = z.enum([
  "schemas",
  "responses",
  "parameters",
  "examples",
  "requestBodies",
  "headers",
  "securitySchemes",
  "links",
  "callbacks",
]);

export type DefinitionCategory = z.infer<typeof DefinitionCategory>;

/**
 * The concrete object kind stored under each category.
 */
export interface DefinitionKinds {
  schemas: OpenAPI.Schema;
  responses: OpenAPI.Response;
  parameters: OpenAPI.Parameter;
  examples: OpenAPI.Example;
  requestBodies: OpenAPI.RequestBody;
  headers: OpenAPI.Header;
  securitySchemes: OpenAPI.SecurityScheme;
  links: OpenAPI.Link;
  callbacks: OpenAPI.Callback;
}

/**
 * A stored definition is either concrete or an alias for another definition.
 */
export type Definition<C extends DefinitionCategory> =
  | DefinitionKinds[C]
  | OpenAPI.Reference;
