import { describe, it, expect } from "vitest";
import {
  headerSchemaContext,
  isReference,
  OpenAPI,
  parameterSchemaContext,
} from "../src/openapi/index.js";

describe("parameterSchemaContext", () => {
  it("takes the location from the parameter", () => {
    const parameter = OpenAPI.Parameter.parse({
      name: "id",
      in: "path",
      required: true,
      style: "label",
      schema: { type: "string" },
      example: "abc",
    });

    expect(parameterSchemaContext(parameter)).toEqual({
      location: "path",
      schema: { type: "string" },
      style: "label",
      example: "abc",
    });
  });

  it("returns undefined for a content parameter", () => {
    const parameter = OpenAPI.Parameter.parse({
      name: "filter",
      in: "query",
      content: { "application/json": { schema: { type: "object" } } },
    });

    expect(parameterSchemaContext(parameter)).toBeUndefined();
  });
});

describe("headerSchemaContext", () => {
  it("places headers in the header location", () => {
    const header = OpenAPI.Header.parse({
      schema: { $ref: "#/components/schemas/Token" },
      examples: { short: { value: "t" } },
    });

    expect(headerSchemaContext(header)).toEqual({
      location: "header",
      schema: { $ref: "#/components/schemas/Token" },
      examples: { short: { value: "t" } },
    });
  });
});

describe("isReference", () => {
  it("recognizes parsed and hand-built references", () => {
    const parsed = OpenAPI.Reference.parse({ $ref: "#/components/schemas/Pet" });
    expect(isReference(parsed)).toBe(true);
    expect(isReference({ $ref: "#/components/schemas/Pet" })).toBe(true);
  });

  it("rejects objects without a string $ref", () => {
    expect(isReference({ type: "string" })).toBe(false);
    expect(isReference({ $ref: 1 })).toBe(false);
  });
});
