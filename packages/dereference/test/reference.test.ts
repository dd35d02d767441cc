import { describe, it, expect } from "vitest";
import { formatReference, parseReference } from "../src/index.js";

describe("parseReference", () => {
  it("parses a component pointer", () => {
    expect(parseReference("#/components/schemas/Pet")).toEqual({
      success: true,
      data: { kind: "local", category: "schemas", name: "Pet" },
    });
  });

  it("unescapes ~1 and ~0 in the name", () => {
    expect(parseReference("#/components/schemas/a~1b~0c")).toEqual({
      success: true,
      data: { kind: "local", category: "schemas", name: "a/b~c" },
    });
  });

  it("percent-decodes the fragment", () => {
    expect(parseReference("#/components/examples/Pet%20Food")).toEqual({
      success: true,
      data: { kind: "local", category: "examples", name: "Pet Food" },
    });
  });

  it("treats anything that is not a bare fragment as remote", () => {
    expect(parseReference("other.yaml#/components/schemas/Pet")).toEqual({
      success: true,
      data: { kind: "remote", locator: "other.yaml#/components/schemas/Pet" },
    });
    expect(parseReference("https://example.com/api.json")).toEqual({
      success: true,
      data: { kind: "remote", locator: "https://example.com/api.json" },
    });
  });

  it.each([
    ["", "Reference is empty"],
    ["#components/schemas/Pet", "JSON Pointer must start with '/'"],
    ["#/paths/~1pets", "Expected a pointer to #/components/<category>/<name>"],
    [
      "#/components/schemas/Pet/properties/name",
      "Expected a pointer to #/components/<category>/<name>",
    ],
    ["#/components/widgets/Pet", 'Unknown component category "widgets"'],
    ["#/components/schemas/", "Component name is empty"],
    ["#/components/schemas/a~2", "Invalid escape ~2 at position 1"],
    ["#/components/schemas/a~", "Incomplete escape at position 1"],
    ["#/components/schemas/%E0%A4%A", "Malformed percent-encoding"],
  ])("rejects %j", (ref, message) => {
    expect(parseReference(ref)).toEqual({
      success: false,
      error: { type: "invalidReference", ref, message },
    });
  });
});

describe("formatReference", () => {
  it("escapes names that need it", () => {
    expect(
      formatReference({ kind: "local", category: "schemas", name: "a/b~c" })
    ).toBe("#/components/schemas/a~1b~0c");
    expect(
      formatReference({ kind: "local", category: "headers", name: "Rate Limit" })
    ).toBe("#/components/headers/Rate%20Limit");
  });

  it("returns a remote locator unchanged", () => {
    expect(formatReference({ kind: "remote", locator: "common.yaml#/Pet" })).toBe(
      "common.yaml#/Pet"
    );
  });

  it("produces references that parse back to the same target", () => {
    const reference = { kind: "local", category: "links", name: "next/page~1" } as const;
    expect(parseReference(formatReference(reference))).toEqual({
      success: true,
      data: reference,
    });
  });
});
