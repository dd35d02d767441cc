import { describe, it, expect } from "vitest";
import type { OpenAPI } from "@openapi-deref/core/openapi";
import { CycleGuard, DefinitionsStore, dereference } from "../src/index.js";

describe("DefinitionsStore", () => {
  const pet: OpenAPI.Schema = { type: "object" };
  const store = new DefinitionsStore({
    schemas: { Pet: pet, Animal: { $ref: "#/components/schemas/Pet" } },
    examples: { Pet: { value: { name: "Tom" } } },
  });

  it("returns the stored definition", () => {
    const result = store.lookup("schemas", "Pet");
    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toBe(pet);
  });

  it("returns aliases as stored", () => {
    expect(store.lookup("schemas", "Animal")).toEqual({
      success: true,
      data: { $ref: "#/components/schemas/Pet" },
    });
  });

  it("reports a missing name as notFound", () => {
    expect(store.lookup("schemas", "Owner")).toEqual({
      success: false,
      error: { type: "notFound", category: "schemas", name: "Owner" },
    });
  });

  it("keeps categories apart", () => {
    expect(store.has("examples", "Pet")).toBe(true);
    expect(store.has("responses", "Pet")).toBe(false);
  });

  it("lists names in definition order", () => {
    expect(store.names("schemas")).toEqual(["Pet", "Animal"]);
    expect(store.names("links")).toEqual([]);
  });

  it("does not observe later changes to its input", () => {
    const schemas: Record<string, OpenAPI.Schema> = {};
    const copy = new DefinitionsStore({ schemas });
    schemas.Late = { type: "string" };
    expect(copy.has("schemas", "Late")).toBe(false);
  });

  it("hands out its definitions without copying them", () => {
    const tom = { value: { name: "Tom" } };
    const shared = new DefinitionsStore({ examples: { Tom: tom } });
    const resolved = dereference("Example", { $ref: "#/components/examples/Tom" }, shared);

    expect(resolved.success && resolved.data).toBe(tom);
  });

  it("is empty for a document without components", () => {
    const empty = DefinitionsStore.fromComponents(undefined);
    expect(empty.names("schemas")).toEqual([]);
  });
});

describe("CycleGuard", () => {
  it("refuses to enter a definition twice", () => {
    const guard = new CycleGuard();
    expect(guard.enter("schemas", "Node")).toBe(true);
    expect(guard.enter("schemas", "Node")).toBe(false);
    expect(guard.isResolving("schemas", "Node")).toBe(true);
  });

  it("allows re-entry after leaving", () => {
    const guard = new CycleGuard();
    guard.enter("schemas", "Node");
    guard.leave("schemas", "Node");
    expect(guard.isResolving("schemas", "Node")).toBe(false);
    expect(guard.enter("schemas", "Node")).toBe(true);
  });

  it("tracks the same name in different categories separately", () => {
    const guard = new CycleGuard();
    expect(guard.enter("schemas", "Pet")).toBe(true);
    expect(guard.enter("examples", "Pet")).toBe(true);
    expect(guard.size).toBe(2);
  });
});
