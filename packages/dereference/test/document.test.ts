import { describe, it, expect, vi, afterEach } from "vitest";
import dedent from "dedent";
import { stringify } from "yaml";
import {
  dereference,
  dereferenceDocument,
  dereferenceEachPath,
  DefinitionsStore,
  loadDocument,
  orderedKeys,
} from "../src/index.js";
import { findReferences, unwrap } from "./utils/results.js";

const petStore = dedent`
  openapi: 3.0.3
  info:
    title: Pet Store
    version: 1.0.0
  paths:
    /pets/{petId}:
      parameters:
        - $ref: "#/components/parameters/PetId"
      get:
        operationId: getPet
        responses:
          "200":
            $ref: "#/components/responses/PetResponse"
  components:
    parameters:
      PetId:
        name: petId
        in: path
        required: true
        schema:
          type: string
    responses:
      PetResponse:
        description: A pet
        content:
          application/json:
            schema:
              $ref: "#/components/schemas/Pet"
            examples:
              tom:
                $ref: "#/components/examples/Tom"
    schemas:
      Pet:
        type: object
        properties:
          name:
            type: string
    examples:
      Tom:
        value:
          name: Tom
`;

const load = (text: string) => {
  const loaded = loadDocument(text);
  if (!loaded.success) throw new Error(`Failed to load: ${loaded.error.type}`);
  return loaded.data;
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadDocument", () => {
  it("parses the document and builds the store from its components", () => {
    const { document, store } = load(petStore);

    expect(document.info.title).toBe("Pet Store");
    expect(store.names("schemas")).toEqual(["Pet"]);
    expect(store.has("examples", "Tom")).toBe(true);
  });

  it("accepts JSON text", () => {
    const { document } = load(
      JSON.stringify({ openapi: "3.0.3", info: { title: "Empty", version: "1" }, paths: {} })
    );
    expect(document.info.title).toBe("Empty");
  });

  it("reports text that is not YAML", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const loaded = loadDocument("openapi: [3.0.3");
    expect(loaded.success).toBe(false);
    if (!loaded.success) expect(loaded.error.type).toBe("invalidYaml");
  });

  it("reports a document missing required fields", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const loaded = loadDocument("openapi: 3.0.3\npaths: {}\n");
    expect(loaded.success).toBe(false);
    if (!loaded.success) expect(loaded.error.type).toBe("invalidDocument");
    expect(error).toHaveBeenCalledWith("Document is not a valid OpenAPI 3.0 document");
  });
});

describe("dereferenceDocument", () => {
  it("resolves every path against the document's components", () => {
    const { document } = load(petStore);
    const resolved = unwrap(dereferenceDocument(document));

    const pathItem = resolved.paths["/pets/{petId}"];
    expect(pathItem.parameters[0].name).toBe("petId");
    expect(pathItem.parameters[0].location).toBe("path");

    const media = pathItem.operations.get?.responses["200"].content?.["application/json"];
    expect(media?.schema).toEqual({
      type: "object",
      properties: { name: { type: "string" } },
    });
    expect(media?.example).toEqual({ name: "Tom" });
    expect(findReferences(resolved)).toEqual([]);
    expect(resolved.info.version).toBe("1.0.0");
  });

  it("resolves a document with no paths", () => {
    const { document } = load(
      stringify({ openapi: "3.0.3", info: { title: "Empty", version: "1" } })
    );
    expect(unwrap(dereferenceDocument(document)).paths).toEqual({});
  });

  it("rejects a remote path item", () => {
    const { document } = load(
      stringify({
        openapi: "3.0.3",
        info: { title: "Split", version: "1" },
        paths: { "/pets": { $ref: "pets.yaml#/paths/~1pets" } },
      })
    );
    expect(dereferenceDocument(document)).toEqual({
      success: false,
      error: { type: "cannotResolveRemote", locator: "pets.yaml#/paths/~1pets" },
    });
  });

  it("rejects a local path item reference", () => {
    const { document } = load(
      stringify({
        openapi: "3.0.3",
        info: { title: "Local", version: "1" },
        paths: { "/pets": { $ref: "#/components/schemas/Pets" } },
      })
    );
    expect(dereferenceDocument(document)).toEqual({
      success: false,
      error: {
        type: "invalidReference",
        ref: "#/components/schemas/Pets",
        message: "Path items cannot be referenced from components",
      },
    });
  });
});

describe("authored key order", () => {
  const ordered = dedent`
    openapi: 3.0.3
    info:
      title: Ordered
      version: "1"
    paths:
      /items:
        get:
          parameters:
            - name: page
              in: query
              schema:
                type: integer
              examples:
                "2":
                  value: 2
                "1":
                  value: 1
          responses:
            404:
              description: Missing
            200:
              description: Found
              content:
                application/json:
                  schema:
                    type: object
                    properties:
                      __proto__:
                        type: string
                      id:
                        type: integer
  `;

  it("derives the example from the first authored entry", () => {
    const { document } = load(ordered);
    const operation = unwrap(dereferenceDocument(document)).paths["/items"].operations.get;
    const schemaOrContent = operation?.parameters[0].schemaOrContent;
    if (schemaOrContent?.type !== "schema") throw new Error("Expected a schema context");

    expect(schemaOrContent.context.example).toBe(2);
    expect(orderedKeys(schemaOrContent.context.examples ?? {})).toEqual(["2", "1"]);
  });

  it("keeps integer-like response codes in authored order", () => {
    const { document } = load(ordered);
    const operation = unwrap(dereferenceDocument(document)).paths["/items"].operations.get;

    expect(orderedKeys(operation?.responses ?? {})).toEqual(["404", "200"]);
  });

  it("keeps a __proto__ property as a property", () => {
    const { document } = load(ordered);
    const operation = unwrap(dereferenceDocument(document)).paths["/items"].operations.get;
    const properties =
      operation?.responses["200"].content?.["application/json"].schema?.properties ?? {};

    expect(Object.keys(properties)).toEqual(["__proto__", "id"]);
    expect(Object.getOwnPropertyDescriptor(properties, "__proto__")?.value).toEqual({
      type: "string",
    });
  });
});

describe("callbacks", () => {
  const withCallback = (requestBody: unknown) =>
    stringify({
      openapi: "3.0.3",
      info: { title: "Hooks", version: "1" },
      paths: {
        "/subscriptions": {
          post: {
            responses: { "201": { description: "Subscribed" } },
            callbacks: {
              onEvent: {
                "{$request.body#/url}": {
                  post: {
                    requestBody,
                    responses: { "200": { description: "Received" } },
                  },
                },
              },
            },
          },
        },
      },
      components: {
        requestBodies: {
          Event: {
            content: { "application/json": { schema: { type: "object" } } },
          },
        },
      },
    });

  it("resolves references inside a callback", () => {
    const { document } = load(withCallback({ $ref: "#/components/requestBodies/Event" }));
    const resolved = unwrap(dereferenceDocument(document));
    const operation = resolved.paths["/subscriptions"].operations.post;
    const hook = operation?.callbacks?.onEvent["{$request.body#/url}"].operations.post;

    expect(hook?.requestBody?.content["application/json"].schema).toEqual({
      type: "object",
    });
    expect(findReferences(resolved)).toEqual([]);
  });

  it("fails on a broken reference inside a callback", () => {
    const { document } = load(withCallback({ $ref: "#/components/requestBodies/Missing" }));
    expect(dereferenceDocument(document)).toEqual({
      success: false,
      error: { type: "notFound", category: "requestBodies", name: "Missing" },
    });
  });
});

describe("dereferenceEachPath", () => {
  it("reports each path on its own", () => {
    const { document } = load(
      stringify({
        openapi: "3.0.3",
        info: { title: "Mixed", version: "1" },
        paths: {
          "/ok": { get: { responses: { "204": { description: "No content" } } } },
          "/broken": {
            get: { responses: { "404": { $ref: "#/components/responses/Missing" } } },
          },
        },
      })
    );

    const results = dereferenceEachPath(document);

    expect(Object.keys(results)).toEqual(["/ok", "/broken"]);
    expect(results["/ok"].success).toBe(true);
    expect(results["/broken"]).toEqual({
      success: false,
      error: { type: "notFound", category: "responses", name: "Missing" },
    });
  });
});

describe("trace logging", () => {
  const store = new DefinitionsStore({
    schemas: { Pet: { type: "object" }, Animal: { $ref: "#/components/schemas/Pet" } },
  });

  it("logs every reference followed when enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    dereference("Schema", { $ref: "#/components/schemas/Animal" }, store, {
      "dereference.debug.trace": true,
    });

    expect(debug.mock.calls).toEqual([
      ["[dereference] following #/components/schemas/Animal"],
      ["[dereference] following #/components/schemas/Pet"],
    ]);
  });

  it("is silent by default", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    dereference("Schema", { $ref: "#/components/schemas/Animal" }, store);
    expect(debug).not.toHaveBeenCalled();
  });
});
