import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import { OpenAPI } from "@openapi-deref/core/openapi";
import { err, ok, Result } from "@openapi-deref/core/result";
import { orderedRecord } from "@openapi-deref/core/record";
import { DefinitionsStore } from "../store/DefinitionsStore.js";

export type LoadError =
  | { type: "invalidYaml"; message: string }
  | { type: "invalidDocument"; error: ZodError };

export interface LoadedDocument {
  document: OpenAPI.Document;
  store: DefinitionsStore;
}

// Mappings are read as Maps, which keep integer-like keys in authored position,
// then turned into ordered records.
const toPlainValue = (value: unknown): unknown => {
  if (value instanceof Map) {
    return orderedRecord(
      [...value].map(([key, entry]): [string, unknown] => [
        String(key),
        toPlainValue(entry),
      ])
    );
  }
  if (Array.isArray(value)) return value.map(toPlainValue);
  return value;
};

/**
 * Parse an OpenAPI 3.0 document from YAML or JSON text and build the
 * definitions store from its components.
 */
export const loadDocument = (
  text: string
): Result<LoadedDocument, LoadError> => {
  let raw: unknown;
  try {
    raw = toPlainValue(parseYaml(text, { mapAsMap: true }));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error("Failed to parse document", message);
    return err({ type: "invalidYaml", message });
  }

  const parsed = OpenAPI.Document.safeParse(raw);
  if (!parsed.success) {
    console.error("Document is not a valid OpenAPI 3.0 document");
    return err({ type: "invalidDocument", error: parsed.error });
  }

  return ok({
    document: parsed.data,
    store: DefinitionsStore.fromComponents(parsed.data.components),
  });
};
