import { err, ok, Result } from "@openapi-deref/core/result";
import { DefinitionCategory } from "../store/DefinitionCategory.js";
import { DereferenceError, invalidReference } from "../errors/DereferenceError.js";
import { decodeToken, formatLocalReference } from "./pointer.js";

/** Points at a component of the current document. */
export interface LocalReference {
  kind: "local";
  category: DefinitionCategory;
  name: string;
}

/** Points outside the current document. Never resolved. */
export interface RemoteReference {
  kind: "remote";
  locator: string;
}

export type Reference = LocalReference | RemoteReference;

/**
 * Parse a `$ref` string.
 *
 * Anything that is not a bare fragment is remote. Fragments must be JSON
 * pointers of the form `#/components/<category>/<name>`.
 */
export function parseReference(ref: string): Result<Reference, DereferenceError> {
  if (ref === "") {
    return err(invalidReference(ref, "Reference is empty"));
  }
  if (!ref.startsWith("#")) {
    return ok({ kind: "remote", locator: ref });
  }

  let pointer: string;
  try {
    pointer = decodeURIComponent(ref.slice(1));
  } catch {
    return err(invalidReference(ref, "Malformed percent-encoding"));
  }

  if (!pointer.startsWith("/")) {
    return err(invalidReference(ref, "JSON Pointer must start with '/'"));
  }

  const tokens: string[] = [];
  for (const raw of pointer.slice(1).split("/")) {
    const decoded = decodeToken(raw);
    if (!decoded.success) {
      return err(invalidReference(ref, decoded.error));
    }
    tokens.push(decoded.data);
  }

  if (tokens.length !== 3 || tokens[0] !== "components") {
    return err(
      invalidReference(ref, "Expected a pointer to #/components/<category>/<name>")
    );
  }

  const [, rawCategory, name] = tokens;
  const category = DefinitionCategory.safeParse(rawCategory);
  if (!category.success) {
    return err(invalidReference(ref, `Unknown component category "${rawCategory}"`));
  }
  if (name === "") {
    return err(invalidReference(ref, "Component name is empty"));
  }

  return ok({ kind: "local", category: category.data, name });
}

export function formatReference(reference: Reference): string {
  return reference.kind === "remote"
    ? reference.locator
    : formatLocalReference(reference.category, reference.name);
}
