import { err, ok, Result } from "@openapi-deref/core/result";
import { DefinitionCategory } from "../store/DefinitionCategory.js";

/**
 * Decode a single JSON Pointer reference token per RFC 6901
 * ~1 → /, ~0 → ~ (must decode in this order)
 */
export function decodeToken(token: string): Result<string, string> {
  let result = "";
  let i = 0;
  while (i < token.length) {
    if (token[i] !== "~") {
      result += token[i];
      i++;
      continue;
    }
    const next = token[i + 1];
    if (next === "1") {
      result += "/";
    } else if (next === "0") {
      result += "~";
    } else if (next === undefined) {
      return err(`Incomplete escape at position ${i}`);
    } else {
      return err(`Invalid escape ~${next} at position ${i}`);
    }
    i += 2;
  }
  return ok(result);
}

export function encodeToken(token: string): string {
  return encodeURIComponent(token.replaceAll("~", "~0").replaceAll("/", "~1"));
}

/**
 * Render the `$ref` that points at a component definition.
 */
export function formatLocalReference(
  category: DefinitionCategory,
  name: string
): string {
  return `#/components/${category}/${encodeToken(name)}`;
}
