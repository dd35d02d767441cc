import { DefinitionCategory } from "../store/DefinitionCategory.js";
import { formatLocalReference } from "../reference/pointer.js";

export type DereferenceError =
  | { type: "notFound"; category: DefinitionCategory; name: string }
  | { type: "cannotResolveRemote"; locator: string }
  | { type: "recursiveReference"; category: DefinitionCategory; name: string }
  | {
      type: "typeMismatch";
      category: DefinitionCategory;
      name: string;
      expected: DefinitionCategory;
      actual: DefinitionCategory;
    }
  | { type: "invalidReference"; ref: string; message: string };

export const notFound = (
  category: DefinitionCategory,
  name: string
): DereferenceError => ({ type: "notFound", category, name });

export const cannotResolveRemote = (locator: string): DereferenceError => ({
  type: "cannotResolveRemote",
  locator,
});

export const recursiveReference = (
  category: DefinitionCategory,
  name: string
): DereferenceError => ({ type: "recursiveReference", category, name });

export const typeMismatch = (
  category: DefinitionCategory,
  name: string,
  expected: DefinitionCategory
): DereferenceError => ({
  type: "typeMismatch",
  category,
  name,
  expected,
  actual: category,
});

export const invalidReference = (
  ref: string,
  message: string
): DereferenceError => ({ type: "invalidReference", ref, message });

export function formatDereferenceError(error: DereferenceError): string {
  switch (error.type) {
    case "notFound":
      return `${formatLocalReference(error.category, error.name)} does not exist`;
    case "cannotResolveRemote":
      return `Cannot resolve remote reference ${error.locator}`;
    case "recursiveReference":
      return `${formatLocalReference(error.category, error.name)} refers back to itself`;
    case "typeMismatch":
      return `${formatLocalReference(error.category, error.name)} is defined under ${error.actual}, expected ${error.expected}`;
    case "invalidReference":
      return `Invalid reference "${error.ref}": ${error.message}`;
  }
}
