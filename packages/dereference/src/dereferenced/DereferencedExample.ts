import { isReference, OpenAPI } from "@openapi-deref/core/openapi";
import { collectRecord, ok, Result } from "@openapi-deref/core/result";
import { orderedEntries } from "@openapi-deref/core/record";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { followReference } from "../context/followReference.js";

export const dereferenceExample = (
  node: OpenAPI.Example | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<OpenAPI.Example, DereferenceError> =>
  isReference(node)
    ? followReference(node, "examples", ctx, (example) => ok(example))
    : ok(node);

export const dereferenceExamples = (
  examples: Record<string, OpenAPI.Example | OpenAPI.Reference> | undefined,
  ctx: DereferenceContext
): Result<Record<string, OpenAPI.Example> | undefined, DereferenceError> => {
  if (examples === undefined) return ok(undefined);
  return collectRecord(examples, (example) => dereferenceExample(example, ctx));
};

/**
 * The single example exposed next to an `examples` map.
 *
 * The first entry, in authored order, wins over an authored `example`. When
 * there are no entries, or the first one only has an `externalValue`, the
 * authored `example` is kept.
 */
export const deriveExample = (
  examples: Readonly<Record<string, OpenAPI.Example>> | undefined,
  authored: unknown
): unknown => {
  if (examples === undefined) return authored;

  const [first] = orderedEntries(examples);
  if (first === undefined) return authored;

  const [, example] = first;
  return example.value === undefined ? authored : example.value;
};
