import type { OpenAPI } from "@openapi-deref/core/openapi";
import { isReference } from "@openapi-deref/core/openapi";
import { err, Result } from "@openapi-deref/core/result";
import {
  DefinitionCategory,
  DefinitionKinds,
} from "../store/DefinitionCategory.js";
import {
  cannotResolveRemote,
  DereferenceError,
  notFound,
  recursiveReference,
  typeMismatch,
} from "../errors/DereferenceError.js";
import { parseReference } from "../reference/Reference.js";
import { DereferenceContext } from "./DereferenceContext.js";

/**
 * Resolve `reference` to a concrete definition of the `expected` category and
 * hand it to `resolve`.
 *
 * Aliases (definitions that are themselves references) are followed. The
 * definition stays marked in the cycle guard until `resolve` returns, so a
 * reference back to it from anywhere in its subtree is reported as recursive.
 */
export function followReference<C extends DefinitionCategory, D>(
  reference: OpenAPI.Reference,
  expected: C,
  ctx: DereferenceContext,
  resolve: (
    definition: DefinitionKinds[C],
    ctx: DereferenceContext
  ) => Result<D, DereferenceError>
): Result<D, DereferenceError> {
  const parsed = parseReference(reference.$ref);
  if (!parsed.success) return parsed;

  const target = parsed.data;
  if (target.kind === "remote") {
    return err(cannotResolveRemote(target.locator));
  }

  const { category, name } = target;
  if (category !== expected) {
    return err(
      ctx.store.has(category, name)
        ? typeMismatch(category, name, expected)
        : notFound(category, name)
    );
  }

  if (!ctx.guard.enter(expected, name)) {
    return err(recursiveReference(expected, name));
  }

  try {
    const found = ctx.store.lookup(expected, name);
    if (!found.success) return found;

    ctx.trace(`following ${reference.$ref}`);

    const definition = found.data;
    if (isReference(definition)) {
      return followReference(definition, expected, ctx, resolve);
    }
    return resolve(definition, ctx);
  } finally {
    ctx.guard.leave(expected, name);
  }
}
