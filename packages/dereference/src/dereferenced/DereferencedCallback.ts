import { isReference, OpenAPI } from "@openapi-deref/core/openapi";
import { collectRecord, Result } from "@openapi-deref/core/result";
import { DereferenceError } from "../errors/DereferenceError.js";
import { DereferenceContext } from "../context/DereferenceContext.js";
import { followReference } from "../context/followReference.js";
import {
  DereferencedPathItem,
  dereferencePathItemOrReference,
} from "./DereferencedPathItem.js";

/**
 * A callback with each runtime expression mapped to its resolved path item.
 */
export type DereferencedCallback = Readonly<Record<string, DereferencedPathItem>>;

const dereferenceInlineCallback = (
  callback: OpenAPI.Callback,
  ctx: DereferenceContext
): Result<DereferencedCallback, DereferenceError> =>
  collectRecord(callback, (pathItem) =>
    dereferencePathItemOrReference(pathItem, ctx)
  );

export const dereferenceCallback = (
  node: OpenAPI.Callback | OpenAPI.Reference,
  ctx: DereferenceContext
): Result<DereferencedCallback, DereferenceError> =>
  isReference(node)
    ? followReference(node, "callbacks", ctx, dereferenceInlineCallback)
    : dereferenceInlineCallback(node, ctx);
